import { parseScheduledMessage, type ScheduledMessage } from "../../domain/entities/scheduled-message.entity.js";
import { UnitOfWork } from "../../domain/entities/unit-of-work.entity.js";
import { MalformedMessageError } from "../../domain/errors/malformed-message.error.js";
import type { IWorkQueueRepository } from "../../domain/repositories/work-queue.repository.js";
import type { FetchStrategy } from "../../domain/strategies/fetch.strategy.js";
import { toQueueKey } from "../../domain/values/queue-key.js";
import { createConsoleLogger, type Logger } from "../../utils/logger.js";
import type { ScheduleFetchOptions } from "../dtos/fetch-options.dto.js";
import { bulkRequeue } from "./bulk-requeue.js";

export const DEFAULT_SCHEDULE = "schedule";
export const DEFAULT_DEAD_SET = "dead";

/**
 * Pulls due entries out of Redis sorted sets scored by Unix time in seconds.
 * Entries carrying an `expiration` are recurring: they are put back with a new
 * score before being handed out.
 */
export class ScheduleFetch implements FetchStrategy {
    private readonly schedules: readonly string[];
    private readonly deadSet: string;
    private readonly logger: Logger;
    private readonly random: () => number;
    private readonly clock: () => number;

    constructor(
        private readonly repository: IWorkQueueRepository,
        options: ScheduleFetchOptions = {},
    ) {
        const schedules = options.schedules ?? [DEFAULT_SCHEDULE];
        if (schedules.length === 0) {
            throw new Error("ScheduleFetch: at least one schedule set is required");
        }

        this.schedules = Object.freeze(schedules.slice());
        this.deadSet = options.deadSet ?? DEFAULT_DEAD_SET;
        this.logger = options.logger ?? createConsoleLogger("ScheduleFetch");
        this.random = options.random ?? Math.random;
        this.clock = options.clock ?? Date.now;
    }

    private pickSchedule(): string {
        const index = Math.floor(this.random() * this.schedules.length);
        return this.schedules[Math.min(index, this.schedules.length - 1)];
    }

    async retrieveWork(): Promise<UnitOfWork | null> {
        const schedule = this.pickSchedule();
        const now = this.clock() / 1000;

        const message = await this.repository.popDue(schedule, now);
        if (message === null) return null;

        let parsed: ScheduledMessage;
        try {
            parsed = parseScheduledMessage(message);
        } catch (error) {
            if (!(error instanceof MalformedMessageError)) throw error;
            try {
                await this.repository.addScheduled(this.deadSet, now, message);
            } catch (deadLetterError) {
                // already removed from the schedule: the log line is the only copy left
                const reason = deadLetterError instanceof Error ? deadLetterError.message : String(deadLetterError);
                this.logger.error(`Could not move entry from "${schedule}" to "${this.deadSet}" (${reason}): ${message}`);
                throw deadLetterError;
            }
            this.logger.warn(`Moved entry from "${schedule}" to "${this.deadSet}": ${error.message}`);
            return null;
        }

        if (parsed.expiration !== undefined) {
            await this.repository.addScheduled(schedule, now + parsed.expiration, message);
        }

        return new UnitOfWork(toQueueKey(parsed.queue), message, this.repository);
    }

    /** Abandoned scheduled work goes to its plain work queue, not back into the schedule. */
    async bulkRequeue(inProgress: readonly UnitOfWork[]): Promise<void> {
        await bulkRequeue(this.repository, inProgress, this.logger);
    }
}
