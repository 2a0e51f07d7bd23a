import { UnitOfWork } from "../../domain/entities/unit-of-work.entity.js";
import type { IWorkQueueRepository } from "../../domain/repositories/work-queue.repository.js";
import type { FetchStrategy } from "../../domain/strategies/fetch.strategy.js";
import { toQueueKey } from "../../domain/values/queue-key.js";
import { createConsoleLogger, type Logger } from "../../utils/logger.js";
import { shuffle, unique } from "../../utils/shuffle.js";
import type { FetchOptions } from "../dtos/fetch-options.dto.js";
import { bulkRequeue } from "./bulk-requeue.js";

/** Seconds a BRPOP may block before the worker gets to check for shutdown. */
export const FETCH_TIMEOUT = 2;

export interface QueuesCommand {
    keys: readonly string[];
    timeout: number;
}

/** Pulls jobs off Redis lists with a single BRPOP across every configured queue. */
export class BasicFetch implements FetchStrategy {
    private readonly queues: readonly string[];
    private readonly strict: boolean;
    private readonly timeout: number;
    private readonly logger: Logger;
    private readonly random: () => number;
    private readonly strictCommand: QueuesCommand | null;

    constructor(
        private readonly repository: IWorkQueueRepository,
        options: FetchOptions,
    ) {
        if (options.queues.length === 0) {
            throw new Error("BasicFetch: at least one queue is required");
        }

        this.strict = options.strict ?? false;
        this.timeout = options.timeout ?? FETCH_TIMEOUT;
        this.logger = options.logger ?? createConsoleLogger("BasicFetch");
        this.random = options.random ?? Math.random;

        const keys = options.queues.map(toQueueKey);
        this.queues = Object.freeze(this.strict ? unique(keys) : keys);
        this.strictCommand = this.strict ? Object.freeze({ keys: this.queues, timeout: this.timeout }) : null;
    }

    /**
     * BRPOP serves the first listed key that has data, so a fixed order would
     * starve the tail under load. Non-strict mode reshuffles on every call; a
     * queue listed several times is proportionally more likely to lead.
     */
    queuesCommand(): QueuesCommand {
        if (this.strictCommand) return this.strictCommand;
        return { keys: unique(shuffle(this.queues, this.random)), timeout: this.timeout };
    }

    async retrieveWork(): Promise<UnitOfWork | null> {
        const { keys, timeout } = this.queuesCommand();
        const work = await this.repository.blockingPop(keys, timeout);
        if (!work) return null;

        const [queue, payload] = work;
        return new UnitOfWork(queue, payload, this.repository);
    }

    async bulkRequeue(inProgress: readonly UnitOfWork[]): Promise<void> {
        await bulkRequeue(this.repository, inProgress, this.logger);
    }
}
