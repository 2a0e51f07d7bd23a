import type { IWorkQueueRepository } from "../domain/repositories/work-queue.repository.js";
import { DEFAULT_SCHEDULE } from "../application/strategies/schedule-fetch.strategy.js";
import { scheduledMessageSchema } from "../domain/entities/scheduled-message.entity.js";
import { queueName, toQueueKey } from "../domain/values/queue-key.js";

export interface ScheduleOptions {
    /** Repeat every `expiration` seconds once first due. */
    expiration?: number;
    /** Sorted set to park the entry in. Default: "schedule" */
    set?: string;
}

/** Producer side of a single work queue. Payloads are opaque strings. */
export class Queue {
    public readonly key: string;

    constructor(
        public readonly name: string,
        private readonly repository: IWorkQueueRepository,
    ) {
        this.key = toQueueKey(name);
    }

    public async enqueue(...payloads: string[]): Promise<void> {
        await this.repository.enqueue(this.key, payloads);
    }

    /**
     * Park a job until `at`. The stored message is `job` serialized with this
     * queue's name (and `expiration`, when given) merged in; it is returned.
     * Throws a `ZodError` before writing anything when `expiration` is not a
     * positive number.
     */
    public async schedule(job: Record<string, unknown>, at: Date, options: ScheduleOptions = {}): Promise<string> {
        const entry = {
            ...job,
            queue: queueName(this.name),
            ...(options.expiration !== undefined ? { expiration: options.expiration } : {}),
        };
        // the scheduled strategy would dead-letter anything this rejects
        scheduledMessageSchema.parse(entry);
        const message = JSON.stringify(entry);
        await this.repository.addScheduled(options.set ?? DEFAULT_SCHEDULE, at.getTime() / 1000, message);
        return message;
    }
}
