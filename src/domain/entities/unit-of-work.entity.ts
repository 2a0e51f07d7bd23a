import type { IWorkQueueRepository } from "../repositories/work-queue.repository.js";
import { queueName, toQueueKey } from "../values/queue-key.js";

/**
 * A job checked out of Redis: the namespaced list it came from and the raw
 * serialized payload. Instances are frozen; a worker consumes each one exactly
 * once, either by acknowledging it or by requeueing it.
 */
export class UnitOfWork {
    constructor(
        public readonly queue: string,
        public readonly payload: string,
        private readonly repository: IWorkQueueRepository,
    ) {
        Object.freeze(this);
    }

    get queueName(): string {
        return queueName(this.queue);
    }

    /** Nothing to do: BRPOP already removed the job from Redis. */
    async acknowledge(): Promise<void> {}

    async requeue(): Promise<void> {
        await this.repository.push(toQueueKey(this.queueName), [this.payload]);
    }
}
