import type { UnitOfWork } from "../../domain/entities/unit-of-work.entity.js";
import type { IWorkQueueRepository } from "../../domain/repositories/work-queue.repository.js";
import { toQueueKey } from "../../domain/values/queue-key.js";
import type { Logger } from "../../utils/logger.js";

/** Payloads keyed by namespaced queue, in the order queues were first seen. */
export function groupByQueue(inProgress: readonly UnitOfWork[]): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    for (const unit of inProgress) {
        const key = toQueueKey(unit.queueName);
        const payloads = groups.get(key);
        if (payloads) {
            payloads.push(unit.payload);
        } else {
            groups.set(key, [unit.payload]);
        }
    }
    return groups;
}

/**
 * Push checked-out work back onto its work queues in one pipelined round trip.
 * Runs on the shutdown path, so a Redis failure is logged and swallowed.
 */
export async function bulkRequeue(
    repository: IWorkQueueRepository,
    inProgress: readonly UnitOfWork[],
    logger: Logger,
): Promise<void> {
    if (inProgress.length === 0) return;

    logger.debug("Re-queueing terminated jobs");
    try {
        await repository.pushMany(groupByQueue(inProgress));
        logger.info(`Pushed ${inProgress.length} jobs back to Redis`);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Failed to requeue ${inProgress.length} jobs: ${message}`);
    }
}
