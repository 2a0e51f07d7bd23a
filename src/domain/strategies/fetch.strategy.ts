import type { UnitOfWork } from "../entities/unit-of-work.entity.js";

/**
 * Contract shared by every way of pulling work out of Redis.
 *
 * `retrieveWork` blocks for a bounded time and resolves `null` when nothing
 * arrived, which is the caller's chance to notice a shutdown. `bulkRequeue`
 * puts checked-out work back and never rejects.
 */
export interface FetchStrategy {
    retrieveWork(): Promise<UnitOfWork | null>;
    bulkRequeue(inProgress: readonly UnitOfWork[]): Promise<void>;
}
