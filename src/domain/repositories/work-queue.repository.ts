/** Result of a blocking pop: the list key that had data and the popped payload. */
export type PoppedWork = readonly [queue: string, payload: string];

export interface IWorkQueueRepository {
    /** Pop from the first key holding data, waiting at most `timeout` seconds. */
    blockingPop(keys: readonly string[], timeout: number): Promise<PoppedWork | null>;
    /** LPUSH: joins the back of the line, popped after everything already queued. */
    enqueue(key: string, payloads: readonly string[]): Promise<void>;
    /** RPUSH: lands on the popping end, so requeued work is picked up next. */
    push(key: string, payloads: readonly string[]): Promise<void>;
    /** Push every group in a single round trip. */
    pushMany(groups: ReadonlyMap<string, readonly string[]>): Promise<void>;
    /** Atomically remove and return the lowest-scored member with score <= maxScore. */
    popDue(set: string, maxScore: number): Promise<string | null>;
    addScheduled(set: string, score: number, payload: string): Promise<void>;
}
