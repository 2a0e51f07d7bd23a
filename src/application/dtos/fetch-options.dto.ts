import type { Logger } from "../../utils/logger.js";

/**
 * Options for the immediate (queue polling) fetch strategy.
 *
 * Weighted polling:
 * ```ts
 * const opts: FetchOptions = { queues: ["critical", "critical", "critical", "default"] };
 * // "critical" leads the poll order three times as often as "default"
 * ```
 *
 * Strict priority:
 * ```ts
 * const opts: FetchOptions = { queues: ["high", "low"], strict: true };
 * // "high" is always drained before "low" is looked at
 * ```
 */
export interface FetchOptions {
    /**
     * Bare queue names, in priority order. A name may repeat to give it more
     * weight in non-strict mode; strict mode drops the repeats.
     *
     * Examples:
     * - ["default"]
     * - ["high", "default", "low"]
     */
    queues: readonly string[];

    /**
     * Poll queues in exactly the configured order on every call.
     *
     * Optional. Default: false (the order is reshuffled on every call)
     */
    strict?: boolean;

    /**
     * Seconds a single BRPOP may block. Bounds how long a worker takes to notice
     * a shutdown.
     *
     * Optional. Default: 2
     */
    timeout?: number;

    /** Optional. Default: console logger tagged `[BasicFetch]` */
    logger?: Logger;

    /** Source of randomness for the poll order. Optional. Default: Math.random */
    random?: () => number;
}

/**
 * Options for the scheduled fetch strategy.
 *
 * ```ts
 * const opts: ScheduleFetchOptions = { schedules: ["schedule", "retry"] };
 * ```
 */
export interface ScheduleFetchOptions {
    /**
     * Sorted sets watched for due entries. One is picked at random per call.
     *
     * Optional. Default: ["schedule"]
     */
    schedules?: readonly string[];

    /**
     * Sorted set that receives entries which cannot be parsed.
     *
     * Optional. Default: "dead"
     */
    deadSet?: string;

    /** Optional. Default: console logger tagged `[ScheduleFetch]` */
    logger?: Logger;

    /** Optional. Default: Math.random */
    random?: () => number;

    /** Current time in milliseconds. Optional. Default: Date.now */
    clock?: () => number;
}
