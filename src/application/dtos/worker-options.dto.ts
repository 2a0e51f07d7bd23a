import type { Logger } from "../../utils/logger.js";

/**
 * Configuration options for the polling worker.
 * All fields are optional.
 */
export interface WorkerOptions {
    /**
     * Number of independent polling loops, each processing one unit at a time.
     *
     * Optional. Default: 1
     *
     * Example: 5
     */
    concurrency?: number;

    /**
     * Time in milliseconds to wait for in-flight units to finish during shutdown.
     * Whatever is still running afterwards is pushed back onto its queue.
     *
     * Optional. Default: 30000 (30 seconds)
     *
     * Examples:
     * - 0 (requeue everything immediately)
     * - 30000 (default)
     *
     * Usage:
     * ```ts
     * const opts: WorkerOptions = { gracefulShutdownTimeout: 8000 };
     * ```
     */
    gracefulShutdownTimeout?: number;

    /**
     * Pause in milliseconds after a failed fetch before polling again.
     *
     * Optional. Default: 1000
     */
    backoffMs?: number;

    /** Optional. Default: console logger tagged `[Worker]` */
    logger?: Logger;
}
