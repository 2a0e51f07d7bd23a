import { EventEmitter } from "node:events";
import { setTimeout } from "node:timers/promises";
import { RequeueWorkUseCase } from "../application/use-cases/requeue-work.use-case.js";
import { RetrieveWorkUseCase } from "../application/use-cases/retrieve-work.use-case.js";
import type { WorkerOptions } from "../application/dtos/worker-options.dto.js";
import type { UnitOfWork } from "../domain/entities/unit-of-work.entity.js";
import type { FetchStrategy } from "../domain/strategies/fetch.strategy.js";
import { createConsoleLogger, type Logger } from "../utils/logger.js";

export type Processor = (unit: UnitOfWork) => Promise<void>;

/**
 * Reference polling loop around a fetch strategy.
 *
 * Events: `start`, `fetched(unit)`, `completed(unit)`, `failed(unit, err)`,
 * `error(err)`, `stop(requeuedCount)`.
 */
export class Worker extends EventEmitter {
    private readonly retrieveWorkUseCase: RetrieveWorkUseCase;
    private readonly requeueWorkUseCase: RequeueWorkUseCase;
    private readonly logger: Logger;
    private readonly inProgress = new Set<UnitOfWork>();
    private readonly fetching = new Set<Promise<UnitOfWork | null>>();
    private loops: Promise<void>[] = [];
    private isRunning = false;

    constructor(
        strategy: FetchStrategy,
        private readonly processor: Processor,
        private readonly opts: WorkerOptions = {},
    ) {
        super();

        this.retrieveWorkUseCase = new RetrieveWorkUseCase(strategy);
        this.requeueWorkUseCase = new RequeueWorkUseCase(strategy);
        this.logger = opts.logger ?? createConsoleLogger("Worker");
    }

    get running(): boolean {
        return this.isRunning;
    }

    /** Units currently handed to the processor. */
    get inProgressCount(): number {
        return this.inProgress.size;
    }

    public start(): void {
        if (this.isRunning) {
            throw new Error("Worker is already running");
        }
        this.isRunning = true;
        this.emit("start");

        const concurrency = this.opts.concurrency ?? 1;
        for (let i = 0; i < concurrency; i++) {
            this.loops.push(this.processNext());
        }
    }

    /**
     * Stop polling, give in-flight units `gracefulShutdownTimeout` ms to finish,
     * wait for pending fetches to return (at most the fetch timeout), then push
     * whatever is left back onto its queue. Resolves with the number
     * of units requeued.
     */
    public async stop(): Promise<number> {
        if (!this.isRunning) return 0;
        this.isRunning = false;

        const shutdownTimeout = this.opts.gracefulShutdownTimeout ?? 30000;
        const grace = new AbortController();
        const timer = setTimeout(shutdownTimeout, "timed-out" as const, { signal: grace.signal }).catch(
            () => "aborted" as const,
        );
        const outcome = await Promise.race([Promise.all(this.loops).then(() => "drained" as const), timer]);
        grace.abort();
        this.loops = [];
        // a loop still blocked in its fetch hands its unit back before we take the snapshot
        await Promise.allSettled([...this.fetching]);

        if (outcome === "timed-out") {
            this.logger.warn(`Graceful shutdown timed out after ${shutdownTimeout}ms`);
        }

        const abandoned = [...this.inProgress];
        this.inProgress.clear();
        await this.requeueWorkUseCase.executeMany(abandoned);

        this.emit("stop", abandoned.length);
        return abandoned.length;
    }

    private emitError(error: unknown): void {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(err.message);
        // an 'error' event without listeners would throw out of the loop
        if (this.listenerCount("error") > 0) {
            this.emit("error", err);
        }
    }

    /** Fetch one unit; a unit that arrives after stop() is pushed straight back. */
    private async fetchNext(): Promise<UnitOfWork | null> {
        const unit = await this.retrieveWorkUseCase.execute();
        if (!unit || this.isRunning) return unit;

        try {
            await this.requeueWorkUseCase.execute(unit);
        } catch (error) {
            this.emitError(error);
        }
        return null;
    }

    private async processNext(): Promise<void> {
        const backoffMs = this.opts.backoffMs ?? 1000;

        while (this.isRunning) {
            let unit: UnitOfWork | null;
            const fetch = this.fetchNext();
            this.fetching.add(fetch);
            try {
                unit = await fetch;
            } catch (error) {
                this.emitError(error);
                await setTimeout(backoffMs);
                continue;
            } finally {
                this.fetching.delete(fetch);
            }
            if (!unit) continue;

            this.inProgress.add(unit);
            this.emit("fetched", unit);

            try {
                await this.processor(unit);
                // a unit no longer tracked was already requeued by stop()
                if (this.inProgress.delete(unit)) {
                    await unit.acknowledge();
                    this.emit("completed", unit);
                }
            } catch (error) {
                if (!this.inProgress.delete(unit)) continue;
                const err = error instanceof Error ? error : new Error(String(error));
                this.emit("failed", unit, err);
                try {
                    await this.requeueWorkUseCase.execute(unit);
                } catch (requeueError) {
                    this.emitError(requeueError);
                }
            }
        }
    }
}
