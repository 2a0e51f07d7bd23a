import type { IWorkQueueRepository } from "../../domain/repositories/work-queue.repository.js";
import type { FetchStrategy } from "../../domain/strategies/fetch.strategy.js";
import type { FetchOptions, ScheduleFetchOptions } from "../dtos/fetch-options.dto.js";
import { BasicFetch } from "./basic-fetch.strategy.js";
import { ScheduleFetch } from "./schedule-fetch.strategy.js";

/** Everything either strategy may read at construction time. */
export type StrategyOptions = FetchOptions & ScheduleFetchOptions;

export type FetchStrategyClass = new (
    repository: IWorkQueueRepository,
    options: StrategyOptions,
) => FetchStrategy;

export interface FetcherSelection {
    /** Fetch from the schedule sorted sets instead of the work queues. */
    schedule?: boolean;
    /** Strategy used when `schedule` is off. Default: BasicFetch */
    strategy?: FetchStrategyClass;
}

export type FetcherOptions = StrategyOptions & FetcherSelection;

export const Fetcher = {
    /** Schedule mode wins over an explicit strategy; BasicFetch is the fallback. */
    strategy(selection: FetcherSelection = {}): FetchStrategyClass {
        if (selection.schedule) return ScheduleFetch;
        return selection.strategy ?? BasicFetch;
    },

    create(repository: IWorkQueueRepository, options: FetcherOptions): FetchStrategy {
        const { schedule, strategy, ...strategyOptions } = options;
        const StrategyClass = Fetcher.strategy({ schedule, strategy });
        return new StrategyClass(repository, strategyOptions);
    },
};
