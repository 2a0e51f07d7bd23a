export * from "./hopper.js";
export * from "./queue.js";
export * from "./worker.js";

export { Fetcher } from "../application/strategies/fetcher.js";
export type { FetcherOptions, FetcherSelection, FetchStrategyClass, StrategyOptions } from "../application/strategies/fetcher.js";
export { BasicFetch, FETCH_TIMEOUT } from "../application/strategies/basic-fetch.strategy.js";
export { ScheduleFetch, DEFAULT_SCHEDULE, DEFAULT_DEAD_SET } from "../application/strategies/schedule-fetch.strategy.js";
export { readFetchEnvironment } from "../config/environment.js";
export { UnitOfWork } from "../domain/entities/unit-of-work.entity.js";
export { MalformedMessageError } from "../domain/errors/malformed-message.error.js";
export { QUEUE_PREFIX, queueName, toQueueKey } from "../domain/values/queue-key.js";
export { ConnectionPoolClosedError } from "../infrastructure/redis/redis-connection.pool.js";

export type { FetchStrategy } from "../domain/strategies/fetch.strategy.js";
export type { IWorkQueueRepository, PoppedWork } from "../domain/repositories/work-queue.repository.js";
export type { ScheduledMessage } from "../domain/entities/scheduled-message.entity.js";
export type { FetchOptions, ScheduleFetchOptions } from "../application/dtos/fetch-options.dto.js";
export type { WorkerOptions } from "../application/dtos/worker-options.dto.js";
export type { Logger } from "../utils/logger.js";
