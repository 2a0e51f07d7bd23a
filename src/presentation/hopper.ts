import type { Redis, RedisOptions } from "ioredis";
import { Fetcher, type FetcherOptions } from "../application/strategies/fetcher.js";
import type { WorkerOptions } from "../application/dtos/worker-options.dto.js";
import type { FetchStrategy } from "../domain/strategies/fetch.strategy.js";
import { createRedisClient, watchConnection } from "../infrastructure/redis/redis-client.js";
import { RedisConnectionPool, type RedisConnectionPoolOptions } from "../infrastructure/redis/redis-connection.pool.js";
import { RedisWorkQueueRepository } from "../infrastructure/redis/redis-work-queue.repository.js";
import { createConsoleLogger, type Logger } from "../utils/logger.js";
import { Queue } from "./queue.js";
import { Worker, type Processor } from "./worker.js";

export interface HopperOptions {
    connection?: RedisOptions;
    pool?: RedisConnectionPoolOptions;
    /** Default: console logger tagged `[Hopper]` */
    logger?: Logger;
}

export class Hopper {
    public readonly connection: Redis;
    public readonly repository: RedisWorkQueueRepository;
    private readonly pool: RedisConnectionPool;
    private readonly logger: Logger;

    constructor(options: HopperOptions = {}) {
        this.logger = options.logger ?? createConsoleLogger("Hopper");
        this.connection = createRedisClient(options.connection, this.logger);
        this.pool = new RedisConnectionPool(() => {
            const conn = this.connection.duplicate();
            watchConnection(conn, this.logger);
            return conn;
        }, options.pool);
        this.repository = new RedisWorkQueueRepository(this.pool);
    }

    public createQueue(name: string): Queue {
        return new Queue(name, this.repository);
    }

    public createFetcher(options: FetcherOptions): FetchStrategy {
        return Fetcher.create(this.repository, { logger: this.logger, ...options });
    }

    /**
     * Workers run one BRPOP per loop, so `pool.size` should be at least
     * `concurrency` plus one connection for requeues.
     */
    public createWorker(fetch: FetcherOptions, processor: Processor, opts?: WorkerOptions): Worker {
        return new Worker(this.createFetcher(fetch), processor, { logger: this.logger, ...opts });
    }

    public async close(): Promise<void> {
        await this.pool.drain();
        await this.connection.quit();
    }
}
