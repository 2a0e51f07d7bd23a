import { Redis, type RedisOptions } from "ioredis";
import { createConsoleLogger, type Logger } from "../../utils/logger.js";

/** Defaults for connections that sit in BRPOP for the life of the process. */
export const REDIS_DEFAULTS: Readonly<Partial<RedisOptions>> = Object.freeze({
    maxRetriesPerRequest: null,
    retryStrategy: (times: number) => Math.min(100 * times, 2000),
    enableOfflineQueue: true,
    connectTimeout: 10000,
});

/**
 * Create an ioredis client with the long-running defaults applied and its
 * connection lifecycle routed to `logger`. Explicit options win over defaults.
 */
export function createRedisClient(
    options: RedisOptions = {},
    logger: Logger = createConsoleLogger("RedisClient"),
): Redis {
    const client = new Redis({ ...REDIS_DEFAULTS, ...options });
    watchConnection(client, logger);
    return client;
}

export function watchConnection(client: Redis, logger: Logger): void {
    client.on("error", (err: Error) => {
        logger.error(`connection error: ${err.message}`);
    });
    client.on("end", () => {
        logger.warn("connection ended");
    });
    client.on("connect", () => {
        logger.info("connected to Redis");
    });
}
