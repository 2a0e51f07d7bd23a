import { describe, it, expect, beforeEach, jest } from "@jest/globals";

jest.mock("ioredis", () => {
    const { EventEmitter } = jest.requireActual<typeof import("node:events")>("node:events");
    return { Redis: jest.fn().mockImplementation(() => new EventEmitter()) };
});

import { Redis } from "ioredis";
import { REDIS_DEFAULTS, createRedisClient } from "../../src/infrastructure/redis/redis-client";
import { createTestLogger } from "../support/test-logger";

describe("Unit: createRedisClient", () => {
    const RedisMock = jest.mocked(Redis);

    beforeEach(() => {
        RedisMock.mockClear();
    });

    it("should apply the long-running defaults under explicit options", () => {
        createRedisClient({ host: "redis.test", connectTimeout: 500 }, createTestLogger());

        expect(RedisMock).toHaveBeenCalledWith(
            expect.objectContaining({
                host: "redis.test",
                connectTimeout: 500,
                maxRetriesPerRequest: null,
                enableOfflineQueue: true,
            }),
        );
    });

    it("should back off linearly up to two seconds between reconnects", () => {
        expect(REDIS_DEFAULTS.retryStrategy?.(3)).toBe(300);
        expect(REDIS_DEFAULTS.retryStrategy?.(50)).toBe(2000);
    });

    it("should route connection events to the logger", () => {
        const logger = createTestLogger();
        const client = createRedisClient({}, logger);

        client.emit("connect");
        client.emit("error", new Error("ECONNREFUSED 127.0.0.1:6379"));
        client.emit("end");

        expect(logger.info).toHaveBeenCalledWith("connected to Redis");
        expect(logger.error).toHaveBeenCalledWith("connection error: ECONNREFUSED 127.0.0.1:6379");
        expect(logger.warn).toHaveBeenCalledWith("connection ended");
    });
});
