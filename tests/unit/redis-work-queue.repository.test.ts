import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import type { Redis } from "ioredis";
import { RedisConnectionPool } from "../../src/infrastructure/redis/redis-connection.pool";
import { RedisWorkQueueRepository } from "../../src/infrastructure/redis/redis-work-queue.repository";

type PipelineResult = Array<[Error | null, unknown]> | null;

describe("Unit: RedisWorkQueueRepository", () => {
    let repository: RedisWorkQueueRepository;
    let mockPipeline: {
        rpush: jest.Mock<(...args: unknown[]) => unknown>;
        exec: jest.Mock<() => Promise<PipelineResult>>;
    };
    let mockRedis: {
        brpop: jest.Mock<(...args: unknown[]) => Promise<[string, string] | null>>;
        lpush: jest.Mock<(...args: unknown[]) => Promise<number>>;
        rpush: jest.Mock<(...args: unknown[]) => Promise<number>>;
        zadd: jest.Mock<(...args: unknown[]) => Promise<number>>;
        eval: jest.Mock<(...args: unknown[]) => Promise<unknown>>;
        pipeline: jest.Mock<() => typeof mockPipeline>;
    };

    beforeEach(() => {
        mockPipeline = {
            rpush: jest.fn<(...args: unknown[]) => unknown>().mockReturnThis(),
            exec: jest.fn<() => Promise<PipelineResult>>().mockResolvedValue([]),
        };
        mockRedis = {
            brpop: jest.fn<(...args: unknown[]) => Promise<[string, string] | null>>().mockResolvedValue(null),
            lpush: jest.fn<(...args: unknown[]) => Promise<number>>().mockResolvedValue(1),
            rpush: jest.fn<(...args: unknown[]) => Promise<number>>().mockResolvedValue(1),
            zadd: jest.fn<(...args: unknown[]) => Promise<number>>().mockResolvedValue(1),
            eval: jest.fn<(...args: unknown[]) => Promise<unknown>>().mockResolvedValue(null),
            pipeline: jest.fn(() => mockPipeline),
        };

        const pool = new RedisConnectionPool(() => mockRedis as unknown as Redis, { size: 1 });
        repository = new RedisWorkQueueRepository(pool);
    });

    it("should BRPOP across every key with the timeout last", async () => {
        mockRedis.brpop.mockResolvedValue(["queue:high", "job1"]);

        const result = await repository.blockingPop(["queue:high", "queue:low"], 2);

        expect(mockRedis.brpop).toHaveBeenCalledWith("queue:high", "queue:low", 2);
        expect(result).toEqual(["queue:high", "job1"]);
    });

    it("should return null when BRPOP times out", async () => {
        await expect(repository.blockingPop(["queue:default"], 2)).resolves.toBeNull();
    });

    it("should LPUSH on enqueue and RPUSH on push", async () => {
        await repository.enqueue("queue:default", ["a", "b"]);
        await repository.push("queue:default", ["c"]);

        expect(mockRedis.lpush).toHaveBeenCalledWith("queue:default", "a", "b");
        expect(mockRedis.rpush).toHaveBeenCalledWith("queue:default", "c");
    });

    it("should skip pushes with nothing to send", async () => {
        await repository.push("queue:default", []);
        await repository.pushMany(new Map([["queue:default", []]]));

        expect(mockRedis.rpush).not.toHaveBeenCalled();
        expect(mockRedis.pipeline).not.toHaveBeenCalled();
    });

    it("should pipeline one RPUSH per group", async () => {
        mockPipeline.exec.mockResolvedValue([
            [null, 2],
            [null, 1],
        ]);

        await repository.pushMany(
            new Map([
                ["queue:default", ["j1", "j2"]],
                ["queue:mailers", ["j3"]],
            ]),
        );

        expect(mockRedis.pipeline).toHaveBeenCalledTimes(1);
        expect(mockPipeline.rpush.mock.calls).toEqual([
            ["queue:default", "j1", "j2"],
            ["queue:mailers", "j3"],
        ]);
        expect(mockPipeline.exec).toHaveBeenCalledTimes(1);
    });

    it("should raise the first error found in the pipeline reply", async () => {
        mockPipeline.exec.mockResolvedValue([
            [null, 1],
            [new Error("OOM command not allowed"), null],
        ]);

        await expect(repository.pushMany(new Map([["queue:default", ["j1"]]]))).rejects.toThrow(
            "OOM command not allowed",
        );
    });

    it("should raise when the pipeline is discarded", async () => {
        mockPipeline.exec.mockResolvedValue(null);

        await expect(repository.pushMany(new Map([["queue:default", ["j1"]]]))).rejects.toThrow(
            "RedisWorkQueueRepository: pipeline was discarded",
        );
    });

    it("should pop due entries with a single EVAL", async () => {
        mockRedis.eval.mockResolvedValue('{"queue":"default"}');

        const result = await repository.popDue("schedule", 1000.5);

        expect(result).toBe('{"queue":"default"}');
        expect(mockRedis.eval).toHaveBeenCalledTimes(1);
        expect(mockRedis.eval).toHaveBeenCalledWith(expect.stringContaining("ZRANGEBYSCORE"), 1, "schedule", "1000.5");
    });

    it("should map an empty script reply to null", async () => {
        await expect(repository.popDue("schedule", 1000)).resolves.toBeNull();
    });

    it("should ZADD scheduled entries", async () => {
        await repository.addScheduled("schedule", 1060, "payload");

        expect(mockRedis.zadd).toHaveBeenCalledWith("schedule", "1060", "payload");
    });

    it("should propagate connection errors", async () => {
        mockRedis.brpop.mockRejectedValue(new Error("Connection is closed."));

        await expect(repository.blockingPop(["queue:default"], 2)).rejects.toThrow("Connection is closed.");
    });
});
