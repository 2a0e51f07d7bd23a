import * as fs from "node:fs";
import * as path from "node:path";
import type { IWorkQueueRepository, PoppedWork } from "../../domain/repositories/work-queue.repository.js";
import type { RedisConnectionPool } from "./redis-connection.pool.js";

export class RedisWorkQueueRepository implements IWorkQueueRepository {
    private readonly zpopByScoreScript: string;

    constructor(private readonly pool: RedisConnectionPool) {
        this.zpopByScoreScript = fs.readFileSync(path.join(__dirname, "lua", "zpop_by_score.lua"), "utf8");
    }

    async blockingPop(keys: readonly string[], timeout: number): Promise<PoppedWork | null> {
        return this.pool.use((conn) => conn.brpop(...keys, timeout));
    }

    async enqueue(key: string, payloads: readonly string[]): Promise<void> {
        if (payloads.length === 0) return;
        await this.pool.use((conn) => conn.lpush(key, ...payloads));
    }

    async push(key: string, payloads: readonly string[]): Promise<void> {
        if (payloads.length === 0) return;
        await this.pool.use((conn) => conn.rpush(key, ...payloads));
    }

    async pushMany(groups: ReadonlyMap<string, readonly string[]>): Promise<void> {
        const entries = [...groups].filter(([, payloads]) => payloads.length > 0);
        if (entries.length === 0) return;

        const results = await this.pool.use((conn) => {
            const pipeline = conn.pipeline();
            for (const [key, payloads] of entries) {
                pipeline.rpush(key, ...payloads);
            }
            return pipeline.exec();
        });

        if (!results) {
            throw new Error("RedisWorkQueueRepository: pipeline was discarded");
        }
        for (const [err] of results) {
            if (err) throw err;
        }
    }

    /** Lowest-scored due member, found and removed in one EVAL so no two callers get it. */
    async popDue(set: string, maxScore: number): Promise<string | null> {
        const result = await this.pool.use((conn) =>
            conn.eval(this.zpopByScoreScript, 1, set, String(maxScore)),
        );
        return typeof result === "string" ? result : null;
    }

    async addScheduled(set: string, score: number, payload: string): Promise<void> {
        await this.pool.use((conn) => conn.zadd(set, String(score), payload));
    }
}
