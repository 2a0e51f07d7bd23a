import type { IWorkQueueRepository, PoppedWork } from "../../src/domain/repositories/work-queue.repository";

/**
 * In-process stand-in for Redis lists and sorted sets. Every operation runs
 * synchronously inside a single microtask, so each one is atomic with respect
 * to concurrent callers, as the Redis commands and the Lua script are.
 */
export class InMemoryWorkQueueRepository implements IWorkQueueRepository {
    readonly lists = new Map<string, string[]>();
    readonly sets = new Map<string, Array<{ score: number; member: string }>>();
    readonly calls: string[] = [];

    async blockingPop(keys: readonly string[], _timeout: number): Promise<PoppedWork | null> {
        this.calls.push(`blockingPop:${keys.join(",")}`);
        for (const key of keys) {
            const list = this.lists.get(key);
            const payload = list?.pop();
            if (payload !== undefined) return [key, payload];
        }
        return null;
    }

    async enqueue(key: string, payloads: readonly string[]): Promise<void> {
        this.calls.push(`enqueue:${key}`);
        const list = this.lists.get(key) ?? [];
        list.unshift(...[...payloads].reverse());
        this.lists.set(key, list);
    }

    async push(key: string, payloads: readonly string[]): Promise<void> {
        this.calls.push(`push:${key}`);
        this.append(key, payloads);
    }

    async pushMany(groups: ReadonlyMap<string, readonly string[]>): Promise<void> {
        this.calls.push(`pushMany:${[...groups.keys()].join(",")}`);
        for (const [key, payloads] of groups) this.append(key, payloads);
    }

    async popDue(set: string, maxScore: number): Promise<string | null> {
        this.calls.push(`popDue:${set}`);
        const entries = this.sets.get(set) ?? [];
        let lowest = -1;
        entries.forEach((entry, index) => {
            if (entry.score <= maxScore && (lowest === -1 || entry.score < entries[lowest].score)) {
                lowest = index;
            }
        });
        if (lowest === -1) return null;
        const [entry] = entries.splice(lowest, 1);
        return entry.member;
    }

    async addScheduled(set: string, score: number, payload: string): Promise<void> {
        this.calls.push(`addScheduled:${set}`);
        const entries = this.sets.get(set) ?? [];
        const existing = entries.find((entry) => entry.member === payload);
        if (existing) {
            existing.score = score;
        } else {
            entries.push({ score, member: payload });
        }
        this.sets.set(set, entries);
    }

    list(key: string): string[] {
        return this.lists.get(key) ?? [];
    }

    members(set: string): Array<{ score: number; member: string }> {
        return this.sets.get(set) ?? [];
    }

    private append(key: string, payloads: readonly string[]): void {
        const list = this.lists.get(key) ?? [];
        list.push(...payloads);
        this.lists.set(key, list);
    }
}
