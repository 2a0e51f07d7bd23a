import type { Redis } from "ioredis";

export class ConnectionPoolClosedError extends Error {
    constructor() {
        super("RedisConnectionPool: pool has been drained");
        this.name = "ConnectionPoolClosedError";
    }
}

export interface RedisConnectionPoolOptions {
    /** Maximum number of live connections. Default: 5 */
    size?: number;
}

/**
 * Bounded pool of Redis connections, created lazily through `factory`.
 * Callers borrow a connection for the span of one operation via `use`; a
 * blocking command therefore never holds up other callers' connections.
 */
export class RedisConnectionPool {
    private readonly size: number;
    private readonly idle: Redis[] = [];
    private readonly all: Redis[] = [];
    private waiters: Array<{ resolve: (conn: Redis) => void; reject: (err: Error) => void }> = [];
    private closed = false;

    constructor(
        private readonly factory: () => Redis,
        options: RedisConnectionPoolOptions = {},
    ) {
        this.size = options.size ?? 5;
        if (!Number.isInteger(this.size) || this.size < 1) {
            throw new Error(`RedisConnectionPool: size must be a positive integer, got ${this.size}`);
        }
    }

    /** Connections created so far. */
    get created(): number {
        return this.all.length;
    }

    public async acquire(): Promise<Redis> {
        if (this.closed) throw new ConnectionPoolClosedError();

        const conn = this.idle.pop();
        if (conn) return conn;

        if (this.all.length < this.size) {
            const created = this.factory();
            this.all.push(created);
            return created;
        }

        return new Promise((resolve, reject) => {
            this.waiters.push({ resolve, reject });
        });
    }

    public release(conn: Redis): void {
        if (this.closed) return;
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve(conn);
        } else {
            this.idle.push(conn);
        }
    }

    public async use<R>(fn: (conn: Redis) => Promise<R>): Promise<R> {
        const conn = await this.acquire();
        try {
            return await fn(conn);
        } finally {
            this.release(conn);
        }
    }

    /** Reject pending acquisitions and quit every connection the pool created. */
    public async drain(): Promise<void> {
        this.closed = true;
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) waiter.reject(new ConnectionPoolClosedError());

        const conns = this.all.splice(0);
        this.idle.length = 0;
        await Promise.all(conns.map((conn) => conn.quit()));
    }
}
