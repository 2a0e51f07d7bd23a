import { Hopper, readFetchEnvironment, type UnitOfWork } from "../src/presentation/index.js";

interface EmailJob {
    to: string;
    subject: string;
}

async function main(): Promise<void> {
    // 1. One client plus a pool big enough for every polling loop
    const hopper = new Hopper({
        connection: { host: "localhost", port: 6379 },
        pool: { size: 4 },
    });

    // 2. Producer side: plain jobs and a recurring one
    const mailers = hopper.createQueue("mailers");
    await mailers.enqueue(JSON.stringify({ to: "user@example.com", subject: "Welcome" } satisfies EmailJob));
    await mailers.schedule({ to: "ops@example.com", subject: "Daily digest" }, new Date(), { expiration: 86400 });

    // 3. Consumer side: SCHEDULE=1 switches the worker to the schedule set
    const env = readFetchEnvironment();
    const worker = hopper.createWorker(
        { ...env, queues: ["mailers", "mailers", "default"] },
        async (unit: UnitOfWork) => {
            const job: EmailJob = JSON.parse(unit.payload);
            console.log(`sending "${job.subject}" to ${job.to} from ${unit.queueName}`);
        },
        { concurrency: 3, gracefulShutdownTimeout: 5000 },
    );

    worker.on("completed", (unit: UnitOfWork) => console.log(`done: ${unit.queueName}`));
    worker.on("failed", (unit: UnitOfWork, err: Error) => console.error(`failed on ${unit.queueName}: ${err.message}`));

    worker.start();

    process.once("SIGTERM", () => {
        worker
            .stop()
            .then((requeued) => {
                console.log(`stopped, ${requeued} job(s) pushed back`);
                return hopper.close();
            })
            .catch((error: unknown) => {
                console.error(error);
                process.exitCode = 1;
            });
    });
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
