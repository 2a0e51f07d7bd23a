import { z } from "zod";
import type { FetcherOptions } from "../application/strategies/fetcher.js";

const flag = z
    .string()
    .optional()
    .transform((value) => {
        if (value === undefined) return false;
        const normalized = value.trim().toLowerCase();
        return normalized !== "" && normalized !== "0" && normalized !== "false";
    });

const environmentSchema = z.object({
    SCHEDULE: flag,
    HOPPER_STRICT: flag,
    HOPPER_QUEUES: z
        .string()
        .optional()
        .transform((value) =>
            (value ?? "default")
                .split(",")
                .map((name) => name.trim())
                .filter((name) => name.length > 0),
        )
        .pipe(z.array(z.string()).min(1, "HOPPER_QUEUES must name at least one queue")),
});

export type FetchEnvironment = Pick<FetcherOptions, "queues" | "strict" | "schedule">;

/**
 * Fetch settings from the environment:
 * - `SCHEDULE`: any value but "", "0" or "false" switches to scheduled fetching
 * - `HOPPER_QUEUES`: comma-separated queue names, default "default"
 * - `HOPPER_STRICT`: same truthiness as `SCHEDULE`
 */
export function readFetchEnvironment(env: NodeJS.ProcessEnv = process.env): FetchEnvironment {
    const parsed = environmentSchema.parse(env);
    return {
        queues: parsed.HOPPER_QUEUES,
        strict: parsed.HOPPER_STRICT,
        schedule: parsed.SCHEDULE,
    };
}
