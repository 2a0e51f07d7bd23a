import { z } from "zod";
import { MalformedMessageError } from "../errors/malformed-message.error.js";

/** Fields the scheduler reads from a parked job; everything else rides along untouched. */
export const scheduledMessageSchema = z
    .object({
        /** Bare name of the queue the job runs on. */
        queue: z.string().min(1),
        /** Repeat interval in seconds. Present only on recurring entries. */
        expiration: z.number().positive().optional(),
    })
    .passthrough();

export type ScheduledMessage = z.infer<typeof scheduledMessageSchema>;

export function parseScheduledMessage(raw: string): ScheduledMessage {
    let decoded: unknown;
    try {
        decoded = JSON.parse(raw);
    } catch (error) {
        throw new MalformedMessageError(raw, error instanceof Error ? error.message : String(error));
    }

    const result = scheduledMessageSchema.safeParse(decoded);
    if (!result.success) {
        const issue = result.error.issues[0];
        const reason = issue ? `${issue.path.join(".") || "message"}: ${issue.message}` : "invalid shape";
        throw new MalformedMessageError(raw, reason);
    }
    return result.data;
}
