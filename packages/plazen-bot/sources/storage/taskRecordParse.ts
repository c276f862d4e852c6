import { z } from "zod";

import { getLogger } from "../log.js";
import type { TaskRecord } from "../types.js";

const logger = getLogger("storage.tasks");

export type TaskRecordParseResult = { ok: true; record: TaskRecord } | { ok: false; reason: string };

const identifier = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

const taskRowSchema = z
    .object({
        id: identifier.nullish(),
        user_id: identifier,
        scheduled_time: z.string().min(1),
        title: z.string(),
        is_completed: z.boolean().nullish(),
        duration_minutes: z.unknown()
    })
    .passthrough();

const OFFSET_SUFFIX = /(?:z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Validates a `tasks` row into a TaskRecord.
 * Timestamps without an offset are read as UTC. Rows missing a title or a usable scheduled time are rejected;
 * a duration that is not a non-negative integer is dropped and the task kept.
 */
export function taskRecordParse(row: unknown): TaskRecordParseResult {
    const parsed = taskRowSchema.safeParse(row);
    if (!parsed.success) {
        const reason = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`)
            .join("; ");
        return { ok: false, reason };
    }

    const scheduledAt = timestampParse(parsed.data.scheduled_time);
    if (!scheduledAt) {
        return { ok: false, reason: `scheduled_time: Unparseable timestamp "${parsed.data.scheduled_time}"` };
    }

    return {
        ok: true,
        record: {
            id: parsed.data.id ?? null,
            accountId: parsed.data.user_id,
            scheduledAt,
            title: parsed.data.title,
            isCompleted: parsed.data.is_completed ?? false,
            durationMinutes: durationParse(parsed.data.duration_minutes, parsed.data.id ?? null)
        }
    };
}

function durationParse(value: unknown, taskId: string | null): number | null {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
        return value;
    }
    logger.warn({ taskId, durationMinutes: value }, "skip: Ignoring invalid task duration");
    return null;
}

function timestampParse(value: string): Date | null {
    const trimmed = value.trim();
    const normalized = OFFSET_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`;
    const date = new Date(normalized);
    return Number.isNaN(date.getTime()) ? null : date;
}
