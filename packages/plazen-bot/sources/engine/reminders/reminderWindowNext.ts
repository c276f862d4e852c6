import { addMinutes, startOfMinute } from "date-fns";

import type { DayRange } from "../../types.js";

export type ReminderWindowInput = {
    now: Date;
    leadMinutes: number;
    previousEnd: Date | null;
};

/**
 * Computes the next window of task start times to remind about.
 * The window ends one minute after now + lead; it starts where the previous one ended,
 * but never before the current minute, so tasks that already started are not reminded.
 * Returns null when there is nothing new to cover.
 */
export function reminderWindowNext(input: ReminderWindowInput): DayRange | null {
    const minute = startOfMinute(input.now);
    const target = addMinutes(minute, input.leadMinutes);
    const end = addMinutes(target, 1);
    const start =
        input.previousEnd === null
            ? target
            : new Date(Math.max(input.previousEnd.getTime(), minute.getTime()));
    if (start.getTime() >= end.getTime()) {
        return null;
    }
    return { start, end };
}
