import { addHours } from "date-fns";

import type { DayRange } from "../../types.js";

/**
 * Returns the UTC calendar day containing reference as [00:00Z, next 00:00Z).
 */
export function scheduleDayRange(reference: Date): DayRange {
    const start = new Date(
        Date.UTC(reference.getUTCFullYear(), reference.getUTCMonth(), reference.getUTCDate())
    );
    return { start, end: addHours(start, 24) };
}
