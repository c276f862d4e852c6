import type { TaskStore } from "../../storage/storageTypes.js";
import type { TaskRecord } from "../../types.js";
import { scheduleDayRange } from "./scheduleDayRange.js";

/**
 * Reads the account's tasks for the UTC day of reference, earliest first.
 * Expects: reference comes from the caller; the store may return rows in any order.
 */
export async function scheduleFetch(tasks: TaskStore, accountId: string, reference: Date): Promise<TaskRecord[]> {
    const range = scheduleDayRange(reference);
    const start = range.start.getTime();
    const end = range.end.getTime();
    const records = await tasks.findInRange(accountId, range);
    return records
        .filter((record) => {
            const time = record.scheduledAt.getTime();
            return time >= start && time < end;
        })
        .sort((left, right) => left.scheduledAt.getTime() - right.scheduledAt.getTime());
}
