import type { SupabaseClient } from "@supabase/supabase-js";

import { getLogger } from "../log.js";
import type { DayRange, TaskRecord } from "../types.js";
import { storageRun } from "./storageFailure.js";
import type { TaskStore } from "./storageTypes.js";
import { taskRecordParse } from "./taskRecordParse.js";

const logger = getLogger("storage.tasks");

const TABLE = "tasks";

/**
 * Range reads over the `tasks` table. Rows that fail validation are logged and dropped.
 */
export class TasksRepository implements TaskStore {
    private readonly client: SupabaseClient;

    constructor(client: SupabaseClient) {
        this.client = client;
    }

    async findInRange(accountId: string, range: DayRange): Promise<TaskRecord[]> {
        return this.query(accountId, range, false);
    }

    async findPendingInRange(accountId: string, range: DayRange): Promise<TaskRecord[]> {
        return this.query(accountId, range, true);
    }

    private async query(accountId: string, range: DayRange, pendingOnly: boolean): Promise<TaskRecord[]> {
        const start = range.start.toISOString();
        const end = range.end.toISOString();
        logger.debug(`read: Fetching tasks accountId=${accountId} start=${start} end=${end} pendingOnly=${pendingOnly}`);

        let query = this.client
            .from(TABLE)
            .select("*")
            .eq("user_id", accountId)
            .gte("scheduled_time", start)
            .lt("scheduled_time", end);
        if (pendingOnly) {
            query = query.eq("is_completed", false);
        }

        const rows = await storageRun("Task range query", query.order("scheduled_time", { ascending: true }));

        const records: TaskRecord[] = [];
        for (const row of rows ?? []) {
            const parsed = taskRecordParse(row);
            if (!parsed.ok) {
                logger.warn({ accountId, reason: parsed.reason }, "skip: Skipping malformed task row");
                continue;
            }
            records.push(parsed.record);
        }
        return records;
    }
}
