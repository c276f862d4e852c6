import type { SupabaseClient } from "@supabase/supabase-js";

import { getLogger } from "../log.js";
import type { AccountLink, ChatIdentity } from "../types.js";
import { accountLinkParse } from "./accountLinkParse.js";
import { storageRun } from "./storageFailure.js";
import type { AccountLinkStore } from "./storageTypes.js";

const logger = getLogger("storage.accounts");

const TABLE = "UserSettings";
const COLUMNS = "user_id, telegram_id, notifications";

/**
 * Reads chat links from the `UserSettings` table. Never writes.
 */
export class AccountLinksRepository implements AccountLinkStore {
    private readonly client: SupabaseClient;

    constructor(client: SupabaseClient) {
        this.client = client;
    }

    async findByChatId(chatId: ChatIdentity): Promise<AccountLink[]> {
        logger.debug(`read: Looking up account link chatId=${chatId}`);
        const rows = await storageRun(
            "Account link lookup",
            this.client.from(TABLE).select(COLUMNS).eq("telegram_id", chatId)
        );
        return linksParse(rows);
    }

    async findReminderTargets(): Promise<AccountLink[]> {
        const rows = await storageRun(
            "Reminder target lookup",
            this.client.from(TABLE).select(COLUMNS).eq("notifications", true)
        );
        return linksParse(rows);
    }
}

function linksParse(rows: unknown[] | null): AccountLink[] {
    const links: AccountLink[] = [];
    for (const row of rows ?? []) {
        const parsed = accountLinkParse(row);
        if (!parsed.ok) {
            logger.warn({ reason: parsed.reason }, "skip: Skipping malformed account link row");
            continue;
        }
        links.push(parsed.link);
    }
    return links;
}
