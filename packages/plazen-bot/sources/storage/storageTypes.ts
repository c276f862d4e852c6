import type { AccountLink, ChatIdentity, DayRange, TaskRecord } from "../types.js";

export interface AccountLinkStore {
    findByChatId(chatId: ChatIdentity): Promise<AccountLink[]>;
    findReminderTargets(): Promise<AccountLink[]>;
}

export interface TaskStore {
    /**
     * Tasks of one account scheduled inside range, earliest first.
     */
    findInRange(accountId: string, range: DayRange): Promise<TaskRecord[]>;
    findPendingInRange(accountId: string, range: DayRange): Promise<TaskRecord[]>;
}

export type Storage = {
    accountLinks: AccountLinkStore;
    tasks: TaskStore;
};
