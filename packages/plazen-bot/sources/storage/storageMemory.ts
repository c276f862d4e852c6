import type { AccountLink, ChatIdentity, DayRange, TaskRecord } from "../types.js";
import type { AccountLinkStore, Storage, TaskStore } from "./storageTypes.js";

/**
 * In-process Storage used by tests. Range reads return matches in insertion order.
 */
export class StorageMemory implements Storage {
    readonly links: AccountLink[];
    readonly records: TaskRecord[];
    readonly calls: string[] = [];
    failure: Error | null = null;
    readonly accountLinks: AccountLinkStore;
    readonly tasks: TaskStore;

    constructor(seed: { links?: AccountLink[]; tasks?: TaskRecord[] } = {}) {
        this.links = [...(seed.links ?? [])];
        this.records = [...(seed.tasks ?? [])];
        this.accountLinks = {
            findByChatId: async (chatId: ChatIdentity) => {
                this.record(`accountLinks.findByChatId:${chatId}`);
                return this.links.filter((link) => link.chatId === chatId);
            },
            findReminderTargets: async () => {
                this.record("accountLinks.findReminderTargets");
                return this.links.filter((link) => link.notifications);
            }
        };
        this.tasks = {
            findInRange: async (accountId: string, range: DayRange) => {
                this.record(`tasks.findInRange:${accountId}`);
                return this.recordsInRange(accountId, range);
            },
            findPendingInRange: async (accountId: string, range: DayRange) => {
                this.record(`tasks.findPendingInRange:${accountId}`);
                return this.recordsInRange(accountId, range).filter((task) => !task.isCompleted);
            }
        };
    }

    private record(call: string): void {
        this.calls.push(call);
        if (this.failure) {
            throw this.failure;
        }
    }

    private recordsInRange(accountId: string, range: DayRange): TaskRecord[] {
        const start = range.start.getTime();
        const end = range.end.getTime();
        return this.records.filter((task) => {
            const time = task.scheduledAt.getTime();
            return task.accountId === accountId && time >= start && time < end;
        });
    }
}

export function taskRecordBuild(overrides: Partial<TaskRecord> & Pick<TaskRecord, "scheduledAt">): TaskRecord {
    return {
        id: null,
        accountId: "user-1",
        title: "Task",
        isCompleted: false,
        durationMinutes: null,
        ...overrides
    };
}
