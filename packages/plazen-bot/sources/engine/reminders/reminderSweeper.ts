import { getLogger } from "../../log.js";
import type { Storage } from "../../storage/storageTypes.js";
import type { AccountLink, ChatIdentity, DayRange } from "../../types.js";
import type { ConnectorMessage } from "../connectors/types.js";
import { reminderFormat } from "./reminderFormat.js";
import { reminderWindowNext } from "./reminderWindowNext.js";

const logger = getLogger("reminders.sweeper");

export type ReminderSweeperOptions = {
    storage: Storage;
    leadMinutes: number;
    intervalMs: number;
    send: (chatId: ChatIdentity, message: ConnectorMessage) => Promise<void>;
    now?: () => Date;
};

export type ReminderSweepResult = {
    window: DayRange | null;
    sent: number;
    failedAccounts: number;
};

/**
 * Periodically reminds linked accounts about pending tasks that start soon.
 * Sweeps never overlap: the next one is scheduled after the previous one settles.
 */
export class ReminderSweeper {
    private storage: Storage;
    private leadMinutes: number;
    private intervalMs: number;
    private send: ReminderSweeperOptions["send"];
    private now: () => Date;
    private windowEnd: Date | null = null;
    private timer: NodeJS.Timeout | null = null;
    private started = false;
    private stopped = false;

    constructor(options: ReminderSweeperOptions) {
        this.storage = options.storage;
        this.leadMinutes = options.leadMinutes;
        this.intervalMs = options.intervalMs;
        this.send = options.send;
        this.now = options.now ?? (() => new Date());
    }

    start(): void {
        if (this.started || this.stopped) {
            return;
        }
        this.started = true;
        logger.info(`start: Reminder sweeper started leadMinutes=${this.leadMinutes} intervalMs=${this.intervalMs}`);
        this.scheduleNext(0);
    }

    stop(): void {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        logger.debug("stop: Reminder sweeper stopped");
    }

    async sweep(): Promise<ReminderSweepResult> {
        const now = this.now();
        const window = reminderWindowNext({ now, leadMinutes: this.leadMinutes, previousEnd: this.windowEnd });
        if (!window) {
            return { window: null, sent: 0, failedAccounts: 0 };
        }

        let targets: AccountLink[];
        try {
            targets = await this.storage.accountLinks.findReminderTargets();
        } catch (error) {
            // Window stays open so the next sweep covers it.
            logger.warn({ error }, "error: Reminder target lookup failed");
            return { window: null, sent: 0, failedAccounts: 0 };
        }

        let sent = 0;
        let failedAccounts = 0;
        for (const target of targets) {
            const chatId = target.chatId;
            if (!chatId) {
                logger.debug(`skip: No chat id for account accountId=${target.accountId}`);
                continue;
            }
            try {
                const tasks = await this.storage.tasks.findPendingInRange(target.accountId, window);
                for (const task of tasks) {
                    await this.send(chatId, reminderFormat(task, now));
                    sent += 1;
                }
            } catch (error) {
                failedAccounts += 1;
                logger.warn({ accountId: target.accountId, error }, "error: Reminder delivery failed");
            }
        }

        this.windowEnd = window.end;
        if (sent > 0) {
            logger.info(`event: Reminders sent count=${sent}`);
        }
        return { window, sent, failedAccounts };
    }

    private runTick(): void {
        void this.sweep()
            .catch((error: unknown) => {
                logger.error({ error }, "error: Reminder sweep failed");
            })
            .finally(() => {
                this.scheduleNext(this.intervalMs);
            });
    }

    private scheduleNext(delayMs: number): void {
        if (this.stopped) {
            return;
        }
        this.timer = setTimeout(() => {
            this.timer = null;
            this.runTick();
        }, delayMs);
    }
}
