import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { RelayError } from "../relayError.js";
import { StorageMemory, taskRecordBuild } from "../../storage/storageMemory.js";
import type { ChatIdentity } from "../../types.js";
import type { ConnectorMessage } from "../connectors/types.js";
import { ReminderSweeper } from "./reminderSweeper.js";

type Sent = { chatId: ChatIdentity; message: ConnectorMessage };

function sweeperBuild(storage: StorageMemory, sent: Sent[]) {
    return new ReminderSweeper({
        storage,
        leadMinutes: 30,
        intervalMs: 60_000,
        send: async (chatId, message) => {
            sent.push({ chatId, message });
        }
    });
}

describe("ReminderSweeper", () => {
    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date("2024-03-10T12:00:20.000Z"));
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it("reminds linked accounts about pending tasks in the window", async () => {
        const storage = new StorageMemory({
            links: [
                { accountId: "user-1", chatId: "4242", notifications: true },
                { accountId: "user-2", chatId: "777", notifications: false },
                { accountId: "user-3", chatId: null, notifications: true }
            ],
            tasks: [
                taskRecordBuild({ scheduledAt: new Date("2024-03-10T12:30:00.000Z"), title: "Gym" }),
                taskRecordBuild({ scheduledAt: new Date("2024-03-10T12:30:30.000Z"), title: "Done", isCompleted: true }),
                taskRecordBuild({ scheduledAt: new Date("2024-03-10T12:31:00.000Z"), title: "Later" }),
                taskRecordBuild({ scheduledAt: new Date("2024-03-10T12:30:00.000Z"), accountId: "user-2" })
            ]
        });
        const sent: Sent[] = [];

        const result = await sweeperBuild(storage, sent).sweep();

        expect(result).toEqual({
            window: { start: new Date("2024-03-10T12:30:00.000Z"), end: new Date("2024-03-10T12:31:00.000Z") },
            sent: 1,
            failedAccounts: 0
        });
        expect(sent).toEqual([
            {
                chatId: "4242",
                message: {
                    text: "🔔 <b>Reminder!</b>\n\nYour task is starting in 30 minutes (at 12:30):\n<b>Gym</b>",
                    parseMode: "HTML"
                }
            }
        ]);
        expect(storage.calls).toEqual(["accountLinks.findReminderTargets", "tasks.findPendingInRange:user-1"]);
    });

    it("chains windows so a task is reminded once", async () => {
        const storage = new StorageMemory({
            links: [{ accountId: "user-1", chatId: "4242", notifications: true }],
            tasks: [
                taskRecordBuild({ scheduledAt: new Date("2024-03-10T12:30:10.000Z"), title: "First" }),
                taskRecordBuild({ scheduledAt: new Date("2024-03-10T12:31:10.000Z"), title: "Second" })
            ]
        });
        const sent: Sent[] = [];
        const sweeper = sweeperBuild(storage, sent);

        await sweeper.sweep();
        const repeat = await sweeper.sweep();
        vi.setSystemTime(new Date("2024-03-10T12:01:20.000Z"));
        await sweeper.sweep();

        expect(repeat.window).toBeNull();
        expect(sent.map((entry) => entry.message.text.split("\n")[3])).toEqual(["<b>First</b>", "<b>Second</b>"]);
    });

    it("keeps the window open when the target lookup fails", async () => {
        const storage = new StorageMemory({
            links: [{ accountId: "user-1", chatId: "4242", notifications: true }],
            tasks: [taskRecordBuild({ scheduledAt: new Date("2024-03-10T12:30:00.000Z"), title: "Gym" })]
        });
        storage.failure = new RelayError("backend_unavailable", "Reminder target lookup failed: fetch failed");
        const sent: Sent[] = [];
        const sweeper = sweeperBuild(storage, sent);

        const failed = await sweeper.sweep();
        storage.failure = null;
        const retried = await sweeper.sweep();

        expect(failed).toEqual({ window: null, sent: 0, failedAccounts: 0 });
        expect(retried.sent).toBe(1);
    });

    it("continues with other accounts when one delivery fails", async () => {
        const storage = new StorageMemory({
            links: [
                { accountId: "user-1", chatId: "4242", notifications: true },
                { accountId: "user-2", chatId: "777", notifications: true }
            ],
            tasks: [
                taskRecordBuild({ scheduledAt: new Date("2024-03-10T12:30:00.000Z"), title: "A" }),
                taskRecordBuild({ scheduledAt: new Date("2024-03-10T12:30:00.000Z"), accountId: "user-2", title: "B" })
            ]
        });
        const sent: Sent[] = [];
        const sweeper = new ReminderSweeper({
            storage,
            leadMinutes: 30,
            intervalMs: 60_000,
            send: async (chatId, message) => {
                if (chatId === "4242") {
                    throw new Error("chat not found");
                }
                sent.push({ chatId, message });
            }
        });

        const result = await sweeper.sweep();

        expect(result.sent).toBe(1);
        expect(result.failedAccounts).toBe(1);
        expect(sent.map((entry) => entry.chatId)).toEqual(["777"]);
    });

    it("sweeps on start and then on every interval until stopped", async () => {
        const storage = new StorageMemory({
            links: [{ accountId: "user-1", chatId: "4242", notifications: true }]
        });
        const sweeper = sweeperBuild(storage, []);

        sweeper.start();
        await vi.advanceTimersByTimeAsync(0);
        expect(storage.calls.filter((call) => call === "accountLinks.findReminderTargets")).toHaveLength(1);

        await vi.advanceTimersByTimeAsync(60_000);
        expect(storage.calls.filter((call) => call === "accountLinks.findReminderTargets")).toHaveLength(2);

        sweeper.stop();
        await vi.advanceTimersByTimeAsync(180_000);
        expect(storage.calls.filter((call) => call === "accountLinks.findReminderTargets")).toHaveLength(2);
    });
});
