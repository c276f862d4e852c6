/**
 * Chat identifier issued by Telegram, kept as the decimal string it prints as.
 */
export type ChatIdentity = string;

/**
 * Binding between a chat and an account, created by the Plazen app.
 */
export type AccountLink = {
    accountId: string;
    chatId: ChatIdentity | null;
    notifications: boolean;
};

export type TaskRecord = {
    id: string | null;
    accountId: string;
    scheduledAt: Date;
    title: string;
    isCompleted: boolean;
    durationMinutes: number | null;
};

/**
 * Half-open time range: start is inclusive, end is exclusive.
 */
export type DayRange = {
    start: Date;
    end: Date;
};
