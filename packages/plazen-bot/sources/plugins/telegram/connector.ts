import TelegramBot from "node-telegram-bot-api";

import type {
    CommandHandler,
    CommandUnsubscribe,
    Connector,
    ConnectorMessage,
    MessageContext,
    SlashCommandEntry
} from "../../engine/connectors/types.js";
import { getLogger } from "../../log.js";
import { telegramMessageSplit } from "./telegramMessageSplit.js";

export type TelegramConnectorOptions = {
    token: string;
    commands: readonly SlashCommandEntry[];
    polling?: boolean;
    clearWebhook?: boolean;
};

const logger = getLogger("plugin.telegram");

const TELEGRAM_MESSAGE_MAX_LENGTH = 4096;
const TELEGRAM_TYPING_INTERVAL_MS = 4000;

export class TelegramConnector implements Connector {
    private bot: TelegramBot;
    private commandHandlers: CommandHandler[] = [];
    private commands: TelegramBot.BotCommand[];
    private pollingEnabled: boolean;
    private clearWebhookOnStart: boolean;
    private clearedWebhook = false;
    private username: string | null = null;
    private typingTimers = new Map<string, NodeJS.Timeout>();
    private startingPolling = false;
    private shuttingDown = false;

    constructor(options: TelegramConnectorOptions) {
        logger.debug(`init: TelegramConnector constructor polling=${options.polling} clearWebhook=${options.clearWebhook}`);
        this.pollingEnabled = options.polling ?? true;
        this.clearWebhookOnStart = options.clearWebhook ?? true;
        this.commands = options.commands.map((entry) => ({ command: entry.command, description: entry.description }));

        this.bot = new TelegramBot(options.token, { polling: false });

        this.bot.on("message", async (message) => {
            await this.handleMessage(message);
        });

        this.bot.on("polling_error", (error) => {
            if (this.shuttingDown) {
                return;
            }
            this.handlePollingError(error);
        });

        void this.initialize();
    }

    onCommand(handler: CommandHandler): CommandUnsubscribe {
        this.commandHandlers.push(handler);
        return () => {
            const index = this.commandHandlers.indexOf(handler);
            if (index !== -1) {
                this.commandHandlers.splice(index, 1);
            }
        };
    }

    async sendMessage(targetId: string, message: ConnectorMessage): Promise<void> {
        logger.debug(`send: sendMessage() called targetId=${targetId} textLength=${message.text.length} parseMode=${message.parseMode}`);
        const chunks = telegramMessageSplit(message.text, TELEGRAM_MESSAGE_MAX_LENGTH);
        for (const chunk of chunks) {
            await this.sendTextChunk(targetId, chunk, message.parseMode === "HTML");
        }
    }

    botUsername(): string | null {
        return this.username;
    }

    startTyping(targetId: string): () => void {
        const key = String(targetId);
        if (this.typingTimers.has(key)) {
            return () => {
                this.stopTyping(key);
            };
        }

        const send = () => {
            void this.bot.sendChatAction(targetId, "typing").catch((error: unknown) => {
                logger.warn({ error }, "error: Telegram typing failed");
            });
        };

        send();
        const timer = setInterval(send, TELEGRAM_TYPING_INTERVAL_MS);
        this.typingTimers.set(key, timer);

        return () => {
            this.stopTyping(key);
        };
    }

    async shutdown(reason: string = "shutdown"): Promise<void> {
        logger.debug(`event: shutdown() called reason=${reason} alreadyShuttingDown=${this.shuttingDown}`);
        if (this.shuttingDown) {
            return;
        }
        this.shuttingDown = true;

        for (const timer of this.typingTimers.values()) {
            clearInterval(timer);
        }
        this.typingTimers.clear();

        try {
            await this.bot.stopPolling({ cancel: true, reason });
            logger.debug("stop: Polling stopped");
        } catch (error) {
            logger.warn({ error }, "error: Telegram polling stop failed");
        }
    }

    private async handleMessage(message: TelegramBot.Message): Promise<void> {
        const chatType = message.chat.type;
        if (chatType !== "private" && chatType !== "group" && chatType !== "supergroup") {
            logger.debug(`skip: Skipping unsupported chat type=${chatType} chatId=${message.chat.id}`);
            return;
        }
        const rawText = typeof message.text === "string" ? message.text : null;
        if (!rawText || !rawText.trim().startsWith("/")) {
            logger.debug(`skip: Ignoring non-command message chatId=${message.chat.id}`);
            return;
        }

        const context: MessageContext = {
            chatId: String(message.chat.id),
            userId: message.from ? String(message.from.id) : null,
            firstName: message.from?.first_name ?? null,
            messageId: String(message.message_id)
        };
        logger.debug(
            `receive: Received Telegram command chatId=${context.chatId} handlerCount=${this.commandHandlers.length}`
        );
        for (const handler of this.commandHandlers) {
            try {
                await handler(rawText, context);
            } catch (error) {
                logger.error({ error, chatId: context.chatId }, "error: Telegram command handler failed");
            }
        }
    }

    private async sendTextChunk(targetId: string, text: string, html: boolean): Promise<void> {
        if (!html) {
            await this.bot.sendMessage(targetId, text);
            return;
        }
        try {
            await this.bot.sendMessage(targetId, text, { parse_mode: "HTML" });
        } catch (error) {
            if (!isTelegramParseError(error)) {
                throw error;
            }
            logger.warn({ error }, "error: Telegram HTML parse error; retrying without parse_mode");
            await this.bot.sendMessage(targetId, text);
        }
    }

    private async initialize(): Promise<void> {
        logger.debug("init: initialize() starting");
        await this.resolveUsername();
        await this.registerSlashCommands();
        if (this.pollingEnabled && this.clearWebhookOnStart) {
            await this.ensureWebhookCleared();
        }
        if (this.pollingEnabled) {
            await this.startPolling();
        }
        logger.debug("init: initialize() complete");
    }

    private async resolveUsername(): Promise<void> {
        try {
            const me = await this.bot.getMe();
            this.username = me.username ?? null;
            logger.info(`event: Telegram bot identified username=${this.username}`);
        } catch (error) {
            logger.warn({ error }, "error: Failed to resolve Telegram bot username");
        }
    }

    private async registerSlashCommands(): Promise<void> {
        try {
            await this.bot.setMyCommands(this.commands);
            logger.debug("register: Telegram slash commands registered");
        } catch (error) {
            logger.warn({ error }, "error: Failed to register Telegram slash commands");
        }
    }

    private async startPolling(): Promise<void> {
        if (this.startingPolling || this.shuttingDown || this.bot.isPolling()) {
            return;
        }

        this.startingPolling = true;
        try {
            await this.bot.startPolling({ restart: true });
            if (this.shuttingDown) {
                logger.debug("start: Shutdown requested during polling start, stopping");
                await this.bot.stopPolling({ cancel: true, reason: "shutdown" });
                return;
            }
            logger.info("start: Telegram polling started");
        } catch (error) {
            this.handlePollingError(error);
        } finally {
            this.startingPolling = false;
        }
    }

    private handlePollingError(error: unknown): void {
        if (isTelegramConflictError(error) && !this.clearedWebhook) {
            logger.warn({ error }, "event: Telegram polling conflict; clearing webhook");
            void this.ensureWebhookCleared();
            return;
        }

        logger.warn({ error }, "error: Telegram polling error; relying on library restart");
    }

    private async ensureWebhookCleared(): Promise<void> {
        if (this.clearedWebhook) {
            return;
        }

        try {
            await this.bot.deleteWebHook();
            this.clearedWebhook = true;
            logger.info("event: Telegram webhook cleared for polling");
        } catch (error) {
            logger.warn({ error }, "error: Failed to clear Telegram webhook");
        }
    }

    private stopTyping(key: string): void {
        const timer = this.typingTimers.get(key);
        if (!timer) {
            return;
        }
        clearInterval(timer);
        this.typingTimers.delete(key);
    }
}

type TelegramErrorInfo = {
    status: number | null;
    description: string;
};

function telegramErrorInfo(error: unknown): TelegramErrorInfo | null {
    if (!error || typeof error !== "object" || !("code" in error) || error.code !== "ETELEGRAM") {
        return null;
    }
    let status: number | null = null;
    let description = "message" in error && typeof error.message === "string" ? error.message : "";
    if ("response" in error && error.response && typeof error.response === "object") {
        const response = error.response;
        if ("statusCode" in response && typeof response.statusCode === "number") {
            status = response.statusCode;
        }
        if ("body" in response && response.body && typeof response.body === "object") {
            const body = response.body;
            if ("description" in body && typeof body.description === "string") {
                description = body.description;
            }
            if (status === null && "error_code" in body && typeof body.error_code === "number") {
                status = body.error_code;
            }
        }
    }
    return { status, description };
}

function isTelegramParseError(error: unknown): boolean {
    const info = telegramErrorInfo(error);
    if (!info) {
        return false;
    }
    const normalized = info.description.toLowerCase();
    return normalized.includes("can't parse entities") || normalized.includes("cant parse entities");
}

function isTelegramConflictError(error: unknown): boolean {
    return telegramErrorInfo(error)?.status === 409;
}
