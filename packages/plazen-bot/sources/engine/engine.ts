import type { Config } from "../config/configTypes.js";
import { getLogger } from "../log.js";
import type { Storage } from "../storage/storageTypes.js";
import { commandExecute } from "./commands/commandExecute.js";
import { commandAddressedTo, commandParse } from "./commands/commandParse.js";
import type { CommandDeps } from "./commands/commandTypes.js";
import type { CommandUnsubscribe, Connector, MessageContext } from "./connectors/types.js";
import { ReminderSweeper } from "./reminders/reminderSweeper.js";

const logger = getLogger("engine");

export const ENGINE_FAILURE_TEXT = "Oops! Something went wrong. Please try again.";

export type EngineOptions = {
    reminders: Config["reminders"];
    connector: Connector;
    storage: Storage;
    now?: () => Date;
};

/**
 * Connects incoming chat commands to their handlers and owns the reminder sweeper.
 */
export class Engine {
    private connector: Connector;
    private deps: CommandDeps;
    private sweeper: ReminderSweeper | null;
    private unsubscribe: CommandUnsubscribe | null = null;
    private stopped = false;

    constructor(options: EngineOptions) {
        this.connector = options.connector;
        this.deps = { storage: options.storage, now: options.now ?? (() => new Date()) };
        this.sweeper = options.reminders.enabled
            ? new ReminderSweeper({
                  storage: options.storage,
                  leadMinutes: options.reminders.leadMinutes,
                  intervalMs: options.reminders.intervalMs,
                  send: (chatId, message) => this.connector.sendMessage(chatId, message),
                  now: this.deps.now
              })
            : null;
    }

    start(): void {
        if (this.unsubscribe || this.stopped) {
            return;
        }
        this.unsubscribe = this.connector.onCommand((text, context) => this.handleCommand(text, context));
        this.sweeper?.start();
        logger.info(`start: Engine started reminders=${this.sweeper !== null}`);
    }

    async shutdown(): Promise<void> {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        this.unsubscribe?.();
        this.unsubscribe = null;
        this.sweeper?.stop();
        await this.connector.shutdown?.("shutdown");
        logger.info("stop: Engine stopped");
    }

    async handleCommand(text: string, context: MessageContext): Promise<void> {
        const command = commandParse(text);
        if (!command) {
            return;
        }
        const username = this.connector.botUsername?.() ?? null;
        if (username !== null && !commandAddressedTo(command, username)) {
            logger.debug(`skip: Command addressed to another bot name=${command.name} bot=${command.botName} chatId=${context.chatId}`);
            return;
        }
        logger.debug(`receive: Command received name=${command.name} chatId=${context.chatId}`);

        const stopTyping = command.name === "schedule" ? this.connector.startTyping?.(context.chatId) : undefined;
        try {
            const reply = await commandExecute(command, { chatId: context.chatId, firstName: context.firstName }, this.deps);
            stopTyping?.();
            await this.connector.sendMessage(context.chatId, reply);
        } catch (error) {
            stopTyping?.();
            logger.error({ error, chatId: context.chatId, command: command.name }, "error: Command failed");
            await this.replyFailure(context);
        }
    }

    private async replyFailure(context: MessageContext): Promise<void> {
        try {
            await this.connector.sendMessage(context.chatId, { text: ENGINE_FAILURE_TEXT, parseMode: null });
        } catch (error) {
            logger.warn({ error, chatId: context.chatId }, "error: Failure reply could not be sent");
        }
    }
}
