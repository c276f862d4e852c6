import type { ChatIdentity } from "../../types.js";

export type ConnectorParseMode = "HTML";

export type ConnectorMessage = {
    text: string;
    parseMode: ConnectorParseMode | null;
};

export type MessageContext = {
    chatId: ChatIdentity;
    userId: string | null;
    firstName: string | null;
    messageId?: string;
};

export type CommandHandler = (command: string, context: MessageContext) => void | Promise<void>;

export type CommandUnsubscribe = () => void;

export type SlashCommandEntry = {
    command: string;
    description: string;
};

export interface Connector {
    onCommand(handler: CommandHandler): CommandUnsubscribe;
    sendMessage(targetId: ChatIdentity, message: ConnectorMessage): Promise<void>;
    startTyping?: (targetId: ChatIdentity) => () => void;
    /** Username commands must name when addressed as `/name@bot`; null until known. */
    botUsername?: () => string | null;
    shutdown?: (reason?: string) => Promise<void>;
}
