import type { Storage } from "../../storage/storageTypes.js";
import type { ConnectorMessage, MessageContext } from "../connectors/types.js";

export type ParsedCommand = {
    name: string;
    args: string[];
    /** Bot named by a `/name@bot` suffix, as written; null when the command names no bot. */
    botName: string | null;
};

export type CommandReply = ConnectorMessage;

/**
 * Handles passed into every command; nothing is read from process state.
 */
export type CommandDeps = {
    storage: Storage;
    now: () => Date;
};

export type CommandContext = Pick<MessageContext, "chatId" | "firstName">;
