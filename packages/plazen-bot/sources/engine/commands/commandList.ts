import type { SlashCommandEntry } from "../connectors/types.js";

export const COMMAND_LIST: readonly SlashCommandEntry[] = [
    { command: "start", description: "Get your Telegram Chat ID to link your account." },
    { command: "schedule", description: "Get your schedule for today." },
    { command: "help", description: "Show the available commands." }
];
