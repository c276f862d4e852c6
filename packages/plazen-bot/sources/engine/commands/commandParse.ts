import type { ParsedCommand } from "./commandTypes.js";

/**
 * Splits "/name@bot arg1 arg2" into a lower-cased name, its arguments and the addressed bot.
 * Returns null when the text is not a command.
 */
export function commandParse(text: string): ParsedCommand | null {
    const trimmed = text.trim();
    if (!trimmed.startsWith("/")) {
        return null;
    }
    const parts = trimmed.slice(1).split(/\s+/);
    const rawName = parts.shift() ?? "";
    const at = rawName.indexOf("@");
    const name = (at === -1 ? rawName : rawName.slice(0, at)).toLowerCase();
    if (!name) {
        return null;
    }
    const botName = at === -1 ? "" : rawName.slice(at + 1);
    return {
        name,
        args: parts.filter((part) => part.length > 0),
        botName: botName.length > 0 ? botName : null
    };
}

/**
 * True when the command names no bot or names the bot with this username (case-insensitive).
 */
export function commandAddressedTo(command: ParsedCommand, username: string): boolean {
    return command.botName === null || command.botName.toLowerCase() === username.toLowerCase();
}
