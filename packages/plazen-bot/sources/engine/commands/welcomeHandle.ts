import { htmlEscape } from "../../util/htmlEscape.js";
import type { CommandContext, CommandReply } from "./commandTypes.js";

/**
 * Greets the user and shows the chat id they paste into the Plazen app to link their account.
 */
export function welcomeHandle(context: CommandContext): CommandReply {
    const greeting = context.firstName ? `Hi ${htmlEscape(context.firstName)}!` : "Hi!";
    const text = [
        `${greeting} Welcome to the Plazen Bot. 🤖`,
        "",
        "To link this bot to your Plazen account, copy your Chat ID below and paste it into the 'Telegram Chat ID' field in your Plazen app's settings.",
        "",
        "Your Telegram Chat ID is:",
        `<code>${htmlEscape(context.chatId)}</code>`,
        "",
        "Once linked, use /schedule to see your tasks for today."
    ].join("\n");
    return { text, parseMode: "HTML" };
}
