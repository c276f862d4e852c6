import { getLogger } from "../../log.js";
import { accountResolve } from "../accounts/accountResolve.js";
import { agendaFormat } from "../agenda/agendaFormat.js";
import { relayErrorIs } from "../relayError.js";
import { scheduleFetch } from "../schedule/scheduleFetch.js";
import type { CommandContext, CommandDeps, CommandReply } from "./commandTypes.js";

const logger = getLogger("command.schedule");

export const SCHEDULE_HEADER = "<b>Here is your schedule for today (UTC):</b>";
export const SCHEDULE_NOT_LINKED_TEXT =
    "Your Telegram account is not linked to a Plazen account. Send /start to get your Chat ID and add it in your Plazen app's settings.";
export const SCHEDULE_CONFLICT_TEXT =
    "This Telegram chat is linked to more than one Plazen account. Please remove the Chat ID from all but one account in your Plazen app's settings.";
export const SCHEDULE_UNAVAILABLE_TEXT = "Sorry, I couldn't reach your schedule right now. Please try again in a moment.";

export async function scheduleHandle(context: CommandContext, deps: CommandDeps): Promise<CommandReply> {
    try {
        const resolved = await accountResolve(deps.storage.accountLinks, context.chatId);
        if (resolved.type === "missing") {
            return { text: SCHEDULE_NOT_LINKED_TEXT, parseMode: null };
        }
        if (resolved.type === "conflict") {
            return { text: SCHEDULE_CONFLICT_TEXT, parseMode: null };
        }

        const tasks = await scheduleFetch(deps.storage.tasks, resolved.account.accountId, deps.now());
        const agenda = agendaFormat(tasks);
        if (tasks.length === 0) {
            return { text: agenda, parseMode: "HTML" };
        }
        return { text: `${SCHEDULE_HEADER}\n\n${agenda}`, parseMode: "HTML" };
    } catch (error) {
        if (relayErrorIs(error, "backend_unavailable")) {
            logger.warn({ chatId: context.chatId, error }, "error: Schedule lookup failed");
            return { text: SCHEDULE_UNAVAILABLE_TEXT, parseMode: null };
        }
        throw error;
    }
}
