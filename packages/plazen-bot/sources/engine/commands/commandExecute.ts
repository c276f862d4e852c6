import { getLogger } from "../../log.js";
import type { CommandContext, CommandDeps, CommandReply, ParsedCommand } from "./commandTypes.js";
import { helpHandle } from "./helpHandle.js";
import { scheduleHandle } from "./scheduleHandle.js";
import { welcomeHandle } from "./welcomeHandle.js";

const logger = getLogger("command.execute");

export async function commandExecute(
    command: ParsedCommand,
    context: CommandContext,
    deps: CommandDeps
): Promise<CommandReply> {
    switch (command.name) {
        case "start":
            return welcomeHandle(context);
        case "schedule":
            return scheduleHandle(context, deps);
        case "help":
            return helpHandle();
        default:
            logger.debug(`skip: Unknown command name=${command.name} chatId=${context.chatId}`);
            return helpHandle();
    }
}
