import { COMMAND_LIST } from "./commandList.js";
import type { CommandReply } from "./commandTypes.js";

export function helpHandle(): CommandReply {
    const lines = COMMAND_LIST.map((entry) => `/${entry.command} - ${entry.description}`);
    return {
        text: ["Available commands:", ...lines].join("\n"),
        parseMode: null
    };
}
