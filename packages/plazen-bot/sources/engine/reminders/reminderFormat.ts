import { differenceInMinutes, startOfMinute } from "date-fns";

import type { TaskRecord } from "../../types.js";
import { htmlEscape } from "../../util/htmlEscape.js";
import { timeUtcFormat } from "../../util/timeUtcFormat.js";
import type { ConnectorMessage } from "../connectors/types.js";

export function reminderFormat(task: TaskRecord, now: Date): ConnectorMessage {
    const minutes = Math.max(0, differenceInMinutes(startOfMinute(task.scheduledAt), startOfMinute(now)));
    const when = minutes === 0 ? "now" : `in ${minutes} ${minutes === 1 ? "minute" : "minutes"}`;
    const title = htmlEscape(task.title.replace(/\r\n|\r|\n/g, " "));
    return {
        text: [
            "🔔 <b>Reminder!</b>",
            "",
            `Your task is starting ${when} (at ${timeUtcFormat(task.scheduledAt)}):`,
            `<b>${title}</b>`
        ].join("\n"),
        parseMode: "HTML"
    };
}
