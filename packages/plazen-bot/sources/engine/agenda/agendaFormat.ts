import type { TaskRecord } from "../../types.js";
import { htmlEscape } from "../../util/htmlEscape.js";
import { timeUtcFormat } from "../../util/timeUtcFormat.js";

export const AGENDA_EMPTY_TEXT = "You have no tasks scheduled for today. ✨";

const GLYPH_DONE = "✅";
const GLYPH_OPEN = "🔲";

/**
 * Renders tasks as Telegram HTML, one line per task in the given order.
 * An empty list renders as AGENDA_EMPTY_TEXT.
 */
export function agendaFormat(tasks: readonly TaskRecord[]): string {
    if (tasks.length === 0) {
        return AGENDA_EMPTY_TEXT;
    }
    return tasks.map(agendaLineFormat).join("\n");
}

export function agendaLineFormat(task: TaskRecord): string {
    const glyph = task.isCompleted ? GLYPH_DONE : GLYPH_OPEN;
    const duration = task.durationMinutes === null ? "" : ` (${task.durationMinutes} min)`;
    // One task, one line: line breaks inside a title become spaces.
    const title = htmlEscape(task.title.replace(/\r\n|\r|\n/g, " "));
    return `${glyph} <b>${timeUtcFormat(task.scheduledAt)}</b> - ${title}${duration}`;
}
