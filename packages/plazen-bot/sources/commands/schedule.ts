import { parseISO } from "date-fns";

import { configLoad } from "../config/configLoad.js";
import { commandExecute } from "../engine/commands/commandExecute.js";
import type { CommandDeps } from "../engine/commands/commandTypes.js";
import { storageCreate } from "../storage/storage.js";
import { supabaseClientCreate } from "../storage/supabaseClientCreate.js";

export type ScheduleOptions = {
    date?: string;
};

/**
 * Prints the /schedule reply a chat would receive for a UTC day.
 */
export async function scheduleCommand(chatId: string, options: ScheduleOptions): Promise<void> {
    const reference = scheduleReferenceParse(options.date);
    const config = configLoad();
    const deps: CommandDeps = {
        storage: storageCreate(supabaseClientCreate(config.supabase)),
        now: () => reference
    };
    const reply = await commandExecute({ name: "schedule", args: [], botName: null }, { chatId, firstName: null }, deps);
    console.log(reply.text);
}

export function scheduleReferenceParse(date: string | undefined): Date {
    if (date === undefined) {
        return new Date();
    }
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
        throw new Error(`Invalid --date "${date}". Expected YYYY-MM-DD.`);
    }
    const parsed = parseISO(`${date}T00:00:00Z`);
    if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== date) {
        throw new Error(`Invalid --date "${date}". Expected YYYY-MM-DD.`);
    }
    return parsed;
}
