import type { SupabaseClient } from "@supabase/supabase-js";

import { AccountLinksRepository } from "./accountLinksRepository.js";
import type { Storage } from "./storageTypes.js";
import { TasksRepository } from "./tasksRepository.js";

export function storageCreate(client: SupabaseClient): Storage {
    return {
        accountLinks: new AccountLinksRepository(client),
        tasks: new TasksRepository(client)
    };
}
