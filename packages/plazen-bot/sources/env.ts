import { config as dotenvLoad } from "dotenv";

/**
 * Loads `.env`, or the file named by PLAZEN_ENV_FILE, into process.env. Values already set win.
 */
export function envLoad(path: string | undefined = process.env.PLAZEN_ENV_FILE): void {
    dotenvLoad(path ? { path } : undefined);
}

// main.ts imports this module first, so every logger and the config see the file.
envLoad();
