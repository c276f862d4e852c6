import { z } from "zod";

import { RelayError } from "../engine/relayError.js";
import { booleanFlagParse } from "../util/booleanFlagParse.js";
import type { Config, ConfigEnv } from "./configTypes.js";

const DEFAULT_REMINDER_LEAD_MINUTES = 30;
const DEFAULT_REMINDER_INTERVAL_MS = 60_000;
// Longest delay setTimeout honours; larger values fire after 1 ms.
const TIMER_DELAY_MAX_MS = 2_147_483_647;
const REMINDER_LEAD_MAX_MINUTES = 24 * 60;

const requiredString = (name: string, hint?: string) =>
    z
        .string({ required_error: `${name} environment variable is not set.${hint ? ` ${hint}` : ""}` })
        .trim()
        .min(1, `${name} environment variable is not set.${hint ? ` ${hint}` : ""}`);

const flag = z
    .string()
    .optional()
    .transform((value, ctx) => {
        if (value === undefined || value.trim().length === 0) {
            return undefined;
        }
        const parsed = booleanFlagParse(value);
        if (parsed === null) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected an on/off flag, got "${value}"` });
            return z.NEVER;
        }
        return parsed;
    });

const positiveInt = (max: number) =>
    z
        .string()
        .optional()
        .transform((value, ctx) => {
            if (value === undefined || value.trim().length === 0) {
                return undefined;
            }
            const parsed = Number(value.trim());
            if (!Number.isInteger(parsed) || parsed <= 0) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a positive integer, got "${value}"` });
                return z.NEVER;
            }
            if (parsed > max) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected at most ${max}, got "${value}"` });
                return z.NEVER;
            }
            return parsed;
        });

const envSchema = z.object({
    TELEGRAM_TOKEN: requiredString("TELEGRAM_TOKEN"),
    SUPABASE_URL: requiredString("SUPABASE_URL").pipe(z.string().url("SUPABASE_URL must be a valid URL.")),
    SUPABASE_SERVICE_KEY: requiredString("SUPABASE_SERVICE_KEY", "(This must be your service role key)"),
    PLAZEN_REMINDERS: flag,
    PLAZEN_REMINDER_LEAD_MINUTES: positiveInt(REMINDER_LEAD_MAX_MINUTES),
    PLAZEN_REMINDER_INTERVAL_MS: positiveInt(TIMER_DELAY_MAX_MS)
});

/**
 * Validates process environment into a Config.
 * Expects: env is a plain string map such as process.env; throws RelayError(config_invalid) listing every problem.
 */
export function configParse(env: ConfigEnv): Config {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => {
            const key = issue.path.join(".");
            return issue.message.includes(key) ? issue.message : `${key}: ${issue.message}`;
        });
        throw new RelayError("config_invalid", problems.join("\n"), { cause: parsed.error });
    }

    const values = parsed.data;
    return {
        telegram: {
            token: values.TELEGRAM_TOKEN
        },
        supabase: {
            url: values.SUPABASE_URL,
            serviceKey: values.SUPABASE_SERVICE_KEY
        },
        reminders: {
            enabled: values.PLAZEN_REMINDERS ?? true,
            leadMinutes: values.PLAZEN_REMINDER_LEAD_MINUTES ?? DEFAULT_REMINDER_LEAD_MINUTES,
            intervalMs: values.PLAZEN_REMINDER_INTERVAL_MS ?? DEFAULT_REMINDER_INTERVAL_MS
        }
    };
}
