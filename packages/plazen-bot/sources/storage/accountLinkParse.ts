import { z } from "zod";

import type { AccountLink } from "../types.js";

export type AccountLinkParseResult = { ok: true; link: AccountLink } | { ok: false; reason: string };

const accountLinkRowSchema = z
    .object({
        user_id: z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
        telegram_id: z
            .union([z.string(), z.number()])
            .nullish()
            .transform((value) => {
                if (value === null || value === undefined) {
                    return null;
                }
                const text = String(value).trim();
                return text.length > 0 ? text : null;
            }),
        notifications: z.boolean().nullish()
    })
    .passthrough();

/**
 * Validates a `UserSettings` row into an AccountLink.
 */
export function accountLinkParse(row: unknown): AccountLinkParseResult {
    const parsed = accountLinkRowSchema.safeParse(row);
    if (!parsed.success) {
        const reason = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`)
            .join("; ");
        return { ok: false, reason };
    }
    return {
        ok: true,
        link: {
            accountId: parsed.data.user_id,
            chatId: parsed.data.telegram_id,
            notifications: parsed.data.notifications ?? false
        }
    };
}
