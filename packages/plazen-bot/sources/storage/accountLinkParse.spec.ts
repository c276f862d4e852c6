import { describe, expect, it } from "vitest";

import { accountLinkParse } from "./accountLinkParse.js";

describe("accountLinkParse", () => {
    it("maps a linked row", () => {
        expect(accountLinkParse({ user_id: "user-1", telegram_id: 4242, notifications: true })).toEqual({
            ok: true,
            link: { accountId: "user-1", chatId: "4242", notifications: true }
        });
    });

    it("treats missing chat id and notifications as unset", () => {
        expect(accountLinkParse({ user_id: "user-1", timezone_offset: "+2" })).toEqual({
            ok: true,
            link: { accountId: "user-1", chatId: null, notifications: false }
        });
    });

    it("rejects rows without an account id", () => {
        const result = accountLinkParse({ telegram_id: "4242" });

        expect(result.ok).toBe(false);
        expect(result.ok ? null : result.reason.startsWith("user_id:")).toBe(true);
    });
});
