import { describe, expect, it } from "vitest";

import { htmlEscape } from "./htmlEscape.js";

describe("htmlEscape", () => {
    it("escapes the ampersand before angle brackets", () => {
        expect(htmlEscape("R&D <b>sync</b>")).toBe("R&amp;D &lt;b&gt;sync&lt;/b&gt;");
    });

    it("leaves quotes and emoji untouched", () => {
        expect(htmlEscape(`Tom's "big" day 🎉`)).toBe(`Tom's "big" day 🎉`);
    });
});
