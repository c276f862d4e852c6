import { describe, expect, it } from "vitest";

import { timeUtcFormat } from "./timeUtcFormat.js";

describe("timeUtcFormat", () => {
    it("pads hours and minutes", () => {
        expect(timeUtcFormat(new Date("2026-10-18T09:05:59Z"))).toBe("09:05");
    });

    it("uses UTC regardless of the offset in the input", () => {
        expect(timeUtcFormat(new Date("2026-10-18T23:30:00-02:00"))).toBe("01:30");
    });

    it("formats midnight as 00:00", () => {
        expect(timeUtcFormat(new Date("2026-10-18T00:00:00Z"))).toBe("00:00");
    });
});
