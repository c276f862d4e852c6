import { describe, expect, it } from "vitest";

import { scheduleReferenceParse } from "./schedule.js";

describe("scheduleReferenceParse", () => {
    it("reads the date as UTC midnight", () => {
        expect(scheduleReferenceParse("2024-03-10").toISOString()).toBe("2024-03-10T00:00:00.000Z");
    });

    it("rejects malformed and impossible dates", () => {
        expect(() => scheduleReferenceParse("10/03/2024")).toThrow('Invalid --date "10/03/2024". Expected YYYY-MM-DD.');
        expect(() => scheduleReferenceParse("2024-02-30")).toThrow('Invalid --date "2024-02-30". Expected YYYY-MM-DD.');
    });
});
