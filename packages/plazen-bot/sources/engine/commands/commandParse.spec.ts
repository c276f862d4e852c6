import { describe, expect, it } from "vitest";

import { commandAddressedTo, commandParse } from "./commandParse.js";

describe("commandParse", () => {
    it("parses a bare command", () => {
        expect(commandParse("/schedule")).toEqual({ name: "schedule", args: [], botName: null });
    });

    it("splits off the addressed bot and lower-cases the name", () => {
        expect(commandParse("  /Schedule@Plazen_Bot  ")).toEqual({
            name: "schedule",
            args: [],
            botName: "Plazen_Bot"
        });
    });

    it("treats a trailing @ as naming no bot", () => {
        expect(commandParse("/help@")).toEqual({ name: "help", args: [], botName: null });
    });

    it("collects whitespace separated arguments", () => {
        expect(commandParse("/help  me\tplease")).toEqual({ name: "help", args: ["me", "please"], botName: null });
    });

    it("ignores plain text and empty commands", () => {
        expect(commandParse("what is on today?")).toBeNull();
        expect(commandParse("/")).toBeNull();
        expect(commandParse("/@plazen_bot")).toBeNull();
    });
});

describe("commandAddressedTo", () => {
    it("accepts commands without a bot and commands naming this bot in any case", () => {
        expect(commandAddressedTo({ name: "help", args: [], botName: null }, "plazen_bot")).toBe(true);
        expect(commandAddressedTo({ name: "help", args: [], botName: "Plazen_Bot" }, "plazen_bot")).toBe(true);
    });

    it("rejects commands naming another bot", () => {
        expect(commandAddressedTo({ name: "help", args: [], botName: "SomeOtherBot" }, "plazen_bot")).toBe(false);
    });
});
