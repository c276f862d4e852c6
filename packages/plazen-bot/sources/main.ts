#!/usr/bin/env node
import "./env.js";

import { readFileSync } from "node:fs";

import { Command } from "commander";
import { z } from "zod";

import { scheduleCommand } from "./commands/schedule.js";
import { startCommand } from "./commands/start.js";
import { getLogger, initLogging } from "./log.js";

const pkg = z
    .object({ version: z.string() })
    .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const program = new Command();

initLogging();

program.name("plazen-bot").description("Telegram relay for Plazen schedules").version(pkg.version);

program
    .command("start")
    .description("Connect to Telegram and answer commands")
    .action(startCommand);

program
    .command("schedule")
    .description("Print today's /schedule reply for a chat id")
    .argument("<chatId>", "Telegram chat id")
    .option("-d, --date <date>", "UTC day to show (YYYY-MM-DD)")
    .action(scheduleCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    getLogger("main").error({ error }, "error: Command failed");
    process.exitCode = 1;
});
