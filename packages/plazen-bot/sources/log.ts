import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import pinoPretty from "pino-pretty";

import { booleanFlagParse } from "./util/booleanFlagParse.js";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
    environment: string;
};

const DEFAULT_REDACT = [
    "token",
    "serviceKey",
    "password",
    "secret",
    "*.token",
    "*.serviceKey",
    "*.password",
    "*.secret"
];

const MODULE_WIDTH = 16;
const PRETTY_RESERVED_FIELDS = new Set([
    "pid",
    "hostname",
    "level",
    "time",
    "__time",
    "__level",
    "service",
    "environment",
    "module",
    "msg"
]);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    const config = resolveLogConfig(overrides);
    rootLogger = buildLogger(config);
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("PLAZEN_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination =
        overrides.destination ??
        envValue("PLAZEN_LOG_DEST") ??
        envValue("LOG_DEST") ??
        (process.stdout.isTTY ? "stderr" : "stdout");
    const forceJson = booleanFlagParse(envValue("PLAZEN_LOG_JSON")) ?? booleanFlagParse(envValue("LOG_JSON")) ?? false;
    let format: LogFormat =
        overrides.format ??
        parseFormat(envValue("PLAZEN_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");
    const service = overrides.service ?? envValue("PLAZEN_LOG_SERVICE") ?? "plazen-bot";
    const environment = overrides.environment ?? envValue("NODE_ENV") ?? "development";

    // Files always get JSON lines.
    if (!isStdDestination(destination)) {
        format = "json";
    }

    const redact = overrides.redact ?? mergeRedactList(DEFAULT_REDACT, envValue("PLAZEN_LOG_REDACT"));

    return {
        level,
        format,
        destination,
        redact,
        service,
        environment
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service,
            environment: config.environment
        },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    const destination = resolveDestination(config.destination);

    if (config.format === "pretty") {
        const prettyStream = pinoPretty({
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname,service,environment,module",
            hideObject: true,
            messageFormat: formatPrettyMessage,
            singleLine: false,
            destination: config.destination === "stderr" ? 2 : 1
        });
        return pino(options, prettyStream);
    }

    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders a log record as `[module] message key=value ...` for pino-pretty.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const moduleName = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const label = `[${moduleName.slice(0, MODULE_WIDTH).padEnd(MODULE_WIDTH, " ")}]`;
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatDetailValue(value)}`);
    }
    return [label, message, ...details].filter((part) => part.length > 0).join(" ");
}

function formatDetailValue(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (value instanceof Error) {
        return quoteIfNeeded(value.message);
    }
    if (typeof value === "object") {
        if ("message" in value && typeof value.message === "string") {
            return quoteIfNeeded(value.message);
        }
        try {
            return quoteIfNeeded(JSON.stringify(value));
        } catch {
            return quoteIfNeeded(String(value));
        }
    }
    return quoteIfNeeded(String(value));
}

function quoteIfNeeded(value: string): string {
    if (value.length === 0) {
        return '""';
    }
    return /[=\s]/.test(value) ? JSON.stringify(value) : value;
}

function normalizeModule(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }

    if (destination === "stderr") {
        return pino.destination(2);
    }

    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase().trim();
    if (normalized === "pretty" || normalized === "json") {
        return normalized;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

function mergeRedactList(base: string[], extra: string | null): string[] {
    if (!extra) {
        return [...base];
    }

    const additions = extra
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    return [...new Set([...base, ...additions])];
}

function isStdDestination(destination: LogDestination): boolean {
    return destination === "stdout" || destination === "stderr";
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
