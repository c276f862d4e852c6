import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;
type ShutdownReason = NodeJS.Signals | "fatal";

const FORCE_EXIT_MS = 5000;
const shutdownHandlers = new Map<string, ShutdownHandler[]>();
const logger = getLogger("shutdown");

let shutdownPromise: Promise<ShutdownReason> | null = null;
let resolveShutdown: ((reason: ShutdownReason) => void) | null = null;
let shutdownRequested: ShutdownReason | null = null;
let shutdownCompletion: Promise<void> | null = null;

/**
 * Registers a handler that runs once when the process is asked to stop.
 * Returns a function that removes it again.
 */
export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    const handlers = shutdownHandlers.get(name) ?? [];
    handlers.push(handler);
    shutdownHandlers.set(name, handlers);

    return () => {
        const list = shutdownHandlers.get(name);
        if (!list) {
            return;
        }
        const index = list.indexOf(handler);
        if (index !== -1) {
            list.splice(index, 1);
        }
        if (list.length === 0) {
            shutdownHandlers.delete(name);
        }
    };
}

/**
 * Resolves after SIGINT/SIGTERM (or requestShutdown) once every handler has settled.
 */
export function awaitShutdown(): Promise<ShutdownReason> {
    if (!shutdownPromise) {
        shutdownPromise = new Promise((resolve) => {
            resolveShutdown = resolve;
            const handler = (signal: NodeJS.Signals) => {
                requestShutdown(signal);
            };
            process.once("SIGINT", handler);
            process.once("SIGTERM", handler);

            if (shutdownRequested) {
                resolveWhenComplete(shutdownRequested);
            }
        });
    }
    return shutdownPromise;
}

export function requestShutdown(reason: ShutdownReason = "SIGTERM"): void {
    if (shutdownRequested) {
        return;
    }
    shutdownRequested = reason;
    shutdownCompletion = runHandlers(reason);
    resolveWhenComplete(reason);
}

function resolveWhenComplete(reason: ShutdownReason): void {
    if (!resolveShutdown || !shutdownCompletion) {
        return;
    }
    const resolve = resolveShutdown;
    void shutdownCompletion.then(() => resolve(reason));
}

async function runHandlers(reason: ShutdownReason): Promise<void> {
    const forceExit = setTimeout(() => {
        logger.warn(`event: Shutdown: forcing exit after ${FORCE_EXIT_MS}ms`);
        process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    const snapshot = [...shutdownHandlers.entries()].map(([name, handlers]) => [name, [...handlers]] as const);
    const total = snapshot.reduce((sum, [, handlers]) => sum + handlers.length, 0);
    logger.info(`event: Shutdown: running ${total} handler${total === 1 ? "" : "s"} reason=${reason}`);

    const tasks: Promise<void>[] = [];
    for (const [name, handlers] of snapshot) {
        handlers.forEach((handler, index) => {
            tasks.push(
                Promise.resolve()
                    .then(() => handler())
                    .catch((error: unknown) => {
                        logger.warn({ error }, `event: Shutdown: handler ${name}[${index + 1}] failed`);
                    })
            );
        });
    }
    await Promise.allSettled(tasks);
    clearTimeout(forceExit);
    logger.info("event: Shutdown: complete");
}
