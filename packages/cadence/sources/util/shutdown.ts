import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;
export type ShutdownReason = NodeJS.Signals | "fatal";

const FORCE_EXIT_MS = 5_000;
const logger = getLogger("shutdown");

const handlers = new Map<string, ShutdownHandler[]>();
let requested: ShutdownReason | null = null;
let completion: Promise<void> | null = null;
let waiter: Promise<ShutdownReason> | null = null;

/**
 * Registers a named handler that runs once on shutdown.
 * Returns: a function that unregisters it.
 */
export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    const list = handlers.get(name) ?? [];
    list.push(handler);
    handlers.set(name, list);

    return () => {
        const current = handlers.get(name);
        if (!current) {
            return;
        }
        const next = current.filter((entry) => entry !== handler);
        if (next.length > 0) {
            handlers.set(name, next);
        } else {
            handlers.delete(name);
        }
    };
}

export function isShutdown(): boolean {
    return requested !== null;
}

/**
 * Resolves after SIGINT/SIGTERM (or requestShutdown) once every handler has settled.
 */
export function awaitShutdown(): Promise<ShutdownReason> {
    if (!waiter) {
        waiter = new Promise<ShutdownReason>((resolve) => {
            const onSignal = (signal: NodeJS.Signals) => {
                requestShutdown(signal)
                    .then(() => resolve(signal))
                    .catch((error: unknown) => {
                        logger.warn({ error }, "error: Shutdown failed");
                        resolve(signal);
                    });
            };
            process.once("SIGINT", onSignal);
            process.once("SIGTERM", onSignal);
        });
    }
    return waiter;
}

/** Runs every registered handler once; later calls return the first run. */
export function requestShutdown(reason: ShutdownReason = "SIGTERM"): Promise<void> {
    if (!completion) {
        requested = reason;
        completion = handlersRun(reason);
    }
    return completion;
}

async function handlersRun(reason: ShutdownReason): Promise<void> {
    const forceExit = setTimeout(() => {
        logger.warn({ timeoutMs: FORCE_EXIT_MS }, "event: Shutdown handlers timed out, forcing exit");
        process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    const snapshot = Array.from(handlers.entries()).flatMap(([name, list]) =>
        list.map((handler) => ({ name, handler }))
    );
    logger.info({ reason, handlers: snapshot.length }, "event: Shutdown started");

    const startedAt = Date.now();
    await Promise.allSettled(
        snapshot.map(({ name, handler }) =>
            Promise.resolve()
                .then(() => handler())
                .catch((error: unknown) => {
                    logger.warn({ name, error }, "error: Shutdown handler failed");
                })
        )
    );
    clearTimeout(forceExit);
    logger.info({ elapsedMs: Date.now() - startedAt }, "event: Shutdown complete");
}
