import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

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

type PrettyFactory = (options: Record<string, unknown>) => DestinationStream;

const DEFAULT_REDACT = ["password", "secret", "token", "*.password", "*.secret", "*.token", "dbUrl", "*.dbUrl"];
const MODULE_WIDTH = 18;
const DETAIL_MAX_LENGTH = 160;
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
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

/**
 * Builds the root logger once per process.
 * Expects: overrides only for values that should win over the environment.
 */
export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = loggerBuild(resolveLogConfig(overrides));
    return rootLogger;
}

/** Returns a child logger tagged with the module name, e.g. "scheduler.engine". */
export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: moduleNormalize(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("CADENCE_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (unitTestIs() ? "silent" : isDev ? "debug" : "info");
    const destination =
        overrides.destination ??
        envValue("CADENCE_LOG_DEST") ??
        envValue("LOG_DEST") ??
        (process.stdout.isTTY ? "stderr" : "stdout");
    const forceJson = booleanFlagParse(envValue("CADENCE_LOG_JSON")) ?? booleanFlagParse(envValue("LOG_JSON")) ?? false;
    let format =
        overrides.format ??
        formatParse(envValue("CADENCE_LOG_FORMAT")) ??
        formatParse(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");

    // Files always get machine-readable lines.
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        redact: overrides.redact ?? redactListMerge(DEFAULT_REDACT, envValue("CADENCE_LOG_REDACT")),
        service: overrides.service ?? envValue("CADENCE_LOG_SERVICE") ?? "cadence",
        environment: overrides.environment ?? envValue("NODE_ENV") ?? "development"
    };
}

function loggerBuild(config: LogConfig): Logger {
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

    if (config.format === "pretty") {
        const prettyFactory = prettyFactoryResolve();
        if (prettyFactory) {
            return pino(
                options,
                prettyFactory({
                    colorize: true,
                    translateTime: false,
                    ignore: "pid,hostname,level,service,environment,module",
                    hideObject: true,
                    levelKey: "__level",
                    timestampKey: "__time",
                    messageFormat: formatPrettyMessage,
                    destination: config.destination === "stderr" ? 2 : 1
                })
            );
        }
    }

    const destination = destinationResolve(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders one pretty line: `[HH:mm:ss] [module] message key=value ...`.
 * Fields already spelled out in the message are not repeated.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = logTimeFormat(log.time);
    const module = `[${moduleNormalize(typeof log.module === "string" ? log.module : undefined)
        .slice(0, MODULE_WIDTH)
        .padEnd(MODULE_WIDTH, " ")}]`;
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);

    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        if (message.includes(`${key}=`)) {
            continue;
        }
        details.push(`${key}=${detailValueFormat(key, value)}`);
    }

    const parts = [`[${time}]`, module];
    if (message.length > 0) {
        parts.push(message);
    }
    if (details.length > 0) {
        parts.push(details.join(" "));
    }
    return parts.join(" ");
}

function detailValueFormat(key: string, value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (typeof value === "string") {
        return detailTextFormat(value);
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (value instanceof Error) {
        return detailTextFormat(value.message);
    }
    if (key === "error" && typeof value === "object") {
        return detailTextFormat(errorSummaryBuild(value));
    }
    if (Array.isArray(value)) {
        return detailTextFormat(value.join(","));
    }
    try {
        return detailTextFormat(JSON.stringify(value));
    } catch {
        return detailTextFormat(String(value));
    }
}

function errorSummaryBuild(value: object): string {
    const parts: string[] = [];
    for (const field of ["type", "code", "message"]) {
        const entry: unknown = Reflect.get(value, field);
        if (typeof entry === "string" || typeof entry === "number") {
            parts.push(field === "code" ? `code:${entry}` : String(entry));
        }
    }
    return parts.length > 0 ? parts.join(":") : String(value);
}

function detailTextFormat(value: string): string {
    const truncated = value.length > DETAIL_MAX_LENGTH ? `${value.slice(0, DETAIL_MAX_LENGTH)}...` : value;
    if (truncated.trim().length === 0) {
        return '""';
    }
    return /[=\s]/.test(truncated) ? JSON.stringify(truncated) : truncated;
}

function logTimeFormat(value: unknown): string {
    let date = typeof value === "number" || typeof value === "string" ? new Date(value) : new Date();
    if (Number.isNaN(date.getTime())) {
        date = new Date();
    }
    const pad = (input: number) => String(input).padStart(2, "0");
    return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function moduleNormalize(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function destinationResolve(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function prettyFactoryResolve(): PrettyFactory | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        // Optional at runtime.
        return null;
    }
}

function formatParse(value: string | null): LogFormat | null {
    const normalized = value?.trim().toLowerCase();
    if (normalized === "pretty" || normalized === "json") {
        return normalized;
    }
    return null;
}

function booleanFlagParse(value: string | null): boolean | null {
    const normalized = value?.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const trimmed = process.env[key]?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : null;
}

function redactListMerge(base: string[], extra: string | null): string[] {
    if (!extra) {
        return [...base];
    }
    const additions = extra
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    return [...new Set([...base, ...additions])];
}

function unitTestIs(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
