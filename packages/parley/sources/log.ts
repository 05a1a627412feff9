import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import type { PrettyOptions } from "pino-pretty";

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

type PrettyFactory = (options: PrettyOptions) => DestinationStream;

const DEFAULT_REDACT = ["apiKey", "token", "password", "secret", "*.apiKey", "*.token", "*.password", "*.secret"];
const MODULE_WIDTH = 18;
const nodeRequire = createRequire(import.meta.url);

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
    const isUnitTest = process.env.VITEST !== undefined;
    const level =
        overrides.level ??
        envValue("PARLEY_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTest ? "silent" : isDev ? "debug" : "info");
    const destination =
        overrides.destination ??
        envValue("PARLEY_LOG_DEST") ??
        envValue("LOG_DEST") ??
        (process.stdout.isTTY ? "stderr" : "stdout");
    let format =
        overrides.format ??
        parseFormat(envValue("PARLEY_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (isDev ? "pretty" : "json");
    const service = overrides.service ?? envValue("PARLEY_LOG_SERVICE") ?? "parley";
    const environment = overrides.environment ?? envValue("NODE_ENV") ?? "development";

    // Files always get machine-readable lines.
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    const redact = overrides.redact ?? mergeRedactList(DEFAULT_REDACT, envValue("PARLEY_LOG_REDACT"));

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
        const prettyFactory = resolvePrettyFactory();
        if (!prettyFactory) {
            return destination ? pino(options, destination) : pino(options);
        }
        const prettyStream = prettyFactory({
            colorize: !process.env.NO_COLOR,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname,service,environment,module",
            messageFormat: formatPrettyMessage,
            singleLine: true,
            destination: config.destination === "stderr" ? 2 : 1
        });
        return pino(options, prettyStream);
    }

    return destination ? pino(options, destination) : pino(options);
}

/**
 * Prefixes each pretty line with a fixed-width module label.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const moduleName = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const label = moduleName.length > MODULE_WIDTH ? moduleName.slice(0, MODULE_WIDTH) : moduleName.padEnd(MODULE_WIDTH);
    const message = log[messageKey];
    const text = message === undefined || message === null ? "" : String(message);
    return `[${label}] ${text}`;
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

function resolvePrettyFactory(): PrettyFactory | null {
    let loaded: unknown;
    try {
        loaded = nodeRequire("pino-pretty");
    } catch {
        return null;
    }
    return isPrettyFactory(loaded) ? loaded : null;
}

function isPrettyFactory(value: unknown): value is PrettyFactory {
    return typeof value === "function";
}

function parseFormat(value: string | null): LogFormat | null {
    const normalized = value?.trim().toLowerCase();
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
