import * as fs from "fs";
import { format } from "util";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

type EmittingLevel = Exclude<LogLevel, "silent">;
type LogMethod = (message: string, ...args: unknown[]) => void;

export interface Logger {
    debug: LogMethod;
    info: LogMethod;
    warn: LogMethod;
    error: LogMethod;
    child: (scope: string) => Logger;
}

/** Receives a rendered prefix plus the normalized arguments that follow it. */
type LogSink = (level: EmittingLevel, prefix: string, payload: unknown[]) => void;

const SEVERITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return value in SEVERITY;
}

// Unset falls back to the environment default; an unknown name silences output.
function thresholdFromEnv(env: NodeJS.ProcessEnv): LogLevel {
    const configured = env.LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        return env.NODE_ENV === "production" ? "warn" : "debug";
    }
    return isLogLevel(configured) ? configured : "silent";
}

const consoleSink: LogSink = (level, prefix, payload) => {
    console[level](prefix, ...payload);
};

function fileSink(path: string): LogSink {
    return (_level, prefix, payload) => {
        const line = `${new Date().toISOString()} ${format(prefix, ...payload)}\n`;
        try {
            fs.appendFileSync(path, line);
        } catch (error) {
            console.error(`[ERROR] Failed to write log file ${path}:`, error);
        }
    };
}

const threshold = thresholdFromEnv(process.env);

// The terminal belongs to the UI while it runs, so a configured LOG_FILE
// takes every line.
const logFile = process.env.LOG_FILE?.trim();
const sink: LogSink = logFile ? fileSink(logFile) : consoleSink;

function serializeError(value: unknown): unknown {
    return value instanceof Error
        ? { name: value.name, message: value.message, stack: value.stack }
        : value;
}

function isContextObject(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error) &&
        !Buffer.isBuffer(value)
    );
}

/**
 * A leading plain object is structured context and has its error values
 * serialized; every other argument is passed on, errors serialized.
 */
function toPayload(args: unknown[]): unknown[] {
    return args.map((arg, position) => {
        if (position === 0 && isContextObject(arg)) {
            return Object.fromEntries(
                Object.entries(arg).map(([key, value]) => [key, serializeError(value)])
            );
        }
        return serializeError(arg);
    });
}

function write(level: EmittingLevel, scope: string | null, message: string, args: unknown[]): void {
    if (SEVERITY[level] < SEVERITY[threshold]) {
        return;
    }
    const tag = `[${level.toUpperCase()}]`;
    const prefix = scope ? `${tag} [${scope}] ${message}` : `${tag} ${message}`;
    sink(level, prefix, toPayload(args));
}

export function createLogger(scope?: string): Logger {
    const name = scope?.trim() || null;
    const method =
        (level: EmittingLevel): LogMethod =>
        (message, ...args) =>
            write(level, name, message, args);

    return {
        debug: method("debug"),
        info: method("info"),
        warn: method("warn"),
        error: method("error"),
        child: (childScope) => {
            const suffix = childScope.trim();
            return createLogger(name ? `${name}.${suffix}` : suffix);
        },
    };
}

/** Logs start, completion and failure of `run`, each with its duration. */
export async function withLogTiming<T>(
    log: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {}
): Promise<T> {
    const startedAt = Date.now();
    const elapsed = () => ({ ...context, durationMs: Date.now() - startedAt });

    log.debug(`${operation} started`, context);
    try {
        const result = await run();
        log.debug(`${operation} completed`, elapsed());
        return result;
    } catch (error) {
        log.error(`${operation} failed`, { ...elapsed(), error });
        throw error;
    }
}

export function logErrorWithContext(
    log: Logger,
    message: string,
    error: unknown,
    context: LogContext = {}
): void {
    log.error(message, { ...context, error });
}

export const logger = createLogger();
