import dotenv from "dotenv";
import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import {
    isEnvFlagEnabled,
    parseEnvCsv,
    parseEnvInt,
} from "./utils/envParsers";

dotenv.config();

const positiveInt = z.number().int().positive();

const configSchema = z.object({
    nodeEnv: z.enum(["development", "production", "test"]),
    mpd: z.object({
        host: z.string().min(1, "MPD_HOST is required"),
        port: z.number().int().min(1).max(65535),
        timeoutMs: positiveInt,
        binaryLimit: z.number().int().min(64),
    }),
    library: z.object({
        loadMode: z.enum(["eager", "lazy"]),
        maxAttempts: positiveInt,
        retryBaseDelayMs: z.number().int().nonnegative(),
    }),
    cover: z.object({
        maxEntries: positiveInt,
        fetchConcurrency: positiveInt,
        prefetchAhead: z.number().int().nonnegative(),
        prefetchBehind: z.number().int().nonnegative(),
    }),
    playback: z.object({
        pollIntervalMs: positiveInt,
        volumeStep: z.number().int().min(1).max(100),
        seekStepSeconds: positiveInt,
    }),
    bitPerfect: z.object({
        enabled: z.boolean(),
        rates: z.array(positiveInt).optional(),
    }),
});

export type AppConfig = z.infer<typeof configSchema>;

function parseRates(value: string | undefined): number[] | undefined {
    return parseEnvCsv(value)?.map((entry) => Number.parseInt(entry, 10));
}

/** Builds and validates runtime configuration from an environment map. */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
    const candidate = {
        nodeEnv: env.NODE_ENV || "development",
        mpd: {
            host: env.MPD_HOST?.trim() || "127.0.0.1",
            port: parseEnvInt(env.MPD_PORT, 6600),
            timeoutMs: parseEnvInt(env.MPD_TIMEOUT_MS, 5000),
            binaryLimit: parseEnvInt(env.MPD_BINARY_LIMIT, 1024 * 1024),
        },
        library: {
            loadMode: env.LIBRARY_LOAD_MODE?.trim().toLowerCase() || "lazy",
            maxAttempts: parseEnvInt(env.LIBRARY_MAX_ATTEMPTS, 3),
            retryBaseDelayMs: parseEnvInt(env.LIBRARY_RETRY_BASE_MS, 1000),
        },
        cover: {
            maxEntries: parseEnvInt(env.COVER_CACHE_MAX_ENTRIES, 256),
            fetchConcurrency: parseEnvInt(env.COVER_FETCH_CONCURRENCY, 4),
            prefetchAhead: parseEnvInt(env.PREFETCH_AHEAD, 1),
            prefetchBehind: parseEnvInt(env.PREFETCH_BEHIND, 1),
        },
        playback: {
            pollIntervalMs: parseEnvInt(env.POLL_INTERVAL_MS, 250),
            volumeStep: parseEnvInt(env.VOLUME_STEP, 5),
            seekStepSeconds: parseEnvInt(env.SEEK_STEP_SECONDS, 5),
        },
        bitPerfect: {
            enabled: isEnvFlagEnabled(env.BIT_PERFECT),
            rates: parseRates(env.BIT_PERFECT_RATES),
        },
    };

    const result = configSchema.safeParse(candidate);
    if (!result.success) {
        const issues = result.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
        );
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Invalid configuration: ${issues.join("; ")}`,
            { issues }
        );
    }

    return result.data;
}

/** Centralized runtime configuration, resolved once from the process environment. */
export const config: AppConfig = parseConfig(process.env);
