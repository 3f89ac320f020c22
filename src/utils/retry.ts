import { logger } from "./logger";
import { AppError, errorMessage, isTransient } from "./errors";

export interface RetryOptions {
    /** Total attempts, including the first one. */
    maxAttempts: number;
    /** Delay before the second attempt; doubles for every later one. */
    baseDelayMs: number;
    label?: string;
    shouldRetry?: (error: unknown) => boolean;
    sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Exponential backoff: base, 2×base, 4×base, … for attempts 1, 2, 3, … */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
    return baseDelayMs * Math.pow(2, attempt - 1);
}

/** Socket-level failures and unknown errors are worth another try; daemon rejections are not. */
export function isRetryableError(error: unknown): boolean {
    return isTransient(error) || !(error instanceof AppError);
}

export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const shouldRetry = options.shouldRetry ?? isRetryableError;
    const wait = options.sleep ?? sleep;
    const label = options.label ?? "operation";

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (attempt >= options.maxAttempts || !shouldRetry(error)) {
                throw error;
            }

            const delay = backoffDelay(attempt, options.baseDelayMs);
            logger.warn(
                `${label} failed (attempt ${attempt}/${options.maxAttempts}) - retrying in ${delay}ms: ${errorMessage(error)}`
            );
            await wait(delay);
        }
    }
}
