/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can carry on
    TRANSIENT = "TRANSIENT", // Retry might succeed
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Daemon connection errors
    DAEMON_UNREACHABLE = "DAEMON_UNREACHABLE",
    DAEMON_TIMEOUT = "DAEMON_TIMEOUT",
    DAEMON_CONNECTION_CLOSED = "DAEMON_CONNECTION_CLOSED",
    DAEMON_COMMAND_FAILED = "DAEMON_COMMAND_FAILED",
    PROTOCOL_ERROR = "PROTOCOL_ERROR",

    // Library errors
    CATALOG_FETCH_FAILED = "CATALOG_FETCH_FAILED",
    LIBRARY_QUERY_FAILED = "LIBRARY_QUERY_FAILED",
    ARTIST_INDEX_OUT_OF_RANGE = "ARTIST_INDEX_OUT_OF_RANGE",

    // Audio device errors
    RATE_CONTROL_FAILED = "RATE_CONTROL_FAILED",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

/**
 * Check if an error is recoverable
 */
export function isRecoverable(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.RECOVERABLE;
    }
    return false;
}

/**
 * Check if an error is transient
 */
export function isTransient(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.TRANSIENT;
    }
    return false;
}

/**
 * A caller can carry on after recoverable and transient failures. Anything
 * unclassified is treated as fatal.
 */
export function canContinueAfter(error: unknown): boolean {
    return isRecoverable(error) || isTransient(error);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Classify an arbitrary thrown value. AppErrors keep their own code and
 * category; anything else is wrapped under the given code.
 */
export function toAppError(
    error: unknown,
    context: string,
    code: ErrorCode,
    category: ErrorCategory = ErrorCategory.RECOVERABLE
): AppError {
    if (error instanceof AppError) {
        return error;
    }
    return new AppError(code, category, `${context}: ${errorMessage(error)}`, {
        originalError: errorMessage(error),
    });
}

function nodeErrorCode(error: unknown): string | undefined {
    if (typeof error !== "object" || error === null || !("code" in error)) {
        return undefined;
    }
    const { code } = error;
    return typeof code === "string" ? code : undefined;
}

/**
 * Wrap a socket-level Node.js error in an AppError
 */
export function wrapSocketError(err: unknown, context: string): AppError {
    if (err instanceof AppError) {
        return err;
    }

    const code = nodeErrorCode(err);
    const originalError = errorMessage(err);

    if (code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "EHOSTUNREACH") {
        return new AppError(
            ErrorCode.DAEMON_UNREACHABLE,
            ErrorCategory.TRANSIENT,
            `Daemon unreachable: ${context}`,
            { originalError, code }
        );
    }

    if (code === "ETIMEDOUT") {
        return new AppError(
            ErrorCode.DAEMON_TIMEOUT,
            ErrorCategory.TRANSIENT,
            `Daemon timed out: ${context}`,
            { originalError, code }
        );
    }

    if (code === "ECONNRESET" || code === "EPIPE") {
        return new AppError(
            ErrorCode.DAEMON_CONNECTION_CLOSED,
            ErrorCategory.TRANSIENT,
            `Daemon connection closed: ${context}`,
            { originalError, code }
        );
    }

    return new AppError(
        ErrorCode.PROTOCOL_ERROR,
        ErrorCategory.RECOVERABLE,
        `Daemon request failed: ${context}`,
        { originalError }
    );
}
