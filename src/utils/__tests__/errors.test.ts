import {
    AppError,
    canContinueAfter,
    ErrorCategory,
    ErrorCode,
    errorMessage,
    isRecoverable,
    isTransient,
    toAppError,
    wrapSocketError,
} from "../errors";

function socketError(code: string, message: string): Error {
    return Object.assign(new Error(message), { code });
}

describe("AppError", () => {
    it("serializes all expected fields in toJSON", () => {
        const error = new AppError(
            ErrorCode.LIBRARY_QUERY_FAILED,
            ErrorCategory.RECOVERABLE,
            "find failed",
            { artist: "Nina" }
        );

        expect(error).toBeInstanceOf(Error);
        expect(error.toJSON()).toEqual({
            name: "AppError",
            code: ErrorCode.LIBRARY_QUERY_FAILED,
            category: ErrorCategory.RECOVERABLE,
            message: "find failed",
            details: { artist: "Nina" },
        });
    });
});

describe("error classification", () => {
    it("recognizes recoverable and transient AppErrors only", () => {
        const recoverable = new AppError(
            ErrorCode.DAEMON_COMMAND_FAILED,
            ErrorCategory.RECOVERABLE,
            "rejected"
        );
        const transient = new AppError(
            ErrorCode.DAEMON_TIMEOUT,
            ErrorCategory.TRANSIENT,
            "timed out"
        );

        expect(isRecoverable(recoverable)).toBe(true);
        expect(isRecoverable(transient)).toBe(false);
        expect(isTransient(transient)).toBe(true);
        expect(isTransient(new Error("plain"))).toBe(false);
        expect(isRecoverable("nope")).toBe(false);
    });

    it("lets callers continue after recoverable and transient errors only", () => {
        const fatal = new AppError(
            ErrorCode.CATALOG_FETCH_FAILED,
            ErrorCategory.FATAL,
            "gave up"
        );

        expect(
            canContinueAfter(
                new AppError(ErrorCode.DAEMON_COMMAND_FAILED, ErrorCategory.RECOVERABLE, "rejected")
            )
        ).toBe(true);
        expect(
            canContinueAfter(
                new AppError(ErrorCode.DAEMON_TIMEOUT, ErrorCategory.TRANSIENT, "timed out")
            )
        ).toBe(true);
        expect(canContinueAfter(fatal)).toBe(false);
        expect(canContinueAfter(new TypeError("undefined is not a function"))).toBe(false);
    });

    it("extracts messages from anything thrown", () => {
        expect(errorMessage(new Error("boom"))).toBe("boom");
        expect(errorMessage("text")).toBe("text");
        expect(errorMessage(42)).toBe("42");
    });
});

describe("wrapSocketError", () => {
    it.each([
        ["ECONNREFUSED", ErrorCode.DAEMON_UNREACHABLE, "Daemon unreachable: localhost:6600"],
        ["ENOTFOUND", ErrorCode.DAEMON_UNREACHABLE, "Daemon unreachable: localhost:6600"],
        ["ETIMEDOUT", ErrorCode.DAEMON_TIMEOUT, "Daemon timed out: localhost:6600"],
        ["ECONNRESET", ErrorCode.DAEMON_CONNECTION_CLOSED, "Daemon connection closed: localhost:6600"],
        ["EPIPE", ErrorCode.DAEMON_CONNECTION_CLOSED, "Daemon connection closed: localhost:6600"],
    ])("maps %s to a transient %s", (code, expectedCode, message) => {
        const wrapped = wrapSocketError(socketError(code, "socket failure"), "localhost:6600");

        expect(wrapped).toMatchObject({
            code: expectedCode,
            category: ErrorCategory.TRANSIENT,
            message,
            details: { originalError: "socket failure", code },
        });
    });

    it("treats unknown failures as recoverable protocol errors", () => {
        const wrapped = wrapSocketError(new Error("weird"), "status");

        expect(wrapped).toMatchObject({
            code: ErrorCode.PROTOCOL_ERROR,
            category: ErrorCategory.RECOVERABLE,
            message: "Daemon request failed: status",
            details: { originalError: "weird" },
        });
    });

    it("passes AppErrors through unchanged", () => {
        const original = new AppError(
            ErrorCode.PROTOCOL_ERROR,
            ErrorCategory.FATAL,
            "Malformed response line: x"
        );

        expect(wrapSocketError(original, "ignored")).toBe(original);
    });
});

describe("toAppError", () => {
    it("wraps plain errors under the given code as recoverable", () => {
        const wrapped = toAppError(
            new Error("timeout"),
            "Failed to list album artists",
            ErrorCode.LIBRARY_QUERY_FAILED
        );

        expect(wrapped).toBeInstanceOf(AppError);
        expect(wrapped.toJSON()).toEqual({
            name: "AppError",
            code: ErrorCode.LIBRARY_QUERY_FAILED,
            category: ErrorCategory.RECOVERABLE,
            message: "Failed to list album artists: timeout",
            details: { originalError: "timeout" },
        });
    });

    it("accepts an explicit category and non-Error values", () => {
        const wrapped = toAppError(
            "no reply",
            "Failed to force rate",
            ErrorCode.RATE_CONTROL_FAILED,
            ErrorCategory.TRANSIENT
        );

        expect(wrapped).toMatchObject({
            code: ErrorCode.RATE_CONTROL_FAILED,
            category: ErrorCategory.TRANSIENT,
            message: "Failed to force rate: no reply",
        });
    });

    it("passes AppErrors through unchanged", () => {
        const original = new AppError(
            ErrorCode.DAEMON_CONNECTION_CLOSED,
            ErrorCategory.TRANSIENT,
            "Connection to MPD closed"
        );

        expect(toAppError(original, "ignored", ErrorCode.LIBRARY_QUERY_FAILED)).toBe(original);
    });
});
