import { AppError, ErrorCategory, ErrorCode } from "../errors";
import { backoffDelay, isRetryableError, withRetry } from "../retry";

describe("retry", () => {
    it("doubles the delay for every attempt", () => {
        expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, 250))).toEqual([
            250, 500, 1000, 2000,
        ]);
    });

    it("retries socket failures but not daemon rejections", () => {
        expect(isRetryableError(new Error("socket hang up"))).toBe(true);
        expect(
            isRetryableError(
                new AppError(ErrorCode.DAEMON_TIMEOUT, ErrorCategory.TRANSIENT, "timed out")
            )
        ).toBe(true);
        expect(
            isRetryableError(
                new AppError(ErrorCode.DAEMON_COMMAND_FAILED, ErrorCategory.RECOVERABLE, "no")
            )
        ).toBe(false);
        expect(
            isRetryableError(
                new AppError(ErrorCode.PROTOCOL_ERROR, ErrorCategory.FATAL, "garbage")
            )
        ).toBe(false);
    });

    it("returns the first successful result", async () => {
        const operation = jest
            .fn<Promise<string>, [number]>()
            .mockRejectedValueOnce(new Error("flaky"))
            .mockResolvedValueOnce("ok");
        const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);

        await expect(
            withRetry(operation, { maxAttempts: 3, baseDelayMs: 100, sleep })
        ).resolves.toBe("ok");
        expect(operation.mock.calls).toEqual([[1], [2]]);
        expect(sleep.mock.calls).toEqual([[100]]);
    });

    it("rethrows the last error once attempts run out", async () => {
        const operation = jest
            .fn<Promise<string>, [number]>()
            .mockImplementation(async (attempt) => {
                throw new Error(`failure ${attempt}`);
            });
        const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);

        await expect(
            withRetry(operation, { maxAttempts: 3, baseDelayMs: 1000, sleep })
        ).rejects.toThrow("failure 3");
        expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it("stops at once when the error is not worth retrying", async () => {
        const operation = jest
            .fn<Promise<string>, [number]>()
            .mockRejectedValue(new Error("bad input"));
        const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);

        await expect(
            withRetry(operation, {
                maxAttempts: 5,
                baseDelayMs: 10,
                sleep,
                shouldRetry: () => false,
            })
        ).rejects.toThrow("bad input");
        expect(operation).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });
});
