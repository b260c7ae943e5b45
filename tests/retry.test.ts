import { describe, it, expect } from "vitest";
import { retry, RetryExhaustedError } from "../src/utils/retry.js";

describe("retry", () => {
    it("should return the first successful result", async () => {
        const seen: number[] = [];
        const result = await retry(
            async (attempt) => {
                seen.push(attempt);
                if (attempt < 3) throw new Error(`fail ${attempt}`);
                return "ok";
            },
            { attempts: 5, delayMs: 0 },
        );

        expect(result).toBe("ok");
        expect(seen).toEqual([1, 2, 3]);
    });

    it("should report the attempt count and last error when exhausted", async () => {
        const error = await retry(
            async (attempt) => {
                throw new Error(`fail ${attempt}`);
            },
            { attempts: 2, delayMs: 0 },
        ).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RetryExhaustedError);
        if (error instanceof RetryExhaustedError) {
            expect(error.attempts).toBe(2);
            expect(error.message).toBe("fail 2");
        }
    });

    it("should stop at once when the error is not retryable", async () => {
        const retried: number[] = [];
        const error = await retry(
            async () => {
                throw new Error("forbidden");
            },
            { attempts: 10, delayMs: 0, shouldRetry: () => false, onRetry: (_err, n) => retried.push(n) },
        ).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RetryExhaustedError);
        expect(retried).toEqual([]);
    });
});
