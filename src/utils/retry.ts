export function sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
    /** Total number of attempts, including the first */
    attempts: number;
    /** Fixed delay between attempts (ms) */
    delayMs: number;
    /** Return false to give up at once on this error */
    shouldRetry?: (err: unknown) => boolean;
    /** Called before sleeping ahead of the next attempt */
    onRetry?: (err: unknown, attempt: number) => void;
}

export class RetryExhaustedError extends Error {
    constructor(
        public readonly attempts: number,
        public readonly lastError: unknown,
    ) {
        const message = lastError instanceof Error ? lastError.message : String(lastError);
        super(message);
        this.name = "RetryExhaustedError";
    }
}

/**
 * Run `fn` until it resolves, sleeping a fixed delay between failures.
 * Rejects with a RetryExhaustedError carrying the attempt count and the last error.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const attempts = Math.max(1, options.attempts);

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (err) {
            const retryable = options.shouldRetry ? options.shouldRetry(err) : true;
            if (!retryable || attempt >= attempts) {
                throw new RetryExhaustedError(attempt, err);
            }
            options.onRetry?.(err, attempt);
            await sleep(options.delayMs);
        }
    }
}
