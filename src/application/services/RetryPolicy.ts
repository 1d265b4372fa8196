import { UpstreamError } from '../../domain/errors/ConversationErrors';

/**
 * Bounded retry for upstream calls.
 *
 * Used by the controller only: the generation client itself never retries.
 */
export interface RetryOptions {
    /** Maximum number of attempts, first call included (default: 2) */
    maxAttempts?: number;
    /** Delay before the first retry in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Maximum delay in milliseconds (default: 10000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Decides whether an error is worth another attempt (default: transient upstream errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Called before each retry */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 2,
    initialBackoffMs: 1000,
    maxBackoffMs: 10000,
    backoffMultiplier: 2,
    isRetryable: isTransientUpstreamError,
    onRetry: () => { },
};

/**
 * Runs fn, retrying retryable failures with exponential backoff.
 * @throws The last error once attempts are exhausted or the error is not retryable
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= opts.maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const delay = Math.min(currentBackoff, opts.maxBackoffMs);
            opts.onRetry(attempt, error, delay);
            await sleep(delay);
            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Network errors, timeouts, 429 and 5xx responses.
 */
export function isTransientUpstreamError(error: unknown): boolean {
    return error instanceof UpstreamError && error.retryable;
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
