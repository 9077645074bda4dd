/**
 * Retry and polling utilities.
 *
 * withRetry wraps transient vendor failures with exponential backoff.
 * pollUntil drives "submit, then check until ready" vendor jobs with a hard deadline.
 */

import axios from 'axios';
import { TimeoutError } from '../../domain/errors';

export interface RetryOptions {
    /** Maximum number of attempts (default: 3) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 30000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Optional jitter to add randomness (0-1, default: 0.1) */
    jitter?: number;
    /** Function to determine if error is retryable (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Callback for each retry attempt */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: () => true,
    onRetry: () => { }
};

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @throws The last error if all retries fail
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= opts.maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
            const delay = Math.max(0, Math.min(currentBackoff + jitterAmount, opts.maxBackoffMs));

            opts.onRetry(attempt, error, delay);
            await sleep(delay);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Check if an HTTP error is retryable based on status code.
 * Rate limits (429), server errors (5xx) and network errors (no response) are retried.
 */
export function isRetryableHttpError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
        return false;
    }

    const status = error.response?.status;
    if (status === undefined) {
        return true;
    }
    return status === 429 || (status >= 500 && status < 600);
}

export type PollResult<T> = { done: true; value: T } | { done: false };

export interface PollOptions {
    /** Delay between checks */
    intervalMs: number;
    /** Hard deadline measured from the first check */
    timeoutMs: number;
    /** Used in logs and in the TimeoutError message */
    label: string;
    /** Called after every unfinished check */
    onPending?: (attempt: number, elapsedMs: number) => void;
}

/**
 * Repeats `check` until it reports done or the deadline passes.
 * Errors thrown by `check` propagate immediately.
 *
 * @throws TimeoutError when `timeoutMs` elapses first
 */
export async function pollUntil<T>(
    check: () => Promise<PollResult<T>>,
    options: PollOptions
): Promise<T> {
    const startedAt = Date.now();

    for (let attempt = 1; ; attempt++) {
        const result = await check();
        if (result.done) {
            return result.value;
        }

        const elapsed = Date.now() - startedAt;
        options.onPending?.(attempt, elapsed);

        const remaining = options.timeoutMs - elapsed;
        if (remaining <= 0) {
            throw new TimeoutError(options.label, options.timeoutMs);
        }

        await sleep(Math.min(options.intervalMs, remaining));
    }
}

/**
 * Helper to sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
