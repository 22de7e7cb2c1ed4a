/**
 * src/utils/retry.ts
 *
 * Explicit retry policy used by every call that crosses the network.
 *
 * Backoff formula:
 *   delay(attempt) = min(initialMs × 2^(attempt - 1), maxMs)
 *
 * `attempt` is 1-indexed and refers to the attempt that just failed, so with
 * the defaults a three-attempt call waits 1s, then 2s, and gives up.
 */

import { log } from 'crawlee';
import { errorMessage } from './errors.js';

export type BackoffSchedule = (attempt: number) => number;

export interface RetryPolicy {
    maxAttempts: number;
    backoff: BackoffSchedule;
    /** Return false to surface the error immediately. Defaults to always retrying. */
    shouldRetry?: (err: unknown) => boolean;
    /** Injected for tests. */
    sleep?: (ms: number) => Promise<void>;
    label?: string;
}

export function exponentialBackoff(initialMs: number = 1000, maxMs: number = 10_000): BackoffSchedule {
    return (attempt) => Math.min(initialMs * Math.pow(2, Math.max(attempt - 1, 0)), maxMs);
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
    const wait = policy.sleep ?? sleep;
    const label = policy.label ?? 'Retry';
    let lastError: unknown = new Error(`${label}: no attempts were made`);

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        try {
            return await operation(attempt);
        } catch (err) {
            lastError = err;
            const retryable = policy.shouldRetry ? policy.shouldRetry(err) : true;
            if (!retryable || attempt >= policy.maxAttempts) {
                break;
            }

            const waitMs = policy.backoff(attempt);
            log.warning(
                `[${label}] Attempt ${attempt}/${policy.maxAttempts} failed: ${errorMessage(err)}. ` +
                `Retrying in ${Math.round(waitMs / 1000)}s...`
            );
            await wait(waitMs);
        }
    }

    throw lastError;
}
