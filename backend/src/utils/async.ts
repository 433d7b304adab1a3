/**
 * Async utilities: chunking, cancellable sleeps and retry with backoff
 */

import { logger } from "./logger";

/**
 * Split array into chunks of specified size
 */
export function chunkArray<T>(array: T[], size: number): T[][] {
    if (size <= 0) throw new Error("Chunk size must be positive");
    const chunks: T[][] = [];
    for (let i = 0; i < array.length; i += size) {
        chunks.push(array.slice(i, i + size));
    }
    return chunks;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Never rejects: callers
 * check `signal.aborted` themselves.
 */
export const sleep: Sleep = (ms, signal) =>
    new Promise<void>((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });

/**
 * Exponential backoff: base * 2^attempt, attempt counted from 0
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
    return baseDelayMs * Math.pow(2, attempt);
}

export interface RetryOptions {
    /** Retries after the first attempt */
    retries?: number;
    baseDelayMs?: number;
    isRetryable?: (error: unknown) => boolean;
    sleep?: Sleep;
    /** Used in log lines */
    operation?: string;
}

/**
 * Retry `fn` with exponential backoff. Errors rejected by `isRetryable` and
 * the error of the final attempt are re-thrown as-is.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const retries = options.retries ?? 3;
    const baseDelayMs = options.baseDelayMs ?? 1000;
    const isRetryable = options.isRetryable ?? (() => true);
    const wait = options.sleep ?? sleep;
    const operation = options.operation ?? "operation";

    for (let attempt = 0; ; attempt++) {
        try {
            return await fn();
        } catch (err) {
            if (!isRetryable(err) || attempt >= retries) throw err;
            const delay = backoffDelay(baseDelayMs, attempt);
            logger.warn(
                `${operation} failed (attempt ${attempt + 1}/${retries + 1}), retrying in ${delay}ms: ${
                    err instanceof Error ? err.message : String(err)
                }`
            );
            await wait(delay);
        }
    }
}
