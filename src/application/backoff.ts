import { sleep } from "../util/time.js";

export function computeRetryDelayMs(
    attempt: number,
    baseDelayMs: number,
    maxDelayMs = 60_000,
): number {
    // base, 2*base, 3*base, ... capped
    return Math.min(maxDelayMs, Math.max(0, baseDelayMs) * Math.max(1, attempt));
}

export interface RetryOptions {
    attempts: number;
    baseDelayMs: number;
    maxDelayMs?: number;
    onRetry?: (ctx: { attempt: number; attempts: number; delayMs: number; error: unknown }) => void;
    onGiveUp?: (ctx: { attempts: number; error: unknown }) => void;
    sleepFn?: (ms: number) => Promise<void>;
}

/** Runs `fn` up to `attempts` times, waiting longer after each failure. Rethrows the last error. */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    opts: RetryOptions,
): Promise<T> {
    const attempts = Math.max(1, opts.attempts);
    const wait = opts.sleepFn ?? sleep;
    let attempt = 1;
    while (true) {
        try {
            return await fn(attempt);
        } catch (e) {
            if (attempt >= attempts) {
                opts.onGiveUp?.({ attempts, error: e });
                throw e;
            }
            const delayMs = computeRetryDelayMs(
                attempt,
                opts.baseDelayMs,
                opts.maxDelayMs,
            );
            opts.onRetry?.({ attempt, attempts, delayMs, error: e });
            await wait(delayMs);
            attempt += 1;
        }
    }
}
