import { createLimiter } from "../util/limiter.js";
import { logger } from "../logger.js";

export type ItemOutcome<R> =
    | { ok: true; value: R }
    | { ok: false; error: unknown };

export interface DispatchOptions {
    concurrency: number;
    /** Shown in logs, e.g. "primary" or "forecast". */
    label?: string;
}

/**
 * Runs `worker` over every item on a bounded pool. All items are submitted up
 * front; the returned map is filled in completion order. A failing item is
 * recorded as `{ ok: false }` and never cancels or discards its siblings.
 */
export async function dispatch<T, R>(
    items: readonly T[],
    worker: (item: T) => Promise<R>,
    opts: DispatchOptions,
): Promise<Map<T, ItemOutcome<R>>> {
    const limit = createLimiter(opts.concurrency);
    const outcomes = new Map<T, ItemOutcome<R>>();
    if (!items.length) return outcomes;

    const startedAt = Date.now();
    await Promise.all(
        items.map((item) =>
            limit(() => worker(item)).then(
                (value) => {
                    outcomes.set(item, { ok: true, value });
                },
                (error: unknown) => {
                    outcomes.set(item, { ok: false, error });
                },
            ),
        ),
    );

    const failed = countFailures(outcomes);
    logger.debug("Batch finished", {
        component: "BatchDispatcher",
        action: "dispatch",
        label: opts.label,
        items: items.length,
        failed,
        workers: opts.concurrency,
        tookMs: Date.now() - startedAt,
    });
    return outcomes;
}

export function countFailures<T, R>(
    outcomes: ReadonlyMap<T, ItemOutcome<R>>,
): number {
    let failed = 0;
    for (const outcome of outcomes.values()) {
        if (!outcome.ok) failed += 1;
    }
    return failed;
}
