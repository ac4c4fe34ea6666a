export const DEFAULT_PUBLISH_INTERVAL_MINUTES = 5;

/**
 * Next publication boundary strictly after `reference ?? now`, on a grid of
 * `intervalMinutes` aligned to the top of the hour (UTC). Seconds and
 * milliseconds are dropped before rounding up.
 */
export function nextExpected(
    now: Date,
    reference?: Date | null,
    intervalMinutes: number = DEFAULT_PUBLISH_INTERVAL_MINUTES,
): Date {
    if (!Number.isInteger(intervalMinutes) || intervalMinutes < 1) {
        throw new Error("intervalMinutes must be an integer >= 1");
    }
    const from = reference ?? now;
    const intervalMs = intervalMinutes * 60_000;
    const bucket = Math.floor(from.getTime() / intervalMs);
    return new Date((bucket + 1) * intervalMs);
}
