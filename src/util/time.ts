export function toIso(ts?: Date | null): string | undefined {
    if (!ts || Number.isNaN(ts.getTime())) return undefined;
    return ts.toISOString();
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
