import path from "node:path";

export const PRIMARY_VARIANTS = ["overlay", "overlay2x"] as const;
export const FORECAST_VARIANTS = ["overlay", "overlay2x"] as const;
export const DERIVED_VARIANTS = [
    "overlay_extended",
    "overlay2x_extended",
] as const;

const TIMESTAMP_PATTERN = /(\d{8})(\d{6})/;
const GENERATION_PATTERN = /(\d{8})\.(\d{4})/;
const OUTPUT_PATTERN = /^radar_(\d{8})_(\d{4})_/;
const FORECAST_OUTPUT_PATTERN = /^radar_\d{8}_\d{4}_forecast_fct\d+_/;

function pad(value: number, width = 2): string {
    return String(value).padStart(width, "0");
}

function utcDate(
    date: string,
    hh: string,
    mm: string,
    ss: string,
): Date | null {
    const year = Number(date.slice(0, 4));
    const month = Number(date.slice(4, 6));
    const day = Number(date.slice(6, 8));
    const hours = Number(hh);
    const minutes = Number(mm);
    const seconds = Number(ss);
    const value = new Date(
        Date.UTC(year, month - 1, day, hours, minutes, seconds),
    );
    // Date.UTC rolls invalid fields over (month 13, 25:00); reject those.
    if (
        value.getUTCFullYear() !== year ||
        value.getUTCMonth() !== month - 1 ||
        value.getUTCDate() !== day ||
        value.getUTCHours() !== hours ||
        value.getUTCMinutes() !== minutes ||
        value.getUTCSeconds() !== seconds
    ) {
        return null;
    }
    return value;
}

/** First `YYYYMMDDHHMMSS` run in the name, read as UTC. */
export function parseTimestamp(name: string): Date | null {
    const match = TIMESTAMP_PATTERN.exec(name);
    if (!match) return null;
    const [, date, time] = match;
    return utcDate(date, time.slice(0, 2), time.slice(2, 4), time.slice(4, 6));
}

/** Generation time of a forecast bundle, e.g. `T_PABV23_C_OKPR_20250928.2225.ft60s10.tar`. */
export function parseBundleGenerationTimestamp(name: string): Date | null {
    const match = GENERATION_PATTERN.exec(name);
    if (!match) return null;
    const [, date, time] = match;
    return utcDate(date, time.slice(0, 2), time.slice(2, 4), "00");
}

/** Offset label in minutes from the trailing `_ftNN` of a bundle member's stem. */
export function parseOffsetLabel(name: string): number | null {
    const base = path.basename(name);
    const ext = path.extname(base);
    const stem = ext ? base.slice(0, -ext.length) : base;
    const idx = stem.lastIndexOf("_ft");
    if (idx < 0) return null;
    const label = stem.slice(idx + 3);
    if (!/^\d+$/.test(label)) return null;
    return Number(label);
}

export function timestampStub(ts: Date): string {
    return (
        `${ts.getUTCFullYear()}${pad(ts.getUTCMonth() + 1)}${pad(ts.getUTCDate())}` +
        `_${pad(ts.getUTCHours())}${pad(ts.getUTCMinutes())}`
    );
}

export interface OutputNameOptions {
    forecast?: boolean;
    offsetMinutes?: number;
}

export function formatOutputName(
    ts: Date,
    variant: string,
    opts: OutputNameOptions = {},
): string {
    let suffix = "";
    if (opts.forecast) {
        suffix =
            opts.offsetMinutes !== undefined
                ? `_forecast_fct${pad(opts.offsetMinutes)}`
                : "_forecast";
    }
    return `radar_${timestampStub(ts)}${suffix}_${variant}.png`;
}

/** Timestamp an output file is grouped under, to minute precision. */
export function parseOutputTimestamp(name: string): Date | null {
    const match = OUTPUT_PATTERN.exec(name);
    if (!match) return null;
    const [, date, time] = match;
    return utcDate(date, time.slice(0, 2), time.slice(2, 4), "00");
}

export function isForecastOutputName(name: string): boolean {
    return FORECAST_OUTPUT_PATTERN.test(name);
}

export function offsetMinutesBetween(generation: Date, member: Date): number {
    return Math.round((member.getTime() - generation.getTime()) / 60_000);
}
