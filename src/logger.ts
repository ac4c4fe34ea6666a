export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}

let threshold: LogLevel = resolveLevel(process.env.LOG_LEVEL);

function resolveLevel(raw: string | undefined): LogLevel {
    const value = (raw || "info").toLowerCase();
    return isLogLevel(value) ? value : "info";
}

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

function ts() {
    return new Date().toISOString();
}

function log(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const base: Record<string, unknown> = { t: ts(), level, msg };
    if (meta) Object.assign(base, meta);
    const line = JSON.stringify(base);
    if (level === "error" || level === "warn") {
        console.error(line);
    } else {
        console.log(line);
    }
}

export const logger = {
    debug: (msg: string, meta?: Record<string, unknown>) =>
        log("debug", msg, meta),
    info: (msg: string, meta?: Record<string, unknown>) =>
        log("info", msg, meta),
    warn: (msg: string, meta?: Record<string, unknown>) =>
        log("warn", msg, meta),
    error: (msg: string, meta?: Record<string, unknown>) =>
        log("error", msg, meta),
};
