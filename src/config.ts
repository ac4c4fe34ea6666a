import dotenv from "dotenv";
import os from "node:os";
import path from "node:path";
import { isLogLevel, type LogLevel } from "./logger.js";

dotenv.config();

type Env = Record<string, string | undefined>;

function num(env: Env, name: string, def: number): number {
    const raw = env[name];
    if (!raw) return def;
    const n = Number(raw);
    return Number.isFinite(n) ? n : def;
}

function flag(env: Env, name: string, def: boolean): boolean {
    const raw = env[name];
    if (!raw) return def;
    return raw.toLowerCase() === "true" || raw === "1";
}

function dir(env: Env, name: string, def: string): string {
    return path.resolve(env[name] || def);
}

export interface StorageConfig {
    primaryRawDir: string;
    secondaryRawDir: string;
    primaryOutputDir: string;
    secondaryOutputDir: string;
    derivedOutputDir: string;
    rawSuffix: string;
    bundleSuffix: string;
}

export interface RetentionConfig {
    minTrackedFiles: number;
    primary: number;
    secondary: number;
    derived: number;
}

export interface TimingConfig {
    publishIntervalMinutes: number;
    quickCheckIntervalSeconds: number;
    quickCheckLimit: number;
    tickIntervalMs: number;
}

export interface HttpConfig {
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    forceIpv4: boolean;
}

export interface ConverterConfig {
    command: string;
    args: string[];
    timeoutMs: number;
}

export interface StaticServerConfig {
    enabled: boolean;
    host: string;
    port: number;
}

export interface Config {
    sources: {
        primaryFeedUrl: string;
        secondaryFeedUrl: string;
    };
    storage: StorageConfig;
    retention: RetentionConfig;
    timing: TimingConfig;
    http: HttpConfig;
    batchWorkers: number;
    converter: ConverterConfig;
    staticServer: StaticServerConfig;
    logLevel: string;
}

export function loadConfig(env: Env = process.env): Config {
    const [command = "", ...args] = (env.CONVERTER_COMMAND || "")
        .trim()
        .split(/\s+/)
        .filter(Boolean);

    return {
        sources: {
            primaryFeedUrl:
                env.PRIMARY_FEED_URL ||
                "https://opendata.chmi.cz/meteorology/weather/radar/composite/maxz/hdf5/",
            secondaryFeedUrl:
                env.SECONDARY_FEED_URL ||
                "https://opendata.chmi.cz/meteorology/weather/radar/composite/fct_maxz/hdf5/",
        },
        storage: {
            primaryRawDir: dir(env, "PRIMARY_RAW_DIR", "./data/radar"),
            secondaryRawDir: dir(env, "SECONDARY_RAW_DIR", "./data/forecast"),
            primaryOutputDir: dir(env, "PRIMARY_OUTPUT_DIR", "./output"),
            secondaryOutputDir: dir(
                env,
                "SECONDARY_OUTPUT_DIR",
                "./output_forecast",
            ),
            derivedOutputDir: dir(
                env,
                "DERIVED_OUTPUT_DIR",
                "./output_extended",
            ),
            rawSuffix: env.RAW_SUFFIX || ".hdf",
            bundleSuffix: env.BUNDLE_SUFFIX || ".tar",
        },
        retention: {
            minTrackedFiles: num(env, "MIN_TRACKED_FILES", 12),
            primary: num(env, "PRIMARY_RETENTION", 600),
            secondary: num(env, "SECONDARY_RETENTION", 12),
            derived: num(env, "DERIVED_RETENTION", 600),
        },
        timing: {
            publishIntervalMinutes: num(env, "PUBLISH_INTERVAL_MINUTES", 5),
            quickCheckIntervalSeconds: num(
                env,
                "QUICK_CHECK_INTERVAL_SECONDS",
                3,
            ),
            quickCheckLimit: num(env, "QUICK_CHECK_LIMIT", 90),
            tickIntervalMs: num(env, "TICK_INTERVAL_MS", 1000),
        },
        http: {
            timeoutMs: num(env, "HTTP_TIMEOUT_MS", 30_000),
            maxRetries: num(env, "HTTP_MAX_RETRIES", 4),
            retryDelayMs: num(env, "HTTP_RETRY_DELAY_MS", 2000),
            forceIpv4: flag(env, "FORCE_IPV4", true),
        },
        batchWorkers: num(env, "BATCH_WORKERS", os.availableParallelism()),
        converter: {
            command,
            args,
            timeoutMs: num(env, "CONVERTER_TIMEOUT_MS", 300_000),
        },
        staticServer: {
            enabled: flag(env, "STATIC_SERVER_ENABLED", false),
            host: env.STATIC_SERVER_HOST || "0.0.0.0",
            port: num(env, "STATIC_SERVER_PORT", 8080),
        },
        logLevel: (env.LOG_LEVEL || "info").toLowerCase(),
    };
}

export const config: Config = loadConfig();

function isHttpUrl(value: string): boolean {
    try {
        const parsed = new URL(value);
        return parsed.protocol === "http:" || parsed.protocol === "https:";
    } catch {
        return false;
    }
}

function isPositiveInt(value: number): boolean {
    return Number.isInteger(value) && value >= 1;
}

export function validateConfig(cfg: Config = config): void {
    const problems: string[] = [];
    if (!isHttpUrl(cfg.sources.primaryFeedUrl))
        problems.push("PRIMARY_FEED_URL must be an http(s) URL");
    if (!isHttpUrl(cfg.sources.secondaryFeedUrl))
        problems.push("SECONDARY_FEED_URL must be an http(s) URL");
    if (!cfg.converter.command) problems.push("CONVERTER_COMMAND is required");

    if (!isPositiveInt(cfg.retention.minTrackedFiles))
        problems.push("MIN_TRACKED_FILES must be an integer >= 1");
    for (const [name, value] of [
        ["PRIMARY_RETENTION", cfg.retention.primary],
        ["SECONDARY_RETENTION", cfg.retention.secondary],
        ["DERIVED_RETENTION", cfg.retention.derived],
    ] as const) {
        if (!Number.isInteger(value) || value < 0)
            problems.push(`${name} must be an integer >= 0`);
    }

    if (
        cfg.retention.primary > 0 &&
        cfg.retention.primary < cfg.retention.minTrackedFiles
    )
        problems.push(
            "PRIMARY_RETENTION must be 0 or at least MIN_TRACKED_FILES",
        );

    const interval = cfg.timing.publishIntervalMinutes;
    if (!isPositiveInt(interval) || 60 % interval !== 0)
        problems.push("PUBLISH_INTERVAL_MINUTES must be a divisor of 60");
    if (!(cfg.timing.quickCheckIntervalSeconds > 0))
        problems.push("QUICK_CHECK_INTERVAL_SECONDS must be > 0");
    if (!isPositiveInt(cfg.timing.quickCheckLimit))
        problems.push("QUICK_CHECK_LIMIT must be an integer >= 1");
    if (!isPositiveInt(cfg.timing.tickIntervalMs))
        problems.push("TICK_INTERVAL_MS must be an integer >= 1");
    if (!isPositiveInt(cfg.batchWorkers))
        problems.push("BATCH_WORKERS must be an integer >= 1");
    if (!isPositiveInt(cfg.http.maxRetries))
        problems.push("HTTP_MAX_RETRIES must be an integer >= 1");
    if (!isPositiveInt(cfg.http.timeoutMs))
        problems.push("HTTP_TIMEOUT_MS must be an integer >= 1");
    if (!(cfg.http.retryDelayMs >= 0))
        problems.push("HTTP_RETRY_DELAY_MS must be >= 0");
    if (!isPositiveInt(cfg.converter.timeoutMs))
        problems.push("CONVERTER_TIMEOUT_MS must be an integer >= 1");
    if (
        !Number.isInteger(cfg.staticServer.port) ||
        cfg.staticServer.port < 0 ||
        cfg.staticServer.port > 65535
    )
        problems.push("STATIC_SERVER_PORT must be in [0..65535]");
    if (!isLogLevel(cfg.logLevel))
        problems.push("LOG_LEVEL must be one of debug, info, warn, error");

    if (problems.length) {
        throw new Error(`Invalid configuration: ${problems.join("; ")}`);
    }
}

export function resolveLogLevel(cfg: Config): LogLevel {
    return isLogLevel(cfg.logLevel) ? cfg.logLevel : "info";
}
