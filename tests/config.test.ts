import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { loadConfig, resolveLogLevel, validateConfig } from "../src/config.js";

const BASE = { CONVERTER_COMMAND: "radar-render" };

describe("loadConfig", () => {
    it("falls back to defaults", () => {
        const cfg = loadConfig(BASE);
        expect(cfg.sources.primaryFeedUrl).toBe(
            "https://opendata.chmi.cz/meteorology/weather/radar/composite/maxz/hdf5/",
        );
        expect(cfg.storage).toEqual({
            primaryRawDir: path.resolve("./data/radar"),
            secondaryRawDir: path.resolve("./data/forecast"),
            primaryOutputDir: path.resolve("./output"),
            secondaryOutputDir: path.resolve("./output_forecast"),
            derivedOutputDir: path.resolve("./output_extended"),
            rawSuffix: ".hdf",
            bundleSuffix: ".tar",
        });
        expect(cfg.retention).toEqual({
            minTrackedFiles: 12,
            primary: 600,
            secondary: 12,
            derived: 600,
        });
        expect(cfg.timing).toEqual({
            publishIntervalMinutes: 5,
            quickCheckIntervalSeconds: 3,
            quickCheckLimit: 90,
            tickIntervalMs: 1000,
        });
        expect(cfg.http).toEqual({
            timeoutMs: 30_000,
            maxRetries: 4,
            retryDelayMs: 2000,
            forceIpv4: true,
        });
        expect(cfg.batchWorkers).toBe(os.availableParallelism());
        expect(cfg.staticServer).toEqual({ enabled: false, host: "0.0.0.0", port: 8080 });
        expect(() => validateConfig(cfg)).not.toThrow();
    });

    it("reads overrides from the environment", () => {
        const cfg = loadConfig({
            CONVERTER_COMMAND: "  radar-render   --palette default --scale 2 ",
            PRIMARY_OUTPUT_DIR: "/srv/radar",
            QUICK_CHECK_LIMIT: "10",
            BATCH_WORKERS: "not-a-number",
            FORCE_IPV4: "false",
            STATIC_SERVER_ENABLED: "1",
            LOG_LEVEL: "WARN",
        });
        expect(cfg.converter).toEqual({
            command: "radar-render",
            args: ["--palette", "default", "--scale", "2"],
            timeoutMs: 300_000,
        });
        expect(cfg.storage.primaryOutputDir).toBe(path.resolve("/srv/radar"));
        expect(cfg.timing.quickCheckLimit).toBe(10);
        expect(cfg.batchWorkers).toBe(os.availableParallelism());
        expect(cfg.http.forceIpv4).toBe(false);
        expect(cfg.staticServer.enabled).toBe(true);
        expect(resolveLogLevel(cfg)).toBe("warn");
    });
});

describe("validateConfig", () => {
    it("requires a converter command", () => {
        expect(() => validateConfig(loadConfig({}))).toThrow(
            "Invalid configuration: CONVERTER_COMMAND is required",
        );
    });

    it("reports every problem at once", () => {
        expect(() =>
            validateConfig(
                loadConfig({ HTTP_MAX_RETRIES: "0", LOG_LEVEL: "loud" }),
            ),
        ).toThrow(
            "Invalid configuration: CONVERTER_COMMAND is required; " +
                "HTTP_MAX_RETRIES must be an integer >= 1; " +
                "LOG_LEVEL must be one of debug, info, warn, error",
        );
    });

    it("requires an interval that divides the hour", () => {
        expect(() =>
            validateConfig(loadConfig({ ...BASE, PUBLISH_INTERVAL_MINUTES: "7" })),
        ).toThrow("Invalid configuration: PUBLISH_INTERVAL_MINUTES must be a divisor of 60");
        expect(() =>
            validateConfig(loadConfig({ ...BASE, PUBLISH_INTERVAL_MINUTES: "10" })),
        ).not.toThrow();
    });

    it("keeps primary retention above the tracked window", () => {
        expect(() =>
            validateConfig(loadConfig({ ...BASE, PRIMARY_RETENTION: "5" })),
        ).toThrow(
            "Invalid configuration: PRIMARY_RETENTION must be 0 or at least MIN_TRACKED_FILES",
        );
        expect(() =>
            validateConfig(loadConfig({ ...BASE, PRIMARY_RETENTION: "0" })),
        ).not.toThrow();
    });

    it("rejects feed URLs that are not http", () => {
        expect(() =>
            validateConfig(loadConfig({ ...BASE, PRIMARY_FEED_URL: "ftp://feeds.test/" })),
        ).toThrow("Invalid configuration: PRIMARY_FEED_URL must be an http(s) URL");
    });
});
