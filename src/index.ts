#!/usr/bin/env node
import dns from "node:dns";
import type { Server } from "node:http";
import { config, resolveLogLevel, validateConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { HarvestScheduler } from "./application/harvestScheduler.js";
import { HttpDirectoryCatalog } from "./infra/http/httpDirectoryCatalog.js";
import { TarBundleExtractor } from "./infra/archive/tarBundleExtractor.js";
import { CommandArtifactConverter } from "./infra/convert/commandArtifactConverter.js";
import { startStaticServer } from "./infra/http/staticServer.js";

async function maybeStartStaticServer(): Promise<Server | null> {
    if (!config.staticServer.enabled) return null;
    try {
        return await startStaticServer(
            {
                output: config.storage.primaryOutputDir,
                output_forecast: config.storage.secondaryOutputDir,
                output_extended: config.storage.derivedOutputDir,
            },
            config.staticServer.host,
            config.staticServer.port,
        );
    } catch (e) {
        logger.warn("Static server unavailable", { error: String(e) });
        return null;
    }
}

async function main() {
    try {
        validateConfig();
    } catch (e) {
        logger.error("Invalid configuration", { error: String(e) });
        process.exit(1);
    }
    setLogLevel(resolveLogLevel(config));

    if (config.http.forceIpv4) {
        dns.setDefaultResultOrder("ipv4first");
    }

    const scheduler = new HarvestScheduler({
        catalog: new HttpDirectoryCatalog({
            timeoutMs: config.http.timeoutMs,
            maxRetries: config.http.maxRetries,
            retryDelayMs: config.http.retryDelayMs,
            allowedSuffixes: [
                config.storage.rawSuffix.toLowerCase(),
                config.storage.bundleSuffix.toLowerCase(),
            ],
        }),
        extractor: new TarBundleExtractor(config.storage.rawSuffix),
        converter: new CommandArtifactConverter(config.converter),
        config: {
            primaryFeedUrl: config.sources.primaryFeedUrl,
            secondaryFeedUrl: config.sources.secondaryFeedUrl,
            storage: config.storage,
            retention: config.retention,
            timing: config.timing,
            batchWorkers: config.batchWorkers,
        },
    });
    await scheduler.hydrate();

    const server = await maybeStartStaticServer();

    const shutdown = (signal: NodeJS.Signals) => {
        logger.info("Shutdown requested", { signal });
        scheduler.stop();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    try {
        await scheduler.runForever();
    } finally {
        server?.close();
    }
}

main().catch((e) => {
    logger.error("Fatal", { error: String(e) });
    process.exit(1);
});
