import path from "node:path";
import { access, mkdir, readdir, rm } from "node:fs/promises";
import type {
    RetentionConfig,
    StorageConfig,
    TimingConfig,
} from "../config.js";
import type { RemoteCatalog } from "../domain/ports/remoteCatalog.js";
import type { BundleExtractor } from "../domain/ports/bundleExtractor.js";
import type { ArtifactConverter } from "../domain/ports/artifactConverter.js";
import type {
    ArtifactSet,
    ConversionRequest,
    QuickPollState,
    SchedulerSnapshot,
} from "../domain/models.js";
import {
    DERIVED_VARIANTS,
    FORECAST_VARIANTS,
    PRIMARY_VARIANTS,
    formatOutputName,
    isForecastOutputName,
    parseBundleGenerationTimestamp,
    parseOutputTimestamp,
    parseTimestamp,
} from "../domain/naming.js";
import { dispatch } from "./batchDispatcher.js";
import { nextExpected } from "./publicationClock.js";
import { planForecastMembers } from "./forecastPlanner.js";
import {
    pruneOutputs,
    pruneRawInputs,
    removeEmptyDirectories,
} from "./retentionPruner.js";
import { logger } from "../logger.js";
import { toIso } from "../util/time.js";

export interface SchedulerConfig {
    primaryFeedUrl: string;
    secondaryFeedUrl: string;
    storage: StorageConfig;
    retention: RetentionConfig;
    timing: TimingConfig;
    batchWorkers: number;
}

export interface SchedulerDeps {
    catalog: RemoteCatalog;
    extractor: BundleExtractor;
    converter: ArtifactConverter;
    config: SchedulerConfig;
    now?: () => Date;
}

interface WindowEntry {
    name: string;
    timestamp: Date;
    rawPath: string;
}

interface PrimaryPassResult {
    processed: boolean;
    latest: Date | null;
    window: WindowEntry[];
}

async function exists(file: string): Promise<boolean> {
    try {
        await access(file);
        return true;
    } catch {
        return false;
    }
}

async function allExist(outputs: ArtifactSet): Promise<boolean> {
    for (const file of Object.values(outputs)) {
        if (!(await exists(file))) return false;
    }
    return true;
}

function endsWithCi(name: string, suffix: string): boolean {
    return name.toLowerCase().endsWith(suffix.toLowerCase());
}

const COMPONENT = "HarvestScheduler";

export class HarvestScheduler {
    private nextPublish: Date;
    private quick: QuickPollState = {
        active: false,
        attempts: 0,
        lastAttempt: null,
    };
    private readonly trackedFiles = new Map<string, Date>();
    private readonly completedBundles = new Set<string>();
    /** Primary output groups that survived the last primary prune. */
    private primaryKept: ReadonlySet<number> | null = null;
    private stopped = false;
    private wake: (() => void) | null = null;

    constructor(private readonly deps: SchedulerDeps) {
        this.nextPublish = this.expectedAfter(this.now());
    }

    snapshot(): SchedulerSnapshot {
        return {
            mode: this.quick.active ? "quick" : "normal",
            nextPublish: new Date(this.nextPublish.getTime()),
            quick: { ...this.quick },
            trackedFiles: new Map(this.trackedFiles),
            completedBundles: new Set(this.completedBundles),
        };
    }

    /** Overrides the next boundary; used when resuming from a known schedule. */
    setNextPublish(at: Date): void {
        this.nextPublish = new Date(at.getTime());
    }

    /**
     * Creates the working directories and rebuilds the tracked-file cache from
     * raw files already on disk.
     */
    async hydrate(): Promise<void> {
        const { storage } = this.deps.config;
        for (const dir of [
            storage.primaryRawDir,
            storage.secondaryRawDir,
            storage.primaryOutputDir,
            storage.secondaryOutputDir,
            storage.derivedOutputDir,
        ]) {
            await mkdir(dir, { recursive: true });
        }

        this.trackedFiles.clear();
        for (const name of await readdir(storage.primaryRawDir)) {
            if (!endsWithCi(name, storage.rawSuffix)) continue;
            const ts = parseTimestamp(name);
            if (ts) this.trackedFiles.set(name, ts);
        }
        logger.info("Scheduler hydrated", {
            component: COMPONENT,
            action: "hydrate",
            trackedFiles: this.trackedFiles.size,
            nextPublishIso: toIso(this.nextPublish),
        });
    }

    async runForever(): Promise<void> {
        logger.info("Starting scheduler loop", {
            component: COMPONENT,
            tickMs: this.deps.config.timing.tickIntervalMs,
            nextPublishIso: toIso(this.nextPublish),
        });
        this.stopped = false;
        while (!this.stopped) {
            await this.step(this.now());
            if (this.stopped) break;
            await this.pause(this.deps.config.timing.tickIntervalMs);
        }
        logger.info("Scheduler loop stopped", { component: COMPONENT });
    }

    /** Ends `runForever` once the step in flight completes. */
    stop(): void {
        this.stopped = true;
        this.wake?.();
    }

    /**
     * Advances the state machine by one tick. Crossing `nextPublish` switches
     * to quick polling: one cycle straight away, then one every
     * `quickCheckIntervalSeconds` until new data shows up or
     * `quickCheckLimit` attempts are spent. Outside quick mode every tick runs
     * a cycle. Errors are logged here and never escape.
     */
    async step(now: Date): Promise<void> {
        try {
            if (!this.quick.active && now >= this.nextPublish) {
                logger.info("Boundary reached; entering quick polling", {
                    component: COMPONENT,
                    action: "step",
                    boundaryIso: toIso(this.nextPublish),
                });
                this.quick = { active: true, attempts: 0, lastAttempt: null };
                await this.quickAttempt(now);
                return;
            }

            if (this.quick.active) {
                const last = this.quick.lastAttempt;
                const intervalMs =
                    this.deps.config.timing.quickCheckIntervalSeconds * 1000;
                if (last && now.getTime() - last.getTime() < intervalMs) return;
                await this.quickAttempt(now);
                return;
            }

            const processed = await this.runCycle();
            if (processed) {
                this.nextPublish = this.expectedAfter(now);
            }
        } catch (e) {
            logger.error("Cycle failed", {
                component: COMPONENT,
                action: "step",
                mode: this.quick.active ? "quick" : "normal",
                error: String(e),
            });
        }
    }

    /**
     * One full pass: primary backlog, then the newest forecast bundle, then the
     * derived backfill. Resolves to true when new primary data was downloaded
     * or converted.
     */
    async runCycle(): Promise<boolean> {
        const primary = await this.primaryPass();
        if (primary.latest) {
            await this.forecastPass();
        }
        await this.derivedPass(primary.window);
        return primary.processed;
    }

    private async quickAttempt(now: Date): Promise<void> {
        const attempt = this.quick.attempts + 1;
        const limit = this.deps.config.timing.quickCheckLimit;
        logger.debug("Quick check attempt", {
            component: COMPONENT,
            action: "quickAttempt",
            attempt,
            limit,
        });
        let processed = false;
        try {
            processed = await this.runCycle();
        } finally {
            this.quick.attempts = attempt;
            this.quick.lastAttempt = now;
            if (processed) {
                this.leaveQuickMode(now, "new data");
            } else if (attempt >= limit) {
                logger.warn("Quick polling limit reached without new data", {
                    component: COMPONENT,
                    action: "quickAttempt",
                    attempts: attempt,
                });
                this.leaveQuickMode(now, "limit");
            }
        }
    }

    private leaveQuickMode(now: Date, reason: "new data" | "limit"): void {
        this.quick = { active: false, attempts: 0, lastAttempt: null };
        this.nextPublish = this.expectedAfter(now);
        logger.info("Leaving quick polling", {
            component: COMPONENT,
            reason,
            nextPublishIso: toIso(this.nextPublish),
        });
    }

    private async primaryPass(): Promise<PrimaryPassResult> {
        const { config, catalog } = this.deps;
        const { storage } = config;
        const listed = await catalog.list(config.primaryFeedUrl);
        const names = listed.slice(0, config.retention.minTrackedFiles);
        if (!names.length) {
            logger.warn("No primary entries found", {
                component: COMPONENT,
                action: "primaryPass",
            });
            return { processed: false, latest: null, window: [] };
        }

        const window: WindowEntry[] = [];
        for (const name of names) {
            const timestamp = parseTimestamp(name);
            if (!timestamp) {
                logger.debug("Skipping unrecognized primary file", {
                    component: COMPONENT,
                    file: name,
                });
                continue;
            }
            window.push({
                name,
                timestamp,
                rawPath: path.join(storage.primaryRawDir, name),
            });
        }
        const latest = window.length ? window[0].timestamp : null;

        let downloaded = 0;
        const queue: ConversionRequest[] = [];
        const present = new Set<string>();
        for (const entry of [...window].reverse()) {
            if (!(await exists(entry.rawPath))) {
                const fetched = await catalog.fetch(
                    config.primaryFeedUrl,
                    entry.name,
                    entry.rawPath,
                );
                if (!fetched) continue;
                downloaded += 1;
            }
            present.add(entry.name);

            const outputs = this.primaryOutputs(entry.timestamp);
            if (!(await allExist(outputs))) {
                queue.push({
                    family: "primary",
                    inputPath: entry.rawPath,
                    timestamp: entry.timestamp,
                    outputs,
                });
            }
        }

        const converted = await this.convertBatch(queue, "primary");

        this.trackedFiles.clear();
        for (const entry of window) {
            if (present.has(entry.name)) {
                this.trackedFiles.set(entry.name, entry.timestamp);
            }
        }

        if (latest && (await allExist(this.primaryOutputs(latest)))) {
            const candidate = this.expectedAfter(latest);
            if (candidate > this.nextPublish) {
                this.nextPublish = candidate;
            }
        }

        await this.prunePrimary();

        if (downloaded || converted) {
            logger.info("Primary backlog updated", {
                component: COMPONENT,
                action: "primaryPass",
                downloaded,
                converted,
                queued: queue.length,
                latestIso: toIso(latest),
            });
        }
        return { processed: downloaded > 0 || converted > 0, latest, window };
    }

    private async forecastPass(): Promise<void> {
        const { config, catalog, extractor } = this.deps;
        const { storage } = config;
        const entries = await catalog.list(config.secondaryFeedUrl);
        const bundleName = entries.find((name) =>
            endsWithCi(name, storage.bundleSuffix),
        );
        if (!bundleName) {
            logger.debug("No forecast bundles available", {
                component: COMPONENT,
                action: "forecastPass",
            });
            return;
        }
        if (this.completedBundles.has(bundleName)) {
            logger.debug("Latest forecast bundle already processed", {
                component: COMPONENT,
                action: "forecastPass",
                bundle: bundleName,
            });
            return;
        }

        // Offsets are measured from the bundle's own generation time; the
        // primary feed may lag behind it.
        const generation = parseBundleGenerationTimestamp(bundleName);
        if (!generation) {
            logger.warn("Cannot read generation time from bundle name", {
                component: COMPONENT,
                action: "forecastPass",
                bundle: bundleName,
            });
            return;
        }

        const bundlePath = path.join(storage.secondaryRawDir, bundleName);
        if (!(await exists(bundlePath))) {
            const fetched = await catalog.fetch(
                config.secondaryFeedUrl,
                bundleName,
                bundlePath,
            );
            if (!fetched) return;
        }

        let members: string[];
        try {
            members = await extractor.extract(
                bundlePath,
                storage.secondaryRawDir,
            );
        } catch (e) {
            logger.warn("Bundle extraction failed; discarding bundle", {
                component: COMPONENT,
                action: "forecastPass",
                bundle: bundleName,
                error: String(e),
            });
            await rm(bundlePath, { force: true });
            return;
        }

        const plan = planForecastMembers(members, generation);
        const queue: ConversionRequest[] = [];
        for (const candidate of plan.candidates) {
            const outputs = this.forecastOutputs(
                generation,
                candidate.offsetMinutes,
            );
            if (await allExist(outputs)) {
                logger.debug("Forecast outputs already exist", {
                    component: COMPONENT,
                    offsetMinutes: candidate.offsetMinutes,
                });
                continue;
            }
            queue.push({
                family: "forecast",
                inputPath: candidate.memberPath,
                timestamp: generation,
                offsetMinutes: candidate.offsetMinutes,
                outputs,
            });
        }

        const converted = await this.convertBatch(queue, "forecast");
        if (converted === queue.length) {
            this.completedBundles.add(bundleName);
            logger.info("Forecast bundle processed", {
                component: COMPONENT,
                action: "forecastPass",
                bundle: bundleName,
                generationIso: toIso(generation),
                converted,
            });
        } else {
            logger.warn("Forecast bundle incomplete; retrying next cycle", {
                component: COMPONENT,
                action: "forecastPass",
                bundle: bundleName,
                converted,
                failed: queue.length - converted,
            });
        }

        await this.pruneForecast();
    }

    private async derivedPass(window: WindowEntry[]): Promise<void> {
        if (!window.length) return;
        try {
            const queue: ConversionRequest[] = [];
            for (const entry of [...window].reverse()) {
                if (!(await allExist(this.primaryOutputs(entry.timestamp))))
                    continue;
                const outputs = this.derivedOutputs(entry.timestamp);
                if (await allExist(outputs)) continue;
                if (!(await exists(entry.rawPath))) continue;
                queue.push({
                    family: "derived",
                    inputPath: entry.rawPath,
                    timestamp: entry.timestamp,
                    outputs,
                });
            }
            await this.convertBatch(queue, "derived");
            await pruneOutputs({
                dir: this.deps.config.storage.derivedOutputDir,
                parse: parseOutputTimestamp,
                keep: this.deps.config.retention.derived,
                anchor: this.primaryKept ?? undefined,
            });
        } catch (e) {
            logger.warn("Derived backfill failed", {
                component: COMPONENT,
                action: "derivedPass",
                error: String(e),
            });
        }
    }

    /** Resolves to the number of requests that converted successfully. */
    private async convertBatch(
        queue: ConversionRequest[],
        label: string,
    ): Promise<number> {
        if (!queue.length) return 0;
        logger.info("Converting batch", {
            component: COMPONENT,
            action: "convertBatch",
            label,
            files: queue.length,
            workers: this.deps.config.batchWorkers,
        });
        const outcomes = await dispatch(
            queue,
            (request) => this.deps.converter.convert(request),
            { concurrency: this.deps.config.batchWorkers, label },
        );

        let ok = 0;
        for (const [request, outcome] of outcomes) {
            if (outcome.ok) {
                ok += 1;
                continue;
            }
            logger.warn("Conversion failed; will retry next cycle", {
                component: COMPONENT,
                action: "convertBatch",
                label,
                input: path.basename(request.inputPath),
                error: String(outcome.error),
            });
        }
        return ok;
    }

    private async prunePrimary(): Promise<void> {
        const { storage, retention } = this.deps.config;
        const result = await pruneOutputs({
            dir: storage.primaryOutputDir,
            parse: parseOutputTimestamp,
            keep: retention.primary,
        });
        this.primaryKept = new Set(result.kept);
        await pruneRawInputs({
            dir: storage.primaryRawDir,
            match: (name) => endsWithCi(name, storage.rawSuffix),
            keep: retention.primary,
        });
    }

    private async pruneForecast(): Promise<void> {
        const { storage, retention } = this.deps.config;
        await pruneOutputs({
            dir: storage.secondaryOutputDir,
            parse: (name) =>
                isForecastOutputName(name) ? parseOutputTimestamp(name) : null,
            keep: retention.secondary,
        });
        await pruneRawInputs({
            dir: storage.secondaryRawDir,
            match: (name) => endsWithCi(name, storage.rawSuffix),
            keep: retention.secondary,
            recursive: true,
        });
        await pruneRawInputs({
            dir: storage.secondaryRawDir,
            match: (name) => endsWithCi(name, storage.bundleSuffix),
            keep: retention.secondary,
            recursive: true,
        });
        await removeEmptyDirectories(storage.secondaryRawDir);
    }

    private primaryOutputs(ts: Date): ArtifactSet {
        return this.outputSet(
            this.deps.config.storage.primaryOutputDir,
            PRIMARY_VARIANTS,
            (variant) => formatOutputName(ts, variant),
        );
    }

    private forecastOutputs(generation: Date, offsetMinutes: number): ArtifactSet {
        return this.outputSet(
            this.deps.config.storage.secondaryOutputDir,
            FORECAST_VARIANTS,
            (variant) =>
                formatOutputName(generation, variant, {
                    forecast: true,
                    offsetMinutes,
                }),
        );
    }

    private derivedOutputs(ts: Date): ArtifactSet {
        return this.outputSet(
            this.deps.config.storage.derivedOutputDir,
            DERIVED_VARIANTS,
            (variant) => formatOutputName(ts, variant),
        );
    }

    private outputSet(
        dir: string,
        variants: readonly string[],
        name: (variant: string) => string,
    ): ArtifactSet {
        const outputs: ArtifactSet = {};
        for (const variant of variants) {
            outputs[variant] = path.join(dir, name(variant));
        }
        return outputs;
    }

    private expectedAfter(reference: Date): Date {
        return nextExpected(
            reference,
            null,
            this.deps.config.timing.publishIntervalMinutes,
        );
    }

    private now(): Date {
        return this.deps.now ? this.deps.now() : new Date();
    }

    private pause(ms: number): Promise<void> {
        return new Promise((resolve) => {
            const done = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
            const timer = setTimeout(done, ms);
            this.wake = done;
        });
    }
}
