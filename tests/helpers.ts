import path from "node:path";
import os from "node:os";
import { mkdir, mkdtemp, readdir, writeFile } from "node:fs/promises";
import { vi } from "vitest";
import type { SchedulerConfig } from "../src/application/harvestScheduler.js";
import type { ConversionRequest } from "../src/domain/models.js";
import { ConversionError } from "../src/domain/errors.js";

export const PRIMARY_URL = "https://feeds.test/primary/";
export const SECONDARY_URL = "https://feeds.test/forecast/";

export function utc(
    year: number,
    month: number,
    day: number,
    hours = 0,
    minutes = 0,
    seconds = 0,
): Date {
    return new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
}

export async function makeTmpRoot(prefix = "harvest-"): Promise<string> {
    return mkdtemp(path.join(os.tmpdir(), prefix));
}

export function makeConfig(
    root: string,
    overrides: {
        storage?: Partial<SchedulerConfig["storage"]>;
        retention?: Partial<SchedulerConfig["retention"]>;
        timing?: Partial<SchedulerConfig["timing"]>;
    } = {},
): SchedulerConfig {
    return {
        primaryFeedUrl: PRIMARY_URL,
        secondaryFeedUrl: SECONDARY_URL,
        storage: {
            primaryRawDir: path.join(root, "data", "radar"),
            secondaryRawDir: path.join(root, "data", "forecast"),
            primaryOutputDir: path.join(root, "output"),
            secondaryOutputDir: path.join(root, "output_forecast"),
            derivedOutputDir: path.join(root, "output_extended"),
            rawSuffix: ".hdf",
            bundleSuffix: ".tar",
            ...overrides.storage,
        },
        retention: {
            minTrackedFiles: 12,
            primary: 600,
            secondary: 12,
            derived: 600,
            ...overrides.retention,
        },
        timing: {
            publishIntervalMinutes: 5,
            quickCheckIntervalSeconds: 3,
            quickCheckLimit: 90,
            tickIntervalMs: 1,
            ...overrides.timing,
        },
        batchWorkers: 2,
    };
}

export async function touch(file: string, content = "x"): Promise<void> {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content);
}

export async function listDir(dir: string): Promise<string[]> {
    try {
        return (await readdir(dir)).sort();
    } catch {
        return [];
    }
}

/** Catalog whose listings come from `feeds` and whose downloads write the file name as content. */
export function makeCatalog(feeds: Record<string, string[]>) {
    return {
        list: vi.fn(async (feedUrl: string) => [...(feeds[feedUrl] ?? [])]),
        fetch: vi.fn(
            async (
                _feedUrl: string,
                name: string,
                destination: string,
            ): Promise<string | null> => {
                await touch(destination, name);
                return destination;
            },
        ),
    };
}

/** Converter that writes every requested output unless `fail` picks the request. */
export function makeConverter(
    fail: (request: ConversionRequest) => boolean = () => false,
) {
    return {
        convert: vi.fn(async (request: ConversionRequest) => {
            if (fail(request)) {
                throw new ConversionError("render failed", request.inputPath);
            }
            for (const out of Object.values(request.outputs)) {
                await touch(out, "png");
            }
            return { ...request.outputs };
        }),
    };
}

export function callsFor(
    converter: ReturnType<typeof makeConverter>,
    family: ConversionRequest["family"],
): ConversionRequest[] {
    return converter.convert.mock.calls
        .map(([request]) => request)
        .filter((request) => request.family === family);
}

/** Extractor that drops `members` under `<destination>/members` and lists them. */
export function makeExtractor(members: string[]) {
    return {
        extract: vi.fn(async (_bundlePath: string, destination: string) => {
            const paths: string[] = [];
            for (const member of members) {
                const file = path.join(destination, "members", member);
                await touch(file, member);
                paths.push(file);
            }
            return paths;
        }),
    };
}
