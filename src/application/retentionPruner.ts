import path from "node:path";
import type { Dirent } from "node:fs";
import { readdir, rm, rmdir } from "node:fs/promises";
import { logger } from "../logger.js";

export interface OutputPrunePlan {
    dir: string;
    /** Extracts the group timestamp from a file name; null leaves the file alone. */
    parse: (name: string) => Date | null;
    keep: number;
    /** When set, only groups whose key is in here may survive. */
    anchor?: ReadonlySet<number>;
}

export interface OutputPruneResult {
    /** Epoch-ms keys of the surviving groups, ascending. */
    kept: number[];
    removed: string[];
}

export interface RawPrunePlan {
    dir: string;
    match: (name: string) => boolean;
    keep: number;
    recursive?: boolean;
}

function isMissing(e: unknown): boolean {
    return (
        typeof e === "object" &&
        e !== null &&
        "code" in e &&
        (e.code === "ENOENT" || e.code === "ENOTDIR")
    );
}

async function readEntries(dir: string): Promise<Dirent[] | null> {
    try {
        return await readdir(dir, { withFileTypes: true });
    } catch (e) {
        if (isMissing(e)) return null;
        throw e;
    }
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
    const entries = (await readEntries(dir)) ?? [];
    const files: string[] = [];
    for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isFile()) {
            files.push(full);
        } else if (recursive && entry.isDirectory()) {
            files.push(...(await listFiles(full, true)));
        }
    }
    return files;
}

async function removeFile(file: string): Promise<void> {
    await rm(file, { force: true });
}

/**
 * Keeps the newest `keep` timestamp groups in `dir` and deletes every file of
 * the other groups, whatever its variant.
 */
export async function pruneOutputs(
    plan: OutputPrunePlan,
): Promise<OutputPruneResult> {
    const files = await listFiles(plan.dir, false);
    const groups = new Map<number, string[]>();
    for (const file of files) {
        const ts = plan.parse(path.basename(file));
        if (!ts) continue;
        const key = ts.getTime();
        const group = groups.get(key);
        if (group) group.push(file);
        else groups.set(key, [file]);
    }

    const keys = [...groups.keys()].sort((a, b) => a - b);
    if (plan.keep <= 0) return { kept: keys, removed: [] };

    const eligible = plan.anchor
        ? keys.filter((key) => plan.anchor?.has(key))
        : keys;
    const kept = eligible.slice(-plan.keep);
    const keepSet = new Set(kept);

    const removed: string[] = [];
    for (const key of keys) {
        if (keepSet.has(key)) continue;
        for (const file of groups.get(key) ?? []) {
            await removeFile(file);
            removed.push(file);
        }
    }

    if (removed.length) {
        logger.info("Pruned outputs", {
            component: "RetentionPruner",
            action: "pruneOutputs",
            dir: plan.dir,
            removed: removed.length,
            keptGroups: kept.length,
        });
    }
    return { kept, removed };
}

/**
 * Keeps the last `keep` matching raw files by file-name order and deletes the
 * rest.
 */
export async function pruneRawInputs(plan: RawPrunePlan): Promise<string[]> {
    if (plan.keep <= 0) return [];
    const files = (await listFiles(plan.dir, plan.recursive ?? false))
        .filter((file) => plan.match(path.basename(file)))
        .sort((a, b) => {
            const an = path.basename(a);
            const bn = path.basename(b);
            if (an !== bn) return an < bn ? -1 : 1;
            return a < b ? -1 : a > b ? 1 : 0;
        });

    const stale = files.slice(0, Math.max(0, files.length - plan.keep));
    for (const file of stale) {
        await removeFile(file);
    }
    if (stale.length) {
        logger.info("Pruned raw inputs", {
            component: "RetentionPruner",
            action: "pruneRawInputs",
            dir: plan.dir,
            removed: stale.length,
        });
    }
    return stale;
}

/** Removes empty directories below `root`, deepest first. `root` itself stays. */
export async function removeEmptyDirectories(root: string): Promise<string[]> {
    const removed: string[] = [];

    const visit = async (dir: string): Promise<boolean> => {
        const entries = await readEntries(dir);
        if (!entries) return false;
        let remaining = entries.length;
        for (const entry of entries) {
            if (!entry.isDirectory()) continue;
            const child = path.join(dir, entry.name);
            if (await visit(child)) {
                await rmdir(child);
                removed.push(child);
                remaining -= 1;
            }
        }
        return remaining === 0;
    };

    await visit(root);
    return removed;
}
