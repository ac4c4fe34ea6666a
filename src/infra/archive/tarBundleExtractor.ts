import path from "node:path";
import { mkdir, rename } from "node:fs/promises";
import * as tar from "tar";
import type { BundleExtractor } from "../../domain/ports/bundleExtractor.js";
import { BundleExtractionError } from "../../domain/errors.js";
import { logger } from "../../logger.js";

const REGULAR_FILE_TYPES = new Set(["File", "OldFile", "ContiguousFile"]);

function isContained(entryPath: string): boolean {
    return (
        !path.isAbsolute(entryPath) &&
        !entryPath.split(/[\\/]/).includes("..")
    );
}

/**
 * Unpacks the members of a tar bundle that end in `memberSuffix` and moves
 * them flat into the destination directory.
 */
export class TarBundleExtractor implements BundleExtractor {
    private readonly memberSuffix: string;

    constructor(memberSuffix: string) {
        this.memberSuffix = memberSuffix.toLowerCase();
    }

    async extract(
        bundlePath: string,
        destinationDir: string,
    ): Promise<string[]> {
        await mkdir(destinationDir, { recursive: true });
        const members: string[] = [];
        logger.info("Extracting bundle", {
            component: "TarBundleExtractor",
            action: "extract",
            bundle: path.basename(bundlePath),
        });

        try {
            await tar.x({
                file: bundlePath,
                cwd: destinationDir,
                strict: true,
                filter: (entryPath, entry) => {
                    const wanted =
                        "type" in entry &&
                        REGULAR_FILE_TYPES.has(entry.type) &&
                        isContained(entryPath) &&
                        entryPath.toLowerCase().endsWith(this.memberSuffix);
                    if (wanted) members.push(entryPath);
                    return wanted;
                },
            });
        } catch (e) {
            throw new BundleExtractionError(
                `Cannot extract ${path.basename(bundlePath)}: ${String(e)}`,
                bundlePath,
            );
        }

        const extracted: string[] = [];
        for (const member of members) {
            const source = path.join(destinationDir, member);
            const target = path.join(destinationDir, path.basename(member));
            if (source !== target) {
                await rename(source, target);
            }
            extracted.push(target);
        }
        logger.debug("Extracted bundle members", {
            component: "TarBundleExtractor",
            action: "extract",
            bundle: path.basename(bundlePath),
            members: extracted.length,
        });
        return extracted;
    }
}
