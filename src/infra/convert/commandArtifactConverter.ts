import { spawn } from "node:child_process";
import path from "node:path";
import { access, mkdir } from "node:fs/promises";
import type { ArtifactConverter } from "../../domain/ports/artifactConverter.js";
import type { ArtifactSet, ConversionRequest } from "../../domain/models.js";
import { ConversionError } from "../../domain/errors.js";
import { logger } from "../../logger.js";

export interface CommandConverterOptions {
    command: string;
    args: string[];
    timeoutMs: number;
}

/**
 * Arguments appended to the configured command:
 * `--family <f> --input <raw> [--offset <min>] --output <variant>=<path> ...`
 */
export function buildConverterArgs(
    baseArgs: readonly string[],
    request: ConversionRequest,
): string[] {
    const args = [
        ...baseArgs,
        "--family",
        request.family,
        "--input",
        request.inputPath,
    ];
    if (request.offsetMinutes !== undefined) {
        args.push("--offset", String(request.offsetMinutes));
    }
    for (const [variant, outPath] of Object.entries(request.outputs)) {
        args.push("--output", `${variant}=${outPath}`);
    }
    return args;
}

async function exists(file: string): Promise<boolean> {
    try {
        await access(file);
        return true;
    } catch {
        return false;
    }
}

export class CommandArtifactConverter implements ArtifactConverter {
    constructor(private readonly opts: CommandConverterOptions) {}

    async convert(request: ConversionRequest): Promise<ArtifactSet> {
        const dirs = new Set(
            Object.values(request.outputs).map((out) => path.dirname(out)),
        );
        for (const dir of dirs) {
            await mkdir(dir, { recursive: true });
        }

        const startedAt = Date.now();
        await this.run(buildConverterArgs(this.opts.args, request), request);

        const missing: string[] = [];
        for (const [variant, outPath] of Object.entries(request.outputs)) {
            if (!(await exists(outPath))) missing.push(variant);
        }
        if (missing.length) {
            throw new ConversionError(
                `Converter produced no ${missing.join(", ")} for ${path.basename(request.inputPath)}`,
                request.inputPath,
                missing,
            );
        }

        logger.debug("Converted", {
            component: "CommandArtifactConverter",
            action: "convert",
            family: request.family,
            input: path.basename(request.inputPath),
            variants: Object.keys(request.outputs).length,
            tookMs: Date.now() - startedAt,
        });
        return { ...request.outputs };
    }

    private run(args: string[], request: ConversionRequest): Promise<void> {
        return new Promise((resolve, reject) => {
            const child = spawn(this.opts.command, args, {
                stdio: ["ignore", "ignore", "pipe"],
            });
            let stderr = "";
            const timer = setTimeout(() => {
                child.kill("SIGKILL");
                reject(
                    new ConversionError(
                        `Converter timed out after ${this.opts.timeoutMs}ms`,
                        request.inputPath,
                    ),
                );
            }, this.opts.timeoutMs);
            child.stderr.on("data", (chunk: Buffer) => {
                stderr += chunk.toString();
            });
            child.on("close", (code) => {
                clearTimeout(timer);
                if (code === 0) return resolve();
                reject(
                    new ConversionError(
                        `Converter exited with code ${code}: ${stderr.trim()}`,
                        request.inputPath,
                    ),
                );
            });
            child.on("error", (err) => {
                clearTimeout(timer);
                reject(
                    new ConversionError(
                        `Converter failed to start: ${err.message}`,
                        request.inputPath,
                    ),
                );
            });
        });
    }
}
