import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { parse } from "node-html-parser";
import type { RemoteCatalog } from "../../domain/ports/remoteCatalog.js";
import { withRetry } from "../../application/backoff.js";
import { logger } from "../../logger.js";

export interface HttpCatalogOptions {
    timeoutMs: number;
    /** Total tries per request. */
    maxRetries: number;
    retryDelayMs: number;
    /** Lower-case suffixes a listed name must end with. */
    allowedSuffixes: string[];
    sleepFn?: (ms: number) => Promise<void>;
}

export class HttpStatusError extends Error {
    status: number;
    url: string;
    constructor(status: number, url: string) {
        super(`GET ${url} failed with ${status}`);
        this.name = "HttpStatusError";
        this.status = status;
        this.url = url;
    }
}

function safeDecode(value: string): string | null {
    try {
        return decodeURIComponent(value);
    } catch {
        return null;
    }
}

/** Extracts file names from the `href`s of an HTML directory index, newest first. */
export function parseDirectoryListing(
    html: string,
    allowedSuffixes: readonly string[],
): string[] {
    const root = parse(html);
    const names = new Set<string>();
    for (const anchor of root.querySelectorAll("a")) {
        const href = anchor.getAttribute("href");
        if (!href) continue;
        const clean = href.split(/[?#]/)[0];
        const name = safeDecode(clean.slice(clean.lastIndexOf("/") + 1));
        if (!name) continue;
        const lower = name.toLowerCase();
        if (allowedSuffixes.some((suffix) => lower.endsWith(suffix))) {
            names.add(name);
        }
    }
    return [...names].sort().reverse();
}

type ResponseBody = NonNullable<Response["body"]>;

async function* readChunks(body: ResponseBody): AsyncGenerator<Uint8Array> {
    const reader = body.getReader();
    try {
        while (true) {
            const { done, value } = await reader.read();
            if (done) return;
            yield value;
        }
    } finally {
        reader.releaseLock();
    }
}

function joinUrl(base: string, name: string): string {
    return base.replace(/\/?$/, "/") + encodeURIComponent(name);
}

export class HttpDirectoryCatalog implements RemoteCatalog {
    constructor(private readonly opts: HttpCatalogOptions) {}

    async list(feedUrl: string): Promise<string[]> {
        logger.debug("Listing remote files", {
            component: "HttpDirectoryCatalog",
            action: "list",
            url: feedUrl,
        });
        try {
            const res = await this.get(feedUrl);
            const html = await res.text();
            return parseDirectoryListing(html, this.opts.allowedSuffixes);
        } catch (e) {
            logger.error("Giving up on listing", {
                component: "HttpDirectoryCatalog",
                action: "list",
                url: feedUrl,
                error: String(e),
            });
            return [];
        }
    }

    async fetch(
        feedUrl: string,
        name: string,
        destination: string,
    ): Promise<string | null> {
        const url = joinUrl(feedUrl, name);
        const partial = `${destination}.part`;
        await mkdir(path.dirname(destination), { recursive: true });
        logger.info("Downloading", {
            component: "HttpDirectoryCatalog",
            action: "fetch",
            url,
        });
        try {
            const res = await this.get(url);
            if (!res.body) throw new Error(`GET ${url} returned no body`);
            await pipeline(
                Readable.from(readChunks(res.body)),
                createWriteStream(partial),
            );
            await rename(partial, destination);
            return destination;
        } catch (e) {
            await rm(partial, { force: true });
            await rm(destination, { force: true });
            logger.error("Download failed", {
                component: "HttpDirectoryCatalog",
                action: "fetch",
                url,
                error: String(e),
            });
            return null;
        }
    }

    private get(url: string): Promise<Response> {
        return withRetry(
            async () => {
                const res = await fetch(url, {
                    signal: AbortSignal.timeout(this.opts.timeoutMs),
                });
                if (!res.ok) {
                    await res.body?.cancel();
                    throw new HttpStatusError(res.status, url);
                }
                return res;
            },
            {
                attempts: this.opts.maxRetries,
                baseDelayMs: this.opts.retryDelayMs,
                sleepFn: this.opts.sleepFn,
                onRetry: ({ attempt, attempts, delayMs, error }) =>
                    logger.warn("Request failed; retrying", {
                        component: "HttpDirectoryCatalog",
                        url,
                        attempt,
                        attempts,
                        delayMs,
                        error: String(error),
                    }),
            },
        );
    }
}
