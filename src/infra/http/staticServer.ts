import http from "node:http";
import path from "node:path";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { logger } from "../../logger.js";

export type MountTable = Record<string, string>;

const CONTENT_TYPES: Record<string, string> = {
    ".png": "image/png",
    ".json": "application/json",
    ".txt": "text/plain; charset=utf-8",
};

/** Maps a request path onto a file under one of the mounts, or null. */
export function resolveMountPath(
    mounts: MountTable,
    requestPath: string,
): string | null {
    let pathname: string;
    try {
        pathname = decodeURIComponent(
            new URL(requestPath, "http://localhost").pathname,
        );
    } catch {
        return null;
    }
    const parts = pathname.split("/").filter(Boolean);
    const [mount, ...rest] = parts;
    if (!mount || !rest.length) return null;
    if (!Object.hasOwn(mounts, mount)) return null;
    const root = mounts[mount];
    if (!root) return null;
    if (rest.some((part) => part === ".." || part.includes("\\"))) return null;

    const resolved = path.resolve(root, ...rest);
    const base = path.resolve(root);
    if (!resolved.startsWith(base + path.sep)) return null;
    return resolved;
}

export function createStaticServer(mounts: MountTable): http.Server {
    return http.createServer((req, res) => {
        if (req.method !== "GET" && req.method !== "HEAD") {
            res.writeHead(405, { allow: "GET, HEAD" });
            res.end();
            return;
        }
        const file = resolveMountPath(mounts, req.url ?? "/");
        if (!file) {
            res.writeHead(404);
            res.end();
            return;
        }
        stat(file).then(
            (info) => {
                if (!info.isFile()) {
                    res.writeHead(404);
                    res.end();
                    return;
                }
                res.writeHead(200, {
                    "content-type":
                        CONTENT_TYPES[path.extname(file).toLowerCase()] ??
                        "application/octet-stream",
                    "content-length": info.size,
                    "cache-control": "no-cache",
                });
                if (req.method === "HEAD") {
                    res.end();
                    return;
                }
                createReadStream(file)
                    .on("error", (err) => {
                        logger.warn("Static read failed", {
                            component: "StaticServer",
                            file,
                            error: String(err),
                        });
                        res.destroy(err);
                    })
                    .pipe(res);
            },
            () => {
                res.writeHead(404);
                res.end();
            },
        );
    });
}

export function startStaticServer(
    mounts: MountTable,
    host: string,
    port: number,
): Promise<http.Server> {
    const server = createStaticServer(mounts);
    return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => {
            server.off("error", reject);
            logger.info("Serving outputs", {
                component: "StaticServer",
                host,
                port,
                mounts: Object.keys(mounts).sort(),
            });
            resolve(server);
        });
    });
}
