/**
 * HTTP server settings
 *
 * @module server
 */

import { resolvePort, resolveString } from "./resolver.ts";
import type { EnvSource } from "./source.ts";

/**
 * Basic configuration for an HTTP server
 */
export interface ServerSettings {
    /**
     * Host address from `HOST`. `"0"` means requests are accepted from anywhere.
     * @default '127.0.0.1'
     */
    readonly host: string;
    /** Port from `PORT`, otherwise the caller's default port */
    readonly port: number;
    /**
     * API URI (e.g. "api/v1") from `APP_URI`, kept as written
     * @default ''
     */
    readonly uri: string;
    /** Public URL computed from host, port and uri; never read from the environment */
    readonly url: string;
}

export interface ServerSettingsOptions {
    defaultPort: number;
    defaultHost?: string;
}

export const DEFAULT_HOST = "127.0.0.1";

/**
 * Build the public URL: `http://{host}:{port}/{uri}/`
 *
 * Slashes around and inside `uri` are collapsed so the result ends
 * with a single `/` and has no empty path segment.
 *
 * @example
 * ```typescript
 * buildServerUrl("127.0.0.1", 8080, "/api//v1/"); // "http://127.0.0.1:8080/api/v1/"
 * buildServerUrl("0", 3000, ""); // "http://localhost:3000/"
 * ```
 */
export function buildServerUrl(host: string, port: number, uri: string): string {
    const hostname = host === "0" ? "localhost" : host;
    const path = uri
        .split("/")
        .filter((segment) => segment.length > 0)
        .join("/");
    return path ? `http://${hostname}:${port}/${path}/` : `http://${hostname}:${port}/`;
}

/**
 * Resolve `HOST`, `PORT` and `APP_URI`, then compute the URL
 */
export function resolveServerSettings(source: EnvSource, options: ServerSettingsOptions): ServerSettings {
    const host = resolveString(source, "HOST", options.defaultHost ?? DEFAULT_HOST);
    const port = resolvePort(source, "PORT", options.defaultPort);
    const uri = resolveString(source, "APP_URI", "");
    return Object.freeze({
        host,
        port,
        uri,
        url: buildServerUrl(host, port, uri),
    });
}
