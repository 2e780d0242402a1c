/**
 * Environment sources
 *
 * Resolution never touches `process.env` directly: it reads from an
 * EnvSource, a point-in-time snapshot of name/value pairs.
 *
 * @module source
 */

import { readFileSync } from "node:fs";
import { parse } from "dotenv";

/**
 * Read-only lookup of environment variables
 */
export interface EnvSource {
    get(name: string): string | undefined;
}

/**
 * Create a frozen source from a plain record.
 *
 * Entries whose value is `undefined` are treated as absent.
 *
 * @example
 * ```typescript
 * const source = envFromRecord({ PORT: "8080", DATABASE_URL: "postgresql://localhost/db" });
 * source.get("PORT"); // "8080"
 * ```
 */
export function envFromRecord(record: Readonly<Record<string, string | undefined>>): EnvSource {
    const values = new Map<string, string>();
    for (const [name, value] of Object.entries(record)) {
        if (value !== undefined) values.set(name, value);
    }
    return Object.freeze({
        get(name: string): string | undefined {
            return values.get(name);
        },
    });
}

/**
 * Snapshot the variables visible in `process.env` right now.
 *
 * Later changes to `process.env` are not seen by the returned source.
 */
export function snapshotProcessEnv(): EnvSource {
    return envFromRecord({ ...process.env });
}

/**
 * Parse `.env` formatted text into a source
 */
export function envFromDotenv(text: string): EnvSource {
    return envFromRecord(parse(text));
}

/**
 * Read and parse a `.env` file
 *
 * @param path - File path, resolved against the current directory
 */
export function readEnvFile(path: string): EnvSource {
    return envFromDotenv(readFileSync(path, "utf8"));
}

/**
 * Combine sources; the first source holding a variable wins.
 *
 * @example
 * ```typescript
 * // real environment overrides the .env file
 * const source = mergeEnvSources(snapshotProcessEnv(), readEnvFile(".env"));
 * ```
 */
export function mergeEnvSources(...sources: readonly EnvSource[]): EnvSource {
    return Object.freeze({
        get(name: string): string | undefined {
            for (const source of sources) {
                const value = source.get(name);
                if (value !== undefined) return value;
            }
            return undefined;
        },
    });
}
