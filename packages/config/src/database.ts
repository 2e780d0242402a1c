/**
 * Database connection settings
 *
 * Only the values needed to open a pool are resolved here; no
 * connection is attempted.
 *
 * @module database
 */

import { EnvironmentKind } from "./environment.ts";
import { ConfigError } from "./errors.ts";
import { resolveBoolean, resolveRequiredString, resolveUnsignedInt, resolveUnsignedLong } from "./resolver.ts";
import type { EnvSource } from "./source.ts";

/**
 * Settings used to establish a connection with a database
 */
export interface DatabaseSettings {
    /** Connection string from `DATABASE_URL` (required) */
    readonly databaseUrl: string;
    /**
     * Connections opened at start-up, from `MIN_CONNECTIONS`
     * @default 1
     */
    readonly minConnections: number;
    /**
     * Max connections allowed, from `MAX_CONNECTIONS`
     * @default 10
     */
    readonly maxConnections: number;
    /**
     * Time allowed to acquire a connection in milliseconds, from `ACQUIRE_TIMEOUT_MS`
     * @default 750
     */
    readonly acquireTimeoutMs: number;
    /**
     * Seconds a connection may stay idle before it is closed, from `IDLE_TIMEOUT_SEC`
     * @default 300
     */
    readonly idleTimeoutSec: number;
    /**
     * Whether to test connections before handing them out, from `TEST_BEFORE_ACQUIRE`
     * @default false
     */
    readonly testBeforeAcquire: boolean;
}

export const DatabaseDefaults = {
    MIN_CONNECTIONS: 1,
    MAX_CONNECTIONS: 10,
    ACQUIRE_TIMEOUT_MS: 750,
    IDLE_TIMEOUT_SEC: 300,
    TEST_BEFORE_ACQUIRE: false,
} as const;

const TEST_DATABASE_SUFFIX = "_test";

/**
 * Point the test tier at its own database.
 *
 * `_test` is appended unless the URL already ends with it or carries
 * connection arguments (`?`).
 */
export function testDatabaseUrl(url: string): string {
    if (url.endsWith(TEST_DATABASE_SUFFIX) || url.includes("?")) {
        return url;
    }
    return `${url}${TEST_DATABASE_SUFFIX}`;
}

/**
 * Resolve the database variables for the given environment.
 *
 * @throws ConfigError MissingVariable when `DATABASE_URL` is absent or empty
 * @throws ConfigError InvalidPoolRange when `MIN_CONNECTIONS` > `MAX_CONNECTIONS`
 */
export function resolveDatabaseSettings(source: EnvSource, env: EnvironmentKind): DatabaseSettings {
    const url = resolveRequiredString(source, "DATABASE_URL");
    const databaseUrl = env === EnvironmentKind.Test ? testDatabaseUrl(url) : url;

    const minConnections = resolveUnsignedInt(source, "MIN_CONNECTIONS", DatabaseDefaults.MIN_CONNECTIONS);
    const maxConnections = resolveUnsignedInt(source, "MAX_CONNECTIONS", DatabaseDefaults.MAX_CONNECTIONS);
    if (minConnections > maxConnections) {
        throw ConfigError.invalidPoolRange(minConnections, maxConnections);
    }

    return Object.freeze({
        databaseUrl,
        minConnections,
        maxConnections,
        acquireTimeoutMs: resolveUnsignedLong(source, "ACQUIRE_TIMEOUT_MS", DatabaseDefaults.ACQUIRE_TIMEOUT_MS),
        idleTimeoutSec: resolveUnsignedLong(source, "IDLE_TIMEOUT_SEC", DatabaseDefaults.IDLE_TIMEOUT_SEC),
        testBeforeAcquire: resolveBoolean(source, "TEST_BEFORE_ACQUIRE", DatabaseDefaults.TEST_BEFORE_ACQUIRE),
    });
}
