/**
 * @server-env/config
 *
 * Typed, validated HTTP server configuration from environment variables.
 *
 * Provides:
 * - initConfig / loadConfig: resolve the full Config once at start-up
 * - renderConfig: print a Config in `.env` format
 * - EnvSource: injectable environment snapshots (process env, records, .env files)
 * - Field resolvers and Zod schemas for individual variables
 *
 * @module @server-env/config
 */

// =============================================================================
// CONFIG API
// =============================================================================

export { initConfig, loadConfig, renderConfig } from "./Config.ts";
export type { Config, ConfigResult, InitConfigOptions } from "./Config.ts";

// =============================================================================
// SETTINGS
// =============================================================================

export {
    APP_ENV,
    DEFAULT_ENVIRONMENT_KIND,
    EnvironmentKind,
    isEnvironmentKind,
    parseEnvironmentKind,
    resolveEnvironment,
} from "./environment.ts";
export { DEFAULT_HOST, buildServerUrl, resolveServerSettings } from "./server.ts";
export type { ServerSettings, ServerSettingsOptions } from "./server.ts";
export { DatabaseDefaults, resolveDatabaseSettings, testDatabaseUrl } from "./database.ts";
export type { DatabaseSettings } from "./database.ts";

// =============================================================================
// ENVIRONMENT SOURCES
// =============================================================================

export { envFromDotenv, envFromRecord, mergeEnvSources, readEnvFile, snapshotProcessEnv } from "./source.ts";
export type { EnvSource } from "./source.ts";

// =============================================================================
// FIELD RESOLVER
// =============================================================================

export {
    Expected,
    coerceValue,
    resolveBoolean,
    resolveEnvironmentKind,
    resolvePort,
    resolveRequiredString,
    resolveString,
    resolveUnsignedInt,
    resolveUnsignedLong,
} from "./resolver.ts";
export {
    BooleanFromStringSchema,
    EnvironmentKindSchema,
    EnvironmentKindValueSchema,
    PortSchema,
    UnsignedIntSchema,
    UnsignedLongSchema,
} from "./schemas.ts";

// =============================================================================
// ERRORS AND LOGGING
// =============================================================================

export { ConfigError, isConfigError } from "./errors.ts";
export type {
    ConfigErrorDetails,
    ConfigErrorKind,
    InvalidPoolRangeDetails,
    InvalidValueDetails,
    MissingVariableDetails,
} from "./errors.ts";
export { DEFAULT_LOGGER_NAME, getLogger } from "./logger.ts";
export type { Logger } from "./logger.ts";
