/**
 * Full server configuration
 *
 * Composes the deployment environment, the HTTP server settings and
 * the database settings into one frozen object, resolved once at
 * process start-up.
 *
 * @module Config
 */

import { type DatabaseSettings, resolveDatabaseSettings } from "./database.ts";
import { EnvironmentKind, resolveEnvironment } from "./environment.ts";
import { ConfigError, isConfigError } from "./errors.ts";
import { type Logger, getLogger } from "./logger.ts";
import { type ServerSettings, resolveServerSettings } from "./server.ts";
import { type EnvSource, snapshotProcessEnv } from "./source.ts";

export interface Config {
    /** Deployment environment, normally from `APP_ENV` */
    readonly env: EnvironmentKind;
    /** Everything needed to launch the HTTP server */
    readonly server: ServerSettings;
    /** Everything needed to open the database pool */
    readonly db: DatabaseSettings;
}

export interface InitConfigOptions {
    /**
     * Variables to read from
     * @default snapshotProcessEnv()
     */
    source?: EnvSource;
    /** Use this environment instead of reading `APP_ENV` */
    environment?: EnvironmentKind;
    /**
     * Host used when `HOST` is not set
     * @default '127.0.0.1'
     */
    defaultHost?: string;
    logger?: Logger;
}

export type ConfigResult = { readonly success: true; readonly data: Config } | { readonly success: false; readonly error: ConfigError };

/**
 * Initialize the configuration from environment variables.
 *
 * The port is read from `PORT`, otherwise `defaultPort` is used.
 * Resolution stops at the first error, which is returned rather
 * than thrown.
 *
 * @example
 * ```typescript
 * const result = initConfig(8080);
 * if (!result.success) {
 *   console.error(result.error.message);
 *   process.exit(1);
 * }
 * const { server, db } = result.data;
 * ```
 */
export function initConfig(defaultPort: number, options: InitConfigOptions = {}): ConfigResult {
    const logger = options.logger ?? getLogger();
    const source = options.source ?? snapshotProcessEnv();

    logger.debug("Configuring server environment");
    try {
        const env = options.environment ?? resolveEnvironment(source);
        const message = `Environment set to ${env}`;
        if (env === EnvironmentKind.Test) {
            logger.debug(message, { "app.env": env });
        } else {
            logger.info(message, { "app.env": env });
        }

        const db = resolveDatabaseSettings(source, env);
        const server = resolveServerSettings(source, {
            defaultPort,
            defaultHost: options.defaultHost,
        });
        return { success: true, data: Object.freeze({ env, server, db }) };
    } catch (err) {
        if (!isConfigError(err)) throw err;
        logger.warn("Configuration failed", {
            "error.kind": err.kind,
            "error.message": err.message,
        });
        return { success: false, error: err };
    }
}

/**
 * Same as {@link initConfig} but throws the ConfigError
 *
 * @throws ConfigError
 */
export function loadConfig(defaultPort: number, options?: InitConfigOptions): Config {
    const result = initConfig(defaultPort, options);
    if (!result.success) throw result.error;
    return result.data;
}

/**
 * Quote a value so `.env` parsers read it back unchanged.
 *
 * Double quotes expand `\n` and `\r`, so a value holding a backslash
 * goes in single quotes, or backticks when it also holds a `'`.
 */
function quoteValue(value: string): string {
    if (!value.includes("\\")) return `"${value}"`;
    if (!value.includes("'")) return `'${value}'`;
    return `\`${value}\``;
}

/**
 * Print the configuration in `.env` format.
 *
 * Each line uses as key the variable that sets the value, even when
 * the value came from a default. The computed URL is only a comment.
 * Quoted values are written as is, without escaping.
 */
export function renderConfig(config: Config): string {
    const { env, server, db } = config;
    return [
        "# The following items are the environment variables and their values from",
        "# the OS, from an .env file, or the default value used.",
        "#",
        `# APP_URL --> ${server.url}`,
        "#",
        `APP_ENV=${env}`,
        `APP_URI=${quoteValue(server.uri)}`,
        `HOST=${server.host}`,
        `PORT=${server.port}`,
        `DATABASE_URL=${quoteValue(db.databaseUrl)}`,
        `MIN_CONNECTIONS=${db.minConnections}`,
        `MAX_CONNECTIONS=${db.maxConnections}`,
        `ACQUIRE_TIMEOUT_MS=${db.acquireTimeoutMs}`,
        `IDLE_TIMEOUT_SEC=${db.idleTimeoutSec}`,
        `TEST_BEFORE_ACQUIRE=${db.testBeforeAcquire}`,
    ].join("\n");
}
