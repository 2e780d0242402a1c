/**
 * Configuration error types
 *
 * Every failure while resolving the configuration is a ConfigError
 * carrying one of three kinds of details.
 *
 * @module errors
 */

/**
 * A required variable is absent (or empty).
 */
export interface MissingVariableDetails {
    readonly kind: "MissingVariable";
    readonly name: string;
}

/**
 * A variable is present but does not coerce to its type.
 */
export interface InvalidValueDetails {
    readonly kind: "InvalidValue";
    readonly name: string;
    readonly raw: string;
    readonly expected: string;
}

/**
 * The pool minimum is greater than the pool maximum.
 */
export interface InvalidPoolRangeDetails {
    readonly kind: "InvalidPoolRange";
    readonly min: number;
    readonly max: number;
}

export type ConfigErrorDetails = MissingVariableDetails | InvalidValueDetails | InvalidPoolRangeDetails;

export type ConfigErrorKind = ConfigErrorDetails["kind"];

function formatMessage(details: ConfigErrorDetails): string {
    switch (details.kind) {
        case "MissingVariable":
            return `${details.name} must be set`;
        case "InvalidValue":
            return `${details.name} invalid value "${details.raw}": expected ${details.expected}`;
        case "InvalidPoolRange":
            return `MIN_CONNECTIONS (${details.min}) must not exceed MAX_CONNECTIONS (${details.max})`;
    }
}

/**
 * Configuration error.
 *
 * Raised at startup only; a process holding a Config never sees one.
 */
export class ConfigError extends Error {
    readonly details: ConfigErrorDetails;

    get kind(): ConfigErrorKind {
        return this.details.kind;
    }

    constructor(details: ConfigErrorDetails) {
        super(formatMessage(details));
        this.name = "ConfigError";
        this.details = details;
    }

    static missingVariable(name: string): ConfigError {
        return new ConfigError({ kind: "MissingVariable", name });
    }

    static invalidValue(name: string, raw: string, expected: string): ConfigError {
        return new ConfigError({ kind: "InvalidValue", name, raw, expected });
    }

    static invalidPoolRange(min: number, max: number): ConfigError {
        return new ConfigError({ kind: "InvalidPoolRange", min, max });
    }
}

/**
 * Type guard for ConfigError.
 */
export function isConfigError(err: unknown): err is ConfigError {
    return err instanceof ConfigError;
}
