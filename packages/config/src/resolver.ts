/**
 * Field resolver
 *
 * Looks up one variable in an EnvSource, applies the default when the
 * variable is absent and coerces it otherwise. A present but invalid
 * value is always an error, it never falls back to the default.
 *
 * @module resolver
 */

import type { z } from "zod";
import { ConfigError } from "./errors.ts";
import type { EnvironmentKind } from "./environment.ts";
import {
    BooleanFromStringSchema,
    EnvironmentKindSchema,
    PortSchema,
    UnsignedIntSchema,
    UnsignedLongSchema,
} from "./schemas.ts";
import type { EnvSource } from "./source.ts";

/**
 * Type labels used in InvalidValue errors
 */
export const Expected = {
    PORT: "port number (1-65535)",
    UNSIGNED_INT: "unsigned 32-bit integer",
    UNSIGNED_LONG: "unsigned integer",
    BOOLEAN: "boolean (true/false/1/0)",
    ENVIRONMENT_KIND: "one of local, test, staging, production",
} as const;

type StringSchema<T> = z.ZodType<T, z.ZodTypeDef, string>;

/**
 * Coerce a raw value, raising InvalidValue on failure
 */
export function coerceValue<T>(name: string, raw: string, schema: StringSchema<T>, expected: string): T {
    const result = schema.safeParse(raw);
    if (!result.success) {
        throw ConfigError.invalidValue(name, raw, expected);
    }
    return result.data;
}

function resolveWith<T>(source: EnvSource, name: string, defaultValue: T, schema: StringSchema<T>, expected: string): T {
    const raw = source.get(name);
    if (raw === undefined) return defaultValue;
    return coerceValue(name, raw, schema, expected);
}

/**
 * Resolve an optional string variable
 */
export function resolveString(source: EnvSource, name: string, defaultValue: string): string {
    return source.get(name) ?? defaultValue;
}

/**
 * Resolve a required string variable; absent and empty are both missing
 */
export function resolveRequiredString(source: EnvSource, name: string): string {
    const raw = source.get(name);
    if (raw === undefined || raw === "") {
        throw ConfigError.missingVariable(name);
    }
    return raw;
}

/**
 * Resolve a port number.
 *
 * The default is checked against the same range as the variable.
 */
export function resolvePort(source: EnvSource, name: string, defaultPort: number): number {
    const raw = source.get(name);
    if (raw === undefined) {
        return coerceValue(name, String(defaultPort), PortSchema, Expected.PORT);
    }
    return coerceValue(name, raw, PortSchema, Expected.PORT);
}

export function resolveUnsignedInt(source: EnvSource, name: string, defaultValue: number): number {
    return resolveWith(source, name, defaultValue, UnsignedIntSchema, Expected.UNSIGNED_INT);
}

export function resolveUnsignedLong(source: EnvSource, name: string, defaultValue: number): number {
    return resolveWith(source, name, defaultValue, UnsignedLongSchema, Expected.UNSIGNED_LONG);
}

/**
 * Resolve a boolean, accepting true/false/1/0 in any case
 */
export function resolveBoolean(source: EnvSource, name: string, defaultValue: boolean): boolean {
    return resolveWith(source, name, defaultValue, BooleanFromStringSchema, Expected.BOOLEAN);
}

export function resolveEnvironmentKind(source: EnvSource, name: string, defaultValue: EnvironmentKind): EnvironmentKind {
    return resolveWith(source, name, defaultValue, EnvironmentKindSchema, Expected.ENVIRONMENT_KIND);
}
