/**
 * Deployment environments
 *
 * @module environment
 */

import type { z } from "zod";
import { Expected, coerceValue, resolveEnvironmentKind } from "./resolver.ts";
import { EnvironmentKindSchema, EnvironmentKindValueSchema } from "./schemas.ts";
import type { EnvSource } from "./source.ts";

/**
 * Possible deployment environments for an application
 */
export const EnvironmentKind = {
    Local: "local",
    Test: "test",
    Staging: "staging",
    Production: "production",
} as const satisfies Record<string, z.infer<typeof EnvironmentKindValueSchema>>;

export type EnvironmentKind = (typeof EnvironmentKind)[keyof typeof EnvironmentKind];

export const DEFAULT_ENVIRONMENT_KIND: EnvironmentKind = EnvironmentKind.Local;

/**
 * Variable holding the deployment environment
 */
export const APP_ENV = "APP_ENV";

export function isEnvironmentKind(value: unknown): value is EnvironmentKind {
    return EnvironmentKindValueSchema.safeParse(value).success;
}

/**
 * Parse a deployment environment name, ignoring case.
 *
 * @throws ConfigError InvalidValue when the name is not a known environment
 */
export function parseEnvironmentKind(raw: string): EnvironmentKind {
    return coerceValue(APP_ENV, raw, EnvironmentKindSchema, Expected.ENVIRONMENT_KIND);
}

/**
 * Get the environment from `APP_ENV`, `local` when it is not set
 */
export function resolveEnvironment(source: EnvSource): EnvironmentKind {
    return resolveEnvironmentKind(source, APP_ENV, DEFAULT_ENVIRONMENT_KIND);
}
