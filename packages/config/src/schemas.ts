/**
 * Value schemas with Zod
 *
 * Each schema takes the raw string of one environment variable and
 * coerces it to its typed value.
 *
 * @module schemas
 */

import { z } from "zod";

const DigitsSchema = z.string().regex(/^\d+$/);

/**
 * TCP port, 1-65535
 */
export const PortSchema = DigitsSchema.pipe(z.coerce.number().int().min(1).max(65535));

/**
 * Unsigned 32-bit integer
 */
export const UnsignedIntSchema = DigitsSchema.pipe(z.coerce.number().int().min(0).max(4_294_967_295));

/**
 * Unsigned integer within the safe integer range
 */
export const UnsignedLongSchema = DigitsSchema.pipe(z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER));

/**
 * Boolean from string schema (for ENV variables), case-insensitive
 */
export const BooleanFromStringSchema = z
    .string()
    .toLowerCase()
    .pipe(z.enum(["true", "false", "1", "0"]))
    .transform((v) => v === "true" || v === "1");

/**
 * Deployment tier names
 */
export const EnvironmentKindValueSchema = z.enum(["local", "test", "staging", "production"]);

/**
 * Deployment tier from string schema, case-insensitive exact match
 */
export const EnvironmentKindSchema = z.string().toLowerCase().pipe(EnvironmentKindValueSchema);
