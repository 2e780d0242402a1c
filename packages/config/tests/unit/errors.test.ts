/**
 * ConfigError tests
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { ConfigError, isConfigError } from "../../src/errors.ts";

describe("ConfigError", () => {
	it("should describe a missing variable", () => {
		const err = ConfigError.missingVariable("DATABASE_URL");

		assert.strictEqual(err.name, "ConfigError");
		assert.strictEqual(err.kind, "MissingVariable");
		assert.strictEqual(err.message, "DATABASE_URL must be set");
		assert.deepStrictEqual(err.details, { kind: "MissingVariable", name: "DATABASE_URL" });
	});

	it("should describe an invalid value with the raw value and expected type", () => {
		const err = ConfigError.invalidValue("PORT", "abc", "port number (1-65535)");

		assert.strictEqual(err.kind, "InvalidValue");
		assert.strictEqual(err.message, 'PORT invalid value "abc": expected port number (1-65535)');
		assert.deepStrictEqual(err.details, {
			kind: "InvalidValue",
			name: "PORT",
			raw: "abc",
			expected: "port number (1-65535)",
		});
	});

	it("should describe an invalid pool range", () => {
		const err = ConfigError.invalidPoolRange(5, 2);

		assert.strictEqual(err.kind, "InvalidPoolRange");
		assert.strictEqual(err.message, "MIN_CONNECTIONS (5) must not exceed MAX_CONNECTIONS (2)");
		assert.deepStrictEqual(err.details, { kind: "InvalidPoolRange", min: 5, max: 2 });
	});

	it("should be an Error", () => {
		const err = ConfigError.missingVariable("X");

		assert.ok(err instanceof Error);
		assert.ok(typeof err.stack === "string");
	});
});

describe("isConfigError", () => {
	it("should return true for a ConfigError", () => {
		assert.strictEqual(isConfigError(ConfigError.missingVariable("X")), true);
	});

	it("should return false for a plain Error", () => {
		assert.strictEqual(isConfigError(new Error("X must be set")), false);
	});

	it("should return false for a look-alike object", () => {
		assert.strictEqual(isConfigError({ name: "ConfigError", details: { kind: "MissingVariable", name: "X" } }), false);
	});

	it("should return false for null and undefined", () => {
		assert.strictEqual(isConfigError(null), false);
		assert.strictEqual(isConfigError(undefined), false);
	});
});
