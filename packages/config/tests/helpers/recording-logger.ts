/**
 * Logger that keeps every call for assertions
 */

import type { AnyValueMap } from "@opentelemetry/api-logs";
import type { Logger } from "../../src/logger.ts";

export interface RecordedLog {
	level: "info" | "warn" | "debug";
	message: string;
	attributes?: AnyValueMap;
}

export function createRecordingLogger(): Logger & { logs: RecordedLog[] } {
	const logs: RecordedLog[] = [];

	return {
		logs,
		info(message, attributes?) {
			logs.push({ level: "info", message, attributes });
		},
		warn(message, attributes?) {
			logs.push({ level: "warn", message, attributes });
		},
		debug(message, attributes?) {
			logs.push({ level: "debug", message, attributes });
		},
	};
}
