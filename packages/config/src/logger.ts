/**
 * Logger backed by the OpenTelemetry logs API
 *
 * Records go to the global LoggerProvider; until the embedding
 * application registers one, logging is a no-op.
 *
 * @module logger
 */

import type { AnyValueMap } from "@opentelemetry/api-logs";
import { SeverityNumber, logs } from "@opentelemetry/api-logs";

/**
 * Levels emitted while resolving the configuration
 */
export interface Logger {
    info(message: string, attributes?: AnyValueMap): void;
    warn(message: string, attributes?: AnyValueMap): void;
    debug(message: string, attributes?: AnyValueMap): void;
}

export const DEFAULT_LOGGER_NAME = "server-env-config";

export function getLogger(name: string = DEFAULT_LOGGER_NAME): Logger {
    const otelLogger = logs.getLogger(name);

    function emitLog(severityNumber: SeverityNumber, severityText: string, message: string, attributes?: AnyValueMap): void {
        otelLogger.emit({
            severityNumber,
            severityText,
            body: message,
            attributes: { "logger.name": name, ...attributes },
        });
    }

    return {
        info(message, attributes?) {
            emitLog(SeverityNumber.INFO, "INFO", message, attributes);
        },
        warn(message, attributes?) {
            emitLog(SeverityNumber.WARN, "WARN", message, attributes);
        },
        debug(message, attributes?) {
            emitLog(SeverityNumber.DEBUG, "DEBUG", message, attributes);
        },
    };
}
