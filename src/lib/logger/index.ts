/**
 * Logger wrapper: structured JSON logging backed by pino.
 *
 * Provider credentials are redacted by default; callers can add paths.
 * Domain code depends on the small `Logger` interface, never on pino.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly name?: string;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

/** Paths always censored: provider keys travel in query params and headers. */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"apiKey",
	"apikey",
	"*.apiKey",
	"*.apikey",
	"headers.authorization",
];

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const forward =
		(method: LogMethod) =>
		(msgOrObj: string | Record<string, unknown>, msg?: string): void => {
			if (typeof msgOrObj === "string") {
				pinoLogger[method](msgOrObj);
			} else {
				pinoLogger[method](msgOrObj, msg ?? "");
			}
		};

	return {
		info: forward("info"),
		warn: forward("warn"),
		error: forward("error"),
		debug: forward("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with credential redaction.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", name: "alerts" });
 * logger.info({ ticker: "AAPL" }, "Snapshot fetched");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
		redact: {
			paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
			censor: "[REDACTED]",
		},
	};
	if (config.name !== undefined) {
		pinoOptions.name = config.name;
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Parses a LOG_LEVEL value, falling back to `info` for unknown input. */
export function parseLogLevel(raw: string | undefined): LogLevel {
	const candidate = raw?.trim().toLowerCase();
	return LOG_LEVELS.find((level) => level === candidate) ?? "info";
}

const noop = (): void => {};

/** Logger that discards everything; the default for components built without one. */
export const silentLogger: Logger = {
	info: noop,
	warn: noop,
	error: noop,
	debug: noop,
	child: () => silentLogger,
};
