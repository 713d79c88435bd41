/**
 * Minimal logging contract used throughout the library.
 * Hosts can pass their own implementation to route messages elsewhere.
 */
export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
	/** Emit debug messages (default: false) */
	debug?: boolean;
}

/** Log prefix shared by every scope */
export const LOG_PREFIX = "tpms-ble-kit";

/**
 * Creates a console-backed logger that prefixes each message with
 * `[tpms-ble-kit:<scope>]`.
 *
 * @example
 * ```typescript
 * const log = createConsoleLogger("poll");
 * log.warn("Timeout waiting for complete data");
 * // [tpms-ble-kit:poll] Timeout waiting for complete data
 * ```
 */
export function createConsoleLogger(
	scope: string,
	options: ConsoleLoggerOptions = {},
): Logger {
	const prefix = `[${LOG_PREFIX}:${scope}]`;
	const debugEnabled = options.debug ?? false;

	return {
		debug(message, ...details) {
			if (debugEnabled) {
				console.debug(`${prefix} ${message}`, ...details);
			}
		},
		info(message, ...details) {
			console.info(`${prefix} ${message}`, ...details);
		},
		warn(message, ...details) {
			console.warn(`${prefix} ${message}`, ...details);
		},
		error(message, ...details) {
			console.error(`${prefix} ${message}`, ...details);
		},
	};
}

export function createNoOpLogger(): Logger {
	return {
		debug(): void {},
		info(): void {},
		warn(): void {},
		error(): void {},
	};
}
