import type { PacketRejection } from "../protocol/constants";

/**
 * Custom error class for timeout operations.
 *
 * Note: The underlying BLE operation may still complete in the background
 * after a timeout is thrown. Most BLE stacks do not support true
 * operation cancellation.
 */
export class TimeoutError extends Error {
	constructor(
		public readonly operation: string,
		public readonly timeout: number,
	) {
		super(`${operation} timed out after ${timeout}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Error thrown when an operation is aborted via AbortSignal.
 */
export class AbortError extends Error {
	constructor(message = "Operation aborted") {
		super(message);
		this.name = "AbortError";
	}
}

/**
 * The device could not be reached. Fatal to a poll session.
 */
export class BLEConnectionError extends Error {
	constructor(
		public readonly address: string,
		message: string,
	) {
		super(`Failed to connect to ${address}: ${message}`);
		this.name = "BLEConnectionError";
	}
}

/**
 * Notifications could not be enabled on the sensor characteristic.
 * Whether this ends the session depends on the device profile.
 */
export class SubscribeError extends Error {
	constructor(
		public readonly characteristic: string,
		message: string,
	) {
		super(`Failed to subscribe to ${characteristic}: ${message}`);
		this.name = "SubscribeError";
	}
}

/**
 * A characteristic write failed. Never fatal to a poll session.
 */
export class WriteError extends Error {
	constructor(
		public readonly characteristic: string,
		message: string,
	) {
		super(`Failed to write ${characteristic}: ${message}`);
		this.name = "WriteError";
	}
}

/**
 * A notification payload could not be decoded.
 * Only the offending packet is dropped.
 */
export class MalformedPacketError extends Error {
	constructor(
		public readonly reason: PacketRejection,
		public readonly length: number,
	) {
		super(`Malformed packet (${reason}, ${length} bytes)`);
		this.name = "MalformedPacketError";
	}
}

/**
 * A data packet carried a sensor identity that is not mapped to a position.
 */
export class UnknownSensorError extends Error {
	constructor(public readonly identity: string) {
		super(`Unknown sensor ${identity}`);
		this.name = "UnknownSensorError";
	}
}

/**
 * User configuration failed validation.
 */
export class InvalidConfigError extends Error {
	constructor(
		public readonly path: string,
		message: string,
	) {
		super(`Invalid configuration at ${path}: ${message}`);
		this.name = "InvalidConfigError";
	}
}

function abortMessage(reason: unknown): string {
	return reason instanceof Error
		? reason.message
		: typeof reason === "string"
			? reason
			: "Operation aborted";
}

/**
 * Throws an AbortError if the given signal is aborted.
 * Use this at the start of async operations to fail fast on abort.
 *
 * @throws {AbortError} If the signal is aborted
 */
export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new AbortError(abortMessage(signal.reason));
	}
}

/**
 * Races a promise against an AbortSignal, rejecting with AbortError if aborted.
 *
 * Note: This does NOT cancel the underlying promise - it continues running
 * in the background.
 */
export function raceWithAbort<T>(
	promise: Promise<T>,
	signal?: AbortSignal,
): Promise<T> {
	if (!signal) return promise;

	return new Promise((resolve, reject) => {
		const abortHandler = () => {
			reject(new AbortError(abortMessage(signal.reason)));
		};

		if (signal.aborted) {
			abortHandler();
			return;
		}

		signal.addEventListener("abort", abortHandler, { once: true });

		promise
			.then(resolve)
			.catch(reject)
			.finally(() => signal.removeEventListener("abort", abortHandler));
	});
}

/**
 * Normalizes any thrown value into an Error instance.
 */
export function normalizeError(e: unknown): Error {
	if (e instanceof Error) {
		return e;
	}

	if (e === null) {
		return new Error("null");
	}

	if (e === undefined) {
		return new Error("undefined");
	}

	if (typeof e === "string") {
		return new Error(e);
	}

	if (typeof e === "object") {
		try {
			return new Error(JSON.stringify(e));
		} catch {
			// Circular reference or other JSON error
			return new Error(String(e));
		}
	}

	return new Error(String(e));
}

/**
 * Wraps a promise with a timeout.
 * If the promise doesn't settle within the specified time,
 * rejects with a TimeoutError.
 *
 * **Important:** This does NOT cancel the underlying operation.
 *
 * @param label - Descriptive label for the operation (used in error message)
 * @throws {TimeoutError} If the operation times out
 */
export function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	label: string,
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timeoutId = setTimeout(() => {
			reject(new TimeoutError(label, ms));
		}, ms);

		promise
			.then((value) => {
				clearTimeout(timeoutId);
				resolve(value);
			})
			.catch((error: unknown) => {
				clearTimeout(timeoutId);
				reject(error);
			});
	});
}

/**
 * Determines if a BLE error is transient and worth retrying.
 *
 * Retries on timeouts, GATT/connection failures and "device busy"
 * style errors. Aborts, missing devices and permission errors fail fast,
 * as do unknown errors.
 */
export function isTransientBLEError(error: Error): boolean {
	if (error instanceof AbortError || error.name === "AbortError") {
		return false;
	}

	if (error instanceof TimeoutError || error.name === "TimeoutError") {
		return true;
	}

	const message = error.message.toLowerCase();
	const name = error.name.toLowerCase();

	const nonRetryablePatterns = [
		"not found",
		"permission denied",
		"notallowederror",
		"adapter unavailable",
		"powered off",
	];

	for (const pattern of nonRetryablePatterns) {
		if (message.includes(pattern) || name.includes(pattern)) {
			return false;
		}
	}

	const retryablePatterns = [
		"gatt",
		"connection",
		"disconnect",
		"operation failed",
		"not connected",
		"in progress",
		"busy",
	];

	for (const pattern of retryablePatterns) {
		if (message.includes(pattern) || name.includes(pattern)) {
			return true;
		}
	}

	return false;
}
