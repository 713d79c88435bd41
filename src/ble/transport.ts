import pRetry, { AbortError as PRetryAbortError } from "p-retry";
import {
	AbortError,
	isTransientBLEError,
	normalizeError,
	raceWithAbort,
	throwIfAborted,
	TimeoutError,
	withTimeout,
} from "../errors/errors";
import type {
	BLEAdapter,
	BLEConnectedSession,
	BLEConnectOptions,
	BLEGATTCharacteristic,
} from "../types";
import { extractBytes } from "../utils/buffer";
import { createConsoleLogger, type Logger } from "../utils/logger";

/**
 * Options for BLE write operations.
 */
export interface WriteOptions {
	/** Timeout for the write operation in milliseconds */
	timeoutMs?: number;
	/** AbortSignal to cancel the write operation */
	signal?: AbortSignal;
	/** Write without waiting for acknowledgment (default: false) */
	withoutResponse?: boolean;
}

/** Default timeout for BLE write operations in milliseconds */
export const DEFAULT_WRITE_TIMEOUT_MS = 10000;

/** Default timeout for starting BLE notifications in milliseconds */
export const DEFAULT_NOTIFICATION_TIMEOUT_MS = 15000;

/**
 * Writes data to a characteristic with a timeout and optional abort support.
 *
 * @warning **Non-cancellable Operation**: The abort signal or timeout will reject
 * the promise early, but the underlying BLE write continues in the background.
 * The device may still receive and process the data.
 *
 * @param options - Timeout, signal and response options (or just timeout in ms)
 * @throws Error if data is empty
 * @throws AbortError if the signal is aborted
 * @throws TimeoutError if the operation times out
 */
export async function writeWithTimeout(
	char: BLEGATTCharacteristic,
	data: Uint8Array,
	options: WriteOptions | number = DEFAULT_WRITE_TIMEOUT_MS,
): Promise<void> {
	const opts: WriteOptions =
		typeof options === "number" ? { timeoutMs: options } : options;
	const timeoutMs = opts.timeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
	const signal = opts.signal;

	throwIfAborted(signal);

	if (data.byteLength === 0) {
		throw new Error("Empty data: cannot write zero bytes to BLE characteristic");
	}

	const write = opts.withoutResponse
		? char.writeValueWithoutResponse(data)
		: char.writeValueWithResponse(data);

	await raceWithAbort(withTimeout(write, timeoutMs, "BLE write"), signal);
}

/**
 * Options for starting notifications.
 */
export interface StartNotificationsOptions {
	/** Timeout for starting notifications in milliseconds */
	timeoutMs?: number;
	/** Receives errors raised while stopping notifications */
	logger?: Logger;
	/** AbortSignal to cancel the notification setup */
	signal?: AbortSignal;
}

/**
 * Stops notifications and removes the listener. Idempotent; never rejects.
 */
export type StopNotifications = () => Promise<void>;

/**
 * Starts notifications on a characteristic with timeout protection.
 *
 * The listener is registered before notifications are enabled so packets
 * sent right after the subscription are not missed. Empty or detached
 * payloads are skipped.
 *
 * @param onData - Receives a copy of each notified value
 * @returns Cleanup that stops notifications and removes the listener
 * @throws TimeoutError if notification setup takes too long
 * @throws AbortError if the signal is aborted
 *
 * @example
 * ```typescript
 * const stop = await startNotifications(char, (bytes) => {
 *   session.handleNotification(bytes);
 * }, { timeoutMs: 5000 });
 *
 * // Later, when done:
 * await stop();
 * ```
 */
export async function startNotifications(
	char: BLEGATTCharacteristic,
	onData: (data: Uint8Array) => void,
	options: StartNotificationsOptions = {},
): Promise<StopNotifications> {
	const timeoutMs = options.timeoutMs ?? DEFAULT_NOTIFICATION_TIMEOUT_MS;
	const log = options.logger ?? createConsoleLogger("transport");
	const signal = options.signal;

	throwIfAborted(signal);

	const removeListener = char.onValueChanged((value) => {
		const bytes = extractBytes(value);
		if (bytes) {
			onData(bytes);
		}
	});

	try {
		await raceWithAbort(
			withTimeout(char.startNotifications(), timeoutMs, "BLE notification setup"),
			signal,
		);
	} catch (e) {
		removeListener();
		throw e;
	}

	let stopping: Promise<void> | undefined;
	return () => {
		stopping ??= (async () => {
			removeListener();
			try {
				await char.stopNotifications();
			} catch (e) {
				log.warn("Error stopping notifications:", normalizeError(e).message);
			}
		})();
		return stopping;
	};
}

/**
 * Options for configuring retry behavior with exponential backoff.
 */
export interface RetryOptions {
	/** Maximum number of attempts, including the first (default: 3) */
	maxAttempts?: number;
	/** Initial delay in ms (default: 1000) */
	initialDelayMs?: number;
	/** Maximum delay in ms (default: 30000) */
	maxDelayMs?: number;
	/** Multiplier for exponential backoff (default: 2) */
	backoffMultiplier?: number;
	/** Add random jitter to prevent thundering herd (default: true) */
	jitter?: boolean;
	/** AbortSignal to cancel retries */
	signal?: AbortSignal;
	/** Called before each retry with attempt number and delay */
	onRetry?: (attempt: number, delayMs: number, error: Error) => void;
	/** Predicate to determine if error is retryable (default: isTransientBLEError) */
	isRetryable?: (error: Error) => boolean;
}

/**
 * Executes an operation with automatic retry and exponential backoff.
 * Uses p-retry under the hood.
 *
 * @example
 * ```typescript
 * const session = await withRetry(() => adapter.connect({ address }), {
 *   maxAttempts: 3,
 *   onRetry: (attempt, delay, error) => {
 *     log.warn(`Attempt ${attempt} failed, retrying in ${delay}ms: ${error.message}`);
 *   },
 * });
 * ```
 *
 * @returns Promise resolving to the operation result
 * @throws The last error if all retries fail, or AbortError if cancelled
 */
export async function withRetry<T>(
	operation: () => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const {
		maxAttempts = 3,
		initialDelayMs = 1000,
		maxDelayMs = 30000,
		backoffMultiplier = 2,
		jitter = true,
		signal,
		onRetry,
		isRetryable = isTransientBLEError,
	} = options;

	if (maxAttempts < 1) {
		throw new RangeError(`maxAttempts must be >= 1, got ${maxAttempts}`);
	}

	throwIfAborted(signal);

	// p-retry requires minTimeout <= maxTimeout
	const effectiveInitialDelay = Math.min(initialDelayMs, maxDelayMs);

	try {
		return await pRetry(
			async () => {
				try {
					return await operation();
				} catch (e) {
					const error = normalizeError(e);

					if (!isRetryable(error)) {
						throw new PRetryAbortError(error);
					}

					throw error;
				}
			},
			{
				// p-retry counts extra attempts after the first
				retries: maxAttempts - 1,
				minTimeout: effectiveInitialDelay,
				maxTimeout: maxDelayMs,
				factor: backoffMultiplier,
				randomize: jitter,
				...(signal && { signal }),
				onFailedAttempt: (error) => {
					if (error.retriesLeft > 0 && onRetry) {
						// Approximate; p-retry handles actual timing
						const attempt = error.attemptNumber;
						const delayMs = Math.min(
							effectiveInitialDelay * backoffMultiplier ** (attempt - 1),
							maxDelayMs,
						);
						onRetry(attempt, delayMs, error);
					}
				},
			},
		);
	} catch (e) {
		// Surface cancellation as our AbortError, whatever p-retry rejected with
		throwIfAborted(signal);
		throw e;
	}
}

/**
 * Connects to a BLE device with automatic retry on transient failures.
 * Each attempt is bounded by `connectOptions.timeoutMs` when given. A
 * session that arrives after its attempt timed out or was aborted is
 * disconnected.
 *
 * @example
 * ```typescript
 * const session = await connectWithRetry(
 *   adapter,
 *   { address: "AA:BB:CC:DD:EE:FF", timeoutMs: 10000 },
 *   { maxAttempts: 3 },
 * );
 * ```
 *
 * @returns Promise resolving to the connected session
 */
export async function connectWithRetry(
	adapter: BLEAdapter,
	connectOptions: BLEConnectOptions,
	retryOptions: RetryOptions = {},
	logger: Logger = createConsoleLogger("transport"),
): Promise<BLEConnectedSession> {
	const signal = retryOptions.signal ?? connectOptions.signal;

	const finalConnectOptions: BLEConnectOptions = { ...connectOptions };
	const finalRetryOptions: RetryOptions = { ...retryOptions };
	if (signal) {
		finalConnectOptions.signal = signal;
		finalRetryOptions.signal = signal;
	}

	const { timeoutMs } = finalConnectOptions;

	// An attempt we gave up on may still connect; release that link
	function releaseLate(attempt: Promise<BLEConnectedSession>): void {
		const { address } = connectOptions;
		attempt
			.then(
				(late) => {
					logger.debug(`${address}: disconnecting session that connected too late`);
					return late.disconnect();
				},
				(e: unknown) => {
					logger.debug(
						`${address}: abandoned connect attempt failed:`,
						normalizeError(e).message,
					);
				},
			)
			.catch((e: unknown) => {
				logger.warn(
					`${address}: error disconnecting late session:`,
					normalizeError(e).message,
				);
			});
	}

	return withRetry(async () => {
		const attempt = adapter.connect(finalConnectOptions);
		const bounded =
			timeoutMs === undefined ? attempt : withTimeout(attempt, timeoutMs, "BLE connect");
		try {
			return await raceWithAbort(bounded, signal);
		} catch (e) {
			if (e instanceof TimeoutError || e instanceof AbortError) {
				releaseLate(attempt);
			}
			throw e;
		}
	}, finalRetryOptions);
}
