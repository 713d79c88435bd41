import {
	connectWithRetry,
	type RetryOptions,
	type StopNotifications,
	startNotifications,
	writeWithTimeout,
} from "../ble/transport";
import {
	BLEConnectionError,
	normalizeError,
	SubscribeError,
	WriteError,
	withTimeout,
} from "../errors/errors";
import type { PositionMapping } from "../mapping/position-mapping";
import { createStateMachine, type TransitionCallback } from "../state/state-machine";
import type { BLEAdapter, BLEConnectedSession, PollState, PollTarget } from "../types";
import { createConsoleLogger, type Logger } from "../utils/logger";
import type { CompletionPolicy } from "./completion";
import type { DeviceProfile, TireLincProfile } from "./profiles";
import { createPollSession, type PollResult, type PollSession } from "./session";

/**
 * - `complete`: the completion policy was satisfied before the deadline
 * - `timeout`: the deadline passed (or the wait was cut short)
 * - `unreachable`: no connection could be made
 * - `subscribe-failed`: notifications could not be enabled
 */
export type PollStatus = "complete" | "timeout" | "unreachable" | "subscribe-failed";

export interface PollOutcome {
	status: PollStatus;
	/** Readings collected, possibly partial or only the seeded signal strength */
	data: PollResult;
	/** Unmapped identities seen in learning mode, in arrival order */
	discovered: string[];
	dataPackets: number;
	configPackets: number;
	durationMs: number;
}

export interface PollOptions {
	profile: DeviceProfile;
	mapping: PositionMapping;
	/** Collect unmapped identities and run to the full deadline */
	learningMode?: boolean;
	maxDiscovered?: number;
	logger?: Logger;
	/** Retry policy for connecting */
	retry?: RetryOptions;
	/** Cancels the connect retries and ends the wait early */
	signal?: AbortSignal;
	/** Observes each lifecycle transition */
	onStateChange?: TransitionCallback;
}

/** Bound on disconnecting, which some stacks never acknowledge */
export const DISCONNECT_TIMEOUT_MS = 5000;

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

function completionPolicy(options: PollOptions): CompletionPolicy {
	return options.learningMode
		? { mode: "learning" }
		: {
				mode: "fixed-count",
				expectedDataCount: options.profile.expectedDataCount,
				expectedConfigCount: options.profile.expectedConfigCount,
			};
}

async function subscribe(
	connection: BLEConnectedSession,
	profile: DeviceProfile,
	session: PollSession,
	log: Logger,
): Promise<StopNotifications> {
	try {
		const service = await connection.getPrimaryService(profile.serviceUuid);
		const characteristic = await service.getCharacteristic(
			profile.notifyCharacteristicUuid,
		);
		return await startNotifications(characteristic, session.handleNotification, {
			timeoutMs: profile.connectTimeoutMs,
			logger: log,
		});
	} catch (e) {
		throw new SubscribeError(
			profile.notifyCharacteristicUuid,
			normalizeError(e).message,
		);
	}
}

async function trigger(
	connection: BLEConnectedSession,
	profile: TireLincProfile,
	signal: AbortSignal,
	log: Logger,
): Promise<void> {
	await sleep(profile.triggerDelayMs);
	if (signal.aborted) {
		log.debug("Poll ended before the trigger was sent");
		return;
	}
	try {
		const service = await connection.getPrimaryService(profile.serviceUuid);
		const characteristic = await service.getCharacteristic(
			profile.writeCharacteristicUuid,
		);
		await writeWithTimeout(characteristic, profile.triggerCommand, {
			withoutResponse: true,
			timeoutMs: profile.connectTimeoutMs,
		});
	} catch (e) {
		const error = new WriteError(
			profile.writeCharacteristicUuid,
			normalizeError(e).message,
		);
		log.warn(`${error.message}; waiting for unsolicited data`);
	}
}

/**
 * Runs one poll against one device: connect, subscribe, request data,
 * collect notifications until the completion policy is met or the
 * deadline passes, then release the connection.
 *
 * Never rejects. Failures are logged and reflected in `status`; the
 * readings gathered so far are always returned.
 *
 * @example
 * ```typescript
 * const outcome = await pollDevice(adapter, { address, rssi: -67 }, {
 *   profile: getDeviceProfile("tirelinc"),
 *   mapping: createPositionMapping(config.sensors),
 * });
 * if (outcome.status !== "unreachable") {
 *   publish(outcome.data); // { tire1_pressure: 32, ..., signal_strength: -67 }
 * }
 * ```
 */
export async function pollDevice(
	adapter: BLEAdapter,
	target: PollTarget,
	options: PollOptions,
): Promise<PollOutcome> {
	const startedAt = Date.now();
	const { profile, signal } = options;
	const log = options.logger ?? createConsoleLogger("poll");
	const address = target.address;

	const machine = createStateMachine("idle", { logger: log });
	machine.onTransition((from, to) => log.debug(`${address}: ${from} -> ${to}`));
	if (options.onStateChange) {
		machine.onTransition(options.onStateChange);
	}

	const session = createPollSession({
		mapping: options.mapping,
		policy: completionPolicy(options),
		rssi: target.rssi,
		logger: log,
		...(options.maxDiscovered !== undefined && {
			maxDiscovered: options.maxDiscovered,
		}),
	});

	function finish(status: PollStatus): PollOutcome {
		const outcome: PollOutcome = {
			status,
			data: session.result(),
			discovered: session.discovered(),
			dataPackets: session.dataPackets,
			configPackets: session.configPackets,
			durationMs: Date.now() - startedAt,
		};
		log.info(
			`${address}: ${status} with ${outcome.dataPackets} data / ${outcome.configPackets} config packets in ${outcome.durationMs}ms`,
		);
		return outcome;
	}

	// Release-path transitions: skip the ones the current state does not allow
	function advance(to: PollState): void {
		if (machine.getState() === to) return;
		if (machine.canTransition(to)) {
			machine.transition(to);
		} else {
			log.debug(`${address}: skipping ${machine.getState()} -> ${to}`);
		}
	}

	machine.transition("connecting");
	let connection: BLEConnectedSession;
	try {
		connection = await connectWithRetry(
			adapter,
			{ address, timeoutMs: profile.connectTimeoutMs },
			{
				onRetry: (attempt, delayMs, error) =>
					log.debug(
						`${address}: connect attempt ${attempt} failed, retrying in ${delayMs}ms: ${error.message}`,
					),
				...options.retry,
				...(signal && { signal }),
			},
			log,
		);
	} catch (e) {
		log.warn(new BLEConnectionError(address, normalizeError(e).message).message);
		machine.transition("done");
		return finish("unreachable");
	}

	const waitAbort = new AbortController();
	const endWait = (): void => waitAbort.abort();
	signal?.addEventListener("abort", endWait, { once: true });
	const removeDisconnectListener = connection.onDisconnect?.(() => {
		log.warn(`${address}: disconnected while polling`);
		endWait();
	});

	let stop: StopNotifications | undefined;
	let status: PollStatus = "timeout";

	try {
		machine.transition("subscribing");
		try {
			stop = await subscribe(connection, profile, session, log);
		} catch (e) {
			status = "subscribe-failed";
			const message = normalizeError(e).message;
			if (profile.subscribeFailureIsFatal) {
				log.error(message);
				machine.transition("disconnecting");
			} else {
				log.warn(`${message}; returning without data`);
				machine.transition("waiting");
			}
		}

		if (stop) {
			if (profile.family === "tirelinc") {
				machine.transition("triggering");
				await trigger(connection, profile, waitAbort.signal, log);
			}
			machine.transition("waiting");

			const waited = await session.completion.wait(
				profile.deadlineMs,
				waitAbort.signal,
			);
			if (waited === "completed") {
				status = "complete";
			} else if (!options.learningMode) {
				log.warn(
					`${address}: timed out with ${session.dataPackets}/${profile.expectedDataCount} data packets`,
				);
			}
		}
	} catch (e) {
		log.error(`${address}: poll failed:`, normalizeError(e).message);
	} finally {
		session.completion.dispose();
		signal?.removeEventListener("abort", endWait);
		removeDisconnectListener?.();

		advance("draining");
		if (stop) {
			await stop();
		}

		advance("disconnecting");
		try {
			await withTimeout(connection.disconnect(), DISCONNECT_TIMEOUT_MS, "BLE disconnect");
		} catch (e) {
			log.warn(`${address}: error disconnecting:`, normalizeError(e).message);
		}
		advance("done");
	}

	return finish(status);
}

export interface TpmsPoller {
	readonly profile: DeviceProfile;
	readonly mapping: PositionMapping;
	readonly learningMode: boolean;
	poll(target: PollTarget, signal?: AbortSignal): Promise<PollOutcome>;
}

/**
 * Binds an adapter and per-device settings so callers only supply the
 * advertisement snapshot on each poll.
 *
 * @example
 * ```typescript
 * const poller = createTpmsPoller(adapter, {
 *   profile: getDeviceProfile("tirelinc"),
 *   mapping: createPositionMapping(DEFAULT_SENSOR_IDS),
 * });
 * const { data } = await poller.poll({ address: "AA:BB:CC:DD:EE:FF" });
 * ```
 */
export function createTpmsPoller(
	adapter: BLEAdapter,
	options: Omit<PollOptions, "signal">,
): TpmsPoller {
	return {
		profile: options.profile,
		mapping: options.mapping,
		learningMode: options.learningMode ?? false,
		poll(target, signal) {
			return pollDevice(adapter, target, {
				...options,
				...(signal && { signal }),
			});
		},
	};
}
