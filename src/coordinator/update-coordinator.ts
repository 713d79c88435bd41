import { normalizeError } from "../errors/errors";
import type { PollOutcome } from "../poll/orchestrator";
import { SIGNAL_STRENGTH_KEY } from "../mapping/position-mapping";
import type { PollResult } from "../poll/session";
import { createEventEmitter, type Listener } from "../state/event-emitter";
import { createConsoleLogger, type Logger } from "../utils/logger";

/** Poll interval while parked */
export const STATIONARY_INTERVAL_MS = 900_000;
/** Poll interval while the vehicle is moving */
export const MOVING_INTERVAL_MS = 15_000;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;

export interface CoordinatorEvents extends Record<string, unknown> {
	/** A poll produced readings */
	update: { data: PollResult; outcome: PollOutcome };
	/** Emitted once when the failure threshold is reached */
	unavailable: { consecutiveFailures: number };
	/** The poll function threw */
	error: Error;
}

export type CoordinatorPollFn = (signal: AbortSignal) => Promise<PollOutcome>;

export interface UpdateCoordinatorOptions {
	stationaryIntervalMs?: number;
	movingIntervalMs?: number;
	/** Empty or failed polls in a row before the data is marked unavailable */
	maxConsecutiveFailures?: number;
	/** Start on the moving interval (default: false) */
	moving?: boolean;
	logger?: Logger;
}

export interface UpdateCoordinator {
	/** Starts the periodic timer. Does not poll immediately. */
	start(): void;
	/** Stops the timer and aborts a running poll; its result is discarded */
	stop(): void;
	/** Polls now, or joins the poll already running */
	refresh(): Promise<void>;
	setMoving(moving: boolean): void;
	readonly moving: boolean;
	readonly intervalMs: number;
	readonly running: boolean;
	/** Last readings received, kept across empty polls */
	readonly data: PollResult | null;
	readonly available: boolean;
	readonly consecutiveFailures: number;
	on<K extends keyof CoordinatorEvents>(
		event: K,
		callback: Listener<CoordinatorEvents[K]>,
	): () => void;
	/** stop() and remove every listener */
	dispose(): void;
}

/** Signal strength alone is seeded before connecting and is not a reading */
function hasReadings(result: PollResult): boolean {
	return Object.keys(result).some((key) => key !== SIGNAL_STRENGTH_KEY);
}

function requirePositive(name: string, value: number): number {
	if (!Number.isFinite(value) || value <= 0) {
		throw new RangeError(`${name} must be a positive number, got ${value}`);
	}
	return value;
}

/**
 * Creates a coordinator that polls a monitor on a timer and keeps the
 * last good readings.
 *
 * A tick that fires while a poll is still running is skipped. A poll
 * that returns no tire readings, or throws, counts as a failure; the
 * previous data stays in place until `maxConsecutiveFailures` failures in
 * a row mark the coordinator unavailable. Readings from a good poll are
 * merged over the previous ones.
 *
 * A poll aborted by stop() still finishes releasing its connection; the
 * next refresh() starts only once it has.
 *
 * @param pollFn - Runs one poll. Receives a signal that aborts on stop().
 *
 * @example
 * ```typescript
 * const poller = createTpmsPoller(adapter, toPollOptions(config));
 * const coordinator = createUpdateCoordinator((signal) =>
 *   poller.poll({ address: config.address }, signal),
 * );
 *
 * coordinator.on("update", ({ data }) => render(data));
 * coordinator.on("unavailable", () => render(null));
 * coordinator.start();
 * await coordinator.refresh();
 *
 * // Poll faster while driving
 * coordinator.setMoving(true);
 * ```
 */
export function createUpdateCoordinator(
	pollFn: CoordinatorPollFn,
	options: UpdateCoordinatorOptions = {},
): UpdateCoordinator {
	const stationaryIntervalMs = requirePositive(
		"stationaryIntervalMs",
		options.stationaryIntervalMs ?? STATIONARY_INTERVAL_MS,
	);
	const movingIntervalMs = requirePositive(
		"movingIntervalMs",
		options.movingIntervalMs ?? MOVING_INTERVAL_MS,
	);
	const maxConsecutiveFailures = requirePositive(
		"maxConsecutiveFailures",
		options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES,
	);
	const log = options.logger ?? createConsoleLogger("coordinator");
	const emitter = createEventEmitter<CoordinatorEvents>({ logger: log });

	let moving = options.moving ?? false;
	let timer: ReturnType<typeof setInterval> | null = null;
	let inFlight: Promise<void> | null = null;
	// A poll aborted by stop() that has not finished releasing the link yet
	let releasing: Promise<void> | null = null;
	let controller: AbortController | null = null;
	// Bumped by stop() so late results from an aborted poll are dropped
	let generation = 0;

	let data: PollResult | null = null;
	let available = true;
	let failures = 0;

	function currentInterval(): number {
		return moving ? movingIntervalMs : stationaryIntervalMs;
	}

	function recordFailure(reason: string): void {
		failures++;
		log.debug(`Poll ${failures}/${maxConsecutiveFailures} without data: ${reason}`);

		if (failures >= maxConsecutiveFailures && available) {
			available = false;
			log.warn(`No data after ${failures} consecutive polls, marking unavailable`);
			emitter.emit("unavailable", { consecutiveFailures: failures });
		}
	}

	async function run(): Promise<void> {
		const current = generation;
		const abort = new AbortController();
		controller = abort;

		try {
			const outcome = await pollFn(abort.signal);
			if (current !== generation) return;

			if (!hasReadings(outcome.data)) {
				recordFailure(outcome.status);
				return;
			}

			data = { ...data, ...outcome.data };
			failures = 0;
			available = true;
			emitter.emit("update", { data: { ...data }, outcome });
		} catch (e) {
			if (current !== generation) return;

			const error = normalizeError(e);
			log.error("Poll failed:", error.message);
			emitter.emit("error", error);
			recordFailure(error.message);
		} finally {
			if (controller === abort) controller = null;
		}
	}

	function refresh(): Promise<void> {
		if (inFlight) return inFlight;

		const previous = releasing;
		releasing = null;
		const started = previous ? previous.then(run) : run();
		const promise: Promise<void> = started.finally(() => {
			if (inFlight === promise) inFlight = null;
		});
		inFlight = promise;
		return promise;
	}

	function tick(): void {
		if (inFlight) {
			log.debug("Previous poll still running, skipping tick");
			return;
		}
		refresh().catch((e: unknown) => {
			log.error("Unexpected poll error:", normalizeError(e).message);
		});
	}

	function schedule(): void {
		if (timer !== null) clearInterval(timer);
		timer = setInterval(tick, currentInterval());
	}

	function start(): void {
		if (timer !== null) return;
		log.info(`Polling every ${currentInterval()}ms`);
		schedule();
	}

	function stop(): void {
		if (timer !== null) {
			clearInterval(timer);
			timer = null;
		}
		generation++;
		controller?.abort(new Error("Coordinator stopped"));
		controller = null;
		if (inFlight) releasing = inFlight;
		inFlight = null;
	}

	function setMoving(next: boolean): void {
		if (next === moving) return;
		moving = next;
		log.info(
			`Switching to ${moving ? "moving" : "stationary"} interval (${currentInterval()}ms)`,
		);
		if (timer !== null) schedule();
	}

	return {
		start,
		stop,
		refresh,
		setMoving,
		get moving() {
			return moving;
		},
		get intervalMs() {
			return currentInterval();
		},
		get running() {
			return timer !== null;
		},
		get data() {
			return data ? { ...data } : null;
		},
		get available() {
			return available;
		},
		get consecutiveFailures() {
			return failures;
		},
		on<K extends keyof CoordinatorEvents>(
			event: K,
			callback: Listener<CoordinatorEvents[K]>,
		) {
			return emitter.on(event, callback);
		},
		dispose() {
			stop();
			emitter.removeAllListeners();
		},
	};
}
