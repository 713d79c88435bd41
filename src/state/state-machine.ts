import type { PollState } from "../types";
import { createConsoleLogger, type Logger } from "../utils/logger";

export type TransitionCallback = (from: PollState, to: PollState) => void;

export interface StateMachine {
	getState(): PollState;
	canTransition(to: PollState): boolean;
	transition(to: PollState): void;
	onTransition(callback: TransitionCallback): () => void;
}

export interface StateMachineOptions {
	/** Receives errors thrown by transition callbacks */
	logger?: Logger;
}

/**
 * Valid poll transitions:
 * - idle -> connecting
 * - connecting -> subscribing | done (unreachable)
 * - subscribing -> triggering | waiting (no trigger, or tolerated failure)
 *   | disconnecting (fatal failure)
 * - triggering -> waiting | disconnecting
 * - waiting -> draining | disconnecting
 * - draining -> disconnecting
 * - disconnecting -> done
 */
const VALID_TRANSITIONS: Record<PollState, readonly PollState[]> = {
	idle: ["connecting"],
	connecting: ["subscribing", "done"],
	subscribing: ["triggering", "waiting", "disconnecting"],
	triggering: ["waiting", "disconnecting"],
	waiting: ["draining", "disconnecting"],
	draining: ["disconnecting"],
	disconnecting: ["done"],
	done: [],
};

/**
 * Creates a state machine tracking one poll's lifecycle.
 * Enforces valid state transitions and notifies listeners on changes.
 *
 * @param initialState The initial state (default: 'idle')
 *
 * @example
 * ```typescript
 * const machine = createStateMachine();
 *
 * machine.onTransition((from, to) => {
 *   log.debug(`${from} -> ${to}`);
 * });
 *
 * machine.transition("connecting");
 * try {
 *   session = await connectWithRetry(adapter, { address });
 *   machine.transition("subscribing");
 * } catch {
 *   machine.transition("done");
 * }
 * ```
 */
export function createStateMachine(
	initialState: PollState = "idle",
	options: StateMachineOptions = {},
): StateMachine {
	const log = options.logger ?? createConsoleLogger("state-machine");
	let state: PollState = initialState;
	const callbacks = new Set<TransitionCallback>();
	let isTransitioning = false;

	function getState(): PollState {
		return state;
	}

	function canTransition(to: PollState): boolean {
		return VALID_TRANSITIONS[state].includes(to);
	}

	function transition(to: PollState): void {
		if (isTransitioning) {
			throw new Error(
				`Cannot transition while another transition is in progress (attempted ${state} -> ${to})`,
			);
		}

		if (!canTransition(to)) {
			throw new Error(`Invalid state transition: ${state} -> ${to}`);
		}

		const from = state;
		state = to;
		isTransitioning = true;

		try {
			for (const cb of callbacks) {
				try {
					cb(from, to);
				} catch (e) {
					log.error(
						"Transition callback error:",
						e instanceof Error ? e.message : String(e),
					);
				}
			}
		} finally {
			isTransitioning = false;
		}
	}

	function onTransition(callback: TransitionCallback): () => void {
		callbacks.add(callback);
		return () => {
			callbacks.delete(callback);
		};
	}

	return {
		getState,
		canTransition,
		transition,
		onTransition,
	};
}
