/**
 * When a poll has heard enough.
 *
 * - `fixed-count`: complete once the expected number of mapped data
 *   packets has arrived. Config packets are counted but never required,
 *   since devices do not send them every session.
 * - `learning`: never complete early; the poll runs to its deadline so
 *   every transmitting sensor gets a chance to be discovered.
 */
export type CompletionPolicy =
	| {
			mode: "fixed-count";
			expectedDataCount: number;
			expectedConfigCount: number;
	  }
	| { mode: "learning" };

export interface PacketCounts {
	dataPackets: number;
	configPackets: number;
}

export function isComplete(
	counts: PacketCounts,
	policy: CompletionPolicy,
): boolean {
	switch (policy.mode) {
		case "learning":
			return false;
		case "fixed-count": {
			const dataComplete = counts.dataPackets >= policy.expectedDataCount;
			const configComplete =
				counts.configPackets >= policy.expectedConfigCount;
			// Config completeness only ever strengthens a data-complete session
			return dataComplete || (dataComplete && configComplete);
		}
	}
}

export type WaitResult = "completed" | "timeout";

/**
 * One-shot signal raised when a poll has collected enough data.
 */
export interface CompletionSignal {
	/** Whether `fire()` has been called */
	readonly fired: boolean;
	/**
	 * Raises the signal.
	 * @returns true the first time, false on every later call
	 */
	fire(): boolean;
	/**
	 * Resolves `"completed"` when the signal fires, or `"timeout"` after
	 * `timeoutMs`, whichever comes first. Never rejects. An aborted
	 * signal resolves `"timeout"`.
	 */
	wait(timeoutMs: number, signal?: AbortSignal): Promise<WaitResult>;
	/** Clears a pending wait timer, resolving the wait as `"timeout"` */
	dispose(): void;
}

/**
 * Creates a one-shot completion signal.
 *
 * @example
 * ```typescript
 * const completion = createCompletionSignal();
 * characteristic.onValueChanged(() => {
 *   if (enoughData()) completion.fire();
 * });
 * const outcome = await completion.wait(5000); // "completed" | "timeout"
 * ```
 */
export function createCompletionSignal(): CompletionSignal {
	let fired = false;
	const waiters = new Set<(result: WaitResult) => void>();

	function settleAll(result: WaitResult): void {
		const pending = [...waiters];
		waiters.clear();
		for (const settle of pending) {
			settle(result);
		}
	}

	return {
		get fired() {
			return fired;
		},

		fire() {
			if (fired) return false;
			fired = true;
			settleAll("completed");
			return true;
		},

		wait(timeoutMs, signal) {
			if (fired) return Promise.resolve("completed");
			if (signal?.aborted) return Promise.resolve("timeout");

			return new Promise<WaitResult>((resolve) => {
				const settle = (result: WaitResult): void => {
					clearTimeout(timer);
					signal?.removeEventListener("abort", onAbort);
					waiters.delete(settle);
					resolve(result);
				};
				const onAbort = (): void => settle("timeout");
				const timer = setTimeout(() => settle("timeout"), timeoutMs);

				waiters.add(settle);
				signal?.addEventListener("abort", onAbort, { once: true });
			});
		},

		dispose() {
			settleAll("timeout");
		},
	};
}
