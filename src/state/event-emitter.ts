import { normalizeError } from "../errors/errors";
import { createConsoleLogger, type Logger } from "../utils/logger";

export type EventMap = { [key: string]: unknown };

export type Listener<T> = (data: T) => void;

interface Registration<T> {
	callback: Listener<T>;
	once: boolean;
}

type RegistrationTable<T extends EventMap> = {
	[K in keyof T]?: Array<Registration<T[K]>>;
};

export interface EventEmitterOptions {
	logger?: Logger;
}

/**
 * A type-safe event emitter that provides compile-time checking for event names and payloads.
 *
 * @example
 * ```typescript
 * interface MonitorEvents {
 *   update: { address: string; data: Record<string, number> };
 *   unavailable: { address: string };
 * }
 *
 * const emitter = createEventEmitter<MonitorEvents>();
 * const unsubscribe = emitter.on("update", ({ data }) => render(data));
 * emitter.emit("update", { address, data: { tire1_pressure: 32 } });
 * unsubscribe();
 * ```
 */
export interface TypedEventEmitter<T extends EventMap> {
	on<K extends keyof T>(event: K, callback: Listener<T[K]>): () => void;
	once<K extends keyof T>(event: K, callback: Listener<T[K]>): () => void;
	off<K extends keyof T>(event: K, callback: Listener<T[K]>): void;
	removeAllListeners<K extends keyof T>(event?: K): void;
	emit<K extends keyof T>(event: K, data: T[K]): void;
	listenerCount<K extends keyof T>(event: K): number;
}

/**
 * A listener that throws is logged and does not stop delivery to the
 * remaining listeners.
 */
export function createEventEmitter<T extends EventMap>(
	options: EventEmitterOptions = {},
): TypedEventEmitter<T> {
	const log = options.logger ?? createConsoleLogger("event-emitter");
	let registrations: RegistrationTable<T> = {};

	function add<K extends keyof T>(
		event: K,
		callback: Listener<T[K]>,
		once: boolean,
	): () => void {
		const list: Array<Registration<T[K]>> = registrations[event] ?? [];
		list.push({ callback, once });
		registrations[event] = list;
		return () => off(event, callback);
	}

	function off<K extends keyof T>(event: K, callback: Listener<T[K]>): void {
		const list = registrations[event];
		if (!list) return;

		const index = list.findIndex((r) => r.callback === callback);
		if (index !== -1) list.splice(index, 1);
		if (list.length === 0) delete registrations[event];
	}

	function removeAllListeners<K extends keyof T>(event?: K): void {
		if (event === undefined) {
			registrations = {};
		} else {
			delete registrations[event];
		}
	}

	function emit<K extends keyof T>(event: K, data: T[K]): void {
		const list = registrations[event];
		if (!list) return;

		// Snapshot so listeners can unsubscribe while being called
		for (const registration of [...list]) {
			if (registration.once) off(event, registration.callback);
			try {
				registration.callback(data);
			} catch (e) {
				log.error(
					`Listener for "${String(event)}" threw an error:`,
					normalizeError(e).message,
				);
			}
		}
	}

	function listenerCount<K extends keyof T>(event: K): number {
		return registrations[event]?.length ?? 0;
	}

	return {
		on<K extends keyof T>(event: K, callback: Listener<T[K]>) {
			return add(event, callback, false);
		},
		once<K extends keyof T>(event: K, callback: Listener<T[K]>) {
			return add(event, callback, true);
		},
		off,
		removeAllListeners,
		emit,
		listenerCount,
	};
}
