/**
 * In-process stand-ins for a BLE backend. Every transport call is a spy;
 * notifications are pushed with `emit`.
 */

import { type Mock, vi } from "vitest";
import type {
	BLEAdapter,
	BLEConnectedSession,
	BLEConnectOptions,
	BLEGATTCharacteristic,
	BLEGATTService,
} from "../types";

export interface FakeCharacteristic extends BLEGATTCharacteristic {
	startNotifications: Mock<() => Promise<void>>;
	stopNotifications: Mock<() => Promise<void>>;
	writeValueWithResponse: Mock<(value: Uint8Array) => Promise<void>>;
	writeValueWithoutResponse: Mock<(value: Uint8Array) => Promise<void>>;
	/** Delivers a notification to every registered listener */
	emit(bytes: ArrayLike<number>): void;
	listenerCount(): number;
}

export interface FakeCharacteristicOptions {
	/** Rejection for startNotifications; `"hang"` never settles */
	startError?: Error | "hang";
	stopError?: Error;
	writeError?: Error;
	/** Runs after each successful write */
	onWrite?: (value: Uint8Array, char: FakeCharacteristic) => void;
}

export function createFakeCharacteristic(
	uuid: string,
	options: FakeCharacteristicOptions = {},
): FakeCharacteristic {
	const listeners = new Set<(value: DataView) => void>();

	async function write(value: Uint8Array): Promise<void> {
		if (options.writeError) throw options.writeError;
		options.onWrite?.(value, char);
	}

	const char: FakeCharacteristic = {
		uuid,
		startNotifications: vi.fn(async () => {
			const { startError } = options;
			if (startError === "hang") {
				await new Promise<never>(() => {});
			} else if (startError) {
				throw startError;
			}
		}),
		stopNotifications: vi.fn(async () => {
			if (options.stopError) throw options.stopError;
		}),
		writeValueWithResponse: vi.fn(write),
		writeValueWithoutResponse: vi.fn(write),
		onValueChanged(listener) {
			listeners.add(listener);
			return () => {
				listeners.delete(listener);
			};
		},
		emit(bytes) {
			const copy = Uint8Array.from(bytes);
			for (const listener of [...listeners]) {
				listener(new DataView(copy.buffer));
			}
		},
		listenerCount: () => listeners.size,
	};

	return char;
}

export interface FakeSession extends BLEConnectedSession {
	getPrimaryService: Mock<(uuid: string) => Promise<BLEGATTService>>;
	disconnect: Mock<() => Promise<void>>;
	/** Simulates the peripheral dropping the link */
	dropConnection(): void;
}

export interface FakeSessionOptions {
	address?: string;
	name?: string;
	/** Service UUID to its characteristics */
	services?: Record<string, FakeCharacteristic[]>;
	disconnectError?: Error;
}

export function createFakeSession(options: FakeSessionOptions = {}): FakeSession {
	const disconnectListeners = new Set<() => void>();
	const services = options.services ?? {};

	return {
		deviceId: options.address ?? "AA:BB:CC:DD:EE:FF",
		deviceName: options.name,
		getPrimaryService: vi.fn(async (uuid: string): Promise<BLEGATTService> => {
			const characteristics = services[uuid];
			if (!characteristics) {
				throw new Error(`Service ${uuid} not found`);
			}
			return {
				uuid,
				async getCharacteristic(charUuid: string): Promise<BLEGATTCharacteristic> {
					const found = characteristics.find((c) => c.uuid === charUuid);
					if (!found) {
						throw new Error(`Characteristic ${charUuid} not found`);
					}
					return found;
				},
			};
		}),
		disconnect: vi.fn(async () => {
			if (options.disconnectError) throw options.disconnectError;
		}),
		onDisconnect(callback) {
			disconnectListeners.add(callback);
			return () => {
				disconnectListeners.delete(callback);
			};
		},
		dropConnection() {
			for (const listener of [...disconnectListeners]) {
				listener();
			}
		},
	};
}

export interface FakeAdapter extends BLEAdapter {
	connect: Mock<(options: BLEConnectOptions) => Promise<BLEConnectedSession>>;
}

export function createFakeAdapter(
	connect: (options: BLEConnectOptions) => Promise<BLEConnectedSession>,
): FakeAdapter {
	return { connect: vi.fn(connect) };
}

export const TIRELINC_SERVICE = "00000000-00b7-4807-beee-e0b0879cf3dd";
export const TIRELINC_NOTIFY = "00000002-00b7-4807-beee-e0b0879cf3dd";
export const TIRELINC_WRITE = "00000001-00b7-4807-beee-e0b0879cf3dd";

export interface FakeTireLinc {
	adapter: FakeAdapter;
	session: FakeSession;
	notify: FakeCharacteristic;
	write: FakeCharacteristic;
}

export interface FakeTireLincOptions {
	/** Packets sent in reply to the trigger command */
	burst?: ReadonlyArray<ArrayLike<number>>;
	notify?: Omit<FakeCharacteristicOptions, "onWrite">;
	writeError?: Error;
	disconnectError?: Error;
}

/**
 * A TireLinc monitor that answers the trigger command with a burst of
 * notifications, delivered synchronously inside the write.
 */
export function createFakeTireLinc(options: FakeTireLincOptions = {}): FakeTireLinc {
	const notify = createFakeCharacteristic(TIRELINC_NOTIFY, options.notify);
	const write = createFakeCharacteristic(TIRELINC_WRITE, {
		...(options.writeError && { writeError: options.writeError }),
		onWrite: () => {
			for (const packet of options.burst ?? []) {
				notify.emit(packet);
			}
		},
	});
	const session = createFakeSession({
		name: "TireLinc 1234",
		services: { [TIRELINC_SERVICE]: [notify, write] },
		...(options.disconnectError && { disconnectError: options.disconnectError }),
	});
	const adapter = createFakeAdapter(async () => session);

	return { adapter, session, notify, write };
}

/** Builds a 10-byte data packet for a sensor id */
export function dataPacket(
	id: readonly number[],
	temperature: number,
	pressure: number,
): number[] {
	return [0x00, ...id, 0x00, 0x00, temperature, 0x00, pressure];
}

/** Builds a 14-byte threshold packet for a sensor id */
export function configPacket(id: readonly number[]): number[] {
	return [0x02, ...id, 0x00, 0x00, 25, 0x00, 45, 0x00, 158, 0x00, 20];
}

export const SENSOR_1 = [0x0e, 0xb3, 0x0b, 0x02] as const;
export const SENSOR_2 = [0x0e, 0x88, 0x46, 0x02] as const;
export const SENSOR_3 = [0x0e, 0xff, 0x47, 0x02] as const;
export const SENSOR_4 = [0x0e, 0x61, 0x3a, 0x02] as const;
