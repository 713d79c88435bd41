/**
 * @fileoverview Core type definitions for tpms-ble-kit.
 *
 * ## Null vs Undefined Conventions
 *
 * - **`null`**: Intentionally empty or "not found"
 *   - `ConfigStore.get()` returns `null` when no configuration is stored
 *   - `extractBytes()` returns `null` for invalid/empty buffers
 *
 * - **`undefined`**: Not set yet or optional property
 *   - `PollTarget.rssi` is `undefined` when no advertisement was seen
 *   - A position lookup returns `undefined` for an unmapped sensor
 */

/**
 * Lifecycle of a single poll.
 * - 'idle': Session created, nothing attempted
 * - 'connecting': Connection attempt (with retries) in progress
 * - 'subscribing': Enabling notifications on the sensor characteristic
 * - 'triggering': Writing the data-burst request command
 * - 'waiting': Collecting notifications until complete or deadline
 * - 'draining': Stopping notifications
 * - 'disconnecting': Releasing the connection
 * - 'done': Result is final
 */
export type PollState =
	| "idle"
	| "connecting"
	| "subscribing"
	| "triggering"
	| "waiting"
	| "draining"
	| "disconnecting"
	| "done";

/**
 * Snapshot of a device taken from its most recent advertisement.
 *
 * Note: RSSI is only known from advertisements, not from an open
 * connection, so it is captured before connecting.
 */
export interface PollTarget {
	/** Bluetooth address (e.g. "AA:BB:CC:DD:EE:FF") */
	address: string;
	/** Advertised local name */
	name?: string;
	/** Received Signal Strength Indicator in dBm */
	rssi?: number;
}

/**
 * Options for connecting to a BLE device.
 */
export interface BLEConnectOptions {
	/** Address of the device to connect to */
	address: string;
	/**
	 * Timeout for a single connection attempt in milliseconds.
	 * Adapters should give up on their own after this long.
	 */
	timeoutMs?: number;
	/** AbortSignal to cancel the connection attempt */
	signal?: AbortSignal;
}

/**
 * Represents an established BLE connection session.
 *
 * @remarks
 * Implementers should ensure that:
 * - `getPrimaryService()` rejects when the service is missing
 * - `disconnect()` is idempotent
 *
 * @example Adapting a Node BLE library
 * ```typescript
 * const session: BLEConnectedSession = {
 *   deviceId: peripheral.address,
 *   deviceName: peripheral.advertisement.localName,
 *   async getPrimaryService(uuid) {
 *     return adaptService(await findService(peripheral, uuid));
 *   },
 *   async disconnect() {
 *     await peripheral.disconnectAsync();
 *   },
 * };
 * ```
 */
export interface BLEConnectedSession {
	/** The unique identifier (address) of the connected device */
	readonly deviceId: string;

	/** The human-readable name of the connected device, if available */
	readonly deviceName: string | undefined;

	/**
	 * Retrieves a specific primary GATT service by UUID.
	 * @throws Error if service not found
	 */
	getPrimaryService(uuid: string): Promise<BLEGATTService>;

	/**
	 * Disconnects from the BLE device.
	 * Should be idempotent - safe to call multiple times.
	 */
	disconnect(): Promise<void>;

	/**
	 * Registers a callback for unexpected disconnection events.
	 * @returns A function to unregister the callback
	 */
	onDisconnect?(callback: () => void): () => void;
}

/**
 * Represents a BLE GATT service.
 */
export interface BLEGATTService {
	/** The UUID of this service */
	uuid: string;

	/**
	 * Retrieves a specific characteristic by UUID.
	 * @throws Error if characteristic not found
	 */
	getCharacteristic(uuid: string): Promise<BLEGATTCharacteristic>;
}

/**
 * Represents a BLE GATT characteristic.
 */
export interface BLEGATTCharacteristic {
	/** The UUID of this characteristic */
	uuid: string;

	/**
	 * Writes a value to the characteristic and waits for acknowledgment.
	 */
	writeValueWithResponse(value: Uint8Array): Promise<void>;

	/**
	 * Writes a value to the characteristic without waiting for acknowledgment.
	 * Faster than writeValueWithResponse but provides no delivery confirmation.
	 */
	writeValueWithoutResponse(value: Uint8Array): Promise<void>;

	/**
	 * Enables notifications for this characteristic.
	 * Values arrive through listeners registered with `onValueChanged`.
	 */
	startNotifications(): Promise<void>;

	/**
	 * Disables notifications for this characteristic.
	 */
	stopNotifications(): Promise<void>;

	/**
	 * Registers a listener for notified values.
	 * @returns A function to unregister the listener
	 */
	onValueChanged(listener: (value: DataView) => void): () => void;
}

/**
 * Adapter interface for BLE connectivity.
 * Implement this interface to plug in a Bluetooth backend
 * (a Node.js BLE library, a bridge to another process, a test fake).
 *
 * @example Custom adapter
 * ```typescript
 * const adapter: BLEAdapter = {
 *   async connect({ address, timeoutMs }) {
 *     const peripheral = await myBleLibrary.find(address);
 *     await peripheral.connect({ timeout: timeoutMs });
 *     return createSessionFromPeripheral(peripheral);
 *   },
 * };
 * ```
 */
export interface BLEAdapter {
	/**
	 * Connects to the device at the given address.
	 *
	 * @returns Promise resolving to a connected session
	 * @throws Error if connection fails or is cancelled
	 */
	connect(options: BLEConnectOptions): Promise<BLEConnectedSession>;
}
