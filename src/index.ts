/**
 * tpms-ble-kit - Polls BLE tire-pressure monitors (TireLinc) and
 * MedisanaBP blood pressure monitors for their notification bursts.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import {
 *   createFileConfigStore,
 *   createTpmsPoller,
 *   createUpdateCoordinator,
 *   defaultTireConfig,
 *   toPollOptions,
 * } from "tpms-ble-kit";
 *
 * const store = createFileConfigStore("./trailer.json");
 * const config = store.get() ?? defaultTireConfig("AA:BB:CC:DD:EE:FF");
 *
 * // `adapter` wraps whatever BLE stack the host uses
 * const poller = createTpmsPoller(adapter, toPollOptions(config));
 * const coordinator = createUpdateCoordinator((signal) =>
 *   poller.poll({ address: config.address }, signal),
 * );
 * coordinator.on("update", ({ data }) => console.log(data));
 * coordinator.start();
 * ```
 */

// BLE transport
export {
	connectWithRetry,
	DEFAULT_NOTIFICATION_TIMEOUT_MS,
	DEFAULT_WRITE_TIMEOUT_MS,
	type RetryOptions,
	type StartNotificationsOptions,
	type StopNotifications,
	startNotifications,
	type WriteOptions,
	withRetry,
	writeWithTimeout,
} from "./ble";
// Configuration
export {
	applyRotation,
	type ConfigStore,
	createFileConfigStore,
	createMemoryConfigStore,
	createNoOpConfigStore,
	defaultTireConfig,
	type FileConfigStoreOptions,
	parseTireConfig,
	type TireConfig,
	toPollOptions,
} from "./config";
// Scheduling
export {
	type CoordinatorEvents,
	type CoordinatorPollFn,
	createUpdateCoordinator,
	DEFAULT_MAX_CONSECUTIVE_FAILURES,
	MOVING_INTERVAL_MS,
	STATIONARY_INTERVAL_MS,
	type UpdateCoordinator,
	type UpdateCoordinatorOptions,
} from "./coordinator";
// Discovery
export {
	type DiscoverOptions,
	discoverSensors,
	isSupportedDevice,
	proposeSensorMapping,
	TIRELINC_NAME_PREFIX,
} from "./discovery";
// Errors
export {
	AbortError,
	BLEConnectionError,
	InvalidConfigError,
	isTransientBLEError,
	MalformedPacketError,
	normalizeError,
	raceWithAbort,
	SubscribeError,
	TimeoutError,
	throwIfAborted,
	UnknownSensorError,
	WriteError,
	withTimeout,
} from "./errors";
// Positions and rotation
export {
	createPositionMapping,
	DEFAULT_TIRE_NAMES,
	defaultTireName,
	isPositionLabel,
	listRotationPatterns,
	MAX_TIRES,
	type Measurement,
	type PositionLabel,
	type PositionMapping,
	positionLabel,
	positionNumber,
	ROTATION_PATTERNS,
	type RotatableConfig,
	type RotationMapping,
	type RotationPattern,
	rotatePositions,
	SIGNAL_STRENGTH_KEY,
	sensorKey,
} from "./mapping";
// Polling
export {
	type AppliedEffect,
	type CompletionPolicy,
	type CompletionSignal,
	createCompletionSignal,
	createPollSession,
	createTpmsPoller,
	DEFAULT_MAX_DISCOVERED,
	DEVICE_FAMILIES,
	type DeviceFamily,
	type DeviceProfile,
	DISCONNECT_TIMEOUT_MS,
	getDeviceProfile,
	isComplete,
	isDeviceFamily,
	MEDISANA_BP_PROFILE,
	type MedisanaProfile,
	type PacketCounts,
	type PollOptions,
	type PollOutcome,
	type PollResult,
	type PollSession,
	type PollSessionOptions,
	type PollStatus,
	pollDevice,
	type ProfileOverrides,
	TIRELINC_PROFILE,
	type TireLincProfile,
	type TpmsPoller,
	type WaitResult,
} from "./poll";
// Packet protocol
export {
	type ConfigPacket,
	type DataPacket,
	type DecodedPacket,
	type DecodeResult,
	DEFAULT_SENSOR_IDS,
	decodePacket,
	describeRejection,
	formatSensorIdentity,
	PacketTag,
	type PacketRejection,
	parseSensorIdentity,
	type RejectedPacket,
	type SensorIdentity,
	type SensorThresholds,
	sameIdentity,
	TRIGGER_COMMAND,
	toMalformedPacketError,
} from "./protocol";
// State management
export {
	createEventEmitter,
	createStateMachine,
	type EventEmitterOptions,
	type EventMap,
	type Listener,
	type StateMachine,
	type StateMachineOptions,
	type TransitionCallback,
	type TypedEventEmitter,
} from "./state";
// Types
export type {
	BLEAdapter,
	BLEConnectedSession,
	BLEConnectOptions,
	BLEGATTCharacteristic,
	BLEGATTService,
	PollState,
	PollTarget,
} from "./types";
// Utils
export {
	BLUETOOTH_UUID_BASE,
	type ConsoleLoggerOptions,
	createConsoleLogger,
	createNoOpLogger,
	extractBytes,
	LOG_PREFIX,
	type Logger,
	normalizeUuid,
	readByte,
	readByteChecked,
	toFullUuid,
	toHex,
} from "./utils";
