import { TRIGGER_COMMAND } from "../protocol/constants";
import { normalizeUuid, toFullUuid } from "../utils/uuid";

export type DeviceFamily = "tirelinc" | "medisana-bp";

export const DEVICE_FAMILIES: readonly DeviceFamily[] = ["tirelinc", "medisana-bp"];

interface BaseProfile {
	serviceUuid: string;
	notifyCharacteristicUuid: string;
	/** Wait for completion at most this long once subscribed */
	deadlineMs: number;
	/** Per-attempt connection timeout */
	connectTimeoutMs: number;
	expectedDataCount: number;
	expectedConfigCount: number;
	/**
	 * Whether a failed subscription ends the session immediately.
	 * When false the poll skips waiting and returns what it has.
	 */
	subscribeFailureIsFatal: boolean;
}

export interface TireLincProfile extends BaseProfile {
	family: "tirelinc";
	writeCharacteristicUuid: string;
	/** Written without response to request a burst of sensor data */
	triggerCommand: Uint8Array;
	/** Pause between subscribing and writing the trigger */
	triggerDelayMs: number;
}

export interface MedisanaProfile extends BaseProfile {
	family: "medisana-bp";
}

/**
 * Per-family protocol parameters. Both families share one orchestrator;
 * only these values differ.
 */
export type DeviceProfile = TireLincProfile | MedisanaProfile;

/** TireLinc custom service: `0000000X-00b7-4807-beee-e0b0879cf3dd` */
const TIRELINC_UUID_SUFFIX = "-00b7-4807-beee-e0b0879cf3dd";

export const TIRELINC_PROFILE: Readonly<TireLincProfile> = {
	family: "tirelinc",
	serviceUuid: `00000000${TIRELINC_UUID_SUFFIX}`,
	notifyCharacteristicUuid: `00000002${TIRELINC_UUID_SUFFIX}`,
	writeCharacteristicUuid: `00000001${TIRELINC_UUID_SUFFIX}`,
	triggerCommand: Uint8Array.from(TRIGGER_COMMAND),
	triggerDelayMs: 500,
	deadlineMs: 5000,
	connectTimeoutMs: 10000,
	expectedDataCount: 4,
	expectedConfigCount: 4,
	subscribeFailureIsFatal: false,
};

export const MEDISANA_BP_PROFILE: Readonly<MedisanaProfile> = {
	family: "medisana-bp",
	// Blood Pressure service / Blood Pressure Measurement characteristic
	serviceUuid: toFullUuid(0x1810),
	notifyCharacteristicUuid: toFullUuid(0x2a35),
	deadlineMs: 15000,
	connectTimeoutMs: 10000,
	expectedDataCount: 1,
	expectedConfigCount: 1,
	subscribeFailureIsFatal: true,
};

/** Fields a caller may override; UUIDs accept short or full forms */
export interface ProfileOverrides {
	serviceUuid?: string | number;
	notifyCharacteristicUuid?: string | number;
	writeCharacteristicUuid?: string | number;
	triggerCommand?: Uint8Array;
	triggerDelayMs?: number;
	deadlineMs?: number;
	connectTimeoutMs?: number;
	expectedDataCount?: number;
	expectedConfigCount?: number;
}

function requireNonNegative(name: string, value: number): number {
	if (!Number.isFinite(value) || value < 0) {
		throw new RangeError(`${name} must be a non-negative number, got ${value}`);
	}
	return value;
}

/**
 * Returns a copy of the family's profile with overrides applied.
 * Trigger-related overrides are ignored for families without a trigger.
 *
 * @throws RangeError If a timing or count override is negative
 * @throws Error If a UUID override is malformed
 *
 * @example
 * ```typescript
 * const profile = getDeviceProfile("tirelinc", { expectedDataCount: 6 });
 * ```
 */
export function getDeviceProfile(
	family: DeviceFamily,
	overrides: ProfileOverrides = {},
): DeviceProfile {
	const base = family === "tirelinc" ? TIRELINC_PROFILE : MEDISANA_BP_PROFILE;

	const shared: BaseProfile = {
		serviceUuid: normalizeUuid(overrides.serviceUuid ?? base.serviceUuid),
		notifyCharacteristicUuid: normalizeUuid(
			overrides.notifyCharacteristicUuid ?? base.notifyCharacteristicUuid,
		),
		deadlineMs: requireNonNegative(
			"deadlineMs",
			overrides.deadlineMs ?? base.deadlineMs,
		),
		connectTimeoutMs: requireNonNegative(
			"connectTimeoutMs",
			overrides.connectTimeoutMs ?? base.connectTimeoutMs,
		),
		expectedDataCount: requireNonNegative(
			"expectedDataCount",
			overrides.expectedDataCount ?? base.expectedDataCount,
		),
		expectedConfigCount: requireNonNegative(
			"expectedConfigCount",
			overrides.expectedConfigCount ?? base.expectedConfigCount,
		),
		subscribeFailureIsFatal: base.subscribeFailureIsFatal,
	};

	if (base.family === "medisana-bp") {
		return { ...shared, family: "medisana-bp" };
	}

	return {
		...shared,
		family: "tirelinc",
		writeCharacteristicUuid: normalizeUuid(
			overrides.writeCharacteristicUuid ?? base.writeCharacteristicUuid,
		),
		triggerCommand: (overrides.triggerCommand ?? base.triggerCommand).slice(),
		triggerDelayMs: requireNonNegative(
			"triggerDelayMs",
			overrides.triggerDelayMs ?? base.triggerDelayMs,
		),
	};
}

export function isDeviceFamily(value: unknown): value is DeviceFamily {
	return DEVICE_FAMILIES.some((family) => family === value);
}
