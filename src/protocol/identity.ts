import { InvalidConfigError } from "../errors/errors";
import { toHex } from "../utils/buffer";
import { IDENTITY_LENGTH } from "./constants";

/**
 * Opaque 4-byte identifier broadcast by a physical tire sensor.
 * Compared byte-wise; never interpreted as a number.
 */
export type SensorIdentity = Uint8Array;

/** Vendor preset identities shipped with a new TireLinc monitor */
export const DEFAULT_SENSOR_IDS = {
	tire_1: "0E-B3-0B-02",
	tire_2: "0E-88-46-02",
	tire_3: "0E-FF-47-02",
	tire_4: "0E-61-3A-02",
} as const;

// Fully hyphenated or not at all
const IDENTITY_PATTERN = /^(?:[0-9a-f]{2}(?:-[0-9a-f]{2}){3}|[0-9a-f]{8})$/i;

/**
 * Parses a sensor identity written as `"0E-B3-0B-02"` or `"0EB30B02"`.
 *
 * @param path - Config path reported in the error when parsing fails
 * @throws {InvalidConfigError} If the text is not four hex bytes
 */
export function parseSensorIdentity(
	text: string,
	path = "identity",
): SensorIdentity {
	const trimmed = text.trim();
	if (!IDENTITY_PATTERN.test(trimmed)) {
		throw new InvalidConfigError(
			path,
			`"${text}" is not a sensor id (expected XX-XX-XX-XX)`,
		);
	}

	const hex = trimmed.replace(/-/g, "");
	const bytes = new Uint8Array(IDENTITY_LENGTH);
	for (let i = 0; i < IDENTITY_LENGTH; i++) {
		bytes[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}

/**
 * Formats an identity as hyphen-separated uppercase hex, e.g. `"0E-B3-0B-02"`.
 */
export function formatSensorIdentity(identity: SensorIdentity): string {
	return toHex(identity, "-");
}

export function sameIdentity(a: SensorIdentity, b: SensorIdentity): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}
