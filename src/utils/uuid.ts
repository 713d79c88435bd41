/** Bluetooth Base UUID suffix for constructing full UUIDs */
export const BLUETOOTH_UUID_BASE = "-0000-1000-8000-00805f9b34fb";

const FULL_UUID_PATTERN =
	/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Converts a short UUID to a full Bluetooth Base UUID.
 * @param shortId - A number (0-65535) or hex string (1-4 chars)
 * @throws RangeError if number is out of 16-bit range
 * @throws Error if string is invalid hex or empty
 *
 * @example
 * ```typescript
 * toFullUuid(0x1810);   // "00001810-0000-1000-8000-00805f9b34fb"
 * toFullUuid("2a35");   // "00002a35-0000-1000-8000-00805f9b34fb"
 * ```
 */
export function toFullUuid(shortId: number | string): string {
	if (typeof shortId === "number") {
		if (!Number.isInteger(shortId) || shortId < 0 || shortId > 0xffff) {
			throw new RangeError(`Short UUID must be integer 0-65535, got ${shortId}`);
		}
		return `0000${shortId.toString(16).padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
	}

	if (!/^[0-9a-fA-F]{1,4}$/.test(shortId)) {
		throw new Error(`Invalid short UUID: "${shortId}" (must be 1-4 hex chars)`);
	}

	return `0000${shortId.toLowerCase().padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
}

/**
 * Normalizes a UUID given in any accepted form to lowercase 128-bit text.
 * Short forms are expanded with the Bluetooth Base UUID; full forms are
 * validated and lowercased.
 *
 * @example
 * ```typescript
 * normalizeUuid(0x2a35);  // "00002a35-0000-1000-8000-00805f9b34fb"
 * normalizeUuid("00000002-00B7-4807-BEEE-E0B0879CF3DD");
 * // "00000002-00b7-4807-beee-e0b0879cf3dd"
 * ```
 */
export function normalizeUuid(uuid: number | string): string {
	if (typeof uuid === "number" || uuid.length <= 4) {
		return toFullUuid(uuid);
	}

	if (!FULL_UUID_PATTERN.test(uuid)) {
		throw new Error(`Invalid UUID: "${uuid}"`);
	}

	return uuid.toLowerCase();
}
