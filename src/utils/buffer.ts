/** Helper to safely read a byte with bounds checking */
function safeReadByte(data: Uint8Array, offset: number): number | undefined {
	if (offset < 0 || offset >= data.length) {
		return undefined;
	}
	return data[offset];
}

export function readByte(data: Uint8Array, offset: number): number {
	const value = safeReadByte(data, offset);
	return value ?? 0;
}

/**
 * Reads a single byte, returning undefined for invalid offsets.
 * Unlike readByte which returns 0, this allows distinguishing between
 * actual zero values and read errors.
 */
export function readByteChecked(
	data: Uint8Array,
	offset: number,
): number | undefined {
	return safeReadByte(data, offset);
}

/**
 * Renders bytes as uppercase hex pairs joined by `separator`.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([0x0e, 0xb3]), "-"); // "0E-B3"
 * ```
 */
export function toHex(data: Uint8Array, separator = ""): string {
	return Array.from(data, (b) => b.toString(16).toUpperCase().padStart(2, "0")).join(
		separator,
	);
}

/**
 * Safely copies the bytes out of a DataView.
 * Returns a copy to handle potential detached buffer issues.
 * If the buffer is detached, empty or inaccessible, returns null.
 *
 * @example
 * ```typescript
 * characteristic.onValueChanged((view) => {
 *   const bytes = extractBytes(view);
 *   if (bytes) {
 *     // Process data...
 *   }
 * });
 * ```
 */
export function extractBytes(value: DataView | undefined): Uint8Array | null {
	if (!value) {
		return null;
	}

	try {
		// Access byteLength first - this will throw if buffer is detached
		const byteLength = value.byteLength;

		if (byteLength === 0) {
			return null;
		}

		const bufferLength = value.buffer.byteLength;

		// View's byte range must fit within buffer
		if (value.byteOffset + byteLength > bufferLength) {
			return null;
		}

		const copy = new Uint8Array(byteLength);
		copy.set(new Uint8Array(value.buffer, value.byteOffset, byteLength));
		return copy;
	} catch {
		// Detached buffers throw TypeError on property access
		return null;
	}
}
