import { InvalidConfigError } from "../errors/errors";
import {
	formatSensorIdentity,
	parseSensorIdentity,
	type SensorIdentity,
} from "../protocol/identity";

/** Largest tire count a monitor supports (dually trailers) */
export const MAX_TIRES = 6;

/** Logical tire position, e.g. `"tire_1"` */
export type PositionLabel = `tire_${number}`;

export type Measurement = "pressure" | "temperature";

/** Key under which the advertisement RSSI is reported */
export const SIGNAL_STRENGTH_KEY = "signal_strength";

const POSITION_PATTERN = /^tire_([1-9]\d*)$/;

/**
 * Returns the 1-based tire number of a position label, or undefined when
 * the label is malformed or beyond MAX_TIRES.
 */
export function positionNumber(label: string): number | undefined {
	const match = POSITION_PATTERN.exec(label);
	if (!match?.[1]) return undefined;
	const n = Number(match[1]);
	return n <= MAX_TIRES ? n : undefined;
}

export function isPositionLabel(label: string): label is PositionLabel {
	return positionNumber(label) !== undefined;
}

export function positionLabel(n: number): PositionLabel {
	return `tire_${n}`;
}

/**
 * Builds the result key for a position and measurement.
 *
 * @example
 * ```typescript
 * sensorKey("tire_2", "pressure"); // "tire2_pressure"
 * ```
 */
export function sensorKey(
	position: PositionLabel,
	measurement: Measurement,
): string {
	return `${position.replace("_", "")}_${measurement}`;
}

/**
 * Read-only association of sensor identities to tire positions.
 */
export interface PositionMapping {
	readonly size: number;
	/** Position the identity is mounted at, or undefined if unmapped */
	resolve(identity: SensorIdentity): PositionLabel | undefined;
	/** Entries ordered by tire number */
	entries(): Array<[PositionLabel, SensorIdentity]>;
	/** Serializable `{ tire_1: "0E-B3-0B-02", ... }` form */
	toConfig(): Record<PositionLabel, string>;
}

/**
 * Validates user configuration and builds a position mapping.
 *
 * @param sensors - Position label to sensor id text, e.g. `{ tire_1: "0E-B3-0B-02" }`
 * @throws {InvalidConfigError} On malformed labels or ids, or when an id is
 * assigned to more than one position
 */
export function createPositionMapping(
	sensors: Readonly<Record<string, string>> = {},
): PositionMapping {
	// Keyed by formatted identity so lookups compare bytes, not references
	const byIdentity = new Map<string, PositionLabel>();
	const byPosition = new Map<PositionLabel, SensorIdentity>();

	for (const [label, text] of Object.entries(sensors)) {
		if (!isPositionLabel(label)) {
			throw new InvalidConfigError(
				`sensors.${label}`,
				`position must be tire_1..tire_${MAX_TIRES}`,
			);
		}

		const identity = parseSensorIdentity(text, `sensors.${label}`);
		const key = formatSensorIdentity(identity);
		const existing = byIdentity.get(key);
		if (existing !== undefined) {
			throw new InvalidConfigError(
				`sensors.${label}`,
				`sensor ${key} is already assigned to ${existing}`,
			);
		}

		byIdentity.set(key, label);
		byPosition.set(label, identity);
	}

	const ordered = [...byPosition.entries()].sort(
		([a], [b]) => (positionNumber(a) ?? 0) - (positionNumber(b) ?? 0),
	);

	return {
		size: byPosition.size,
		resolve(identity) {
			return byIdentity.get(formatSensorIdentity(identity));
		},
		entries() {
			return ordered.map(([label, identity]): [PositionLabel, SensorIdentity] => [
				label,
				identity.slice(),
			]);
		},
		toConfig() {
			const config: Record<PositionLabel, string> = {};
			for (const [label, identity] of ordered) {
				config[label] = formatSensorIdentity(identity);
			}
			return config;
		},
	};
}
