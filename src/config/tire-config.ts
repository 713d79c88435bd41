import { InvalidConfigError } from "../errors/errors";
import {
	createPositionMapping,
	isPositionLabel,
	type PositionMapping,
} from "../mapping/position-mapping";
import type { PollOptions } from "../poll/orchestrator";
import {
	type DeviceFamily,
	DEVICE_FAMILIES,
	getDeviceProfile,
	isDeviceFamily,
	type ProfileOverrides,
} from "../poll/profiles";
import { DEFAULT_SENSOR_IDS } from "../protocol/identity";

/**
 * Persisted settings for one monitor.
 */
export interface TireConfig {
	/** Bluetooth address of the monitor */
	address: string;
	family: DeviceFamily;
	/** Position label to sensor id, e.g. `{ tire_1: "0E-B3-0B-02" }` */
	sensors: Record<string, string>;
	/** Display names by position; positions without one use the defaults */
	tireNames?: Record<string, string>;
	/** Collect unmapped sensor ids instead of completing early */
	learningMode: boolean;
	/**
	 * Data packets that complete a poll. TireLinc defaults to the number of
	 * mapped sensors; otherwise the profile's count applies.
	 */
	expectedDataCount?: number;
	expectedConfigCount?: number;
	/** Overrides the profile's wait deadline */
	deadlineMs?: number;
	/** Cap on ids collected in learning mode */
	maxDiscovered?: number;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringMap(
	input: JsonObject,
	field: string,
): Record<string, string> | undefined {
	const value = input[field];
	if (value === undefined) return undefined;
	if (!isObject(value)) {
		throw new InvalidConfigError(field, "expected an object");
	}

	const result: Record<string, string> = {};
	for (const [key, entry] of Object.entries(value)) {
		if (typeof entry !== "string") {
			throw new InvalidConfigError(`${field}.${key}`, "expected a string");
		}
		result[key] = entry;
	}
	return result;
}

function readCount(
	input: JsonObject,
	field: string,
	min: number,
): number | undefined {
	const value = input[field];
	if (value === undefined) return undefined;
	if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
		throw new InvalidConfigError(field, `expected an integer >= ${min}`);
	}
	return value;
}

/**
 * Validates untyped input (parsed JSON, form data) into a TireConfig.
 * Sensor ids are normalized to `XX-XX-XX-XX`.
 *
 * @throws {InvalidConfigError} Naming the first offending field
 *
 * @example
 * ```typescript
 * const config = parseTireConfig(JSON.parse(text));
 * ```
 */
export function parseTireConfig(input: unknown): TireConfig {
	if (!isObject(input)) {
		throw new InvalidConfigError("$", "expected an object");
	}

	const address = input["address"];
	if (typeof address !== "string" || address.trim() === "") {
		throw new InvalidConfigError("address", "expected a non-empty string");
	}

	const family = input["family"] ?? "tirelinc";
	if (!isDeviceFamily(family)) {
		throw new InvalidConfigError(
			"family",
			`expected one of ${DEVICE_FAMILIES.join(", ")}`,
		);
	}

	const learningMode = input["learningMode"] ?? false;
	if (typeof learningMode !== "boolean") {
		throw new InvalidConfigError("learningMode", "expected a boolean");
	}

	// Validates labels, ids and uniqueness
	const sensors = createPositionMapping(readStringMap(input, "sensors")).toConfig();

	const config: TireConfig = {
		address: address.trim(),
		family,
		sensors,
		learningMode,
	};

	const tireNames = readStringMap(input, "tireNames");
	if (tireNames) {
		for (const [label, name] of Object.entries(tireNames)) {
			if (!isPositionLabel(label)) {
				throw new InvalidConfigError(`tireNames.${label}`, "unknown position");
			}
			if (name.trim() === "") {
				throw new InvalidConfigError(`tireNames.${label}`, "name is empty");
			}
		}
		config.tireNames = tireNames;
	}

	const expectedDataCount = readCount(input, "expectedDataCount", 1);
	if (expectedDataCount !== undefined) config.expectedDataCount = expectedDataCount;

	const expectedConfigCount = readCount(input, "expectedConfigCount", 0);
	if (expectedConfigCount !== undefined) {
		config.expectedConfigCount = expectedConfigCount;
	}

	const deadlineMs = readCount(input, "deadlineMs", 1);
	if (deadlineMs !== undefined) config.deadlineMs = deadlineMs;

	const maxDiscovered = readCount(input, "maxDiscovered", 1);
	if (maxDiscovered !== undefined) config.maxDiscovered = maxDiscovered;

	return config;
}

/**
 * A configuration using the vendor's preset sensor ids for four tires.
 */
export function defaultTireConfig(
	address: string,
	family: DeviceFamily = "tirelinc",
): TireConfig {
	return {
		address,
		family,
		sensors: { ...DEFAULT_SENSOR_IDS },
		learningMode: false,
	};
}

/**
 * Derives the poll settings for a stored configuration.
 */
export function toPollOptions(
	config: TireConfig,
): Pick<PollOptions, "profile" | "mapping" | "learningMode" | "maxDiscovered"> {
	const mapping: PositionMapping = createPositionMapping(config.sensors);

	const overrides: ProfileOverrides = {};
	// TireLinc monitors report every mounted sensor once per burst
	const expectedDataCount =
		config.expectedDataCount ??
		(config.family === "tirelinc" && mapping.size > 0 ? mapping.size : undefined);
	if (expectedDataCount !== undefined) overrides.expectedDataCount = expectedDataCount;
	if (config.expectedConfigCount !== undefined) {
		overrides.expectedConfigCount = config.expectedConfigCount;
	}
	if (config.deadlineMs !== undefined) overrides.deadlineMs = config.deadlineMs;

	return {
		profile: getDeviceProfile(config.family, overrides),
		mapping,
		learningMode: config.learningMode,
		...(config.maxDiscovered !== undefined && {
			maxDiscovered: config.maxDiscovered,
		}),
	};
}
