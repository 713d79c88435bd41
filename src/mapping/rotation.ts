import { InvalidConfigError } from "../errors/errors";
import {
	isPositionLabel,
	type PositionLabel,
	positionNumber,
} from "./position-mapping";

/** New position to the position its sensor came from */
export type RotationMapping = Readonly<Record<PositionLabel, PositionLabel>>;

export interface RotationPattern {
	description: string;
	mapping: RotationMapping;
}

/**
 * Rotation patterns by tire count.
 *
 * Positions for 4 tires: 1 front left, 2 front right, 3 rear left, 4 rear right.
 * Positions for 6 tires: 1 front left, 2 front right, 3 rear left outer,
 * 4 rear left inner, 5 rear right inner, 6 rear right outer.
 */
export const ROTATION_PATTERNS: Readonly<
	Record<number, Readonly<Record<string, RotationPattern>>>
> = {
	4: {
		"Forward Cross": {
			description: "Rears cross to the front, fronts move straight back",
			mapping: { tire_1: "tire_4", tire_2: "tire_3", tire_3: "tire_1", tire_4: "tire_2" },
		},
		"Rearward Cross": {
			description: "Rears move straight forward, fronts cross to the rear",
			mapping: { tire_1: "tire_3", tire_2: "tire_4", tire_3: "tire_2", tire_4: "tire_1" },
		},
		"X Pattern": {
			description: "Every tire moves to the diagonally opposite corner",
			mapping: { tire_1: "tire_4", tire_2: "tire_3", tire_3: "tire_2", tire_4: "tire_1" },
		},
		"Front to Back": {
			description: "Fronts and rears swap on the same side",
			mapping: { tire_1: "tire_3", tire_2: "tire_4", tire_3: "tire_1", tire_4: "tire_2" },
		},
	},
	6: {
		"Dually Forward": {
			description: "Inner rears move to the front, fronts move to the outer rears",
			mapping: {
				tire_1: "tire_4",
				tire_2: "tire_5",
				tire_3: "tire_1",
				tire_4: "tire_3",
				tire_5: "tire_6",
				tire_6: "tire_2",
			},
		},
		"Dually Rearward": {
			description: "Fronts move to the inner rears, outer rears move to the front",
			mapping: {
				tire_1: "tire_3",
				tire_2: "tire_6",
				tire_3: "tire_4",
				tire_4: "tire_1",
				tire_5: "tire_2",
				tire_6: "tire_5",
			},
		},
	},
};

export const DEFAULT_TIRE_NAMES: Readonly<
	Record<number, Readonly<Record<PositionLabel, string>>>
> = {
	4: {
		tire_1: "Front Left",
		tire_2: "Front Right",
		tire_3: "Rear Left",
		tire_4: "Rear Right",
	},
	6: {
		tire_1: "Front Left",
		tire_2: "Front Right",
		tire_3: "Rear Left Outer",
		tire_4: "Rear Left Inner",
		tire_5: "Rear Right Inner",
		tire_6: "Rear Right Outer",
	},
};

/** The parts of a tire configuration a rotation rewrites */
export interface RotatableConfig {
	sensors: Readonly<Record<string, string>>;
	tireNames?: Readonly<Record<string, string>>;
}

export function listRotationPatterns(tireCount: number): string[] {
	return Object.keys(ROTATION_PATTERNS[tireCount] ?? {});
}

export function defaultTireName(tireCount: number, position: PositionLabel): string {
	return (
		DEFAULT_TIRE_NAMES[tireCount]?.[position] ??
		`Tire ${positionNumber(position) ?? position}`
	);
}

/**
 * Relabels sensors and tire names after a physical tire rotation.
 * Each sensor (and its name) moves from its old position to the new one
 * the pattern assigns. The input is not modified.
 *
 * @throws {InvalidConfigError} If the pattern does not exist for the
 * config's tire count
 *
 * @example
 * ```typescript
 * const rotated = rotatePositions(config, "Front to Back");
 * ```
 */
export function rotatePositions<T extends RotatableConfig>(
	config: T,
	patternName: string,
): T & { tireNames: Record<string, string> } {
	const tireCount = Object.keys(config.sensors).length;
	const pattern = ROTATION_PATTERNS[tireCount]?.[patternName];
	if (!pattern) {
		const available = listRotationPatterns(tireCount);
		throw new InvalidConfigError(
			"rotation",
			`no pattern "${patternName}" for ${tireCount} tires` +
				(available.length > 0 ? ` (available: ${available.join(", ")})` : ""),
		);
	}

	// Unnamed positions carry their default name, which then moves with the tire
	const currentNames: Readonly<Record<string, string>> = {
		...DEFAULT_TIRE_NAMES[tireCount],
		...config.tireNames,
	};
	const sensors: Record<string, string> = {};
	const tireNames: Record<string, string> = {};

	for (const [newPosition, oldPosition] of Object.entries(pattern.mapping)) {
		if (!isPositionLabel(newPosition)) continue;

		tireNames[newPosition] =
			currentNames[oldPosition] ?? defaultTireName(tireCount, newPosition);

		const sensor = config.sensors[oldPosition];
		if (sensor !== undefined) {
			sensors[newPosition] = sensor;
		}
	}

	return { ...config, sensors, tireNames };
}
