export {
	createPositionMapping,
	isPositionLabel,
	MAX_TIRES,
	type Measurement,
	type PositionLabel,
	type PositionMapping,
	positionLabel,
	positionNumber,
	SIGNAL_STRENGTH_KEY,
	sensorKey,
} from "./position-mapping";

export {
	DEFAULT_TIRE_NAMES,
	defaultTireName,
	listRotationPatterns,
	ROTATION_PATTERNS,
	type RotatableConfig,
	type RotationMapping,
	type RotationPattern,
	rotatePositions,
} from "./rotation";
