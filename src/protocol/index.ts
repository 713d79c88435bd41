export {
	PacketTag,
	type PacketRejection,
	TRIGGER_COMMAND,
} from "./constants";

export {
	type ConfigPacket,
	type DataPacket,
	type DecodedPacket,
	type DecodeResult,
	decodePacket,
	describeRejection,
	type RejectedPacket,
	type SensorThresholds,
	toMalformedPacketError,
} from "./decoder";

export {
	DEFAULT_SENSOR_IDS,
	formatSensorIdentity,
	parseSensorIdentity,
	type SensorIdentity,
	sameIdentity,
} from "./identity";
