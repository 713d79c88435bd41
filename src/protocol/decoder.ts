import { MalformedPacketError } from "../errors/errors";
import { readByte, readByteChecked } from "../utils/buffer";
import {
	IDENTITY_LENGTH,
	IDENTITY_OFFSET,
	MAX_PRESSURE_OFFSET,
	MAX_TEMPERATURE_CHANGE_OFFSET,
	MAX_TEMPERATURE_OFFSET,
	MIN_PACKET_LENGTH,
	MIN_PRESSURE_OFFSET,
	NON_SENSOR_TAGS,
	PacketTag,
	type PacketRejection,
	PRESSURE_OFFSET,
	TEMPERATURE_OFFSET,
} from "./constants";
import type { SensorIdentity } from "./identity";

/** Alert thresholds a sensor reports in a config packet */
export interface SensorThresholds {
	minPressure: number | undefined;
	maxPressure: number | undefined;
	maxTemperature: number | undefined;
	maxTemperatureChange: number | undefined;
}

export interface DataPacket {
	kind: "data";
	tag: number;
	identity: SensorIdentity;
	temperature: number;
	pressure: number;
}

export interface ConfigPacket {
	kind: "config";
	tag: number;
	identity: SensorIdentity;
	thresholds: SensorThresholds;
}

export interface RejectedPacket {
	kind: "rejected";
	tag: number | undefined;
	reason: PacketRejection;
	length: number;
}

export type DecodedPacket = DataPacket | ConfigPacket;

export type DecodeResult = DecodedPacket | RejectedPacket;

function readIdentity(raw: Uint8Array): SensorIdentity {
	return raw.slice(IDENTITY_OFFSET, IDENTITY_OFFSET + IDENTITY_LENGTH);
}

/**
 * Classifies and decodes one notification payload.
 *
 * Pure and total: never throws, needs no configuration. Resolving the
 * identity to a tire position is left to the caller.
 *
 * @example
 * ```typescript
 * const packet = decodePacket(bytes);
 * if (packet.kind === "data") {
 *   console.log(packet.pressure, packet.temperature);
 * }
 * ```
 */
export function decodePacket(raw: Uint8Array): DecodeResult {
	const tag = readByteChecked(raw, 0);

	if (raw.length < MIN_PACKET_LENGTH) {
		return { kind: "rejected", tag, reason: "too_short", length: raw.length };
	}

	const packetTag = readByte(raw, 0);

	if (NON_SENSOR_TAGS.has(packetTag)) {
		return {
			kind: "rejected",
			tag: packetTag,
			reason: "non_sensor_tag",
			length: raw.length,
		};
	}

	switch (packetTag) {
		case PacketTag.DATA:
			return {
				kind: "data",
				tag: packetTag,
				identity: readIdentity(raw),
				temperature: readByte(raw, TEMPERATURE_OFFSET),
				pressure: readByte(raw, PRESSURE_OFFSET),
			};
		case PacketTag.CONFIG:
			// Threshold bytes past offset 9 may be cut off on short frames.
			return {
				kind: "config",
				tag: packetTag,
				identity: readIdentity(raw),
				thresholds: {
					minPressure: readByteChecked(raw, MIN_PRESSURE_OFFSET),
					maxPressure: readByteChecked(raw, MAX_PRESSURE_OFFSET),
					maxTemperature: readByteChecked(raw, MAX_TEMPERATURE_OFFSET),
					maxTemperatureChange: readByteChecked(
						raw,
						MAX_TEMPERATURE_CHANGE_OFFSET,
					),
				},
			};
		default:
			return {
				kind: "rejected",
				tag: packetTag,
				reason: "unknown_tag",
				length: raw.length,
			};
	}
}

export function describeRejection(packet: RejectedPacket): string {
	switch (packet.reason) {
		case "too_short":
			return `packet too short (${packet.length} < ${MIN_PACKET_LENGTH} bytes)`;
		case "non_sensor_tag":
			return `control frame 0x${formatTag(packet.tag)} carries no sensor payload`;
		case "unknown_tag":
			return `unknown packet tag 0x${formatTag(packet.tag)}`;
	}
}

export function toMalformedPacketError(
	packet: RejectedPacket,
): MalformedPacketError {
	return new MalformedPacketError(packet.reason, packet.length);
}

function formatTag(tag: number | undefined): string {
	return tag === undefined ? "??" : tag.toString(16).padStart(2, "0");
}
