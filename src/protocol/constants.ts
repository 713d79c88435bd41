/**
 * Wire constants for TPMS sensor notifications.
 *
 * Layout (all single bytes, raw device units):
 * - [0]    packet tag
 * - [1..4] sensor identity (compared byte-wise)
 * - [7]    temperature (data) / min pressure threshold (config)
 * - [9]    pressure (data) / max pressure threshold (config)
 * - [11]   max temperature threshold (config)
 * - [13]   max temperature change threshold (config)
 */

export const PacketTag = {
	DATA: 0x00,
	STATUS: 0x01,
	CONFIG: 0x02,
	ACK: 0x04,
} as const;

export type PacketTag = (typeof PacketTag)[keyof typeof PacketTag];

/** Tags that carry no sensor payload */
export const NON_SENSOR_TAGS: ReadonlySet<number> = new Set([
	PacketTag.STATUS,
	PacketTag.ACK,
]);

/** Minimum length of a data or config packet */
export const MIN_PACKET_LENGTH = 10;

export const IDENTITY_OFFSET = 1;
export const IDENTITY_LENGTH = 4;

export const TEMPERATURE_OFFSET = 7;
export const PRESSURE_OFFSET = 9;

export const MIN_PRESSURE_OFFSET = 7;
export const MAX_PRESSURE_OFFSET = 9;
export const MAX_TEMPERATURE_OFFSET = 11;
export const MAX_TEMPERATURE_CHANGE_OFFSET = 13;

/** Why the decoder refused a payload */
export type PacketRejection = "too_short" | "non_sensor_tag" | "unknown_tag";

/** Command written to the TireLinc write characteristic to request a burst */
export const TRIGGER_COMMAND: readonly number[] = [0x01];
