import { UnknownSensorError } from "../errors/errors";
import type { PositionMapping, PositionLabel } from "../mapping/position-mapping";
import { SIGNAL_STRENGTH_KEY, sensorKey } from "../mapping/position-mapping";
import { type DecodedPacket, decodePacket, describeRejection } from "../protocol/decoder";
import { formatSensorIdentity } from "../protocol/identity";
import { createNoOpLogger, type Logger } from "../utils/logger";
import {
	type CompletionPolicy,
	type CompletionSignal,
	createCompletionSignal,
	isComplete,
} from "./completion";

/** Flat readings keyed like `tire1_pressure`, plus `signal_strength` */
export type PollResult = Record<string, number>;

/** Default cap on distinct identities collected in learning mode */
export const DEFAULT_MAX_DISCOVERED = 16;

/** What applying one decoded packet did to the session */
export interface AppliedEffect {
	/** Whether the PollResult was written */
	changed: boolean;
	/** Position written, for mapped data packets */
	position?: PositionLabel;
	/** Identity newly added to the discovered set */
	discovered?: string;
}

export interface PollSessionOptions {
	mapping: PositionMapping;
	policy: CompletionPolicy;
	/** Signal strength from the advertisement, seeded into the result */
	rssi?: number | undefined;
	maxDiscovered?: number;
	logger?: Logger;
}

/**
 * Accumulated state of one poll. Created fresh for every poll and
 * discarded afterwards.
 */
export interface PollSession {
	readonly dataPackets: number;
	readonly configPackets: number;
	readonly completion: CompletionSignal;
	/** Copy of the readings so far */
	result(): PollResult;
	/** Discovered identities in arrival order */
	discovered(): string[];
	/**
	 * Applies an already-decoded packet without checking completion.
	 * Resolves identities against `mapping`, or the session's own mapping.
	 */
	apply(packet: DecodedPacket, mapping?: PositionMapping): AppliedEffect;
	/**
	 * Notification callback: decodes, applies and checks completion.
	 * Rejected packets are logged and dropped. Never throws.
	 */
	handleNotification(raw: Uint8Array): AppliedEffect;
}

const UNCHANGED: AppliedEffect = { changed: false };

/**
 * Creates the accumulation state for one poll.
 *
 * @example
 * ```typescript
 * const session = createPollSession({ mapping, policy, rssi: -67 });
 * characteristic.onValueChanged((view) => {
 *   const bytes = extractBytes(view);
 *   if (bytes) session.handleNotification(bytes);
 * });
 * await session.completion.wait(5000);
 * ```
 */
export function createPollSession(options: PollSessionOptions): PollSession {
	const { policy } = options;
	const maxDiscovered = options.maxDiscovered ?? DEFAULT_MAX_DISCOVERED;
	const log = options.logger ?? createNoOpLogger();
	const learning = policy.mode === "learning";

	const readings: PollResult = {};
	if (options.rssi !== undefined) {
		readings[SIGNAL_STRENGTH_KEY] = options.rssi;
	}

	const discovered = new Set<string>();
	const completion = createCompletionSignal();
	let dataPackets = 0;
	let configPackets = 0;
	let capWarned = false;

	function apply(
		packet: DecodedPacket,
		mapping: PositionMapping = options.mapping,
	): AppliedEffect {
		if (packet.kind === "config") {
			configPackets++;
			return UNCHANGED;
		}

		const position = mapping.resolve(packet.identity);
		if (position !== undefined) {
			readings[sensorKey(position, "pressure")] = packet.pressure;
			readings[sensorKey(position, "temperature")] = packet.temperature;
			dataPackets++;
			return { changed: true, position };
		}

		const id = formatSensorIdentity(packet.identity);
		if (!learning) {
			log.debug(`${new UnknownSensorError(id).message}; dropping data`);
			return UNCHANGED;
		}

		if (discovered.has(id)) {
			return UNCHANGED;
		}

		if (discovered.size >= maxDiscovered) {
			if (!capWarned) {
				capWarned = true;
				log.warn(
					`Discovered ${maxDiscovered} sensors, ignoring further new ids (first dropped: ${id})`,
				);
			}
			return UNCHANGED;
		}

		discovered.add(id);
		log.info(`Discovered sensor ${id}`);
		return { changed: false, discovered: id };
	}

	function handleNotification(raw: Uint8Array): AppliedEffect {
		const decoded = decodePacket(raw);
		if (decoded.kind === "rejected") {
			log.debug(`Ignoring notification: ${describeRejection(decoded)}`);
			return UNCHANGED;
		}

		const effect = apply(decoded);

		if (!completion.fired && isComplete({ dataPackets, configPackets }, policy)) {
			completion.fire();
			log.debug(
				`Complete after ${dataPackets} data and ${configPackets} config packets`,
			);
		}

		return effect;
	}

	return {
		get dataPackets() {
			return dataPackets;
		},
		get configPackets() {
			return configPackets;
		},
		completion,
		result: () => ({ ...readings }),
		discovered: () => [...discovered],
		apply,
		handleNotification,
	};
}
