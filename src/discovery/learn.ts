import {
	createPositionMapping,
	MAX_TIRES,
	type PositionLabel,
	positionLabel,
} from "../mapping/position-mapping";
import { type PollOptions, pollDevice } from "../poll/orchestrator";
import type { BLEAdapter, PollTarget } from "../types";
import { createConsoleLogger } from "../utils/logger";

/** Advertised name prefix of supported monitors */
export const TIRELINC_NAME_PREFIX = "TireLinc";

export function isSupportedDevice(name: string | undefined): boolean {
	return name?.startsWith(TIRELINC_NAME_PREFIX) ?? false;
}

export type DiscoverOptions = Omit<PollOptions, "mapping" | "learningMode">;

/**
 * Listens to a monitor for one full deadline and reports every sensor id
 * it transmits, in the order first heard. Returns an empty list when the
 * device could not be polled.
 *
 * @example
 * ```typescript
 * const ids = await discoverSensors(adapter, { address }, {
 *   profile: getDeviceProfile("tirelinc"),
 * });
 * const sensors = proposeSensorMapping(ids);
 * ```
 */
export async function discoverSensors(
	adapter: BLEAdapter,
	target: PollTarget,
	options: DiscoverOptions,
): Promise<string[]> {
	const log = options.logger ?? createConsoleLogger("discovery");
	const outcome = await pollDevice(adapter, target, {
		...options,
		logger: log,
		mapping: createPositionMapping(),
		learningMode: true,
	});

	if (outcome.status === "unreachable" || outcome.status === "subscribe-failed") {
		log.warn(`Discovery on ${target.address} ended early: ${outcome.status}`);
	} else {
		log.info(
			`Discovery on ${target.address} found ${outcome.discovered.length} sensor(s)`,
		);
	}

	return outcome.discovered;
}

/**
 * Assigns discovered ids to `tire_1..tire_n` in the order given.
 * Ids beyond the largest supported tire count are left out.
 */
export function proposeSensorMapping(
	identities: readonly string[],
): Record<PositionLabel, string> {
	const sensors: Record<PositionLabel, string> = {};
	identities.slice(0, MAX_TIRES).forEach((id, index) => {
		sensors[positionLabel(index + 1)] = id;
	});
	return sensors;
}
