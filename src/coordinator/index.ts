export {
	type CoordinatorEvents,
	type CoordinatorPollFn,
	createUpdateCoordinator,
	DEFAULT_MAX_CONSECUTIVE_FAILURES,
	MOVING_INTERVAL_MS,
	STATIONARY_INTERVAL_MS,
	type UpdateCoordinator,
	type UpdateCoordinatorOptions,
} from "./update-coordinator";
