export {
	type CompletionPolicy,
	type CompletionSignal,
	createCompletionSignal,
	isComplete,
	type PacketCounts,
	type WaitResult,
} from "./completion";

export {
	createTpmsPoller,
	DISCONNECT_TIMEOUT_MS,
	type PollOptions,
	type PollOutcome,
	type PollStatus,
	pollDevice,
	type TpmsPoller,
} from "./orchestrator";

export {
	DEVICE_FAMILIES,
	type DeviceFamily,
	type DeviceProfile,
	getDeviceProfile,
	isDeviceFamily,
	MEDISANA_BP_PROFILE,
	type MedisanaProfile,
	type ProfileOverrides,
	TIRELINC_PROFILE,
	type TireLincProfile,
} from "./profiles";

export {
	type AppliedEffect,
	createPollSession,
	DEFAULT_MAX_DISCOVERED,
	type PollResult,
	type PollSession,
	type PollSessionOptions,
} from "./session";
