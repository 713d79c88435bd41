export {
	AbortError,
	BLEConnectionError,
	InvalidConfigError,
	isTransientBLEError,
	MalformedPacketError,
	normalizeError,
	raceWithAbort,
	SubscribeError,
	TimeoutError,
	throwIfAborted,
	UnknownSensorError,
	WriteError,
	withTimeout,
} from "./errors";
