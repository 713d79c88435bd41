export { extractBytes, readByte, readByteChecked, toHex } from "./buffer";

export {
	type ConsoleLoggerOptions,
	createConsoleLogger,
	createNoOpLogger,
	LOG_PREFIX,
	type Logger,
} from "./logger";

export { BLUETOOTH_UUID_BASE, normalizeUuid, toFullUuid } from "./uuid";
