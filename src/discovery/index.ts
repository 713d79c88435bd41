export {
	type DiscoverOptions,
	discoverSensors,
	isSupportedDevice,
	proposeSensorMapping,
	TIRELINC_NAME_PREFIX,
} from "./learn";
