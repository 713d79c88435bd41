export {
	applyRotation,
	type ConfigStore,
	createFileConfigStore,
	createMemoryConfigStore,
	createNoOpConfigStore,
	type FileConfigStoreOptions,
} from "./store";

export {
	defaultTireConfig,
	parseTireConfig,
	type TireConfig,
	toPollOptions,
} from "./tire-config";
