import { readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { InvalidConfigError, normalizeError } from "../errors/errors";
import { rotatePositions } from "../mapping/rotation";
import { createConsoleLogger, type Logger } from "../utils/logger";
import { parseTireConfig, type TireConfig } from "./tire-config";

/**
 * Persistence for one monitor's configuration.
 * `get` returns `null` when nothing (valid) is stored.
 */
export interface ConfigStore {
	get(): TireConfig | null;
	set(config: TireConfig): void;
	remove(): void;
}

export interface FileConfigStoreOptions {
	logger?: Logger;
}

/**
 * Creates a ConfigStore backed by a JSON file.
 *
 * Read and write failures are logged and treated as "no configuration";
 * a file that fails validation is reported the same way. Writes go to a
 * temporary file first and are renamed into place.
 *
 * @example
 * ```typescript
 * const store = createFileConfigStore("/var/lib/tpms/AA-BB-CC-DD-EE-FF.json");
 * const config = store.get() ?? defaultTireConfig("AA:BB:CC:DD:EE:FF");
 * ```
 */
export function createFileConfigStore(
	path: string,
	options: FileConfigStoreOptions = {},
): ConfigStore {
	const log = options.logger ?? createConsoleLogger("config");

	return {
		get(): TireConfig | null {
			let text: string;
			try {
				text = readFileSync(path, "utf8");
			} catch (e) {
				if (e instanceof Error && "code" in e && e.code === "ENOENT") {
					return null;
				}
				log.warn(`Could not read config from ${path}:`, normalizeError(e).message);
				return null;
			}

			try {
				return parseTireConfig(JSON.parse(text));
			} catch (e) {
				log.warn(`Ignoring invalid config in ${path}:`, normalizeError(e).message);
				return null;
			}
		},

		set(config: TireConfig): void {
			const temp = `${path}.tmp`;
			try {
				writeFileSync(temp, `${JSON.stringify(config, null, "\t")}\n`, "utf8");
				renameSync(temp, path);
			} catch (e) {
				log.warn(`Could not save config to ${path}:`, normalizeError(e).message);
			}
		},

		remove(): void {
			try {
				rmSync(path, { force: true });
			} catch (e) {
				log.warn(`Could not remove config ${path}:`, normalizeError(e).message);
			}
		},
	};
}

export function createMemoryConfigStore(initial: TireConfig | null = null): ConfigStore {
	let stored = initial ? structuredClone(initial) : null;

	return {
		get(): TireConfig | null {
			return stored ? structuredClone(stored) : null;
		},

		set(config: TireConfig): void {
			stored = structuredClone(config);
		},

		remove(): void {
			stored = null;
		},
	};
}

export function createNoOpConfigStore(): ConfigStore {
	return {
		get(): TireConfig | null {
			return null;
		},

		set(): void {},

		remove(): void {},
	};
}

/**
 * Rotates the stored sensor assignment and tire names, then saves the
 * result.
 *
 * @throws {InvalidConfigError} If nothing is stored or the pattern does
 * not exist for the configured tire count
 */
export function applyRotation(store: ConfigStore, patternName: string): TireConfig {
	const config = store.get();
	if (!config) {
		throw new InvalidConfigError("rotation", "no configuration stored");
	}

	const rotated = rotatePositions(config, patternName);
	store.set(rotated);
	return rotated;
}
