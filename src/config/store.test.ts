import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidConfigError } from "../errors/errors";
import { createNoOpLogger } from "../utils/logger";
import {
	applyRotation,
	createFileConfigStore,
	createMemoryConfigStore,
	createNoOpConfigStore,
} from "./store";
import { defaultTireConfig } from "./tire-config";

const ADDRESS = "AA:BB:CC:DD:EE:FF";

describe("createMemoryConfigStore", () => {
	it("returns null initially", () => {
		expect(createMemoryConfigStore().get()).toBeNull();
	});

	it("stores and removes a config", () => {
		const store = createMemoryConfigStore();
		store.set(defaultTireConfig(ADDRESS));
		expect(store.get()).toEqual(defaultTireConfig(ADDRESS));

		store.remove();
		expect(store.get()).toBeNull();
	});

	it("does not share state with callers", () => {
		const config = defaultTireConfig(ADDRESS);
		const store = createMemoryConfigStore(config);

		config.sensors["tire_1"] = "01-02-03-04";
		const read = store.get();
		if (read) read.learningMode = true;

		expect(store.get()).toEqual(defaultTireConfig(ADDRESS));
	});
});

describe("createNoOpConfigStore", () => {
	it("never stores anything", () => {
		const store = createNoOpConfigStore();
		store.set(defaultTireConfig(ADDRESS));
		expect(store.get()).toBeNull();
		expect(() => store.remove()).not.toThrow();
	});
});

describe("createFileConfigStore", () => {
	let dir: string;
	let path: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "tpms-config-"));
		path = join(dir, "monitor.json");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("returns null when the file does not exist", () => {
		const logger = { ...createNoOpLogger(), warn: vi.fn() };
		expect(createFileConfigStore(path, { logger }).get()).toBeNull();
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it("writes tab-indented JSON and reads it back", () => {
		const store = createFileConfigStore(path, { logger: createNoOpLogger() });
		const config = defaultTireConfig(ADDRESS);

		store.set(config);

		expect(JSON.parse(readFileSync(path, "utf8"))).toEqual(config);
		expect(readFileSync(path, "utf8")).toContain('\n\t"address": "AA:BB:CC:DD:EE:FF",\n');
		expect(store.get()).toEqual(config);
	});

	it("treats unparseable JSON as missing", () => {
		writeFileSync(path, "{ not json", "utf8");
		const logger = { ...createNoOpLogger(), warn: vi.fn() };

		expect(createFileConfigStore(path, { logger }).get()).toBeNull();
		expect(logger.warn).toHaveBeenCalledTimes(1);
		expect(logger.warn.mock.calls[0]?.[0]).toBe(`Ignoring invalid config in ${path}:`);
	});

	it("treats an invalid config as missing", () => {
		writeFileSync(path, JSON.stringify({ address: ADDRESS, family: "acme" }), "utf8");
		const logger = { ...createNoOpLogger(), warn: vi.fn() };

		expect(createFileConfigStore(path, { logger }).get()).toBeNull();
		expect(logger.warn).toHaveBeenCalledWith(
			`Ignoring invalid config in ${path}:`,
			"Invalid configuration at family: expected one of tirelinc, medisana-bp",
		);
	});

	it("logs write failures", () => {
		const missing = join(dir, "no-such-dir", "monitor.json");
		const logger = { ...createNoOpLogger(), warn: vi.fn() };

		createFileConfigStore(missing, { logger }).set(defaultTireConfig(ADDRESS));

		expect(logger.warn).toHaveBeenCalledTimes(1);
		expect(logger.warn.mock.calls[0]?.[0]).toBe(`Could not save config to ${missing}:`);
	});

	it("removes the file", () => {
		const store = createFileConfigStore(path, { logger: createNoOpLogger() });
		store.set(defaultTireConfig(ADDRESS));
		store.remove();

		expect(store.get()).toBeNull();
		expect(() => store.remove()).not.toThrow();
	});
});

describe("applyRotation", () => {
	it("rotates and saves the stored config", () => {
		const store = createMemoryConfigStore(defaultTireConfig(ADDRESS));

		const rotated = applyRotation(store, "Front to Back");

		expect(rotated.sensors).toEqual({
			tire_1: "0E-FF-47-02",
			tire_2: "0E-61-3A-02",
			tire_3: "0E-B3-0B-02",
			tire_4: "0E-88-46-02",
		});
		expect(store.get()).toEqual(rotated);
	});

	it("carries custom names with their sensors", () => {
		const store = createMemoryConfigStore({
			...defaultTireConfig(ADDRESS),
			tireNames: { tire_1: "Driver Front" },
		});

		const rotated = applyRotation(store, "Front to Back");

		expect(rotated.tireNames).toEqual({
			tire_1: "Rear Left",
			tire_2: "Rear Right",
			tire_3: "Driver Front",
			tire_4: "Front Right",
		});
	});

	it("fails when nothing is stored", () => {
		expect(() => applyRotation(createMemoryConfigStore(), "Front to Back")).toThrow(
			new InvalidConfigError("rotation", "no configuration stored"),
		);
	});

	it("leaves the store unchanged for an unknown pattern", () => {
		const store = createMemoryConfigStore(defaultTireConfig(ADDRESS));

		expect(() => applyRotation(store, "Spin")).toThrow(InvalidConfigError);
		expect(store.get()).toEqual(defaultTireConfig(ADDRESS));
	});
});
