import { describe, expect, it } from "vitest";
import { normalizeUuid, toFullUuid } from "./uuid";

describe("toFullUuid", () => {
	it("expands numbers and hex strings", () => {
		expect(toFullUuid(0x1810)).toBe("00001810-0000-1000-8000-00805f9b34fb");
		expect(toFullUuid("2A35")).toBe("00002a35-0000-1000-8000-00805f9b34fb");
		expect(toFullUuid("1")).toBe("00000001-0000-1000-8000-00805f9b34fb");
	});

	it("rejects out-of-range numbers", () => {
		expect(() => toFullUuid(0x10000)).toThrow(RangeError);
		expect(() => toFullUuid(1.5)).toThrow(RangeError);
	});

	it("rejects bad strings", () => {
		expect(() => toFullUuid("")).toThrow('Invalid short UUID: ""');
		expect(() => toFullUuid("12345")).toThrow("must be 1-4 hex chars");
		expect(() => toFullUuid("xyz")).toThrow("must be 1-4 hex chars");
	});
});

describe("normalizeUuid", () => {
	it("lowercases full UUIDs", () => {
		expect(normalizeUuid("00000002-00B7-4807-BEEE-E0B0879CF3DD")).toBe(
			"00000002-00b7-4807-beee-e0b0879cf3dd",
		);
	});

	it("expands short forms", () => {
		expect(normalizeUuid(0x2a35)).toBe("00002a35-0000-1000-8000-00805f9b34fb");
		expect(normalizeUuid("1810")).toBe("00001810-0000-1000-8000-00805f9b34fb");
	});

	it("rejects malformed long forms", () => {
		expect(() => normalizeUuid("00000002-00b7-4807-beee")).toThrow(
			'Invalid UUID: "00000002-00b7-4807-beee"',
		);
	});
});
