import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	createFakeAdapter,
	createFakeCharacteristic,
	createFakeSession,
} from "../__tests__/fakes";
import { AbortError, BLEConnectionError, TimeoutError } from "../errors";
import { createNoOpLogger } from "../utils/logger";
import {
	connectWithRetry,
	DEFAULT_WRITE_TIMEOUT_MS,
	startNotifications,
	withRetry,
	writeWithTimeout,
} from "./transport";

const CHAR_UUID = "00000002-00b7-4807-beee-e0b0879cf3dd";

describe("transport", () => {
	describe("writeWithTimeout", () => {
		it("writes with response by default", async () => {
			const char = createFakeCharacteristic(CHAR_UUID);
			const data = new Uint8Array([0x01]);

			await writeWithTimeout(char, data);

			expect(char.writeValueWithResponse).toHaveBeenCalledWith(data);
			expect(char.writeValueWithoutResponse).not.toHaveBeenCalled();
		});

		it("writes without response when asked", async () => {
			const char = createFakeCharacteristic(CHAR_UUID);
			const data = new Uint8Array([0x01]);

			await writeWithTimeout(char, data, { withoutResponse: true });

			expect(char.writeValueWithoutResponse).toHaveBeenCalledWith(data);
			expect(char.writeValueWithResponse).not.toHaveBeenCalled();
		});

		it("refuses empty data", async () => {
			const char = createFakeCharacteristic(CHAR_UUID);

			await expect(writeWithTimeout(char, new Uint8Array(0))).rejects.toThrow(
				"Empty data",
			);
			expect(char.writeValueWithResponse).not.toHaveBeenCalled();
		});

		it("times out with the default timeout", async () => {
			vi.useFakeTimers();
			const char = createFakeCharacteristic(CHAR_UUID);
			char.writeValueWithResponse.mockImplementation(() => new Promise(() => {}));

			const promise = writeWithTimeout(char, new Uint8Array([1]));
			const assertion = expect(promise).rejects.toThrow(TimeoutError);
			await vi.advanceTimersByTimeAsync(DEFAULT_WRITE_TIMEOUT_MS);
			await assertion;

			vi.useRealTimers();
		});

		it("rejects immediately when already aborted", async () => {
			const char = createFakeCharacteristic(CHAR_UUID);
			const controller = new AbortController();
			controller.abort();

			await expect(
				writeWithTimeout(char, new Uint8Array([1]), {
					signal: controller.signal,
				}),
			).rejects.toThrow(AbortError);
		});
	});

	describe("startNotifications", () => {
		it("delivers copies of notified values", async () => {
			const char = createFakeCharacteristic(CHAR_UUID);
			const received: Uint8Array[] = [];

			await startNotifications(char, (bytes) => received.push(bytes));
			char.emit([0x00, 1, 2, 3]);

			expect(char.startNotifications).toHaveBeenCalledTimes(1);
			expect(received).toEqual([new Uint8Array([0x00, 1, 2, 3])]);
		});

		it("skips empty payloads", async () => {
			const char = createFakeCharacteristic(CHAR_UUID);
			const onData = vi.fn();

			await startNotifications(char, onData);
			char.emit([]);

			expect(onData).not.toHaveBeenCalled();
		});

		it("cleanup is idempotent and removes the listener", async () => {
			const char = createFakeCharacteristic(CHAR_UUID);
			const onData = vi.fn();

			const stop = await startNotifications(char, onData);
			await stop();
			await stop();
			char.emit([1, 2, 3]);

			expect(char.stopNotifications).toHaveBeenCalledTimes(1);
			expect(char.listenerCount()).toBe(0);
			expect(onData).not.toHaveBeenCalled();
		});

		it("logs instead of rejecting when stopping fails", async () => {
			const char = createFakeCharacteristic(CHAR_UUID, {
				stopError: new Error("GATT operation failed"),
			});
			const logger = { ...createNoOpLogger(), warn: vi.fn() };

			const stop = await startNotifications(char, vi.fn(), { logger });
			await expect(stop()).resolves.toBeUndefined();

			expect(logger.warn).toHaveBeenCalledWith(
				"Error stopping notifications:",
				"GATT operation failed",
			);
		});

		it("removes the listener when setup fails", async () => {
			const char = createFakeCharacteristic(CHAR_UUID, {
				startError: new Error("GATT error: not permitted"),
			});

			await expect(startNotifications(char, vi.fn())).rejects.toThrow(
				"not permitted",
			);
			expect(char.listenerCount()).toBe(0);
		});

		it("times out a hung setup", async () => {
			vi.useFakeTimers();
			const char = createFakeCharacteristic(CHAR_UUID, { startError: "hang" });

			const promise = startNotifications(char, vi.fn(), { timeoutMs: 2000 });
			const assertion = expect(promise).rejects.toThrow(
				"BLE notification setup timed out after 2000ms",
			);
			await vi.advanceTimersByTimeAsync(2000);
			await assertion;
			expect(char.listenerCount()).toBe(0);

			vi.useRealTimers();
		});
	});

	describe("withRetry", () => {
		beforeEach(() => {
			vi.useFakeTimers();
		});

		afterEach(() => {
			vi.useRealTimers();
		});

		it("returns result on first success", async () => {
			const operation = vi.fn().mockResolvedValue("success");
			await expect(withRetry(operation)).resolves.toBe("success");
			expect(operation).toHaveBeenCalledTimes(1);
		});

		it("retries transient failures with backoff", async () => {
			const operation = vi
				.fn()
				.mockRejectedValueOnce(new Error("GATT error 1"))
				.mockRejectedValueOnce(new Error("GATT error 2"))
				.mockResolvedValue("success");
			const onRetry = vi.fn();

			const resultPromise = withRetry(operation, {
				maxAttempts: 3,
				initialDelayMs: 100,
				jitter: false,
				onRetry,
			});

			await vi.advanceTimersByTimeAsync(0);
			await vi.advanceTimersByTimeAsync(100);
			await vi.advanceTimersByTimeAsync(200);

			await expect(resultPromise).resolves.toBe("success");
			expect(operation).toHaveBeenCalledTimes(3);
			expect(onRetry).toHaveBeenNthCalledWith(1, 1, 100, expect.any(Error));
			expect(onRetry).toHaveBeenNthCalledWith(2, 2, 200, expect.any(Error));
		});

		it("throws the last error after max attempts", async () => {
			vi.useRealTimers();
			const operation = vi.fn(async () => {
				throw new Error("GATT connection failed");
			});

			await expect(
				withRetry(operation, { maxAttempts: 3, initialDelayMs: 10, jitter: false }),
			).rejects.toThrow("GATT connection failed");
			expect(operation).toHaveBeenCalledTimes(3);
		});

		it("does not retry non-retryable errors and keeps their type", async () => {
			const operation = vi
				.fn()
				.mockRejectedValue(new Error("Device not found"));

			const promise = withRetry(operation, { maxAttempts: 3 });

			await expect(promise).rejects.toThrow("Device not found");
			expect(operation).toHaveBeenCalledTimes(1);
		});

		it("honors a custom isRetryable predicate", async () => {
			const myError = new Error("custom error");
			const operation = vi.fn().mockRejectedValue(myError);
			const isRetryable = vi.fn().mockReturnValue(false);

			await expect(
				withRetry(operation, { maxAttempts: 3, isRetryable }),
			).rejects.toBe(myError);
			expect(isRetryable).toHaveBeenCalledWith(myError);
		});

		it("caps the reported delay at maxDelayMs", async () => {
			const operation = vi
				.fn()
				.mockRejectedValueOnce(new Error("GATT operation failed 1"))
				.mockRejectedValueOnce(new Error("GATT operation failed 2"))
				.mockResolvedValue("success");
			const onRetry = vi.fn();

			const resultPromise = withRetry(operation, {
				maxAttempts: 3,
				initialDelayMs: 1000,
				maxDelayMs: 1500,
				jitter: false,
				onRetry,
			});

			await vi.advanceTimersByTimeAsync(0);
			await vi.advanceTimersByTimeAsync(1000);
			await vi.advanceTimersByTimeAsync(1500);
			await resultPromise;

			expect(onRetry).toHaveBeenNthCalledWith(1, 1, 1000, expect.any(Error));
			expect(onRetry).toHaveBeenNthCalledWith(2, 2, 1500, expect.any(Error));
		});

		it("rejects maxAttempts below one", async () => {
			await expect(withRetry(vi.fn(), { maxAttempts: 0 })).rejects.toThrow(
				RangeError,
			);
		});

		it("aborts immediately when signal is already aborted", async () => {
			const operation = vi.fn().mockResolvedValue("success");
			const controller = new AbortController();
			controller.abort();

			await expect(
				withRetry(operation, { signal: controller.signal }),
			).rejects.toThrow(AbortError);
			expect(operation).not.toHaveBeenCalled();
		});

		it("aborts during the backoff delay", async () => {
			vi.useRealTimers();
			const operation = vi
				.fn()
				.mockRejectedValueOnce(new Error("connection lost"))
				.mockResolvedValue("success");
			const controller = new AbortController();

			const promise = withRetry(operation, {
				signal: controller.signal,
				maxAttempts: 3,
				initialDelayMs: 200,
				jitter: false,
			});

			await new Promise((resolve) => setTimeout(resolve, 20));
			controller.abort();

			await expect(promise).rejects.toThrow(AbortError);
			expect(operation).toHaveBeenCalledTimes(1);
		});
	});

	describe("connectWithRetry", () => {
		it("passes the address and timeout to the adapter", async () => {
			const session = createFakeSession();
			const adapter = createFakeAdapter(async () => session);

			await expect(
				connectWithRetry(adapter, { address: "AA:BB", timeoutMs: 1000 }),
			).resolves.toBe(session);
			expect(adapter.connect).toHaveBeenCalledWith({
				address: "AA:BB",
				timeoutMs: 1000,
			});
		});

		it("retries connection errors", async () => {
			vi.useFakeTimers();
			const session = createFakeSession();
			const adapter = createFakeAdapter(async () => session);
			adapter.connect.mockRejectedValueOnce(
				new BLEConnectionError("AA:BB", "link lost"),
			);

			const promise = connectWithRetry(
				adapter,
				{ address: "AA:BB" },
				{ initialDelayMs: 50, jitter: false },
			);
			await vi.advanceTimersByTimeAsync(50);

			await expect(promise).resolves.toBe(session);
			expect(adapter.connect).toHaveBeenCalledTimes(2);
			vi.useRealTimers();
		});

		it("bounds each attempt by the connect timeout", async () => {
			vi.useFakeTimers();
			const adapter = createFakeAdapter(() => new Promise(() => {}));

			const promise = connectWithRetry(
				adapter,
				{ address: "AA:BB", timeoutMs: 100 },
				{ maxAttempts: 2, initialDelayMs: 10, jitter: false },
			);
			const assertion = expect(promise).rejects.toThrow(
				"BLE connect timed out after 100ms",
			);
			await vi.advanceTimersByTimeAsync(100);
			await vi.advanceTimersByTimeAsync(10);
			await vi.advanceTimersByTimeAsync(100);
			await assertion;

			expect(adapter.connect).toHaveBeenCalledTimes(2);
			vi.useRealTimers();
		});

		it("disconnects a session that arrives after its attempt timed out", async () => {
			vi.useFakeTimers();
			const late = createFakeSession();
			const session = createFakeSession();
			const adapter = createFakeAdapter(async () => session);
			adapter.connect.mockImplementationOnce(
				() => new Promise((resolve) => setTimeout(() => resolve(late), 150)),
			);

			const promise = connectWithRetry(
				adapter,
				{ address: "AA:BB", timeoutMs: 100 },
				{ initialDelayMs: 10, jitter: false },
				createNoOpLogger(),
			);
			await vi.advanceTimersByTimeAsync(110);

			await expect(promise).resolves.toBe(session);
			expect(late.disconnect).not.toHaveBeenCalled();

			await vi.advanceTimersByTimeAsync(40);
			expect(late.disconnect).toHaveBeenCalledTimes(1);
			expect(session.disconnect).not.toHaveBeenCalled();
			vi.useRealTimers();
		});

		it("disconnects a session that arrives after the caller aborted", async () => {
			vi.useFakeTimers();
			const late = createFakeSession();
			const adapter = createFakeAdapter(
				() => new Promise((resolve) => setTimeout(() => resolve(late), 150)),
			);
			const controller = new AbortController();

			const promise = connectWithRetry(
				adapter,
				{ address: "AA:BB" },
				{ signal: controller.signal },
				createNoOpLogger(),
			);
			const assertion = expect(promise).rejects.toBeInstanceOf(AbortError);
			await vi.advanceTimersByTimeAsync(50);
			controller.abort();
			await assertion;

			await vi.advanceTimersByTimeAsync(100);
			expect(late.disconnect).toHaveBeenCalledTimes(1);
			vi.useRealTimers();
		});

		it("logs a failed disconnect of a late session", async () => {
			vi.useFakeTimers();
			const late = createFakeSession({ disconnectError: new Error("already gone") });
			const adapter = createFakeAdapter(
				() => new Promise((resolve) => setTimeout(() => resolve(late), 150)),
			);
			const logger = { ...createNoOpLogger(), warn: vi.fn() };

			const promise = connectWithRetry(
				adapter,
				{ address: "AA:BB", timeoutMs: 100 },
				{ maxAttempts: 1 },
				logger,
			);
			const assertion = expect(promise).rejects.toThrow("BLE connect timed out after 100ms");
			await vi.advanceTimersByTimeAsync(100);
			await assertion;

			await vi.advanceTimersByTimeAsync(50);
			expect(logger.warn).toHaveBeenCalledWith(
				"AA:BB: error disconnecting late session:",
				"already gone",
			);
			vi.useRealTimers();
		});
	});
});
