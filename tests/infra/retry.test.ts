import { HttpError } from "grammy";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/utils.js", async (importOriginal) => ({
	...(await importOriginal<typeof import("../../src/utils.js")>()),
	sleep: vi.fn().mockResolvedValue(undefined),
}));

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { isTransientNetworkError } from "../../src/infra/network-errors.js";
import { retryAsync } from "../../src/infra/retry.js";
import { BackendError } from "../../src/services/ollama-client.js";
import { TransportError } from "../../src/telegram/transport.js";
import { sleep } from "../../src/utils.js";

const isTransientSend = (err: unknown) => err instanceof TransportError && err.transient;

describe("infra/retry", () => {
	const mockSleep = vi.mocked(sleep);

	beforeEach(() => {
		mockSleep.mockClear();
	});

	it("retries a transient send failure after a fixed delay", async () => {
		const op = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(
				new TransportError("sendMessage failed (502): Bad Gateway", "sendMessage", true, 502),
			)
			.mockRejectedValueOnce(
				new TransportError("sendMessage failed: fetch failed", "sendMessage", true),
			)
			.mockResolvedValue("sent");

		await expect(retryAsync(op, { shouldRetry: isTransientSend })).resolves.toBe("sent");

		expect(op).toHaveBeenCalledTimes(3);
		expect(mockSleep.mock.calls).toEqual([[1000], [1000]]);
	});

	it("rethrows a permanent send failure without waiting", async () => {
		const err = new TransportError(
			"sendMessage failed (400): Bad Request: chat not found",
			"sendMessage",
			false,
			400,
		);
		const op = vi.fn<() => Promise<void>>().mockRejectedValue(err);

		await expect(retryAsync(op, { maxAttempts: 5, shouldRetry: isTransientSend })).rejects.toBe(err);

		expect(op).toHaveBeenCalledTimes(1);
		expect(mockSleep).not.toHaveBeenCalled();
	});

	it("retries a grammy network failure classified as transient", async () => {
		const op = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(
				new HttpError("Network request for 'sendMessage' failed!", new TypeError("fetch failed")),
			)
			.mockResolvedValue("sent");

		await expect(retryAsync(op, { shouldRetry: isTransientNetworkError })).resolves.toBe("sent");

		expect(op).toHaveBeenCalledTimes(2);
	});

	it("rethrows the last error once attempts run out", async () => {
		const err = new BackendError("/api/tags returned 503: loading", 503);
		const op = vi.fn<() => Promise<string[]>>().mockRejectedValue(err);

		await expect(retryAsync(op, { maxAttempts: 2, delayMs: 250 })).rejects.toBe(err);

		expect(op).toHaveBeenCalledTimes(2);
		expect(mockSleep.mock.calls).toEqual([[250]]);
	});

	it("reports each retry with the attempt that failed", async () => {
		const err = new BackendError("request to /api/tags failed: TypeError: fetch failed");
		const onRetry = vi.fn();
		const op = vi.fn<() => Promise<string>>().mockRejectedValueOnce(err).mockResolvedValue("ok");

		await retryAsync(op, { maxAttempts: 2, delayMs: 250, onRetry });

		expect(onRetry).toHaveBeenCalledTimes(1);
		expect(onRetry).toHaveBeenCalledWith(err, { attempt: 1, maxAttempts: 2, delayMs: 250 });
	});

	it("makes one attempt when maxAttempts is below one", async () => {
		const err = new Error("boom");
		const op = vi.fn<() => Promise<void>>().mockRejectedValue(err);

		await expect(retryAsync(op, { maxAttempts: 0 })).rejects.toBe(err);

		expect(op).toHaveBeenCalledTimes(1);
	});

	it("does not sleep when the delay is zero", async () => {
		const op = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(new Error("boom"))
			.mockResolvedValue("ok");

		await expect(retryAsync(op, { delayMs: 0 })).resolves.toBe("ok");

		expect(mockSleep).not.toHaveBeenCalled();
	});
});
