import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const logger = vi.hoisted(() => ({
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
	debug: vi.fn(),
}));

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => logger,
}));

import { IntakeLoop } from "../../src/telegram/intake.js";
import type { ChatTransport, InboundEvent } from "../../src/telegram/types.js";

function createTransport() {
	const fetchEvents = vi.fn<ChatTransport["fetchEvents"]>().mockResolvedValue([]);
	const sendText = vi.fn<ChatTransport["sendText"]>().mockResolvedValue(undefined);
	return { fetchEvents, sendText };
}

function event(sequenceId: number, text = "hi"): InboundEvent {
	return {
		sequenceId,
		message: {
			messageId: sequenceId,
			senderIdentity: 1,
			chatDestination: 1,
			rawText: text,
			receivedAt: 0,
			chatType: "private",
		},
	};
}

describe("IntakeLoop", () => {
	beforeEach(() => {
		vi.clearAllMocks();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("advances the watermark to the highest sequence id in a batch", async () => {
		const seen: number[] = [];
		const loop = new IntakeLoop({
			transport: createTransport(),
			onEvent: async (e) => {
				seen.push(e.sequenceId);
			},
		});

		await loop.processBatch([event(3), event(1), event(4)]);

		expect(seen).toEqual([3, 1, 4]);
		expect(loop.getWatermark()).toBe(4);
		expect(loop.nextOffset()).toBe(5);
	});

	it("advances the watermark before dispatching each event", async () => {
		const watermarks: number[] = [];
		const loop = new IntakeLoop({
			transport: createTransport(),
			onEvent: async () => {
				watermarks.push(loop.getWatermark());
			},
		});

		await loop.processBatch([event(10), event(11)]);

		expect(watermarks).toEqual([10, 11]);
	});

	it("advances past updates that carry no message", async () => {
		const loop = new IntakeLoop({ transport: createTransport(), onEvent: vi.fn() });

		await loop.processBatch([{ sequenceId: 8 }]);

		expect(loop.nextOffset()).toBe(9);
	});

	it("keeps processing the batch when a dispatch fails", async () => {
		const onEvent = vi
			.fn<(e: InboundEvent) => Promise<void>>()
			.mockRejectedValueOnce(new Error("boom"))
			.mockResolvedValue(undefined);
		const loop = new IntakeLoop({ transport: createTransport(), onEvent });

		await loop.processBatch([event(1), event(2)]);

		expect(onEvent).toHaveBeenCalledTimes(2);
		expect(loop.getWatermark()).toBe(2);
		expect(logger.error).toHaveBeenCalledTimes(1);
	});

	it("polls from the next offset with the long-poll settings", async () => {
		const transport = createTransport();
		transport.fetchEvents.mockResolvedValue([event(21)]);
		const loop = new IntakeLoop({
			transport,
			onEvent: vi.fn(),
			initialWatermark: 20,
		});

		expect(await loop.pollOnce()).toBe(1);

		expect(transport.fetchEvents).toHaveBeenCalledWith(21, { waitSeconds: 30, timeoutMs: 40_000 });
		expect(loop.getWatermark()).toBe(21);
	});

	it("rejects a fetch timeout that does not outlast the long-poll wait", () => {
		expect(
			() =>
				new IntakeLoop({
					transport: createTransport(),
					onEvent: vi.fn(),
					pollTimeoutSeconds: 30,
					fetchTimeoutMs: 30_000,
				}),
		).toThrow("must exceed the long-poll wait");
	});

	it("backs off after a fetch failure without moving the watermark", async () => {
		const controller = new AbortController();
		const transport = createTransport();
		transport.fetchEvents
			.mockRejectedValueOnce(new Error("fetch failed"))
			.mockResolvedValueOnce([event(7)]);
		const loop = new IntakeLoop({
			transport,
			onEvent: async () => {
				controller.abort();
			},
			retryDelayMs: 1,
		});

		await loop.run(controller.signal);

		expect(transport.fetchEvents).toHaveBeenCalledTimes(2);
		expect(transport.fetchEvents.mock.calls[0][0]).toBe(1);
		expect(transport.fetchEvents.mock.calls[1][0]).toBe(1);
		expect(loop.getWatermark()).toBe(7);
		expect(logger.error).toHaveBeenCalledTimes(1);
	});

	it("waits the default five seconds before fetching again", async () => {
		vi.useFakeTimers();
		const controller = new AbortController();
		const transport = createTransport();
		transport.fetchEvents
			.mockRejectedValueOnce(new Error("fetch failed"))
			.mockResolvedValueOnce([event(7)]);
		const loop = new IntakeLoop({
			transport,
			onEvent: async () => {
				controller.abort();
			},
		});

		const running = loop.run(controller.signal);

		await vi.advanceTimersByTimeAsync(4_999);
		expect(transport.fetchEvents).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(1);
		await running;
		expect(transport.fetchEvents).toHaveBeenCalledTimes(2);
	});

	it("stops during the backoff wait when aborted", async () => {
		const controller = new AbortController();
		const transport = createTransport();
		transport.fetchEvents.mockImplementation(async () => {
			controller.abort();
			throw new Error("fetch failed");
		});
		const loop = new IntakeLoop({ transport, onEvent: vi.fn(), retryDelayMs: 60_000 });

		await loop.run(controller.signal);

		expect(transport.fetchEvents).toHaveBeenCalledTimes(1);
	});

	it("does not poll once the signal has fired", async () => {
		const controller = new AbortController();
		controller.abort();
		const transport = createTransport();
		const loop = new IntakeLoop({ transport, onEvent: vi.fn() });

		await loop.run(controller.signal);

		expect(transport.fetchEvents).not.toHaveBeenCalled();
	});
});
