import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { sendChunked } from "../../src/commands/send.js";
import type { ChatTransport } from "../../src/telegram/types.js";

describe("sendChunked", () => {
	it("sends short text as one message", async () => {
		const sendText = vi.fn<ChatTransport["sendText"]>().mockResolvedValue(undefined);

		const count = await sendChunked({ fetchEvents: vi.fn(), sendText }, 42, "hello", 4000, 0);

		expect(count).toBe(1);
		expect(sendText).toHaveBeenCalledWith(42, "hello");
	});

	it("splits long text without a continuation marker", async () => {
		const sendText = vi.fn<ChatTransport["sendText"]>().mockResolvedValue(undefined);

		const count = await sendChunked({ fetchEvents: vi.fn(), sendText }, 42, "x".repeat(4500), 4000, 0);

		expect(count).toBe(2);
		expect(sendText.mock.calls.map(([, text]) => text.length)).toEqual([4000, 500]);
	});
});
