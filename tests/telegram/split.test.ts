import { describe, expect, it } from "vitest";

import { CONTINUATION_MARKER } from "../../src/telegram/constants.js";
import { segmentReply, splitMessage } from "../../src/telegram/split.js";

describe("splitMessage", () => {
	it("returns short text unchanged", () => {
		expect(splitMessage("short", 100)).toEqual(["short"]);
	});

	it("returns text exactly at the limit as one chunk", () => {
		const text = "x".repeat(4000);
		expect(splitMessage(text, 4000)).toEqual([text]);
	});

	it("hard-cuts text without break characters", () => {
		const chunks = splitMessage("a".repeat(4500), 4000);

		expect(chunks).toHaveLength(2);
		expect(chunks[0]).toHaveLength(4000);
		expect(chunks[1]).toHaveLength(500);
	});

	it("prefers a newline close to the limit", () => {
		const text = `${"a".repeat(3950)}\n${"b".repeat(200)}`;

		expect(splitMessage(text, 4000)).toEqual([`${"a".repeat(3950)}\n`, "b".repeat(200)]);
	});

	it("falls back to a space when no newline is within reach", () => {
		const text = `${"a".repeat(3800)}\n${"c".repeat(180)} ${"d".repeat(500)}`;

		const chunks = splitMessage(text, 4000);

		expect(chunks).toEqual([text.slice(0, 3982), "d".repeat(500)]);
		expect(chunks[0].endsWith(" ")).toBe(true);
	});

	it("drops leading whitespace from the next chunk", () => {
		const text = `${"a".repeat(3995)}\n   ${"b".repeat(50)}`;

		expect(splitMessage(text, 4000)).toEqual([`${"a".repeat(3995)}\n`, "b".repeat(50)]);
	});

	it("never splits a surrogate pair", () => {
		const text = `${"a".repeat(3999)}😀${"a".repeat(10)}`;

		expect(splitMessage(text, 4000)).toEqual(["a".repeat(3999), `😀${"a".repeat(10)}`]);
	});

	it("falls back to 4000 for a non-positive limit", () => {
		const chunks = splitMessage("x".repeat(4001), 0);

		expect(chunks.map((chunk) => chunk.length)).toEqual([4000, 1]);
	});

	it("keeps every chunk within the limit", () => {
		const words = Array.from({ length: 3000 }, (_, i) => `word${i}`).join(" ");

		const chunks = splitMessage(words, 500);

		expect(chunks.length).toBeGreaterThan(1);
		for (const chunk of chunks) {
			expect(chunk.length).toBeLessThanOrEqual(500);
		}
		expect(chunks.join("").replace(/ /g, "")).toBe(words.replace(/ /g, ""));
	});
});

describe("segmentReply", () => {
	it("leaves a reply that fits untouched", () => {
		expect(segmentReply("hello", 4000)).toEqual(["hello"]);
	});

	it("marks the first chunk and keeps it within the limit", () => {
		const chunks = segmentReply("r".repeat(7000), 4000);

		expect(chunks).toEqual([`${"r".repeat(3984)}${CONTINUATION_MARKER}`, "r".repeat(3016)]);
		expect(chunks[0]).toHaveLength(4000);
	});

	it("only marks the first chunk", () => {
		const chunks = segmentReply("r".repeat(9000), 4000);

		expect(chunks.map((chunk) => chunk.length)).toEqual([4000, 4000, 1016]);
		expect(chunks.filter((chunk) => chunk.endsWith(CONTINUATION_MARKER))).toHaveLength(1);
	});

	it("uses a custom marker", () => {
		expect(segmentReply("abcdefghij", 8, "…")).toEqual(["abcdefg…", "hij"]);
	});

	it("falls back to plain splitting when the marker does not fit", () => {
		expect(segmentReply("abcdefghij", 4, "[more]")).toEqual(["abcd", "efgh", "ij"]);
	});
});
