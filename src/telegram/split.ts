/**
 * Length-aware splitting of outbound text into Telegram-sized chunks.
 */

import { CONTINUATION_MARKER, DEFAULT_CHUNK_SIZE } from "./constants.js";

/** How far back from the limit to look for a line break. */
const NEWLINE_SEARCH_WINDOW = 100;
/** How far back from the limit to look for a space. */
const SPACE_SEARCH_WINDOW = 50;

function normalizeLimit(maxLength: number): number {
	// A non-positive limit would never make progress
	if (!Number.isFinite(maxLength) || maxLength <= 0) return DEFAULT_CHUNK_SIZE;
	return Math.floor(maxLength);
}

function isHighSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Position to cut text at (exclusive), for text longer than maxLength.
 * The break character stays at the end of the chunk.
 */
function findCutPoint(text: string, maxLength: number): number {
	const newlineFloor = Math.max(0, maxLength - NEWLINE_SEARCH_WINDOW);
	for (let i = maxLength; i > newlineFloor; i--) {
		if (text[i - 1] === "\n") return i;
	}

	const spaceFloor = Math.max(0, maxLength - SPACE_SEARCH_WINDOW);
	for (let i = maxLength; i > spaceFloor; i--) {
		if (text[i - 1] === " ") return i;
	}

	// Hard cut inside a token; never between the halves of a surrogate pair
	if (maxLength > 1 && isHighSurrogate(text.charCodeAt(maxLength - 1))) {
		return maxLength - 1;
	}
	return maxLength;
}

function skipLeadingBreaks(text: string): string {
	return text.replace(/^[ \n]+/, "");
}

/**
 * Split text into chunks of at most maxLength characters, preferring to break
 * after a newline, then after a space, and cutting hard only when neither is
 * close to the limit. Spaces and newlines at the start of each following chunk
 * are dropped.
 *
 * @param maxLength - Values <= 0 fall back to 4000.
 */
export function splitMessage(text: string, maxLength: number = DEFAULT_CHUNK_SIZE): string[] {
	const limit = normalizeLimit(maxLength);
	if (text.length <= limit) {
		return [text];
	}

	const chunks: string[] = [];
	let remaining = text;

	while (remaining.length > limit) {
		const cut = findCutPoint(remaining, limit);
		chunks.push(remaining.slice(0, cut));
		remaining = skipLeadingBreaks(remaining.slice(cut));
	}

	if (remaining.length > 0) {
		chunks.push(remaining);
	}

	return chunks;
}

/**
 * Split a reply for sending. When it takes more than one chunk, the first
 * chunk ends with the continuation marker, and room for the marker is
 * reserved so that chunk still fits in maxLength.
 */
export function segmentReply(
	text: string,
	maxLength: number = DEFAULT_CHUNK_SIZE,
	marker: string = CONTINUATION_MARKER,
): string[] {
	const limit = normalizeLimit(maxLength);
	if (text.length <= limit) {
		return [text];
	}

	const firstLimit = limit - marker.length;
	if (firstLimit <= 0) {
		return splitMessage(text, limit);
	}

	const cut = findCutPoint(text, firstLimit);
	const first = text.slice(0, cut);
	const rest = skipLeadingBreaks(text.slice(cut));
	if (!rest) {
		return [first];
	}

	return [first + marker, ...splitMessage(rest, limit)];
}
