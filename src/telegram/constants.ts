/**
 * Telegram limits and relay timing defaults.
 */

/**
 * Bot API hard character limit per message.
 *
 * @see https://core.telegram.org/bots/api#sendmessage
 */
export const TELEGRAM_API_CHAR_LIMIT = 4096;

/** Default size of each outbound reply chunk. Leaves headroom under the API limit. */
export const DEFAULT_CHUNK_SIZE = 4000;

/** Appended to the first chunk when a reply is split. */
export const CONTINUATION_MARKER = "\n\n[continued...]";

/** Server-side long-poll wait for getUpdates, in seconds. */
export const LONG_POLL_TIMEOUT_SECONDS = 30;

/** Client-side timeout for getUpdates. Must exceed the long-poll wait. */
export const FETCH_TIMEOUT_MS = 40_000;

/** Fixed wait after a failed getUpdates before polling again. */
export const FETCH_RETRY_DELAY_MS = 5_000;

/** Client-side timeout for sendMessage. */
export const SEND_TIMEOUT_MS = 10_000;

/** Pause between consecutive chunks of one reply. */
export const CHUNK_DELAY_MS = 100;
