/**
 * Fixed user-facing replies.
 */

export const START_MESSAGE =
	"Hi! I pass your messages to a local Ollama model.\n\n" +
	"Just send me a message and I will forward it to the model and reply with what it generates.\n\n" +
	"Use /help for more information.";

export const HELP_MESSAGE =
	"Available commands:\n\n" +
	"/start - welcome message\n" +
	"/help - this help\n\n" +
	"Any other message is sent to Ollama to generate a reply.";

export const RATE_LIMITED_MESSAGE = "Too many requests. Please wait a moment and try again.";

export const PROCESSING_MESSAGE = "Processing your request...";

export const GENERATION_FAILED_MESSAGE =
	"Something went wrong while processing your request. Please try again later.";

export const EMPTY_RESPONSE_MESSAGE = "The model returned an empty response.";

export function promptTooLongMessage(maxPromptLength: number): string {
	return `Your message is too long. Maximum length: ${maxPromptLength} characters.`;
}
