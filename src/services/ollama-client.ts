import { z } from "zod";

import { DEFAULT_OLLAMA_MODEL, DEFAULT_OLLAMA_URL } from "../config/settings.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { TimeoutError, fetchWithTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "ollama-client" });

const DEFAULT_TIMEOUT_MS = 480_000;
const MAX_ERROR_BODY_LENGTH = 200;

/**
 * Text generation service the dispatcher forwards prompts to.
 */
export interface GenerationBackend {
	generate(prompt: string): Promise<string>;
}

export class BackendError extends Error {
	constructor(
		message: string,
		public readonly status?: number,
	) {
		super(message);
		this.name = "BackendError";
	}
}

const GenerateResponseSchema = z.object({
	response: z.string(),
	done: z.boolean(),
	error: z.string().optional(),
});

const TagsResponseSchema = z.object({
	models: z.array(z.object({ name: z.string() })).default([]),
});

export type OllamaClientOptions = {
	baseUrl?: string;
	model?: string;
	timeoutMs?: number;
	fetchImpl?: typeof fetch;
};

function truncate(text: string, max: number): string {
	return text.length > max ? `${text.slice(0, max)}...` : text;
}

function safeJsonParse(raw: string): unknown {
	try {
		return JSON.parse(raw);
	} catch {
		return undefined;
	}
}

export class OllamaClient implements GenerationBackend {
	readonly baseUrl: string;
	readonly model: string;
	private readonly timeoutMs: number;
	private readonly fetchImpl: typeof fetch;

	constructor(options: OllamaClientOptions = {}) {
		this.baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, "");
		this.model = options.model ?? DEFAULT_OLLAMA_MODEL;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.fetchImpl = options.fetchImpl ?? fetch;
	}

	/**
	 * Run one non-streaming generation and return the response text.
	 */
	async generate(prompt: string): Promise<string> {
		const started = Date.now();
		const raw = await this.request("/api/generate", {
			method: "POST",
			headers: { "Content-Type": "application/json" },
			body: JSON.stringify({ model: this.model, prompt, stream: false }),
		});

		const parsed = GenerateResponseSchema.safeParse(safeJsonParse(raw));
		if (!parsed.success) {
			throw new BackendError(`malformed generate response: ${truncate(raw, MAX_ERROR_BODY_LENGTH)}`);
		}

		const body = parsed.data;
		if (body.error) {
			throw new BackendError(`generation failed: ${body.error}`);
		}
		if (!body.done) {
			throw new BackendError("incomplete generation");
		}

		logger.debug(
			{
				model: this.model,
				promptLength: prompt.length,
				responseLength: body.response.length,
				durationMs: Date.now() - started,
			},
			"generation complete",
		);
		return body.response;
	}

	/**
	 * Names of the models installed on the server.
	 */
	async listModels(): Promise<string[]> {
		const raw = await this.request("/api/tags", { method: "GET" });
		const parsed = TagsResponseSchema.safeParse(safeJsonParse(raw));
		if (!parsed.success) {
			throw new BackendError(`malformed tags response: ${truncate(raw, MAX_ERROR_BODY_LENGTH)}`);
		}
		return parsed.data.models.map((model) => model.name);
	}

	private async request(path: string, init: RequestInit): Promise<string> {
		const url = `${this.baseUrl}${path}`;

		let response: Response;
		try {
			response = await fetchWithTimeout(url, init, this.timeoutMs, this.fetchImpl);
		} catch (err) {
			if (err instanceof TimeoutError) {
				throw new BackendError(`request to ${path} timed out after ${this.timeoutMs}ms`);
			}
			throw new BackendError(`request to ${path} failed: ${formatErrorSafe(err)}`);
		}

		const raw = await response.text();
		if (!response.ok) {
			throw new BackendError(
				`${path} returned ${response.status}: ${truncate(raw, MAX_ERROR_BODY_LENGTH) || response.statusText}`,
				response.status,
			);
		}
		return raw;
	}
}
