// src/core/llm.ts
import { z } from 'zod'
import { GenerationError, MalformedResponseError } from '../types/errors.js'
import { logger } from '../util/logger.js'
import { trackLLMCall } from '../util/metrics.js'
import {
	ProviderHttpError,
	ProviderNetworkError,
	ProviderPayloadError,
	isTransientStatus,
	postJson,
} from './providerHttp.js'
import { tokenTracker, type TokenTracker } from './tokenTracking.js'

export type ChatPrompt = { system: string; user: string }

export type ResponseFormat = 'text' | 'json'

export type GenerateOptions = {
	model?: string
	temperature?: number
	maxTokens?: number
	format?: ResponseFormat
	timeoutMs?: number
	signal?: AbortSignal
	correlationId?: string
}

export type GenerationResult = {
	text: string
	provider: string
	model: string
	format: ResponseFormat
	usage?: { promptTokens: number; completionTokens: number }
}

export type GenerationFailure = GenerationError | MalformedResponseError

export type GenerationOutcome =
	| { ok: true; result: GenerationResult }
	| { ok: false; error: GenerationFailure }

/** A single logical generation capability; retries are the caller's business. */
export interface GenerationClient {
	generate(prompt: ChatPrompt, options?: GenerateOptions): Promise<GenerationOutcome>
}

export interface GenerationProvider extends GenerationClient {
	readonly name: string
}

const DEFAULT_TEMPERATURE = 0.4
const DEFAULT_MAX_TOKENS = 1200

// Pulls a JSON object out of text, tolerating prose or fences around it
export function extractJsonObject(text: string): unknown {
	try {
		return JSON.parse(text)
	} catch {
		const start = text.indexOf('{')
		const end = text.lastIndexOf('}')
		if (start >= 0 && end > start) {
			try {
				return JSON.parse(text.slice(start, end + 1))
			} catch {
				return undefined
			}
		}
		return undefined
	}
}

export function parseStructured<T>(
	result: GenerationResult,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { ok: true; value: T } | { ok: false; error: MalformedResponseError } {
	const json = extractJsonObject(result.text)
	if (json === undefined) {
		return {
			ok: false,
			error: new MalformedResponseError('Model did not return valid JSON', {
				provider: result.provider,
			}),
		}
	}
	const parsed = schema.safeParse(json)
	if (!parsed.success) {
		return {
			ok: false,
			error: new MalformedResponseError(
				'LLM JSON does not match schema: ' + parsed.error.message,
				{ provider: result.provider }
			),
		}
	}
	return { ok: true, value: parsed.data }
}

export function toGenerationFailure(provider: string, error: unknown): GenerationFailure {
	if (error instanceof GenerationError || error instanceof MalformedResponseError) {
		return error
	}
	if (error instanceof ProviderHttpError) {
		return new GenerationError(error.message, `http_${error.status}`, isTransientStatus(error.status), {
			provider,
		})
	}
	if (error instanceof ProviderNetworkError) {
		return new GenerationError(error.message, error.timedOut ? 'timeout' : 'network', true, {
			provider,
		})
	}
	if (error instanceof ProviderPayloadError) {
		return new MalformedResponseError(error.message, { provider })
	}
	const message = error instanceof Error ? error.message : String(error)
	return new GenerationError(message, 'unknown', false, { provider })
}

type RawCompletion = {
	text: string | null
	model: string
	usage?: { promptTokens: number; completionTokens: number }
}

/**
 * Shared envelope for vendor adapters: metrics, token accounting, error
 * mapping and the JSON-format guarantee.
 */
abstract class BaseProvider implements GenerationProvider {
	abstract readonly name: string

	constructor(
		protected readonly apiKey: string,
		protected readonly defaultModel: string,
		private readonly tracker: TokenTracker = tokenTracker
	) {}

	protected abstract complete(
		prompt: ChatPrompt,
		model: string,
		options: GenerateOptions
	): Promise<RawCompletion>

	async generate(prompt: ChatPrompt, options: GenerateOptions = {}): Promise<GenerationOutcome> {
		const model = options.model ?? this.defaultModel
		const format = options.format ?? 'text'

		if (!this.apiKey) {
			return {
				ok: false,
				error: new GenerationError(`${this.name} API key is not set`, 'missing_api_key', false, {
					provider: this.name,
				}),
			}
		}

		let raw: RawCompletion
		try {
			raw = await trackLLMCall(this.name, model, this.complete(prompt, model, options))
		} catch (error) {
			const failure = toGenerationFailure(this.name, error)
			logger.warn(
				{ err: failure, provider: this.name, model, correlationId: options.correlationId },
				'Generation call failed'
			)
			return { ok: false, error: failure }
		}

		if (raw.usage) {
			this.tracker.track({
				provider: this.name,
				model: raw.model,
				promptTokens: raw.usage.promptTokens,
				completionTokens: raw.usage.completionTokens,
				correlationId: options.correlationId,
			})
		}

		const text = raw.text?.trim() ?? ''
		if (!text) {
			return {
				ok: false,
				error: new MalformedResponseError(`${this.name}: empty response`, { provider: this.name }),
			}
		}
		if (format === 'json' && extractJsonObject(text) === undefined) {
			return {
				ok: false,
				error: new MalformedResponseError(`${this.name}: JSON requested, got text`, {
					provider: this.name,
				}),
			}
		}

		return {
			ok: true,
			result: { text, provider: this.name, model: raw.model, format, usage: raw.usage },
		}
	}
}

// ---- OpenAI-compatible chat (OpenAI, DeepSeek) ----
const ChatCompletionSchema = z.object({
	model: z.string().optional(),
	choices: z
		.array(z.object({ message: z.object({ content: z.string().nullable() }) }))
		.default([]),
	usage: z
		.object({ prompt_tokens: z.number(), completion_tokens: z.number() })
		.optional(),
})

export class OpenAIChatProvider extends BaseProvider {
	constructor(
		readonly name: string,
		apiKey: string,
		defaultModel: string,
		private readonly baseUrl = 'https://api.openai.com/v1',
		tracker?: TokenTracker
	) {
		super(apiKey, defaultModel, tracker)
	}

	protected async complete(
		prompt: ChatPrompt,
		model: string,
		options: GenerateOptions
	): Promise<RawCompletion> {
		const body = await postJson(`${this.baseUrl}/chat/completions`, {
			provider: this.name,
			headers: { Authorization: `Bearer ${this.apiKey}` },
			timeoutMs: options.timeoutMs,
			signal: options.signal,
			body: {
				model,
				messages: [
					{ role: 'system', content: prompt.system },
					{ role: 'user', content: prompt.user },
				],
				temperature: options.temperature ?? DEFAULT_TEMPERATURE,
				max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
				...(options.format === 'json' ? { response_format: { type: 'json_object' } } : {}),
				stream: false,
			},
		})

		const parsed = ChatCompletionSchema.safeParse(body)
		if (!parsed.success) {
			throw new ProviderPayloadError(this.name, 'unexpected chat completion payload')
		}
		const { data } = parsed
		return {
			text: data.choices[0]?.message.content ?? null,
			model: data.model ?? model,
			usage: data.usage && {
				promptTokens: data.usage.prompt_tokens,
				completionTokens: data.usage.completion_tokens,
			},
		}
	}
}

// ---- Anthropic messages ----
const AnthropicMessageSchema = z.object({
	model: z.string().optional(),
	content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
	usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
})

export class AnthropicProvider extends BaseProvider {
	readonly name = 'anthropic'

	constructor(
		apiKey: string,
		defaultModel: string,
		private readonly baseUrl = 'https://api.anthropic.com/v1',
		tracker?: TokenTracker
	) {
		super(apiKey, defaultModel, tracker)
	}

	protected async complete(
		prompt: ChatPrompt,
		model: string,
		options: GenerateOptions
	): Promise<RawCompletion> {
		// no native JSON mode: the instruction rides on the system prompt
		const system =
			options.format === 'json'
				? `${prompt.system}\n\nRespond with a single JSON object and nothing else.`
				: prompt.system

		const body = await postJson(`${this.baseUrl}/messages`, {
			provider: this.name,
			headers: { 'x-api-key': this.apiKey, 'anthropic-version': '2023-06-01' },
			timeoutMs: options.timeoutMs,
			signal: options.signal,
			body: {
				model,
				system,
				messages: [{ role: 'user', content: prompt.user }],
				temperature: options.temperature ?? DEFAULT_TEMPERATURE,
				max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
			},
		})

		const parsed = AnthropicMessageSchema.safeParse(body)
		if (!parsed.success) {
			throw new ProviderPayloadError(this.name, 'unexpected messages payload')
		}
		const { data } = parsed
		const text = data.content
			.filter(block => block.type === 'text')
			.map(block => block.text ?? '')
			.join('')
		return {
			text,
			model: data.model ?? model,
			usage: data.usage && {
				promptTokens: data.usage.input_tokens,
				completionTokens: data.usage.output_tokens,
			},
		}
	}
}

/**
 * Walks providers in order. Moves on only when the failure is retryable
 * (rate limit, outage, timeout, malformed output); anything else is final.
 */
export class FailoverGenerationClient implements GenerationClient {
	constructor(
		private readonly providers: GenerationProvider[],
		private readonly tracker: TokenTracker = tokenTracker
	) {}

	async generate(prompt: ChatPrompt, options: GenerateOptions = {}): Promise<GenerationOutcome> {
		if (this.tracker.getBudgetStatus().isOverBudget) {
			return {
				ok: false,
				error: new GenerationError('Daily generation budget exhausted', 'budget_exceeded', false),
			}
		}

		let last: GenerationOutcome = {
			ok: false,
			error: new GenerationError('No generation provider configured', 'no_provider', false),
		}

		for (const provider of this.providers) {
			// a model name belongs to one vendor, so it is not forwarded on failover
			const outcome = await provider.generate(
				prompt,
				provider === this.providers[0] ? options : { ...options, model: undefined }
			)
			if (outcome.ok) return outcome

			last = outcome
			if (!outcome.error.retryable || options.signal?.aborted) break
			logger.info(
				{ provider: provider.name, code: outcome.error.code, correlationId: options.correlationId },
				'Falling over to next generation provider'
			)
		}
		return last
	}
}
