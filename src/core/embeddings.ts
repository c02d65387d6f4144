// src/core/embeddings.ts
import { z } from 'zod'
import { EmbeddingUnavailableError } from '../types/errors.js'
import { sha256 } from '../util/hash.js'
import { logger } from '../util/logger.js'
import { trackEmbeddingCall } from '../util/metrics.js'
import {
	ProviderPayloadError,
	delay,
	isTransient,
	postJson,
} from './providerHttp.js'

export type Vector = number[]

/** What the rest of the system depends on. */
export interface EmbeddingClient {
	embed(text: string): Promise<Vector>
	embedBatch(texts: string[]): Promise<Vector[]>
}

/** One vendor's transport. No retries, no caching. */
export interface EmbeddingProvider {
	readonly name: string
	embedTexts(texts: string[]): Promise<Vector[]>
}

const EmbeddingResponseSchema = z.object({
	data: z
		.array(
			z.object({
				embedding: z.array(z.number()),
				index: z.number().int().nonnegative(),
			})
		)
		.min(1),
})

function toVectors(provider: string, body: unknown, expected: number): Vector[] {
	const parsed = EmbeddingResponseSchema.safeParse(body)
	if (!parsed.success) {
		throw new ProviderPayloadError(provider, 'unexpected embeddings payload')
	}
	const vectors = [...parsed.data.data]
		.sort((a, b) => a.index - b.index)
		.map(item => item.embedding)
	if (vectors.length !== expected) {
		throw new ProviderPayloadError(
			provider,
			`expected ${expected} embeddings, got ${vectors.length}`
		)
	}
	return vectors
}

// ---- Voyage ----
export class VoyageEmbeddingProvider implements EmbeddingProvider {
	readonly name = 'voyage'

	constructor(
		private readonly apiKey: string,
		private readonly model = 'voyage-3',
		private readonly baseUrl = 'https://api.voyageai.com/v1'
	) {}

	async embedTexts(texts: string[]): Promise<Vector[]> {
		if (!this.apiKey) {
			throw new EmbeddingUnavailableError('VOYAGE_API_KEY is not set')
		}
		const body = await postJson(`${this.baseUrl}/embeddings`, {
			provider: this.name,
			headers: { Authorization: `Bearer ${this.apiKey}` },
			body: { input: texts, model: this.model, input_type: 'document' },
		})
		return toVectors(this.name, body, texts.length)
	}
}

// ---- OpenAI ----
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
	readonly name = 'openai'

	constructor(
		private readonly apiKey: string,
		private readonly model = 'text-embedding-3-small',
		private readonly baseUrl = 'https://api.openai.com/v1'
	) {}

	async embedTexts(texts: string[]): Promise<Vector[]> {
		if (!this.apiKey) {
			throw new EmbeddingUnavailableError('OPENAI_API_KEY is not set')
		}
		const body = await postJson(`${this.baseUrl}/embeddings`, {
			provider: this.name,
			headers: { Authorization: `Bearer ${this.apiKey}` },
			body: { input: texts, model: this.model },
		})
		return toVectors(this.name, body, texts.length)
	}
}

export type RetryPolicy = {
	maxAttempts: number
	baseDelayMs: number
	sleep?: (ms: number) => Promise<void>
}

/**
 * Retries transient provider failures with exponential backoff and keeps
 * every vector it has seen, keyed by content hash, for the client's lifetime.
 * A batch either fully succeeds or fails as a whole.
 */
export class CachedEmbeddingClient implements EmbeddingClient {
	private readonly cache = new Map<string, Vector>()
	private readonly sleep: (ms: number) => Promise<void>

	constructor(
		private readonly provider: EmbeddingProvider,
		private readonly policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 250 }
	) {
		this.sleep = policy.sleep ?? delay
	}

	get cacheSize(): number {
		return this.cache.size
	}

	async embed(text: string): Promise<Vector> {
		const [vector] = await this.embedBatch([text])
		return vector
	}

	async embedBatch(texts: string[]): Promise<Vector[]> {
		const keys = texts.map(sha256)
		const missing = new Map<string, string>()
		keys.forEach((key, i) => {
			if (!this.cache.has(key)) missing.set(key, texts[i])
		})

		if (missing.size > 0) {
			const vectors = await this.callWithRetry([...missing.values()])
			;[...missing.keys()].forEach((key, i) => this.cache.set(key, vectors[i]))
		}

		return keys.map(key => {
			const vector = this.cache.get(key)
			if (!vector) {
				throw new EmbeddingUnavailableError('Embedding missing after batch call')
			}
			return vector
		})
	}

	private async callWithRetry(texts: string[]): Promise<Vector[]> {
		const { maxAttempts, baseDelayMs } = this.policy
		let lastErr: unknown = null

		for (let attempt = 1; attempt <= maxAttempts; attempt++) {
			try {
				const vectors = await this.provider.embedTexts(texts)
				trackEmbeddingCall(this.provider.name, 'success')
				return vectors
			} catch (error) {
				lastErr = error
				trackEmbeddingCall(this.provider.name, 'error')
				if (error instanceof EmbeddingUnavailableError) throw error

				const retryable = isTransient(error)
				logger.warn(
					{ err: error, provider: this.provider.name, attempt, retryable },
					'Embedding call failed'
				)
				if (retryable && attempt < maxAttempts) {
					await this.sleep(baseDelayMs * 2 ** (attempt - 1))
					continue
				}
				break
			}
		}

		const message = lastErr instanceof Error ? lastErr.message : String(lastErr)
		throw new EmbeddingUnavailableError(
			`Embedding provider ${this.provider.name} unavailable: ${message}`,
			{ provider: this.provider.name, batchSize: texts.length }
		)
	}
}

export function cosineSimilarity(a: Vector, b: Vector): number {
	if (a.length !== b.length || a.length === 0) return 0
	let dot = 0
	let normA = 0
	let normB = 0
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i]
		normA += a[i] * a[i]
		normB += b[i] * b[i]
	}
	if (normA === 0 || normB === 0) return 0
	return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}
