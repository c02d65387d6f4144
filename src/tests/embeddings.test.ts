import { afterEach, describe, expect, it, vi } from 'vitest'
import {
	CachedEmbeddingClient,
	OpenAIEmbeddingProvider,
	VoyageEmbeddingProvider,
	cosineSimilarity,
	type EmbeddingProvider,
	type Vector,
} from '../core/embeddings.js'
import { ProviderHttpError, ProviderNetworkError } from '../core/providerHttp.js'
import { EmbeddingUnavailableError } from '../types/errors.js'

const jsonResponse = (body: unknown, status = 200) =>
	new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })

function scriptedProvider(...steps: Array<Vector[] | Error>) {
	const calls: string[][] = []
	let i = 0
	const provider: EmbeddingProvider = {
		name: 'scripted',
		async embedTexts(texts) {
			calls.push(texts)
			const step = steps[Math.min(i++, steps.length - 1)]
			if (step instanceof Error) throw step
			return step
		},
	}
	return { provider, calls }
}

afterEach(() => {
	vi.unstubAllGlobals()
})

describe('embedding providers', () => {
	it('posts to Voyage and orders vectors by index', async () => {
		const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
			jsonResponse({
				data: [
					{ embedding: [0, 1], index: 1 },
					{ embedding: [1, 0], index: 0 },
				],
			})
		)
		vi.stubGlobal('fetch', fetchMock)

		const provider = new VoyageEmbeddingProvider('test-secret', 'voyage-3')
		expect(await provider.embedTexts(['first', 'second'])).toEqual([
			[1, 0],
			[0, 1],
		])

		const [url, init] = fetchMock.mock.calls[0]
		expect(url).toBe('https://api.voyageai.com/v1/embeddings')
		expect(JSON.parse(String(init?.body))).toEqual({
			input: ['first', 'second'],
			model: 'voyage-3',
			input_type: 'document',
		})
	})

	it('fails without an API key and never calls out', async () => {
		const fetchMock = vi.fn()
		vi.stubGlobal('fetch', fetchMock)
		await expect(new OpenAIEmbeddingProvider('').embedTexts(['x'])).rejects.toBeInstanceOf(
			EmbeddingUnavailableError
		)
		expect(fetchMock).not.toHaveBeenCalled()
	})

	it('surfaces HTTP failures with the provider message', async () => {
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => jsonResponse({ error: { message: 'slow down' } }, 429))
		)
		const error = await new OpenAIEmbeddingProvider('test-secret')
			.embedTexts(['x'])
			.catch((e: unknown) => e)
		expect(error).toBeInstanceOf(ProviderHttpError)
		expect(error instanceof ProviderHttpError && error.status).toBe(429)
		expect(error instanceof Error && error.message).toBe('openai HTTP 429: slow down')
	})

	it('treats a body cut off mid-read as a network failure', async () => {
		const broken = new ReadableStream<Uint8Array>({
			start(controller) {
				controller.error(new TypeError('terminated'))
			},
		})
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => new Response(broken, { status: 200 }))
		)
		const error = await new OpenAIEmbeddingProvider('test-secret')
			.embedTexts(['x'])
			.catch((e: unknown) => e)
		expect(error).toBeInstanceOf(ProviderNetworkError)
		expect(error instanceof ProviderNetworkError && error.timedOut).toBe(false)
	})
})

describe('CachedEmbeddingClient', () => {
	it('retries transient failures with exponential backoff', async () => {
		const { provider, calls } = scriptedProvider(
			new ProviderHttpError('scripted', 503, 'busy'),
			new ProviderNetworkError('scripted', 'socket hang up', false),
			[[0.5, 0.5]]
		)
		const sleep = vi.fn(async (_ms: number) => {})
		const client = new CachedEmbeddingClient(provider, { maxAttempts: 3, baseDelayMs: 100, sleep })

		expect(await client.embed('hello')).toEqual([0.5, 0.5])
		expect(calls).toHaveLength(3)
		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200])
	})

	it('gives up after maxAttempts', async () => {
		const { provider, calls } = scriptedProvider(new ProviderHttpError('scripted', 500, 'down'))
		const sleep = vi.fn(async (_ms: number) => {})
		const client = new CachedEmbeddingClient(provider, { maxAttempts: 3, baseDelayMs: 100, sleep })

		await expect(client.embed('hello')).rejects.toBeInstanceOf(EmbeddingUnavailableError)
		expect(calls).toHaveLength(3)
		expect(sleep).toHaveBeenCalledTimes(2)
	})

	it('does not retry a non-transient failure', async () => {
		const { provider, calls } = scriptedProvider(new ProviderHttpError('scripted', 401, 'bad key'))
		const sleep = vi.fn(async (_ms: number) => {})
		const client = new CachedEmbeddingClient(provider, { maxAttempts: 3, baseDelayMs: 100, sleep })

		await expect(client.embed('hello')).rejects.toBeInstanceOf(EmbeddingUnavailableError)
		expect(calls).toHaveLength(1)
		expect(sleep).not.toHaveBeenCalled()
	})

	it('embeds a batch in one call, keeping order and caching by content', async () => {
		const { provider, calls } = scriptedProvider([
			[1, 0],
			[0, 1],
		])
		const client = new CachedEmbeddingClient(provider, { maxAttempts: 1, baseDelayMs: 0 })

		expect(await client.embedBatch(['a', 'b', 'a'])).toEqual([
			[1, 0],
			[0, 1],
			[1, 0],
		])
		expect(calls).toEqual([['a', 'b']])
		expect(client.cacheSize).toBe(2)

		expect(await client.embed('b')).toEqual([0, 1])
		expect(calls).toHaveLength(1)
	})

	it('fails the whole batch when the provider fails', async () => {
		const { provider } = scriptedProvider(new ProviderHttpError('scripted', 400, 'too long'))
		const client = new CachedEmbeddingClient(provider, { maxAttempts: 2, baseDelayMs: 0 })

		await expect(client.embedBatch(['a', 'b'])).rejects.toBeInstanceOf(EmbeddingUnavailableError)
		expect(client.cacheSize).toBe(0)
	})
})

describe('cosineSimilarity', () => {
	it('scores direction, not length', () => {
		expect(cosineSimilarity([1, 0], [3, 0])).toBeCloseTo(1)
		expect(cosineSimilarity([1, 0], [0, 2])).toBeCloseTo(0)
		expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1)
	})

	it('returns 0 for mismatched or zero vectors', () => {
		expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0)
		expect(cosineSimilarity([0, 0], [1, 0])).toBe(0)
	})
})
