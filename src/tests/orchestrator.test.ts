import { describe, expect, it, vi } from 'vitest'
import type { EmbeddingClient, Vector } from '../core/embeddings.js'
import { analyzePatterns } from '../core/insights.js'
import type { GenerationOutcome } from '../core/llm.js'
import {
	readingFingerprint,
	type OrchestratorOptions,
	type ReadingRequest,
} from '../core/orchestrator.js'
import { READING_PROMPT_VERSION } from '../core/prompts.js'
import { staticInterpretation } from '../core/serialization.js'
import type { ReadingSink } from '../db/history.js'
import { GenerationError, ValidationError } from '../types/errors.js'
import { buildOrchestrator, fakeGeneration, memorySink, narrativeFor, okOutcome } from './fixtures.js'

const request: ReadingRequest = {
	spreadType: 'three_card',
	focus: 'career',
	question: 'Should I change jobs?',
	seed: 7,
}

type Respond = (narrative: string, call: number) => Promise<GenerationOutcome>

const answerWell: Respond = async narrative => okOutcome(narrative)

const outage = (): GenerationOutcome => ({
	ok: false,
	error: new GenerationError('provider down', 'http_503', true),
})

async function setup(
	respond: Respond = answerWell,
	extra: {
		embeddings?: EmbeddingClient
		history?: ReadingSink
		options?: Partial<OrchestratorOptions>
	} = {}
) {
	let narrative = ''
	let calls = 0
	const generation = fakeGeneration(() => respond(narrative, ++calls))
	const built = await buildOrchestrator({ generation: generation.client, ...extra })
	const draft = built.orchestrator.draft(request)
	narrative = narrativeFor(draft.cards)
	return { ...built, draft, generate: generation.generate }
}

describe('ReadingOrchestrator.draft', () => {
	it('replays the same cards for the same seed', async () => {
		const { orchestrator, draft } = await setup()
		const again = orchestrator.draft(request)
		const summary = (d: typeof draft) => d.cards.map(c => [c.position.name, c.card.name, c.isReversed])
		expect(summary(again)).toEqual(summary(draft))
		expect(again.id).not.toBe(draft.id)
		expect(draft.cards.map(c => c.position.name)).toEqual(['Past', 'Present', 'Future'])
		expect(new Set(draft.cards.map(c => c.card.name)).size).toBe(3)
	})

	it('lays out the largest spread', async () => {
		const { orchestrator } = await setup()
		const draft = orchestrator.draft({ ...request, spreadType: 'celtic_cross' })
		expect(draft.cards).toHaveLength(10)
		expect(draft.spread.name).toBe('Celtic Cross')
	})

	it('rejects an empty question and a bad custom layout', async () => {
		const { orchestrator } = await setup()
		expect(() => orchestrator.draft({ ...request, question: '   ' })).toThrow(ValidationError)
		expect(() => orchestrator.draft({ ...request, spreadType: 'custom' })).toThrow(ValidationError)
	})

	it('accepts only seeds that fit in 32 bits', async () => {
		const { orchestrator } = await setup()
		expect(orchestrator.draft({ ...request, seed: 0xffffffff }).cards).toHaveLength(3)
		expect(() => orchestrator.draft({ ...request, seed: 2 ** 32 + 1 })).toThrow(ValidationError)
		expect(() => orchestrator.draft({ ...request, seed: -1 })).toThrow(ValidationError)
	})

	it('fingerprints spread, cards and question', async () => {
		const { orchestrator, draft } = await setup()
		expect(readingFingerprint(orchestrator.draft(request))).toBe(readingFingerprint(draft))
		expect(readingFingerprint(orchestrator.draft({ ...request, question: 'Should I stay?' }))).not.toBe(
			readingFingerprint(draft)
		)
		// focus does not change the interpretation key
		expect(readingFingerprint(orchestrator.draft({ ...request, focus: 'love' }))).toBe(
			readingFingerprint(draft)
		)

		const custom = { ...request, spreadType: 'custom' as const }
		expect(readingFingerprint(orchestrator.draft({ ...custom, positions: ['Me', 'You', 'Us'] }))).not.toBe(
			readingFingerprint(orchestrator.draft({ ...custom, positions: ['Me', 'You', 'Them'] }))
		)
	})
})

describe('ReadingOrchestrator.performReading', () => {
	it('completes a reading with retrieved knowledge', async () => {
		const { orchestrator, draft, generate } = await setup()
		const reading = await orchestrator.performReading(request, { correlationId: 'corr-1' })

		expect(reading.status).toBe('complete')
		expect(reading.cards.map(c => c.card.name)).toEqual(draft.cards.map(c => c.card.name))
		expect(reading.narrative?.summary).toBe('A turning point.')
		expect(reading.interpretation.startsWith('A turning point.\n\nPast (')).toBe(true)
		expect(reading.metadata).toMatchObject({
			fingerprint: readingFingerprint(draft),
			cacheHit: false,
			partialKnowledge: false,
			missingKnowledge: [],
			confidence: 1,
			provider: 'fake',
			model: 'fake-model',
			promptVersion: READING_PROMPT_VERSION,
			attempts: 1,
			errors: [],
		})
		expect(reading.metadata.retrieval).toEqual(
			draft.cards.map(c => ({ card: c.card.name, snippetIds: ['k1'], topScore: 1 }))
		)
		expect(reading.metadata.insights).toEqual(analyzePatterns(draft.cards))

		expect(generate).toHaveBeenCalledTimes(1)
		const [prompt, options] = generate.mock.calls[0]
		expect(prompt.user).toContain('   - [test-notes] Towers fall so that light gets in.')
		expect(prompt.user).toContain('Knowledge related to the question:')
		expect(prompt.user).not.toContain('Still water reflects.')
		expect(options?.format).toBe('json')
		expect(options?.correlationId).toBe('corr-1')
		expect(options?.signal).toBeInstanceOf(AbortSignal)
	})

	it('serves a repeat reading from the cache', async () => {
		const { orchestrator, generate, cache } = await setup()
		const first = await orchestrator.performReading(request)
		const second = await orchestrator.performReading(request)

		expect(generate).toHaveBeenCalledTimes(1)
		expect(cache.size).toBe(1)
		expect(second.metadata.cacheHit).toBe(true)
		expect(second.interpretation).toBe(first.interpretation)
		expect(second.id).not.toBe(first.id)
	})

	it('generates once for concurrent identical requests', async () => {
		let open: () => void = () => {}
		const gate = new Promise<void>(resolve => {
			open = resolve
		})
		const { orchestrator, generate } = await setup(async narrative => {
			await gate
			return okOutcome(narrative)
		})

		const pending = Promise.all([
			orchestrator.performReading(request),
			orchestrator.performReading(request),
		])
		open()
		const [a, b] = await pending

		expect(generate).toHaveBeenCalledTimes(1)
		expect(a.interpretation).toBe(b.interpretation)
		expect([a.metadata.cacheHit, b.metadata.cacheHit]).toEqual([false, false])
	})

	it('falls back to the static meanings when generation keeps failing', async () => {
		const { orchestrator, draft, generate, cache } = await setup(async () => outage())
		const reading = await orchestrator.performReading(request)

		expect(reading.status).toBe('degraded')
		expect(reading.narrative).toBeNull()
		expect(reading.interpretation).toBe(staticInterpretation(draft))
		expect(reading.metadata.confidence).toBe(0)
		expect(reading.metadata.attempts).toBe(2)
		expect(reading.metadata.provider).toBeUndefined()
		expect(reading.metadata.errors).toEqual([
			{ stage: 'generating', code: 'http_503', message: 'provider down', retryable: true },
			{ stage: 'generating', code: 'http_503', message: 'provider down', retryable: true },
		])

		// degraded readings are not cached
		expect(cache.size).toBe(0)
		await orchestrator.performReading(request)
		expect(generate).toHaveBeenCalledTimes(4)
	})

	it('retries rejected output once with a shorter prompt', async () => {
		const { orchestrator, generate } = await setup(async (narrative, call) =>
			okOutcome(call === 1 ? '{"summary":"Only this."}' : narrative)
		)
		const reading = await orchestrator.performReading(request)

		expect(reading.status).toBe('complete')
		expect(reading.metadata.attempts).toBe(2)
		expect(reading.metadata.confidence).toBe(0.5)
		expect(reading.metadata.errors.map(e => [e.stage, e.code])).toEqual([
			['validating', 'INVALID_OUTPUT'],
		])

		const [full, short] = generate.mock.calls.map(([prompt]) => prompt.user)
		expect(full).toContain('   Knowledge:')
		expect(short).not.toContain('   Knowledge:')
		expect(short).not.toContain('Knowledge related to the question:')
		expect(short).not.toContain('Correspondences:')
	})

	it('reads on with partial knowledge when retrieval times out', async () => {
		const embed = vi.fn((_text: string) => new Promise<Vector>(() => {}))
		const embeddings: EmbeddingClient = { embed, embedBatch: async texts => texts.map(() => [1, 0]) }
		const { orchestrator, draft } = await setup(answerWell, {
			embeddings,
			options: { retrievalTimeoutMs: 20 },
		})
		const reading = await orchestrator.performReading(request)

		expect(embed).toHaveBeenCalledTimes(4)
		expect(reading.status).toBe('complete')
		expect(reading.metadata.partialKnowledge).toBe(true)
		expect(reading.metadata.missingKnowledge).toEqual(draft.cards.map(c => c.card.name))
		expect(reading.metadata.errors.map(e => [e.stage, e.code])).toEqual([
			['retrieving', 'RETRIEVAL_TIMEOUT'],
			['retrieving', 'RETRIEVAL_TIMEOUT'],
			['retrieving', 'RETRIEVAL_TIMEOUT'],
			['retrieving', 'RETRIEVAL_TIMEOUT'],
		])
		expect(reading.metadata.confidence).toBe(0.5)
		expect(reading.metadata.retrieval.every(r => r.snippetIds.length === 0 && r.topScore === null)).toBe(true)
	})

	it('degrades when the reading deadline passes', async () => {
		const { orchestrator, draft } = await setup(() => new Promise<GenerationOutcome>(() => {}))
		const reading = await orchestrator.performReading({ ...request, timeoutMs: 30 })

		expect(reading.status).toBe('degraded')
		expect(reading.interpretation).toBe(staticInterpretation(draft))
		expect(reading.metadata.attempts).toBe(1)
		expect(reading.metadata.errors.map(e => e.code)).toEqual(['deadline_exceeded'])
	})

	it('stops waiting on retrieval at the reading deadline', async () => {
		const embed = vi.fn((_text: string) => new Promise<Vector>(() => {}))
		const embeddings: EmbeddingClient = { embed, embedBatch: async texts => texts.map(() => [1, 0]) }
		const { orchestrator, generate, draft } = await setup(answerWell, {
			embeddings,
			options: { retrievalTimeoutMs: 1500 },
		})
		const started = Date.now()
		const reading = await orchestrator.performReading({ ...request, timeoutMs: 50 })

		expect(Date.now() - started).toBeLessThan(500)
		expect(reading.status).toBe('degraded')
		expect(reading.interpretation).toBe(staticInterpretation(draft))
		expect(generate).not.toHaveBeenCalled()
		expect(reading.metadata.attempts).toBe(0)
		expect(reading.metadata.errors.map(e => [e.stage, e.code])).toEqual([
			['retrieving', 'deadline_exceeded'],
			['retrieving', 'deadline_exceeded'],
			['retrieving', 'deadline_exceeded'],
			['retrieving', 'deadline_exceeded'],
			['generating', 'deadline_exceeded'],
		])
	})

	it('records clients that throw instead of rejecting', async () => {
		const embeddings: EmbeddingClient = {
			embed: () => {
				throw new Error('embedder misconfigured')
			},
			embedBatch: async texts => texts.map(() => [1, 0]),
		}
		const { orchestrator } = await setup(
			() => {
				throw new Error('generator misconfigured')
			},
			{ embeddings }
		)
		const reading = await orchestrator.performReading(request)

		expect(reading.status).toBe('degraded')
		expect(reading.metadata.partialKnowledge).toBe(true)
		expect(reading.metadata.errors.map(e => [e.stage, e.code])).toEqual([
			['retrieving', 'UNEXPECTED'],
			['retrieving', 'UNEXPECTED'],
			['retrieving', 'UNEXPECTED'],
			['retrieving', 'UNEXPECTED'],
			['generating', 'unexpected'],
			['generating', 'unexpected'],
		])
	})

	it('surfaces draft errors without generating', async () => {
		const { orchestrator, generate } = await setup()
		await expect(orchestrator.performReading({ ...request, question: '' })).rejects.toBeInstanceOf(
			ValidationError
		)
		await expect(
			orchestrator.performReading({ ...request, spreadType: 'custom', positions: [] })
		).rejects.toBeInstanceOf(ValidationError)
		expect(generate).not.toHaveBeenCalled()
	})

	it('records readings in history and survives a failing store', async () => {
		const { sink, appended } = memorySink()
		const ok = await setup(answerWell, { history: sink })
		const reading = await ok.orchestrator.performReading(request, { owner: 'user-1' })
		expect(appended).toEqual([reading.id])
		expect(sink.append).toHaveBeenCalledWith(reading, 'user-1')

		const broken: ReadingSink = {
			append: vi.fn(async () => {
				throw new Error('disk full')
			}),
		}
		const failing = await setup(answerWell, { history: broken })
		const saved = await failing.orchestrator.performReading(request)
		expect(saved.status).toBe('complete')
		expect(broken.append).toHaveBeenCalledTimes(1)
	})

	it('returns a frozen reading', async () => {
		const { orchestrator } = await setup()
		const reading = await orchestrator.performReading(request)
		expect(Object.isFrozen(reading)).toBe(true)
		expect(Object.isFrozen(reading.metadata.insights.notes)).toBe(true)
		expect(Object.isFrozen(reading.cards[0])).toBe(true)
	})
})
