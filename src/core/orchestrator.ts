// src/core/orchestrator.ts
import { randomUUID } from 'crypto'
import { z } from 'zod'
import type { ReadingSink } from '../db/history.js'
import { DomainError, GenerationError, ValidationError } from '../types/errors.js'
import {
	INTERPRETATION_FIELDS,
	InterpretationSchema,
	type Interpretation,
} from '../types/interpretation.js'
import {
	QuestionContextSchema,
	READING_STATUSES,
	ReadingMetadataSchema,
	type DraftReading,
	type PatternInsights,
	type Reading,
	type ReadingStage,
	type RecordedError,
} from '../types/reading.js'
import { sha256 } from '../util/hash.js'
import { createCorrelationId, getCorrelationLogger, type Logger } from '../util/logger.js'
import { trackError, trackReading } from '../util/metrics.js'
import { createRng } from '../util/random.js'
import { InterpretationCache, type CacheSource } from './cache.js'
import { assignOrientations, drawCards, shuffleDeck, type Deck } from './deck.js'
import type { EmbeddingClient } from './embeddings.js'
import { analyzePatterns } from './insights.js'
import type { KnowledgeStore, RetrievalResult } from './knowledge.js'
import { parseStructured, type GenerationClient, type GenerationOutcome } from './llm.js'
import { getPrompt, logPromptUsage } from './promptVersioning.js'
import { READING_PROMPT_VERSION, buildReadingPrompt, type RetrievedContext } from './prompts.js'
import { narrativeText, staticInterpretation } from './serialization.js'
import { SpreadTypeSchema, resolveSpread } from './spreads.js'
import { validate } from './validation.js'

export const ReadingRequestSchema = z.object({
	spreadType: SpreadTypeSchema,
	focus: z.string().trim().min(1).max(100),
	question: z.string().trim().min(1).max(1000),
	context: z.record(z.string()).optional(),
	positions: z.array(z.string()).optional(),
	seed: z.number().int().min(0).max(0xffffffff).optional(),
	timeoutMs: z.number().int().positive().optional(),
})
export type ReadingRequest = z.infer<typeof ReadingRequestSchema>

/** What is computed once per fingerprint and shared by cache hits and coalesced callers. */
export const CachedInterpretationSchema = ReadingMetadataSchema.pick({
	partialKnowledge: true,
	missingKnowledge: true,
	retrieval: true,
	confidence: true,
	provider: true,
	model: true,
	promptVersion: true,
	attempts: true,
	errors: true,
}).extend({
	status: z.enum(READING_STATUSES),
	interpretation: z.string(),
	narrative: InterpretationSchema.nullable(),
})
export type CachedInterpretation = z.infer<typeof CachedInterpretationSchema>

export function createInterpretationCache(opts: {
	maxEntries: number
	ttlMs: number
	version: string
	now?: () => number
}): InterpretationCache<CachedInterpretation> {
	return new InterpretationCache({ ...opts, schema: CachedInterpretationSchema })
}

export type OrchestratorDeps = {
	deck: Deck
	knowledge: KnowledgeStore
	embeddings: EmbeddingClient
	generation: GenerationClient
	cache: InterpretationCache<CachedInterpretation>
	history?: ReadingSink
}

export type OrchestratorOptions = {
	retrievalTopK: number
	retrievalThreshold: number
	retrievalTimeoutMs: number
	readingTimeoutMs: number
	now?: () => Date
}

export type ReadingCallContext = {
	correlationId?: string
	/** Stored with the reading in history. */
	owner?: string
}

type RetrievalOutcome = {
	context: RetrievedContext
	retrieval: CachedInterpretation['retrieval']
	missingKnowledge: string[]
	partialKnowledge: boolean
	errors: RecordedError[]
}

const QUESTION_QUERY = '__question__'

class RetrievalTimeoutError extends Error {
	constructor(
		readonly query: string,
		readonly code: 'RETRIEVAL_TIMEOUT' | 'deadline_exceeded',
		message: string
	) {
		super(message)
	}
}

/** Bounded by the per-query timeout and by the reading deadline, whichever comes first. */
function withTimeout<T>(
	start: () => Promise<T>,
	timeoutMs: number,
	query: string,
	signal: AbortSignal
): Promise<T> {
	const deadlineError = () =>
		new RetrievalTimeoutError(query, 'deadline_exceeded', `Retrieval for ${query} stopped at the reading deadline`)
	if (signal.aborted) return Promise.reject(deadlineError())

	return new Promise<T>((resolve, reject) => {
		const settle = (finish: () => void) => {
			clearTimeout(timer)
			signal.removeEventListener('abort', onAbort)
			finish()
		}
		const onAbort = () => settle(() => reject(deadlineError()))
		const timer = setTimeout(
			() =>
				settle(() =>
					reject(new RetrievalTimeoutError(query, 'RETRIEVAL_TIMEOUT', `Retrieval for ${query} exceeded ${timeoutMs}ms`))
				),
			timeoutMs
		)
		signal.addEventListener('abort', onAbort, { once: true })
		Promise.resolve()
			.then(start)
			.then(
				value => settle(() => resolve(value)),
				(error: unknown) => settle(() => reject(error))
			)
	})
}

const aborted = (): Extract<GenerationOutcome, { ok: false }> => ({
	ok: false,
	error: new GenerationError('Reading deadline exceeded', 'deadline_exceeded', false),
})

/** Resolves with a failure as soon as the signal fires; the late result is dropped. */
function untilAborted(promise: Promise<GenerationOutcome>, signal: AbortSignal): Promise<GenerationOutcome> {
	if (signal.aborted) return Promise.resolve(aborted())
	return new Promise(resolve => {
		const onAbort = () => resolve(aborted())
		signal.addEventListener('abort', onAbort, { once: true })
		promise.then(
			outcome => {
				signal.removeEventListener('abort', onAbort)
				resolve(outcome)
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort)
				const message = error instanceof Error ? error.message : String(error)
				resolve({ ok: false, error: new GenerationError(message, 'unexpected', false) })
			}
		)
	})
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === 'object') {
		if (!Object.isFrozen(value)) Object.freeze(value)
		for (const child of Object.values(value)) deepFreeze(child)
	}
	return value
}

function recordError(stage: RecordedError['stage'], error: unknown): RecordedError {
	if (error instanceof GenerationError) {
		return { stage, code: error.providerCode, message: error.message, retryable: error.retryable }
	}
	if (error instanceof DomainError) {
		return { stage, code: error.code, message: error.message, retryable: 'retryable' in error && error.retryable === true }
	}
	if (error instanceof RetrievalTimeoutError) {
		return { stage, code: error.code, message: error.message, retryable: error.code === 'RETRIEVAL_TIMEOUT' }
	}
	return {
		stage,
		code: 'UNEXPECTED',
		message: error instanceof Error ? error.message : String(error),
		retryable: false,
	}
}

/**
 * Fingerprint of what determines an interpretation: spread type (and custom
 * position names), the ordered cards with orientation, and the question.
 */
export function readingFingerprint(draft: Pick<DraftReading, 'spread' | 'cards' | 'context'>): string {
	const parts: unknown[] = [draft.spread.type]
	if (draft.spread.type === 'custom') parts.push(draft.spread.positions.map(p => p.name))
	parts.push(draft.cards.map(c => [c.card.name, c.isReversed]))
	parts.push(draft.context.question)
	return sha256(JSON.stringify(parts))
}

export class ReadingOrchestrator {
	private readonly now: () => Date

	constructor(
		private readonly deps: OrchestratorDeps,
		private readonly options: OrchestratorOptions
	) {
		this.now = options.now ?? (() => new Date())
	}

	/** Shuffle, draw and orient. Errors here are thrown to the caller. */
	draft(request: ReadingRequest): DraftReading {
		const context = QuestionContextSchema.safeParse({
			focus: request.focus,
			question: request.question,
			context: request.context,
		})
		if (!context.success) {
			throw new ValidationError('Invalid question context', {
				issues: context.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
			})
		}

		const spread = resolveSpread(request.spreadType, request.positions)
		const rng = createRng(request.seed)
		const { drawn } = drawCards(shuffleDeck(this.deps.deck, rng), spread.positions.length)
		const cards = assignOrientations(drawn, rng).map(({ card, isReversed }, i) => ({
			position: spread.positions[i],
			card,
			isReversed,
		}))

		return {
			id: randomUUID(),
			createdAt: this.now().toISOString(),
			context: context.data,
			spread,
			cards,
		}
	}

	async performReading(request: ReadingRequest, call: ReadingCallContext = {}): Promise<Reading> {
		const correlationId = call.correlationId ?? createCorrelationId()
		const log = getCorrelationLogger(correlationId, { spread: request.spreadType })

		let draft: DraftReading
		try {
			draft = this.draft(request)
		} catch (error) {
			trackReading(request.spreadType, 'failed')
			trackError(error instanceof DomainError ? error.code : 'unknown', 'draft')
			log.warn({ err: error, stage: 'failed' satisfies ReadingStage }, 'Reading could not be drafted')
			throw error
		}

		const fingerprint = readingFingerprint(draft)
		const insights = analyzePatterns(draft.cards)
		log.info(
			{ readingId: draft.id, stage: 'drafted' satisfies ReadingStage, fingerprint },
			'Reading drafted'
		)

		const controller = new AbortController()
		const timeoutMs = request.timeoutMs ?? this.options.readingTimeoutMs
		const deadline = setTimeout(() => controller.abort(), timeoutMs)

		let resolved: { value: CachedInterpretation; source: CacheSource }
		try {
			resolved = await this.deps.cache.resolve(fingerprint, async () => {
				const value = await this.interpret(draft, insights, controller.signal, correlationId, log)
				return { value, cacheable: value.status === 'complete' }
			})
		} finally {
			clearTimeout(deadline)
		}

		const { value, source } = resolved
		const { status, interpretation, narrative, ...rest } = value
		const reading: Reading = {
			...draft,
			status,
			interpretation,
			narrative,
			metadata: {
				...rest,
				fingerprint,
				cacheHit: source === 'hit',
				insights,
			},
		}

		trackReading(draft.spread.type, status)
		log.info(
			{ readingId: reading.id, stage: status satisfies ReadingStage, source, attempts: value.attempts },
			'Reading finished'
		)

		if (this.deps.history) {
			try {
				await this.deps.history.append(reading, call.owner)
			} catch (error) {
				trackError('history_write', 'reading')
				log.error({ err: error, readingId: reading.id }, 'Could not save reading to history')
			}
		}

		return deepFreeze(reading)
	}

	private async retrieve(draft: DraftReading, signal: AbortSignal, log: Logger): Promise<RetrievalOutcome> {
		const { knowledge, embeddings } = this.deps
		const { retrievalTopK, retrievalThreshold, retrievalTimeoutMs } = this.options

		const queries = [
			...draft.cards.map(({ card, isReversed, position }) => ({
				key: card.name,
				text: `${card.name}${isReversed ? ' reversed' : ''} as ${position.name}: ${card.keywords.join(', ')}. ${draft.context.focus}`,
			})),
			{ key: QUESTION_QUERY, text: draft.context.question },
		]

		const settled = await Promise.allSettled(
			queries.map(q =>
				withTimeout(
					() => embeddings.embed(q.text).then(vector => knowledge.search(vector, retrievalTopK, retrievalThreshold)),
					retrievalTimeoutMs,
					q.key,
					signal
				)
			)
		)

		const byCard = new Map<string, RetrievalResult[]>()
		let question: RetrievalResult[] = []
		const missingKnowledge: string[] = []
		const errors: RecordedError[] = []

		settled.forEach((result, i) => {
			const { key } = queries[i]
			if (result.status === 'fulfilled') {
				if (key === QUESTION_QUERY) question = result.value
				else byCard.set(key, result.value)
				return
			}
			errors.push(recordError('retrieving', result.reason))
			if (key !== QUESTION_QUERY) {
				byCard.set(key, [])
				missingKnowledge.push(key)
			}
		})

		if (errors.length > 0) {
			log.warn({ failed: errors.length, missingKnowledge }, 'Retrieval incomplete')
		}

		return {
			context: { byCard, question },
			retrieval: draft.cards.map(({ card }) => {
				const results = byCard.get(card.name) ?? []
				return {
					card: card.name,
					snippetIds: results.map(r => r.snippetId),
					topScore: results[0]?.score ?? null,
				}
			}),
			missingKnowledge,
			partialKnowledge: errors.length > 0,
			errors,
		}
	}

	private async interpret(
		draft: DraftReading,
		insights: PatternInsights,
		signal: AbortSignal,
		correlationId: string,
		log: Logger
	): Promise<CachedInterpretation> {
		log.debug({ stage: 'retrieving' satisfies ReadingStage }, 'Retrieving knowledge')
		const retrieved = await this.retrieve(draft, signal, log)
		const errors = [...retrieved.errors]
		const covered = retrieved.retrieval.filter(r => r.snippetIds.length > 0).length
		const coverage = draft.cards.length > 0 ? covered / draft.cards.length : 0

		const base = {
			partialKnowledge: retrieved.partialKnowledge,
			missingKnowledge: retrieved.missingKnowledge,
			retrieval: retrieved.retrieval,
			promptVersion: READING_PROMPT_VERSION,
		}

		const systemPrompt = getPrompt('reading.system')
		let attempts = 0
		for (const short of [false, true]) {
			if (signal.aborted) {
				errors.push(recordError('generating', aborted().error))
				break
			}

			attempts++
			const prompt = buildReadingPrompt(
				draft,
				short ? { short } : { retrieved: retrieved.context, insights }
			)
			if (systemPrompt) {
				logPromptUsage(systemPrompt, correlationId, 'reading', { attempt: attempts, short })
			}

			log.debug({ stage: 'generating' satisfies ReadingStage, attempt: attempts }, 'Generating')
			const outcome = await untilAborted(
				Promise.resolve().then(() =>
					this.deps.generation.generate(prompt, { format: 'json', signal, correlationId })
				),
				signal
			)
			if (!outcome.ok) {
				errors.push(recordError('generating', outcome.error))
				log.warn({ attempt: attempts, code: outcome.error.code }, 'Generation failed')
				if (signal.aborted) break
				continue
			}

			log.debug({ stage: 'validating' satisfies ReadingStage, attempt: attempts }, 'Validating')
			const check = validate(outcome.result, draft, {
				requiredFields: INTERPRETATION_FIELDS,
				perCardField: 'positions',
			})
			if (!check.valid) {
				errors.push({
					stage: 'validating',
					code: 'INVALID_OUTPUT',
					message: check.issues.join('; '),
					retryable: true,
				})
				log.warn({ attempt: attempts, issues: check.issues }, 'Generated output rejected')
				continue
			}

			const parsed = parseStructured(outcome.result, InterpretationSchema)
			if (!parsed.ok) {
				errors.push(recordError('validating', parsed.error))
				log.warn({ attempt: attempts, err: parsed.error }, 'Generated output does not match schema')
				continue
			}

			const narrative: Interpretation = parsed.value
			return {
				...base,
				status: 'complete',
				interpretation: narrativeText(narrative),
				narrative,
				// the shortened prompt carries no retrieved context
				confidence: short ? 0.5 : Math.round((0.5 + 0.5 * coverage) * 100) / 100,
				provider: outcome.result.provider,
				model: outcome.result.model,
				attempts,
				errors,
			}
		}

		return {
			...base,
			status: 'degraded',
			interpretation: staticInterpretation(draft),
			narrative: null,
			confidence: 0,
			attempts,
			errors,
		}
	}
}
