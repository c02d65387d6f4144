// Shared fakes and fixtures for the test suite
import { fileURLToPath } from 'url'
import { vi } from 'vitest'
import {
	createInterpretationCache,
	readingFingerprint,
	ReadingOrchestrator,
	type OrchestratorOptions,
} from '../core/orchestrator.js'
import { findCard, loadDeck, readCorpusFile, type Deck } from '../core/deck.js'
import type { EmbeddingClient, Vector } from '../core/embeddings.js'
import { KnowledgeStore, type KnowledgeSnippet } from '../core/knowledge.js'
import { analyzePatterns } from '../core/insights.js'
import type { ChatPrompt, GenerateOptions, GenerationClient, GenerationOutcome } from '../core/llm.js'
import { narrativeText, staticInterpretation } from '../core/serialization.js'
import { resolveSpread } from '../core/spreads.js'
import type { ReadingSink } from '../db/history.js'
import type { Interpretation } from '../types/interpretation.js'
import type { DraftReading, Reading, ReadingStatus } from '../types/reading.js'

export const CARDS_PATH = fileURLToPath(new URL('../../data/cards.json', import.meta.url))
export const KNOWLEDGE_PATH = fileURLToPath(new URL('../../data/knowledge.json', import.meta.url))

let deckPromise: Promise<Deck> | undefined

export function loadTestDeck(): Promise<Deck> {
	deckPromise ??= readCorpusFile(CARDS_PATH).then(loadDeck)
	return deckPromise
}

/** k1 matches the fake query vector exactly, k2 is orthogonal to it. */
export const TEST_SNIPPETS: KnowledgeSnippet[] = [
	{ id: 'k1', source: 'test-notes', text: 'Towers fall so that light gets in.', embedding: [1, 0] },
	{ id: 'k2', source: 'test-notes', text: 'Still water reflects.', embedding: [0, 1] },
]

export function fixedEmbeddings(vector: Vector = [1, 0]) {
	const embed = vi.fn(async (_text: string) => vector)
	const embedBatch = vi.fn(async (texts: string[]) => texts.map(() => vector))
	const client: EmbeddingClient = { embed, embedBatch }
	return { client, embed, embedBatch }
}

export function sampleNarrative(cards: DraftReading['cards']): Interpretation {
	return {
		summary: 'A turning point.',
		positions: cards.map(c => ({
			position: c.position.name,
			card: c.card.name,
			interpretation: `${c.card.name} speaks to this.`,
		})),
		advice: ['Breathe before acting.'],
		reflective_question: 'What are you ready to release?',
	}
}

export function narrativeFor(cards: DraftReading['cards']): string {
	return JSON.stringify(sampleNarrative(cards))
}

type ReadingShape = {
	id?: string
	focus?: string
	question?: string
	status?: ReadingStatus
	cards: Array<{ position: string; card: string; reversed?: boolean }>
}

/** A stored-shape reading over a custom spread, without going through the pipeline. */
export function makeReading(deck: Deck, shape: ReadingShape): Reading {
	const spread = resolveSpread('custom', shape.cards.map(c => c.position))
	const cards = shape.cards.map((c, i) => ({
		position: spread.positions[i],
		card: findCard(deck, c.card),
		isReversed: c.reversed ?? false,
	}))
	const draft: DraftReading = {
		id: shape.id ?? 'reading-1',
		createdAt: new Date(0).toISOString(),
		context: { focus: shape.focus ?? 'general', question: shape.question ?? 'What should I know?' },
		spread,
		cards,
	}
	const narrative = shape.status === 'degraded' ? null : sampleNarrative(cards)
	return {
		...draft,
		status: narrative ? 'complete' : 'degraded',
		interpretation: narrative ? narrativeText(narrative) : staticInterpretation(draft),
		narrative,
		metadata: {
			fingerprint: readingFingerprint(draft),
			cacheHit: false,
			partialKnowledge: false,
			missingKnowledge: [],
			retrieval: [],
			insights: analyzePatterns(cards),
			confidence: narrative ? 1 : 0,
			promptVersion: 'test',
			attempts: 1,
			errors: [],
		},
	}
}

export function okOutcome(text: string, provider = 'fake'): GenerationOutcome {
	return { ok: true, result: { text, provider, model: 'fake-model', format: 'json' } }
}

type GenerateImpl = (prompt: ChatPrompt, options?: GenerateOptions) => Promise<GenerationOutcome>

export function fakeGeneration(impl: GenerateImpl) {
	const generate = vi.fn(impl)
	const client: GenerationClient = { generate }
	return { client, generate }
}

export function memorySink() {
	const appended: string[] = []
	const sink: ReadingSink = {
		append: vi.fn(async (reading: Reading) => {
			appended.push(reading.id)
		}),
	}
	return { sink, appended }
}

export const TEST_OPTIONS: OrchestratorOptions = {
	retrievalTopK: 3,
	retrievalThreshold: 0.3,
	retrievalTimeoutMs: 1000,
	readingTimeoutMs: 5000,
}

export async function buildOrchestrator(opts: {
	generation: GenerationClient
	embeddings?: EmbeddingClient
	history?: ReadingSink
	options?: Partial<OrchestratorOptions>
}) {
	const deck = await loadTestDeck()
	const knowledge = new KnowledgeStore(deck, TEST_SNIPPETS, 'test')
	const cache = createInterpretationCache({ maxEntries: 50, ttlMs: 60_000, version: 'test' })
	const orchestrator = new ReadingOrchestrator(
		{
			deck,
			knowledge,
			embeddings: opts.embeddings ?? fixedEmbeddings().client,
			generation: opts.generation,
			cache,
			history: opts.history,
		},
		{ ...TEST_OPTIONS, ...opts.options }
	)
	return { orchestrator, deck, knowledge, cache }
}
