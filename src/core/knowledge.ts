// src/core/knowledge.ts
import { readFile } from 'fs/promises'
import { z } from 'zod'
import type { Card, Element, MinorSuit } from '../types/card.js'
import { DataIntegrityError, UnknownCardError } from '../types/errors.js'
import { logger } from '../util/logger.js'
import { findCard, type Deck } from './deck.js'
import { cosineSimilarity, type EmbeddingClient, type Vector } from './embeddings.js'

const SnippetSchema = z.object({
	id: z.string().min(1),
	source: z.string().min(1),
	cardName: z.string().min(1).optional(),
	text: z.string().min(1),
	embedding: z.array(z.number()).min(1).optional(),
})

const KnowledgeFileSchema = z.object({
	version: z.string().min(1),
	snippets: z.array(SnippetSchema),
})

export type KnowledgeSnippet = z.infer<typeof SnippetSchema>

export type RetrievalResult = {
	snippetId: string
	source: string
	text: string
	score: number
	cardName?: string
}

export type CorrespondenceRecord = {
	card: string
	suit: MinorSuit | null
	element: Element
	keywords: readonly string[]
	astrological: string
	kabbalistic: string
	decan: string | null
	title: string
	symbolism: readonly string[]
}

export class KnowledgeStore {
	private readonly snippets: KnowledgeSnippet[]

	constructor(
		private readonly deck: Deck,
		snippets: KnowledgeSnippet[],
		readonly version = 'inline'
	) {
		const issues: string[] = []
		const ids = new Set<string>()
		for (const snippet of snippets) {
			if (ids.has(snippet.id)) issues.push(`duplicate snippet id: ${snippet.id}`)
			ids.add(snippet.id)
			if (snippet.cardName && !this.hasCard(snippet.cardName)) {
				issues.push(`snippet ${snippet.id} names unknown card ${snippet.cardName}`)
			}
		}
		if (issues.length > 0) {
			throw new DataIntegrityError('Knowledge corpus failed validation', issues)
		}
		this.snippets = snippets.map(s => ({ ...s }))
	}

	static async fromFile(deck: Deck, path: string): Promise<KnowledgeStore> {
		let raw: unknown
		try {
			raw = JSON.parse(await readFile(path, 'utf-8'))
		} catch (error) {
			throw new DataIntegrityError(`Cannot read knowledge corpus at ${path}`, [
				error instanceof Error ? error.message : String(error),
			])
		}
		const parsed = KnowledgeFileSchema.safeParse(raw)
		if (!parsed.success) {
			throw new DataIntegrityError(
				'Knowledge corpus has an invalid shape',
				parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`)
			)
		}
		return new KnowledgeStore(deck, parsed.data.snippets, parsed.data.version)
	}

	get size(): number {
		return this.snippets.length
	}

	get indexedCount(): number {
		return this.snippets.filter(s => s.embedding).length
	}

	lookup(cardName: string): CorrespondenceRecord {
		const card = findCard(this.deck, cardName)
		return toCorrespondence(card)
	}

	/** Embeds every snippet that has no vector yet. Returns how many were added. */
	async index(client: EmbeddingClient): Promise<number> {
		const pending = this.snippets.filter(s => !s.embedding)
		if (pending.length === 0) return 0

		const vectors = await client.embedBatch(pending.map(s => s.text))
		pending.forEach((snippet, i) => {
			snippet.embedding = vectors[i]
		})
		logger.info(
			{ indexed: pending.length, total: this.snippets.length },
			'Knowledge corpus indexed'
		)
		return pending.length
	}

	/**
	 * Up to k snippets scoring strictly above threshold, best first.
	 * Equal scores keep corpus order.
	 */
	search(queryEmbedding: Vector, k: number, threshold: number): RetrievalResult[] {
		if (k <= 0) return []

		const scored: RetrievalResult[] = []
		for (const snippet of this.snippets) {
			if (!snippet.embedding || snippet.embedding.length !== queryEmbedding.length) {
				continue
			}
			const score = cosineSimilarity(queryEmbedding, snippet.embedding)
			if (score > threshold) {
				scored.push({
					snippetId: snippet.id,
					source: snippet.source,
					text: snippet.text,
					score,
					...(snippet.cardName ? { cardName: snippet.cardName } : {}),
				})
			}
		}

		// Array.prototype.sort is stable, so ties stay in insertion order
		return scored.sort((a, b) => b.score - a.score).slice(0, k)
	}

	private hasCard(name: string): boolean {
		try {
			findCard(this.deck, name)
			return true
		} catch (error) {
			if (error instanceof UnknownCardError) return false
			throw error
		}
	}
}

export function toCorrespondence(card: Card): CorrespondenceRecord {
	return {
		card: card.name,
		suit: card.suit,
		element: card.element,
		keywords: card.keywords,
		astrological: card.correspondences.astrological,
		kabbalistic: card.correspondences.kabbalistic,
		decan: card.correspondences.decan,
		title: card.correspondences.title,
		symbolism: card.correspondences.symbolism,
	}
}
