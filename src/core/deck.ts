// src/core/deck.ts
import { readFile } from 'fs/promises'
import type { z } from 'zod'
import {
	CardRecordSchema,
	CorpusSchema,
	MINOR_SUITS,
	SUIT_ELEMENTS,
	type Card,
	type Corpus,
	type MinorSuit,
} from '../types/card.js'
import {
	DataIntegrityError,
	InsufficientCardsError,
	UnknownCardError,
} from '../types/errors.js'
import { logger } from '../util/logger.js'
import type { Rng } from '../util/random.js'

export const DECK_SIZE = 78

export interface Deck {
	readonly version: string
	readonly cards: readonly Card[]
}

export type BookTSlot = { suit: MinorSuit | null; number: number }

export type OrientedCard = { card: Card; isReversed: boolean }

// Pip decans in Book T order, starting from Saturn in Leo (5 of Wands)
const PIP_DECANS: ReadonlyArray<[from: number, to: number, suit: MinorSuit]> = [
	[5, 7, 'wands'],
	[8, 10, 'pentacles'],
	[2, 4, 'swords'],
	[5, 7, 'cups'],
	[8, 10, 'wands'],
	[2, 4, 'pentacles'],
	[5, 7, 'swords'],
	[8, 10, 'cups'],
	[2, 4, 'wands'],
	[5, 7, 'pentacles'],
	[8, 10, 'swords'],
	[2, 4, 'cups'],
]

/**
 * Canonical slot sequence: aces by suit, pips by decan, courts
 * Page→Knight→Queen→King per suit, then trumps 0–21.
 */
export function bookTSequence(): BookTSlot[] {
	const slots: BookTSlot[] = MINOR_SUITS.map(suit => ({ suit, number: 1 }))

	for (const [from, to, suit] of PIP_DECANS) {
		for (let number = from; number <= to; number++) {
			slots.push({ suit, number })
		}
	}

	for (const suit of MINOR_SUITS) {
		for (let number = 11; number <= 14; number++) {
			slots.push({ suit, number })
		}
	}

	for (let number = 0; number <= 21; number++) {
		slots.push({ suit: null, number })
	}

	return slots
}

const slotKey = (suit: MinorSuit | null, number: number) =>
	`${suit ?? 'major'}:${number}`

function describeIssues(error: z.ZodError, prefix: string): string[] {
	return error.errors.map(
		err => `${[prefix, ...err.path].join('.')}: ${err.message}`
	)
}

export function parseCorpus(raw: unknown): Corpus {
	const envelope = CorpusSchema.safeParse(raw)
	if (!envelope.success) {
		throw new DataIntegrityError(
			'Card corpus has an invalid shape',
			describeIssues(envelope.error, 'corpus')
		)
	}

	const cards: Card[] = []
	const issues: string[] = []
	envelope.data.cards.forEach((record, i) => {
		const parsed = CardRecordSchema.safeParse(record)
		if (parsed.success) {
			cards.push(Object.freeze(parsed.data))
		} else {
			issues.push(...describeIssues(parsed.error, `cards.${i}`))
		}
	})

	if (issues.length > 0) {
		throw new DataIntegrityError('Card corpus contains invalid records', issues)
	}

	return { version: envelope.data.version, cards }
}

export async function readCorpusFile(path: string): Promise<Corpus> {
	let raw: unknown
	try {
		raw = JSON.parse(await readFile(path, 'utf-8'))
	} catch (error) {
		throw new DataIntegrityError(`Cannot read card corpus at ${path}`, [
			error instanceof Error ? error.message : String(error),
		])
	}
	return parseCorpus(raw)
}

function cardInvariantIssues(card: Card): string[] {
	const issues: string[] = []
	if (card.suit === null && (card.number < 0 || card.number > 21)) {
		issues.push(`${card.name}: major arcana number must be 0-21`)
	}
	if (card.suit !== null && (card.number < 1 || card.number > 14)) {
		issues.push(`${card.name}: minor arcana number must be 1-14`)
	}
	if (card.suit !== null && card.element !== SUIT_ELEMENTS[card.suit]) {
		issues.push(`${card.name}: ${card.suit} cards belong to ${SUIT_ELEMENTS[card.suit]}`)
	}
	return issues
}

/** Validates the corpus and freezes it as the canonical deck. */
export function loadDeck(corpus: Corpus): Deck {
	const { cards } = corpus
	const issues: string[] = []

	if (cards.length !== DECK_SIZE) {
		issues.push(`expected ${DECK_SIZE} cards, found ${cards.length}`)
	}

	const names = new Set<string>()
	const slots = new Set<string>()
	const dimensions = new Set<number>()
	for (const card of cards) {
		issues.push(...cardInvariantIssues(card))

		const name = card.name.toLowerCase()
		if (names.has(name)) issues.push(`duplicate card name: ${card.name}`)
		names.add(name)

		const key = slotKey(card.suit, card.number)
		if (slots.has(key)) issues.push(`duplicate card number: ${key}`)
		slots.add(key)

		if (card.embedding) dimensions.add(card.embedding.length)
	}

	if (dimensions.size > 1) {
		issues.push(
			`embedding dimensions differ: ${[...dimensions].sort((a, b) => a - b).join(', ')}`
		)
	}

	if (cards.length === DECK_SIZE) {
		const expected = bookTSequence()
		const mismatches = expected
			.map((slot, i) => ({ slot, card: cards[i], index: i }))
			.filter(
				({ slot, card }) =>
					card.suit !== slot.suit || card.number !== slot.number
			)
		for (const { slot, card, index } of mismatches.slice(0, 5)) {
			issues.push(
				`position ${index}: expected ${slotKey(slot.suit, slot.number)}, found ${card.name}`
			)
		}
		if (mismatches.length > 5) {
			issues.push(`${mismatches.length - 5} more positions out of Book T order`)
		}
	}

	if (issues.length > 0) {
		logger.error({ issues, version: corpus.version }, 'Card corpus rejected')
		throw new DataIntegrityError('Card corpus failed deck validation', issues)
	}

	logger.debug({ version: corpus.version }, 'Deck loaded')
	return Object.freeze({
		version: corpus.version,
		cards: Object.freeze([...cards]),
	})
}

/** Fisher–Yates on a copy. The source deck is left untouched. */
export function shuffleDeck(deck: Deck, rng: Rng): Deck {
	const cards = [...deck.cards]
	for (let i = cards.length - 1; i > 0; i--) {
		const j = Math.floor(rng() * (i + 1))
		const tmp = cards[i]
		cards[i] = cards[j]
		cards[j] = tmp
	}
	return Object.freeze({ version: deck.version, cards: Object.freeze(cards) })
}

export function drawCards(
	deck: Deck,
	count: number
): { drawn: Card[]; remaining: Deck } {
	if (!Number.isInteger(count) || count < 0 || count > deck.cards.length) {
		throw new InsufficientCardsError(
			`Cannot draw ${count} cards, ${deck.cards.length} remaining`,
			{ requested: count, remaining: deck.cards.length }
		)
	}
	return {
		drawn: deck.cards.slice(0, count),
		remaining: Object.freeze({
			version: deck.version,
			cards: Object.freeze(deck.cards.slice(count)),
		}),
	}
}

export function assignOrientations(cards: readonly Card[], rng: Rng): OrientedCard[] {
	return cards.map(card => ({ card, isReversed: rng() < 0.5 }))
}

export function findCard(deck: Deck, name: string): Card {
	const wanted = name.trim().toLowerCase()
	const card = deck.cards.find(c => c.name.toLowerCase() === wanted)
	if (!card) throw new UnknownCardError(name)
	return card
}
