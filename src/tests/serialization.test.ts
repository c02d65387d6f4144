import { beforeAll, describe, expect, it } from 'vitest'
import { findCard, type Deck } from '../core/deck.js'
import {
	narrativeText,
	parseReading,
	renderReading,
	serializeReading,
	staticInterpretation,
} from '../core/serialization.js'
import { ValidationError } from '../types/errors.js'
import { loadTestDeck, makeReading, sampleNarrative } from './fixtures.js'

let deck: Deck

beforeAll(async () => {
	deck = await loadTestDeck()
})

const sample = {
	focus: 'love',
	question: 'Where is this going?',
	cards: [
		{ position: 'Me', card: 'The Tower', reversed: true },
		{ position: 'You', card: 'The Star' },
	],
}

describe('reading serialization', () => {
	it('parses what it serializes', () => {
		const reading = makeReading(deck, sample)
		expect(parseReading(serializeReading(reading))).toEqual(reading)
	})

	it('rejects text that is not a reading', () => {
		expect(() => parseReading('not json')).toThrow('Reading is not valid JSON')
		expect(() => parseReading('{}')).toThrow(ValidationError)
		expect(() => parseReading('{}')).toThrow('Reading has an invalid shape')
	})
})

describe('text forms', () => {
	it('lists the static meanings', () => {
		const reading = makeReading(deck, { ...sample, status: 'degraded' })
		expect(staticInterpretation(reading)).toBe(
			[
				`Me: The Tower (reversed). ${findCard(deck, 'The Tower').reversed}`,
				`You: The Star. ${findCard(deck, 'The Star').upright}`,
			].join('\n')
		)
	})

	it('flattens a narrative', () => {
		const reading = makeReading(deck, sample)
		expect(narrativeText(sampleNarrative(reading.cards))).toBe(
			[
				'A turning point.',
				'Me (The Tower): The Tower speaks to this.',
				'You (The Star): The Star speaks to this.',
				'- Breathe before acting.',
				'What are you ready to release?',
			].join('\n\n')
		)
	})

	it('renders a complete reading', () => {
		expect(renderReading(makeReading(deck, sample))).toBe(
			[
				'Custom reading (love)',
				'Question: Where is this going?',
				'',
				'A turning point.',
				'',
				'1. Me: The Tower (reversed)',
				'   The Tower speaks to this.',
				'2. You: The Star',
				'   The Star speaks to this.',
				'',
				'Advice:',
				'- Breathe before acting.',
				'',
				'To reflect on: What are you ready to release?',
				'',
				'Patterns:',
				'- Major Arcana dominate (2 of 2): larger forces are at work',
			].join('\n')
		)
	})

	it('renders a degraded reading with a note', () => {
		const reading = makeReading(deck, { ...sample, status: 'degraded' })
		const lines = renderReading(reading).split('\n')
		expect(lines.slice(0, 5)).toEqual([
			'Custom reading (love)',
			'Question: Where is this going?',
			'',
			`Me: The Tower (reversed). ${findCard(deck, 'The Tower').reversed}`,
			`You: The Star. ${findCard(deck, 'The Star').upright}`,
		])
		expect(lines.at(-1)).toBe(
			'The interpreter was unavailable; this reading uses the traditional card meanings.'
		)
	})
})
