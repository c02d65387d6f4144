import { beforeAll, describe, expect, it } from 'vitest'
import { findCard, type Deck } from '../core/deck.js'
import { analyzePatterns } from '../core/insights.js'
import { loadTestDeck } from './fixtures.js'

let deck: Deck

beforeAll(async () => {
	deck = await loadTestDeck()
})

const draw = (...specs: Array<[name: string, isReversed?: boolean]>) =>
	specs.map(([name, isReversed = false]) => ({ card: findCard(deck, name), isReversed }))

describe('analyzePatterns', () => {
	it('finds a dominant element and repeated numbers', () => {
		const insights = analyzePatterns(
			draw(['Three of Wands'], ['Three of Cups'], ['Knight of Wands'])
		)
		expect(insights.elementCounts).toEqual({ Fire: 2, Water: 1, Air: 0, Earth: 0 })
		expect(insights.suitCounts).toEqual({ wands: 2, cups: 1, swords: 0, pentacles: 0 })
		expect(insights.dominantElement).toBe('Fire')
		expect(insights.courtCount).toBe(1)
		expect(insights.repeatedNumbers).toEqual([{ number: 3, count: 2 }])
		expect(insights.notes).toEqual([
			'Fire is the dominant element (2 of 3)',
			'Three appears 2 times',
		])
	})

	it('notes a spread of reversed trumps', () => {
		const insights = analyzePatterns(
			draw(['The Tower', true], ['The Star', true], ['The Moon', true])
		)
		expect(insights.majorArcanaCount).toBe(3)
		expect(insights.reversedCount).toBe(3)
		expect(insights.dominantElement).toBeNull()
		expect(insights.suitCounts).toEqual({ wands: 0, cups: 0, swords: 0, pentacles: 0 })
		expect(insights.notes).toEqual([
			'Major Arcana dominate (3 of 3): larger forces are at work',
			'Most cards are reversed (3 of 3): energy is blocked or inward',
		])
	})

	it('points out several court cards', () => {
		const insights = analyzePatterns(draw(['Queen of Cups'], ['King of Swords']))
		expect(insights.dominantElement).toBeNull()
		expect(insights.repeatedNumbers).toEqual([])
		expect(insights.notes).toEqual(['2 court cards: other people play a strong part'])
	})

	it('keeps quiet about a single card', () => {
		const insights = analyzePatterns(draw(['The Sun', true]))
		expect(insights.dominantElement).toBe('Fire')
		expect(insights.reversedCount).toBe(1)
		expect(insights.notes).toEqual([])
	})
})
