// src/core/insights.ts
import { ELEMENTS, isCourt, type Card, type Element } from '../types/card.js'
import type { PatternInsights } from '../types/reading.js'

type Oriented = { card: Card; isReversed: boolean }

const NUMBER_WORDS: Record<number, string> = {
	1: 'Ace',
	2: 'Two',
	3: 'Three',
	4: 'Four',
	5: 'Five',
	6: 'Six',
	7: 'Seven',
	8: 'Eight',
	9: 'Nine',
	10: 'Ten',
}

function dominant(counts: Record<Element, number>, total: number): Element | null {
	const ranked = ELEMENTS.map(el => ({ el, n: counts[el] })).sort((a, b) => b.n - a.n)
	const [first, second] = ranked
	if (!first || first.n === 0) return null
	if (second && second.n === first.n) return null
	return first.n * 2 >= total ? first.el : null
}

/** Structural patterns of a spread. Pure; no model involved. */
export function analyzePatterns(cards: readonly Oriented[]): PatternInsights {
	const total = cards.length
	const elementCounts = { Fire: 0, Water: 0, Air: 0, Earth: 0 }
	const suitCounts = { wands: 0, cups: 0, swords: 0, pentacles: 0 }
	const numbers = new Map<number, number>()
	let majorArcanaCount = 0
	let courtCount = 0
	let reversedCount = 0

	for (const { card, isReversed } of cards) {
		elementCounts[card.element]++
		if (isReversed) reversedCount++
		if (card.suit === null) {
			majorArcanaCount++
			continue
		}
		suitCounts[card.suit]++
		if (isCourt(card)) {
			courtCount++
		} else {
			numbers.set(card.number, (numbers.get(card.number) ?? 0) + 1)
		}
	}

	const repeatedNumbers = [...numbers]
		.filter(([, count]) => count >= 2)
		.sort(([a], [b]) => a - b)
		.map(([number, count]) => ({ number, count }))

	const dominantElement = dominant(elementCounts, total)

	const notes: string[] = []
	if (total > 1 && majorArcanaCount * 2 > total) {
		notes.push(
			`Major Arcana dominate (${majorArcanaCount} of ${total}): larger forces are at work`
		)
	}
	if (total > 1 && dominantElement) {
		notes.push(`${dominantElement} is the dominant element (${elementCounts[dominantElement]} of ${total})`)
	}
	if (total > 1 && reversedCount * 2 > total) {
		notes.push(`Most cards are reversed (${reversedCount} of ${total}): energy is blocked or inward`)
	}
	if (courtCount >= 2) {
		notes.push(`${courtCount} court cards: other people play a strong part`)
	}
	for (const { number, count } of repeatedNumbers) {
		notes.push(`${NUMBER_WORDS[number] ?? number} appears ${count} times`)
	}

	return {
		majorArcanaCount,
		courtCount,
		reversedCount,
		elementCounts,
		suitCounts,
		dominantElement,
		repeatedNumbers,
		notes,
	}
}
