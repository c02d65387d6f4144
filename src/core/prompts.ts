// src/core/prompts.ts
import { cardMeaning } from '../types/card.js'
import type { DraftReading, PatternInsights } from '../types/reading.js'
import type { RetrievalResult } from './knowledge.js'
import type { ChatPrompt } from './llm.js'
import { registerPrompt } from './promptVersioning.js'

export const READING_SYSTEM_PROMPT = `You are a thoughtful tarot reader trained in the Golden Dawn tradition.
Read the cards as a whole story, position by position, grounded in their
traditional meanings and correspondences. Speak plainly and warmly.
Never predict death, illness or disaster. Never give medical, legal or
financial instructions. Frame the reading as reflection, not fate.`

const RESPONSE_FORMAT = `Respond with one JSON object:
{
  "summary": "2-4 sentences on the spread as a whole",
  "positions": [{ "position": "position name", "card": "card name", "interpretation": "2-4 sentences" }],
  "advice": ["up to 5 short, concrete suggestions"],
  "reflective_question": "one open question for the querent"
}
"positions" must hold exactly one entry per card, in the order given.`

const systemPrompt = registerPrompt('reading.system', READING_SYSTEM_PROMPT, {
	kind: 'system',
})
const formatPrompt = registerPrompt('reading.format', RESPONSE_FORMAT, { kind: 'format' })

/** Combined version tag recorded in reading metadata. */
export const READING_PROMPT_VERSION = `${systemPrompt.version}+${formatPrompt.version}`

export type RetrievedContext = {
	byCard: ReadonlyMap<string, RetrievalResult[]>
	question: RetrievalResult[]
}

export type PromptOptions = {
	retrieved?: RetrievedContext
	insights?: PatternInsights
	/** Shortened prompt for the retry attempt: no retrieved context, no correspondences. */
	short?: boolean
}

function header(draft: DraftReading): string[] {
	const lines = [
		`Spread: ${draft.spread.name}`,
		`Focus: ${draft.context.focus}`,
		`Question: ${draft.context.question}`,
	]
	const extra = Object.entries(draft.context.context ?? {})
	if (extra.length > 0) {
		lines.push('Context:')
		for (const [key, value] of extra) lines.push(`- ${key}: ${value}`)
	}
	return lines
}

function snippetLines(results: RetrievalResult[], indent: string): string[] {
	return results.map(r => `${indent}- [${r.source}] ${r.text}`)
}

export function buildReadingPrompt(draft: DraftReading, options: PromptOptions = {}): ChatPrompt {
	const { retrieved, insights, short = false } = options
	const lines = header(draft)

	lines.push('', 'Cards:')
	draft.cards.forEach((drawn, i) => {
		const { card, isReversed, position } = drawn
		lines.push(`${i + 1}. ${position.name}: ${card.name}${isReversed ? ' (reversed)' : ''}`)
		if (!short && position.description) lines.push(`   Position: ${position.description}`)
		lines.push(`   Keywords: ${card.keywords.join(', ')}`)
		lines.push(`   Meaning: ${cardMeaning(card, isReversed)}`)
		if (short) return

		if (card.enhancedMeaning) lines.push(`   Notes: ${card.enhancedMeaning}`)
		const c = card.correspondences
		const decan = c.decan ? `; decan ${c.decan}` : ''
		lines.push(`   Correspondences: ${c.title}; ${c.astrological}; ${c.kabbalistic}${decan}`)

		const snippets = retrieved?.byCard.get(card.name) ?? []
		if (snippets.length > 0) {
			lines.push('   Knowledge:')
			lines.push(...snippetLines(snippets, '   '))
		}
	})

	if (!short && retrieved && retrieved.question.length > 0) {
		lines.push('', 'Knowledge related to the question:')
		lines.push(...snippetLines(retrieved.question, ''))
	}

	if (!short && insights && insights.notes.length > 0) {
		lines.push('', 'Patterns in the spread:')
		for (const note of insights.notes) lines.push(`- ${note}`)
	}

	lines.push('', formatPrompt.content)

	return { system: systemPrompt.content, user: lines.join('\n') }
}
