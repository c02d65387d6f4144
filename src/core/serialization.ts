// src/core/serialization.ts
import { cardMeaning } from '../types/card.js'
import { ValidationError } from '../types/errors.js'
import type { Interpretation } from '../types/interpretation.js'
import { ReadingSchema, type DraftReading, type Reading } from '../types/reading.js'

export function serializeReading(reading: Reading): string {
	return JSON.stringify(reading)
}

export function parseReading(text: string): Reading {
	let json: unknown
	try {
		json = JSON.parse(text)
	} catch (error) {
		throw new ValidationError('Reading is not valid JSON', {
			reason: error instanceof Error ? error.message : String(error),
		})
	}
	const parsed = ReadingSchema.safeParse(json)
	if (!parsed.success) {
		throw new ValidationError('Reading has an invalid shape', {
			issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
		})
	}
	return parsed.data
}

const cardLine = ({ position, card, isReversed }: DraftReading['cards'][number]) =>
	`${position.name}: ${card.name}${isReversed ? ' (reversed)' : ''}`

/** Interpretation built from the static card meanings alone. */
export function staticInterpretation(draft: Pick<DraftReading, 'cards'>): string {
	return draft.cards
		.map(drawn => `${cardLine(drawn)}. ${cardMeaning(drawn.card, drawn.isReversed)}`)
		.join('\n')
}

export function renderReading(reading: Reading): string {
	const lines = [
		`${reading.spread.name} reading (${reading.context.focus})`,
		`Question: ${reading.context.question}`,
		'',
	]

	const { narrative } = reading
	if (narrative) {
		lines.push(narrative.summary, '')
		reading.cards.forEach((drawn, i) => {
			lines.push(`${i + 1}. ${cardLine(drawn)}`)
			const entry = narrative.positions[i]
			if (entry) lines.push(`   ${entry.interpretation}`)
		})
		if (narrative.advice.length > 0) {
			lines.push('', 'Advice:')
			for (const item of narrative.advice) lines.push(`- ${item}`)
		}
		if (narrative.reflective_question) {
			lines.push('', `To reflect on: ${narrative.reflective_question}`)
		}
	} else {
		lines.push(reading.interpretation)
	}

	if (reading.metadata.insights.notes.length > 0) {
		lines.push('', 'Patterns:')
		for (const note of reading.metadata.insights.notes) lines.push(`- ${note}`)
	}

	if (reading.status === 'degraded') {
		lines.push('', 'The interpreter was unavailable; this reading uses the traditional card meanings.')
	}

	return lines.join('\n')
}

/** Flat text form of a structured narrative. */
export function narrativeText(narrative: Interpretation): string {
	const parts = [narrative.summary]
	for (const entry of narrative.positions) {
		parts.push(`${entry.position} (${entry.card}): ${entry.interpretation}`)
	}
	if (narrative.advice.length > 0) parts.push(narrative.advice.map(a => `- ${a}`).join('\n'))
	if (narrative.reflective_question) parts.push(narrative.reflective_question)
	return parts.join('\n\n')
}
