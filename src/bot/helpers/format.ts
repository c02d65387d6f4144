// src/bot/helpers/format.ts
import type { CardStatistics } from '../../db/history.js'
import type { CorrespondenceRecord } from '../../core/knowledge.js'
import type { Reading } from '../../types/reading.js'

// Telegram caps a message at 4096 characters
export const MESSAGE_LIMIT = 4000

/** Escape for Telegram HTML parse mode */
export const esc = (s: string) =>
	s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')

/** Escapes and shortens so the escaped result fits in `limit`; entities are never cut. */
export function escTruncate(text: string, limit: number): string {
	const escaped = esc(text)
	if (escaped.length <= limit) return escaped
	let out = ''
	for (const ch of text) {
		const piece = esc(ch)
		if (out.length + piece.length > limit - 1) break
		out += piece
	}
	return `${out}…`
}

// Longest escaped body of one part; leaves room for its heading
const PART_BODY_LIMIT = 3500
const NAME_LIMIT = 100

/** Joins parts into as few messages as fit, splitting only between parts. */
export function packMessages(parts: string[], limit = MESSAGE_LIMIT): string[] {
	const messages: string[] = []
	let current = ''
	for (const part of parts) {
		if (current && current.length + 2 + part.length > limit) {
			messages.push(current)
			current = ''
		}
		current = current ? `${current}\n\n${part}` : part
	}
	if (current) messages.push(current)
	return messages
}

const cardTitle = (name: string, isReversed: boolean) =>
	`${escTruncate(name, NAME_LIMIT)}${isReversed ? ' <i>(reversed)</i>' : ''}`

const positionPart = (drawn: Reading['cards'][number], text: string) =>
	`<b>${escTruncate(drawn.position.name, NAME_LIMIT)}:</b> ${cardTitle(drawn.card.name, drawn.isReversed)}\n${escTruncate(text, PART_BODY_LIMIT)}`

export function formatReadingHtml(reading: Reading): string[] {
	const parts: string[] = [
		`<b>${escTruncate(reading.spread.name, NAME_LIMIT)}</b> · ${escTruncate(reading.context.focus, NAME_LIMIT)}`,
		`<i>${escTruncate(reading.context.question, PART_BODY_LIMIT)}</i>`,
	]

	const { narrative } = reading
	if (narrative) {
		parts.push(escTruncate(narrative.summary, PART_BODY_LIMIT))
		reading.cards.forEach((drawn, i) => {
			parts.push(positionPart(drawn, narrative.positions[i]?.interpretation ?? ''))
		})
		if (narrative.advice.length > 0) {
			const advice = narrative.advice.map((a, i) => `${i + 1}. ${a}`).join('\n')
			parts.push(`<b>Advice:</b>\n${escTruncate(advice, PART_BODY_LIMIT)}`)
		}
		if (narrative.reflective_question) {
			parts.push(`<b>To reflect on:</b> ${escTruncate(narrative.reflective_question, PART_BODY_LIMIT)}`)
		}
	} else {
		for (const drawn of reading.cards) {
			parts.push(positionPart(drawn, drawn.isReversed ? drawn.card.reversed : drawn.card.upright))
		}
		parts.push('<i>The interpreter is resting; these are the traditional meanings.</i>')
	}

	return packMessages(parts)
}

export function formatCardHtml(record: CorrespondenceRecord): string {
	const lines = [
		`<b>${esc(record.card)}</b>`,
		`<i>${esc(record.title)}</i>`,
		'',
		`Element: ${esc(record.element)}`,
		`Astrology: ${esc(record.astrological)}`,
		`Tree of Life: ${esc(record.kabbalistic)}`,
	]
	if (record.decan) lines.push(`Decan: ${esc(record.decan)}`)
	lines.push(`Keywords: ${esc(record.keywords.join(', '))}`)
	if (record.symbolism.length > 0) lines.push(`Symbols: ${esc(record.symbolism.join(', '))}`)
	return lines.join('\n')
}

export function formatStatsLine(stats: CardStatistics): string {
	if (stats.appearances === 0) return 'Not drawn in your readings yet.'
	return `Drawn ${stats.appearances} time(s) in your readings, reversed ${stats.reversedCount}.`
}

export function formatHistoryHtml(readings: Reading[]): string {
	if (readings.length === 0) return 'No readings yet. Try /reading.'
	const rows = readings.map((r, i) => {
		const date = r.createdAt.slice(0, 10)
		const cards = r.cards.map(c => `${c.card.name}${c.isReversed ? ' ℞' : ''}`).join(', ')
		return `${i + 1}. ${date} <b>${escTruncate(r.spread.name, NAME_LIMIT)}</b> · ${escTruncate(r.context.focus, NAME_LIMIT)}\n${escTruncate(cards, PART_BODY_LIMIT)}`
	})
	// older rows that do not fit are dropped
	const [first] = packMessages(['<b>Recent readings</b>', ...rows])
	return first
}
