// src/core/validation.ts
import type { DraftReading } from '../types/reading.js'
import { extractJsonObject, type GenerationResult } from './llm.js'

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object'

export type StructuredExpectation = {
	requiredFields: Readonly<Record<string, FieldType>>
	/** Array field that must hold one entry per drawn card. */
	perCardField?: string
}

export type ValidationOutcome = { valid: boolean; issues: string[] }

const PLACEHOLDER_PATTERNS: ReadonlyArray<[RegExp, string]> = [
	[/\{\{[^}]*\}\}/, 'template braces'],
	[/\[\s*insert[^\]]*\]/i, '[insert ...] placeholder'],
	[/<\s*placeholder\s*>/i, '<placeholder> tag'],
	[/\[\s*card name\s*\]/i, '[card name] placeholder'],
	[/\[\s*position\s*\]/i, '[position] placeholder'],
	[/\bTODO\b/, 'TODO marker'],
	[/lorem ipsum/i, 'lorem ipsum filler'],
]

const BARE_NOTHING = /^(undefined|null|none|n\/a)$/i

function typeOf(value: unknown): FieldType | 'null' | 'undefined' | 'other' {
	if (value === null) return 'null'
	if (value === undefined) return 'undefined'
	if (Array.isArray(value)) return 'array'
	const t = typeof value
	if (t === 'string' || t === 'number' || t === 'boolean' || t === 'object') return t
	return 'other'
}

/**
 * Structural gate for model output. Says nothing about whether the
 * interpretation is any good.
 */
export function validate(
	result: GenerationResult,
	reading: Pick<DraftReading, 'cards'>,
	expectation?: StructuredExpectation
): ValidationOutcome {
	const issues: string[] = []
	const text = result.text.trim()

	if (!text) {
		return { valid: false, issues: ['output is empty'] }
	}
	if (BARE_NOTHING.test(text)) {
		issues.push(`output is a bare "${text}"`)
	}
	for (const [pattern, label] of PLACEHOLDER_PATTERNS) {
		if (pattern.test(text)) issues.push(`output contains ${label}`)
	}

	if (expectation) {
		const json = extractJsonObject(text)
		if (typeOf(json) !== 'object') {
			issues.push('structured output is not a JSON object')
		} else if (typeof json === 'object' && json !== null) {
			const record: Record<string, unknown> = { ...json }
			for (const [field, expected] of Object.entries(expectation.requiredFields)) {
				const actual = typeOf(record[field])
				if (actual === 'undefined') {
					issues.push(`missing field "${field}"`)
				} else if (actual !== expected) {
					issues.push(`field "${field}" should be ${expected}, got ${actual}`)
				} else if (expected === 'string' && String(record[field]).trim() === '') {
					issues.push(`field "${field}" is empty`)
				}
			}

			if (expectation.perCardField) {
				const entries = record[expectation.perCardField]
				if (Array.isArray(entries) && entries.length !== reading.cards.length) {
					issues.push(
						`"${expectation.perCardField}" has ${entries.length} entries for ${reading.cards.length} cards`
					)
				}
			}
		}
	}

	return { valid: issues.length === 0, issues }
}
