import { z } from 'zod'
import { ValidationError } from '../types/errors.js'

export const SPREAD_TYPES = [
	'single',
	'three_card',
	'celtic_cross',
	'horseshoe',
	'custom',
] as const

export const SpreadTypeSchema = z.enum(SPREAD_TYPES)
export type SpreadType = z.infer<typeof SpreadTypeSchema>

export const MAX_CUSTOM_POSITIONS = 10

export const SpreadPositionSchema = z.object({
	index: z.number().int().nonnegative(),
	name: z.string().min(1),
	description: z.string(),
})
export type SpreadPosition = z.infer<typeof SpreadPositionSchema>

export const SpreadSchema = z.object({
	type: SpreadTypeSchema,
	name: z.string().min(1),
	positions: z.array(SpreadPositionSchema).min(1),
})
export type Spread = z.infer<typeof SpreadSchema>

type Layout = { name: string; positions: Array<[name: string, description: string]> }

const LAYOUTS: Record<Exclude<SpreadType, 'custom'>, Layout> = {
	single: {
		name: 'Single Card',
		positions: [['Focus', 'The heart of the matter']],
	},
	three_card: {
		name: 'Three Card',
		positions: [
			['Past', 'What shaped the situation'],
			['Present', 'Where things stand now'],
			['Future', 'The direction things are moving'],
		],
	},
	celtic_cross: {
		name: 'Celtic Cross',
		positions: [
			['Present', 'The situation as it is'],
			['Challenge', 'What crosses the situation'],
			['Foundation', 'The root beneath it'],
			['Recent Past', 'What is passing away'],
			['Crown', 'The best that can be achieved'],
			['Near Future', 'What approaches'],
			['Self', 'The querent in this matter'],
			['Environment', 'Surrounding people and forces'],
			['Hopes and Fears', 'What is wished for or dreaded'],
			['Outcome', 'Where the matter tends'],
		],
	},
	horseshoe: {
		name: 'Horseshoe',
		positions: [
			['Past', 'Influences from the past'],
			['Present', 'Current circumstances'],
			['Hidden Influences', 'What is not yet seen'],
			['Obstacles', 'What stands in the way'],
			['External Influences', 'Other people and outside forces'],
			['Advice', 'Suggested approach'],
			['Outcome', 'Likely result'],
		],
	},
}

const toPositions = (entries: Array<[string, string]>): SpreadPosition[] =>
	entries.map(([name, description], index) => ({ index, name, description }))

/**
 * Resolves a layout. A custom spread takes its position names from the
 * caller and must name between 1 and MAX_CUSTOM_POSITIONS distinct slots.
 */
export function resolveSpread(type: SpreadType, customPositions?: string[]): Spread {
	if (type !== 'custom') {
		const layout = LAYOUTS[type]
		return { type, name: layout.name, positions: toPositions(layout.positions) }
	}

	const names = (customPositions ?? []).map(n => n.trim()).filter(Boolean)
	if (names.length === 0 || names.length > MAX_CUSTOM_POSITIONS) {
		throw new ValidationError(
			`Custom spread needs 1-${MAX_CUSTOM_POSITIONS} positions, got ${names.length}`,
			{ positions: names.length }
		)
	}
	if (new Set(names.map(n => n.toLowerCase())).size !== names.length) {
		throw new ValidationError('Custom spread positions must be distinct', {
			positions: names,
		})
	}

	return {
		type,
		name: 'Custom',
		positions: toPositions(names.map((n): [string, string] => [n, ''])),
	}
}

export function spreadLabel(type: SpreadType): string {
	return type === 'custom' ? 'Custom' : LAYOUTS[type].name
}
