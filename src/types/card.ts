import { z } from 'zod'

export const MINOR_SUITS = ['wands', 'cups', 'swords', 'pentacles'] as const
export type MinorSuit = (typeof MINOR_SUITS)[number]

export const SUIT_ELEMENTS: Record<MinorSuit, Element> = {
	wands: 'Fire',
	cups: 'Water',
	swords: 'Air',
	pentacles: 'Earth',
}

export const ELEMENTS = ['Fire', 'Water', 'Air', 'Earth'] as const
export type Element = (typeof ELEMENTS)[number]

export const CorrespondencesSchema = z.object({
	astrological: z.string().min(1),
	kabbalistic: z.string().min(1),
	decan: z.string().min(1).nullable().default(null),
	title: z.string().min(1),
	symbolism: z.array(z.string().min(1)).default([]),
})

export type Correspondences = z.infer<typeof CorrespondencesSchema>

export const CardRecordSchema = z.object({
	name: z.string().trim().min(1),
	number: z.number().int().min(0).max(21),
	// older corpus revisions tag the trumps with "major"
	suit: z
		.enum([...MINOR_SUITS, 'major'])
		.nullable()
		.transform(suit => (suit === 'major' ? null : suit)),
	element: z.enum(ELEMENTS),
	keywords: z
		.array(z.string().trim().min(1))
		.min(1)
		.refine(kw => new Set(kw).size === kw.length, 'keywords must be distinct'),
	upright: z.string().min(1),
	reversed: z.string().min(1),
	enhancedMeaning: z.string().min(1).optional(),
	embedding: z.array(z.number()).min(1).optional(),
	correspondences: CorrespondencesSchema,
})

export type Card = Readonly<z.infer<typeof CardRecordSchema>>

export const CorpusSchema = z.object({
	version: z.string().min(1),
	cards: z.array(z.unknown()),
})

export type Corpus = {
	version: string
	cards: Card[]
}

export function isCourt(card: Card): boolean {
	return card.suit !== null && card.number >= 11
}

export function cardMeaning(card: Card, isReversed: boolean): string {
	return isReversed ? card.reversed : card.upright
}
