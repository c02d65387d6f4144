import { z } from 'zod'
import { SpreadPositionSchema, SpreadSchema } from '../core/spreads.js'
import { CardRecordSchema, ELEMENTS } from './card.js'
import { InterpretationSchema } from './interpretation.js'

export const QuestionContextSchema = z.object({
	focus: z.string().trim().min(1).max(100),
	question: z.string().trim().min(1).max(1000),
	context: z.record(z.string()).optional(),
})
export type QuestionContext = z.infer<typeof QuestionContextSchema>

export const DrawnCardSchema = z.object({
	position: SpreadPositionSchema,
	card: CardRecordSchema,
	isReversed: z.boolean(),
})
export type DrawnCard = z.infer<typeof DrawnCardSchema>

const count = z.number().int().nonnegative()

const elementCounts = z.object({ Fire: count, Water: count, Air: count, Earth: count })

const suitCounts = z.object({ wands: count, cups: count, swords: count, pentacles: count })

export const PatternInsightsSchema = z.object({
	majorArcanaCount: z.number().int().nonnegative(),
	courtCount: z.number().int().nonnegative(),
	reversedCount: z.number().int().nonnegative(),
	elementCounts,
	suitCounts,
	dominantElement: z.enum(ELEMENTS).nullable(),
	repeatedNumbers: z.array(
		z.object({ number: z.number().int(), count: z.number().int() })
	),
	notes: z.array(z.string()),
})
export type PatternInsights = z.infer<typeof PatternInsightsSchema>

export const RecordedErrorSchema = z.object({
	stage: z.enum(['retrieving', 'generating', 'validating']),
	code: z.string(),
	message: z.string(),
	retryable: z.boolean(),
})
export type RecordedError = z.infer<typeof RecordedErrorSchema>

export const ReadingMetadataSchema = z.object({
	fingerprint: z.string(),
	cacheHit: z.boolean(),
	partialKnowledge: z.boolean(),
	missingKnowledge: z.array(z.string()),
	retrieval: z.array(
		z.object({
			card: z.string(),
			snippetIds: z.array(z.string()),
			topScore: z.number().nullable(),
		})
	),
	insights: PatternInsightsSchema,
	confidence: z.number().min(0).max(1),
	provider: z.string().optional(),
	model: z.string().optional(),
	promptVersion: z.string(),
	attempts: z.number().int().nonnegative(),
	errors: z.array(RecordedErrorSchema),
})
export type ReadingMetadata = z.infer<typeof ReadingMetadataSchema>

export const READING_STATUSES = ['complete', 'degraded'] as const
export type ReadingStatus = (typeof READING_STATUSES)[number]

/** Lifecycle of one request inside the orchestrator. */
export type ReadingStage =
	| 'drafted'
	| 'retrieving'
	| 'generating'
	| 'validating'
	| ReadingStatus
	| 'failed'

export const ReadingSchema = z.object({
	id: z.string().min(1),
	createdAt: z.string().datetime(),
	status: z.enum(READING_STATUSES),
	context: QuestionContextSchema,
	spread: SpreadSchema,
	cards: z.array(DrawnCardSchema).min(1),
	interpretation: z.string(),
	narrative: InterpretationSchema.nullable(),
	metadata: ReadingMetadataSchema,
})
export type Reading = z.infer<typeof ReadingSchema>

/** A reading before any interpretation is attached. */
export type DraftReading = Pick<Reading, 'id' | 'createdAt' | 'context' | 'spread' | 'cards'>
