// src/db/history.ts
import { mkdir, readFile, rename, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { z } from 'zod'
import { DataIntegrityError } from '../types/errors.js'
import { ReadingSchema, type Reading } from '../types/reading.js'
import { logger } from '../util/logger.js'

const HISTORY_VERSION = 1

const HistoryEntrySchema = z.object({
	owner: z.string().optional(),
	reading: ReadingSchema,
})
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>

const HistoryFileSchema = z.object({
	version: z.literal(HISTORY_VERSION),
	readings: z.array(HistoryEntrySchema),
})

export type CardStatistics = {
	card: string
	appearances: number
	reversedCount: number
	positions: Record<string, number>
	focuses: Record<string, number>
}

/** Where completed readings go. */
export interface ReadingSink {
	append(reading: Reading, owner?: string): Promise<void>
}

export class ReadingHistory implements ReadingSink {
	private entries: HistoryEntry[] | null = null
	// serializes file writes
	private writing: Promise<void> = Promise.resolve()

	constructor(
		private readonly path: string,
		private readonly maxEntries = 1000
	) {}

	private async load(): Promise<HistoryEntry[]> {
		if (this.entries) return this.entries

		let raw: string
		try {
			raw = await readFile(this.path, 'utf-8')
		} catch (error) {
			if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
				this.entries = []
				return this.entries
			}
			throw error
		}

		let json: unknown
		try {
			json = JSON.parse(raw)
		} catch (error) {
			throw new DataIntegrityError(`Reading history at ${this.path} is not valid JSON`, [
				error instanceof Error ? error.message : String(error),
			])
		}
		const parsed = HistoryFileSchema.safeParse(json)
		if (!parsed.success) {
			throw new DataIntegrityError(
				`Reading history at ${this.path} has an invalid shape`,
				parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`)
			)
		}
		this.entries = parsed.data.readings
		return this.entries
	}

	private async persist(entries: HistoryEntry[]): Promise<void> {
		await mkdir(dirname(this.path), { recursive: true })
		const tmp = `${this.path}.tmp`
		await writeFile(tmp, JSON.stringify({ version: HISTORY_VERSION, readings: entries }), 'utf-8')
		await rename(tmp, this.path)
	}

	append(reading: Reading, owner?: string): Promise<void> {
		const next = this.writing.then(async () => {
			const entries = await this.load()
			entries.push(owner === undefined ? { reading } : { owner, reading })
			if (entries.length > this.maxEntries) {
				entries.splice(0, entries.length - this.maxEntries)
			}
			await this.persist(entries)
			logger.debug({ readingId: reading.id, total: entries.length }, 'Reading saved to history')
		})
		// keep the chain alive after a failed write; the caller still sees the rejection
		this.writing = next.catch((error: unknown) => {
			logger.error({ err: error, path: this.path }, 'Reading history write failed')
		})
		return next
	}

	/** Newest first. */
	async list(limit = 20, owner?: string): Promise<Reading[]> {
		const entries = await this.load()
		if (limit <= 0) return []
		return entries
			.filter(e => owner === undefined || e.owner === owner)
			.slice(-limit)
			.reverse()
			.map(e => e.reading)
	}

	async cardStatistics(cardName: string, owner?: string): Promise<CardStatistics> {
		const wanted = cardName.trim().toLowerCase()
		const stats: CardStatistics = {
			card: cardName.trim(),
			appearances: 0,
			reversedCount: 0,
			positions: {},
			focuses: {},
		}

		for (const entry of await this.load()) {
			if (owner !== undefined && entry.owner !== owner) continue
			for (const drawn of entry.reading.cards) {
				if (drawn.card.name.toLowerCase() !== wanted) continue
				stats.card = drawn.card.name
				stats.appearances++
				if (drawn.isReversed) stats.reversedCount++
				const position = drawn.position.name
				stats.positions[position] = (stats.positions[position] ?? 0) + 1
				const focus = entry.reading.context.focus
				stats.focuses[focus] = (stats.focuses[focus] ?? 0) + 1
			}
		}
		return stats
	}
}
