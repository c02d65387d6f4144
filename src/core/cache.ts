// src/core/cache.ts
import { mkdir, readFile, rename, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { z } from 'zod'
import { logger } from '../util/logger.js'
import { trackCacheEvent } from '../util/metrics.js'

type Entry<V> = { value: V; expiresAt: number }

export type CacheSource = 'hit' | 'computed' | 'coalesced'

export type CacheOptions<V> = {
	maxEntries: number
	ttlMs: number
	/** Tags snapshots; a snapshot with another version is discarded on restore. */
	version: string
	/** Validates values read back from a snapshot. */
	schema: z.ZodType<V, z.ZodTypeDef, unknown>
	now?: () => number
}

const SnapshotSchema = z.object({
	version: z.string(),
	savedAt: z.string(),
	entries: z.array(
		z.object({ key: z.string(), expiresAt: z.number(), value: z.unknown() })
	),
})

/**
 * Bounded LRU with TTL. Concurrent resolves of one key share a single
 * computation; only results flagged cacheable are stored.
 */
export class InterpretationCache<V> {
	// Map keeps insertion order: first key is least recently used
	private readonly entries = new Map<string, Entry<V>>()
	private readonly inflight = new Map<string, Promise<{ value: V; cacheable: boolean }>>()
	private readonly now: () => number

	constructor(private readonly opts: CacheOptions<V>) {
		this.now = opts.now ?? Date.now
	}

	get size(): number {
		return this.entries.size
	}

	get version(): string {
		return this.opts.version
	}

	get(key: string): V | undefined {
		const entry = this.entries.get(key)
		if (!entry) return undefined
		if (entry.expiresAt <= this.now()) {
			this.entries.delete(key)
			return undefined
		}
		this.entries.delete(key)
		this.entries.set(key, entry)
		return entry.value
	}

	set(key: string, value: V): void {
		this.entries.delete(key)
		this.entries.set(key, { value, expiresAt: this.now() + this.opts.ttlMs })
		while (this.entries.size > this.opts.maxEntries) {
			const oldest = this.entries.keys().next()
			if (oldest.done) break
			this.entries.delete(oldest.value)
			trackCacheEvent('evicted')
		}
	}

	delete(key: string): boolean {
		return this.entries.delete(key)
	}

	clear(): void {
		this.entries.clear()
	}

	async resolve(
		key: string,
		compute: () => Promise<{ value: V; cacheable: boolean }>
	): Promise<{ value: V; source: CacheSource }> {
		const hit = this.get(key)
		if (hit !== undefined) {
			trackCacheEvent('hit')
			return { value: hit, source: 'hit' }
		}

		const pending = this.inflight.get(key)
		if (pending) {
			trackCacheEvent('coalesced')
			const shared = await pending
			return { value: shared.value, source: 'coalesced' }
		}

		trackCacheEvent('miss')
		const run = compute()
			.then(result => {
				if (result.cacheable) this.set(key, result.value)
				return result
			})
			.finally(() => {
				this.inflight.delete(key)
			})
		this.inflight.set(key, run)

		const result = await run
		return { value: result.value, source: 'computed' }
	}

	/** Drops expired entries. Returns how many were removed. */
	prune(): number {
		const now = this.now()
		let removed = 0
		for (const [key, entry] of this.entries) {
			if (entry.expiresAt <= now) {
				this.entries.delete(key)
				removed++
			}
		}
		return removed
	}

	async snapshot(path: string): Promise<number> {
		this.prune()
		const data = {
			version: this.opts.version,
			savedAt: new Date(this.now()).toISOString(),
			entries: [...this.entries].map(([key, entry]) => ({
				key,
				expiresAt: entry.expiresAt,
				value: entry.value,
			})),
		}
		await mkdir(dirname(path), { recursive: true })
		const tmp = `${path}.tmp`
		await writeFile(tmp, JSON.stringify(data), 'utf-8')
		await rename(tmp, path)
		logger.debug({ path, entries: data.entries.length }, 'Interpretation cache saved')
		return data.entries.length
	}

	/** Loads a snapshot written by snapshot(). Returns how many entries were kept. */
	async restore(path: string): Promise<number> {
		let raw: string
		try {
			raw = await readFile(path, 'utf-8')
		} catch (error) {
			if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return 0
			throw error
		}

		let json: unknown
		try {
			json = JSON.parse(raw)
		} catch (error) {
			logger.warn({ err: error, path }, 'Interpretation cache snapshot unreadable, ignored')
			return 0
		}

		const parsed = SnapshotSchema.safeParse(json)
		if (!parsed.success) {
			logger.warn({ path }, 'Interpretation cache snapshot has an invalid shape, ignored')
			return 0
		}
		if (parsed.data.version !== this.opts.version) {
			logger.info(
				{ path, snapshotVersion: parsed.data.version, version: this.opts.version },
				'Interpretation cache snapshot is for another corpus version, discarded'
			)
			return 0
		}

		const now = this.now()
		let restored = 0
		for (const entry of parsed.data.entries) {
			if (entry.expiresAt <= now) continue
			const value = this.opts.schema.safeParse(entry.value)
			if (!value.success) continue
			this.entries.delete(entry.key)
			this.entries.set(entry.key, { value: value.data, expiresAt: entry.expiresAt })
			restored++
		}
		while (this.entries.size > this.opts.maxEntries) {
			const oldest = this.entries.keys().next()
			if (oldest.done) break
			this.entries.delete(oldest.value)
		}
		return restored
	}
}
