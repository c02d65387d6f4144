// src/core/scheduler.ts
import cron, { type ScheduledTask } from 'node-cron'

import { logger } from '../util/logger.js'
import type { InterpretationCache } from './cache.js'
import type { RateLimiter } from './rateLimiter.js'
import type { TokenTracker } from './tokenTracking.js'

export type HousekeepingDeps<V> = {
	cache: InterpretationCache<V>
	/** Snapshot target; no snapshot job without it. */
	cachePersistPath: string | null
	rateLimiter: RateLimiter
	tokenTracker: TokenTracker
}

export const SCHEDULES = {
	cacheSnapshot: '*/15 * * * *',
	cleanup: '*/10 * * * *',
	usageRetention: '0 3 * * *',
} as const

export async function runCacheSnapshot<V>(
	cache: InterpretationCache<V>,
	path: string
): Promise<void> {
	try {
		const saved = await cache.snapshot(path)
		logger.info({ path, saved }, 'Interpretation cache snapshot written')
	} catch (e) {
		logger.error({ err: e, path }, 'Interpretation cache snapshot failed')
	}
}

export function runCleanup<V>(deps: HousekeepingDeps<V>): void {
	const expired = deps.cache.prune()
	const limits = deps.rateLimiter.cleanup()
	if (expired > 0 || limits > 0) {
		logger.debug({ expired, limits }, 'Housekeeping tick')
	}
}

/** Registers the cron jobs. Stop the returned tasks on shutdown. */
export function startScheduler<V>(deps: HousekeepingDeps<V>): ScheduledTask[] {
	const tasks: ScheduledTask[] = []
	const { cachePersistPath } = deps

	if (cachePersistPath) {
		tasks.push(
			cron.schedule(SCHEDULES.cacheSnapshot, () => runCacheSnapshot(deps.cache, cachePersistPath))
		)
	}

	tasks.push(cron.schedule(SCHEDULES.cleanup, () => runCleanup(deps)))
	tasks.push(
		cron.schedule(SCHEDULES.usageRetention, () => deps.tokenTracker.cleanupOldUsageData())
	)

	logger.info({ jobs: tasks.length }, 'Scheduler started')
	return tasks
}
