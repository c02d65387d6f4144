// src/core/rateLimiter.ts
import { RateLimitError } from '../types/errors.js'
import { config } from '../util/config.js'
import { logger } from '../util/logger.js'
import { trackRateLimit } from '../util/metrics.js'

type Limit = { maxRequests: number; windowMs: number }

export type RateLimitFeature = 'reading' | 'card'

export type RateLimitStats = {
	used: number
	max: number
	remaining: number
	windowMs: number
	resetsAt: Date | null
}

export const DEFAULT_LIMITS: Record<RateLimitFeature, Limit> = {
	reading: { maxRequests: config.READING_RATE_LIMIT_PER_MINUTE, windowMs: 60_000 },
	card: { maxRequests: 30, windowMs: 60_000 },
}

/** Sliding window per client key and feature. */
export class RateLimiter {
	private readonly requests = new Map<string, number[]>()

	constructor(
		private readonly limits: Record<RateLimitFeature, Limit> = DEFAULT_LIMITS,
		private readonly now: () => number = Date.now
	) {}

	private inWindow(key: string, windowMs: number, now: number): number[] {
		return (this.requests.get(key) ?? []).filter(ts => now - ts < windowMs)
	}

	check(clientId: string, feature: RateLimitFeature, isAdmin = false): void {
		if (isAdmin) {
			logger.debug({ clientId, feature }, 'Rate limit bypassed for admin')
			return
		}

		const key = `${clientId}:${feature}`
		const limit = this.limits[feature]
		const now = this.now()
		const recent = this.inWindow(key, limit.windowMs, now)

		if (recent.length >= limit.maxRequests) {
			this.requests.set(key, recent)
			trackRateLimit(feature)
			logger.warn(
				{ clientId, feature, currentRequests: recent.length, ...limit },
				'Rate limit exceeded'
			)
			throw new RateLimitError(`Rate limit exceeded for ${feature}`, {
				clientId,
				feature,
				limit: limit.maxRequests,
				windowMs: limit.windowMs,
			})
		}

		recent.push(now)
		this.requests.set(key, recent)
	}

	stats(clientId: string, feature: RateLimitFeature): RateLimitStats {
		const limit = this.limits[feature]
		const recent = this.inWindow(`${clientId}:${feature}`, limit.windowMs, this.now())
		return {
			used: recent.length,
			max: limit.maxRequests,
			remaining: Math.max(0, limit.maxRequests - recent.length),
			windowMs: limit.windowMs,
			resetsAt: recent.length > 0 ? new Date(Math.min(...recent) + limit.windowMs) : null,
		}
	}

	/** Drops keys with no requests left in their window. Returns how many. */
	cleanup(): number {
		const now = this.now()
		const longest = Math.max(...Object.values(this.limits).map(l => l.windowMs))
		let cleaned = 0
		for (const [key, timestamps] of this.requests) {
			const recent = timestamps.filter(ts => now - ts < longest)
			if (recent.length === 0) {
				this.requests.delete(key)
				cleaned++
			} else {
				this.requests.set(key, recent)
			}
		}
		if (cleaned > 0) logger.debug({ cleaned }, 'Cleaned up rate limit entries')
		return cleaned
	}
}
