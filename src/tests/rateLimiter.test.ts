import { beforeEach, describe, expect, it } from 'vitest'
import { RateLimiter } from '../core/rateLimiter.js'
import { RateLimitError } from '../types/errors.js'

let clock = 0
let limiter: RateLimiter

beforeEach(() => {
	clock = 0
	limiter = new RateLimiter(
		{
			reading: { maxRequests: 2, windowMs: 1000 },
			card: { maxRequests: 1, windowMs: 500 },
		},
		() => clock
	)
})

describe('RateLimiter', () => {
	it('allows requests up to the limit per client and feature', () => {
		limiter.check('u1', 'reading')
		limiter.check('u1', 'reading')
		expect(() => limiter.check('u1', 'reading')).toThrow(RateLimitError)
		expect(() => limiter.check('u2', 'reading')).not.toThrow()
		expect(() => limiter.check('u1', 'card')).not.toThrow()
	})

	it('lets admins through', () => {
		for (let i = 0; i < 5; i++) limiter.check('root', 'card', true)
		expect(limiter.stats('root', 'card').used).toBe(0)
	})

	it('slides the window', () => {
		limiter.check('u1', 'reading')
		clock = 400
		limiter.check('u1', 'reading')
		clock = 999
		expect(() => limiter.check('u1', 'reading')).toThrow(RateLimitError)
		clock = 1000
		expect(() => limiter.check('u1', 'reading')).not.toThrow()
	})

	it('reports usage and the next reset', () => {
		limiter.check('u1', 'reading')
		clock = 100
		limiter.check('u1', 'reading')
		expect(limiter.stats('u1', 'reading')).toEqual({
			used: 2,
			max: 2,
			remaining: 0,
			windowMs: 1000,
			resetsAt: new Date(1000),
		})
		expect(limiter.stats('u9', 'card').resetsAt).toBeNull()
	})

	it('forgets idle clients', () => {
		limiter.check('u1', 'reading')
		limiter.check('u2', 'card')
		clock = 600
		limiter.check('u3', 'card')
		clock = 1000
		expect(limiter.cleanup()).toBe(2)
		expect(limiter.stats('u3', 'card').used).toBe(1)
	})
})
