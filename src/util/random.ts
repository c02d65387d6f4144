/** Returns a float in [0, 1). */
export type Rng = () => number

/**
 * Seeded generator (mulberry32) when a seed is given, Math.random otherwise.
 * Readings expose the seed so that a draw can be replayed in tests.
 */
export function createRng(seed?: number): Rng {
	if (seed === undefined) return Math.random

	let state = seed >>> 0
	return () => {
		state = (state + 0x6d2b79f5) >>> 0
		let t = state
		t = Math.imul(t ^ (t >>> 15), t | 1)
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296
	}
}
