// src/util/metrics.ts
import promClient from 'prom-client'
import type { Express } from 'express'
import { config } from './config.js'

export const register = new promClient.Registry()

if (config.METRICS_ENABLED) {
	promClient.collectDefaultMetrics({ register })
}

export const metrics = {
	llmCalls: new promClient.Counter({
		name: 'llm_calls_total',
		help: 'Total number of generation provider calls',
		labelNames: ['provider', 'model', 'status'],
		registers: [register],
	}),

	llmLatency: new promClient.Histogram({
		name: 'llm_latency_seconds',
		help: 'Generation provider call latency',
		labelNames: ['provider', 'model'],
		buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
		registers: [register],
	}),

	llmCost: new promClient.Counter({
		name: 'llm_cost_usd_total',
		help: 'Estimated generation cost in USD',
		labelNames: ['provider', 'model'],
		registers: [register],
	}),

	embeddingCalls: new promClient.Counter({
		name: 'embedding_calls_total',
		help: 'Embedding provider calls',
		labelNames: ['provider', 'status'],
		registers: [register],
	}),

	readings: new promClient.Counter({
		name: 'readings_total',
		help: 'Readings by spread and terminal status',
		labelNames: ['spread', 'status'],
		registers: [register],
	}),

	cacheEvents: new promClient.Counter({
		name: 'interpretation_cache_events_total',
		help: 'Interpretation cache hits, misses and coalesced requests',
		labelNames: ['event'],
		registers: [register],
	}),

	rateLimitHits: new promClient.Counter({
		name: 'rate_limit_hits_total',
		help: 'Rate limit violations',
		labelNames: ['feature'],
		registers: [register],
	}),

	errors: new promClient.Counter({
		name: 'errors_total',
		help: 'Total errors by type',
		labelNames: ['error_type', 'operation'],
		registers: [register],
	}),
}

export function trackLLMCall<T>(
	provider: string,
	model: string,
	promise: Promise<T>
): Promise<T> {
	const timer = metrics.llmLatency.startTimer({ provider, model })

	return promise
		.then(result => {
			metrics.llmCalls.inc({ provider, model, status: 'success' })
			return result
		})
		.catch(error => {
			metrics.llmCalls.inc({ provider, model, status: 'error' })
			throw error
		})
		.finally(() => {
			timer()
		})
}

export function trackEmbeddingCall(provider: string, status: 'success' | 'error') {
	metrics.embeddingCalls.inc({ provider, status })
}

export function trackReading(spread: string, status: string) {
	metrics.readings.inc({ spread, status })
}

export function trackCacheEvent(event: 'hit' | 'miss' | 'coalesced' | 'evicted') {
	metrics.cacheEvents.inc({ event })
}

export function trackLLMCost(provider: string, model: string, costUsd: number) {
	metrics.llmCost.inc({ provider, model }, costUsd)
}

export function trackRateLimit(feature: string) {
	metrics.rateLimitHits.inc({ feature })
}

export function trackError(errorType: string, operation: string) {
	metrics.errors.inc({ error_type: errorType, operation })
}

export function setupMetricsEndpoint(app: Express) {
	if (!config.METRICS_ENABLED) return

	app.get('/metrics', async (_req, res) => {
		res.set('Content-Type', register.contentType)
		res.end(await register.metrics())
	})
}
