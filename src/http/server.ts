// src/http/server.ts
import express, {
	type Express,
	type NextFunction,
	type Request,
	type RequestHandler,
	type Response,
} from 'express'
import type { Server } from 'http'
import { z } from 'zod'
import type { KnowledgeStore } from '../core/knowledge.js'
import { ReadingRequestSchema, type ReadingOrchestrator } from '../core/orchestrator.js'
import type { RateLimiter } from '../core/rateLimiter.js'
import type { ReadingHistory } from '../db/history.js'
import {
	DomainError,
	InsufficientCardsError,
	RateLimitError,
	UnknownCardError,
	ValidationError,
} from '../types/errors.js'
import { createCorrelationId, logger } from '../util/logger.js'
import { setupMetricsEndpoint, trackError } from '../util/metrics.js'

export type HttpDeps = {
	orchestrator: ReadingOrchestrator
	knowledge: KnowledgeStore
	rateLimiter: RateLimiter
	history?: ReadingHistory
	cacheSize?: () => number
}

const HistoryQuerySchema = z.object({
	limit: z.coerce.number().int().min(1).max(100).default(20),
})

const route =
	(handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
	(req, res, next) => {
		handler(req, res).catch(next)
	}

function statusFor(error: DomainError): number {
	if (error instanceof ValidationError || error instanceof InsufficientCardsError) return 400
	if (error instanceof UnknownCardError) return 404
	if (error instanceof RateLimitError) return 429
	return 503
}

export function createHttpApp(deps: HttpDeps): Express {
	const { orchestrator, knowledge, rateLimiter, history } = deps
	const app = express()
	app.use(express.json({ limit: '32kb' }))

	app.get('/health', (_req, res) => {
		res.json({
			status: 'ok',
			snippets: knowledge.size,
			indexed: knowledge.indexedCount,
			cacheEntries: deps.cacheSize?.() ?? 0,
		})
	})

	app.post(
		'/readings',
		route(async (req, res) => {
			const parsed = ReadingRequestSchema.safeParse(req.body)
			if (!parsed.success) {
				res.status(400).json({
					error: 'VALIDATION_ERROR',
					issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
				})
				return
			}

			rateLimiter.check(req.ip ?? 'anonymous', 'reading')
			const correlationId = req.header('x-correlation-id') ?? createCorrelationId()
			const reading = await orchestrator.performReading(parsed.data, { correlationId })
			res.setHeader('x-correlation-id', correlationId)
			res.json(reading)
		})
	)

	app.get(
		'/cards/:name',
		route(async (req, res) => {
			rateLimiter.check(req.ip ?? 'anonymous', 'card')
			res.json(knowledge.lookup(req.params.name))
		})
	)

	app.get(
		'/cards/:name/stats',
		route(async (req, res) => {
			const card = knowledge.lookup(req.params.name)
			if (!history) {
				res.status(404).json({ error: 'HISTORY_DISABLED' })
				return
			}
			res.json(await history.cardStatistics(card.card))
		})
	)

	app.get(
		'/history',
		route(async (req, res) => {
			if (!history) {
				res.status(404).json({ error: 'HISTORY_DISABLED' })
				return
			}
			const query = HistoryQuerySchema.safeParse(req.query)
			if (!query.success) {
				res.status(400).json({ error: 'VALIDATION_ERROR', issues: query.error.issues.map(i => i.message) })
				return
			}
			res.json(await history.list(query.data.limit))
		})
	)

	setupMetricsEndpoint(app)

	app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
		if (error instanceof DomainError) {
			const status = statusFor(error)
			if (status >= 500) logger.error({ err: error, path: req.path }, 'Request failed')
			res.status(status).json({ error: error.code, message: error.userMessage })
			return
		}
		// body-parser rejects malformed JSON with a SyntaxError
		if (error instanceof SyntaxError) {
			res.status(400).json({ error: 'VALIDATION_ERROR', message: 'Malformed JSON body' })
			return
		}
		trackError('unhandled', req.path)
		logger.error({ err: error, path: req.path }, 'Unhandled request error')
		res.status(500).json({ error: 'INTERNAL', message: 'Something went wrong. Try again later.' })
	})

	return app
}

export function startHttpServer(app: Express, port: number): Promise<Server> {
	return new Promise((resolve, reject) => {
		const server = app.listen(port, () => {
			logger.info({ port }, 'HTTP server started')
			resolve(server)
		})
		server.on('error', reject)
	})
}
