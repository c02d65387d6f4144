// src/index.ts
import type { Server } from 'http'
import type { ScheduledTask } from 'node-cron'

import { createBot, startBot } from './bot/index.js'
import { loadDeck, readCorpusFile } from './core/deck.js'
import {
	CachedEmbeddingClient,
	OpenAIEmbeddingProvider,
	VoyageEmbeddingProvider,
	type EmbeddingProvider,
} from './core/embeddings.js'
import { KnowledgeStore } from './core/knowledge.js'
import {
	AnthropicProvider,
	FailoverGenerationClient,
	OpenAIChatProvider,
	type GenerationProvider,
} from './core/llm.js'
import { ReadingOrchestrator, createInterpretationCache } from './core/orchestrator.js'
import { RateLimiter } from './core/rateLimiter.js'
import { runCacheSnapshot, startScheduler } from './core/scheduler.js'
import { tokenTracker } from './core/tokenTracking.js'
import { ReadingHistory } from './db/history.js'
import { createHttpApp, startHttpServer } from './http/server.js'
import { DataIntegrityError } from './types/errors.js'
import { config, type Config } from './util/config.js'
import { logger } from './util/logger.js'

function buildEmbeddingProvider(cfg: Config): EmbeddingProvider {
	return cfg.EMBEDDING_PROVIDER === 'openai'
		? new OpenAIEmbeddingProvider(cfg.OPENAI_API_KEY, cfg.OPENAI_EMBEDDING_MODEL)
		: new VoyageEmbeddingProvider(cfg.VOYAGE_API_KEY, cfg.VOYAGE_MODEL)
}

function buildGenerationProviders(cfg: Config): GenerationProvider[] {
	return cfg.GENERATION_PROVIDERS.map(name => {
		switch (name) {
			case 'openai':
				return new OpenAIChatProvider('openai', cfg.OPENAI_API_KEY, cfg.OPENAI_MODEL)
			case 'deepseek':
				return new OpenAIChatProvider(
					'deepseek',
					cfg.DEEPSEEK_API_KEY,
					cfg.DEEPSEEK_MODEL,
					'https://api.deepseek.com/v1'
				)
			case 'anthropic':
				return new AnthropicProvider(cfg.ANTHROPIC_API_KEY, cfg.ANTHROPIC_MODEL)
		}
	})
}

async function bootstrap() {
	const deck = loadDeck(await readCorpusFile(config.CARDS_PATH))
	const knowledge = await KnowledgeStore.fromFile(deck, config.KNOWLEDGE_PATH)
	logger.info(
		{ deckVersion: deck.version, snippets: knowledge.size, knowledgeVersion: knowledge.version },
		'Corpus loaded'
	)

	const embeddings = new CachedEmbeddingClient(buildEmbeddingProvider(config), {
		maxAttempts: config.EMBEDDING_MAX_ATTEMPTS,
		baseDelayMs: 250,
	})
	try {
		await knowledge.index(embeddings)
	} catch (e) {
		// readings still work, with partial knowledge
		logger.error({ err: e }, 'Knowledge indexing failed, retrieval will be empty')
	}

	const cache = createInterpretationCache({
		maxEntries: config.cache.maxEntries,
		ttlMs: config.cache.ttlMs,
		version: `${deck.version}/${knowledge.version}`,
	})
	if (config.cache.persistPath) {
		const restored = await cache.restore(config.cache.persistPath)
		logger.info({ restored }, 'Interpretation cache restored')
	}

	const history = config.HISTORY_PATH ? new ReadingHistory(config.HISTORY_PATH) : undefined
	const rateLimiter = new RateLimiter()

	const orchestrator = new ReadingOrchestrator(
		{
			deck,
			knowledge,
			embeddings,
			generation: new FailoverGenerationClient(buildGenerationProviders(config)),
			cache,
			history,
		},
		{
			retrievalTopK: config.RETRIEVAL_TOP_K,
			retrievalThreshold: config.RETRIEVAL_THRESHOLD,
			retrievalTimeoutMs: config.RETRIEVAL_TIMEOUT_MS,
			readingTimeoutMs: config.READING_TIMEOUT_MS,
		}
	)

	let server: Server | undefined
	if (config.features.http) {
		const app = createHttpApp({
			orchestrator,
			knowledge,
			rateLimiter,
			history,
			cacheSize: () => cache.size,
		})
		server = await startHttpServer(app, config.PORT)
	}

	const tasks: ScheduledTask[] = startScheduler({
		cache,
		cachePersistPath: config.cache.persistPath,
		rateLimiter,
		tokenTracker,
	})

	const bot = config.features.bot
		? createBot(config.BOT_TOKEN, { orchestrator, knowledge, rateLimiter, history })
		: undefined
	if (bot) {
		startBot(bot).catch(e => {
			logger.fatal({ err: e }, 'Bot stopped with an error')
			process.exit(1)
		})
	}

	const shutdown = async (signal: string) => {
		logger.info({ signal }, 'Shutting down')
		for (const task of tasks) task.stop()
		if (bot) await bot.stop()
		if (server) server.close()
		if (config.cache.persistPath) await runCacheSnapshot(cache, config.cache.persistPath)
		process.exit(0)
	}
	const onSignal = (signal: NodeJS.Signals) => {
		shutdown(signal).catch(e => {
			logger.error({ err: e }, 'Shutdown failed')
			process.exit(1)
		})
	}
	process.once('SIGINT', onSignal)
	process.once('SIGTERM', onSignal)
}

bootstrap().catch(e => {
	if (e instanceof DataIntegrityError) {
		logger.fatal({ issues: e.issues }, e.message)
	} else {
		logger.fatal({ err: e }, 'Bootstrap failed')
	}
	process.exit(1)
})
