import * as dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

const flag = (fallback: 'true' | 'false') =>
	z
		.enum(['true', 'false'])
		.default(fallback)
		.transform(str => str === 'true')

const list = (fallback = '') =>
	z
		.string()
		.default(fallback)
		.transform(str =>
			str
				.split(',')
				.map(item => item.trim().toLowerCase())
				.filter(Boolean)
		)

// === Environment validation ===
const configSchema = z.object({
	LOG_LEVEL: z
		.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
		.default('info'),

	// === Surfaces ===
	HTTP_ENABLED: flag('true'),
	PORT: z.coerce.number().int().positive().default(3000),
	BOT_TOKEN: z.string().default(''),
	ADMIN_IDS: list().transform(ids => new Set(ids)),

	// === Generation providers, tried in order ===
	GENERATION_PROVIDERS: list('openai').pipe(
		z.array(z.enum(['openai', 'deepseek', 'anthropic']))
	),
	OPENAI_API_KEY: z.string().default(''),
	OPENAI_MODEL: z.string().default('gpt-4o-mini'),
	DEEPSEEK_API_KEY: z.string().default(''),
	DEEPSEEK_MODEL: z.string().default('deepseek-chat'),
	ANTHROPIC_API_KEY: z.string().default(''),
	ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),

	// === Embeddings ===
	EMBEDDING_PROVIDER: z.enum(['voyage', 'openai']).default('voyage'),
	VOYAGE_API_KEY: z.string().default(''),
	VOYAGE_MODEL: z.string().default('voyage-3'),
	OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
	EMBEDDING_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),

	// === Data files ===
	CARDS_PATH: z.string().default('./data/cards.json'),
	KNOWLEDGE_PATH: z.string().default('./data/knowledge.json'),
	HISTORY_PATH: z.string().default(''),

	// === Cache ===
	CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
	CACHE_TTL_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
	CACHE_PERSIST_PATH: z.string().default(''),

	// === Reading pipeline ===
	READING_TIMEOUT_MS: z.coerce.number().int().positive().default(45000),
	RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
	RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),
	RETRIEVAL_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.3),

	// === Limits and budget ===
	READING_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(5),
	METRICS_ENABLED: flag('false'),
	DAILY_BUDGET_USD: z.coerce.number().nonnegative().default(10),
	BUDGET_WARNING_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
})

export type RawConfig = z.infer<typeof configSchema>

export type Config = RawConfig & {
	features: {
		http: boolean
		bot: boolean
		metrics: boolean
	}
	cache: {
		maxEntries: number
		ttlMs: number
		persistPath: string | null
	}
	budget: {
		dailyLimitUsd: number
		warningThreshold: number
	}
}

export function loadConfig(env: NodeJS.ProcessEnv): Config {
	const base = configSchema.parse(env)
	return {
		...base,
		features: {
			http: base.HTTP_ENABLED,
			bot: base.BOT_TOKEN.length > 0,
			metrics: base.METRICS_ENABLED,
		},
		cache: {
			maxEntries: base.CACHE_MAX_ENTRIES,
			ttlMs: base.CACHE_TTL_MS,
			persistPath: base.CACHE_PERSIST_PATH || null,
		},
		budget: {
			dailyLimitUsd: base.DAILY_BUDGET_USD,
			warningThreshold: base.BUDGET_WARNING_THRESHOLD,
		},
	}
}

function validateConfig(): Config {
	try {
		return loadConfig(process.env)
	} catch (error) {
		console.error('❌ Invalid configuration:')
		if (error instanceof z.ZodError) {
			error.errors.forEach(err => {
				console.error(`  ${err.path.join('.')}: ${err.message}`)
			})
		}
		process.exit(1)
	}
}

export const config = validateConfig()
