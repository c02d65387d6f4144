// src/core/tokenTracking.ts
import { config } from '../util/config.js'
import { logger } from '../util/logger.js'
import { trackLLMCost } from '../util/metrics.js'

export interface TokenUsage {
	promptTokens: number
	completionTokens: number
	totalTokens: number
	provider: string
	model: string
	correlationId?: string
	timestamp: Date
	costUsd: number
}

export interface DailyCosts {
	date: string
	totalTokens: number
	totalCostUsd: number
	providerBreakdown: Record<string, { tokens: number; cost: number; count: number }>
}

export type BudgetLimits = {
	dailyLimitUsd: number
	warningThreshold: number
}

// USD per 1K tokens, matched by longest model prefix
const TOKEN_PRICES: Record<string, { input: number; output: number }> = {
	'gpt-4o-mini': { input: 0.00015, output: 0.0006 },
	'gpt-4o': { input: 0.0025, output: 0.01 },
	'gpt-4.1-mini': { input: 0.0004, output: 0.0016 },
	'deepseek-chat': { input: 0.00027, output: 0.0011 },
	'claude-3-5-haiku': { input: 0.0008, output: 0.004 },
	'claude-3-5-sonnet': { input: 0.003, output: 0.015 },
	'claude-3-haiku': { input: 0.00025, output: 0.00125 },
}

export function calculateTokenCost(
	model: string,
	promptTokens: number,
	completionTokens: number
): number {
	const prefix = Object.keys(TOKEN_PRICES)
		.filter(p => model.startsWith(p))
		.sort((a, b) => b.length - a.length)[0]
	if (!prefix) {
		logger.debug({ model }, 'Unknown model for cost calculation')
		return 0
	}

	const pricing = TOKEN_PRICES[prefix]
	return (promptTokens / 1000) * pricing.input + (completionTokens / 1000) * pricing.output
}

const dayKey = (d: Date) => d.toISOString().split('T')[0]

export class TokenTracker {
	private readonly dailyCosts = new Map<string, DailyCosts>()

	constructor(
		private readonly limits: BudgetLimits = config.budget,
		private readonly now: () => Date = () => new Date()
	) {}

	track(input: {
		provider: string
		model: string
		promptTokens: number
		completionTokens: number
		correlationId?: string
	}): TokenUsage {
		const timestamp = this.now()
		const usage: TokenUsage = {
			...input,
			totalTokens: input.promptTokens + input.completionTokens,
			timestamp,
			costUsd: calculateTokenCost(input.model, input.promptTokens, input.completionTokens),
		}

		const date = dayKey(timestamp)
		let costs = this.dailyCosts.get(date)
		if (!costs) {
			costs = { date, totalTokens: 0, totalCostUsd: 0, providerBreakdown: {} }
			this.dailyCosts.set(date, costs)
		}
		costs.totalTokens += usage.totalTokens
		costs.totalCostUsd += usage.costUsd

		const key = `${usage.provider}-${usage.model}`
		const entry = (costs.providerBreakdown[key] ??= { tokens: 0, cost: 0, count: 0 })
		entry.tokens += usage.totalTokens
		entry.cost += usage.costUsd
		entry.count += 1

		trackLLMCost(usage.provider, usage.model, usage.costUsd)
		logger.info(
			{
				correlationId: usage.correlationId,
				provider: usage.provider,
				model: usage.model,
				promptTokens: usage.promptTokens,
				completionTokens: usage.completionTokens,
				costUsd: usage.costUsd.toFixed(6),
			},
			'Token usage tracked'
		)

		this.checkBudgetLimits(costs)
		return usage
	}

	getDailyUsage(date?: string): DailyCosts | undefined {
		return this.dailyCosts.get(date ?? dayKey(this.now()))
	}

	getBudgetStatus() {
		const dailyLimit = this.limits.dailyLimitUsd
		const dailyUsed = this.getDailyUsage()?.totalCostUsd ?? 0
		return {
			dailyUsed,
			dailyLimit,
			remainingBudget: Math.max(0, dailyLimit - dailyUsed),
			usagePercent: dailyLimit > 0 ? (dailyUsed / dailyLimit) * 100 : 0,
			// a zero limit disables the budget
			isOverBudget: dailyLimit > 0 && dailyUsed >= dailyLimit,
		}
	}

	cleanupOldUsageData(retentionDays = 30) {
		const cutoff = this.now()
		cutoff.setDate(cutoff.getDate() - retentionDays)
		const cutoffKey = dayKey(cutoff)

		let cleaned = 0
		for (const date of this.dailyCosts.keys()) {
			if (date < cutoffKey) {
				this.dailyCosts.delete(date)
				cleaned++
			}
		}
		if (cleaned > 0) {
			logger.info({ cleaned, retentionDays }, 'Cleaned up old usage data')
		}
	}

	private checkBudgetLimits(costs: DailyCosts) {
		const { dailyLimitUsd, warningThreshold } = this.limits
		if (!dailyLimitUsd) return

		const usagePercent = (costs.totalCostUsd / dailyLimitUsd) * 100
		if (usagePercent >= 100) {
			logger.error(
				{ date: costs.date, totalCost: costs.totalCostUsd, dailyLimit: dailyLimitUsd },
				'Daily budget limit exceeded'
			)
		} else if (usagePercent >= warningThreshold) {
			logger.warn(
				{ date: costs.date, totalCost: costs.totalCostUsd, dailyLimit: dailyLimitUsd, usagePercent },
				'Daily budget warning threshold reached'
			)
		}
	}
}

export const tokenTracker = new TokenTracker()
