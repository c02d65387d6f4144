// src/bot/helpers/state.ts
import type { Context, SessionFlavor } from 'grammy'
import type { KnowledgeStore } from '../../core/knowledge.js'
import type { ReadingOrchestrator } from '../../core/orchestrator.js'
import type { RateLimiter } from '../../core/rateLimiter.js'
import type { SpreadType } from '../../core/spreads.js'
import type { ReadingHistory } from '../../db/history.js'

export type ConversationSession =
	| { type: 'reading'; stage: 'awaiting_question'; spreadType: SpreadType }
	| { type: 'card'; stage: 'awaiting_name' }

export interface SessionState {
	conversation?: ConversationSession
}

export function initSession(): SessionState {
	return {
		conversation: undefined,
	}
}

export type MyContext = Context & SessionFlavor<SessionState>

export type BotDeps = {
	orchestrator: ReadingOrchestrator
	knowledge: KnowledgeStore
	rateLimiter: RateLimiter
	history?: ReadingHistory
}
