// src/types/errors.ts
import { logger } from '../util/logger.js'

export abstract class DomainError extends Error {
	abstract readonly code: string
	abstract readonly userMessage: string

	constructor(message: string, public readonly context?: Record<string, unknown>) {
		super(message)
		this.name = this.constructor.name
	}
}

/** Corpus is malformed. Fatal at startup. */
export class DataIntegrityError extends DomainError {
	readonly code = 'DATA_INTEGRITY'
	readonly userMessage = 'The card corpus is damaged. Readings are unavailable.'

	constructor(message: string, public readonly issues: string[] = []) {
		super(message, { issues })
	}
}

export class InsufficientCardsError extends DomainError {
	readonly code = 'INSUFFICIENT_CARDS'
	readonly userMessage = 'Not enough cards left in the deck for this spread.'
}

export class UnknownCardError extends DomainError {
	readonly code = 'UNKNOWN_CARD'
	readonly userMessage = 'No such card in the deck.'

	constructor(public readonly cardName: string) {
		super(`Unknown card: ${cardName}`, { cardName })
	}
}

export class EmbeddingUnavailableError extends DomainError {
	readonly code = 'EMBEDDING_UNAVAILABLE'
	readonly userMessage = 'The knowledge index is temporarily unavailable.'
}

export class GenerationError extends DomainError {
	readonly code = 'GENERATION_FAILED'
	readonly userMessage = 'The interpreter did not answer. Try again shortly.'

	constructor(
		message: string,
		public readonly providerCode: string,
		public readonly retryable: boolean,
		context?: Record<string, unknown>
	) {
		super(message, { providerCode, retryable, ...context })
	}
}

export class MalformedResponseError extends DomainError {
	readonly code = 'MALFORMED_RESPONSE'
	readonly userMessage = 'The interpreter answered in an unexpected format.'
	readonly retryable = true
}

export class RateLimitError extends DomainError {
	readonly code = 'RATE_LIMITED'
	readonly userMessage = 'Too many readings requested. Wait a moment.'
}

export class ValidationError extends DomainError {
	readonly code = 'VALIDATION_ERROR'
	readonly userMessage = 'The request is invalid. Check the spread and question.'
}

export function mapErrorToUserMessage(error: unknown): string {
	if (error instanceof DomainError) {
		return error.userMessage
	}

	const message = error instanceof Error ? error.message : String(error)
	if (message.includes('timeout')) {
		return 'The request timed out. Try again.'
	}

	if (message.includes('network') || message.includes('fetch')) {
		return 'Network problems. Try again later.'
	}

	logger.error({ err: error }, 'Unmapped error occurred')
	return 'Something went wrong. Try again later.'
}
