import pino from 'pino'
import { randomUUID } from 'crypto'
import { config } from './config.js'

export type Logger = pino.Logger

export const logger = pino({
	level: config.LOG_LEVEL,
	serializers: {
		err: pino.stdSerializers.err,
	},
	formatters: {
		level: label => ({ level: label }),
	},
})

export function createCorrelationId(): string {
	return randomUUID()
}

// For reading pipeline, provider and history calls
export function getCorrelationLogger(
	correlationId: string,
	additionalContext?: Record<string, unknown>
): Logger {
	return logger.child({
		correlationId,
		...additionalContext,
	})
}
