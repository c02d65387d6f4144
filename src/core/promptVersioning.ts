// src/core/promptVersioning.ts
import { shortChecksum } from '../util/hash.js'
import { logger } from '../util/logger.js'

export interface PromptVersion {
	id: string
	version: string
	checksum: string
	content: string
	createdAt: Date
	metadata?: Record<string, unknown>
}

const revisions = new Map<string, number>()
const promptRegistry = new Map<string, PromptVersion>()

/**
 * Registers prompt content under an id. Re-registering identical content
 * returns the existing version.
 */
export function registerPrompt(
	id: string,
	content: string,
	metadata?: Record<string, unknown>
): PromptVersion {
	const checksum = shortChecksum(content)
	const current = promptRegistry.get(id)
	if (current && current.checksum === checksum) return current

	const revision = (revisions.get(id) ?? 0) + 1
	const promptVersion: PromptVersion = {
		id,
		version: `v${revision}-${checksum}`,
		checksum,
		content,
		createdAt: new Date(),
		metadata,
	}

	revisions.set(id, revision)
	promptRegistry.set(id, promptVersion)

	logger.debug(
		{ promptId: id, version: promptVersion.version, contentLength: content.length, metadata },
		'Prompt registered'
	)

	return promptVersion
}

export function getPrompt(id: string): PromptVersion | undefined {
	return promptRegistry.get(id)
}

export function logPromptUsage(
	promptVersion: PromptVersion,
	correlationId: string,
	operation: string,
	additionalContext?: Record<string, unknown>
): void {
	logger.debug(
		{
			correlationId,
			operation,
			promptId: promptVersion.id,
			promptVersion: promptVersion.version,
			...additionalContext,
		},
		'Prompt used'
	)
}
