// src/bot/flows/readingFlow.ts
import type { Bot } from 'grammy'
import { spreadLabel } from '../../core/spreads.js'
import { RateLimitError, mapErrorToUserMessage } from '../../types/errors.js'
import { isAdmin } from '../../util/auth.js'
import { createCorrelationId, getCorrelationLogger } from '../../util/logger.js'
import { formatReadingHtml } from '../helpers/format.js'
import type { BotDeps, MyContext } from '../helpers/state.js'
import { BOT_SPREADS, MAIN_BUTTONS, mainKb, spreadKb } from '../keyboards.js'

const MIN_QUESTION_LENGTH = 3

export async function openReading(ctx: MyContext) {
	ctx.session.conversation = undefined
	await ctx.reply('Choose a spread:', { reply_markup: spreadKb })
}

export function registerReadingFlow(bot: Bot<MyContext>) {
	bot.command('reading', openReading)
	bot.hears(MAIN_BUTTONS.reading, openReading)

	for (const spreadType of BOT_SPREADS) {
		bot.callbackQuery(`spread:${spreadType}`, async ctx => {
			await ctx.answerCallbackQuery()
			ctx.session.conversation = { type: 'reading', stage: 'awaiting_question', spreadType }
			await ctx.reply(
				`${spreadLabel(spreadType)}. Now write your question in a sentence or two.`
			)
		})
	}

	bot.callbackQuery('spread:cancel', async ctx => {
		await ctx.answerCallbackQuery()
		ctx.session.conversation = undefined
		await ctx.reply('Cancelled.', { reply_markup: mainKb })
	})
}

/** Returns true when the message belonged to the reading conversation. */
export async function handleReadingMessage(ctx: MyContext, deps: BotDeps): Promise<boolean> {
	const conv = ctx.session.conversation
	if (conv?.type !== 'reading') return false

	const question = ctx.message?.text?.trim()
	if (!question || question.length < MIN_QUESTION_LENGTH) {
		await ctx.reply('Please write your question in a sentence.')
		return true
	}

	const userId = String(ctx.from?.id ?? 'unknown')
	try {
		deps.rateLimiter.check(userId, 'reading', isAdmin(ctx.from?.id))
	} catch (e) {
		if (e instanceof RateLimitError) {
			await ctx.reply(e.userMessage)
			return true
		}
		throw e
	}

	ctx.session.conversation = undefined
	await ctx.reply('🔮 Shuffling the deck…')

	const correlationId = createCorrelationId()
	const log = getCorrelationLogger(correlationId, { userId })
	try {
		const reading = await deps.orchestrator.performReading(
			{ spreadType: conv.spreadType, focus: 'general', question },
			{ correlationId, owner: userId }
		)
		const messages = formatReadingHtml(reading)
		for (const [i, html] of messages.entries()) {
			const last = i === messages.length - 1
			await ctx.reply(html, last ? { parse_mode: 'HTML', reply_markup: mainKb } : { parse_mode: 'HTML' })
		}
	} catch (e) {
		log.error({ err: e }, 'Reading from chat failed')
		await ctx.reply(mapErrorToUserMessage(e), { reply_markup: mainKb })
	}
	return true
}
