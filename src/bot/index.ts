// src/bot/index.ts
import { Bot, GrammyError, HttpError, session, type BotError } from 'grammy'

import { logger } from '../util/logger.js'
import { registerCardFlow, handleCardMessage } from './flows/cardFlow.js'
import { registerHistoryFlow } from './flows/historyFlow.js'
import { handleReadingMessage, openReading, registerReadingFlow } from './flows/readingFlow.js'
import { initSession, type BotDeps, type MyContext } from './helpers/state.js'
import { mainKb, registerCommands } from './keyboards.js'

const ONBOARDING = [
	'Welcome 👋 I read tarot in the Golden Dawn tradition.',
	'',
	'🔮 New reading: pick a spread, ask a question, get an interpretation.',
	'🃏 Look up a card: correspondences, decan and symbols.',
	'📜 My readings: your recent spreads.',
].join('\n')

const HELP = [
	'Commands:',
	'• /reading: draw a new reading',
	'• /card <name>: card correspondences',
	'• /history: your recent readings',
	'',
	'You can also use the buttons under the input field.',
].join('\n')

export function createBot(token: string, deps: BotDeps): Bot<MyContext> {
	const bot = new Bot<MyContext>(token)

	// ---- session first
	bot.use(session({ initial: initSession }))

	bot.command('start', async ctx => {
		ctx.session.conversation = undefined
		await ctx.reply(ONBOARDING, { reply_markup: mainKb })
	})
	bot.command('help', ctx => ctx.reply(HELP))
	bot.command('menu', ctx => ctx.reply('Main menu:', { reply_markup: mainKb }))

	registerReadingFlow(bot)
	registerCardFlow(bot, deps)
	registerHistoryFlow(bot, deps)

	// universal message router, keep it AFTER flow registration
	bot.on('message:text', async (ctx, next) => {
		if (await handleReadingMessage(ctx, deps)) return
		if (await handleCardMessage(ctx, deps)) return
		if (!ctx.session.conversation) {
			await openReading(ctx)
			return
		}
		await next()
	})

	bot.catch((err: BotError<MyContext>) => {
		logger.error({ err: err.error, update: err.ctx.update }, 'Error while handling update')

		if (err.error instanceof GrammyError) {
			logger.error(
				{ method: err.error.method, description: err.error.description },
				'Error in Telegram API request'
			)
		} else if (err.error instanceof HttpError) {
			logger.error({ httpError: String(err.error) }, 'Could not contact Telegram')
		}
	})

	return bot
}

/** Registers the command menu and starts long polling. Resolves when the bot stops. */
export async function startBot(bot: Bot<MyContext>): Promise<void> {
	await registerCommands(bot.api)
	await bot.start({
		onStart: ({ username }) => logger.info({ username }, 'Bot started with long polling'),
	})
}
