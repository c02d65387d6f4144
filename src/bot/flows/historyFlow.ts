// src/bot/flows/historyFlow.ts
import type { Bot } from 'grammy'
import { formatHistoryHtml } from '../helpers/format.js'
import type { BotDeps, MyContext } from '../helpers/state.js'
import { MAIN_BUTTONS } from '../keyboards.js'

const HISTORY_PAGE = 10

export function registerHistoryFlow(bot: Bot<MyContext>, deps: BotDeps) {
	const showHistory = async (ctx: MyContext) => {
		if (!ctx.from?.id) {
			await ctx.reply('Could not determine your ID.')
			return
		}
		if (!deps.history) {
			await ctx.reply('Reading history is turned off on this server.')
			return
		}
		const readings = await deps.history.list(HISTORY_PAGE, String(ctx.from.id))
		await ctx.reply(formatHistoryHtml(readings), { parse_mode: 'HTML' })
	}

	bot.command('history', showHistory)
	bot.hears(MAIN_BUTTONS.history, showHistory)
}
