// src/bot/flows/cardFlow.ts
import type { Bot } from 'grammy'
import { UnknownCardError } from '../../types/errors.js'
import { formatCardHtml, formatStatsLine } from '../helpers/format.js'
import type { BotDeps, MyContext } from '../helpers/state.js'
import { MAIN_BUTTONS } from '../keyboards.js'

const ASK_NAME = 'Send a card name, for example "The Tower" or "Queen of Cups".'

async function replyWithCard(ctx: MyContext, deps: BotDeps, name: string) {
	let html: string
	try {
		html = formatCardHtml(deps.knowledge.lookup(name))
	} catch (e) {
		if (e instanceof UnknownCardError) {
			await ctx.reply(`I don't know a card called "${name}". ${ASK_NAME}`)
			return
		}
		throw e
	}

	if (deps.history && ctx.from?.id) {
		const stats = await deps.history.cardStatistics(name, String(ctx.from.id))
		html += `\n\n${formatStatsLine(stats)}`
	}
	await ctx.reply(html, { parse_mode: 'HTML' })
}

export function registerCardFlow(bot: Bot<MyContext>, deps: BotDeps) {
	bot.command('card', async ctx => {
		const name = ctx.match.trim()
		if (!name) {
			ctx.session.conversation = { type: 'card', stage: 'awaiting_name' }
			await ctx.reply(ASK_NAME)
			return
		}
		await replyWithCard(ctx, deps, name)
	})

	bot.hears(MAIN_BUTTONS.card, async ctx => {
		ctx.session.conversation = { type: 'card', stage: 'awaiting_name' }
		await ctx.reply(ASK_NAME)
	})
}

export async function handleCardMessage(ctx: MyContext, deps: BotDeps): Promise<boolean> {
	if (ctx.session.conversation?.type !== 'card') return false
	const name = ctx.message?.text?.trim()
	if (!name) {
		await ctx.reply(ASK_NAME)
		return true
	}
	ctx.session.conversation = undefined
	await replyWithCard(ctx, deps, name)
	return true
}
