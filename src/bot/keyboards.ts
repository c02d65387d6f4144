import { InlineKeyboard, Keyboard, type Api } from 'grammy'
import { spreadLabel, type SpreadType } from '../core/spreads.js'

export const MAIN_BUTTONS = {
	reading: '🔮 New reading',
	card: '🃏 Look up a card',
	history: '📜 My readings',
} as const

export const mainKb = new Keyboard()
	.text(MAIN_BUTTONS.reading)
	.row()
	.text(MAIN_BUTTONS.card)
	.text(MAIN_BUTTONS.history)
	.resized()

// custom layouts need named positions, which the chat flow does not ask for
export const BOT_SPREADS: SpreadType[] = ['single', 'three_card', 'horseshoe', 'celtic_cross']

export const spreadKb = BOT_SPREADS.reduce(
	(kb, type) => kb.text(spreadLabel(type), `spread:${type}`).row(),
	new InlineKeyboard()
).text('✖️ Cancel', 'spread:cancel')

export async function registerCommands(api: Api) {
	await api.setMyCommands([
		{ command: 'start', description: 'Start' },
		{ command: 'reading', description: 'Draw a new reading' },
		{ command: 'card', description: 'Card correspondences' },
		{ command: 'history', description: 'Recent readings' },
		{ command: 'help', description: 'Help' },
	])
}
