import { config } from './config.js'

export function isAdmin(telegramId: string | number | undefined): boolean {
	if (!telegramId) return false
	return config.ADMIN_IDS.has(String(telegramId))
}
