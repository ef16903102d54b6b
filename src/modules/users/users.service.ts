import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { UserInputError } from '../../shared/errors'
import { isValidTimezone } from '../../utils/timezone'
import { CategoriesService } from '../categories/categories.service'
import { LedgerRepo, type UserRecord } from '../ledger/ledger.repo'
import { FALLBACK_CURRENCY } from '../parser/amount-extraction.util'

const KNOWN_CURRENCIES = new Set(Intl.supportedValuesOf('currency'))

@Injectable()
export class UsersService {
	private readonly logger = new Logger(UsersService.name)

	constructor(
		private readonly repo: LedgerRepo,
		private readonly categoriesService: CategoriesService,
		private readonly config: ConfigService
	) {}

	async getOrCreateByTelegramId(telegramId: string, languageCode?: string): Promise<UserRecord> {
		const existing = await this.repo.findUserByTelegramId(telegramId)
		if (existing) return existing

		const user = await this.repo.createUser({
			telegramId,
			currency: this.config.get<string>('DEFAULT_CURRENCY') ?? FALLBACK_CURRENCY,
			timezone: 'UTC',
			language: languageCode?.toLowerCase().startsWith('en') ? 'en' : 'ru'
		})
		await this.categoriesService.createDefaults(user.id)
		this.logger.log(`Created user ${user.id} for telegram ${telegramId}`)
		return user
	}

	async setCurrency(userId: string, code: string) {
		const currency = code.trim().toUpperCase()
		if (!/^[A-Z]{3}$/.test(currency) || !KNOWN_CURRENCIES.has(currency)) {
			throw new UserInputError('Неизвестный код валюты. Пример: /currency EUR')
		}
		return this.repo.updateUser(userId, { currency })
	}

	async setTimezone(userId: string, timezone: string) {
		const tz = timezone.trim()
		if (!tz || !isValidTimezone(tz)) {
			throw new UserInputError('Неизвестный часовой пояс. Пример: /timezone Europe/Moscow')
		}
		return this.repo.updateUser(userId, { timezone: tz })
	}

	async markReminded(userId: string, localDay: Date) {
		return this.repo.updateUser(userId, { lastReminderOn: localDay })
	}

	async listAll() {
		return this.repo.listUsers()
	}
}
