import { Injectable, Logger } from '@nestjs/common'
import { Cron } from '@nestjs/schedule'
import { WarnOnceCache, isDaytimeForUser, todayInTimezone } from '../../utils/timezone'
import { ExpensesService } from '../expenses/expenses.service'
import type { UserRecord } from '../ledger/ledger.repo'
import { UsersService } from '../users/users.service'
import { UserNotifier } from './notifier'

export const REMINDER_TEXT =
	'📝 Сегодня ещё нет ни одной записи. Напишите, например: <code>Обед 450</code>'

@Injectable()
export class ReminderCronService {
	private readonly logger = new Logger(ReminderCronService.name)

	constructor(
		private readonly usersService: UsersService,
		private readonly expensesService: ExpensesService,
		private readonly notifier: UserNotifier,
		private readonly timezoneWarnings: WarnOnceCache
	) {}

	@Cron('*/30 * * * *')
	async handleCron() {
		await this.sendDailyReminders(new Date())
	}

	/** Once per local day, during local daytime, for users who have recorded nothing today. */
	async sendDailyReminders(now: Date): Promise<number> {
		const users = await this.usersService.listAll()
		let sent = 0
		for (const user of users) {
			try {
				if (await this.remind(user, now)) sent += 1
			} catch (error: unknown) {
				const msg = error instanceof Error ? error.message : String(error)
				this.logger.error(`Reminder for user ${user.id} failed: ${msg}`)
			}
		}
		if (sent) this.logger.log(`Sent ${sent} reminder(s)`)
		return sent
	}

	private async remind(user: UserRecord, now: Date): Promise<boolean> {
		if (!isDaytimeForUser(user.timezone, now, this.timezoneWarnings)) return false
		const today = todayInTimezone(user.timezone, now, this.timezoneWarnings)
		if (user.lastReminderOn?.getTime() === today.getTime()) return false
		if (await this.expensesService.hasEntryOn(user.id, today)) return false

		const delivered = await this.notifier.sendToUser(user.telegramId, REMINDER_TEXT)
		// marked even when undelivered: one attempt per local day
		await this.usersService.markReminded(user.id, today)
		return delivered
	}
}
