import { Injectable, Logger } from '@nestjs/common'
import { WarnOnceCache, todayInTimezone } from '../../utils/timezone'
import { CategoriesService } from '../categories/categories.service'
import { type ExpenseRecord, LedgerRepo, type NewExpense, type UserRecord } from '../ledger/ledger.repo'
import { ExpenseParserService, type UnpricedFragment } from '../parser/expense-parser.service'

export interface RecordResult {
	stored: ExpenseRecord[]
	/** Fragments of the message that carried no amount. */
	skipped: string[]
}

const RECENT_CATEGORIES_FOR_AI = 3
/** Confidence of an entry that repeats the amount and category of an earlier one. */
export const REUSED_CONFIDENCE = 0.8

@Injectable()
export class ExpensesService {
	private readonly logger = new Logger(ExpensesService.name)

	constructor(
		private readonly repo: LedgerRepo,
		private readonly parser: ExpenseParserService,
		private readonly categoriesService: CategoriesService,
		private readonly timezoneWarnings: WarnOnceCache
	) {}

	/**
	 * Parses a chat message into entries and stores every one that has an amount.
	 * A fragment without one repeats the user's last expense with the same description, if any.
	 */
	async record(user: UserRecord, text: string, now: Date = new Date()): Promise<RecordResult> {
		const today = todayInTimezone(user.timezone, now, this.timezoneWarnings)
		const { labels, keywords } = await this.categoriesService.getMatchingContext(user.id)
		const recentCategories = await this.repo.recentCategories(user.id, RECENT_CATEGORIES_FOR_AI)

		const { transactions, skipped } = await this.parser.parseMany(text, {
			defaultCurrency: user.currency,
			categories: labels,
			keywords,
			recentCategories,
			today
		})

		const entries: NewExpense[] = transactions.map(t => ({
			userId: user.id,
			amount: t.amount,
			currency: t.currency,
			description: t.description,
			category: t.category,
			direction: t.direction,
			spentOn: t.date ?? today,
			aiProcessed: t.aiProcessed,
			confidence: t.confidence
		}))
		const unmatched: string[] = []
		for (const fragment of skipped) {
			const repeated = await this.repeatLastExpense(user.id, fragment, today)
			if (repeated) entries.push(repeated)
			else unmatched.push(fragment.fragment)
		}
		if (unmatched.length) this.logger.debug(`User ${user.id}: ${unmatched.length} fragment(s) without amount`)

		const stored = await this.repo.insertExpenses(entries)
		return { stored, skipped: unmatched }
	}

	private async repeatLastExpense(
		userId: string,
		fragment: UnpricedFragment,
		today: Date
	): Promise<NewExpense | null> {
		if (!fragment.description) return null
		const last = await this.repo.findLastExpenseByDescription(userId, fragment.description)
		if (!last) return null
		return {
			userId,
			amount: last.amount,
			currency: last.currency,
			description: fragment.description,
			category: last.category,
			direction: 'expense',
			spentOn: fragment.date ?? today,
			aiProcessed: false,
			confidence: REUSED_CONFIDENCE
		}
	}

	async deleteLast(userId: string): Promise<ExpenseRecord | null> {
		const last = await this.repo.findLastExpense(userId)
		if (!last) return null
		await this.repo.deleteExpense(last.id)
		return last
	}

	async hasEntryOn(userId: string, day: Date): Promise<boolean> {
		const entries = await this.repo.listExpenses(userId, day, day)
		return entries.length > 0
	}
}
