import { Injectable } from '@nestjs/common'
import { Parser } from 'json2csv'
import { formatIsoDate } from '../../utils/date'
import { WarnOnceCache, todayInTimezone } from '../../utils/timezone'
import { type ExpenseRecord, LedgerRepo, type UserRecord } from '../ledger/ledger.repo'
import { type PeriodRange, parseCustomRange, previousPeriod, resolvePeriod } from '../periods/period.util'

export interface CurrencyTotals {
	currency: string
	expense: number
	income: number
	previousExpense: number
	/** Spending change against the previous period in percent; null when there was nothing to compare with. */
	changePct: number | null
}

export interface CategoryShare {
	category: string
	currency: string
	amount: number
	/** Share of this currency's spending, 0..100. */
	share: number
}

export interface PeriodReport {
	period: PeriodRange
	previous: PeriodRange
	entries: number
	totals: CurrencyTotals[]
	categories: CategoryShare[]
}

export interface CsvExport {
	filename: string
	csv: string
	entries: number
}

const round2 = (n: number) => Math.round(n * 100) / 100

function sumBy(entries: ExpenseRecord[], direction: ExpenseRecord['direction']) {
	const totals = new Map<string, number>()
	for (const e of entries) {
		if (e.direction !== direction) continue
		totals.set(e.currency, (totals.get(e.currency) ?? 0) + e.amount)
	}
	return totals
}

export function changePercent(current: number, previous: number): number | null {
	if (previous <= 0) return null
	return Math.round(((current - previous) / previous) * 1000) / 10
}

export function summarize(
	period: PeriodRange,
	previous: PeriodRange,
	current: ExpenseRecord[],
	before: ExpenseRecord[]
): PeriodReport {
	const spent = sumBy(current, 'expense')
	const earned = sumBy(current, 'income')
	const spentBefore = sumBy(before, 'expense')
	const currencies = [...new Set([...spent.keys(), ...earned.keys(), ...spentBefore.keys()])].sort()

	const totals = currencies.map(currency => {
		const expense = round2(spent.get(currency) ?? 0)
		const previousExpense = round2(spentBefore.get(currency) ?? 0)
		return {
			currency,
			expense,
			income: round2(earned.get(currency) ?? 0),
			previousExpense,
			changePct: changePercent(expense, previousExpense)
		}
	})

	const byCategory = new Map<string, CategoryShare>()
	for (const e of current) {
		if (e.direction !== 'expense') continue
		const key = `${e.currency}\u0000${e.category}`
		const row = byCategory.get(key) ?? { category: e.category, currency: e.currency, amount: 0, share: 0 }
		row.amount += e.amount
		byCategory.set(key, row)
	}
	const categories = [...byCategory.values()]
		.map(row => {
			const total = spent.get(row.currency) ?? 0
			return {
				...row,
				amount: round2(row.amount),
				share: total > 0 ? Math.round((row.amount / total) * 1000) / 10 : 0
			}
		})
		.sort((a, b) => a.currency.localeCompare(b.currency) || b.amount - a.amount)

	return { period, previous, entries: current.length, totals, categories }
}

@Injectable()
export class ReportsService {
	constructor(
		private readonly repo: LedgerRepo,
		private readonly timezoneWarnings: WarnOnceCache
	) {}

	resolveForUser(user: UserRecord, keyword: string | undefined, now: Date): PeriodRange {
		const today = todayInTimezone(user.timezone, now, this.timezoneWarnings)
		const arg = keyword?.trim() ?? ''
		return parseCustomRange(arg) ?? resolvePeriod(arg || 'month', today)
	}

	/** Totals for the period and the one before it, by currency and category. */
	async buildReport(user: UserRecord, keyword?: string, now: Date = new Date()): Promise<PeriodReport> {
		const period = this.resolveForUser(user, keyword, now)
		const previous = previousPeriod(period)
		const [current, before] = await Promise.all([
			this.repo.listExpenses(user.id, period.start, period.end),
			this.repo.listExpenses(user.id, previous.start, previous.end)
		])
		return summarize(period, previous, current, before)
	}

	async exportCsv(user: UserRecord, keyword?: string, now: Date = new Date()): Promise<CsvExport> {
		const period = this.resolveForUser(user, keyword, now)
		const entries = await this.repo.listExpenses(user.id, period.start, period.end)
		const parser = new Parser({
			fields: ['date', 'direction', 'amount', 'currency', 'category', 'description', 'aiProcessed']
		})
		const csv = parser.parse(
			entries.map(e => ({
				date: formatIsoDate(e.spentOn),
				direction: e.direction,
				amount: e.amount,
				currency: e.currency,
				category: e.category,
				description: e.description,
				aiProcessed: e.aiProcessed
			}))
		)
		return {
			filename: `expenses_${formatIsoDate(period.start)}_${formatIsoDate(period.end)}.csv`,
			csv,
			entries: entries.length
		}
	}
}
