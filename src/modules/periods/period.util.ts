import {
	addDays,
	calendarDate,
	daysInclusive,
	endOfMonth,
	isLeapYear,
	startOfMonth,
	startOfWeek,
	fromParts,
	toCalendarDate
} from '../../utils/date'

/** Inclusive calendar range, dates at UTC midnight. */
export interface PeriodRange {
	start: Date
	end: Date
	keyword: string
}

export const MONTH_NAMES: Record<string, number> = {
	январь: 0,
	января: 0,
	февраль: 1,
	февраля: 1,
	март: 2,
	марта: 2,
	апрель: 3,
	апреля: 3,
	май: 4,
	мая: 4,
	июнь: 5,
	июня: 5,
	июль: 6,
	июля: 6,
	август: 7,
	августа: 7,
	сентябрь: 8,
	сентября: 8,
	октябрь: 9,
	октября: 9,
	ноябрь: 10,
	ноября: 10,
	декабрь: 11,
	декабря: 11,
	january: 0,
	jan: 0,
	february: 1,
	feb: 1,
	march: 2,
	mar: 2,
	april: 3,
	apr: 3,
	may: 4,
	june: 5,
	jun: 5,
	july: 6,
	jul: 6,
	august: 7,
	aug: 7,
	september: 8,
	sep: 8,
	sept: 8,
	october: 9,
	oct: 9,
	november: 10,
	nov: 10,
	december: 11,
	dec: 11
}

type Season = 'winter' | 'spring' | 'summer' | 'autumn'

const SEASONS: Record<string, Season> = {
	зима: 'winter',
	зимой: 'winter',
	winter: 'winter',
	весна: 'spring',
	весной: 'spring',
	spring: 'spring',
	лето: 'summer',
	летом: 'summer',
	summer: 'summer',
	осень: 'autumn',
	осенью: 'autumn',
	autumn: 'autumn',
	fall: 'autumn'
}

const ALIASES: Record<string, string> = {
	сегодня: 'today',
	вчера: 'yesterday',
	позавчера: 'day_before_yesterday',
	неделя: 'week',
	эта_неделя: 'week',
	прошлая_неделя: 'last_week',
	позапрошлая_неделя: 'week_before_last',
	месяц: 'month',
	этот_месяц: 'month',
	прошлый_месяц: 'last_month',
	позапрошлый_месяц: 'month_before_last',
	год: 'year',
	этот_год: 'year',
	прошлый_год: 'last_year'
}

const MONTH_KEYWORDS = new Set(['month', 'this_month', 'last_month', 'month_before_last'])

// Keywords whose ranges keep same-length semantics even when they start on the 1st.
const NON_MONTH_KEYWORDS = new Set([
	'today',
	'yesterday',
	'day_before_yesterday',
	'week',
	'this_week',
	'last_week',
	'week_before_last',
	'year',
	'this_year',
	'last_year',
	...Object.keys(SEASONS)
])

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
	return Object.hasOwn(table, key) ? table[key] : undefined
}

/** Ten years; larger day counts are not a rolling window. */
export const MAX_ROLLING_DAYS = 3660

const ROLLING_RE = [/^(\d+)$/, /^last_(\d+)_days?$/, /^(\d+)_days?$/, /^последние_(\d+)_(?:дней|дня|день)$/]

export function normalizePeriodKeyword(keyword: string | null | undefined): string {
	const key = String(keyword ?? '')
		.trim()
		.toLowerCase()
		.replace(/ё/g, 'е')
		.replace(/[\s-]+/g, '_')
	return lookup(ALIASES, key) ?? key
}

function rollingDays(key: string): number | null {
	for (const re of ROLLING_RE) {
		const m = key.match(re)
		if (!m) continue
		const days = Number(m[1])
		return days > MAX_ROLLING_DAYS ? null : Math.max(1, days)
	}
	return null
}

function range(start: Date, end: Date, keyword: string): PeriodRange {
	return { start, end, keyword }
}

/** Rolling N-day window ending today. Never aligned to weeks or months. */
export function rollingWindow(days: number, today: Date, keyword = `last_${days}_days`): PeriodRange {
	const end = toCalendarDate(today)
	const span = Math.min(MAX_ROLLING_DAYS, Math.max(1, Math.trunc(days) || 1))
	return range(addDays(end, -(span - 1)), end, keyword)
}

/** Monday..Sunday week `weeksBack` weeks before the current one. */
export function calendarWeek(today: Date, weeksBack: number, keyword: string): PeriodRange {
	const start = addDays(startOfWeek(toCalendarDate(today)), -7 * weeksBack)
	return range(start, addDays(start, 6), keyword)
}

/** Full calendar month `monthsBack` months before the current one. */
export function calendarMonth(today: Date, monthsBack: number, keyword: string): PeriodRange {
	const start = calendarDate(today.getUTCFullYear(), today.getUTCMonth() - monthsBack, 1)
	return range(start, endOfMonth(start), keyword)
}

export function customRange(start: Date, end: Date): PeriodRange {
	const a = toCalendarDate(start)
	const b = toCalendarDate(end)
	return a.getTime() <= b.getTime() ? range(a, b, 'custom') : range(b, a, 'custom')
}

const ISO_DAY = String.raw`(\d{4})-(\d{2})-(\d{2})`
const CUSTOM_RANGE_RE = new RegExp(`^${ISO_DAY}\\s*(?:\\.\\.|–|—|\\s-\\s|\\s)\\s*${ISO_DAY}$`)

/** `2026-01-01..2026-01-31` (also `–` or a space between the dates); null for anything else. */
export function parseCustomRange(text: string): PeriodRange | null {
	const m = text.trim().match(CUSTOM_RANGE_RE)
	if (!m) return null
	const start = fromParts(Number(m[3]), Number(m[2]) - 1, Number(m[1]))
	const end = fromParts(Number(m[6]), Number(m[5]) - 1, Number(m[4]))
	if (!start || !end) return null
	return customRange(start, end)
}

function seasonRange(season: Season, today: Date, keyword: string): PeriodRange {
	const year = today.getUTCFullYear()
	const month = today.getUTCMonth() + 1
	switch (season) {
		case 'winter': {
			if (month === 12) return range(calendarDate(year, 11, 1), today, keyword)
			if (month <= 2) return range(calendarDate(year - 1, 11, 1), today, keyword)
			return range(
				calendarDate(year - 1, 11, 1),
				calendarDate(year, 1, isLeapYear(year) ? 29 : 28),
				keyword
			)
		}
		case 'spring': {
			if (month >= 6) return range(calendarDate(year, 2, 1), calendarDate(year, 4, 31), keyword)
			if (month >= 3) return range(calendarDate(year, 2, 1), today, keyword)
			return range(calendarDate(year - 1, 2, 1), calendarDate(year - 1, 4, 31), keyword)
		}
		case 'summer': {
			if (month >= 9) return range(calendarDate(year, 5, 1), calendarDate(year, 7, 31), keyword)
			if (month >= 6) return range(calendarDate(year, 5, 1), today, keyword)
			return range(calendarDate(year - 1, 5, 1), calendarDate(year - 1, 7, 31), keyword)
		}
		case 'autumn': {
			if (month === 12) return range(calendarDate(year, 8, 1), calendarDate(year, 10, 30), keyword)
			if (month >= 9) return range(calendarDate(year, 8, 1), today, keyword)
			return range(calendarDate(year - 1, 8, 1), calendarDate(year - 1, 10, 30), keyword)
		}
	}
}

/**
 * Turns a period keyword into an inclusive date range relative to `today`.
 *
 * Calendar keywords (`last_week`, `last_month`, `last_year`) and rolling windows
 * (`7`, `last_7_days`, `last_365_days`) are distinct and never stand in for each other.
 * A month name later than the current month means that month of the previous year.
 * Unknown keywords fall back to the current month to date.
 */
export function resolvePeriod(keyword: string, today: Date): PeriodRange {
	const key = normalizePeriodKeyword(keyword)
	const day = toCalendarDate(today)
	const year = day.getUTCFullYear()

	switch (key) {
		case 'today':
			return range(day, day, key)
		case 'yesterday': {
			const d = addDays(day, -1)
			return range(d, d, key)
		}
		case 'day_before_yesterday': {
			const d = addDays(day, -2)
			return range(d, d, key)
		}
		case 'week':
		case 'this_week':
			return range(startOfWeek(day), day, key)
		case 'last_week':
			return calendarWeek(day, 1, key)
		case 'week_before_last':
			return calendarWeek(day, 2, key)
		case 'month':
		case 'this_month':
			return range(startOfMonth(day), day, key)
		case 'last_month':
			return calendarMonth(day, 1, key)
		case 'month_before_last':
			return calendarMonth(day, 2, key)
		case 'year':
		case 'this_year':
			return range(calendarDate(year, 0, 1), day, key)
		case 'last_year':
			return range(calendarDate(year - 1, 0, 1), calendarDate(year - 1, 11, 31), key)
	}

	const days = rollingDays(key)
	if (days != null) return rollingWindow(days, day, key)

	const season = lookup(SEASONS, key)
	if (season) return seasonRange(season, day, key)

	const monthIndex = lookup(MONTH_NAMES, key)
	if (monthIndex != null) {
		const monthYear = monthIndex > day.getUTCMonth() ? year - 1 : year
		const start = calendarDate(monthYear, monthIndex, 1)
		return range(start, endOfMonth(start), key)
	}

	return range(startOfMonth(day), day, 'month')
}

export function periodLengthDays(period: PeriodRange): number {
	return daysInclusive(period.start, period.end)
}

/**
 * Month names, the month keywords, and any other range starting on the 1st whose
 * keyword is not a day, week, year, season or rolling-window keyword.
 */
export function isMonthShaped(period: PeriodRange): boolean {
	const key = normalizePeriodKeyword(period.keyword)
	if (lookup(MONTH_NAMES, key) != null || MONTH_KEYWORDS.has(key)) return true
	if (NON_MONTH_KEYWORDS.has(key) || rollingDays(key) != null) return false
	return period.start.getUTCDate() === 1
}

/**
 * Month-shaped ranges step back to the full preceding calendar month; everything else
 * steps back by its own length so the two windows are adjacent and equally long.
 */
export function previousPeriod(period: PeriodRange): PeriodRange {
	if (isMonthShaped(period)) {
		const end = addDays(period.start, -1)
		return range(startOfMonth(end), end, period.keyword)
	}
	const len = periodLengthDays(period)
	const end = addDays(period.start, -1)
	return range(addDays(end, -(len - 1)), end, period.keyword)
}
