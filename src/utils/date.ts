const DAY_MS = 24 * 60 * 60 * 1000

/** Calendar date at UTC midnight; out-of-range parts roll over like `Date.UTC`. */
export function calendarDate(year: number, monthIndex: number, day: number): Date {
	return new Date(Date.UTC(year, monthIndex, day, 0, 0, 0, 0))
}

export function fromParts(day: number, monthIndex: number, year: number): Date | null {
	const d = calendarDate(year, monthIndex, day)
	if (
		d.getUTCFullYear() !== year ||
		d.getUTCMonth() !== monthIndex ||
		d.getUTCDate() !== day
	) {
		return null
	}
	return d
}

export function toCalendarDate(date: Date): Date {
	return calendarDate(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
}

export function addDays(date: Date, days: number): Date {
	return calendarDate(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + days)
}

export function startOfMonth(date: Date): Date {
	return calendarDate(date.getUTCFullYear(), date.getUTCMonth(), 1)
}

export function endOfMonth(date: Date): Date {
	return calendarDate(date.getUTCFullYear(), date.getUTCMonth() + 1, 0)
}

/** Monday of the week containing `date`. */
export function startOfWeek(date: Date): Date {
	const weekday = (date.getUTCDay() + 6) % 7
	return addDays(date, -weekday)
}

export function daysInclusive(start: Date, end: Date): number {
	return Math.round((toCalendarDate(end).getTime() - toCalendarDate(start).getTime()) / DAY_MS) + 1
}

export function isLeapYear(year: number): boolean {
	return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0)
}

export function formatIsoDate(date: Date): string {
	return date.toISOString().slice(0, 10)
}

export function formatDisplayDate(date: Date): string {
	const dd = String(date.getUTCDate()).padStart(2, '0')
	const mm = String(date.getUTCMonth() + 1).padStart(2, '0')
	return `${dd}.${mm}.${date.getUTCFullYear()}`
}

const RELATIVE_DAY_WORDS: Record<string, number> = {
	сегодня: 0,
	today: 0,
	вчера: -1,
	yesterday: -1,
	позавчера: -2
}

export interface DateExtraction {
	date: Date | null
	rest: string
}

function collapseSpaces(text: string): string {
	return text.split(/\s+/).filter(Boolean).join(' ')
}

/**
 * Cuts an explicit date out of a message. Only full dates (`dd.mm.yyyy`, `dd.mm.yy`)
 * and relative day words count: a short `dd.mm` is left alone because it is
 * indistinguishable from a fractional amount such as `4.5`.
 */
export function extractDateFromText(text: string, today: Date): DateExtraction {
	const source = String(text ?? '')
	const full = source.match(/(?<!\d)([0-3]?\d)[./-]([01]?\d)[./-](\d{4}|\d{2})(?!\d)/u)
	if (full && typeof full.index === 'number') {
		const yearRaw = Number(full[3])
		const year = full[3].length === 2 ? 2000 + yearRaw : yearRaw
		const date = fromParts(Number(full[1]), Number(full[2]) - 1, year)
		if (date) {
			const rest = source.slice(0, full.index) + ' ' + source.slice(full.index + full[0].length)
			return { date, rest: collapseSpaces(rest) }
		}
	}

	const words = source.split(/\s+/).filter(Boolean)
	const idx = words.findIndex(w => Object.hasOwn(RELATIVE_DAY_WORDS, w.toLowerCase()))
	if (idx >= 0) {
		const shift = RELATIVE_DAY_WORDS[words[idx].toLowerCase()] ?? 0
		const rest = [...words.slice(0, idx), ...words.slice(idx + 1)].join(' ')
		return { date: addDays(toCalendarDate(today), shift), rest }
	}

	return { date: null, rest: collapseSpaces(source) }
}
