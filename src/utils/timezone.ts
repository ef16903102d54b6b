import { Logger } from '@nestjs/common'
import { calendarDate } from './date'

export const NOTIFICATION_START_HOUR = 10
export const NOTIFICATION_END_HOUR = 21
export const FALLBACK_TIMEZONE = 'UTC'

type WarnSink = Pick<Logger, 'warn'>

/**
 * Remembers which bad values were already reported so each one is logged once.
 * Holds at most `maxSize` keys; the oldest is forgotten first.
 */
export class WarnOnceCache {
	private readonly seen = new Set<string>()

	constructor(
		private readonly logger: WarnSink = new Logger('Timezone'),
		private readonly maxSize = 256
	) {}

	get size(): number {
		return this.seen.size
	}

	has(key: string): boolean {
		return this.seen.has(key)
	}

	warnOnce(key: string, message: string): boolean {
		if (this.seen.has(key)) return false
		if (this.seen.size >= this.maxSize) {
			const oldest = this.seen.values().next()
			if (!oldest.done) this.seen.delete(oldest.value)
		}
		this.seen.add(key)
		this.logger.warn(message)
		return true
	}

	clear(): void {
		this.seen.clear()
	}
}

export interface LocalParts {
	year: number
	month: number
	day: number
	hour: number
	minute: number
}

const OFFSET_RE = /^(?:UTC|GMT)?([+-])(\d{1,2})(?::?(\d{2}))?$/i

export function parseOffsetMinutes(timezone: string): number | null {
	const m = timezone.replace(/\s+/g, '').match(OFFSET_RE)
	if (!m) return null
	const hours = Number(m[2])
	const mins = Number(m[3] ?? 0)
	if (hours > 14 || mins > 59) return null
	return (m[1] === '-' ? -1 : 1) * (hours * 60 + mins)
}

export function isValidTimezone(timezone: string): boolean {
	if (parseOffsetMinutes(timezone) != null) return true
	try {
		new Intl.DateTimeFormat('en-GB', { timeZone: timezone })
		return true
	} catch {
		return false
	}
}

/** Returns a usable zone for `value`, falling back to UTC and reporting each bad value once. */
export function resolveTimezone(value: unknown, warnings: WarnOnceCache): string {
	if (typeof value !== 'string') {
		if (value != null) {
			warnings.warnOnce(
				`type:${typeof value}`,
				`Non-string timezone value of type ${typeof value}, falling back to ${FALLBACK_TIMEZONE}`
			)
		}
		return FALLBACK_TIMEZONE
	}
	const trimmed = value.trim()
	if (!trimmed) return FALLBACK_TIMEZONE
	if (isValidTimezone(trimmed)) return trimmed
	warnings.warnOnce(
		trimmed,
		`Invalid timezone '${trimmed}', falling back to ${FALLBACK_TIMEZONE}`
	)
	return FALLBACK_TIMEZONE
}

export function localDateParts(date: Date, timezone: string): LocalParts {
	const offset = parseOffsetMinutes(timezone)
	if (offset != null) {
		const shifted = new Date(date.getTime() + offset * 60_000)
		return {
			year: shifted.getUTCFullYear(),
			month: shifted.getUTCMonth() + 1,
			day: shifted.getUTCDate(),
			hour: shifted.getUTCHours(),
			minute: shifted.getUTCMinutes()
		}
	}
	const fmt = new Intl.DateTimeFormat('en-GB', {
		timeZone: timezone || FALLBACK_TIMEZONE,
		year: 'numeric',
		month: '2-digit',
		day: '2-digit',
		hour: '2-digit',
		minute: '2-digit',
		hourCycle: 'h23'
	})
	const parts = fmt.formatToParts(date)
	const get = (type: Intl.DateTimeFormatPartTypes) =>
		Number(parts.find(p => p.type === type)?.value ?? '0')
	return {
		year: get('year'),
		month: get('month'),
		day: get('day'),
		hour: get('hour'),
		minute: get('minute')
	}
}

/** 10:00–20:59 local time counts as daytime. */
export function isDaytimeForUser(
	timezone: unknown,
	now: Date,
	warnings: WarnOnceCache
): boolean {
	const { hour } = localDateParts(now, resolveTimezone(timezone, warnings))
	return hour >= NOTIFICATION_START_HOUR && hour < NOTIFICATION_END_HOUR
}

export function todayInTimezone(timezone: unknown, now: Date, warnings: WarnOnceCache): Date {
	const local = localDateParts(now, resolveTimezone(timezone, warnings))
	return calendarDate(local.year, local.month - 1, local.day)
}
