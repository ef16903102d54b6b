import {
	WarnOnceCache,
	isDaytimeForUser,
	parseOffsetMinutes,
	resolveTimezone,
	todayInTimezone
} from './timezone'

describe('timezone utils', () => {
	const sink = () => ({ warn: jest.fn() })

	describe('WarnOnceCache', () => {
		it('logs each key once', () => {
			const logger = sink()
			const cache = new WarnOnceCache(logger)
			expect(cache.warnOnce('a', 'first')).toBe(true)
			expect(cache.warnOnce('a', 'again')).toBe(false)
			expect(logger.warn).toHaveBeenCalledTimes(1)
			expect(logger.warn).toHaveBeenCalledWith('first')
		})

		it('forgets the oldest key when full', () => {
			const cache = new WarnOnceCache(sink(), 2)
			cache.warnOnce('a', 'a')
			cache.warnOnce('b', 'b')
			cache.warnOnce('c', 'c')
			expect(cache.size).toBe(2)
			expect(cache.has('a')).toBe(false)
			expect(cache.has('c')).toBe(true)
		})
	})

	describe('resolveTimezone', () => {
		it('keeps valid zones and offsets', () => {
			const cache = new WarnOnceCache(sink())
			expect(resolveTimezone('Europe/Moscow', cache)).toBe('Europe/Moscow')
			expect(resolveTimezone('+03:00', cache)).toBe('+03:00')
			expect(cache.size).toBe(0)
		})

		it('falls back to UTC and warns once per bad value', () => {
			const logger = sink()
			const cache = new WarnOnceCache(logger)
			expect(resolveTimezone('Mars/Olympus', cache)).toBe('UTC')
			expect(resolveTimezone('Mars/Olympus', cache)).toBe('UTC')
			expect(logger.warn).toHaveBeenCalledTimes(1)
			expect(logger.warn).toHaveBeenCalledWith("Invalid timezone 'Mars/Olympus', falling back to UTC")
		})

		it('handles missing and non-string values', () => {
			const logger = sink()
			const cache = new WarnOnceCache(logger)
			expect(resolveTimezone(null, cache)).toBe('UTC')
			expect(resolveTimezone('  ', cache)).toBe('UTC')
			expect(logger.warn).not.toHaveBeenCalled()
			expect(resolveTimezone(42, cache)).toBe('UTC')
			expect(logger.warn).toHaveBeenCalledWith(
				'Non-string timezone value of type number, falling back to UTC'
			)
		})
	})

	it('parses fixed offsets', () => {
		expect(parseOffsetMinutes('UTC+5')).toBe(300)
		expect(parseOffsetMinutes('-03:30')).toBe(-210)
		expect(parseOffsetMinutes('+15')).toBeNull()
		expect(parseOffsetMinutes('Europe/Moscow')).toBeNull()
	})

	it('checks the 10:00-21:00 local window', () => {
		const cache = new WarnOnceCache(sink())
		expect(isDaytimeForUser('Europe/Moscow', new Date('2025-03-15T06:59:00Z'), cache)).toBe(false)
		expect(isDaytimeForUser('Europe/Moscow', new Date('2025-03-15T07:30:00Z'), cache)).toBe(true)
		expect(isDaytimeForUser('Europe/Moscow', new Date('2025-03-15T17:59:00Z'), cache)).toBe(true)
		expect(isDaytimeForUser('Europe/Moscow', new Date('2025-03-15T18:00:00Z'), cache)).toBe(false)
	})

	it('gives the local calendar day', () => {
		const cache = new WarnOnceCache(sink())
		expect(todayInTimezone('Asia/Tokyo', new Date('2025-03-15T20:00:00Z'), cache)).toEqual(
			new Date('2025-03-16T00:00:00.000Z')
		)
		expect(todayInTimezone('bogus', new Date('2025-03-15T20:00:00Z'), cache)).toEqual(
			new Date('2025-03-15T00:00:00.000Z')
		)
	})
})
