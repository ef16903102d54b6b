import { daysInclusive, extractDateFromText, formatDisplayDate, formatIsoDate, fromParts, startOfWeek } from './date'

const day = (iso: string) => new Date(`${iso}T00:00:00.000Z`)

describe('date utils', () => {
	it('rejects impossible dates', () => {
		expect(fromParts(31, 1, 2025)).toBeNull()
		expect(fromParts(29, 1, 2024)).toEqual(day('2024-02-29'))
	})

	it('starts weeks on Monday', () => {
		expect(startOfWeek(day('2025-03-15'))).toEqual(day('2025-03-10'))
		expect(startOfWeek(day('2025-03-10'))).toEqual(day('2025-03-10'))
	})

	it('counts both ends of a range', () => {
		expect(daysInclusive(day('2025-02-01'), day('2025-02-28'))).toBe(28)
	})

	it('formats dates', () => {
		expect(formatIsoDate(day('2025-03-05'))).toBe('2025-03-05')
		expect(formatDisplayDate(day('2025-03-05'))).toBe('05.03.2025')
	})

	describe('extractDateFromText', () => {
		const today = day('2025-03-01')

		it('cuts a full date out of the text', () => {
			expect(extractDateFromText('кофе 200 15.03.2025', today)).toEqual({
				date: day('2025-03-15'),
				rest: 'кофе 200'
			})
			expect(extractDateFromText('такси 300 01.02.25', today).date).toEqual(day('2025-02-01'))
		})

		it('understands relative day words', () => {
			expect(extractDateFromText('вчера такси 300', today)).toEqual({
				date: day('2025-02-28'),
				rest: 'такси 300'
			})
		})

		it('leaves a fractional amount alone', () => {
			expect(extractDateFromText('Gum 4.5', today)).toEqual({ date: null, rest: 'Gum 4.5' })
		})

		it('ignores an impossible date', () => {
			expect(extractDateFromText('31.02.2025 кофе 5', today)).toEqual({
				date: null,
				rest: '31.02.2025 кофе 5'
			})
		})
	})
})
