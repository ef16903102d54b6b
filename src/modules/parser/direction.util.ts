export type Direction = 'expense' | 'income'

const INCOME_PATTERNS = [/^\s*\+/u, /(?:^|\s)\+\s*\d/u, /(?:^|\s)плюс\s*\d/iu]

/** `+5000`, `долг +1200` and `зарплата плюс 3000` are income; everything else is an expense. */
export function detectDirection(text: string): Direction {
	const source = String(text ?? '')
	return INCOME_PATTERNS.some(re => re.test(source)) ? 'income' : 'expense'
}

/** Drops the sign markers that decide the direction so they do not leak into the description. */
export function stripSignMarkers(text: string): string {
	return String(text ?? '')
		.replace(/^\s*(?:плюс|минус)(?=\s|\d)/iu, '')
		.replace(/(^|\s)[+-]\s*(?=\d)/gu, '$1')
		.replace(/(^|\s)(?:плюс|минус)\s+(?=\d)/giu, '$1')
		.replace(/\s+/g, ' ')
		.trim()
}
