// A comma between two digits is a decimal separator, not a delimiter.
const PRIMARY_DELIMITERS = /[;\n\r]+|,(?!\d)|(?<!\d),|\s\+\s/u
const CONJUNCTIONS = /\s+(?:и|and)\s+/iu

function hasDigit(text: string): boolean {
	return /\d/.test(text)
}

function splitOnConjunctions(part: string): string[] {
	const pieces = part.split(CONJUNCTIONS).map(p => p.trim())
	if (pieces.length > 1 && pieces.every(hasDigit)) return pieces
	return [part]
}

/**
 * Splits "кофе 200, такси 300; +500 долг" into one fragment per expense.
 * Conjunctions split only when every side carries its own number, so
 * "Кафе и рестораны 500" stays whole.
 */
export function splitExpenseText(text: string): string[] {
	return String(text ?? '')
		.split(PRIMARY_DELIMITERS)
		.map(p => p.trim())
		.filter(Boolean)
		.flatMap(splitOnConjunctions)
		.filter(Boolean)
}
