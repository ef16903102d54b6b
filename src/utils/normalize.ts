// Pictographs, dingbats, arrows, variation selectors, ZWJ and keycap marks that prefix category names.
const LEADING_ICON_RE =
	/^[\p{Extended_Pictographic}\p{Emoji_Modifier}\u{1F1E6}-\u{1F1FF}\u2300-\u23FF\u2600-\u27BF\u2B00-\u2BFF\uFE00-\uFE0F\u{E0100}-\u{E01EF}\u200D\u20E3]+\s*/u

const STOPWORDS = new Set([
	'и',
	'в',
	'на',
	'по',
	'для',
	'с',
	'от',
	'до',
	'из',
	'and',
	'or',
	'the',
	'for',
	'with',
	'from',
	'to',
	'at',
	'of'
])

export function stripLeadingEmoji(value: string | null | undefined): string {
	if (!value) return ''
	return value.replace(LEADING_ICON_RE, '').trim()
}

export function leadingEmoji(value: string | null | undefined): string | null {
	if (!value) return null
	const match = value.match(LEADING_ICON_RE)
	return match ? match[0].trim() : null
}

/** Lowercase, drop diacritics, fold ё→е. */
export function foldLetters(text: string): string {
	return text
		.normalize('NFKD')
		.replace(/\p{M}/gu, '')
		.normalize('NFC')
		.toLowerCase()
		.replace(/ё/g, 'е')
}

export function normalizeLabel(text: string | null | undefined): string {
	return foldLetters(stripLeadingEmoji(text))
		.replace(/\s+/g, ' ')
		.trim()
}

export function tokenize(text: string | null | undefined): Set<string> {
	const tokens = normalizeLabel(text).match(/[\p{L}\p{N}]+/gu) ?? []
	return new Set(tokens.filter(t => !STOPWORDS.has(t)))
}

export function capitalizeFirst(text: string): string {
	if (!text) return text
	return text[0].toUpperCase() + text.slice(1)
}
