import currencyCues from './data/currency-cues.json'

export const FALLBACK_CURRENCY = 'RUB'

export interface CurrencyCueDefinition {
	code: string
	symbols?: string[]
	words?: string[]
	stems?: string[]
	phrases?: string[]
}

export type CurrencySource = 'cue' | 'text' | 'default'

export interface AmountExtraction {
	amount: number
	currency: string
	currencySource: CurrencySource
	residual: string
}

interface AmountPattern {
	regex: RegExp
	currency: string | null
}

const NUMBER = '\\d+(?:[.,]\\d+)?'

/** Ledger amounts are NUMERIC(18,4). */
export const MAX_AMOUNT_EXCLUSIVE = 1e14
export const MAX_FRACTION_DIGITS = 4

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Alternation for one currency. Lettered cues must not continue a preceding word
 * (`Mars` is not ARS, `OpenAI` is not PEN); whole words must not run into the next letter.
 */
export function buildCueSource(def: CurrencyCueDefinition): string {
	const parts = (def.symbols ?? []).map(escapeRegExp)
	const lettered = [
		...(def.phrases ?? []).map(p => `(?:${p})(?!\\p{L})`),
		...(def.words ?? []).map(w => `${escapeRegExp(w)}(?!\\p{L})`),
		...(def.stems ?? []).map(s => `${escapeRegExp(s)}\\p{L}*`)
	]
	if (lettered.length) parts.push(`(?<!\\p{L})(?:${lettered.join('|')})`)
	return parts.join('|')
}

/** Cues that may stand before the number: symbols and the ISO code. */
export function buildPrefixCueSource(def: CurrencyCueDefinition): string {
	const parts = (def.symbols ?? []).map(escapeRegExp)
	parts.push(`(?<!\\p{L})${escapeRegExp(def.code)}(?!\\p{L})`)
	return parts.join('|')
}

const CUES: CurrencyCueDefinition[] = currencyCues

const CURRENCY_DETECTORS: Array<{ code: string; regex: RegExp }> = CUES.map(def => ({
	code: def.code,
	regex: new RegExp(`(?:${buildCueSource(def)})`, 'iu')
}))

const AMOUNT_PATTERNS: AmountPattern[] = [
	...CUES.flatMap(def => {
		const cue = buildCueSource(def)
		const prefix = buildPrefixCueSource(def)
		return [
			{
				regex: new RegExp(`(?<![\\d.,])(${NUMBER})\\s*(?:${cue})`, 'iu'),
				currency: def.code
			},
			{
				regex: new RegExp(`(?:${prefix})\\s*(${NUMBER})(?![\\d.,]*\\d)`, 'iu'),
				currency: def.code
			}
		]
	}),
	{ regex: new RegExp(`(?<![\\d.,])(${NUMBER})\\s*$`, 'u'), currency: null },
	{ regex: new RegExp(`^\\s*(${NUMBER})(?=\\s)`, 'u'), currency: null },
	{ regex: new RegExp(`\\s(${NUMBER})(?=\\s)`, 'u'), currency: null }
]

function normalizeDefault(defaultCurrency?: string | null): string {
	const code = String(defaultCurrency ?? '')
		.trim()
		.toUpperCase()
	return code || FALLBACK_CURRENCY
}

export function parseDecimal(raw: string): number | null {
	const value = Number(raw.replace(',', '.'))
	return Number.isFinite(value) ? value : null
}

/** Positive, below `MAX_AMOUNT_EXCLUSIVE`, at most `MAX_FRACTION_DIGITS` decimals. */
export function isStorableAmount(raw: string, value: number): boolean {
	const fraction = raw.split(/[.,]/)[1] ?? ''
	return value > 0 && value < MAX_AMOUNT_EXCLUSIVE && fraction.length <= MAX_FRACTION_DIGITS
}

/** First currency whose cue appears anywhere in the text, in cue-file order. */
export function detectCurrency(text: string): string | null {
	const source = String(text ?? '')
	for (const detector of CURRENCY_DETECTORS) {
		if (detector.regex.test(source)) return detector.code
	}
	return null
}

export function joinFragments(left: string, right: string): string {
	return `${left.trimEnd()} ${right.trimStart()}`.trim()
}

/**
 * Runs the pattern cascade and returns the first hit, or `null` when the text carries
 * no usable amount. Zero, negative and unstorable values are never returned.
 */
export function extractAmount(
	text: string,
	defaultCurrency?: string | null
): AmountExtraction | null {
	const source = String(text ?? '')
	for (const pattern of AMOUNT_PATTERNS) {
		const match = pattern.regex.exec(source)
		if (!match || typeof match.index !== 'number') continue
		const amount = parseDecimal(match[1])
		if (amount == null || !isStorableAmount(match[1], amount)) return null
		const residual = joinFragments(
			source.slice(0, match.index),
			source.slice(match.index + match[0].length)
		)
		if (pattern.currency) {
			return { amount, currency: pattern.currency, currencySource: 'cue', residual }
		}
		const detected = detectCurrency(source)
		return detected
			? { amount, currency: detected, currencySource: 'text', residual }
			: {
					amount,
					currency: normalizeDefault(defaultCurrency),
					currencySource: 'default',
					residual
				}
	}
	return null
}
