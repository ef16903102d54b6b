const CURRENCY_SYMBOLS: Record<string, string> = {
	EUR: '€',
	USD: '$',
	UAH: '₴',
	RUB: '₽',
	GBP: '£',
	PLN: 'zł',
	KZT: '₸',
	GEL: '₾',
	TRY: '₺',
	JPY: '¥',
	CNY: '¥',
	INR: '₹',
	ILS: '₪'
}

export function getCurrencySymbol(currency: string): string {
	const code = currency.toUpperCase()
	return Object.hasOwn(CURRENCY_SYMBOLS, code) ? CURRENCY_SYMBOLS[code] : code
}

function groupIntegerPart(raw: string): string {
	return raw.replace(/\B(?=(\d{3})+(?!\d))/g, ' ')
}

/** `1234.5, 'RUB'` → `1 234,50 ₽`; whole amounts drop the fraction. */
export function formatAmount(amount: number, currency: string): string {
	const value = Number.isFinite(amount) ? amount : 0
	const negative = value < 0
	const [intPart, fracPart] = Math.abs(value).toFixed(2).split('.')
	const body = fracPart === '00' ? groupIntegerPart(intPart) : `${groupIntegerPart(intPart)},${fracPart}`
	return `${negative ? '-' : ''}${body} ${getCurrencySymbol(currency)}`
}

export function formatChange(pct: number | null): string {
	if (pct == null) return '—'
	const sign = pct > 0 ? '+' : ''
	return `${sign}${String(pct).replace('.', ',')}%`
}

export function escapeHtml(text: string): string {
	return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}
