import { formatDisplayDate } from '../../../utils/date'
import { escapeHtml, formatAmount } from '../../../utils/format'
import type { ExpenseRecord } from '../../ledger/ledger.repo'

export const NO_AMOUNT_TEXT =
	'Не нашёл сумму. Напишите, например: <code>Кофе 200</code> или <code>+5000 зарплата</code>'

export function entryLine(entry: ExpenseRecord, today: Date): string {
	const sign = entry.direction === 'income' ? '➕' : '➖'
	const date = entry.spentOn.getTime() === today.getTime() ? '' : ` · ${formatDisplayDate(entry.spentOn)}`
	return `${sign} ${formatAmount(entry.amount, entry.currency)} · ${escapeHtml(entry.category)} · ${escapeHtml(entry.description)}${date}`
}

export function recordedText(stored: ExpenseRecord[], skipped: string[], today: Date): string {
	const title = stored.length === 1 ? '✅ Записал:' : `✅ Записал ${stored.length}:`
	const lines = [title, ...stored.map(e => entryLine(e, today))]
	if (skipped.length) {
		lines.push('', `Без суммы, пропущено: ${skipped.map(s => `«${escapeHtml(s)}»`).join(', ')}`)
	}
	return lines.join('\n')
}

export function undoText(entry: ExpenseRecord | null, today: Date): string {
	if (!entry) return 'Удалять нечего.'
	return `🗑 Удалил: ${entryLine(entry, today).slice(2)}`
}
