import { formatDisplayDate } from '../../../utils/date'
import { escapeHtml, formatAmount, formatChange } from '../../../utils/format'
import type { PeriodRange } from '../../periods/period.util'
import type { PeriodReport } from '../../reports/reports.service'

const TOP_CATEGORIES = 5

export function periodLabel(period: PeriodRange): string {
	const start = formatDisplayDate(period.start)
	const end = formatDisplayDate(period.end)
	return start === end ? start : `${start} – ${end}`
}

export function reportText(report: PeriodReport): string {
	const header = `📊 <b>Отчёт за ${periodLabel(report.period)}</b>`
	if (!report.entries) {
		return `${header}\n\nЗа этот период записей нет.`
	}

	const blocks = report.totals.map(t => {
		const lines = [`<b>${t.currency}</b>`]
		lines.push(`Расходы: ${formatAmount(t.expense, t.currency)} (${formatChange(t.changePct)})`)
		if (t.income > 0) lines.push(`Доходы: ${formatAmount(t.income, t.currency)}`)
		const top = report.categories
			.filter(c => c.currency === t.currency)
			.slice(0, TOP_CATEGORIES)
			.map(c => `  ${escapeHtml(c.category)}: ${formatAmount(c.amount, c.currency)} · ${String(c.share).replace('.', ',')}%`)
		return [...lines, ...top].join('\n')
	})

	return [
		header,
		`Записей: ${report.entries}`,
		...blocks,
		`<i>Сравнение с ${periodLabel(report.previous)}</i>`
	].join('\n\n')
}
