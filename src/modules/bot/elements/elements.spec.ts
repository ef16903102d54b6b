import type { CategoryRecord, ExpenseRecord } from '../../ledger/ledger.repo'
import { summarize } from '../../reports/reports.service'
import { entryLine, recordedText, undoText } from './entries'
import { categoriesText } from './help'
import { periodLabel, reportText } from './report'

const day = (iso: string) => new Date(`${iso}T00:00:00.000Z`)

let seq = 0
function entry(partial: Partial<ExpenseRecord>): ExpenseRecord {
	seq += 1
	return {
		id: `exp-${seq}`,
		userId: 'user-1',
		amount: 100,
		currency: 'RUB',
		description: 'Кофе',
		category: '🍽️ Кафе и рестораны',
		direction: 'expense',
		spentOn: day('2025-03-15'),
		aiProcessed: false,
		confidence: 1,
		createdAt: new Date(0),
		...partial
	}
}

describe('report text', () => {
	it('renders totals, change and top categories per currency', () => {
		const report = summarize(
			{ start: day('2025-03-01'), end: day('2025-03-20'), keyword: 'month' },
			{ start: day('2025-02-01'), end: day('2025-02-28'), keyword: 'month' },
			[
				entry({ amount: 700, category: '🛒 Продукты', description: 'Продукты' }),
				entry({ amount: 300 }),
				entry({ amount: 5000, direction: 'income', category: '💰 Прочие доходы', description: 'Зарплата' }),
				entry({ amount: 10, currency: 'USD' })
			],
			[entry({ amount: 800, spentOn: day('2025-02-10') })]
		)

		expect(reportText(report)).toBe(
			[
				'📊 <b>Отчёт за 01.03.2025 – 20.03.2025</b>',
				'Записей: 4',
				'<b>RUB</b>\nРасходы: 1 000 ₽ (+25%)\nДоходы: 5 000 ₽\n  🛒 Продукты: 700 ₽ · 70%\n  🍽️ Кафе и рестораны: 300 ₽ · 30%',
				'<b>USD</b>\nРасходы: 10 $ (—)\n  🍽️ Кафе и рестораны: 10 $ · 100%',
				'<i>Сравнение с 01.02.2025 – 28.02.2025</i>'
			].join('\n\n')
		)
	})

	it('says so when the period is empty', () => {
		const today = { start: day('2025-03-15'), end: day('2025-03-15'), keyword: 'today' }
		const yesterday = { start: day('2025-03-14'), end: day('2025-03-14'), keyword: 'today' }
		expect(reportText(summarize(today, yesterday, [], []))).toBe(
			'📊 <b>Отчёт за 15.03.2025</b>\n\nЗа этот период записей нет.'
		)
		expect(periodLabel(yesterday)).toBe('14.03.2025')
	})
})

describe('entry text', () => {
	const today = day('2025-03-15')

	it('shows the date only for entries on another day', () => {
		expect(entryLine(entry({ amount: 350 }), today)).toBe('➖ 350 ₽ · 🍽️ Кафе и рестораны · Кофе')
		expect(
			entryLine(
				entry({
					amount: 5000.5,
					direction: 'income',
					category: '💰 Прочие доходы',
					description: 'Зарплата',
					spentOn: day('2025-03-14')
				}),
				today
			)
		).toBe('➕ 5 000,50 ₽ · 💰 Прочие доходы · Зарплата · 14.03.2025')
	})

	it('lists stored entries and escapes skipped fragments', () => {
		const text = recordedText(
			[entry({ amount: 200 }), entry({ amount: 12, currency: 'USD', description: 'Такси', category: '🚕 Транспорт' })],
			['привет <b>'],
			today
		)
		expect(text).toBe(
			[
				'✅ Записал 2:',
				'➖ 200 ₽ · 🍽️ Кафе и рестораны · Кофе',
				'➖ 12 $ · 🚕 Транспорт · Такси',
				'',
				'Без суммы, пропущено: «привет &lt;b&gt;»'
			].join('\n')
		)
		expect(recordedText([entry({ amount: 200 })], [], today)).toBe(
			'✅ Записал:\n➖ 200 ₽ · 🍽️ Кафе и рестораны · Кофе'
		)
	})

	it('describes the undone entry', () => {
		expect(undoText(entry({ amount: 99 }), today)).toBe('🗑 Удалил: 99 ₽ · 🍽️ Кафе и рестораны · Кофе')
		expect(undoText(null, today)).toBe('Удалять нечего.')
	})
})

describe('categories text', () => {
	it('lists names with their keywords', () => {
		const category = (name: string, keywords: string[]): CategoryRecord => ({
			id: name,
			userId: 'user-1',
			name,
			keywords,
			isDefault: false,
			createdAt: new Date(0)
		})
		expect(categoriesText([category('🚕 Транспорт', ['uber', 'метро']), category('Собака', [])])).toBe(
			'<b>Ваши категории</b>\n• 🚕 Транспорт <i>(uber, метро)</i>\n• Собака'
		)
		expect(categoriesText([])).toBe('Категорий пока нет.')
	})
})
