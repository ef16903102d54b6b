import { escapeHtml } from '../../../utils/format'
import type { CategoryRecord, UserRecord } from '../../ledger/ledger.repo'

export const BOT_COMMANDS = [
	{ command: 'start', description: 'Начать' },
	{ command: 'help', description: 'Помощь и инструкция' },
	{ command: 'report', description: 'Отчёт за период' },
	{ command: 'export', description: 'Выгрузка в CSV' },
	{ command: 'categories', description: 'Мои категории' },
	{ command: 'addcategory', description: 'Добавить категорию' },
	{ command: 'delcategory', description: 'Удалить категорию' },
	{ command: 'keyword', description: 'Ключевое слово для категории' },
	{ command: 'currency', description: 'Валюта по умолчанию' },
	{ command: 'timezone', description: 'Часовой пояс' },
	{ command: 'undo', description: 'Удалить последнюю запись' }
]

export function startText(user: UserRecord): string {
	return `👋 Привет! Я записываю расходы и доходы из обычных сообщений.

Просто напишите: <code>Кофе 200</code>, <code>такси 12 usd, обед 9</code> или <code>+5000 зарплата</code>.
Валюта по умолчанию: <b>${user.currency}</b>, часовой пояс: <b>${escapeHtml(user.timezone)}</b>.

/help — все команды.`
}

export const HELP_TEXT = `<b>Как записывать</b>
• <code>Кофе 200</code>: расход в валюте по умолчанию
• <code>+5000 зарплата</code>: доход
• <code>такси 12 usd; обед 9</code>: несколько записей сразу
• <code>вчера продукты 1500</code>, <code>05.03.2026 бензин 40 eur</code>: с датой

<b>Отчёты</b>
/report [период]: <code>week</code>, <code>last_month</code>, <code>март</code>, <code>last_30_days</code>, <code>2026-01-01..2026-01-31</code>
/export [период]: CSV-файл

<b>Категории</b>
/categories, /addcategory название, /delcategory название
/keyword категория: слово

<b>Настройки</b>
/currency EUR, /timezone Europe/Moscow, /undo`

export function categoriesText(categories: CategoryRecord[]): string {
	if (!categories.length) return 'Категорий пока нет.'
	const lines = categories.map(c => {
		const words = c.keywords.length ? ` <i>(${c.keywords.map(escapeHtml).join(', ')})</i>` : ''
		return `• ${escapeHtml(c.name)}${words}`
	})
	return ['<b>Ваши категории</b>', ...lines].join('\n')
}
