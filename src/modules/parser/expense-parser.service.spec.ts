import { AiCategorizationService } from '../llm/ai-categorization.service'
import type { CategorizationRequest } from '../llm/categorization-prompt'
import { KeyRing } from '../llm/key-ring'
import type { LlmCategorization } from '../llm/schemas/categorization.schema'
import { ExpenseParserService, type ParseContext, catchAllLabel } from './expense-parser.service'

const today = new Date('2025-03-15T00:00:00.000Z')

function aiReturning(reply: LlmCategorization) {
	const categorize = jest.fn(
		async (_request: CategorizationRequest, _key: string, _signal: AbortSignal) => reply
	)
	const service = new AiCategorizationService([
		{ name: 'google', timeoutMs: 200, keys: new KeyRing('google', ['test-key']), categorize }
	])
	return { service, categorize }
}

describe('ExpenseParserService', () => {
	const context: ParseContext = {
		defaultCurrency: 'RUB',
		categories: ['🛒 Продукты', '🍽️ Кафе и рестораны', '🚕 Транспорт', '🎁 Подарки'],
		today
	}
	const offline = new ExpenseParserService(new AiCategorizationService([]))

	it('parses an expense and matches its category by keyword', async () => {
		await expect(offline.parse('кофе 200', context)).resolves.toEqual({
			status: 'parsed',
			transaction: {
				amount: 200,
				currency: 'RUB',
				description: 'Кофе',
				category: '🍽️ Кафе и рестораны',
				confidence: 0.5,
				aiProcessed: false,
				direction: 'expense',
				date: null
			}
		})
	})

	it('matches a category named in the text exactly', async () => {
		const outcome = await offline.parse('подарки 500', context)
		expect(outcome).toMatchObject({
			status: 'parsed',
			transaction: { category: '🎁 Подарки', confidence: 1 }
		})
	})

	it('keeps the fractional amount and default currency', async () => {
		const outcome = await offline.parse('Gum 4.5', context)
		expect(outcome).toMatchObject({
			status: 'parsed',
			transaction: {
				amount: 4.5,
				currency: 'RUB',
				description: 'Gum',
				category: 'Прочие расходы',
				confidence: 0.2,
				date: null
			}
		})
	})

	it('reads income and an explicit date', async () => {
		const income = await offline.parse('+5000 зарплата', context)
		expect(income).toMatchObject({
			status: 'parsed',
			transaction: {
				amount: 5000,
				direction: 'income',
				description: 'Зарплата',
				category: 'Прочие доходы'
			}
		})

		const dated = await offline.parse('такси 300 14.03.2025', context)
		expect(dated).toMatchObject({
			status: 'parsed',
			transaction: {
				amount: 300,
				description: 'Такси',
				category: '🚕 Транспорт',
				date: new Date('2025-03-14T00:00:00.000Z')
			}
		})
	})

	it('drops a currency code mentioned apart from the amount', async () => {
		const outcome = await offline.parse('usd кофе 5', context)
		expect(outcome).toMatchObject({
			status: 'parsed',
			transaction: { amount: 5, currency: 'USD', description: 'Кофе' }
		})
	})

	it('keeps a currency-like word before the amount in the description', async () => {
		const outcome = await offline.parse('Билет на Реал 5000', context)
		expect(outcome).toMatchObject({
			status: 'parsed',
			transaction: { amount: 5000, description: 'Билет на Реал' }
		})
	})

	it('reports an unstorable amount as missing', async () => {
		await expect(offline.parse('Кофе 0,00001', context)).resolves.toEqual({
			status: 'no_amount',
			description: 'Кофе 0,00001',
			date: null
		})
	})

	it('falls back to a default description', async () => {
		const outcome = await offline.parse('750', context)
		expect(outcome).toMatchObject({
			status: 'parsed',
			transaction: { description: 'Расход', category: 'Прочие расходы' }
		})
	})

	it('reports text without an amount', async () => {
		await expect(offline.parse('просто текст', context)).resolves.toEqual({
			status: 'no_amount',
			description: 'Просто текст',
			date: null
		})
		await expect(offline.parse('вчера кофе', context)).resolves.toEqual({
			status: 'no_amount',
			description: 'Кофе',
			date: new Date('2025-03-14T00:00:00.000Z')
		})
	})

	it('asks the AI provider when nothing matches locally', async () => {
		const ai = aiReturning({ category: '🎁 Подарки', confidence: 0.9 })
		const parser = new ExpenseParserService(ai.service)

		const outcome = await parser.parse('зюзюка 100', context)

		expect(outcome).toMatchObject({
			status: 'parsed',
			transaction: { category: '🎁 Подарки', confidence: 0.9, aiProcessed: true }
		})
		expect(ai.categorize).toHaveBeenCalledTimes(1)
		const [request] = ai.categorize.mock.calls[0]
		expect(request).toMatchObject({ text: 'зюзюка', amount: 100, currency: 'RUB' })
		expect(request.categories).toEqual([...context.categories])
	})

	it('does not ask the AI provider when the text matched locally or AI is off', async () => {
		const ai = aiReturning({ category: '🎁 Подарки' })
		const parser = new ExpenseParserService(ai.service)

		await parser.parse('кофе 200', context)
		const outcome = await parser.parse('зюзюка 100', {
			...context,
			categories: [...context.categories, '💰 Прочие расходы'],
			useAi: false
		})

		expect(ai.categorize).not.toHaveBeenCalled()
		expect(outcome).toMatchObject({
			status: 'parsed',
			transaction: { category: '💰 Прочие расходы', confidence: 0.2, aiProcessed: false }
		})
	})

	it('uses the catch-all when the AI provider proposes a foreign category', async () => {
		const ai = aiReturning({ category: 'Казино' })
		const outcome = await new ExpenseParserService(ai.service).parse('зюзюка 100', context)
		expect(outcome).toMatchObject({
			status: 'parsed',
			transaction: { category: 'Прочие расходы', aiProcessed: false }
		})
	})

	it('parses every fragment of a multi-entry message', async () => {
		const result = await offline.parseMany('кофе 200, такси 300; привет', context)
		expect(result.transactions.map(t => [t.description, t.amount, t.category])).toEqual([
			['Кофе', 200, '🍽️ Кафе и рестораны'],
			['Такси', 300, '🚕 Транспорт']
		])
		expect(result.skipped).toEqual([{ fragment: 'привет', description: 'Привет', date: null }])
	})

	it('prefers the user catch-all label', () => {
		expect(catchAllLabel('expense', ['💰 Прочие расходы'])).toBe('💰 Прочие расходы')
		expect(catchAllLabel('income', ['💰 Прочие расходы'])).toBe('Прочие доходы')
	})
})
