import { splitExpenseText } from './expense-split.util'

describe('splitExpenseText', () => {
	it('splits on commas, semicolons, newlines and a spaced plus', () => {
		expect(splitExpenseText('кофе 200, такси 300; обед 450')).toEqual([
			'кофе 200',
			'такси 300',
			'обед 450'
		])
		expect(splitExpenseText('кофе 200\nтакси 300')).toEqual(['кофе 200', 'такси 300'])
		expect(splitExpenseText('кофе 200 + такси 300')).toEqual(['кофе 200', 'такси 300'])
	})

	it('keeps a decimal comma inside the amount', () => {
		expect(splitExpenseText('Gum 4,5')).toEqual(['Gum 4,5'])
	})

	it('splits on conjunctions only when each side has a number', () => {
		expect(splitExpenseText('кофе 200 и такси 300')).toEqual(['кофе 200', 'такси 300'])
		expect(splitExpenseText('Кафе и рестораны 500')).toEqual(['Кафе и рестораны 500'])
	})

	it('drops empty fragments', () => {
		expect(splitExpenseText(' ;, \n')).toEqual([])
	})
})
