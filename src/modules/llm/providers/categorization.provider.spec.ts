import type { AiExecutionStrategy } from '../execution/ai-execution.strategy'
import { KeyRing } from '../key-ring'
import { ProviderFailure } from '../provider-failure'
import type { CompletionJob } from '../schemas/categorization.schema'
import { OpenAiCompatibleProvider, parseCategorizationReply } from './categorization.provider'

describe('parseCategorizationReply', () => {
	it('accepts a fenced JSON reply and coerces the confidence', () => {
		const raw = '```json\n{"category":"Такси","confidence":"0.6","reasoning":"ride"}\n```'
		expect(parseCategorizationReply(raw, 'openai')).toEqual({
			category: 'Такси',
			confidence: 0.6,
			reasoning: 'ride'
		})
	})

	it('rejects invalid JSON', () => {
		expect(() => parseCategorizationReply('category: Такси', 'openai')).toThrow(ProviderFailure)
	})

	it('rejects an empty category', () => {
		try {
			parseCategorizationReply('{"category":""}', 'openai')
			throw new Error('expected a failure')
		} catch (e) {
			expect(e).toBeInstanceOf(ProviderFailure)
			expect(e).toMatchObject({ reason: 'malformed_reply' })
		}
	})

	it('rejects a confidence outside 0..1', () => {
		expect(() => parseCategorizationReply('{"category":"A","confidence":3}', 'openai')).toThrow(
			ProviderFailure
		)
	})
})

describe('OpenAiCompatibleProvider', () => {
	it('sends the prompt through the execution strategy', async () => {
		const jobs: CompletionJob[] = []
		const execution: AiExecutionStrategy = {
			mode: 'inprocess',
			run: async job => {
				jobs.push(job)
				return '{"category":"🚕 Такси","confidence":0.7}'
			}
		}
		const provider = new OpenAiCompatibleProvider(
			{ name: 'openai', model: 'gpt-4o-mini', timeoutMs: 5000 },
			new KeyRing('openai', ['test-key']),
			execution
		)

		const reply = await provider.categorize(
			{ text: 'такси домой', amount: 300, currency: 'RUB', categories: ['🚕 Такси', '🛒 Продукты'] },
			'test-key',
			new AbortController().signal
		)

		expect(reply).toEqual({ category: '🚕 Такси', confidence: 0.7 })
		expect(provider.name).toBe('openai')
		expect(provider.timeoutMs).toBe(5000)
		expect(jobs).toHaveLength(1)
		expect(jobs[0].apiKey).toBe('test-key')
		expect(jobs[0].provider.model).toBe('gpt-4o-mini')
		expect(jobs[0].prompt).toContain('Description: "такси домой"')
		expect(jobs[0].prompt).toContain('- 🚕 Такси\n- 🛒 Продукты')
	})
})
