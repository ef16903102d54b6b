import type { CompletionJob } from '../schemas/categorization.schema'
import { runWorker } from './categorize.worker'

const job: CompletionJob = {
	provider: { name: 'openai', model: 'gpt-4o-mini', timeoutMs: 5000 },
	apiKey: 'test-secret',
	prompt: 'Description: "кофе"'
}

describe('categorize worker', () => {
	it('answers with the completion text', async () => {
		const complete = jest.fn(async () => '{"category":"🍽️ Кафе и рестораны"}')

		const reply = await runWorker(JSON.stringify(job), complete)

		expect(reply).toEqual({ ok: true, content: '{"category":"🍽️ Кафе и рестораны"}' })
		expect(complete).toHaveBeenCalledWith(job)
	})

	it('reports provider errors instead of throwing', async () => {
		const complete = jest.fn(async (): Promise<string> => {
			throw new Error('429 rate limited')
		})
		expect(await runWorker(JSON.stringify(job), complete)).toEqual({ ok: false, error: '429 rate limited' })
	})

	it('rejects input that is not a job', async () => {
		const complete = jest.fn(async () => 'unused')

		expect((await runWorker('not json', complete)).ok).toBe(false)
		expect((await runWorker(JSON.stringify({ ...job, apiKey: '' }), complete)).ok).toBe(false)
		expect(complete).not.toHaveBeenCalled()
	})
})
