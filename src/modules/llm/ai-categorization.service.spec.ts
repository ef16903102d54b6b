import { AiCategorizationService, matchCandidate } from './ai-categorization.service'
import type { CategorizationRequest } from './categorization-prompt'
import { KeyRing } from './key-ring'
import type { CategorizationProvider } from './providers/categorization.provider'
import type { LlmCategorization } from './schemas/categorization.schema'

function fakeProvider(
	name: string,
	reply: (apiKey: string) => Promise<LlmCategorization>,
	options: { keys?: string[]; timeoutMs?: number } = {}
) {
	const categorize = jest.fn(
		(_request: CategorizationRequest, apiKey: string, _signal: AbortSignal) => reply(apiKey)
	)
	const provider: CategorizationProvider = {
		name,
		timeoutMs: options.timeoutMs ?? 200,
		keys: new KeyRing(name, options.keys ?? ['test-key']),
		categorize
	}
	return { provider, categorize }
}

describe('AiCategorizationService', () => {
	const request: CategorizationRequest = {
		text: 'бизнес-ланч',
		amount: 450,
		currency: 'RUB',
		categories: ['🛒 Продукты', '🍽️ Кафе и рестораны', '🚕 Транспорт']
	}

	it('returns the primary provider answer', async () => {
		const google = fakeProvider('google', async () => ({
			category: '🍽️ Кафе и рестораны',
			confidence: 0.9
		}))
		const openai = fakeProvider('openai', async () => ({ category: '🛒 Продукты' }))
		const service = new AiCategorizationService([google.provider, openai.provider])

		await expect(service.categorize(request)).resolves.toEqual({
			category: '🍽️ Кафе и рестораны',
			confidence: 0.9,
			reasoning: undefined,
			provider: 'google'
		})
		expect(openai.categorize).not.toHaveBeenCalled()
	})

	it('falls back to the next provider and defaults confidence to 0.8', async () => {
		const google = fakeProvider('google', async () => {
			throw new Error('503 Service Unavailable')
		})
		const openai = fakeProvider('openai', async () => ({ category: '🚕 Транспорт' }))
		const service = new AiCategorizationService([google.provider, openai.provider])

		const result = await service.categorize(request)
		expect(result).toEqual({
			category: '🚕 Транспорт',
			confidence: 0.8,
			reasoning: undefined,
			provider: 'openai'
		})
	})

	it('maps an answer without the icon onto the user label', async () => {
		const google = fakeProvider('google', async () => ({ category: 'кафе и рестораны' }))
		const service = new AiCategorizationService([google.provider])
		const result = await service.categorize(request)
		expect(result?.category).toBe('🍽️ Кафе и рестораны')
	})

	it('treats a category outside the candidate list as a failure', async () => {
		const google = fakeProvider('google', async () => ({ category: 'Казино' }))
		const service = new AiCategorizationService([google.provider])
		await expect(service.categorize(request)).resolves.toBeNull()
	})

	it('gives up on a provider that exceeds its timeout', async () => {
		const slow = fakeProvider('google', () => new Promise<LlmCategorization>(() => undefined), {
			timeoutMs: 20
		})
		const service = new AiCategorizationService([slow.provider])
		await expect(service.categorize(request)).resolves.toBeNull()
	})

	it('passes an abort signal that fires on timeout', async () => {
		let seen: AbortSignal | undefined
		const provider: CategorizationProvider = {
			name: 'google',
			timeoutMs: 20,
			keys: new KeyRing('google', ['test-key']),
			categorize: (_request, _key, signal) => {
				seen = signal
				return new Promise<LlmCategorization>(() => undefined)
			}
		}
		await new AiCategorizationService([provider]).categorize(request)
		expect(seen?.aborted).toBe(true)
	})

	it('skips providers without keys and short-circuits on no categories', async () => {
		const keyless = fakeProvider('google', async () => ({ category: '🛒 Продукты' }), { keys: [] })
		const service = new AiCategorizationService([keyless.provider])

		await expect(service.categorize(request)).resolves.toBeNull()
		await expect(service.categorize({ ...request, categories: [] })).resolves.toBeNull()
		expect(keyless.categorize).not.toHaveBeenCalled()
	})

	it('rotates away from a key that failed', async () => {
		const google = fakeProvider(
			'google',
			async apiKey => {
				if (apiKey === 'key-1') throw new Error('401 invalid key')
				return { category: '🛒 Продукты' }
			},
			{ keys: ['key-1', 'key-2'] }
		)
		const service = new AiCategorizationService([google.provider])

		await service.categorize(request)
		await service.categorize(request)
		await service.categorize(request)

		expect(google.categorize.mock.calls.map(call => call[1])).toEqual(['key-1', 'key-2', 'key-2'])
	})
})

describe('matchCandidate', () => {
	const candidates = ['🎁 Подарки', 'Café']

	it('prefers an exact label', () => {
		expect(matchCandidate(' 🎁 Подарки ', candidates)).toBe('🎁 Подарки')
	})

	it('ignores case, icons and diacritics', () => {
		expect(matchCandidate('ПОДАРКИ', candidates)).toBe('🎁 Подарки')
		expect(matchCandidate('cafe', candidates)).toBe('Café')
	})

	it('returns null for unknown or empty answers', () => {
		expect(matchCandidate('Такси', candidates)).toBeNull()
		expect(matchCandidate('🎁', candidates)).toBeNull()
	})
})
