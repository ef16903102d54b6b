import type { AppEnv } from '../../config/env.schema'
import { splitList } from '../../config/env.schema'
import { AiCategorizationService } from './ai-categorization.service'
import {
	type AiExecutionStrategy,
	createExecutionStrategy
} from './execution/ai-execution.strategy'
import { KeyRing } from './key-ring'
import {
	type CategorizationProvider,
	OpenAiCompatibleProvider
} from './providers/categorization.provider'
import { GOOGLE_OPENAI_BASE_URL } from './providers/openai-compatible.provider'

export type AiEnv = Pick<
	AppEnv,
	| 'OPENAI_API_KEYS'
	| 'OPENAI_API_KEY'
	| 'GOOGLE_API_KEYS'
	| 'OPENAI_MODEL_CATEGORIZATION'
	| 'GOOGLE_MODEL_CATEGORIZATION'
	| 'AI_PROVIDER_ORDER'
	| 'AI_PRIMARY_TIMEOUT_MS'
	| 'AI_FALLBACK_TIMEOUT_MS'
	| 'AI_EXECUTION_MODE'
>

const KNOWN_PROVIDERS = ['google', 'openai'] as const
type ProviderName = (typeof KNOWN_PROVIDERS)[number]

function isProviderName(value: string): value is ProviderName {
	return KNOWN_PROVIDERS.some(p => p === value)
}

export function providerOrder(value: string): ProviderName[] {
	const order: ProviderName[] = []
	for (const name of splitList(value.toLowerCase())) {
		if (isProviderName(name) && !order.includes(name)) order.push(name)
	}
	return order
}

export function openAiKeys(env: AiEnv): string[] {
	const keys = splitList(env.OPENAI_API_KEYS)
	const single = env.OPENAI_API_KEY?.trim()
	if (single && !keys.includes(single)) keys.push(single)
	return keys
}

/**
 * Builds the provider chain in configured order. The first provider gets the primary
 * timeout, the rest the fallback one; providers without keys are left out.
 */
export function buildProviders(
	env: AiEnv,
	execution: AiExecutionStrategy
): CategorizationProvider[] {
	const providers: CategorizationProvider[] = []
	for (const name of providerOrder(env.AI_PROVIDER_ORDER)) {
		const keys = name === 'google' ? splitList(env.GOOGLE_API_KEYS) : openAiKeys(env)
		if (!keys.length) continue
		const timeoutMs = providers.length === 0 ? env.AI_PRIMARY_TIMEOUT_MS : env.AI_FALLBACK_TIMEOUT_MS
		providers.push(
			new OpenAiCompatibleProvider(
				name === 'google'
					? {
							name,
							model: env.GOOGLE_MODEL_CATEGORIZATION,
							baseURL: GOOGLE_OPENAI_BASE_URL,
							timeoutMs
						}
					: { name, model: env.OPENAI_MODEL_CATEGORIZATION, timeoutMs },
				new KeyRing(name, keys),
				execution
			)
		)
	}
	return providers
}

export function createAiCategorizationService(
	env: AiEnv,
	execution: AiExecutionStrategy = createExecutionStrategy(env.AI_EXECUTION_MODE)
): AiCategorizationService {
	return new AiCategorizationService(buildProviders(env, execution))
}
