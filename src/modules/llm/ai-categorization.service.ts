import { Logger } from '@nestjs/common'
import { normalizeLabel } from '../../utils/normalize'
import type { CategorizationRequest } from './categorization-prompt'
import type { CategorizationProvider } from './providers/categorization.provider'
import { ProviderFailure } from './provider-failure'
import { withTimeout } from './timeout'

export const DEFAULT_AI_CONFIDENCE = 0.8

export interface AiCategory {
	category: string
	confidence: number
	reasoning?: string
	provider: string
}

/** Maps the provider's answer onto one of the user's own labels, or null. */
export function matchCandidate(answer: string, candidates: readonly string[]): string | null {
	const trimmed = answer.trim()
	const exact = candidates.find(c => c === trimmed)
	if (exact) return exact
	const wanted = normalizeLabel(trimmed)
	if (!wanted) return null
	return candidates.find(c => normalizeLabel(c) === wanted) ?? null
}

/**
 * Asks each configured provider in turn. Every failure (timeout, SDK error, bad JSON,
 * a category outside the candidate list) is logged and the next provider is tried;
 * when all fail the result is null.
 */
export class AiCategorizationService {
	private readonly logger = new Logger(AiCategorizationService.name)

	constructor(private readonly providers: readonly CategorizationProvider[]) {}

	get providerNames(): string[] {
		return this.providers.map(p => p.name)
	}

	get enabled(): boolean {
		return this.providers.length > 0
	}

	async categorize(request: CategorizationRequest): Promise<AiCategory | null> {
		if (!request.categories.length) return null
		for (const provider of this.providers) {
			const picked = provider.keys.next()
			if (!picked) {
				this.logger.debug(`${provider.name} has no API keys, skipping`)
				continue
			}
			try {
				const reply = await withTimeout(
					signal => provider.categorize(request, picked.key, signal),
					provider.timeoutMs,
					provider.name
				)
				provider.keys.markSuccess(picked.index)
				const category = matchCandidate(reply.category, request.categories)
				if (!category) {
					throw new ProviderFailure(
						'disallowed_category',
						`${provider.name} proposed '${reply.category}', which is not a user category`,
						provider.name
					)
				}
				return {
					category,
					confidence: reply.confidence ?? DEFAULT_AI_CONFIDENCE,
					reasoning: reply.reasoning,
					provider: provider.name
				}
			} catch (e) {
				const failure = ProviderFailure.from(e, provider.name)
				if (failure.blamesKey) provider.keys.markFailure(picked.index, failure)
				this.logger.warn(`${provider.name} categorization failed (${failure.reason}): ${failure.message}`)
			}
		}
		return null
	}
}
