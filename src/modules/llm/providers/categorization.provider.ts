import { type CategorizationRequest, buildCategorizationPrompt } from '../categorization-prompt'
import type { AiExecutionStrategy } from '../execution/ai-execution.strategy'
import type { KeyRing } from '../key-ring'
import { ProviderFailure } from '../provider-failure'
import {
	type LlmCategorization,
	LlmCategorizationSchema,
	type ProviderSettings
} from '../schemas/categorization.schema'

export interface CategorizationProvider {
	readonly name: string
	readonly timeoutMs: number
	readonly keys: KeyRing
	categorize(
		request: CategorizationRequest,
		apiKey: string,
		signal: AbortSignal
	): Promise<LlmCategorization>
}

/** Strips a ```json fence some models wrap around their reply. */
function unfence(raw: string): string {
	const m = raw.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i)
	return m ? m[1] : raw.trim()
}

export function parseCategorizationReply(raw: string, provider: string): LlmCategorization {
	let payload: unknown
	try {
		payload = JSON.parse(unfence(raw))
	} catch {
		throw new ProviderFailure('malformed_reply', `${provider} returned invalid JSON`, provider)
	}
	const parsed = LlmCategorizationSchema.safeParse(payload)
	if (!parsed.success) {
		throw new ProviderFailure(
			'malformed_reply',
			`${provider} reply failed validation: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
			provider
		)
	}
	return parsed.data
}

export class OpenAiCompatibleProvider implements CategorizationProvider {
	constructor(
		private readonly settings: ProviderSettings,
		readonly keys: KeyRing,
		private readonly execution: AiExecutionStrategy
	) {}

	get name(): string {
		return this.settings.name
	}

	get timeoutMs(): number {
		return this.settings.timeoutMs
	}

	async categorize(
		request: CategorizationRequest,
		apiKey: string,
		signal: AbortSignal
	): Promise<LlmCategorization> {
		const raw = await this.execution.run(
			{ provider: this.settings, apiKey, prompt: buildCategorizationPrompt(request) },
			signal
		)
		return parseCategorizationReply(raw, this.name)
	}
}
