export type ProviderFailureReason =
	| 'timeout'
	| 'request_failed'
	| 'malformed_reply'
	| 'disallowed_category'

/** Any way an AI provider can fail to produce a usable category. Never shown to users. */
export class ProviderFailure extends Error {
	constructor(
		readonly reason: ProviderFailureReason,
		message: string,
		readonly provider?: string
	) {
		super(message)
		this.name = 'ProviderFailure'
	}

	/** Whether the failure says something about the API key that was used. */
	get blamesKey(): boolean {
		return this.reason === 'request_failed' || this.reason === 'timeout'
	}

	static from(error: unknown, provider?: string): ProviderFailure {
		if (error instanceof ProviderFailure) return error
		const msg = error instanceof Error ? error.message : String(error)
		return new ProviderFailure('request_failed', msg, provider)
	}
}
