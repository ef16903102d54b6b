import OpenAI from 'openai'
import { CATEGORIZATION_SYSTEM_PROMPT } from '../categorization-prompt'
import type { CompletionJob } from '../schemas/categorization.schema'

// Gemini is reached through its OpenAI-compatible endpoint, so one client covers both providers.
export const GOOGLE_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/'

const clients = new Map<string, OpenAI>()

function clientFor(apiKey: string, baseURL?: string): OpenAI {
	const cacheKey = `${baseURL ?? 'openai'}|${apiKey}`
	let client = clients.get(cacheKey)
	if (!client) {
		client = new OpenAI({ apiKey, baseURL, maxRetries: 0 })
		clients.set(cacheKey, client)
	}
	return client
}

/** One chat completion in JSON mode; resolves with the raw message content. */
export async function completeWithOpenAi(
	job: CompletionJob,
	signal?: AbortSignal
): Promise<string> {
	const client = clientFor(job.apiKey, job.provider.baseURL)
	const response = await client.chat.completions.create(
		{
			model: job.provider.model,
			temperature: 0.1,
			max_tokens: 200,
			messages: [
				{ role: 'system', content: CATEGORIZATION_SYSTEM_PROMPT },
				{ role: 'user', content: job.prompt }
			],
			response_format: { type: 'json_object' }
		},
		{ signal, timeout: job.provider.timeoutMs }
	)
	const content = response.choices[0]?.message?.content
	if (!content) throw new Error(`${job.provider.name} returned an empty completion`)
	return content
}
