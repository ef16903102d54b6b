import { z } from 'zod'

export const LlmCategorizationSchema = z.object({
	category: z.string().min(1),
	confidence: z.coerce.number().min(0).max(1).optional(),
	reasoning: z.string().optional()
})

export type LlmCategorization = z.infer<typeof LlmCategorizationSchema>

export const ProviderSettingsSchema = z.object({
	name: z.string(),
	model: z.string(),
	baseURL: z.string().url().optional(),
	timeoutMs: z.number().int().positive()
})

export const CompletionJobSchema = z.object({
	provider: ProviderSettingsSchema,
	apiKey: z.string().min(1),
	prompt: z.string()
})

export const WorkerReplySchema = z.discriminatedUnion('ok', [
	z.object({ ok: z.literal(true), content: z.string() }),
	z.object({ ok: z.literal(false), error: z.string() })
])

export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>
export type CompletionJob = z.infer<typeof CompletionJobSchema>
export type WorkerReply = z.infer<typeof WorkerReplySchema>
