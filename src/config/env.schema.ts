import { z } from 'zod'

const intWithDefault = (fallback: number) =>
	z.coerce.number().int().positive().default(fallback)

export const EnvSchema = z.object({
	BOT_TOKEN: z.string().min(1),
	DATABASE_URL: z.string().min(1),
	PORT: intWithDefault(3000),
	DEFAULT_CURRENCY: z
		.string()
		.regex(/^[A-Za-z]{3}$/, 'DEFAULT_CURRENCY must be a 3-letter ISO code')
		.transform(v => v.toUpperCase())
		.default('RUB'),
	OPENAI_API_KEYS: z.string().optional(),
	OPENAI_API_KEY: z.string().optional(),
	GOOGLE_API_KEYS: z.string().optional(),
	OPENAI_MODEL_CATEGORIZATION: z.string().min(1).default('gpt-4o-mini'),
	GOOGLE_MODEL_CATEGORIZATION: z.string().min(1).default('gemini-2.5-flash'),
	AI_PROVIDER_ORDER: z.string().default('google,openai'),
	AI_PRIMARY_TIMEOUT_MS: intWithDefault(15000),
	AI_FALLBACK_TIMEOUT_MS: intWithDefault(5000),
	AI_EXECUTION_MODE: z.enum(['auto', 'inprocess', 'subprocess']).default('auto')
})

export type AppEnv = z.infer<typeof EnvSchema>

/** `ConfigModule` hook: rejects startup with every problem listed. */
export function validateEnv(raw: Record<string, unknown>): AppEnv {
	const parsed = EnvSchema.safeParse(raw)
	if (!parsed.success) {
		const problems = parsed.error.issues
			.map(i => `${i.path.join('.') || 'env'}: ${i.message}`)
			.join('; ')
		throw new Error(`Invalid environment: ${problems}`)
	}
	return parsed.data
}

export function splitList(value: string | undefined): string[] {
	return (value ?? '')
		.split(',')
		.map(s => s.trim())
		.filter(Boolean)
}
