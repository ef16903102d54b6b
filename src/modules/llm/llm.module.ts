import { Module } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import type { AppEnv } from '../../config/env.schema'
import { AiCategorizationService } from './ai-categorization.service'
import { createAiCategorizationService } from './llm.factory'

@Module({
	providers: [
		{
			provide: AiCategorizationService,
			inject: [ConfigService],
			useFactory: (config: ConfigService<AppEnv, true>) =>
				createAiCategorizationService({
					OPENAI_API_KEYS: config.get('OPENAI_API_KEYS', { infer: true }),
					OPENAI_API_KEY: config.get('OPENAI_API_KEY', { infer: true }),
					GOOGLE_API_KEYS: config.get('GOOGLE_API_KEYS', { infer: true }),
					OPENAI_MODEL_CATEGORIZATION: config.get('OPENAI_MODEL_CATEGORIZATION', { infer: true }),
					GOOGLE_MODEL_CATEGORIZATION: config.get('GOOGLE_MODEL_CATEGORIZATION', { infer: true }),
					AI_PROVIDER_ORDER: config.get('AI_PROVIDER_ORDER', { infer: true }),
					AI_PRIMARY_TIMEOUT_MS: config.get('AI_PRIMARY_TIMEOUT_MS', { infer: true }),
					AI_FALLBACK_TIMEOUT_MS: config.get('AI_FALLBACK_TIMEOUT_MS', { infer: true }),
					AI_EXECUTION_MODE: config.get('AI_EXECUTION_MODE', { infer: true })
				})
		}
	],
	exports: [AiCategorizationService]
})
export class LLMModule {}
