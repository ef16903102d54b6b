import { Module } from '@nestjs/common'
import { LLMModule } from '../llm/llm.module'
import { ExpenseParserService } from './expense-parser.service'

@Module({
	imports: [LLMModule],
	providers: [ExpenseParserService],
	exports: [ExpenseParserService]
})
export class ParserModule {}
