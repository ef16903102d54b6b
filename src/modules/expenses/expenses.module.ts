import { Module } from '@nestjs/common'
import { CategoriesModule } from '../categories/categories.module'
import { ParserModule } from '../parser/parser.module'
import { ExpensesService } from './expenses.service'

@Module({
	imports: [ParserModule, CategoriesModule],
	providers: [ExpensesService],
	exports: [ExpensesService]
})
export class ExpensesModule {}
