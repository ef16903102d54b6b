import { Module } from '@nestjs/common'
import { UsersService } from './users.service'
import { CategoriesModule } from '../categories/categories.module'

@Module({
	imports: [CategoriesModule],
	providers: [UsersService],
	exports: [UsersService]
})
export class UsersModule {}
