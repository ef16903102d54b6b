import { Module } from '@nestjs/common'
import { ScheduleModule } from '@nestjs/schedule'
import { CategoriesModule } from '../categories/categories.module'
import { ExpensesModule } from '../expenses/expenses.module'
import { ReportsModule } from '../reports/reports.module'
import { UsersModule } from '../users/users.module'
import { BotService } from './bot.service'
import { UserNotifier } from './notifier'
import { ReminderCronService } from './reminder-cron.service'

@Module({
	imports: [ScheduleModule.forRoot(), UsersModule, CategoriesModule, ExpensesModule, ReportsModule],
	providers: [BotService, { provide: UserNotifier, useExisting: BotService }, ReminderCronService]
})
export class BotModule {}
