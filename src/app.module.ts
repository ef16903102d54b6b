import { Module } from '@nestjs/common'
import { ConfigModule } from '@nestjs/config'
import { AppController } from './app.controller'
import { validateEnv } from './config/env.schema'
import { BotModule } from './modules/bot/bot.module'
import { LedgerModule } from './modules/ledger/ledger.module'
import { TimezoneModule } from './modules/timezone/timezone.module'

@Module({
	imports: [
		ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
		LedgerModule,
		TimezoneModule,
		BotModule
	],
	controllers: [AppController]
})
export class AppModule {}
