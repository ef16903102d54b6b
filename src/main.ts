import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'

async function bootstrap() {
	const app = await NestFactory.create(AppModule)
	app.enableShutdownHooks()

	const config = app.get(ConfigService)
	await app.listen(config.getOrThrow<number>('PORT'))
}

bootstrap().catch((error: unknown) => {
	new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error))
	process.exit(1)
})
