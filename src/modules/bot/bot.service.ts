import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { Bot, InputFile, session } from 'grammy'
import { UserInputError } from '../../shared/errors'
import { WarnOnceCache, todayInTimezone } from '../../utils/timezone'
import { CategoriesService } from '../categories/categories.service'
import { ExpensesService } from '../expenses/expenses.service'
import { ReportsService } from '../reports/reports.service'
import { UsersService } from '../users/users.service'
import {
	type BotContext,
	type BotSession,
	type InputMode,
	initialSession,
	userContextMiddleware
} from './core/bot.middleware'
import { NO_AMOUNT_TEXT, recordedText, undoText } from './elements/entries'
import { BOT_COMMANDS, HELP_TEXT, categoriesText, startText } from './elements/help'
import { reportText } from './elements/report'
import { UserNotifier } from './notifier'

const TELEGRAM_NOISE = [
	'message is not modified',
	'message to edit not found',
	"message can't be edited",
	'query is too old',
	'message_id_invalid',
	'bot was blocked by the user',
	'ECONNRESET',
	'ETIMEDOUT'
]

const MODE_PROMPTS: Record<Exclude<InputMode, 'idle'>, string> = {
	category_create: 'Напишите название новой категории.',
	currency_edit: 'Напишите код валюты, например <code>EUR</code>.',
	timezone_edit: 'Напишите часовой пояс, например <code>Europe/Moscow</code> или <code>+03:00</code>.'
}

export function isTelegramNoise(message: string): boolean {
	return TELEGRAM_NOISE.some(fragment => message.includes(fragment))
}

/** `/keyword Такси: uber` → `['Такси', 'uber']`. */
export function splitKeywordArgs(arg: string): [string, string] | null {
	const at = arg.indexOf(':')
	if (at < 0) return null
	const category = arg.slice(0, at).trim()
	const keyword = arg.slice(at + 1).trim()
	return category && keyword ? [category, keyword] : null
}

@Injectable()
export class BotService extends UserNotifier implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(BotService.name)
	private readonly bot: Bot<BotContext>

	constructor(
		private readonly config: ConfigService,
		private readonly usersService: UsersService,
		private readonly categoriesService: CategoriesService,
		private readonly expensesService: ExpensesService,
		private readonly reportsService: ReportsService,
		private readonly timezoneWarnings: WarnOnceCache
	) {
		super()
		const token = this.config.getOrThrow<string>('BOT_TOKEN')
		this.bot = new Bot<BotContext>(token)
	}

	async sendToUser(telegramId: string, text: string): Promise<boolean> {
		try {
			await this.bot.api.sendMessage(Number(telegramId), text, { parse_mode: 'HTML' })
			return true
		} catch (error: unknown) {
			const msg = error instanceof Error ? error.message : String(error)
			this.logger.warn(`Could not message ${telegramId}: ${msg}`)
			return false
		}
	}

	async onModuleInit() {
		await this.bot.api.setMyCommands(BOT_COMMANDS)

		this.bot.use(session<BotSession, BotContext>({ initial: initialSession }))
		this.bot.use(userContextMiddleware(this.usersService))

		this.bot.catch(async err => {
			const msg = err.message ?? ''
			if (isTelegramNoise(msg)) return
			this.logger.error(`Bot error: ${msg}`, err.stack)
			if (err.ctx.chat?.id) {
				await err.ctx
					.reply('Техническая ошибка обработки. Отправьте сообщение ещё раз.')
					.catch((replyError: unknown) => this.logger.warn(`Error reply failed: ${String(replyError)}`))
			}
		})

		this.bot.command('start', async ctx => {
			ctx.session.inputMode = 'idle'
			await ctx.reply(startText(ctx.state.user), { parse_mode: 'HTML' })
		})

		this.bot.command('help', async ctx => {
			ctx.session.inputMode = 'idle'
			await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' })
		})

		this.bot.command('report', async ctx => {
			ctx.session.inputMode = 'idle'
			const report = await this.reportsService.buildReport(ctx.state.user, ctx.match)
			await ctx.reply(reportText(report), { parse_mode: 'HTML' })
		})

		this.bot.command('export', async ctx => {
			ctx.session.inputMode = 'idle'
			const file = await this.reportsService.exportCsv(ctx.state.user, ctx.match)
			if (!file.entries) {
				await ctx.reply('За этот период записей нет.')
				return
			}
			await ctx.replyWithDocument(new InputFile(Buffer.from(file.csv, 'utf8'), file.filename))
		})

		this.bot.command('categories', async ctx => {
			ctx.session.inputMode = 'idle'
			const categories = await this.categoriesService.getAllByUserId(ctx.state.user.id)
			await ctx.reply(categoriesText(categories), { parse_mode: 'HTML' })
		})

		this.bot.command('addcategory', async ctx => {
			if (!ctx.match.trim()) return this.prompt(ctx, 'category_create')
			ctx.session.inputMode = 'idle'
			await this.createCategory(ctx, ctx.match)
		})

		this.bot.command('delcategory', async ctx => {
			ctx.session.inputMode = 'idle'
			await this.userAction(ctx, async () => {
				const deleted = await this.categoriesService.deleteByName(ctx.state.user.id, ctx.match)
				return `🗑 Категория «${deleted.name}» удалена.`
			})
		})

		this.bot.command('keyword', async ctx => {
			ctx.session.inputMode = 'idle'
			await this.userAction(ctx, async () => {
				const args = splitKeywordArgs(ctx.match)
				if (!args) throw new UserInputError('Формат: /keyword категория: слово')
				const category = await this.categoriesService.addKeyword(ctx.state.user.id, args[0], args[1])
				return `🔑 «${category.name}»: ${category.keywords.join(', ')}`
			})
		})

		this.bot.command('currency', async ctx => {
			if (!ctx.match.trim()) return this.prompt(ctx, 'currency_edit')
			ctx.session.inputMode = 'idle'
			await this.updateCurrency(ctx, ctx.match)
		})

		this.bot.command('timezone', async ctx => {
			if (!ctx.match.trim()) return this.prompt(ctx, 'timezone_edit')
			ctx.session.inputMode = 'idle'
			await this.updateTimezone(ctx, ctx.match)
		})

		this.bot.command('undo', async ctx => {
			ctx.session.inputMode = 'idle'
			const user = ctx.state.user
			const deleted = await this.expensesService.deleteLast(user.id)
			await ctx.reply(undoText(deleted, this.todayFor(ctx)), { parse_mode: 'HTML' })
		})

		this.bot.on('message:text', async ctx => {
			const text = ctx.message.text
			if (text.startsWith('/')) {
				await ctx.reply('Неизвестная команда. /help — список команд.')
				return
			}

			const mode = ctx.session.inputMode
			ctx.session.inputMode = 'idle'
			switch (mode) {
				case 'category_create':
					return this.createCategory(ctx, text)
				case 'currency_edit':
					return this.updateCurrency(ctx, text)
				case 'timezone_edit':
					return this.updateTimezone(ctx, text)
				case 'idle':
					break
			}

			const { stored, skipped } = await this.expensesService.record(ctx.state.user, text)
			if (!stored.length) {
				await ctx.reply(NO_AMOUNT_TEXT, { parse_mode: 'HTML' })
				return
			}
			await ctx.reply(recordedText(stored, skipped, this.todayFor(ctx)), { parse_mode: 'HTML' })
		})

		this.bot
			.start({
				onStart: info => this.logger.log(`Bot @${info.username} started`)
			})
			.catch((error: unknown) => {
				const msg = error instanceof Error ? error.message : String(error)
				this.logger.error(`Bot polling stopped: ${msg}`)
			})
	}

	async onModuleDestroy() {
		if (this.bot.isRunning()) await this.bot.stop()
	}

	private todayFor(ctx: BotContext): Date {
		return todayInTimezone(ctx.state.user.timezone, new Date(), this.timezoneWarnings)
	}

	private async prompt(ctx: BotContext, mode: Exclude<InputMode, 'idle'>) {
		ctx.session.inputMode = mode
		await ctx.reply(MODE_PROMPTS[mode], { parse_mode: 'HTML' })
	}

	/** Runs a settings change; a rejected input is answered with its message, anything else goes to bot.catch. */
	private async userAction(ctx: BotContext, action: () => Promise<string>) {
		let reply: string
		try {
			reply = await action()
		} catch (error: unknown) {
			if (!(error instanceof UserInputError)) throw error
			reply = `⚠️ ${error.message}`
		}
		await ctx.reply(reply)
	}

	private createCategory(ctx: BotContext, name: string) {
		return this.userAction(ctx, async () => {
			const category = await this.categoriesService.create(ctx.state.user.id, name)
			return `✅ Категория «${category.name}» добавлена.`
		})
	}

	private updateCurrency(ctx: BotContext, code: string) {
		return this.userAction(ctx, async () => {
			const user = await this.usersService.setCurrency(ctx.state.user.id, code)
			ctx.state.user = user
			return `💱 Валюта по умолчанию: ${user.currency}`
		})
	}

	private updateTimezone(ctx: BotContext, timezone: string) {
		return this.userAction(ctx, async () => {
			const user = await this.usersService.setTimezone(ctx.state.user.id, timezone)
			ctx.state.user = user
			return `🕒 Часовой пояс: ${user.timezone}`
		})
	}
}
