import type { Context, NextFunction, SessionFlavor } from 'grammy'
import type { UserRecord } from '../../ledger/ledger.repo'
import type { UsersService } from '../../users/users.service'

export interface BotState {
	user: UserRecord
}

/** What the next plain-text message is taken as. */
export type InputMode = 'idle' | 'category_create' | 'currency_edit' | 'timezone_edit'

export interface BotSession {
	inputMode: InputMode
}

export type BotContext = Context &
	SessionFlavor<BotSession> & {
		state: BotState
	}

export const initialSession = (): BotSession => ({ inputMode: 'idle' })

/** The part of the context the user lookup reads and fills. */
export interface UserContextTarget {
	readonly from?: Context['from']
	state?: BotState
}

export const userContextMiddleware =
	(usersService: Pick<UsersService, 'getOrCreateByTelegramId'>) =>
	async (ctx: UserContextTarget, next: NextFunction): Promise<void> => {
		if (!ctx.from) return next()

		const user = await usersService.getOrCreateByTelegramId(
			String(ctx.from.id),
			ctx.from.language_code
		)
		ctx.state = { user }

		await next()
	}
