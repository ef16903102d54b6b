import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { Pool } from 'pg'
import { formatIsoDate } from '../../utils/date'
import {
	type CategoryRecord,
	type ExpenseRecord,
	LedgerRepo,
	type NewCategory,
	type NewExpense,
	type NewUser,
	type UserPatch,
	type UserRecord
} from './ledger.repo'

const SCHEMA_PATH = join(__dirname, '..', '..', '..', 'sql', 'schema.sql')

interface UserRow {
	id: string
	telegram_id: string
	currency: string
	timezone: string
	language: string
	last_reminder_on: string | null
	created_at: Date
}

interface CategoryRow {
	id: string
	user_id: string
	name: string
	keywords: string[]
	is_default: boolean
	created_at: Date
}

interface ExpenseRow {
	id: string
	user_id: string
	amount: string
	currency: string
	description: string
	category: string
	direction: string
	spent_on: string
	ai_processed: boolean
	confidence: number
	created_at: Date
}

const USER_COLUMNS =
	'id, telegram_id, currency, timezone, language, last_reminder_on::text AS last_reminder_on, created_at'
const CATEGORY_COLUMNS = 'id, user_id, name, keywords, is_default, created_at'
const EXPENSE_COLUMNS =
	'id, user_id, amount::text AS amount, currency, description, category, direction, spent_on::text AS spent_on, ai_processed, confidence, created_at'

function parseDay(value: string): Date {
	return new Date(`${value}T00:00:00.000Z`)
}

function toUser(row: UserRow): UserRecord {
	return {
		id: row.id,
		telegramId: row.telegram_id,
		currency: row.currency.trim(),
		timezone: row.timezone,
		language: row.language,
		lastReminderOn: row.last_reminder_on ? parseDay(row.last_reminder_on) : null,
		createdAt: row.created_at
	}
}

function toCategory(row: CategoryRow): CategoryRecord {
	return {
		id: row.id,
		userId: row.user_id,
		name: row.name,
		keywords: row.keywords,
		isDefault: row.is_default,
		createdAt: row.created_at
	}
}

function toExpense(row: ExpenseRow): ExpenseRecord {
	return {
		id: row.id,
		userId: row.user_id,
		amount: Number(row.amount),
		currency: row.currency.trim(),
		description: row.description,
		category: row.category,
		direction: row.direction === 'income' ? 'income' : 'expense',
		spentOn: parseDay(row.spent_on),
		aiProcessed: row.ai_processed,
		confidence: row.confidence,
		createdAt: row.created_at
	}
}

/** Pool that logs errors of idle clients, such as a dropped connection. */
export function createPool(connectionString: string, logger: Pick<Logger, 'error'>): Pool {
	const pool = new Pool({ connectionString })
	pool.on('error', err => logger.error(`Idle database client failed: ${err.message}`, err.stack))
	return pool
}

@Injectable()
export class PgLedgerRepo extends LedgerRepo implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(PgLedgerRepo.name)
	private readonly pool: Pool

	constructor(config: ConfigService) {
		super()
		this.pool = createPool(config.getOrThrow<string>('DATABASE_URL'), this.logger)
	}

	async onModuleInit() {
		const ddl = await readFile(SCHEMA_PATH, 'utf8')
		await this.pool.query(ddl)
		this.logger.log('Database schema is up to date')
	}

	async onModuleDestroy() {
		await this.pool.end()
	}

	async findUserByTelegramId(telegramId: string) {
		const { rows } = await this.pool.query<UserRow>(
			`SELECT ${USER_COLUMNS} FROM users WHERE telegram_id = $1`,
			[telegramId]
		)
		return rows[0] ? toUser(rows[0]) : null
	}

	async createUser(input: NewUser) {
		const { rows } = await this.pool.query<UserRow>(
			`INSERT INTO users (telegram_id, currency, timezone, language)
			 VALUES ($1, $2, $3, $4)
			 ON CONFLICT (telegram_id) DO UPDATE SET telegram_id = EXCLUDED.telegram_id
			 RETURNING ${USER_COLUMNS}`,
			[input.telegramId, input.currency, input.timezone, input.language]
		)
		return toUser(rows[0])
	}

	async updateUser(id: string, patch: UserPatch) {
		const { rows } = await this.pool.query<UserRow>(
			`UPDATE users SET
				currency = COALESCE($2, currency),
				timezone = COALESCE($3, timezone),
				language = COALESCE($4, language),
				last_reminder_on = COALESCE($5::date, last_reminder_on)
			 WHERE id = $1
			 RETURNING ${USER_COLUMNS}`,
			[
				id,
				patch.currency ?? null,
				patch.timezone ?? null,
				patch.language ?? null,
				patch.lastReminderOn ? formatIsoDate(patch.lastReminderOn) : null
			]
		)
		if (!rows[0]) throw new Error(`User ${id} not found`)
		return toUser(rows[0])
	}

	async listUsers() {
		const { rows } = await this.pool.query<UserRow>(
			`SELECT ${USER_COLUMNS} FROM users ORDER BY created_at`
		)
		return rows.map(toUser)
	}

	async listCategories(userId: string) {
		const { rows } = await this.pool.query<CategoryRow>(
			`SELECT ${CATEGORY_COLUMNS} FROM categories WHERE user_id = $1 ORDER BY created_at, name`,
			[userId]
		)
		return rows.map(toCategory)
	}

	async createCategories(userId: string, items: NewCategory[]) {
		if (!items.length) return []
		const client = await this.pool.connect()
		try {
			await client.query('BEGIN')
			const created: CategoryRecord[] = []
			for (const item of items) {
				const { rows } = await client.query<CategoryRow>(
					`INSERT INTO categories (user_id, name, keywords, is_default)
					 VALUES ($1, $2, $3, $4)
					 ON CONFLICT (user_id, name) DO NOTHING
					 RETURNING ${CATEGORY_COLUMNS}`,
					[userId, item.name, item.keywords ?? [], item.isDefault]
				)
				if (rows[0]) created.push(toCategory(rows[0]))
			}
			await client.query('COMMIT')
			return created
		} catch (e) {
			await client.query('ROLLBACK')
			throw e
		} finally {
			client.release()
		}
	}

	async findCategory(id: string, userId: string) {
		const { rows } = await this.pool.query<CategoryRow>(
			`SELECT ${CATEGORY_COLUMNS} FROM categories WHERE id = $1 AND user_id = $2`,
			[id, userId]
		)
		return rows[0] ? toCategory(rows[0]) : null
	}

	async setCategoryKeywords(id: string, keywords: string[]) {
		const { rows } = await this.pool.query<CategoryRow>(
			`UPDATE categories SET keywords = $2 WHERE id = $1 RETURNING ${CATEGORY_COLUMNS}`,
			[id, keywords]
		)
		if (!rows[0]) throw new Error(`Category ${id} not found`)
		return toCategory(rows[0])
	}

	async deleteCategory(id: string) {
		await this.pool.query('DELETE FROM categories WHERE id = $1', [id])
	}

	async insertExpenses(items: NewExpense[]) {
		if (!items.length) return []
		const client = await this.pool.connect()
		try {
			await client.query('BEGIN')
			const stored: ExpenseRecord[] = []
			for (const e of items) {
				const { rows } = await client.query<ExpenseRow>(
					`INSERT INTO expenses
						(user_id, amount, currency, description, category, direction, spent_on, ai_processed, confidence)
					 VALUES ($1, $2, $3, $4, $5, $6, $7::date, $8, $9)
					 RETURNING ${EXPENSE_COLUMNS}`,
					[
						e.userId,
						e.amount,
						e.currency,
						e.description,
						e.category,
						e.direction,
						formatIsoDate(e.spentOn),
						e.aiProcessed,
						e.confidence
					]
				)
				stored.push(toExpense(rows[0]))
			}
			await client.query('COMMIT')
			return stored
		} catch (e) {
			await client.query('ROLLBACK')
			throw e
		} finally {
			client.release()
		}
	}

	async listExpenses(userId: string, from: Date, to: Date) {
		const { rows } = await this.pool.query<ExpenseRow>(
			`SELECT ${EXPENSE_COLUMNS} FROM expenses
			 WHERE user_id = $1 AND spent_on BETWEEN $2::date AND $3::date
			 ORDER BY spent_on, created_at`,
			[userId, formatIsoDate(from), formatIsoDate(to)]
		)
		return rows.map(toExpense)
	}

	async findLastExpense(userId: string) {
		const { rows } = await this.pool.query<ExpenseRow>(
			`SELECT ${EXPENSE_COLUMNS} FROM expenses WHERE user_id = $1 ORDER BY created_at DESC LIMIT 1`,
			[userId]
		)
		return rows[0] ? toExpense(rows[0]) : null
	}

	async findLastExpenseByDescription(userId: string, description: string) {
		const { rows } = await this.pool.query<ExpenseRow>(
			`SELECT ${EXPENSE_COLUMNS} FROM expenses
			 WHERE user_id = $1 AND direction = 'expense' AND lower(description) = lower($2)
			 ORDER BY created_at DESC LIMIT 1`,
			[userId, description]
		)
		return rows[0] ? toExpense(rows[0]) : null
	}

	async deleteExpense(id: string) {
		await this.pool.query('DELETE FROM expenses WHERE id = $1', [id])
	}

	async recentCategories(userId: string, limit: number) {
		const { rows } = await this.pool.query<{ category: string }>(
			`SELECT category FROM expenses WHERE user_id = $1
			 GROUP BY category ORDER BY max(created_at) DESC LIMIT $2`,
			[userId, limit]
		)
		return rows.map(r => r.category)
	}
}
