import type { Direction } from '../parser/direction.util'

export interface UserRecord {
	id: string
	telegramId: string
	currency: string
	timezone: string
	language: string
	/** Local calendar day of the last reminder, UTC midnight. */
	lastReminderOn: Date | null
	createdAt: Date
}

export interface CategoryRecord {
	id: string
	userId: string
	name: string
	keywords: string[]
	isDefault: boolean
	createdAt: Date
}

export interface ExpenseRecord {
	id: string
	userId: string
	amount: number
	currency: string
	description: string
	category: string
	direction: Direction
	spentOn: Date
	aiProcessed: boolean
	confidence: number
	createdAt: Date
}

export type NewUser = Pick<UserRecord, 'telegramId' | 'currency' | 'timezone' | 'language'>
export type UserPatch = Partial<Pick<UserRecord, 'currency' | 'timezone' | 'language' | 'lastReminderOn'>>
export type NewCategory = Pick<CategoryRecord, 'name' | 'isDefault'> & { keywords?: string[] }
export type NewExpense = Omit<ExpenseRecord, 'id' | 'createdAt'>

/** Storage boundary. Nest resolves it to the Postgres implementation; tests use the in-memory one. */
export abstract class LedgerRepo {
	abstract findUserByTelegramId(telegramId: string): Promise<UserRecord | null>
	abstract createUser(input: NewUser): Promise<UserRecord>
	abstract updateUser(id: string, patch: UserPatch): Promise<UserRecord>
	abstract listUsers(): Promise<UserRecord[]>

	abstract listCategories(userId: string): Promise<CategoryRecord[]>
	/** Inserts what is missing; names already present for the user are skipped. */
	abstract createCategories(userId: string, items: NewCategory[]): Promise<CategoryRecord[]>
	abstract findCategory(id: string, userId: string): Promise<CategoryRecord | null>
	abstract setCategoryKeywords(id: string, keywords: string[]): Promise<CategoryRecord>
	abstract deleteCategory(id: string): Promise<void>

	abstract insertExpenses(items: NewExpense[]): Promise<ExpenseRecord[]>
	/** Entries with `spentOn` inside the inclusive range, oldest first. */
	abstract listExpenses(userId: string, from: Date, to: Date): Promise<ExpenseRecord[]>
	abstract findLastExpense(userId: string): Promise<ExpenseRecord | null>
	/** Newest expense (not income) whose description equals `description`, ignoring case. */
	abstract findLastExpenseByDescription(userId: string, description: string): Promise<ExpenseRecord | null>
	abstract deleteExpense(id: string): Promise<void>
	abstract recentCategories(userId: string, limit: number): Promise<string[]>
}
