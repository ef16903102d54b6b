import { Injectable } from '@nestjs/common'
import { UserInputError } from '../../shared/errors'
import { capitalizeFirst, normalizeLabel } from '../../utils/normalize'
import { type CategoryRecord, LedgerRepo } from '../ledger/ledger.repo'
import { CATCH_ALL_EXPENSE } from '../parser/expense-parser.service'
import { resolveCategory } from './category-match.util'
import { DEFAULT_CATEGORIES, MAX_CATEGORY_NAME_LENGTH } from './default-categories'

@Injectable()
export class CategoriesService {
	constructor(private readonly repo: LedgerRepo) {}

	async createDefaults(userId: string) {
		await this.repo.createCategories(
			userId,
			DEFAULT_CATEGORIES.map(name => ({ name, isDefault: true }))
		)
	}

	async getAllByUserId(userId: string) {
		return this.repo.listCategories(userId)
	}

	/** Category labels and the user's own keywords, shaped for the parser. */
	async getMatchingContext(userId: string) {
		const categories = await this.repo.listCategories(userId)
		const keywords: Record<string, string[]> = {}
		for (const c of categories) if (c.keywords.length) keywords[c.name] = c.keywords
		return { labels: categories.map(c => c.name), keywords }
	}

	/** Finds a category of the user by loose name, the same way expenses are matched. */
	async findByName(userId: string, name: string): Promise<CategoryRecord | null> {
		const categories = await this.repo.listCategories(userId)
		const match = resolveCategory(
			name,
			categories.map(c => c.name)
		)
		return match ? (categories.find(c => c.name === match.category) ?? null) : null
	}

	async create(userId: string, name: string) {
		const trimmed = name.trim().replace(/\s+/g, ' ')
		if (!normalizeLabel(trimmed)) throw new UserInputError('Название не может быть пустым')
		if (trimmed.length > MAX_CATEGORY_NAME_LENGTH) {
			throw new UserInputError(`Название не длиннее ${MAX_CATEGORY_NAME_LENGTH} символов`)
		}
		const wanted = normalizeLabel(trimmed)
		const existing = await this.repo.listCategories(userId)
		if (existing.some(c => normalizeLabel(c.name) === wanted)) {
			throw new UserInputError('Категория с таким названием уже существует')
		}
		const [created] = await this.repo.createCategories(userId, [
			{ name: capitalizeFirst(trimmed), isDefault: false }
		])
		if (!created) throw new UserInputError('Категория с таким названием уже существует')
		return created
	}

	async delete(id: string, userId: string) {
		const cat = await this.repo.findCategory(id, userId)
		if (!cat) throw new UserInputError('Категория не найдена')
		if (normalizeLabel(cat.name) === normalizeLabel(CATCH_ALL_EXPENSE)) {
			throw new UserInputError('Эту категорию нельзя удалить')
		}
		await this.repo.deleteCategory(id)
		return cat
	}

	/** Deletion needs the full name; icon and case are ignored. */
	async deleteByName(userId: string, name: string) {
		const wanted = normalizeLabel(name)
		const categories = await this.repo.listCategories(userId)
		const cat = wanted ? categories.find(c => normalizeLabel(c.name) === wanted) : undefined
		if (!cat) throw new UserInputError('Категория не найдена')
		return this.delete(cat.id, userId)
	}

	async addKeyword(userId: string, categoryName: string, keyword: string) {
		const cat = await this.findByName(userId, categoryName)
		if (!cat) throw new UserInputError('Категория не найдена')
		const word = normalizeLabel(keyword)
		if (!word) throw new UserInputError('Ключевое слово не может быть пустым')
		if (cat.keywords.includes(word)) return cat
		return this.repo.setCategoryKeywords(cat.id, [...cat.keywords, word])
	}
}
