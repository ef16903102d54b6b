import { Injectable, Logger } from '@nestjs/common'
import { extractDateFromText } from '../../utils/date'
import { capitalizeFirst, normalizeLabel } from '../../utils/normalize'
import {
	type CategoryMatch,
	buildCategoryIndex,
	matchByKeywords,
	resolveCategory
} from '../categories/category-match.util'
import { AiCategorizationService } from '../llm/ai-categorization.service'
import { type AmountExtraction, extractAmount } from './amount-extraction.util'
import { type Direction, detectDirection, stripSignMarkers } from './direction.util'
import { splitExpenseText } from './expense-split.util'

export const CATCH_ALL_EXPENSE = 'Прочие расходы'
export const CATCH_ALL_INCOME = 'Прочие доходы'
export const CATCH_ALL_CONFIDENCE = 0.2

const FALLBACK_DESCRIPTION: Record<Direction, string> = {
	expense: 'Расход',
	income: 'Доход'
}

export interface ParseContext {
	defaultCurrency: string
	/** Expense categories in the user's display order, icons included. */
	categories: readonly string[]
	incomeCategories?: readonly string[]
	keywords?: Record<string, readonly string[]>
	recentCategories?: readonly string[]
	today: Date
	useAi?: boolean
}

export interface ParsedTransaction {
	amount: number
	currency: string
	description: string
	category: string
	confidence: number
	aiProcessed: boolean
	direction: Direction
	/** Explicit date from the text, or null for "today". */
	date: Date | null
}

/** A fragment without an amount: its text with sign markers and the date cut out. */
export interface UnpricedFragment {
	fragment: string
	description: string
	date: Date | null
}

export type ParseOutcome =
	| { status: 'parsed'; transaction: ParsedTransaction }
	| { status: 'no_amount'; description: string; date: Date | null }

export interface ParseManyResult {
	transactions: ParsedTransaction[]
	skipped: UnpricedFragment[]
}

function trimDescription(text: string): string {
	return text
		.replace(/\s+/g, ' ')
		.replace(/^[\s\-–:,.]+|[\s\-–:,.]+$/gu, '')
		.trim()
}

function cleanDescription(extraction: AmountExtraction): string {
	let text = extraction.residual
	if (extraction.currencySource === 'text') {
		text = text.replace(new RegExp(`(?<!\\p{L})${extraction.currency}(?!\\p{L})`, 'iu'), ' ')
	}
	return trimDescription(text)
}

@Injectable()
export class ExpenseParserService {
	private readonly logger = new Logger(ExpenseParserService.name)

	constructor(private readonly ai: AiCategorizationService) {}

	async parse(text: string, context: ParseContext): Promise<ParseOutcome> {
		const direction = detectDirection(text)
		const { date, rest } = extractDateFromText(stripSignMarkers(text), context.today)
		const extraction = extractAmount(rest, context.defaultCurrency)
		if (!extraction) {
			this.logger.debug(`No amount in "${text.slice(0, 80)}"`)
			return { status: 'no_amount', description: capitalizeFirst(trimDescription(rest)), date }
		}

		const description = cleanDescription(extraction)
		const category = await this.categorize(description, extraction, direction, context)

		return {
			status: 'parsed',
			transaction: {
				amount: extraction.amount,
				currency: extraction.currency,
				description: capitalizeFirst(description) || FALLBACK_DESCRIPTION[direction],
				category: category.category,
				confidence: category.confidence,
				aiProcessed: category.aiProcessed,
				direction,
				date
			}
		}
	}

	/** Splits a message into fragments and parses each; fragments without an amount are reported back. */
	async parseMany(text: string, context: ParseContext): Promise<ParseManyResult> {
		const result: ParseManyResult = { transactions: [], skipped: [] }
		for (const fragment of splitExpenseText(text)) {
			const outcome = await this.parse(fragment, context)
			if (outcome.status === 'parsed') result.transactions.push(outcome.transaction)
			else result.skipped.push({ fragment, description: outcome.description, date: outcome.date })
		}
		return result
	}

	private async categorize(
		description: string,
		extraction: AmountExtraction,
		direction: Direction,
		context: ParseContext
	): Promise<{ category: string; confidence: number; aiProcessed: boolean }> {
		const candidates =
			direction === 'income' ? (context.incomeCategories ?? []) : context.categories

		if (description && candidates.length) {
			const local = this.matchLocally(description, candidates, context)
			if (local) return { category: local.category, confidence: local.confidence, aiProcessed: false }

			if ((context.useAi ?? true) && this.ai.enabled) {
				const ai = await this.ai.categorize({
					text: description,
					amount: extraction.amount,
					currency: extraction.currency,
					categories: [...candidates],
					recentCategories: context.recentCategories ? [...context.recentCategories] : undefined
				})
				if (ai) return { category: ai.category, confidence: ai.confidence, aiProcessed: true }
			}
		}

		return {
			category: catchAllLabel(direction, candidates),
			confidence: CATCH_ALL_CONFIDENCE,
			aiProcessed: false
		}
	}

	private matchLocally(
		description: string,
		candidates: readonly string[],
		context: ParseContext
	): CategoryMatch | null {
		const index = buildCategoryIndex(candidates)
		return (
			resolveCategory(description, index) ??
			matchByKeywords(description, candidates, context.keywords)
		)
	}
}

/** The user's own catch-all category when they have one, otherwise the default label. */
export function catchAllLabel(direction: Direction, candidates: readonly string[]): string {
	const fallback = direction === 'income' ? CATCH_ALL_INCOME : CATCH_ALL_EXPENSE
	const wanted = normalizeLabel(fallback)
	return candidates.find(c => normalizeLabel(c) === wanted) ?? fallback
}
