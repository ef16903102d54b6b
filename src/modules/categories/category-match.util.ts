import { normalizeLabel, tokenize } from '../../utils/normalize'
import builtinKeywords from './data/category-keywords.json'

export type CategoryMatchVia = 'exact' | 'subset' | 'keyword'

export interface CategoryMatch {
	category: string
	confidence: number
	via: CategoryMatchVia
}

export interface CategoryIndexEntry {
	label: string
	normalized: string
	tokens: Set<string>
}

export const KEYWORD_MATCH_CONFIDENCE = 0.5

const BUILTIN_KEYWORDS: Record<string, string[]> = builtinKeywords

export function buildCategoryIndex(candidates: readonly string[]): CategoryIndexEntry[] {
	return candidates.map(label => ({
		label,
		normalized: normalizeLabel(label),
		tokens: tokenize(label)
	}))
}

function isSubset(small: Set<string>, big: Set<string>): boolean {
	for (const t of small) if (!big.has(t)) return false
	return true
}

/**
 * Resolves free text to one of the user's categories.
 *
 * Exact equality of the normalized, icon-stripped labels wins outright. Otherwise the
 * query's tokens must all appear in the candidate; among several such candidates the
 * one with the fewest tokens wins and equal sizes keep caller order. Returns `null`
 * when nothing matches.
 */
export function resolveCategory(
	query: string,
	candidates: readonly (string | CategoryIndexEntry)[]
): CategoryMatch | null {
	const normalizedQuery = normalizeLabel(query)
	const queryTokens = tokenize(query)
	if (!normalizedQuery) return null
	const index: CategoryIndexEntry[] = candidates.map(c =>
		typeof c === 'string' ? buildCategoryIndex([c])[0] : c
	)

	const exact = index.find(e => e.normalized === normalizedQuery)
	if (exact) return { category: exact.label, confidence: 1, via: 'exact' }
	if (!queryTokens.size) return null

	let best: CategoryIndexEntry | null = null
	for (const entry of index) {
		if (!entry.tokens.size || !isSubset(queryTokens, entry.tokens)) continue
		if (!best || entry.tokens.size < best.tokens.size) best = entry
	}
	if (!best) return null
	const coverage = queryTokens.size / best.tokens.size
	return {
		category: best.label,
		confidence: Number((0.5 + 0.5 * coverage).toFixed(2)),
		via: 'subset'
	}
}

function keywordHits(words: Set<string>, text: string, keywords: readonly string[]): number {
	let hits = 0
	for (const raw of keywords) {
		const keyword = normalizeLabel(raw)
		if (!keyword) continue
		if (keyword.includes(' ') ? text.includes(keyword) : words.has(keyword)) hits++
	}
	return hits
}

/**
 * Keyword fallback: the user's own keywords first (any hit wins), then the built-in
 * dictionary, whose best-scoring key is mapped onto a user category through
 * {@link resolveCategory}.
 */
export function matchByKeywords(
	text: string,
	candidates: readonly string[],
	userKeywords: Record<string, readonly string[]> = {}
): CategoryMatch | null {
	const normalized = normalizeLabel(text)
	const words = tokenize(text)
	if (!words.size) return null

	for (const label of candidates) {
		const own = Object.hasOwn(userKeywords, label) ? userKeywords[label] : undefined
		if (own?.length && keywordHits(words, normalized, own) > 0) {
			return { category: label, confidence: KEYWORD_MATCH_CONFIDENCE, via: 'keyword' }
		}
	}

	const index = buildCategoryIndex(candidates)
	const ranked = Object.entries(BUILTIN_KEYWORDS)
		.map(([key, keywords]) => ({ key, score: keywordHits(words, normalized, keywords) }))
		.filter(r => r.score > 0)
		.sort((a, b) => b.score - a.score)
	for (const { key } of ranked) {
		const match = resolveCategory(key, index)
		if (match) {
			return { category: match.category, confidence: KEYWORD_MATCH_CONFIDENCE, via: 'keyword' }
		}
	}
	return null
}
