export interface CategorizationRequest {
	text: string
	amount: number
	currency: string
	categories: string[]
	recentCategories?: string[]
}

export const CATEGORIZATION_SYSTEM_PROMPT =
	'You categorize personal expenses. Reply with a single JSON object and nothing else.'

export function buildCategorizationPrompt(req: CategorizationRequest): string {
	const recent = (req.recentCategories ?? []).slice(0, 3)
	const context = recent.length ? `\nRecently used categories: ${recent.join(', ')}` : ''
	const list = req.categories.map(c => `- ${c}`).join('\n')
	return `Expense information:
Description: "${req.text}"
Amount: ${req.amount} ${req.currency}${context}

User's available categories:
${list}

Rules:
1. Choose ONLY from the list above and return the exact category name, emoji included.
2. Categories may be in any language; match by meaning, not by language
   ("coffee", "кофе", "café" → cafe/restaurant; "uber", "такси" → transport; "бензин", "diesel" → fuel).
3. If there is no exact fit, pick the semantically closest category.
4. Custom categories are as valid as default ones.

Return JSON:
{"category": "exact name from the list", "confidence": 0..1, "reasoning": "short explanation"}`
}
