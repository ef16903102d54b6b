import { CATCH_ALL_EXPENSE } from '../parser/expense-parser.service'

/** Seeded for every new user, in display order. */
export const DEFAULT_CATEGORIES = [
	'🛒 Продукты',
	'🍽️ Кафе и рестораны',
	'⛽ АЗС',
	'🚕 Транспорт',
	'🚗 Автомобиль',
	'🏠 Жилье',
	'💊 Аптеки',
	'🏥 Медицина',
	'💄 Красота',
	'🏃 Спорт и фитнес',
	'👔 Одежда и обувь',
	'🎭 Развлечения',
	'📚 Образование',
	'🎁 Подарки',
	'✈️ Путешествия',
	'👪 Родственники',
	'📱 Подписки и услуги',
	`💰 ${CATCH_ALL_EXPENSE}`
]

export const MAX_CATEGORY_NAME_LENGTH = 30
