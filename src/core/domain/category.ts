export const CATEGORIES = [
  'food',
  'groceries',
  'transport',
  'entertainment',
  'travel',
  'utilities',
  'health',
  'rent',
  'other'
] as const

export type Category = typeof CATEGORIES[number]

const SYNONYMS: Record<string, Category> = {
  meal: 'food',
  dinner: 'food',
  lunch: 'food',
  breakfast: 'food',
  uber: 'transport',
  taxi: 'transport',
  bus: 'transport',
  flight: 'travel',
  hotel: 'travel',
  movie: 'entertainment',
  cinema: 'entertainment',
  pharmacy: 'health',
  medicine: 'health'
}

export function isCategory(value: string): value is Category {
  return CATEGORIES.some(c => c === value)
}

/**
 * Map a free category word onto the fixed category set, falling back to 'other'
 */
export function normalizeCategory(raw: string | undefined): Category {
  const value = raw?.trim().toLowerCase() ?? ''
  if (value === '') {
    return 'other'
  }
  if (isCategory(value)) {
    return value
  }

  const exact = SYNONYMS[value]
  if (exact) {
    return exact
  }

  for (const [synonym, category] of Object.entries(SYNONYMS)) {
    if (value.includes(synonym)) {
      return category
    }
  }

  return 'other'
}
