import { readFileSync } from 'node:fs'
import { z } from 'zod'

/**
 * Canonical ISO-4217 style code: three uppercase letters.
 */
export type Currency = string

const CurrencyTableSchema = z.object({
  common: z.array(z.string().regex(/^[A-Z]{3}$/)),
  aliases: z.record(z.string().regex(/^[A-Z]{3}$/))
})

const table = CurrencyTableSchema.parse(
  JSON.parse(readFileSync(new URL('../data/currencies.json', import.meta.url), 'utf-8'))
)

export const COMMON_CURRENCIES: readonly Currency[] = Object.freeze([...table.common])

const COMMON = new Set(COMMON_CURRENCIES)

const ALIASES = new Map<string, Currency>(
  Object.entries(table.aliases).map(([alias, code]) => [alias.toLowerCase(), code])
)

// Longer aliases first so that "שקל חדש" wins over "שקל"
const ALIASES_BY_LENGTH = [...ALIASES.keys()].sort((a, b) => b.length - a.length || a.localeCompare(b))

const CODE_PATTERN = /^[A-Z]{3}$/
const LATIN_WORD = /^[a-z.$]+$/

export function isCurrency(token: string): boolean {
  return CODE_PATTERN.test(token)
}

/**
 * Canonicalize a currency token (ISO code, symbol or slang) to its ISO code.
 * Any three-letter token that is not an alias is taken as a code, so rarer
 * currencies outside the common list still pass. Returns null otherwise.
 */
export function normalizeCurrency(token: string): Currency | null {
  const trimmed = token.trim()
  if (trimmed === '') {
    return null
  }

  const upper = trimmed.toUpperCase()
  if (COMMON.has(upper)) {
    return upper
  }

  const alias = ALIASES.get(trimmed.toLowerCase())
  if (alias) {
    return alias
  }

  return /^[A-Za-z]{3}$/.test(trimmed) ? upper : null
}

/**
 * Find the first currency mentioned in free text.
 *
 * Checked in order: an amount next to a known ISO code ("120usd", "usd 120"),
 * digits followed by the shekel sign, the longest alias contained in the text,
 * and finally a standalone ISO code.
 */
export function detectCurrency(text: string): Currency | null {
  const lower = text.toLowerCase()
  if (lower.trim() === '') {
    return null
  }

  for (const pattern of [/\d+(?:[.,]\d+)?\s*([a-z]{3})(?![a-z])/g, /(?<![a-z])([a-z]{3})\s*\d/g]) {
    for (const match of lower.matchAll(pattern)) {
      const code = match[1]?.toUpperCase()
      if (code && COMMON.has(code)) {
        return code
      }
    }
  }

  if (/\d+\s*₪/.test(text)) {
    return 'ILS'
  }

  for (const alias of ALIASES_BY_LENGTH) {
    if (containsAlias(lower, alias)) {
      return ALIASES.get(alias) ?? null
    }
  }

  for (const code of COMMON_CURRENCIES) {
    if (new RegExp(`\\b${code.toLowerCase()}\\b`).test(lower)) {
      return code
    }
  }

  return null
}

function containsAlias(text: string, alias: string): boolean {
  if (!LATIN_WORD.test(alias)) {
    return text.includes(alias)
  }
  const escaped = alias.replace(/[.$]/g, '\\$&')
  return new RegExp(`(^|[^a-z])${escaped}([^a-z]|$)`).test(text)
}
