import { z } from 'zod'
import { normalizeCurrency } from './core/domain/currency.js'
import { DEFAULT_RATE_SOURCE_URL } from './adapters/rates/exchange-rate-api-source.js'

const CurrencyCode = z.string().transform((value, ctx) => {
  const code = normalizeCurrency(value)
  if (!code) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unrecognized currency "${value}"` })
    return z.NEVER
  }
  return code
})

export const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Ledger defaults
  BASE_CURRENCY: CurrencyCode.default('USD'),

  // Exchange rates
  BRIDGE_CURRENCY: CurrencyCode.default('USD'),
  RATE_CACHE_TTL_HOURS: z.coerce.number().positive().default(6),
  RATE_LAYER_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  RATE_SOURCE_URL: z.string().url().default(DEFAULT_RATE_SOURCE_URL),
  RATE_SOURCE_TTL_MS: z.coerce.number().int().min(0).default(3_600_000),

  // Persistence; in-memory repositories are used when unset
  DATABASE_URL: z.string().min(1).optional(),
  DB_TABLE_PREFIX: z.string().regex(/^[a-z0-9_]*$/i).default('')
})

export type AppConfig = z.infer<typeof ConfigSchema>

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[]

  constructor(error: z.ZodError) {
    const summary = error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ')
    super(`Invalid configuration: ${summary}`)
    this.name = 'ConfigError'
    this.issues = error.issues
  }
}

/**
 * Load and validate configuration from process.env.
 *
 * @throws {ConfigError} if a variable is missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const result = ConfigSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(result.error)
  }
  return result.data
}
