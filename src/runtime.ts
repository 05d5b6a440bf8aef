import pg from 'pg'
import type { Pool } from 'pg'
import { AppConfig } from './config.js'
import { Currency } from './core/domain/currency.js'
import { ExpenseRepository } from './core/ports/expense-repository.js'
import { ParticipantRepository } from './core/ports/participant-repository.js'
import { RateSource } from './core/ports/rate-source.js'
import { ExpenseLedger } from './core/services/expense-ledger.js'
import { HOUR_MS, RateCache } from './core/services/rate-cache.js'
import { RateResolver } from './core/services/rate-resolver.js'
import { StaticRateTable } from './core/services/static-rates.js'
import { Logger, createLogger } from './core/utils/logger.js'
import { InMemoryExpenseRepository, InMemoryParticipantRepository } from './adapters/memory/index.js'
import { createPostgresRepositories, runMigrations } from './adapters/postgres/index.js'
import { ExchangeRateApiSource } from './adapters/rates/index.js'

export interface RuntimeOptions {
  logger?: Logger
  /**
   * Replaces the HTTP rate source
   */
  rateSource?: RateSource
  staticRates?: StaticRateTable
  /**
   * Use an existing pool instead of opening one from DATABASE_URL
   */
  pool?: Pool
  now?: () => Date
}

export interface Runtime {
  readonly config: AppConfig
  readonly logger: Logger
  readonly expenses: ExpenseRepository
  readonly participants: ParticipantRepository
  readonly rateResolver: RateResolver
  ledger(ledgerId: string, baseCurrency?: Currency): ExpenseLedger
  /**
   * Like `ledger`, but first checks the base against the stored expenses.
   *
   * @throws {BaseCurrencyMismatchError} when the stored expenses use another base
   */
  openLedger(ledgerId: string, baseCurrency?: Currency): Promise<ExpenseLedger>
  /**
   * Create the database tables when running on PostgreSQL
   */
  migrate(): Promise<void>
  close(): Promise<void>
}

export function createRuntime(config: AppConfig, options: RuntimeOptions = {}): Runtime {
  const logger = options.logger ?? createLogger({ level: config.LOG_LEVEL })
  const now = options.now ?? (() => new Date())

  const pool = options.pool ?? (config.DATABASE_URL
    ? new pg.Pool({ connectionString: config.DATABASE_URL })
    : undefined)
  const ownsPool = options.pool === undefined && pool !== undefined
  const tables = { prefix: config.DB_TABLE_PREFIX }

  let expenses: ExpenseRepository
  let participants: ParticipantRepository
  if (pool) {
    const repositories = createPostgresRepositories({ pool, tables })
    expenses = repositories.expenses
    participants = repositories.participants
  } else {
    expenses = new InMemoryExpenseRepository()
    participants = new InMemoryParticipantRepository()
  }

  const rateResolver = new RateResolver({
    source: options.rateSource ?? new ExchangeRateApiSource({
      baseUrl: config.RATE_SOURCE_URL,
      cacheTtlMs: config.RATE_SOURCE_TTL_MS,
      logger
    }),
    cache: new RateCache({ ttlMs: config.RATE_CACHE_TTL_HOURS * HOUR_MS, now }),
    staticRates: options.staticRates,
    bridgeCurrency: config.BRIDGE_CURRENCY,
    layerTimeoutMs: config.RATE_LAYER_TIMEOUT_MS,
    logger
  })

  const ledgers = new Map<string, ExpenseLedger>()

  const ledger = (ledgerId: string, baseCurrency?: Currency): ExpenseLedger => {
    const existing = ledgers.get(ledgerId)
    if (existing) {
      if (baseCurrency && baseCurrency !== existing.baseCurrency) {
        throw new Error(
          `Ledger ${ledgerId} already uses ${existing.baseCurrency}, not ${baseCurrency}`
        )
      }
      return existing
    }

    const created = new ExpenseLedger({
      ledgerId,
      baseCurrency: baseCurrency ?? config.BASE_CURRENCY,
      expenseRepository: expenses,
      participantRepository: participants,
      rateResolver,
      logger,
      now
    })
    ledgers.set(ledgerId, created)
    return created
  }

  logger.info(
    { storage: pool ? 'postgres' : 'memory', baseCurrency: config.BASE_CURRENCY },
    'runtime ready'
  )

  return {
    config,
    logger,
    expenses,
    participants,
    rateResolver,

    ledger,

    async openLedger(ledgerId: string, baseCurrency?: Currency): Promise<ExpenseLedger> {
      const known = ledgers.has(ledgerId)
      const opened = ledger(ledgerId, baseCurrency)
      try {
        await opened.assertStoredBase()
      } catch (e) {
        if (!known) {
          ledgers.delete(ledgerId)
        }
        throw e
      }
      return opened
    },

    async migrate(): Promise<void> {
      if (pool) {
        await runMigrations(pool, tables)
      }
    },

    async close(): Promise<void> {
      ledgers.clear()
      if (ownsPool && pool) {
        await pool.end()
      }
    }
  }
}
