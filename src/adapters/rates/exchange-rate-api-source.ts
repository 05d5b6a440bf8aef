import { z } from 'zod'
import { Currency } from '../../core/domain/currency.js'
import { FetchRateOptions, RateSource } from '../../core/ports/rate-source.js'
import { Decimal } from '../../core/utils/decimal.js'
import { Logger, silentLogger } from '../../core/utils/logger.js'

export const DEFAULT_RATE_SOURCE_URL = 'https://open.er-api.com/v6/latest'

export interface ExchangeRateApiSourceOptions {
  /**
   * Endpoint prefix; the base currency is appended as the last path segment
   */
  baseUrl?: string
  /**
   * How long one base currency's quote table is reused
   */
  cacheTtlMs?: number
  logger?: Logger
  now?: () => number
}

const LatestRatesSchema = z.object({
  result: z.string(),
  rates: z.record(z.number()).optional()
})

interface CacheEntry {
  rates: Record<string, number>
  fetchedAt: number
}

/**
 * Rate source backed by an open.er-api.com style endpoint that returns
 * every quote for one base currency per request.
 */
export class ExchangeRateApiSource implements RateSource {
  private readonly cache = new Map<string, CacheEntry>()
  private readonly baseUrl: string
  private readonly cacheTtlMs: number
  private readonly logger: Logger
  private readonly now: () => number

  constructor(options: ExchangeRateApiSourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_RATE_SOURCE_URL).replace(/\/+$/, '')
    this.cacheTtlMs = options.cacheTtlMs ?? 3_600_000
    this.logger = (options.logger ?? silentLogger()).child({ component: 'exchange-rate-api' })
    this.now = options.now ?? Date.now
  }

  async fetchRate(from: Currency, to: Currency, options: FetchRateOptions = {}): Promise<Decimal | null> {
    const rates = await this.fetchRates(from, options.signal)
    const rate = rates[to]
    return rate === undefined ? null : new Decimal(rate)
  }

  private async fetchRates(base: Currency, signal?: AbortSignal): Promise<Record<string, number>> {
    const cached = this.cache.get(base)
    if (cached && this.now() - cached.fetchedAt < this.cacheTtlMs) {
      return cached.rates
    }

    const response = await fetch(`${this.baseUrl}/${encodeURIComponent(base)}`, { signal })
    if (!response.ok) {
      throw new Error(`Rate source responded with status ${response.status}`)
    }

    const payload = LatestRatesSchema.parse(await response.json())
    if (payload.result !== 'success' || !payload.rates) {
      throw new Error(`Rate source returned unexpected payload: ${payload.result}`)
    }

    this.cache.set(base, { rates: payload.rates, fetchedAt: this.now() })
    this.logger.debug({ base, currencyCount: Object.keys(payload.rates).length }, 'fx quotes fetched')
    return payload.rates
  }

  clearCache(): void {
    this.cache.clear()
  }
}
