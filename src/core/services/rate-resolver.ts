import { Currency } from '../domain/currency.js'
import { ExchangeRate, RateSourceKind } from '../domain/exchange-rate.js'
import { RateSource } from '../ports/rate-source.js'
import { RateSourceTimeoutError, RateUnavailableError } from '../errors/rate-errors.js'
import { Decimal, isUsableRate } from '../utils/decimal.js'
import { Logger, silentLogger } from '../utils/logger.js'
import { withTimeout } from '../utils/timeout.js'
import { RateCache } from './rate-cache.js'
import { DEFAULT_STATIC_RATES, StaticRateTable } from './static-rates.js'

export const DEFAULT_LAYER_TIMEOUT_MS = 5000

export interface RateResolverOptions {
  source: RateSource
  cache: RateCache
  staticRates?: StaticRateTable
  /**
   * Intermediate currency for bridged conversions
   */
  bridgeCurrency?: Currency
  /**
   * Upper bound for each network-backed layer (direct, inverse, bridge)
   */
  layerTimeoutMs?: number
  logger?: Logger
}

interface LayerResult {
  rate: Decimal
  source: RateSourceKind
}

/**
 * Resolves conversion rates through a fallback chain:
 * cache, direct quote, inverted quote, bridge currency, static table.
 * Anything but a direct quote is flagged approximate.
 */
export class RateResolver {
  private readonly source: RateSource
  private readonly cache: RateCache
  private readonly staticRates: StaticRateTable
  private readonly bridgeCurrency: Currency
  private readonly layerTimeoutMs: number
  private readonly logger: Logger

  constructor(options: RateResolverOptions) {
    this.source = options.source
    this.cache = options.cache
    this.staticRates = options.staticRates ?? DEFAULT_STATIC_RATES
    this.bridgeCurrency = options.bridgeCurrency ?? 'USD'
    this.layerTimeoutMs = options.layerTimeoutMs ?? DEFAULT_LAYER_TIMEOUT_MS
    this.logger = (options.logger ?? silentLogger()).child({ component: 'rate-resolver' })
  }

  async resolve(from: Currency, to: Currency, asOf: Date = new Date()): Promise<ExchangeRate> {
    if (from === to) {
      return ExchangeRate.identity(from, asOf)
    }

    const cached = this.cache.get(from, to, asOf)
    if (cached) {
      this.logger.debug({ from, to, rate: cached.rate.toString() }, 'fx cache hit')
      return new ExchangeRate({
        from,
        to,
        rate: cached.rate,
        observedAt: cached.createdAt,
        approximate: cached.approximate,
        source: cached.source
      })
    }

    const result = await this.resolveThroughLayers(from, to)
    if (!result) {
      this.logger.warn({ from, to }, 'fx all strategies failed')
      throw new RateUnavailableError(from, to)
    }

    const approximate = result.source !== 'direct'
    const entry = this.cache.set(from, to, asOf, { rate: result.rate, approximate, source: result.source })
    this.logger.debug({ from, to, rate: result.rate.toString(), source: result.source }, 'fx rate resolved')

    return new ExchangeRate({
      from,
      to,
      rate: result.rate,
      observedAt: entry.createdAt,
      approximate,
      source: result.source
    })
  }

  private async resolveThroughLayers(from: Currency, to: Currency): Promise<LayerResult | null> {
    const direct = await this.runLayer('direct', from, to, signal => this.fetch(from, to, signal))
    if (direct) {
      return { rate: direct, source: 'direct' }
    }

    const inverse = await this.runLayer('inverse', from, to, signal => this.fetch(to, from, signal))
    if (inverse) {
      return { rate: new Decimal(1).div(inverse), source: 'inverse' }
    }

    if (from !== this.bridgeCurrency && to !== this.bridgeCurrency) {
      const bridged = await this.runLayer('bridge', from, to, async signal => {
        const first = await this.fetch(from, this.bridgeCurrency, signal)
        if (!first) {
          return null
        }
        const second = await this.fetch(this.bridgeCurrency, to, signal)
        return second ? first.times(second) : null
      })
      if (bridged) {
        return { rate: bridged, source: 'bridge' }
      }
    }

    const fallback = this.staticRates.lookup(from, to)
    if (fallback) {
      this.logger.debug({ from, to, version: this.staticRates.version }, 'fx static fallback')
      return { rate: fallback, source: 'static' }
    }

    return null
  }

  /**
   * A layer fails on timeout, on a thrown error, or on an unusable quote
   */
  private async runLayer(
    layer: RateSourceKind,
    from: Currency,
    to: Currency,
    task: (signal: AbortSignal) => Promise<Decimal | null>
  ): Promise<Decimal | null> {
    try {
      const rate = await withTimeout(
        task,
        this.layerTimeoutMs,
        () => new RateSourceTimeoutError(from, to, this.layerTimeoutMs)
      )
      if (rate && isUsableRate(rate)) {
        return rate
      }
      this.logger.debug({ layer, from, to }, 'fx layer returned no usable rate')
      return null
    } catch (e) {
      if (e instanceof RateSourceTimeoutError) {
        this.logger.warn({ layer, from, to, timeoutMs: e.timeoutMs }, 'fx layer timed out')
      } else {
        this.logger.debug({ layer, from, to, err: e }, 'fx layer failed')
      }
      return null
    }
  }

  private async fetch(from: Currency, to: Currency, signal: AbortSignal): Promise<Decimal | null> {
    const rate = await this.source.fetchRate(from, to, { signal })
    return rate && isUsableRate(rate) ? rate : null
  }
}
