import { Currency } from '../domain/currency.js'
import { Decimal } from '../utils/decimal.js'

export interface FetchRateOptions {
  /**
   * Aborted when the resolver gives up on the current layer
   */
  signal?: AbortSignal
}

export interface RateSource {
  /**
   * Units of `to` per unit of `from`, or null when the source has no quote.
   * May throw on network failure.
   */
  fetchRate(from: Currency, to: Currency, options?: FetchRateOptions): Promise<Decimal | null>
}
