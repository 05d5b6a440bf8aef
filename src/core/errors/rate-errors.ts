import { Currency } from '../domain/currency.js'

/**
 * Every resolver layer failed for the pair
 */
export class RateUnavailableError extends Error {
  constructor(
    public readonly from: Currency,
    public readonly to: Currency
  ) {
    super(`No exchange rate available for ${from}->${to}`)
    this.name = 'RateUnavailableError'
  }
}

/**
 * A single rate source call ran past its layer timeout
 */
export class RateSourceTimeoutError extends Error {
  constructor(
    public readonly from: Currency,
    public readonly to: Currency,
    public readonly timeoutMs: number
  ) {
    super(`Rate source timed out after ${timeoutMs}ms for ${from}->${to}`)
    this.name = 'RateSourceTimeoutError'
  }
}
