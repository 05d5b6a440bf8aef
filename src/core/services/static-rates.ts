import { Currency } from '../domain/currency.js'
import { Decimal, isUsableRate } from '../utils/decimal.js'

export interface StaticRateTableProps {
  version: string
  rates: Record<string, string | number>
}

/**
 * Last-resort mid-market estimates, keyed "FROM->TO".
 * Only exact pairs are looked up.
 */
export class StaticRateTable {
  readonly version: string
  private readonly rates: Map<string, Decimal>

  constructor(props: StaticRateTableProps) {
    this.version = props.version
    this.rates = new Map()

    for (const [pair, value] of Object.entries(props.rates)) {
      if (!/^[A-Z]{3}->[A-Z]{3}$/.test(pair)) {
        throw new Error(`Invalid static rate pair "${pair}"`)
      }
      const rate = new Decimal(value)
      if (!isUsableRate(rate)) {
        throw new Error(`Static rate for ${pair} must be positive`)
      }
      this.rates.set(pair, rate)
    }
  }

  lookup(from: Currency, to: Currency): Decimal | null {
    return this.rates.get(`${from}->${to}`) ?? null
  }

  get pairs(): string[] {
    return Array.from(this.rates.keys()).sort()
  }
}

export const DEFAULT_STATIC_RATES = new StaticRateTable({
  version: '2024-06',
  rates: {
    'USD->ILS': '3.70',
    'EUR->ILS': '4.00',
    'GBP->ILS': '4.70',
    'USD->EUR': '0.92',
    'EUR->USD': '1.09'
  }
})
