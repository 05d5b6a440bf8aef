import { Decimal, DecimalInput, toDecimal } from '../utils/decimal.js'
import { Currency } from './currency.js'

/**
 * Which resolver layer produced a rate
 */
export type RateSourceKind = 'identity' | 'direct' | 'inverse' | 'bridge' | 'static'

export interface ExchangeRateProps {
  from: Currency
  to: Currency
  rate: DecimalInput
  observedAt: Date
  approximate: boolean
  source: RateSourceKind
}

export class ExchangeRate {
  readonly from: Currency
  readonly to: Currency
  readonly rate: Decimal
  readonly observedAt: Date
  readonly approximate: boolean
  readonly source: RateSourceKind

  constructor(props: ExchangeRateProps) {
    this.from = props.from
    this.to = props.to
    this.rate = toDecimal(props.rate)
    this.observedAt = props.observedAt
    this.approximate = props.approximate
    this.source = props.source
  }

  static identity(currency: Currency, observedAt: Date): ExchangeRate {
    return new ExchangeRate({
      from: currency,
      to: currency,
      rate: 1,
      observedAt,
      approximate: false,
      source: 'identity'
    })
  }

  convert(amount: Decimal): Decimal {
    return amount.times(this.rate)
  }

  toString(): string {
    const marker = this.approximate ? ' (approx)' : ''
    return `${this.from}->${this.to} ${this.rate.toString()}${marker}`
  }
}
