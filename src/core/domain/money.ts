import { Decimal, DecimalInput, toDecimal } from '../utils/decimal.js'
import { Currency } from './currency.js'

export interface MoneyProps {
  amount: DecimalInput
  currency: Currency
}

export class Money {
  readonly amount: Decimal
  readonly currency: Currency

  constructor(props: MoneyProps) {
    this.amount = toDecimal(props.amount)
    this.currency = props.currency
  }

  static zero(currency: Currency): Money {
    return new Money({ amount: 0, currency })
  }

  isZero(): boolean {
    return this.amount.isZero()
  }

  isPositive(): boolean {
    return this.amount.greaterThan(0)
  }

  add(other: Money): Money {
    if (this.currency !== other.currency) {
      throw new Error(
        `Cannot add different currencies: ${this.currency} and ${other.currency}`
      )
    }
    return new Money({
      amount: this.amount.plus(other.amount),
      currency: this.currency
    })
  }

  /**
   * Convert into another currency at the given rate (units of `currency` per unit of this)
   */
  convert(rate: DecimalInput, currency: Currency): Money {
    return new Money({
      amount: this.amount.times(toDecimal(rate)),
      currency
    })
  }

  equals(other: Money): boolean {
    return this.currency === other.currency && this.amount.equals(other.amount)
  }

  toString(): string {
    return `${this.amount.toString()} ${this.currency}`
  }
}
