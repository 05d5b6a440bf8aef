import { Decimal } from 'decimal.js'

// Configure Decimal.js for financial calculations
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP
})

export { Decimal }

export type DecimalInput = Decimal | string | number

/**
 * Tolerance used when deciding whether a balance is settled
 */
export const EPSILON = new Decimal('1e-6')

export function toDecimal(value: DecimalInput): Decimal {
  return value instanceof Decimal ? value : new Decimal(value)
}

export function sum(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0)
  for (const value of values) {
    total = total.plus(value)
  }
  return total
}

export function isNegligible(value: Decimal, epsilon: Decimal = EPSILON): boolean {
  return value.abs().lessThanOrEqualTo(epsilon)
}

export function isUsableRate(value: Decimal): boolean {
  return value.isFinite() && value.greaterThan(0)
}
