import { Decimal } from '../utils/decimal.js'

/**
 * Net balances did not sum to zero. Always a defect in the engine, never bad input.
 */
export class BalanceInvariantError extends Error {
  constructor(
    message: string,
    public readonly imbalance: Decimal
  ) {
    super(message)
    this.name = 'BalanceInvariantError'
  }

  static fromImbalance(imbalance: Decimal): BalanceInvariantError {
    return new BalanceInvariantError(
      `Balances do not sum to zero: off by ${imbalance.toString()}`,
      imbalance
    )
  }
}
