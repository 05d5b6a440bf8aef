import { Currency } from '../domain/currency.js'

/**
 * Expenses converted to different base currencies cannot be summed.
 */
export class BaseCurrencyMismatchError extends Error {
  constructor(
    public readonly expected: Currency,
    public readonly found: Currency,
    public readonly ledgerId?: string
  ) {
    super(
      ledgerId
        ? `Ledger ${ledgerId} holds expenses in ${found}, not ${expected}`
        : `Expenses mix base currencies ${expected} and ${found}`
    )
    this.name = 'BaseCurrencyMismatchError'
  }
}
