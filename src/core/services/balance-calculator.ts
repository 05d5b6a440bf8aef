import { Decimal, EPSILON, isNegligible, sum } from '../utils/decimal.js'
import { Currency } from '../domain/currency.js'
import { Expense } from '../domain/expense.js'
import { ParticipantId } from '../domain/participant.js'
import { ShareDebit } from '../domain/weight-snapshot.js'
import { BalanceInvariantError } from '../errors/balance-error.js'
import { BaseCurrencyMismatchError } from '../errors/base-currency-error.js'
import { TimeWindow, isWithinWindow } from '../ports/expense-repository.js'

/**
 * Net position per participant in base currency.
 * Positive: the group owes them. Negative: they owe the group.
 */
export type Balances = Map<ParticipantId, Decimal>

export interface CalculatorOptions {
  window?: TimeWindow
  /**
   * Participants to report even without activity (as zero)
   */
  includeParticipants?: Iterable<ParticipantId>
  /**
   * Base currency every expense in scope must use.
   * Defaults to that of the first expense in scope.
   */
  baseCurrency?: Currency
}

export class BalanceCalculator {
  /**
   * Credit each payer with the full base amount and debit every snapshot
   * participant their weighted share. Void expenses are skipped.
   *
   * @throws {BaseCurrencyMismatchError} if the expenses in scope use different base currencies
   */
  computeBalances(
    expenses: readonly Expense[],
    options: CalculatorOptions = {}
  ): Balances {
    const balances: Balances = new Map()
    let base = options.baseCurrency

    for (const participantId of options.includeParticipants ?? []) {
      balances.set(participantId, new Decimal(0))
    }

    for (const expense of expenses) {
      if (!expense.isApproved || !isWithinWindow(expense.timestamp, options.window)) {
        continue
      }
      if (base === undefined) {
        base = expense.baseCurrency
      } else if (expense.baseCurrency !== base) {
        throw new BaseCurrencyMismatchError(base, expense.baseCurrency)
      }

      const credited = balances.get(expense.payerId) ?? new Decimal(0)
      balances.set(expense.payerId, credited.plus(expense.amountInBase.amount))

      for (const share of this.expenseShares(expense)) {
        const current = balances.get(share.participantId) ?? new Decimal(0)
        balances.set(share.participantId, current.minus(share.amount))
      }
    }

    return balances
  }

  expenseShares(expense: Expense): ShareDebit[] {
    return expense.shares()
  }

  total(balances: Balances): Decimal {
    return sum(balances.values())
  }

  /**
   * @throws {BalanceInvariantError} if the balances do not net out
   */
  assertBalanced(balances: Balances, epsilon: Decimal = EPSILON): void {
    const imbalance = this.total(balances)
    if (!isNegligible(imbalance, epsilon)) {
      throw BalanceInvariantError.fromImbalance(imbalance)
    }
  }
}
