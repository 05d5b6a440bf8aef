import { Decimal } from '../utils/decimal.js'
import { Category } from '../domain/category.js'
import { Expense } from '../domain/expense.js'
import { TimeWindow, isWithinWindow } from '../ports/expense-repository.js'

export interface CategoryTotal {
  category: Category
  total: Decimal
}

/**
 * Spend per category in base currency, largest first
 */
export function calculateCategoryTotals(
  expenses: readonly Expense[],
  window?: TimeWindow
): CategoryTotal[] {
  const totals = new Map<Category, Decimal>()

  for (const expense of expenses) {
    if (!expense.isApproved || !isWithinWindow(expense.timestamp, window)) {
      continue
    }
    const current = totals.get(expense.category) ?? new Decimal(0)
    totals.set(expense.category, current.plus(expense.amountInBase.amount))
  }

  return Array.from(totals, ([category, total]) => ({ category, total }))
    .sort((a, b) => b.total.comparedTo(a.total) || a.category.localeCompare(b.category))
}
