import { Expense } from '../../core/domain/expense.js'
import {
  ExpenseFilter,
  ExpenseRepository,
  TimeWindow,
  isWithinWindow
} from '../../core/ports/expense-repository.js'

/**
 * Process-local store, useful for tests and for running without a database
 */
export class InMemoryExpenseRepository implements ExpenseRepository {
  private readonly ledgers = new Map<string, Expense[]>()

  async loadApprovedExpenses(ledgerId: string, window?: TimeWindow): Promise<Expense[]> {
    return this.expensesOf(ledgerId).filter(
      e => e.isApproved && isWithinWindow(e.timestamp, window)
    )
  }

  async listExpenses(ledgerId: string, filter?: ExpenseFilter): Promise<Expense[]> {
    let result = this.expensesOf(ledgerId).filter((expense) => {
      if (!isWithinWindow(expense.timestamp, filter)) return false
      if (filter?.status && expense.status !== filter.status) return false
      if (filter?.payerId !== undefined && expense.payerId !== filter.payerId) return false
      if (filter?.category && expense.category !== filter.category) return false
      return true
    })

    if (filter?.offset) {
      result = result.slice(filter.offset)
    }

    if (filter?.limit) {
      result = result.slice(0, filter.limit)
    }

    return result
  }

  async getExpense(ledgerId: string, id: string): Promise<Expense | null> {
    return this.expensesOf(ledgerId).find(e => e.id === id) ?? null
  }

  async appendExpense(expense: Expense): Promise<Expense> {
    const expenses = this.ledgers.get(expense.ledgerId) ?? []
    if (expenses.some(e => e.id === expense.id)) {
      throw new Error(`Expense ${expense.id} already exists in ledger ${expense.ledgerId}`)
    }

    expenses.push(expense)
    this.ledgers.set(expense.ledgerId, expenses)
    return expense
  }

  async markVoid(ledgerId: string, id: string, at: Date): Promise<Expense | null> {
    const expenses = this.ledgers.get(ledgerId)
    const index = expenses?.findIndex(e => e.id === id) ?? -1
    if (!expenses || index < 0) {
      return null
    }

    const voided = expenses[index].voided(at)
    expenses[index] = voided
    return voided
  }

  // Helper for testing
  clear(): void {
    this.ledgers.clear()
  }

  /**
   * Oldest first, insertion order for equal timestamps
   */
  private expensesOf(ledgerId: string): Expense[] {
    const expenses = this.ledgers.get(ledgerId) ?? []
    return expenses
      .map((expense, index) => ({ expense, index }))
      .sort((a, b) => a.expense.timestamp.getTime() - b.expense.timestamp.getTime() || a.index - b.index)
      .map(({ expense }) => expense)
  }
}
