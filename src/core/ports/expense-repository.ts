import { Expense, ExpenseStatus } from '../domain/expense.js'

export interface TimeWindow {
  from?: Date
  to?: Date
}

export interface ExpenseFilter extends TimeWindow {
  status?: ExpenseStatus
  payerId?: number
  category?: string
  limit?: number
  offset?: number
}

export interface ExpenseRepository {
  /**
   * Approved expenses of a ledger, oldest first
   */
  loadApprovedExpenses(ledgerId: string, window?: TimeWindow): Promise<Expense[]>

  /**
   * All expenses of a ledger, void ones included, oldest first
   */
  listExpenses(ledgerId: string, filter?: ExpenseFilter): Promise<Expense[]>

  getExpense(ledgerId: string, id: string): Promise<Expense | null>

  /**
   * Persist a new expense together with its weight snapshot, atomically
   * @returns The stored expense with its assigned ID
   */
  appendExpense(expense: Expense): Promise<Expense>

  /**
   * Flag an expense as void. The record itself is kept.
   * @returns The updated expense, or null if no such expense exists
   */
  markVoid(ledgerId: string, id: string, at: Date): Promise<Expense | null>
}

export function isWithinWindow(timestamp: Date, window?: TimeWindow): boolean {
  if (window?.from && timestamp < window.from) return false
  if (window?.to && timestamp > window.to) return false
  return true
}
