export class ExpenseNotFoundError extends Error {
  constructor(
    public readonly ledgerId: string,
    public readonly expenseId: string
  ) {
    super(`Expense ${expenseId} not found in ledger ${ledgerId}`)
    this.name = 'ExpenseNotFoundError'
  }
}
