export class InvalidExpenseError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value?: unknown
  ) {
    super(message)
    this.name = 'InvalidExpenseError'
  }
}
