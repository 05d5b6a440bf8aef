import { z } from 'zod'
import { Decimal } from '../utils/decimal.js'
import { CATEGORIES } from './category.js'
import { Expense } from './expense.js'
import { Money } from './money.js'
import { WeightSnapshot } from './weight-snapshot.js'

const DecimalString = z.string().regex(/^-?\d+(\.\d+)?(e[+-]?\d+)?$/i)
const CurrencyCode = z.string().regex(/^[A-Z]{3}$/)

/**
 * Durable shape of an expense as exported or archived.
 * Decimals travel as strings so that no precision is lost.
 */
export const ExpenseRecordSchema = z.object({
  id: z.string().min(1),
  ledgerId: z.string().min(1),
  payerId: z.number().int(),
  originalAmount: DecimalString,
  originalCurrency: CurrencyCode,
  amountInBase: DecimalString,
  baseCurrency: CurrencyCode,
  fxRate: DecimalString,
  fxApproximate: z.boolean(),
  category: z.enum(CATEGORIES),
  description: z.string(),
  timestamp: z.string().datetime(),
  status: z.enum(['approved', 'void']),
  voidedAt: z.string().datetime().nullable(),
  weightSnapshot: z
    .array(z.object({ participantId: z.number().int(), weight: DecimalString }))
    .min(1)
})

export type ExpenseRecord = z.infer<typeof ExpenseRecordSchema>

export function toExpenseRecord(expense: Expense): ExpenseRecord {
  return {
    id: expense.id,
    ledgerId: expense.ledgerId,
    payerId: expense.payerId,
    originalAmount: expense.originalAmount.amount.toString(),
    originalCurrency: expense.originalAmount.currency,
    amountInBase: expense.amountInBase.amount.toString(),
    baseCurrency: expense.baseCurrency,
    fxRate: expense.fxRate.toString(),
    fxApproximate: expense.fxApproximate,
    category: expense.category,
    description: expense.description,
    timestamp: expense.timestamp.toISOString(),
    status: expense.status,
    voidedAt: expense.voidedAt?.toISOString() ?? null,
    weightSnapshot: expense.weightSnapshot.entries.map(entry => ({
      participantId: entry.participantId,
      weight: entry.weight.toString()
    }))
  }
}

/**
 * Rebuild an expense from an untrusted record.
 * Throws ZodError on a malformed shape and InvalidExpenseError on broken invariants.
 */
export function parseExpenseRecord(input: unknown): Expense {
  const record = ExpenseRecordSchema.parse(input)

  return new Expense({
    id: record.id,
    ledgerId: record.ledgerId,
    payerId: record.payerId,
    originalAmount: new Money({ amount: record.originalAmount, currency: record.originalCurrency }),
    amountInBase: new Money({ amount: record.amountInBase, currency: record.baseCurrency }),
    fxRate: new Decimal(record.fxRate),
    fxApproximate: record.fxApproximate,
    category: record.category,
    description: record.description,
    timestamp: new Date(record.timestamp),
    weightSnapshot: new WeightSnapshot(record.weightSnapshot),
    status: record.status,
    voidedAt: record.voidedAt === null ? undefined : new Date(record.voidedAt)
  })
}
