import { Decimal } from '../../../core/utils/decimal.js'
import { normalizeCategory } from '../../../core/domain/category.js'
import { Expense, ExpenseStatus } from '../../../core/domain/expense.js'
import { Money } from '../../../core/domain/money.js'
import { WeightSnapshot } from '../../../core/domain/weight-snapshot.js'

export interface ExpenseRow {
  id: string
  ledger_id: string
  payer_id: string
  original_amount: string
  original_currency: string
  amount_in_base: string
  base_currency: string
  fx_rate: string
  fx_approximate: boolean
  category: string
  description: string
  ts: Date
  status: string
  voided_at: Date | null
}

export interface SnapshotRow {
  expense_id: string
  participant_id: string
  weight: string
  position: number
}

/**
 * BIGINT columns arrive as strings from pg
 */
function toParticipantId(value: string): number {
  const id = Number(value)
  if (!Number.isSafeInteger(id)) {
    throw new Error(`Participant id ${value} is out of range`)
  }
  return id
}

function toStatus(value: string): ExpenseStatus {
  if (value === 'approved' || value === 'void') {
    return value
  }
  throw new Error(`Unknown expense status "${value}"`)
}

export function mapRowToExpense(row: ExpenseRow, snapshotRows: SnapshotRow[]): Expense {
  const snapshot = [...snapshotRows]
    .sort((a, b) => a.position - b.position)
    .map(s => ({ participantId: toParticipantId(s.participant_id), weight: new Decimal(s.weight) }))

  return new Expense({
    id: row.id,
    ledgerId: row.ledger_id,
    payerId: toParticipantId(row.payer_id),
    originalAmount: new Money({ amount: row.original_amount, currency: row.original_currency.trim() }),
    amountInBase: new Money({ amount: row.amount_in_base, currency: row.base_currency.trim() }),
    fxRate: new Decimal(row.fx_rate),
    fxApproximate: row.fx_approximate,
    category: normalizeCategory(row.category),
    description: row.description,
    timestamp: row.ts,
    weightSnapshot: new WeightSnapshot(snapshot),
    status: toStatus(row.status),
    voidedAt: row.voided_at ?? undefined
  })
}

export function mapExpenseToParams(expense: Expense): {
  id: string
  ledger_id: string
  payer_id: number
  original_amount: string
  original_currency: string
  amount_in_base: string
  base_currency: string
  fx_rate: string
  fx_approximate: boolean
  category: string
  description: string
  ts: Date
  status: ExpenseStatus
  voided_at: Date | null
} {
  return {
    id: expense.id,
    ledger_id: expense.ledgerId,
    payer_id: expense.payerId,
    original_amount: expense.originalAmount.amount.toFixed(),
    original_currency: expense.originalAmount.currency,
    amount_in_base: expense.amountInBase.amount.toFixed(),
    base_currency: expense.baseCurrency,
    fx_rate: expense.fxRate.toFixed(),
    fx_approximate: expense.fxApproximate,
    category: expense.category,
    description: expense.description,
    ts: expense.timestamp,
    status: expense.status,
    voided_at: expense.voidedAt ?? null
  }
}

export function mapSnapshotToParams(expense: Expense): Array<{
  expense_id: string
  participant_id: number
  weight: string
  position: number
}> {
  return expense.weightSnapshot.entries.map((entry, position) => ({
    expense_id: expense.id,
    participant_id: entry.participantId,
    weight: entry.weight.toFixed(),
    position
  }))
}
