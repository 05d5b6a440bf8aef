import type { Pool, PoolClient } from 'pg'
import { Expense } from '../../core/domain/expense.js'
import {
  ExpenseFilter,
  ExpenseRepository,
  TimeWindow
} from '../../core/ports/expense-repository.js'
import {
  ExpenseRow,
  SnapshotRow,
  mapExpenseToParams,
  mapRowToExpense,
  mapSnapshotToParams
} from './mappers/expense-mapper.js'
import { TableConfigOptions, TableNames, createTableNames } from './table-config.js'

export interface PostgresExpenseRepositoryOptions {
  pool: Pool
  /**
   * Table configuration - use prefix or custom table names
   */
  tables?: TableConfigOptions
}

const EXPENSE_COLUMNS = `
  id, ledger_id, payer_id, original_amount, original_currency,
  amount_in_base, base_currency, fx_rate, fx_approximate,
  category, description, ts, status, voided_at
`

export class PostgresExpenseRepository implements ExpenseRepository {
  private readonly pool: Pool
  private readonly tables: TableNames

  constructor(options: PostgresExpenseRepositoryOptions) {
    this.pool = options.pool
    this.tables = createTableNames(options.tables)
  }

  async loadApprovedExpenses(ledgerId: string, window?: TimeWindow): Promise<Expense[]> {
    return this.listExpenses(ledgerId, { ...window, status: 'approved' })
  }

  async listExpenses(ledgerId: string, filter?: ExpenseFilter): Promise<Expense[]> {
    let query = `
      SELECT ${EXPENSE_COLUMNS}
      FROM ${this.tables.expenses}
      WHERE ledger_id = $1
    `
    const params: unknown[] = [ledgerId]
    let paramIndex = 2

    if (filter?.from) {
      query += ` AND ts >= $${paramIndex++}`
      params.push(filter.from)
    }

    if (filter?.to) {
      query += ` AND ts <= $${paramIndex++}`
      params.push(filter.to)
    }

    if (filter?.status) {
      query += ` AND status = $${paramIndex++}`
      params.push(filter.status)
    }

    if (filter?.payerId !== undefined) {
      query += ` AND payer_id = $${paramIndex++}`
      params.push(filter.payerId)
    }

    if (filter?.category) {
      query += ` AND category = $${paramIndex++}`
      params.push(filter.category)
    }

    query += ' ORDER BY ts, created_at'

    if (filter?.limit) {
      query += ` LIMIT $${paramIndex++}`
      params.push(filter.limit)
    }

    if (filter?.offset) {
      query += ` OFFSET $${paramIndex++}`
      params.push(filter.offset)
    }

    const result = await this.pool.query<ExpenseRow>(query, params)
    const snapshots = await this.loadSnapshots(result.rows.map(r => r.id))

    return result.rows.map(row => mapRowToExpense(row, snapshots.get(row.id) ?? []))
  }

  async getExpense(ledgerId: string, id: string): Promise<Expense | null> {
    const result = await this.pool.query<ExpenseRow>(`
      SELECT ${EXPENSE_COLUMNS}
      FROM ${this.tables.expenses}
      WHERE ledger_id = $1 AND id = $2
    `, [ledgerId, id])

    const row = result.rows[0]
    if (!row) {
      return null
    }

    const snapshots = await this.loadSnapshots([row.id])
    return mapRowToExpense(row, snapshots.get(row.id) ?? [])
  }

  async appendExpense(expense: Expense): Promise<Expense> {
    const client = await this.pool.connect()

    try {
      await client.query('BEGIN')
      await this.insertExpense(client, expense)
      await client.query('COMMIT')
      return expense
    } catch (e) {
      await client.query('ROLLBACK')
      throw e
    } finally {
      client.release()
    }
  }

  async markVoid(ledgerId: string, id: string, at: Date): Promise<Expense | null> {
    const result = await this.pool.query<ExpenseRow>(`
      UPDATE ${this.tables.expenses}
      SET status = 'void', voided_at = COALESCE(voided_at, $3)
      WHERE ledger_id = $1 AND id = $2
      RETURNING ${EXPENSE_COLUMNS}
    `, [ledgerId, id, at])

    const row = result.rows[0]
    if (!row) {
      return null
    }

    const snapshots = await this.loadSnapshots([row.id])
    return mapRowToExpense(row, snapshots.get(row.id) ?? [])
  }

  // === Private helpers ===

  private async insertExpense(client: PoolClient, expense: Expense): Promise<void> {
    const params = mapExpenseToParams(expense)

    await client.query(`
      INSERT INTO ${this.tables.expenses} (
        id, ledger_id, payer_id, original_amount, original_currency,
        amount_in_base, base_currency, fx_rate, fx_approximate,
        category, description, ts, status, voided_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
    `, [
      params.id,
      params.ledger_id,
      params.payer_id,
      params.original_amount,
      params.original_currency,
      params.amount_in_base,
      params.base_currency,
      params.fx_rate,
      params.fx_approximate,
      params.category,
      params.description,
      params.ts,
      params.status,
      params.voided_at
    ])

    for (const entry of mapSnapshotToParams(expense)) {
      await client.query(`
        INSERT INTO ${this.tables.expenseParticipants} (expense_id, participant_id, weight, position)
        VALUES ($1, $2, $3, $4)
      `, [entry.expense_id, entry.participant_id, entry.weight, entry.position])
    }
  }

  private async loadSnapshots(expenseIds: string[]): Promise<Map<string, SnapshotRow[]>> {
    const byExpense = new Map<string, SnapshotRow[]>()
    if (expenseIds.length === 0) {
      return byExpense
    }

    const result = await this.pool.query<SnapshotRow>(`
      SELECT expense_id, participant_id, weight, position
      FROM ${this.tables.expenseParticipants}
      WHERE expense_id = ANY($1)
      ORDER BY expense_id, position
    `, [expenseIds])

    for (const row of result.rows) {
      const rows = byExpense.get(row.expense_id) ?? []
      rows.push(row)
      byExpense.set(row.expense_id, rows)
    }

    return byExpense
  }
}
