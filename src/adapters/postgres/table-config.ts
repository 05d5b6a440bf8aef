export interface TableNames {
  participants: string
  expenses: string
  expenseParticipants: string
  schemaMigrations: string
}

export interface TableConfigOptions {
  /**
   * Prefix for all table names (e.g., 'split_' -> 'split_expenses')
   */
  prefix?: string

  /**
   * Custom table names (overrides prefix for specific tables)
   */
  tables?: Partial<TableNames>
}

const DEFAULT_TABLES: TableNames = {
  participants: 'participants',
  expenses: 'expenses',
  expenseParticipants: 'expense_participants',
  schemaMigrations: 'schema_migrations'
}

export function createTableNames(options: TableConfigOptions = {}): TableNames {
  const prefix = options.prefix ?? ''

  const names: TableNames = {
    participants: options.tables?.participants ?? `${prefix}${DEFAULT_TABLES.participants}`,
    expenses: options.tables?.expenses ?? `${prefix}${DEFAULT_TABLES.expenses}`,
    expenseParticipants: options.tables?.expenseParticipants ?? `${prefix}${DEFAULT_TABLES.expenseParticipants}`,
    schemaMigrations: options.tables?.schemaMigrations ?? `${prefix}${DEFAULT_TABLES.schemaMigrations}`
  }

  for (const name of Object.values(names)) {
    if (!/^[a-z_][a-z0-9_]*$/i.test(name)) {
      throw new Error(`Invalid table name "${name}"`)
    }
  }

  return names
}

/**
 * SQL schema for the expense tables.
 * Use this to integrate into your own migration system.
 *
 * Amounts, rates and weights are unconstrained NUMERIC so that stored
 * values round-trip exactly.
 */
export function generateSchema(tables: TableNames): string {
  return `
CREATE TABLE IF NOT EXISTS ${tables.participants} (
    ledger_id VARCHAR(255) NOT NULL,
    id BIGINT NOT NULL CHECK (id <> 0),
    name VARCHAR(255) NOT NULL,
    is_virtual BOOLEAN NOT NULL DEFAULT FALSE,
    weight NUMERIC NOT NULL DEFAULT 1 CHECK (weight > 0),
    created_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (ledger_id, id)
);

CREATE TABLE IF NOT EXISTS ${tables.expenses} (
    id UUID PRIMARY KEY,
    ledger_id VARCHAR(255) NOT NULL,
    payer_id BIGINT NOT NULL,
    original_amount NUMERIC NOT NULL CHECK (original_amount > 0),
    original_currency CHAR(3) NOT NULL,
    amount_in_base NUMERIC NOT NULL CHECK (amount_in_base > 0),
    base_currency CHAR(3) NOT NULL,
    fx_rate NUMERIC NOT NULL CHECK (fx_rate > 0),
    fx_approximate BOOLEAN NOT NULL DEFAULT FALSE,
    category VARCHAR(32) NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    ts TIMESTAMP WITH TIME ZONE NOT NULL,
    status VARCHAR(16) NOT NULL CHECK (status IN ('approved', 'void')),
    voided_at TIMESTAMP WITH TIME ZONE,
    created_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_${tables.expenses}_ledger_ts ON ${tables.expenses}(ledger_id, ts);

CREATE TABLE IF NOT EXISTS ${tables.expenseParticipants} (
    expense_id UUID NOT NULL REFERENCES ${tables.expenses}(id) ON DELETE CASCADE,
    participant_id BIGINT NOT NULL,
    weight NUMERIC NOT NULL CHECK (weight > 0),
    position INTEGER NOT NULL,
    PRIMARY KEY (expense_id, participant_id)
);
`.trim()
}
