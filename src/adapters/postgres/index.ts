import type { Pool, PoolClient } from 'pg'
import { PostgresExpenseRepository } from './postgres-expense-repository.js'
import { PostgresParticipantRepository } from './postgres-participant-repository.js'
import { TableConfigOptions, TableNames, createTableNames, generateSchema } from './table-config.js'

export { PostgresExpenseRepository, type PostgresExpenseRepositoryOptions } from './postgres-expense-repository.js'
export { PostgresParticipantRepository, type PostgresParticipantRepositoryOptions } from './postgres-participant-repository.js'
export { createTableNames, generateSchema, type TableNames, type TableConfigOptions } from './table-config.js'
export * from './mappers/expense-mapper.js'
export * from './mappers/participant-mapper.js'

export interface CreatePostgresRepositoriesOptions {
  pool: Pool
  tables?: TableConfigOptions
}

export interface PostgresRepositories {
  expenses: PostgresExpenseRepository
  participants: PostgresParticipantRepository
}

export function createPostgresRepositories(options: CreatePostgresRepositoriesOptions): PostgresRepositories {
  return {
    expenses: new PostgresExpenseRepository(options),
    participants: new PostgresParticipantRepository(options)
  }
}

export async function runMigrations(pool: Pool, tableOptions?: TableConfigOptions): Promise<void> {
  const tables = createTableNames(tableOptions)
  const client = await pool.connect()

  try {
    // Check current migration version
    await client.query(`
      CREATE TABLE IF NOT EXISTS ${tables.schemaMigrations} (
        version INTEGER PRIMARY KEY,
        applied_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
      )
    `)

    const result = await client.query<{ version: number }>(`
      SELECT COALESCE(MAX(version), 0) as version FROM ${tables.schemaMigrations}
    `)

    const currentVersion = result.rows[0]?.version ?? 0

    if (currentVersion < 1) {
      await runMigration001(client, tables)
    }
  } finally {
    client.release()
  }
}

async function runMigration001(client: PoolClient, tables: TableNames): Promise<void> {
  await client.query('BEGIN')
  try {
    await client.query(generateSchema(tables))
    await client.query(`
      INSERT INTO ${tables.schemaMigrations} (version) VALUES (1) ON CONFLICT DO NOTHING
    `)
    await client.query('COMMIT')
  } catch (e) {
    await client.query('ROLLBACK')
    throw e
  }
}
