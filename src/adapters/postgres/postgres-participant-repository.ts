import type { Pool } from 'pg'
import { Participant, ParticipantId } from '../../core/domain/participant.js'
import { ParticipantRepository } from '../../core/ports/participant-repository.js'
import { DecimalInput, toDecimal } from '../../core/utils/decimal.js'
import { ParticipantRow, mapRowToParticipant } from './mappers/participant-mapper.js'
import { TableConfigOptions, TableNames, createTableNames } from './table-config.js'

export interface PostgresParticipantRepositoryOptions {
  pool: Pool
  tables?: TableConfigOptions
}

export class PostgresParticipantRepository implements ParticipantRepository {
  private readonly pool: Pool
  private readonly tables: TableNames

  constructor(options: PostgresParticipantRepositoryOptions) {
    this.pool = options.pool
    this.tables = createTableNames(options.tables)
  }

  async listParticipants(ledgerId: string): Promise<Participant[]> {
    const result = await this.pool.query<ParticipantRow>(`
      SELECT ledger_id, id, name, is_virtual, weight
      FROM ${this.tables.participants}
      WHERE ledger_id = $1
      ORDER BY id
    `, [ledgerId])

    return result.rows.map(mapRowToParticipant)
  }

  async getParticipant(ledgerId: string, id: ParticipantId): Promise<Participant | null> {
    const result = await this.pool.query<ParticipantRow>(`
      SELECT ledger_id, id, name, is_virtual, weight
      FROM ${this.tables.participants}
      WHERE ledger_id = $1 AND id = $2
    `, [ledgerId, id])

    const row = result.rows[0]
    return row ? mapRowToParticipant(row) : null
  }

  async ensureParticipant(ledgerId: string, id: ParticipantId, name: string): Promise<Participant> {
    // Validates the id and name before touching the table
    const candidate = new Participant({ id, ledgerId, name })

    const result = await this.pool.query<ParticipantRow>(`
      INSERT INTO ${this.tables.participants} (ledger_id, id, name, is_virtual)
      VALUES ($1, $2, $3, $4)
      ON CONFLICT (ledger_id, id) DO UPDATE SET name = EXCLUDED.name
      RETURNING ledger_id, id, name, is_virtual, weight
    `, [ledgerId, id, candidate.name, candidate.isVirtual])

    const row = result.rows[0]
    if (!row) {
      throw new Error(`Failed to store participant ${id} in ledger ${ledgerId}`)
    }
    return mapRowToParticipant(row)
  }

  async addVirtualParticipant(ledgerId: string, name: string): Promise<Participant | null> {
    const trimmed = name.trim()
    if (trimmed === '') {
      return null
    }

    const client = await this.pool.connect()

    try {
      await client.query('BEGIN')
      // Serializes virtual id allocation per ledger
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [ledgerId])

      const taken = await client.query(`
        SELECT 1 FROM ${this.tables.participants}
        WHERE ledger_id = $1 AND LOWER(name) = LOWER($2)
      `, [ledgerId, trimmed])
      if (taken.rows.length > 0) {
        await client.query('ROLLBACK')
        return null
      }

      const lowest = await client.query<{ lowest: string }>(`
        SELECT LEAST(COALESCE(MIN(id), 0), 0) AS lowest
        FROM ${this.tables.participants}
        WHERE ledger_id = $1
      `, [ledgerId])
      const id = Number(lowest.rows[0]?.lowest ?? 0) - 1

      const result = await client.query<ParticipantRow>(`
        INSERT INTO ${this.tables.participants} (ledger_id, id, name, is_virtual)
        VALUES ($1, $2, $3, TRUE)
        RETURNING ledger_id, id, name, is_virtual, weight
      `, [ledgerId, id, trimmed])

      await client.query('COMMIT')

      const row = result.rows[0]
      return row ? mapRowToParticipant(row) : null
    } catch (e) {
      await client.query('ROLLBACK')
      throw e
    } finally {
      client.release()
    }
  }

  async setWeight(ledgerId: string, id: ParticipantId, weight: DecimalInput): Promise<Participant | null> {
    const value = toDecimal(weight)
    if (!value.isFinite() || value.lessThanOrEqualTo(0)) {
      throw new Error(`Participant weight must be positive, got ${value.toString()}`)
    }

    const result = await this.pool.query<ParticipantRow>(`
      UPDATE ${this.tables.participants}
      SET weight = $3
      WHERE ledger_id = $1 AND id = $2
      RETURNING ledger_id, id, name, is_virtual, weight
    `, [ledgerId, id, value.toFixed()])

    const row = result.rows[0]
    return row ? mapRowToParticipant(row) : null
  }
}
