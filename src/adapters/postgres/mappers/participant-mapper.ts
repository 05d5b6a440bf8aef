import { Participant } from '../../../core/domain/participant.js'

export interface ParticipantRow {
  ledger_id: string
  id: string
  name: string
  is_virtual: boolean
  weight: string
}

export function mapRowToParticipant(row: ParticipantRow): Participant {
  return new Participant({
    id: Number(row.id),
    ledgerId: row.ledger_id,
    name: row.name,
    weight: row.weight
  })
}
