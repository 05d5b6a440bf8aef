import { Participant, ParticipantId } from '../domain/participant.js'
import { DecimalInput } from '../utils/decimal.js'

export interface ParticipantRepository {
  /**
   * Participants of a ledger ordered by id
   */
  listParticipants(ledgerId: string): Promise<Participant[]>

  getParticipant(ledgerId: string, id: ParticipantId): Promise<Participant | null>

  /**
   * Register a real user, or rename them if the name changed
   */
  ensureParticipant(ledgerId: string, id: ParticipantId, name: string): Promise<Participant>

  /**
   * Add a participant without a platform account under the next negative id
   * @returns null when the name is blank or already taken (case-insensitive)
   */
  addVirtualParticipant(ledgerId: string, name: string): Promise<Participant | null>

  /**
   * Change the default weight used for future expenses
   */
  setWeight(ledgerId: string, id: ParticipantId, weight: DecimalInput): Promise<Participant | null>
}
