import { Participant, ParticipantId, nextVirtualId } from '../../core/domain/participant.js'
import { ParticipantRepository } from '../../core/ports/participant-repository.js'
import { DecimalInput } from '../../core/utils/decimal.js'

export class InMemoryParticipantRepository implements ParticipantRepository {
  private readonly ledgers = new Map<string, Map<ParticipantId, Participant>>()

  async listParticipants(ledgerId: string): Promise<Participant[]> {
    return Array.from(this.participantsOf(ledgerId).values()).sort((a, b) => a.id - b.id)
  }

  async getParticipant(ledgerId: string, id: ParticipantId): Promise<Participant | null> {
    return this.participantsOf(ledgerId).get(id) ?? null
  }

  async ensureParticipant(ledgerId: string, id: ParticipantId, name: string): Promise<Participant> {
    const participants = this.participantsOf(ledgerId)
    const existing = participants.get(id)

    if (existing) {
      if (existing.name === name.trim()) {
        return existing
      }
      const renamed = existing.withName(name)
      participants.set(id, renamed)
      return renamed
    }

    const created = new Participant({ id, ledgerId, name })
    participants.set(id, created)
    return created
  }

  async addVirtualParticipant(ledgerId: string, name: string): Promise<Participant | null> {
    const trimmed = name.trim()
    if (trimmed === '') {
      return null
    }

    const participants = this.participantsOf(ledgerId)
    const taken = Array.from(participants.values()).some(
      p => p.name.toLowerCase() === trimmed.toLowerCase()
    )
    if (taken) {
      return null
    }

    const created = new Participant({
      id: nextVirtualId(participants.keys()),
      ledgerId,
      name: trimmed
    })
    participants.set(created.id, created)
    return created
  }

  async setWeight(ledgerId: string, id: ParticipantId, weight: DecimalInput): Promise<Participant | null> {
    const participants = this.participantsOf(ledgerId)
    const existing = participants.get(id)
    if (!existing) {
      return null
    }

    const updated = existing.withWeight(weight)
    participants.set(id, updated)
    return updated
  }

  private participantsOf(ledgerId: string): Map<ParticipantId, Participant> {
    let participants = this.ledgers.get(ledgerId)
    if (!participants) {
      participants = new Map()
      this.ledgers.set(ledgerId, participants)
    }
    return participants
  }
}
