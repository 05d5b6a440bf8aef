import { Decimal, DecimalInput, sum, toDecimal } from '../utils/decimal.js'
import { InvalidExpenseError } from '../errors/invalid-expense-error.js'
import { ParticipantId } from './participant.js'

export interface ParticipantShare {
  participantId: ParticipantId
  weight: DecimalInput
}

export interface SnapshotEntry {
  readonly participantId: ParticipantId
  readonly weight: Decimal
}

export interface ShareDebit {
  participantId: ParticipantId
  amount: Decimal
}

/**
 * Participants and their weights as they were when an expense was recorded.
 * Entries are copied on construction; nothing outside can change them later.
 */
export class WeightSnapshot {
  readonly entries: readonly SnapshotEntry[]
  readonly totalWeight: Decimal

  constructor(shares: readonly ParticipantShare[]) {
    if (shares.length === 0) {
      throw new InvalidExpenseError('Expense must have at least one participant', 'participants', 0)
    }

    const seen = new Set<ParticipantId>()
    const entries: SnapshotEntry[] = []

    for (const share of shares) {
      const weight = toDecimal(share.weight)
      if (!weight.isFinite() || weight.lessThanOrEqualTo(0)) {
        throw new InvalidExpenseError(
          `Weight for participant ${share.participantId} must be positive`,
          'participants.weight',
          weight.toString()
        )
      }
      if (seen.has(share.participantId)) {
        throw new InvalidExpenseError(
          `Participant ${share.participantId} listed more than once`,
          'participants.participantId',
          share.participantId
        )
      }
      seen.add(share.participantId)
      entries.push(Object.freeze({ participantId: share.participantId, weight }))
    }

    this.entries = Object.freeze(entries)
    this.totalWeight = sum(entries.map(e => e.weight))
  }

  get participantIds(): ParticipantId[] {
    return this.entries.map(e => e.participantId)
  }

  includes(participantId: ParticipantId): boolean {
    return this.entries.some(e => e.participantId === participantId)
  }

  /**
   * Split `amount` proportionally to the weights
   */
  split(amount: Decimal): ShareDebit[] {
    return this.entries.map(entry => ({
      participantId: entry.participantId,
      amount: amount.times(entry.weight).div(this.totalWeight)
    }))
  }

  toShares(): ParticipantShare[] {
    return this.entries.map(e => ({ participantId: e.participantId, weight: e.weight }))
  }
}
