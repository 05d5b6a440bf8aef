import { Decimal, DecimalInput, toDecimal } from '../utils/decimal.js'

/**
 * Real users carry their positive platform id; virtual participants
 * are allocated from the negative range (-1, -2, ...) per ledger.
 */
export type ParticipantId = number

export interface ParticipantProps {
  id: ParticipantId
  ledgerId: string
  name: string
  weight?: DecimalInput
}

export const DEFAULT_WEIGHT = new Decimal(1)

export class Participant {
  readonly id: ParticipantId
  readonly ledgerId: string
  readonly name: string
  readonly weight: Decimal

  constructor(props: ParticipantProps) {
    if (!Number.isInteger(props.id) || props.id === 0) {
      throw new Error(`Participant id must be a non-zero integer, got ${props.id}`)
    }
    if (!props.name || props.name.trim() === '') {
      throw new Error('Participant name cannot be empty')
    }

    this.id = props.id
    this.ledgerId = props.ledgerId
    this.name = props.name.trim()
    this.weight = props.weight === undefined ? DEFAULT_WEIGHT : toDecimal(props.weight)

    if (!this.weight.isFinite() || this.weight.lessThanOrEqualTo(0)) {
      throw new Error(`Participant weight must be positive, got ${this.weight.toString()}`)
    }
  }

  get isVirtual(): boolean {
    return isVirtualId(this.id)
  }

  withName(name: string): Participant {
    return new Participant({ id: this.id, ledgerId: this.ledgerId, name, weight: this.weight })
  }

  withWeight(weight: DecimalInput): Participant {
    return new Participant({ id: this.id, ledgerId: this.ledgerId, name: this.name, weight })
  }

  equals(other: Participant): boolean {
    return this.ledgerId === other.ledgerId && this.id === other.id
  }

  toString(): string {
    return this.name
  }
}

export function isVirtualId(id: ParticipantId): boolean {
  return id < 0
}

/**
 * Next free virtual id given the ids already in use
 */
export function nextVirtualId(existing: Iterable<ParticipantId>): ParticipantId {
  let lowest = 0
  for (const id of existing) {
    if (id < lowest) {
      lowest = id
    }
  }
  return lowest - 1
}
