import { describe, it, expect } from 'vitest'
import { WeightSnapshot, ParticipantShare } from '../../../src/core/domain/weight-snapshot.js'
import { InvalidExpenseError } from '../../../src/core/errors/invalid-expense-error.js'
import { Decimal } from '../../../src/core/utils/decimal.js'

const captureError = (fn: () => unknown): unknown => {
  try {
    fn()
  } catch (e) {
    return e
  }
  return undefined
}

describe('WeightSnapshot', () => {
  it('should split proportionally to weights', () => {
    const snapshot = new WeightSnapshot([
      { participantId: 1, weight: 1 },
      { participantId: 2, weight: 1 },
      { participantId: 3, weight: 2 }
    ])

    const shares = snapshot.split(new Decimal(100))

    expect(snapshot.totalWeight.toString()).toBe('4')
    expect(shares.map(s => [s.participantId, s.amount.toString()])).toEqual([
      [1, '25'],
      [2, '25'],
      [3, '50']
    ])
  })

  it('should produce shares that sum to the amount', () => {
    const snapshot = new WeightSnapshot([
      { participantId: 1, weight: 1 },
      { participantId: 2, weight: 1 },
      { participantId: 3, weight: 1 }
    ])

    const total = snapshot.split(new Decimal(100))
      .reduce((acc, s) => acc.plus(s.amount), new Decimal(0))

    expect(total.minus(100).abs().lessThanOrEqualTo('1e-6')).toBe(true)
  })

  it('should reject an empty participant list', () => {
    const error = captureError(() => new WeightSnapshot([]))
    expect(error).toBeInstanceOf(InvalidExpenseError)
    expect(error).toMatchObject({ field: 'participants' })
  })

  it('should reject non-positive weights', () => {
    expect(() => new WeightSnapshot([{ participantId: 1, weight: 0 }]))
      .toThrow('Weight for participant 1 must be positive')
  })

  it('should reject duplicate participants', () => {
    expect(() => new WeightSnapshot([
      { participantId: 1, weight: 1 },
      { participantId: 1, weight: 2 }
    ])).toThrow('Participant 1 listed more than once')
  })

  it('should not change when the input list changes later', () => {
    const shares: ParticipantShare[] = [{ participantId: 1, weight: 1 }]
    const snapshot = new WeightSnapshot(shares)

    shares.push({ participantId: 2, weight: 5 })
    shares[0] = { participantId: 1, weight: 9 }

    expect(snapshot.participantIds).toEqual([1])
    expect(snapshot.entries[0].weight.toString()).toBe('1')
    expect(Object.isFrozen(snapshot.entries)).toBe(true)
  })

  it('should report membership', () => {
    const snapshot = new WeightSnapshot([{ participantId: -1, weight: '0.5' }])
    expect(snapshot.includes(-1)).toBe(true)
    expect(snapshot.includes(1)).toBe(false)
  })
})
