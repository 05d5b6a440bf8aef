import { describe, it, expect } from 'vitest'
import { parseExpenseDraft } from '../../../src/core/domain/expense-draft.js'
import { InvalidExpenseError } from '../../../src/core/errors/invalid-expense-error.js'

const captureError = (fn: () => unknown): unknown => {
  try {
    fn()
  } catch (e) {
    return e
  }
  return undefined
}

describe('parseExpenseDraft', () => {
  const validDraft = {
    payerId: 1,
    amount: '12.50',
    currency: 'nis',
    participants: [{ participantId: 1 }, { participantId: 2, weight: 2 }]
  }

  it('should parse a valid draft into decimals and canonical codes', () => {
    const draft = parseExpenseDraft(validDraft)

    expect(draft.amount.toString()).toBe('12.5')
    expect(draft.currency).toBe('ILS')
    expect(draft.participants.map(p => [p.participantId, p.weight.toString()])).toEqual([
      [1, '1'],
      [2, '2']
    ])
  })

  it('should reject a non-positive amount', () => {
    const error = captureError(() => parseExpenseDraft({ ...validDraft, amount: -5 }))

    expect(error).toBeInstanceOf(InvalidExpenseError)
    expect(error).toMatchObject({ field: 'amount', value: -5, message: 'amount: must be positive' })
  })

  it('should reject a non-numeric amount', () => {
    const error = captureError(() => parseExpenseDraft({ ...validDraft, amount: 'abc' }))
    expect(error).toMatchObject({ field: 'amount', value: 'abc' })
  })

  it('should reject an unknown currency', () => {
    const error = captureError(() => parseExpenseDraft({ ...validDraft, currency: 'doubloons' }))
    expect(error).toMatchObject({
      field: 'currency',
      message: 'currency: unrecognized currency "doubloons"'
    })
  })

  it('should require at least one participant', () => {
    const error = captureError(() => parseExpenseDraft({ ...validDraft, participants: [] }))
    expect(error).toMatchObject({
      field: 'participants',
      message: 'participants: at least one participant is required'
    })
  })

  it('should reject duplicate participants', () => {
    const error = captureError(() => parseExpenseDraft({
      ...validDraft,
      participants: [{ participantId: 1 }, { participantId: 1 }]
    }))
    expect(error).toMatchObject({ field: 'participants.1.participantId', value: 1 })
  })

  it('should reject a zero payer id', () => {
    const error = captureError(() => parseExpenseDraft({ ...validDraft, payerId: 0 }))
    expect(error).toMatchObject({ field: 'payerId', value: 0 })
  })

  it('should reject input that is not an object', () => {
    const error = captureError(() => parseExpenseDraft('twelve shekels'))
    expect(error).toMatchObject({ field: 'draft' })
  })
})
