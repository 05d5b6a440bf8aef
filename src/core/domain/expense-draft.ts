import { z } from 'zod'
import { Decimal } from '../utils/decimal.js'
import { InvalidExpenseError } from '../errors/invalid-expense-error.js'
import { normalizeCurrency } from './currency.js'

const DecimalValue = z
  .union([z.instanceof(Decimal), z.number().finite(), z.string().trim().regex(/^-?\d+(\.\d+)?$/)])
  .transform(value => new Decimal(value))

const PositiveDecimal = DecimalValue.refine(value => value.greaterThan(0), {
  message: 'must be positive'
})

const ParticipantIdValue = z
  .number()
  .int()
  .refine(id => id !== 0, { message: 'must be a non-zero integer' })

const CurrencyValue = z.string().transform((token, ctx) => {
  const currency = normalizeCurrency(token)
  if (!currency) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unrecognized currency "${token}"` })
    return z.NEVER
  }
  return currency
})

export const ExpenseDraftSchema = z.object({
  payerId: ParticipantIdValue,
  amount: PositiveDecimal,
  currency: CurrencyValue,
  participants: z
    .array(
      z.object({
        participantId: ParticipantIdValue,
        weight: PositiveDecimal.default(1)
      })
    )
    .min(1, { message: 'at least one participant is required' })
    .superRefine((participants, ctx) => {
      const seen = new Set<number>()
      for (const [index, participant] of participants.entries()) {
        if (seen.has(participant.participantId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `participant ${participant.participantId} listed more than once`,
            path: [index, 'participantId']
          })
        }
        seen.add(participant.participantId)
      }
    }),
  category: z.string().optional(),
  description: z.string().optional(),
  asOf: z.date().optional()
})

/**
 * Loosely typed draft as handed over by the approval flow
 */
export type ExpenseDraftInput = z.input<typeof ExpenseDraftSchema>

/**
 * Draft after validation: amounts are decimals and the currency is canonical
 */
export type ExpenseDraft = z.output<typeof ExpenseDraftSchema>

export function parseExpenseDraft(input: unknown): ExpenseDraft {
  const result = ExpenseDraftSchema.safeParse(input)
  if (result.success) {
    return result.data
  }

  const issue = result.error.issues[0]
  const path = issue?.path ?? []
  const field = path.length > 0 ? path.join('.') : 'draft'
  throw new InvalidExpenseError(
    `${field}: ${issue?.message ?? 'invalid expense draft'}`,
    field,
    path.length > 0 ? readPath(input, path) : undefined
  )
}

function readPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input
  for (const key of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined
    }
    current = Reflect.get(current, key)
  }
  return current
}
