import { randomUUID } from 'node:crypto'
import { Decimal, DecimalInput, EPSILON, toDecimal } from '../utils/decimal.js'
import { InvalidExpenseError } from '../errors/invalid-expense-error.js'
import { Category } from './category.js'
import { Currency } from './currency.js'
import { Money } from './money.js'
import { ParticipantId } from './participant.js'
import { ShareDebit, WeightSnapshot } from './weight-snapshot.js'

export type ExpenseStatus = 'approved' | 'void'

export interface ExpenseProps {
  id?: string
  ledgerId: string
  payerId: ParticipantId
  originalAmount: Money
  amountInBase: Money
  fxRate: DecimalInput
  fxApproximate: boolean
  category: Category
  description?: string
  timestamp: Date
  weightSnapshot: WeightSnapshot
  status?: ExpenseStatus
  voidedAt?: Date
  skipValidation?: boolean
}

export class Expense {
  readonly id: string
  readonly ledgerId: string
  readonly payerId: ParticipantId
  readonly originalAmount: Money
  readonly amountInBase: Money
  readonly fxRate: Decimal
  readonly fxApproximate: boolean
  readonly category: Category
  readonly description: string
  readonly timestamp: Date
  readonly weightSnapshot: WeightSnapshot
  readonly status: ExpenseStatus
  readonly voidedAt?: Date

  constructor(props: ExpenseProps) {
    this.id = props.id ?? randomUUID()
    this.ledgerId = props.ledgerId
    this.payerId = props.payerId
    this.originalAmount = props.originalAmount
    this.amountInBase = props.amountInBase
    this.fxRate = toDecimal(props.fxRate)
    this.fxApproximate = props.fxApproximate
    this.category = props.category
    this.description = props.description ?? ''
    this.timestamp = props.timestamp
    this.weightSnapshot = props.weightSnapshot
    this.status = props.status ?? 'approved'
    this.voidedAt = props.voidedAt

    if (!props.skipValidation) {
      this.validate()
    }
  }

  private validate(): void {
    if (!Number.isInteger(this.payerId) || this.payerId === 0) {
      throw new InvalidExpenseError('Payer must be a participant id', 'payerId', this.payerId)
    }

    if (!this.originalAmount.isPositive()) {
      throw new InvalidExpenseError(
        'Expense amount must be positive',
        'amount',
        this.originalAmount.amount.toString()
      )
    }

    if (!this.fxRate.isFinite() || this.fxRate.lessThanOrEqualTo(0)) {
      throw new InvalidExpenseError('Exchange rate must be positive', 'fxRate', this.fxRate.toString())
    }

    if (this.originalAmount.currency === this.baseCurrency) {
      if (!this.fxRate.equals(1) || this.fxApproximate) {
        throw new InvalidExpenseError(
          'Same-currency expense must use an exact rate of 1',
          'fxRate',
          this.fxRate.toString()
        )
      }
    }

    const expected = this.originalAmount.amount.times(this.fxRate)
    if (expected.minus(this.amountInBase.amount).abs().greaterThan(EPSILON)) {
      throw new InvalidExpenseError(
        `Base amount ${this.amountInBase.amount.toString()} does not match ${expected.toString()}`,
        'amountInBase',
        this.amountInBase.amount.toString()
      )
    }
  }

  get baseCurrency(): Currency {
    return this.amountInBase.currency
  }

  get isApproved(): boolean {
    return this.status === 'approved'
  }

  get isVoid(): boolean {
    return this.status === 'void'
  }

  /**
   * What each snapshot participant owes for this expense, in base currency
   */
  shares(): ShareDebit[] {
    return this.weightSnapshot.split(this.amountInBase.amount)
  }

  voided(at: Date): Expense {
    if (this.isVoid) {
      return this
    }
    return this.copy({ status: 'void', voidedAt: at })
  }

  withId(id: string): Expense {
    return this.copy({ id })
  }

  equals(other: Expense): boolean {
    return this.id === other.id
  }

  toString(): string {
    const dateStr = this.timestamp.toISOString().split('T')[0]
    const converted = this.originalAmount.currency === this.baseCurrency
      ? ''
      : ` (${this.originalAmount.toString()} @ ${this.fxRate.toString()}${this.fxApproximate ? '~' : ''})`
    return `${dateStr} #${this.id} ${this.payerId} paid ${this.amountInBase.toString()}${converted} [${this.category}]`
  }

  private copy(overrides: Partial<Pick<ExpenseProps, 'id' | 'status' | 'voidedAt'>>): Expense {
    return new Expense({
      id: overrides.id ?? this.id,
      ledgerId: this.ledgerId,
      payerId: this.payerId,
      originalAmount: this.originalAmount,
      amountInBase: this.amountInBase,
      fxRate: this.fxRate,
      fxApproximate: this.fxApproximate,
      category: this.category,
      description: this.description,
      timestamp: this.timestamp,
      weightSnapshot: this.weightSnapshot,
      status: overrides.status ?? this.status,
      voidedAt: overrides.voidedAt ?? this.voidedAt,
      skipValidation: true
    })
  }
}
