import { Decimal } from '../utils/decimal.js'
import { Logger, silentLogger } from '../utils/logger.js'
import { Currency } from '../domain/currency.js'
import { normalizeCategory } from '../domain/category.js'
import { Expense } from '../domain/expense.js'
import { ExpenseDraft, ExpenseDraftInput, parseExpenseDraft } from '../domain/expense-draft.js'
import { ExpenseRecord, toExpenseRecord } from '../domain/expense-record.js'
import { ExchangeRate } from '../domain/exchange-rate.js'
import { Money } from '../domain/money.js'
import { DEFAULT_WEIGHT, ParticipantId } from '../domain/participant.js'
import { ParticipantShare, WeightSnapshot } from '../domain/weight-snapshot.js'
import { BaseCurrencyMismatchError } from '../errors/base-currency-error.js'
import { ExpenseNotFoundError } from '../errors/expense-not-found-error.js'
import { RateUnavailableError } from '../errors/rate-errors.js'
import { ExpenseFilter, ExpenseRepository, TimeWindow } from '../ports/expense-repository.js'
import { ParticipantRepository } from '../ports/participant-repository.js'
import { BalanceCalculator, Balances } from './balance-calculator.js'
import { CategoryTotal, calculateCategoryTotals } from './category-totals.js'
import { RateResolver } from './rate-resolver.js'
import { SettlementTransfer, planSettlement } from './settlement-planner.js'

export interface ExpenseLedgerOptions {
  ledgerId: string
  baseCurrency: Currency
  expenseRepository: ExpenseRepository
  rateResolver: RateResolver
  participantRepository?: ParticipantRepository
  logger?: Logger
  now?: () => Date
}

export type AddExpenseResult =
  | { status: 'created'; expense: Expense }
  | {
      /**
       * No rate could be found; the validated draft can be submitted again later
       */
      status: 'awaiting-rate'
      draft: ExpenseDraft
      from: Currency
      to: Currency
    }

export interface BalanceQueryOptions {
  window?: TimeWindow
  /**
   * Report every known participant, zero balances included
   */
  includeInactive?: boolean
}

type Resolution =
  | { status: 'resolved'; draft: ExpenseDraft; asOf: Date; rate: ExchangeRate }
  | { status: 'awaiting-rate'; draft: ExpenseDraft; from: Currency; to: Currency }

/**
 * Append-only expense ledger of one group.
 * Mutations run one at a time in submission order.
 *
 * The base currency is fixed by the first stored expense: once the ledger
 * holds expenses, new expenses and balance queries refuse any other base.
 */
export class ExpenseLedger {
  readonly ledgerId: string
  readonly baseCurrency: Currency
  private readonly expenseRepo: ExpenseRepository
  private readonly participantRepo?: ParticipantRepository
  private readonly resolver: RateResolver
  private readonly calculator: BalanceCalculator
  private readonly logger: Logger
  private readonly now: () => Date
  private queue: Promise<unknown> = Promise.resolve()

  constructor(options: ExpenseLedgerOptions) {
    this.ledgerId = options.ledgerId
    this.baseCurrency = options.baseCurrency
    this.expenseRepo = options.expenseRepository
    this.participantRepo = options.participantRepository
    this.resolver = options.rateResolver
    this.calculator = new BalanceCalculator()
    this.now = options.now ?? (() => new Date())
    this.logger = (options.logger ?? silentLogger()).child({
      component: 'expense-ledger',
      ledgerId: options.ledgerId
    })
  }

  // === Mutations ===

  /**
   * @throws {InvalidExpenseError} when the draft is malformed; nothing is stored
   * @throws {BaseCurrencyMismatchError} when stored expenses use another base
   */
  async addExpense(input: ExpenseDraftInput): Promise<AddExpenseResult> {
    const draft = parseExpenseDraft(input)

    return this.serialize(async () => {
      await this.assertStoredBase()
      const resolution = await this.resolveRate(draft)
      if (resolution.status === 'awaiting-rate') {
        return resolution
      }
      const expense = await this.append(resolution.draft, resolution.asOf, resolution.rate)
      return { status: 'created', expense }
    })
  }

  /**
   * @throws {ExpenseNotFoundError} for an unknown id
   */
  async voidExpense(id: string): Promise<Expense> {
    return this.serialize(() => this.markVoid(id))
  }

  /**
   * Edit an expense by voiding it and recording the corrected draft.
   * The original stays untouched when no rate is available for the new draft.
   */
  async replaceExpense(id: string, input: ExpenseDraftInput): Promise<AddExpenseResult> {
    const draft = parseExpenseDraft(input)

    return this.serialize(async () => {
      const existing = await this.expenseRepo.getExpense(this.ledgerId, id)
      if (!existing) {
        throw new ExpenseNotFoundError(this.ledgerId, id)
      }
      this.assertSameBase(existing)

      const resolution = await this.resolveRate(draft)
      if (resolution.status === 'awaiting-rate') {
        return resolution
      }

      await this.markVoid(id)
      const expense = await this.append(resolution.draft, resolution.asOf, resolution.rate)
      this.logger.info({ replacedId: id, expenseId: expense.id }, 'expense replaced')
      return { status: 'created', expense }
    })
  }

  /**
   * Copy the participants' current weights into a share list for a new draft.
   * Unknown participants get the default weight.
   */
  async snapshotWeights(participantIds: readonly ParticipantId[]): Promise<ParticipantShare[]> {
    const known = this.participantRepo
      ? await this.participantRepo.listParticipants(this.ledgerId)
      : []
    const weights = new Map(known.map(p => [p.id, p.weight]))

    return participantIds.map(participantId => ({
      participantId,
      weight: new Decimal(weights.get(participantId) ?? DEFAULT_WEIGHT)
    }))
  }

  // === Queries ===

  async getExpense(id: string): Promise<Expense | null> {
    return this.expenseRepo.getExpense(this.ledgerId, id)
  }

  async listExpenses(filter?: ExpenseFilter): Promise<Expense[]> {
    return this.expenseRepo.listExpenses(this.ledgerId, filter)
  }

  async getBalances(options: BalanceQueryOptions = {}): Promise<Balances> {
    const expenses = await this.expenseRepo.loadApprovedExpenses(this.ledgerId, options.window)
    expenses.forEach(expense => this.assertSameBase(expense))
    const includeParticipants = options.includeInactive && this.participantRepo
      ? (await this.participantRepo.listParticipants(this.ledgerId)).map(p => p.id)
      : []

    const balances = this.calculator.computeBalances(expenses, {
      window: options.window,
      includeParticipants,
      baseCurrency: this.baseCurrency
    })
    this.calculator.assertBalanced(balances)
    return balances
  }

  async planSettlement(options: BalanceQueryOptions = {}): Promise<SettlementTransfer[]> {
    return planSettlement(await this.getBalances(options))
  }

  async getCategoryTotals(window?: TimeWindow): Promise<CategoryTotal[]> {
    const expenses = await this.expenseRepo.loadApprovedExpenses(this.ledgerId, window)
    expenses.forEach(expense => this.assertSameBase(expense))
    return calculateCategoryTotals(expenses, window)
  }

  /**
   * Every expense, void ones included, in the durable record shape
   */
  async exportRecords(): Promise<ExpenseRecord[]> {
    const expenses = await this.expenseRepo.listExpenses(this.ledgerId)
    return expenses.map(toExpenseRecord)
  }

  /**
   * Check that the stored expenses use this ledger's base currency.
   * The runtime calls this when it opens a ledger over existing storage.
   *
   * @throws {BaseCurrencyMismatchError}
   */
  async assertStoredBase(): Promise<void> {
    const [first] = await this.expenseRepo.listExpenses(this.ledgerId, { limit: 1 })
    if (first) {
      this.assertSameBase(first)
    }
  }

  // === Internals ===

  private assertSameBase(expense: Expense): void {
    if (expense.baseCurrency !== this.baseCurrency) {
      throw new BaseCurrencyMismatchError(this.baseCurrency, expense.baseCurrency, this.ledgerId)
    }
  }

  private async resolveRate(draft: ExpenseDraft): Promise<Resolution> {
    const asOf = draft.asOf ?? this.now()
    const pinned: ExpenseDraft = { ...draft, asOf }

    try {
      const rate = await this.resolver.resolve(draft.currency, this.baseCurrency, asOf)
      return { status: 'resolved', draft: pinned, asOf, rate }
    } catch (e) {
      if (e instanceof RateUnavailableError) {
        this.logger.warn({ from: e.from, to: e.to }, 'expense awaiting exchange rate')
        return { status: 'awaiting-rate', draft: pinned, from: e.from, to: e.to }
      }
      throw e
    }
  }

  private async append(draft: ExpenseDraft, asOf: Date, rate: ExchangeRate): Promise<Expense> {
    const originalAmount = new Money({ amount: draft.amount, currency: draft.currency })

    const expense = new Expense({
      ledgerId: this.ledgerId,
      payerId: draft.payerId,
      originalAmount,
      amountInBase: originalAmount.convert(rate.rate, this.baseCurrency),
      fxRate: rate.rate,
      fxApproximate: rate.approximate,
      category: normalizeCategory(draft.category),
      description: draft.description?.trim(),
      timestamp: asOf,
      weightSnapshot: new WeightSnapshot(draft.participants)
    })

    const saved = await this.expenseRepo.appendExpense(expense)
    this.logger.info(
      {
        expenseId: saved.id,
        amount: saved.amountInBase.amount.toString(),
        currency: draft.currency,
        fxApproximate: saved.fxApproximate
      },
      'expense recorded'
    )
    return saved
  }

  private async markVoid(id: string): Promise<Expense> {
    const existing = await this.expenseRepo.getExpense(this.ledgerId, id)
    if (!existing) {
      throw new ExpenseNotFoundError(this.ledgerId, id)
    }
    if (existing.isVoid) {
      return existing
    }

    const voided = await this.expenseRepo.markVoid(this.ledgerId, id, this.now())
    if (!voided) {
      throw new ExpenseNotFoundError(this.ledgerId, id)
    }
    this.logger.info({ expenseId: id }, 'expense voided')
    return voided
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task)
    // The caller sees the failure through `run`; the queue itself keeps going
    this.queue = run.catch(() => undefined)
    return run
  }
}
