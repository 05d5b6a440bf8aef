import { describe, it, expect, afterEach } from 'vitest'
import { loadConfig } from '../../src/config.js'
import { Runtime, createRuntime } from '../../src/runtime.js'
import { InMemoryExpenseRepository } from '../../src/adapters/memory/in-memory-expense-repository.js'
import { silentLogger } from '../../src/core/utils/logger.js'
import { BaseCurrencyMismatchError } from '../../src/core/errors/base-currency-error.js'
import { ExpenseBuilder } from '../../src/testing/builders/expense-builder.js'
import { FakeRateSource } from '../../src/testing/fake-rate-source.js'

describe('createRuntime', () => {
  let runtime: Runtime | undefined

  afterEach(async () => {
    await runtime?.close()
    runtime = undefined
  })

  const start = (env: Record<string, string> = {}, source = new FakeRateSource()) => {
    runtime = createRuntime(loadConfig({ NODE_ENV: 'test', ...env }), {
      logger: silentLogger(),
      rateSource: source,
      now: () => new Date('2024-06-01T12:00:00Z')
    })
    return runtime
  }

  it('should use in-memory storage without a database url', async () => {
    const rt = start()

    expect(rt.expenses).toBeInstanceOf(InMemoryExpenseRepository)
    await expect(rt.migrate()).resolves.toBeUndefined()
  })

  it('should hand out one ledger per id', () => {
    const rt = start({ BASE_CURRENCY: 'ILS' })

    const ledger = rt.ledger('trip')

    expect(rt.ledger('trip')).toBe(ledger)
    expect(ledger.baseCurrency).toBe('ILS')
    expect(rt.ledger('flat', 'EUR').baseCurrency).toBe('EUR')
  })

  it('should refuse a second base currency for the same ledger', () => {
    const rt = start()
    rt.ledger('trip', 'USD')

    expect(() => rt.ledger('trip', 'EUR')).toThrow('Ledger trip already uses USD, not EUR')
  })

  it('should refuse to open a ledger whose stored expenses use another base', async () => {
    const rt = start()
    await rt.expenses.appendExpense(
      new ExpenseBuilder().inLedger('trip').withAmount(100, 'ILS').inBase('ILS', 1).build()
    )

    await expect(rt.openLedger('trip', 'EUR')).rejects.toThrow(BaseCurrencyMismatchError)
    await expect(rt.openLedger('trip')).rejects.toThrow('Ledger trip holds expenses in ILS, not USD')

    const opened = await rt.openLedger('trip', 'ILS')
    expect(opened.baseCurrency).toBe('ILS')
    expect(rt.ledger('trip')).toBe(opened)
  })

  it('should wire the rate source into the ledgers', async () => {
    const source = new FakeRateSource({ 'EUR->USD': '1.1' })
    const rt = start({}, source)

    const result = await rt.ledger('trip').addExpense({
      payerId: 1,
      amount: 10,
      currency: 'EUR',
      participants: [{ participantId: 1 }, { participantId: 2 }]
    })

    expect(result.status).toBe('created')
    if (result.status !== 'created') return
    expect(result.expense.amountInBase.toString()).toBe('11 USD')
    expect(source.callsFor('EUR', 'USD')).toBe(1)
  })
})
