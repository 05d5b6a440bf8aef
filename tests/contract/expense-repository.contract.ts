import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ExpenseRepository } from '../../src/core/ports/expense-repository.js'
import { ExpenseBuilder } from '../../src/testing/builders/expense-builder.js'

export function createExpenseRepositoryContractTests(
  name: string,
  getRepository: () => Promise<ExpenseRepository>,
  cleanup?: () => Promise<void>
) {
  describe(`ExpenseRepository Contract: ${name}`, () => {
    let repo: ExpenseRepository

    beforeEach(async () => {
      repo = await getRepository()
    })

    if (cleanup) {
      afterEach(async () => {
        await cleanup()
      })
    }

    describe('appendExpense', () => {
      it('should store an expense with its snapshot', async () => {
        const expense = new ExpenseBuilder()
          .inLedger('contract')
          .paidBy(1)
          .withAmount('12.34')
          .withShare(1, 1)
          .withShare(-1, '2.5')
          .build()

        const saved = await repo.appendExpense(expense)
        const loaded = await repo.getExpense('contract', saved.id)

        expect(loaded?.amountInBase.amount.toString()).toBe('12.34')
        expect(loaded?.weightSnapshot.toShares().map(s => [s.participantId, s.weight.toString()])).toEqual([
          [1, '1'],
          [-1, '2.5']
        ])
      })

      it('should reject a duplicate id', async () => {
        const expense = new ExpenseBuilder().inLedger('contract').withId('e5a1c3b2-0000-4000-8000-000000000001').build()
        await repo.appendExpense(expense)

        await expect(repo.appendExpense(expense)).rejects.toThrow()
      })
    })

    describe('listExpenses', () => {
      it('should list oldest first', async () => {
        await repo.appendExpense(new ExpenseBuilder().inLedger('contract').withDescription('later').at('2024-02-01T00:00:00Z').build())
        await repo.appendExpense(new ExpenseBuilder().inLedger('contract').withDescription('earlier').at('2024-01-01T00:00:00Z').build())

        const expenses = await repo.listExpenses('contract')

        expect(expenses.map(e => e.description)).toEqual(['earlier', 'later'])
      })

      it('should keep ledgers apart', async () => {
        await repo.appendExpense(new ExpenseBuilder().inLedger('contract').build())
        await repo.appendExpense(new ExpenseBuilder().inLedger('other').build())

        expect(await repo.listExpenses('contract')).toHaveLength(1)
      })

      it('should filter by payer, category and paging', async () => {
        await repo.appendExpense(new ExpenseBuilder().inLedger('contract').paidBy(1).withCategory('food').at('2024-01-01T00:00:00Z').build())
        await repo.appendExpense(new ExpenseBuilder().inLedger('contract').paidBy(2).withCategory('food').at('2024-01-02T00:00:00Z').build())
        await repo.appendExpense(new ExpenseBuilder().inLedger('contract').paidBy(2).withCategory('rent').at('2024-01-03T00:00:00Z').build())

        expect(await repo.listExpenses('contract', { payerId: 2 })).toHaveLength(2)
        expect(await repo.listExpenses('contract', { category: 'food' })).toHaveLength(2)

        const page = await repo.listExpenses('contract', { offset: 1, limit: 1 })
        expect(page.map(e => e.payerId)).toEqual([2])
        expect(page[0].category).toBe('food')
      })
    })

    describe('loadApprovedExpenses', () => {
      it('should skip void expenses and honour the window', async () => {
        const kept = await repo.appendExpense(new ExpenseBuilder().inLedger('contract').at('2024-03-01T00:00:00Z').build())
        const voided = await repo.appendExpense(new ExpenseBuilder().inLedger('contract').at('2024-03-02T00:00:00Z').build())
        await repo.appendExpense(new ExpenseBuilder().inLedger('contract').at('2024-05-01T00:00:00Z').build())
        await repo.markVoid('contract', voided.id, new Date('2024-03-03T00:00:00Z'))

        const approved = await repo.loadApprovedExpenses('contract', {
          from: new Date('2024-03-01T00:00:00Z'),
          to: new Date('2024-04-01T00:00:00Z')
        })

        expect(approved.map(e => e.id)).toEqual([kept.id])
      })
    })

    describe('markVoid', () => {
      it('should flag the expense and keep it', async () => {
        const saved = await repo.appendExpense(new ExpenseBuilder().inLedger('contract').build())
        const at = new Date('2024-02-01T00:00:00Z')

        const voided = await repo.markVoid('contract', saved.id, at)

        expect(voided?.isVoid).toBe(true)
        expect(voided?.voidedAt).toEqual(at)
        expect((await repo.getExpense('contract', saved.id))?.isVoid).toBe(true)
        expect(await repo.listExpenses('contract', { status: 'void' })).toHaveLength(1)
      })

      it('should return null for an unknown expense', async () => {
        expect(await repo.markVoid('contract', 'e5a1c3b2-0000-4000-8000-0000000000ff', new Date())).toBeNull()
      })
    })
  })
}
