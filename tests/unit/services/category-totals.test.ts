import { describe, it, expect } from 'vitest'
import { calculateCategoryTotals } from '../../../src/core/services/category-totals.js'
import { ExpenseBuilder } from '../../../src/testing/builders/expense-builder.js'

describe('calculateCategoryTotals', () => {
  const expenses = [
    new ExpenseBuilder().withAmount(30).withCategory('food').at('2024-02-01T00:00:00Z').build(),
    new ExpenseBuilder().withAmount(50).withCategory('rent').at('2024-02-02T00:00:00Z').build(),
    new ExpenseBuilder().withAmount('25.5').withCategory('food').at('2024-02-03T00:00:00Z').build(),
    new ExpenseBuilder().withAmount(10).withCategory('travel').at('2024-03-01T00:00:00Z').build(),
    new ExpenseBuilder().withAmount(999).withCategory('travel').voided().build()
  ]

  it('should sum approved expenses per category, largest first', () => {
    const totals = calculateCategoryTotals(expenses)

    expect(totals.map(t => [t.category, t.total.toString()])).toEqual([
      ['food', '55.5'],
      ['rent', '50'],
      ['travel', '10']
    ])
  })

  it('should respect a time window', () => {
    const totals = calculateCategoryTotals(expenses, { from: new Date('2024-02-02T00:00:00Z'), to: new Date('2024-02-28T00:00:00Z') })

    expect(totals.map(t => [t.category, t.total.toString()])).toEqual([
      ['rent', '50'],
      ['food', '25.5']
    ])
  })
})
