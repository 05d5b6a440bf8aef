import { describe, it, expect } from 'vitest'
import { RateCache } from '../../../src/core/services/rate-cache.js'
import { RateResolver } from '../../../src/core/services/rate-resolver.js'
import { StaticRateTable } from '../../../src/core/services/static-rates.js'
import { RateUnavailableError } from '../../../src/core/errors/rate-errors.js'
import { FakeRateSource, ScriptedQuote } from '../../../src/testing/fake-rate-source.js'

describe('RateResolver', () => {
  const asOf = new Date('2024-06-01T10:15:00Z')

  const makeResolver = (quotes: Record<string, ScriptedQuote> = {}, staticRates?: StaticRateTable) => {
    const source = new FakeRateSource(quotes)
    const cache = new RateCache({ now: () => asOf })
    const resolver = new RateResolver({ source, cache, staticRates, layerTimeoutMs: 20 })
    return { source, cache, resolver }
  }

  it('should return an exact identity rate without asking the source', async () => {
    const { source, cache, resolver } = makeResolver()

    const rate = await resolver.resolve('ILS', 'ILS', asOf)

    expect(rate.rate.toString()).toBe('1')
    expect(rate.approximate).toBe(false)
    expect(rate.source).toBe('identity')
    expect(source.requests).toEqual([])
    expect(cache.size).toBe(0)
  })

  it('should use a direct quote as exact', async () => {
    const { resolver } = makeResolver({ 'EUR->ILS': '4.05' })

    const rate = await resolver.resolve('EUR', 'ILS', asOf)

    expect(rate.rate.toString()).toBe('4.05')
    expect(rate.approximate).toBe(false)
    expect(rate.source).toBe('direct')
  })

  it('should invert the opposite quote', async () => {
    const { source, resolver } = makeResolver({ 'ILS->EUR': '0.25' })

    const rate = await resolver.resolve('EUR', 'ILS', asOf)

    expect(rate.rate.toString()).toBe('4')
    expect(rate.approximate).toBe(true)
    expect(rate.source).toBe('inverse')
    expect(source.requests).toEqual([
      { from: 'EUR', to: 'ILS' },
      { from: 'ILS', to: 'EUR' }
    ])
  })

  it('should bridge through USD', async () => {
    const { resolver } = makeResolver({ 'GBP->USD': '1.25', 'USD->JPY': '150' })

    const rate = await resolver.resolve('GBP', 'JPY', asOf)

    expect(rate.rate.toString()).toBe('187.5')
    expect(rate.approximate).toBe(true)
    expect(rate.source).toBe('bridge')
  })

  it('should not bridge when one side is USD', async () => {
    const { source, resolver } = makeResolver()

    const rate = await resolver.resolve('USD', 'ILS', asOf)

    expect(rate.source).toBe('static')
    expect(rate.rate.toString()).toBe('3.7')
    expect(rate.approximate).toBe(true)
    expect(source.requests).toEqual([
      { from: 'USD', to: 'ILS' },
      { from: 'ILS', to: 'USD' }
    ])
  })

  it('should throw and cache nothing when every layer fails', async () => {
    const { cache, resolver } = makeResolver()

    await expect(resolver.resolve('CHF', 'SEK', asOf)).rejects.toThrow(RateUnavailableError)
    await expect(resolver.resolve('CHF', 'SEK', asOf)).rejects.toThrow('No exchange rate available for CHF->SEK')
    expect(cache.size).toBe(0)
  })

  it('should use an injected static table', async () => {
    const { resolver } = makeResolver({}, new StaticRateTable({ version: 'test', rates: { 'CHF->SEK': '11.9' } }))

    const rate = await resolver.resolve('CHF', 'SEK', asOf)

    expect(rate.rate.toString()).toBe('11.9')
    expect(rate.source).toBe('static')
  })

  it('should serve repeated lookups from the cache', async () => {
    const { source, resolver } = makeResolver({ 'ILS->EUR': '0.25' })

    await resolver.resolve('EUR', 'ILS', asOf)
    const cached = await resolver.resolve('EUR', 'ILS', new Date('2024-06-01T10:45:00Z'))

    expect(source.callsFor('ILS', 'EUR')).toBe(1)
    expect(cached.source).toBe('inverse')
    expect(cached.approximate).toBe(true)
    expect(cached.observedAt).toEqual(asOf)
  })

  it('should fall through a layer that times out', async () => {
    const { resolver } = makeResolver({ 'EUR->ILS': 'hang', 'ILS->EUR': '0.25' })

    const rate = await resolver.resolve('EUR', 'ILS', asOf)

    expect(rate.source).toBe('inverse')
    expect(rate.rate.toString()).toBe('4')
  })

  it('should fall through a layer that throws', async () => {
    const { resolver } = makeResolver({ 'EUR->ILS': 'error', 'ILS->EUR': '0.25' })

    const rate = await resolver.resolve('EUR', 'ILS', asOf)

    expect(rate.source).toBe('inverse')
  })

  it('should ignore unusable quotes', async () => {
    const { resolver } = makeResolver({ 'EUR->ILS': 0, 'ILS->EUR': -1 })

    const rate = await resolver.resolve('EUR', 'ILS', asOf)

    expect(rate.source).toBe('static')
    expect(rate.rate.toString()).toBe('4')
  })
})
