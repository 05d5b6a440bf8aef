import { describe, it, expect, vi, afterEach } from 'vitest'
import { ExchangeRateApiSource } from '../../../src/adapters/rates/exchange-rate-api-source.js'

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })

function mockFetchSuccess(rates: Record<string, number>) {
  return vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ result: 'success', rates }))
}

describe('ExchangeRateApiSource', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should return the quote for the target currency', async () => {
    const fetchMock = mockFetchSuccess({ ILS: 3.65, EUR: 0.92 })
    vi.stubGlobal('fetch', fetchMock)
    const source = new ExchangeRateApiSource({ baseUrl: 'https://rates.test/v6/latest/' })

    const rate = await source.fetchRate('USD', 'ILS')

    expect(rate?.toString()).toBe('3.65')
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://rates.test/v6/latest/USD')
  })

  it('should return null for a currency missing from the table', async () => {
    vi.stubGlobal('fetch', mockFetchSuccess({ EUR: 0.92 }))
    const source = new ExchangeRateApiSource()

    expect(await source.fetchRate('USD', 'ILS')).toBeNull()
  })

  it('should reuse one table per base currency within its TTL', async () => {
    let now = 0
    const fetchMock = mockFetchSuccess({ ILS: 3.65, EUR: 0.92 })
    vi.stubGlobal('fetch', fetchMock)
    const source = new ExchangeRateApiSource({ cacheTtlMs: 1000, now: () => now })

    await source.fetchRate('USD', 'ILS')
    await source.fetchRate('USD', 'EUR')
    expect(fetchMock).toHaveBeenCalledTimes(1)

    now = 1000
    await source.fetchRate('USD', 'EUR')
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('should fetch again after the cache is cleared', async () => {
    const fetchMock = mockFetchSuccess({ ILS: 3.65 })
    vi.stubGlobal('fetch', fetchMock)
    const source = new ExchangeRateApiSource({ now: () => 0 })

    await source.fetchRate('USD', 'ILS')
    source.clearCache()
    await source.fetchRate('USD', 'ILS')

    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('should throw on an HTTP error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 503)))
    const source = new ExchangeRateApiSource()

    await expect(source.fetchRate('USD', 'ILS')).rejects.toThrow('Rate source responded with status 503')
  })

  it('should throw on an error payload', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ result: 'error', 'error-type': 'unsupported-code' })))
    const source = new ExchangeRateApiSource()

    await expect(source.fetchRate('XXX', 'ILS')).rejects.toThrow('Rate source returned unexpected payload: error')
  })

  it('should pass the abort signal through', async () => {
    const fetchMock = mockFetchSuccess({ ILS: 3.65 })
    vi.stubGlobal('fetch', fetchMock)
    const controller = new AbortController()

    await new ExchangeRateApiSource().fetchRate('USD', 'ILS', { signal: controller.signal })

    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBe(controller.signal)
  })
})
