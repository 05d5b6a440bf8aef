import { Currency } from '../domain/currency.js'
import { RateSourceKind } from '../domain/exchange-rate.js'
import { Decimal } from '../utils/decimal.js'

export const HOUR_MS = 60 * 60 * 1000
export const DEFAULT_RATE_TTL_MS = 6 * HOUR_MS

export interface CachedRate {
  rate: Decimal
  approximate: boolean
  source: RateSourceKind
  createdAt: Date
}

export interface RateCacheOptions {
  ttlMs?: number
  now?: () => Date
}

export function hourBucket(asOf: Date): number {
  return Math.floor(asOf.getTime() / HOUR_MS) * HOUR_MS
}

/**
 * Read-through cache of resolved rates keyed by pair and hour bucket.
 * Entries expire `ttlMs` after they were written; concurrent writers simply overwrite.
 */
export class RateCache {
  private readonly entries = new Map<string, CachedRate>()
  private readonly ttlMs: number
  private readonly now: () => Date

  constructor(options: RateCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_RATE_TTL_MS
    this.now = options.now ?? (() => new Date())
  }

  get(from: Currency, to: Currency, asOf: Date): CachedRate | null {
    const key = this.key(from, to, asOf)
    const entry = this.entries.get(key)
    if (!entry) {
      return null
    }

    if (this.now().getTime() - entry.createdAt.getTime() >= this.ttlMs) {
      this.entries.delete(key)
      return null
    }

    return entry
  }

  set(from: Currency, to: Currency, asOf: Date, value: Omit<CachedRate, 'createdAt'>): CachedRate {
    const entry: CachedRate = { ...value, createdAt: this.now() }
    this.entries.set(this.key(from, to, asOf), entry)
    return entry
  }

  get size(): number {
    return this.entries.size
  }

  clear(): void {
    this.entries.clear()
  }

  private key(from: Currency, to: Currency, asOf: Date): string {
    return `${from}->${to}@${hourBucket(asOf)}`
  }
}
