// Domain
export { type Category, CATEGORIES, normalizeCategory, isCategory } from './domain/category.js'
export { type Currency, COMMON_CURRENCIES, normalizeCurrency, detectCurrency, isCurrency } from './domain/currency.js'
export { ExchangeRate, type ExchangeRateProps, type RateSourceKind } from './domain/exchange-rate.js'
export { Expense, type ExpenseProps, type ExpenseStatus } from './domain/expense.js'
export { ExpenseDraftSchema, parseExpenseDraft, type ExpenseDraft, type ExpenseDraftInput } from './domain/expense-draft.js'
export { ExpenseRecordSchema, toExpenseRecord, parseExpenseRecord, type ExpenseRecord } from './domain/expense-record.js'
export { Money, type MoneyProps } from './domain/money.js'
export { Participant, type ParticipantId, type ParticipantProps, DEFAULT_WEIGHT, isVirtualId, nextVirtualId } from './domain/participant.js'
export { WeightSnapshot, type ParticipantShare, type SnapshotEntry, type ShareDebit } from './domain/weight-snapshot.js'

// Ports
export { type ExpenseRepository, type ExpenseFilter, type TimeWindow, isWithinWindow } from './ports/expense-repository.js'
export { type ParticipantRepository } from './ports/participant-repository.js'
export { type RateSource, type FetchRateOptions } from './ports/rate-source.js'

// Services
export { BalanceCalculator, type Balances, type CalculatorOptions } from './services/balance-calculator.js'
export { calculateCategoryTotals, type CategoryTotal } from './services/category-totals.js'
export { ExpenseLedger, type ExpenseLedgerOptions, type AddExpenseResult, type BalanceQueryOptions } from './services/expense-ledger.js'
export { RateCache, hourBucket, type CachedRate, type RateCacheOptions, DEFAULT_RATE_TTL_MS, HOUR_MS } from './services/rate-cache.js'
export { RateResolver, type RateResolverOptions, DEFAULT_LAYER_TIMEOUT_MS } from './services/rate-resolver.js'
export { planSettlement, applyTransfers, type SettlementTransfer } from './services/settlement-planner.js'
export { StaticRateTable, DEFAULT_STATIC_RATES, type StaticRateTableProps } from './services/static-rates.js'

// Errors
export { InvalidExpenseError } from './errors/invalid-expense-error.js'
export { RateUnavailableError, RateSourceTimeoutError } from './errors/rate-errors.js'
export { ExpenseNotFoundError } from './errors/expense-not-found-error.js'
export { BalanceInvariantError } from './errors/balance-error.js'
export { BaseCurrencyMismatchError } from './errors/base-currency-error.js'

// Utils
export { Decimal, EPSILON } from './utils/decimal.js'
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './utils/logger.js'
