export {
  ExchangeRateApiSource,
  type ExchangeRateApiSourceOptions,
  DEFAULT_RATE_SOURCE_URL
} from './exchange-rate-api-source.js'
