export * from './core/index.js'
export * from './adapters/memory/index.js'
export * from './adapters/rates/index.js'
export * from './adapters/postgres/index.js'
export { ConfigSchema, ConfigError, loadConfig, type AppConfig } from './config.js'
export { createRuntime, type Runtime, type RuntimeOptions } from './runtime.js'
