export * from './core/index.js'
export * from './adapters/file/index.js'
export * from './adapters/xml/index.js'
export { loadConfig, converterOptions, ConfigSchema, type AppConfig } from './config.js'
export { createLogger } from './logger.js'
export { run, usage, type CliOptions } from './cli.js'
