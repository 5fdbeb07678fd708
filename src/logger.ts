import pino, { type Logger } from 'pino'
import type { AppConfig } from './config.js'

/**
 * JSON logger on stderr, keeping stdout for command output.
 */
export function createLogger(level: AppConfig['LOG_LEVEL'] = 'info'): Logger {
  return pino({ name: 'kmy2journal', level }, pino.destination(2))
}
