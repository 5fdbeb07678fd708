/**
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from 'zod'
import type { JournalConverterOptions } from './core/services/journal-converter.js'

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    // Output
    JOURNAL_EXTENSION: z.string().min(1).default('.journal'),
    NEWLINE_SEPARATOR: z.string().default(' => '),
    INCLUDE_PAYEES: z
      .enum(['true', 'false'])
      .transform((v) => v === 'true')
      .default('true'),

    // Amounts
    AMOUNT_MIN_DECIMALS: z.coerce.number().int().min(0).max(20).default(2),
    AMOUNT_MAX_DECIMALS: z.coerce.number().int().min(0).max(20).default(8)
  })
  .refine((config) => config.AMOUNT_MIN_DECIMALS <= config.AMOUNT_MAX_DECIMALS, {
    message: 'AMOUNT_MIN_DECIMALS must not exceed AMOUNT_MAX_DECIMALS',
    path: ['AMOUNT_MIN_DECIMALS']
  })

export type AppConfig = z.infer<typeof ConfigSchema>

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  return ConfigSchema.parse(env)
}

export function converterOptions(config: AppConfig): Omit<JournalConverterOptions, 'logger'> {
  return {
    text: { newlineSeparator: config.NEWLINE_SEPARATOR },
    amountFormat: {
      minDecimals: config.AMOUNT_MIN_DECIMALS,
      maxDecimals: config.AMOUNT_MAX_DECIMALS
    },
    includePayees: config.INCLUDE_PAYEES
  }
}
