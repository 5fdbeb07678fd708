import { Decimal } from 'decimal.js'

// Configure Decimal.js for financial calculations
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP
})

export { Decimal }

export interface AmountFormat {
  minDecimals: number
  maxDecimals: number
}

export const DEFAULT_AMOUNT_FORMAT: AmountFormat = Object.freeze({
  minDecimals: 2,
  maxDecimals: 8
})

/**
 * Render a decimal with at least `minDecimals` fraction digits, keeping the
 * exact digits beyond that up to `maxDecimals`.
 */
export function formatAmount(value: Decimal, format: AmountFormat = DEFAULT_AMOUNT_FORMAT): string {
  const decimals = Math.min(
    Math.max(format.minDecimals, value.decimalPlaces()),
    format.maxDecimals
  )
  return value.toFixed(decimals)
}
