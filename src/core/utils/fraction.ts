import { Decimal, AmountFormat, DEFAULT_AMOUNT_FORMAT, formatAmount } from './decimal.js'
import { MalformedExpressionError } from '../errors/malformed-expression-error.js'

const INVALID_CHARACTER = /[^0-9+/-]/
const DIGITS = /^[0-9]+/

type Operator = '+' | '-' | '/'

function isOperator(char: string | undefined): char is Operator {
  return char === '+' || char === '-' || char === '/'
}

/**
 * Evaluate a KMyMoney amount expression such as `-12345/100` or `1+2/4`.
 *
 * A leading sign belongs to the first number. Operators have no precedence:
 * `a op b op c` is `(a op b) op c`.
 */
export function parseFraction(expression: string): Decimal {
  const invalid = INVALID_CHARACTER.exec(expression)
  if (invalid) {
    throw new MalformedExpressionError(
      expression,
      `unexpected character '${invalid[0]}' at position ${invalid.index}`
    )
  }

  let pos = 0

  const readNumber = (): Decimal => {
    const match = DIGITS.exec(expression.slice(pos))
    if (!match) {
      throw new MalformedExpressionError(
        expression,
        pos >= expression.length
          ? 'unexpected end of expression'
          : `expected digits at position ${pos}`
      )
    }
    pos += match[0].length
    return new Decimal(match[0])
  }

  let negative = false
  const sign = expression[pos]
  if (isOperator(sign) && sign !== '/') {
    negative = sign === '-'
    pos++
  }

  let result = readNumber()
  if (negative) {
    result = result.negated()
  }

  while (pos < expression.length) {
    const operator = expression[pos]
    if (!isOperator(operator)) {
      throw new MalformedExpressionError(expression, `expected operator at position ${pos}`)
    }
    pos++
    const operand = readNumber()

    switch (operator) {
      case '+':
        result = result.plus(operand)
        break
      case '-':
        result = result.minus(operand)
        break
      case '/':
        if (operand.isZero()) {
          throw new MalformedExpressionError(expression, 'division by zero')
        }
        result = result.dividedBy(operand)
        break
    }
  }

  return result
}

export function evaluateFraction(
  expression: string,
  format: AmountFormat = DEFAULT_AMOUNT_FORMAT
): string {
  return formatAmount(parseFraction(expression), format)
}
