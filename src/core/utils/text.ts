import { topLevelAccountKind } from '../domain/account.js'

export const NEWLINE_SEPARATOR = ' => '

// Characters with a meaning in journal syntax (account separator, comments, payee/note split, virtual postings)
const SPECIAL_CHARACTERS = /[:;|[\]]/g
const NEWLINES = /\r?\n/g
const WHITESPACE_RUN = /\s+/g

export interface TextOptions {
  newlineSeparator?: string
}

export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === ''
}

export function foldNewlines(value: string, separator: string = NEWLINE_SEPARATOR): string {
  if (isBlank(value)) {
    return value
  }
  return value.replace(NEWLINES, separator)
}

export function replaceSpecialCharacters(value: string): string {
  if (isBlank(value)) {
    return value
  }
  return value.replace(SPECIAL_CHARACTERS, ' ')
}

export function condenseWhitespace(value: string): string {
  return value.trim().replace(WHITESPACE_RUN, ' ')
}

/**
 * Make free text safe for a journal comment or description.
 * Case is preserved.
 */
export function escapeText(value: string, options: TextOptions = {}): string {
  if (isBlank(value)) {
    return value
  }
  const folded = foldNewlines(value, options.newlineSeparator ?? NEWLINE_SEPARATOR)
  return condenseWhitespace(replaceSpecialCharacters(folded))
}

/**
 * Escape and lowercase a name for use as an account segment. KMyMoney's
 * top-level names become hledger account types (`Income` -> `revenue`).
 */
export function formatName(value: string, options: TextOptions = {}): string {
  if (isBlank(value)) {
    return value
  }
  const formatted = escapeText(value, options).toLowerCase()
  return topLevelAccountKind(formatted) ?? formatted
}

export function capitalize(value: string): string {
  if (value.length === 0) {
    return value
  }
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase()
}
