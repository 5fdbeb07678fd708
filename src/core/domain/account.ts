/**
 * hledger account types, as written in `type:` tags.
 */
export type AccountKind = 'asset' | 'liability' | 'equity' | 'revenue' | 'expense'

// KMyMoney top-level account names (lowercased) to their hledger account type
export const TOP_LEVEL_ACCOUNTS: Readonly<Record<string, AccountKind>> = Object.freeze({
  asset: 'asset',
  liability: 'liability',
  equity: 'equity',
  income: 'revenue',
  expense: 'expense'
})

export function isTopLevelAccount(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(TOP_LEVEL_ACCOUNTS, name.toLowerCase())
}

export function topLevelAccountKind(name: string): AccountKind | undefined {
  return isTopLevelAccount(name) ? TOP_LEVEL_ACCOUNTS[name.toLowerCase()] : undefined
}

export const ACCOUNT_ATTRIBUTES = {
  id: 'id',
  name: 'name',
  parent: 'parentaccount',
  type: 'type'
} as const

// hledger reads `type:` as an account type tag, so the KMyMoney attribute is renamed
export const KMYMONEY_TYPE_TAG = 'kmymoney-type'

export function commentTagName(attribute: string): string {
  return attribute === ACCOUNT_ATTRIBUTES.type ? KMYMONEY_TYPE_TAG : attribute
}
