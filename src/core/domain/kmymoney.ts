import { NodeHandle, NodePath } from './document.js'

export const ROOT_ELEMENT = 'KMYMONEY-FILE'

/**
 * Paths of the KMyMoney sections, from the document root.
 */
export const SECTIONS = {
  fileInfo: [ROOT_ELEMENT, 'FILEINFO'],
  user: [ROOT_ELEMENT, 'USER'],
  institutions: [ROOT_ELEMENT, 'INSTITUTIONS'],
  payees: [ROOT_ELEMENT, 'PAYEES'],
  costCenters: [ROOT_ELEMENT, 'COSTCENTERS'],
  tags: [ROOT_ELEMENT, 'TAGS'],
  accounts: [ROOT_ELEMENT, 'ACCOUNTS'],
  transactions: [ROOT_ELEMENT, 'TRANSACTIONS'],
  reports: [ROOT_ELEMENT, 'REPORTS']
} as const satisfies Record<string, NodePath>

export const ELEMENTS = {
  institution: [...SECTIONS.institutions, 'INSTITUTION'],
  payee: [...SECTIONS.payees, 'PAYEE'],
  costCenter: [...SECTIONS.costCenters, 'COSTCENTER'],
  tag: [...SECTIONS.tags, 'TAG'],
  account: [...SECTIONS.accounts, 'ACCOUNT'],
  transaction: [...SECTIONS.transactions, 'TRANSACTION'],
  report: [...SECTIONS.reports, 'REPORT']
} as const satisfies Record<string, NodePath>

// Relative to the owning element
export const ADDRESS: NodePath = ['ADDRESS']
export const SPLITS: NodePath = ['SPLITS', 'SPLIT']
export const INSTITUTION_ACCOUNT_IDS: NodePath = ['ACCOUNTIDS', 'ACCOUNTID']

export type EntityKind = 'institutions' | 'payees' | 'accounts' | 'transactions' | 'reports'

export const ENTITY_PATHS: Readonly<Record<EntityKind, NodePath>> = {
  institutions: ELEMENTS.institution,
  payees: ELEMENTS.payee,
  accounts: ELEMENTS.account,
  transactions: ELEMENTS.transaction,
  reports: ELEMENTS.report
}

/**
 * Entity id to node, for one entity kind of one document.
 */
export type EntityIndex = ReadonlyMap<string, NodeHandle>

export const SPLIT_ATTRIBUTES = {
  account: 'account',
  value: 'value',
  memo: 'memo',
  payee: 'payee'
} as const

export const TRANSACTION_ATTRIBUTES = {
  id: 'id',
  postDate: 'postdate',
  commodity: 'commodity'
} as const
