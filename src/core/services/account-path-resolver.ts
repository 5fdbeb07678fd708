import { DocumentTree, NodeHandle } from '../domain/document.js'
import { EntityIndex } from '../domain/kmymoney.js'
import { ACCOUNT_ATTRIBUTES } from '../domain/account.js'
import { TextOptions, escapeText, formatName } from '../utils/text.js'

/**
 * `declaration` gives the lowercased account name hledger sees,
 * `comment` the case-preserving one shown next to it.
 */
export type PathMode = 'declaration' | 'comment'

export interface AccountPathResolverOptions {
  document: DocumentTree
  accounts: EntityIndex
  text?: TextOptions
}

export class AccountPathResolver {
  private readonly document: DocumentTree
  private readonly accounts: EntityIndex
  private readonly text: TextOptions
  private readonly cache: Record<PathMode, Map<NodeHandle, string>> = {
    declaration: new Map(),
    comment: new Map()
  }

  constructor(options: AccountPathResolverOptions) {
    this.document = options.document
    this.accounts = options.accounts
    this.text = options.text ?? {}
  }

  /**
   * Full colon-separated path of an account, root first.
   * A parent id that does not resolve ends the walk.
   */
  resolve(account: NodeHandle, mode: PathMode = 'declaration'): string {
    return this.resolveWithin(account, mode, new Set())
  }

  resolveById(id: string, mode: PathMode = 'declaration'): string {
    const account = this.accounts.get(id)
    return account === undefined ? '' : this.resolve(account, mode)
  }

  private resolveWithin(account: NodeHandle, mode: PathMode, visited: Set<NodeHandle>): string {
    const cached = this.cache[mode].get(account)
    if (cached !== undefined) {
      return cached
    }

    visited.add(account)
    const segment = this.segment(account, mode)
    const parent = this.parentOf(account)

    // A parent already on the walk means a cycle; stop there
    const path = parent === undefined || visited.has(parent)
      ? segment
      : `${this.resolveWithin(parent, mode, visited)}:${segment}`

    this.cache[mode].set(account, path)
    return path
  }

  private segment(account: NodeHandle, mode: PathMode): string {
    const name = this.document.attribute(account, ACCOUNT_ATTRIBUTES.name) ?? ''
    return mode === 'declaration'
      ? formatName(name, this.text)
      : escapeText(name, this.text)
  }

  private parentOf(account: NodeHandle): NodeHandle | undefined {
    const parentId = this.document.attribute(account, ACCOUNT_ATTRIBUTES.parent)
    if (parentId === undefined || parentId === '') {
      return undefined
    }
    return this.accounts.get(parentId)
  }
}
