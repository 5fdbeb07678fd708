import { DocumentTree, NodeHandle } from '../domain/document.js'
import { ACCOUNT_ATTRIBUTES, commentTagName } from '../domain/account.js'
import { AccountDeclaration, AccountTag } from '../domain/journal.js'
import { JournalSink } from '../ports/journal-sink.js'
import { JournalWriter } from '../serializer/journal-writer.js'
import { AccountPathResolver } from './account-path-resolver.js'
import { TextOptions, capitalize, escapeText, formatName, isBlank } from '../utils/text.js'

export interface AccountEmitterOptions {
  document: DocumentTree
  paths: AccountPathResolver
  writer: JournalWriter
  text?: TextOptions
}

export class AccountEmitter {
  private readonly document: DocumentTree
  private readonly paths: AccountPathResolver
  private readonly writer: JournalWriter
  private readonly text: TextOptions

  constructor(options: AccountEmitterOptions) {
    this.document = options.document
    this.paths = options.paths
    this.writer = options.writer
    this.text = options.text ?? {}
  }

  declaration(account: NodeHandle): AccountDeclaration {
    return {
      path: this.paths.resolve(account, 'declaration'),
      displayPath: this.paths.resolve(account, 'comment'),
      tags: this.tags(account)
    }
  }

  async emit(account: NodeHandle, sink: JournalSink): Promise<void> {
    await sink.write(this.writer.writeAccountDeclaration(this.declaration(account)), true)
  }

  private tags(account: NodeHandle): AccountTag[] {
    const tags: AccountTag[] = []
    const name = this.document.attribute(account, ACCOUNT_ATTRIBUTES.name)
    const parent = this.document.attribute(account, ACCOUNT_ATTRIBUTES.parent)

    // Only top-level accounts carry an hledger account type
    if (isBlank(parent) && name !== undefined) {
      tags.push({ name: 'type', value: capitalize(formatName(name, this.text)) })
    }

    for (const [attribute, raw] of Object.entries(this.document.attributes(account))) {
      const value = escapeText(raw, this.text)
      if (!isBlank(value)) {
        tags.push({ name: commentTagName(attribute), value })
      }
    }

    return tags
  }
}
