import { DocumentTree, NodeHandle } from '../domain/document.js'
import { commentTagName } from '../domain/account.js'
import { ADDRESS, EntityIndex, INSTITUTION_ACCOUNT_IDS } from '../domain/kmymoney.js'
import { CommentBlock, CommentLine } from '../domain/journal.js'
import { JournalWriter } from '../serializer/journal-writer.js'
import { NEWLINE_SEPARATOR, TextOptions, escapeText, foldNewlines, isBlank } from '../utils/text.js'

export interface MetadataEmitterOptions {
  document: DocumentTree
  writer: JournalWriter
  text?: TextOptions
}

/**
 * Renders the KMyMoney bookkeeping sections as comment blocks at the top of
 * the journal. Values are copied as they are, with newlines folded.
 */
export class MetadataEmitter {
  private readonly document: DocumentTree
  private readonly writer: JournalWriter
  private readonly text: TextOptions

  constructor(options: MetadataEmitterOptions) {
    this.document = options.document
    this.writer = options.writer
    this.text = options.text ?? {}
  }

  fileInfo(fileInfo: NodeHandle): string {
    const lines = this.document.children(fileInfo).map((child): CommentLine => {
      const values = Object.values(this.document.attributes(child))
        .map(value => ` ${this.fold(value)}`)
        .join('')
      return { text: `${this.document.tag(child)}:${values}` }
    })
    return this.block('FILEINFO', lines)
  }

  user(user: NodeHandle): string {
    return this.block('USER', [
      ...this.attributeLines(user),
      ...this.addressLines(user)
    ])
  }

  /**
   * Institution block. With `accounts` given, each referenced account's
   * attributes are listed under its id.
   */
  institution(institution: NodeHandle, accounts?: EntityIndex): string {
    const lines: CommentLine[] = []

    for (const [attribute, raw] of Object.entries(this.document.attributes(institution))) {
      const value = escapeText(raw, this.text)
      if (!isBlank(value)) {
        lines.push({ text: `${commentTagName(attribute)}: ${value}` })
      }
    }

    lines.push(...this.addressLines(institution))

    for (const reference of this.document.findNodes(institution, INSTITUTION_ACCOUNT_IDS)) {
      const id = this.document.attribute(reference, 'id') ?? ''
      lines.push({ text: `accountid: ${id}` })
      if (accounts !== undefined) {
        lines.push(...this.accountDetailLines(accounts.get(id)))
      }
    }

    return this.block('INSTITUTIONS', lines)
  }

  payee(payee: NodeHandle): string {
    return this.block('PAYEE', [
      ...this.attributeLines(payee),
      ...this.addressLines(payee)
    ])
  }

  costCenter(costCenter: NodeHandle): string {
    return this.block('COSTCENTER', this.attributeLines(costCenter))
  }

  tag(tag: NodeHandle): string {
    return this.block('TAG', this.attributeLines(tag))
  }

  private accountDetailLines(account: NodeHandle | undefined): CommentLine[] {
    if (account === undefined) {
      return []
    }
    const lines: CommentLine[] = []
    for (const [attribute, raw] of Object.entries(this.document.attributes(account))) {
      const value = escapeText(raw, this.text)
      if (!isBlank(value)) {
        lines.push({ text: `${commentTagName(attribute)}: ${value}`, nested: true })
      }
    }
    return lines
  }

  private attributeLines(handle: NodeHandle): CommentLine[] {
    return Object.entries(this.document.attributes(handle))
      .map(([attribute, value]) => ({ text: `${attribute}: ${this.fold(value)}` }))
  }

  private addressLines(owner: NodeHandle): CommentLine[] {
    const address = this.document.findNode(owner, ADDRESS)
    return address === undefined ? [] : this.attributeLines(address)
  }

  private fold(value: string): string {
    return foldNewlines(value, this.text.newlineSeparator ?? NEWLINE_SEPARATOR)
  }

  private block(title: string, lines: CommentLine[]): string {
    return this.writer.writeCommentBlock({ title, lines })
  }
}
