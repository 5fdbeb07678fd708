import {
  AccountDeclaration,
  CommentBlock,
  PostingLine,
  TransactionHeader
} from '../domain/journal.js'
import { isBlank } from '../utils/text.js'

export interface JournalWriterOptions {
  dateFormat?: 'slash' | 'dash'
  indentSize?: number
  // Spaces between an account name and what follows it
  accountGap?: number
  payeeSeparator?: string
}

const SOURCE_DATE = /(....)-(..)-(..)/g

export class JournalWriter {
  private readonly dateFormat: 'slash' | 'dash'
  private readonly indent: string
  private readonly accountGap: string
  private readonly payeeSeparator: string

  constructor(options: JournalWriterOptions = {}) {
    this.dateFormat = options.dateFormat ?? 'slash'
    this.indent = ' '.repeat(options.indentSize ?? 2)
    this.accountGap = ' '.repeat(options.accountGap ?? 2)
    this.payeeSeparator = options.payeeSeparator ?? ' | '
  }

  writeHeader(sourceName: string): string {
    return `; Converted from KMyMoney file: ${sourceName}\n;\n`
  }

  writeCommentBlock(block: CommentBlock): string {
    const lines = [`; --${block.title}--`]
    for (const line of block.lines) {
      lines.push(line.nested ? `;\t${line.text}` : `; ${line.text}`)
    }
    lines.push(';')
    return lines.map(line => `${line}\n`).join('')
  }

  writeAccountDeclaration(declaration: AccountDeclaration): string {
    let journal = `account ${declaration.path}${this.accountGap}; ${declaration.displayPath}\n`
    for (const tag of declaration.tags) {
      journal += `${this.indent}; ${tag.name}: ${tag.value}\n`
    }
    return `${journal}\n`
  }

  writeTransactionHeader(header: TransactionHeader): string {
    const date = this.formatDate(header.date)
    return `${date} (${header.id}) ${header.payee}${this.payeeSeparator}${header.memo}\n`
  }

  writePosting(posting: PostingLine): string {
    return `${this.indent}${posting.account}${this.accountGap}${posting.commodity} ${posting.amount}` +
      ` ; ${posting.payee}${this.payeeSeparator}${posting.memo}\n`
  }

  /**
   * Rewrite `yyyy-mm-dd` textually. Nothing is validated, so a malformed
   * date passes through as far as the pattern matches.
   */
  formatDate(date: string): string {
    if (isBlank(date)) {
      return ''
    }
    const separator = this.dateFormat === 'slash' ? '/' : '-'
    return date.replace(SOURCE_DATE, `$1${separator}$2${separator}$3`)
  }
}
