import type { Logger } from 'pino'
import { DocumentTree } from '../domain/document.js'
import { ELEMENTS, SECTIONS } from '../domain/kmymoney.js'
import { JournalSink } from '../ports/journal-sink.js'
import { JournalWriter, JournalWriterOptions } from '../serializer/journal-writer.js'
import { AmountFormat, DEFAULT_AMOUNT_FORMAT } from '../utils/decimal.js'
import { TextOptions } from '../utils/text.js'
import { AccountEmitter } from './account-emitter.js'
import { AccountPathResolver } from './account-path-resolver.js'
import { EntityIndexer } from './entity-indexer.js'
import { MetadataEmitter } from './metadata-emitter.js'
import { TransactionEmitter } from './transaction-emitter.js'

export interface JournalConverterOptions {
  logger: Logger
  writer?: JournalWriterOptions
  text?: TextOptions
  amountFormat?: AmountFormat
  includePayees?: boolean
}

export interface ConversionSummary {
  accounts: number
  transactions: number
  postings: number
  skippedTransactions: number
}

/**
 * Converts one KMyMoney document into one hledger journal.
 *
 * Sections are written in a fixed order: header, file info, user,
 * institutions, payees, cost centers, tags, accounts, transactions. A section
 * missing from the document is left out.
 */
export class JournalConverter {
  private readonly logger: Logger
  private readonly writer: JournalWriter
  private readonly text: TextOptions
  private readonly amountFormat: AmountFormat
  private readonly includePayees: boolean

  constructor(options: JournalConverterOptions) {
    this.logger = options.logger
    this.writer = new JournalWriter(options.writer)
    this.text = options.text ?? {}
    this.amountFormat = options.amountFormat ?? DEFAULT_AMOUNT_FORMAT
    this.includePayees = options.includePayees ?? true
  }

  async convert(
    document: DocumentTree,
    sink: JournalSink,
    sourceName: string
  ): Promise<ConversionSummary> {
    const indexer = new EntityIndexer(document, this.logger)
    const paths = new AccountPathResolver({
      document,
      accounts: indexer.accounts,
      text: this.text
    })
    const metadata = new MetadataEmitter({ document, writer: this.writer, text: this.text })
    const accountEmitter = new AccountEmitter({ document, paths, writer: this.writer, text: this.text })
    const transactionEmitter = new TransactionEmitter({
      document,
      accounts: indexer.accounts,
      payees: indexer.payees,
      paths,
      writer: this.writer,
      logger: this.logger,
      text: this.text,
      amountFormat: this.amountFormat
    })

    const root = document.root
    const summary: ConversionSummary = {
      accounts: 0,
      transactions: 0,
      postings: 0,
      skippedTransactions: 0
    }

    await sink.write(this.writer.writeHeader(sourceName), false)

    const fileInfo = document.findNode(root, SECTIONS.fileInfo)
    if (fileInfo !== undefined) {
      await sink.write(metadata.fileInfo(fileInfo), true)
    }

    const user = document.findNode(root, SECTIONS.user)
    if (user !== undefined) {
      await sink.write(metadata.user(user), true)
    }

    const accounts = document.hasDescendant(root, SECTIONS.accounts) ? indexer.accounts : undefined
    for (const institution of document.findNodes(root, ELEMENTS.institution)) {
      await sink.write(metadata.institution(institution, accounts), true)
    }

    if (this.includePayees) {
      for (const payee of document.findNodes(root, ELEMENTS.payee)) {
        await sink.write(metadata.payee(payee), true)
      }
    }

    for (const costCenter of document.findNodes(root, ELEMENTS.costCenter)) {
      await sink.write(metadata.costCenter(costCenter), true)
    }

    for (const tag of document.findNodes(root, ELEMENTS.tag)) {
      await sink.write(metadata.tag(tag), true)
    }

    // End of the comment header
    await sink.write('\n', true)

    for (const account of document.findNodes(root, ELEMENTS.account)) {
      await accountEmitter.emit(account, sink)
      summary.accounts++
    }

    for (const transaction of document.findNodes(root, ELEMENTS.transaction)) {
      const emitted = await transactionEmitter.emit(transaction, sink)
      summary.transactions++
      summary.postings += emitted.postings
      if (emitted.skipped) {
        summary.skippedTransactions++
      }
    }

    return summary
  }
}
