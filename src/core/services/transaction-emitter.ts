import type { Logger } from 'pino'
import { DocumentTree, NodeHandle } from '../domain/document.js'
import { EntityIndex, SPLITS, SPLIT_ATTRIBUTES, TRANSACTION_ATTRIBUTES } from '../domain/kmymoney.js'
import { PostingLine } from '../domain/journal.js'
import { JournalSink } from '../ports/journal-sink.js'
import { JournalWriter } from '../serializer/journal-writer.js'
import { AccountPathResolver } from './account-path-resolver.js'
import { AmountFormat, DEFAULT_AMOUNT_FORMAT } from '../utils/decimal.js'
import { evaluateFraction } from '../utils/fraction.js'
import { TextOptions, escapeText } from '../utils/text.js'

export interface TransactionEmitterOptions {
  document: DocumentTree
  accounts: EntityIndex
  payees: EntityIndex
  paths: AccountPathResolver
  writer: JournalWriter
  logger: Logger
  text?: TextOptions
  amountFormat?: AmountFormat
}

export interface EmittedTransaction {
  id: string
  postings: number
  skipped: boolean
}

export class TransactionEmitter {
  private readonly document: DocumentTree
  private readonly accounts: EntityIndex
  private readonly payees: EntityIndex
  private readonly paths: AccountPathResolver
  private readonly writer: JournalWriter
  private readonly logger: Logger
  private readonly text: TextOptions
  private readonly amountFormat: AmountFormat

  constructor(options: TransactionEmitterOptions) {
    this.document = options.document
    this.accounts = options.accounts
    this.payees = options.payees
    this.paths = options.paths
    this.writer = options.writer
    this.logger = options.logger
    this.text = options.text ?? {}
    this.amountFormat = options.amountFormat ?? DEFAULT_AMOUNT_FORMAT
  }

  /**
   * Write one transaction: a separator line, the header, then a posting per
   * split. Every line goes to the sink as soon as it is rendered, so a
   * malformed amount leaves the lines before it in place.
   */
  async emit(transaction: NodeHandle, sink: JournalSink): Promise<EmittedTransaction> {
    const id = this.attribute(transaction, TRANSACTION_ATTRIBUTES.id)
    const commodity = this.attribute(transaction, TRANSACTION_ATTRIBUTES.commodity)
    const splits = this.document.findNodes(transaction, SPLITS)

    await sink.write('\n', true)

    const [first] = splits
    if (first === undefined) {
      this.logger.debug({ transaction: id }, 'Skipping transaction without splits')
      return { id, postings: 0, skipped: true }
    }

    // Header text comes from the first split only
    await sink.write(this.writer.writeTransactionHeader({
      date: this.attribute(transaction, TRANSACTION_ATTRIBUTES.postDate),
      id,
      payee: this.payeeName(this.attribute(first, SPLIT_ATTRIBUTES.payee)),
      memo: escapeText(this.attribute(first, SPLIT_ATTRIBUTES.memo), this.text)
    }), true)

    for (const split of splits) {
      await sink.write(this.writer.writePosting(this.posting(id, commodity, split)), true)
    }

    return { id, postings: splits.length, skipped: false }
  }

  private posting(transactionId: string, commodity: string, split: NodeHandle): PostingLine {
    const accountId = this.attribute(split, SPLIT_ATTRIBUTES.account)
    if (!this.accounts.has(accountId)) {
      this.logger.warn(
        { transaction: transactionId, account: accountId },
        'Split references an unknown account'
      )
    }

    return {
      account: this.paths.resolveById(accountId, 'declaration'),
      commodity,
      amount: evaluateFraction(this.attribute(split, SPLIT_ATTRIBUTES.value), this.amountFormat),
      payee: this.payeeName(this.attribute(split, SPLIT_ATTRIBUTES.payee)),
      memo: escapeText(this.attribute(split, SPLIT_ATTRIBUTES.memo), this.text)
    }
  }

  private payeeName(payeeId: string): string {
    const payee = this.payees.get(payeeId)
    if (payee === undefined) {
      return ''
    }
    return escapeText(this.document.attribute(payee, 'name') ?? '', this.text)
  }

  private attribute(handle: NodeHandle, name: string): string {
    return this.document.attribute(handle, name) ?? ''
  }
}
