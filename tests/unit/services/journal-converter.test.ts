import { describe, it, expect } from 'vitest'
import { pino } from 'pino'
import { JournalConverter } from '../../../src/core/services/journal-converter.js'
import { DocumentTreeBuilder } from '../../../src/core/domain/document.js'
import { MalformedExpressionError } from '../../../src/core/errors/malformed-expression-error.js'
import { KMyMoneyDocumentBuilder } from '../../../src/testing/builders/kmymoney-document-builder.js'
import { MemoryJournalSink } from '../../../src/testing/memory-journal-sink.js'

const logger = pino({ level: 'silent' })

describe('JournalConverter', () => {
  it('should convert accounts and transactions into a journal', async () => {
    const document = new KMyMoneyDocumentBuilder()
      .addAccount({ id: 'A1', name: 'Asset' })
      .addAccount({ id: 'A2', name: 'Checking', parentaccount: 'A1' })
      .addTransaction({ id: 'T1', postdate: '2024-01-31', commodity: 'USD' }, [
        { account: 'A2', value: '100/1' }
      ])
      .build()
    const sink = new MemoryJournalSink()

    const summary = await new JournalConverter({ logger }).convert(document, sink, 'books.kmy')

    expect(sink.content).toBe(
      '; Converted from KMyMoney file: books.kmy\n' +
      ';\n' +
      '\n' +
      'account asset  ; Asset\n' +
      '  ; type: Asset\n' +
      '  ; id: A1\n' +
      '  ; name: Asset\n' +
      '\n' +
      'account asset:checking  ; Asset:Checking\n' +
      '  ; id: A2\n' +
      '  ; name: Checking\n' +
      '  ; parentaccount: A1\n' +
      '\n' +
      '\n' +
      '2024/01/31 (T1)  | \n' +
      '  asset:checking  USD 100.00 ;  | \n'
    )
    expect(summary).toEqual({ accounts: 2, transactions: 1, postings: 1, skippedTransactions: 0 })
  })

  it('should start the journal with a truncating write', async () => {
    const sink = new MemoryJournalSink()
    await new JournalConverter({ logger }).convert(new KMyMoneyDocumentBuilder().build(), sink, 'empty.kmy')

    expect(sink.writes[0]).toEqual({ content: '; Converted from KMyMoney file: empty.kmy\n;\n', append: false })
    expect(sink.writes.slice(1).every(w => w.append)).toBe(true)
  })

  it('should skip missing sections', async () => {
    const builder = new DocumentTreeBuilder()
    builder.addNode(builder.root, 'SOMETHING-ELSE')
    const sink = new MemoryJournalSink()

    const summary = await new JournalConverter({ logger }).convert(builder.build(), sink, 'other.xml')

    expect(sink.content).toBe('; Converted from KMyMoney file: other.xml\n;\n\n')
    expect(summary).toEqual({ accounts: 0, transactions: 0, postings: 0, skippedTransactions: 0 })
  })

  it('should write the metadata blocks in a fixed order before the accounts', async () => {
    const document = new KMyMoneyDocumentBuilder()
      .addAccount({ id: 'A1', name: 'Asset' })
      .addTag({ id: 'G1', name: 'Trip' })
      .addCostCenter({ id: 'C1', name: 'Home' })
      .addPayee({ id: 'P1', name: 'Grocer' })
      .addInstitution({ id: 'I1', name: 'Bank' }, { accountIds: ['A1'] })
      .withUser({ name: 'Jo' })
      .withFileInfo({ VERSION: { id: '1' } })
      .build()
    const sink = new MemoryJournalSink()

    await new JournalConverter({ logger }).convert(document, sink, 'books.kmy')

    const titles = sink.lines.filter(line => /^; --[A-Z]+--$/.test(line))
    expect(titles).toEqual([
      '; --FILEINFO--',
      '; --USER--',
      '; --INSTITUTIONS--',
      '; --PAYEE--',
      '; --COSTCENTER--',
      '; --TAG--'
    ])
    expect(sink.content).toContain('; accountid: A1\n;\tid: A1\n;\tname: Asset\n')
    expect(sink.content.indexOf('; --TAG--')).toBeLessThan(sink.content.indexOf('account asset'))
  })

  it('should leave payee blocks out when disabled', async () => {
    const document = new KMyMoneyDocumentBuilder().addPayee({ id: 'P1', name: 'Grocer' }).build()
    const sink = new MemoryJournalSink()

    await new JournalConverter({ logger, includePayees: false }).convert(document, sink, 'books.kmy')

    expect(sink.content).not.toContain('--PAYEE--')
  })

  it('should count transactions without splits as skipped', async () => {
    const document = new KMyMoneyDocumentBuilder()
      .addAccount({ id: 'A1', name: 'Asset' })
      .addTransaction({ id: 'T1', postdate: '2024-01-01', commodity: 'USD' }, [])
      .addTransaction({ id: 'T2', postdate: '2024-01-02', commodity: 'USD' }, [
        { account: 'A1', value: '1' },
        { account: 'A1', value: '-1' }
      ])
      .build()
    const sink = new MemoryJournalSink()

    const summary = await new JournalConverter({ logger }).convert(document, sink, 'books.kmy')

    expect(summary).toEqual({ accounts: 1, transactions: 2, postings: 2, skippedTransactions: 1 })
    expect(sink.content.endsWith(
      '\n' +
      '\n' +
      '\n' +
      '2024/01/02 (T2)  | \n' +
      '  asset  USD 1.00 ;  | \n' +
      '  asset  USD -1.00 ;  | \n'
    )).toBe(true)
  })

  it('should apply text and amount options', async () => {
    const document = new KMyMoneyDocumentBuilder()
      .addAccount({ id: 'A1', name: 'Asset' })
      .addTransaction({ id: 'T1', postdate: '2024-01-01', commodity: 'USD' }, [
        { account: 'A1', value: '5/2', memo: 'two\nlines' }
      ])
      .build()
    const sink = new MemoryJournalSink()

    await new JournalConverter({
      logger,
      text: { newlineSeparator: ' ~ ' },
      amountFormat: { minDecimals: 0, maxDecimals: 4 },
      writer: { dateFormat: 'dash' }
    }).convert(document, sink, 'books.kmy')

    expect(sink.content.endsWith(
      '2024-01-01 (T1)  | two ~ lines\n' +
      '  asset  USD 2.5 ;  | two ~ lines\n'
    )).toBe(true)
  })

  it('should abort on a malformed amount', async () => {
    const document = new KMyMoneyDocumentBuilder()
      .addAccount({ id: 'A1', name: 'Asset' })
      .addTransaction({ id: 'T1', commodity: 'USD' }, [{ account: 'A1', value: '1,5' }])
      .addTransaction({ id: 'T2', commodity: 'USD' }, [{ account: 'A1', value: '1' }])
      .build()
    const sink = new MemoryJournalSink()

    await expect(new JournalConverter({ logger }).convert(document, sink, 'books.kmy'))
      .rejects.toThrow(MalformedExpressionError)
    expect(sink.content).not.toContain('(T2)')
  })
})
