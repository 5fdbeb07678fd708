import { describe, it, expect } from 'vitest'
import { MetadataEmitter } from '../../../src/core/services/metadata-emitter.js'
import { indexEntities } from '../../../src/core/services/entity-indexer.js'
import { JournalWriter } from '../../../src/core/serializer/journal-writer.js'
import { NodeHandle } from '../../../src/core/domain/document.js'
import { ELEMENTS, SECTIONS } from '../../../src/core/domain/kmymoney.js'
import { KMyMoneyDocumentBuilder } from '../../../src/testing/builders/kmymoney-document-builder.js'

describe('MetadataEmitter', () => {
  const document = new KMyMoneyDocumentBuilder()
    .withFileInfo({
      CREATION_DATE: { date: '2020-01-01' },
      LAST_MODIFIED_DATE: { date: '2024-02-02' },
      VERSION: { id: '1' }
    })
    .withUser({ name: 'Jo Doe', email: 'jo@example.com' }, { street: '1 Main St\nFlat 2', city: 'Springfield' })
    .addInstitution(
      { id: 'I1', name: 'First Bank', manager: '' },
      { address: { street: 'Bank St', zip: '' }, accountIds: ['A1', 'A404'] }
    )
    .addPayee({ id: 'P1', name: 'Grocer' })
    .addCostCenter({ id: 'C1', name: 'Ops' })
    .addTag({ id: 'G1', name: 'Holiday', closed: '0' })
    .addAccount({ id: 'A1', name: 'Checking', type: '1', parentaccount: '' })
    .build()
  const emitter = new MetadataEmitter({ document, writer: new JournalWriter() })

  function first(path: readonly string[]): NodeHandle {
    const handle = document.findNode(document.root, path)
    if (handle === undefined) {
      throw new Error(`Nothing at ${path.join('/')}`)
    }
    return handle
  }

  it('should list file info entries with their values', () => {
    expect(emitter.fileInfo(first(SECTIONS.fileInfo))).toBe(
      '; --FILEINFO--\n' +
      '; CREATION_DATE: 2020-01-01\n' +
      '; LAST_MODIFIED_DATE: 2024-02-02\n' +
      '; VERSION: 1\n' +
      ';\n'
    )
  })

  it('should list user and address attributes with newlines folded', () => {
    expect(emitter.user(first(SECTIONS.user))).toBe(
      '; --USER--\n' +
      '; name: Jo Doe\n' +
      '; email: jo@example.com\n' +
      '; street: 1 Main St => Flat 2\n' +
      '; city: Springfield\n' +
      ';\n'
    )
  })

  it('should describe an institution with its accounts', () => {
    const accounts = indexEntities(document, 'accounts')
    expect(emitter.institution(first(ELEMENTS.institution), accounts)).toBe(
      '; --INSTITUTIONS--\n' +
      '; id: I1\n' +
      '; name: First Bank\n' +
      '; street: Bank St\n' +
      '; zip: \n' +
      '; accountid: A1\n' +
      ';\tid: A1\n' +
      ';\tname: Checking\n' +
      ';\tkmymoney-type: 1\n' +
      '; accountid: A404\n' +
      ';\n'
    )
  })

  it('should list only account ids without an accounts index', () => {
    const block = emitter.institution(first(ELEMENTS.institution))
    expect(block).toContain('; accountid: A1\n; accountid: A404\n')
    expect(block).not.toContain(';\t')
  })

  it('should describe payees, cost centers and tags', () => {
    expect(emitter.payee(first(ELEMENTS.payee))).toBe('; --PAYEE--\n; id: P1\n; name: Grocer\n;\n')
    expect(emitter.costCenter(first(ELEMENTS.costCenter))).toBe('; --COSTCENTER--\n; id: C1\n; name: Ops\n;\n')
    expect(emitter.tag(first(ELEMENTS.tag))).toBe('; --TAG--\n; id: G1\n; name: Holiday\n; closed: 0\n;\n')
  })

  it('should fold newlines with the configured separator', () => {
    const custom = new MetadataEmitter({
      document,
      writer: new JournalWriter(),
      text: { newlineSeparator: ' / ' }
    })
    expect(custom.user(first(SECTIONS.user))).toContain('; street: 1 Main St / Flat 2\n')
  })
})
