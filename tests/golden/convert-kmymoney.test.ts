import { describe, it, expect } from 'vitest'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { gzipSync } from 'fflate'
import { pino } from 'pino'
import { createFileConversionService, InMemoryFileProvider } from '../../src/adapters/file/index.js'

describe('Golden Tests: convert household.kmy', () => {
  const fixtures = path.join(process.cwd(), 'tests', 'fixtures')
  const logger = pino({ level: 'silent' })

  async function load(): Promise<{ source: Uint8Array; expected: string }> {
    const source = await fs.readFile(path.join(fixtures, 'household.kmy.xml'))
    const expected = await fs.readFile(path.join(fixtures, 'household.kmy.journal'), 'utf-8')
    return { source: new Uint8Array(source), expected }
  }

  it('writes the expected journal for an uncompressed file', async () => {
    const { source, expected } = await load()
    const files = new InMemoryFileProvider()
    files.put('/books/household.kmy', source)
    const service = createFileConversionService({ logger, fileProvider: files })

    const [result] = await service.convertAll(['/books/household.kmy'])

    expect(result?.status).toBe('converted')
    expect(files.text('/books/household.kmy.journal')).toBe(expected)
  })

  it('writes the same journal for a gzip-compressed file', async () => {
    const { source, expected } = await load()
    const files = new InMemoryFileProvider()
    files.put('/books/household.kmy', gzipSync(source))
    const service = createFileConversionService({ logger, fileProvider: files })

    await service.convertAll(['/books/household.kmy'])

    expect(files.text('/books/household.kmy.journal')).toBe(expected)
  })

  it('reports counts for the converted file', async () => {
    const { source } = await load()
    const files = new InMemoryFileProvider()
    files.put('/books/household.kmy', source)
    const service = createFileConversionService({ logger, fileProvider: files })

    const [result] = await service.convertAll(['/books/household.kmy'])

    expect(result).toMatchObject({
      status: 'converted',
      summary: { accounts: 6, transactions: 3, postings: 4, skippedTransactions: 1 }
    })
  })

  it('leaves payee blocks out when asked to', async () => {
    const { source, expected } = await load()
    const files = new InMemoryFileProvider()
    files.put('/books/household.kmy', source)
    const service = createFileConversionService({ logger, fileProvider: files, includePayees: false })

    await service.convertAll(['/books/household.kmy'])

    const journal = files.text('/books/household.kmy.journal') ?? ''
    expect(journal).not.toContain('; --PAYEE--')
    expect(journal.length).toBeLessThan(expected.length)
  })
})
