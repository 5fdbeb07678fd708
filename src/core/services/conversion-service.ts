import type { Logger } from 'pino'
import { DocumentSource } from '../ports/document-source.js'
import { JournalSinkFactory } from '../ports/journal-sink.js'
import { ConversionSummary, JournalConverter } from './journal-converter.js'

export const JOURNAL_EXTENSION = '.journal'

export interface ConversionServiceOptions {
  source: DocumentSource
  sinks: JournalSinkFactory
  converter: JournalConverter
  logger: Logger
  extension?: string
}

export type ConversionResult =
  | {
      status: 'converted'
      sourcePath: string
      targetPath: string
      summary: ConversionSummary
    }
  | {
      status: 'failed'
      sourcePath: string
      targetPath: string
      error: Error
    }

export class ConversionService {
  private readonly source: DocumentSource
  private readonly sinks: JournalSinkFactory
  private readonly converter: JournalConverter
  private readonly logger: Logger
  private readonly extension: string

  constructor(options: ConversionServiceOptions) {
    this.source = options.source
    this.sinks = options.sinks
    this.converter = options.converter
    this.logger = options.logger
    this.extension = options.extension ?? JOURNAL_EXTENSION
  }

  targetPath(sourcePath: string): string {
    return `${sourcePath}${this.extension}`
  }

  async convertFile(sourcePath: string): Promise<ConversionSummary> {
    const document = await this.source.load(sourcePath)
    const sink = this.sinks(this.targetPath(sourcePath))
    return this.converter.convert(document, sink, sourcePath)
  }

  /**
   * Convert each file in turn. A failing file is reported and the next one
   * is still converted; output already written for it stays.
   */
  async convertAll(sourcePaths: readonly string[]): Promise<ConversionResult[]> {
    const results: ConversionResult[] = []

    for (const sourcePath of sourcePaths) {
      const targetPath = this.targetPath(sourcePath)
      this.logger.info({ source: sourcePath }, 'Converting')

      try {
        const summary = await this.convertFile(sourcePath)
        this.logger.info({ source: sourcePath, target: targetPath, ...summary }, 'Converted')
        results.push({ status: 'converted', sourcePath, targetPath, summary })
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e))
        this.logger.error({ source: sourcePath, err: error }, 'Conversion failed')
        results.push({ status: 'failed', sourcePath, targetPath, error })
      }
    }

    return results
  }
}
