import type { Logger } from 'pino'
import { ConversionService } from '../../core/services/conversion-service.js'
import { JournalConverter, JournalConverterOptions } from '../../core/services/journal-converter.js'
import { KMyMoneyXmlReader } from '../xml/kmymoney-xml-reader.js'
import { FileJournalSink } from './file-journal-sink.js'
import { FileProvider, NodeFileProvider } from './file-provider.js'

export { FileJournalSink } from './file-journal-sink.js'
export { type FileProvider, NodeFileProvider, InMemoryFileProvider } from './file-provider.js'

export interface CreateFileConversionServiceOptions extends Omit<JournalConverterOptions, 'logger'> {
  logger: Logger

  /**
   * Suffix added to the source path to name the journal.
   */
  extension?: string

  /**
   * Custom file provider, used for both reading and writing.
   * Uses NodeFileProvider by default.
   */
  fileProvider?: FileProvider
}

/**
 * Create a ConversionService that reads KMyMoney files and writes the
 * journals next to them.
 *
 * @example
 * ```typescript
 * const service = createFileConversionService({ logger: pino() })
 * await service.convertAll(['./household.kmy'])
 * // writes ./household.kmy.journal
 * ```
 */
export function createFileConversionService(
  options: CreateFileConversionServiceOptions
): ConversionService {
  const fileProvider = options.fileProvider ?? new NodeFileProvider()

  return new ConversionService({
    source: new KMyMoneyXmlReader({ fileProvider }),
    sinks: (targetPath) => new FileJournalSink(targetPath, fileProvider),
    converter: new JournalConverter({
      logger: options.logger,
      writer: options.writer,
      text: options.text,
      amountFormat: options.amountFormat,
      includePayees: options.includePayees
    }),
    logger: options.logger,
    extension: options.extension
  })
}
