// Domain
export {
  DocumentTree,
  DocumentTreeBuilder,
  type DocumentNode,
  type NodeHandle,
  type NodeAttributes,
  type NodePath
} from './domain/document.js'
export {
  type AccountKind,
  TOP_LEVEL_ACCOUNTS,
  isTopLevelAccount,
  topLevelAccountKind
} from './domain/account.js'
export {
  type EntityKind,
  type EntityIndex,
  ENTITY_PATHS,
  ELEMENTS,
  SECTIONS
} from './domain/kmymoney.js'
export * from './domain/journal.js'

// Ports
export { type JournalSink, type JournalSinkFactory } from './ports/journal-sink.js'
export { type DocumentSource } from './ports/document-source.js'

// Services
export { EntityIndexer, indexEntities } from './services/entity-indexer.js'
export { AccountPathResolver, type PathMode, type AccountPathResolverOptions } from './services/account-path-resolver.js'
export { TransactionEmitter, type TransactionEmitterOptions, type EmittedTransaction } from './services/transaction-emitter.js'
export { AccountEmitter, type AccountEmitterOptions } from './services/account-emitter.js'
export { MetadataEmitter, type MetadataEmitterOptions } from './services/metadata-emitter.js'
export { JournalConverter, type JournalConverterOptions, type ConversionSummary } from './services/journal-converter.js'
export {
  ConversionService,
  type ConversionServiceOptions,
  type ConversionResult,
  JOURNAL_EXTENSION
} from './services/conversion-service.js'

// Serializer
export { JournalWriter, type JournalWriterOptions } from './serializer/journal-writer.js'

// Errors
export { MalformedExpressionError } from './errors/malformed-expression-error.js'
export { DocumentFormatError } from './errors/document-format-error.js'

// Utils
export { Decimal, type AmountFormat, DEFAULT_AMOUNT_FORMAT, formatAmount } from './utils/decimal.js'
export { parseFraction, evaluateFraction } from './utils/fraction.js'
export {
  type TextOptions,
  NEWLINE_SEPARATOR,
  escapeText,
  formatName,
  foldNewlines,
  capitalize,
  isBlank
} from './utils/text.js'
