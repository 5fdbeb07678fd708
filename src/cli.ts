import type { Logger } from 'pino'
import { converterOptions, loadConfig } from './config.js'
import { createLogger } from './logger.js'
import { createFileConversionService } from './adapters/file/index.js'
import { FileProvider } from './adapters/file/file-provider.js'

export interface CliOptions {
  env?: Record<string, string | undefined>
  stdout?: { write(text: string): unknown }
  fileProvider?: FileProvider
  logger?: Logger
}

export function usage(extension: string): string {
  return 'Usage: kmy2journal pathname [pathname ...]\n\n' +
    'Converts KMyMoney file format to hledger. Output files are postfixed with a ' +
    `${extension} file extension.\n`
}

/**
 * Convert every path given on the command line.
 *
 * @returns the process exit code: 0 when all files converted, 1 otherwise
 */
export async function run(args: readonly string[], options: CliOptions = {}): Promise<number> {
  const config = loadConfig(options.env)
  const stdout = options.stdout ?? process.stdout

  if (args.length === 0) {
    stdout.write(usage(config.JOURNAL_EXTENSION))
    return 0
  }

  const logger = options.logger ?? createLogger(config.LOG_LEVEL)
  const service = createFileConversionService({
    ...converterOptions(config),
    logger,
    extension: config.JOURNAL_EXTENSION,
    fileProvider: options.fileProvider
  })

  const results = await service.convertAll(args)
  const failed = results.filter(result => result.status === 'failed').length
  if (failed > 0) {
    logger.warn({ failed, total: results.length }, 'Some files were not converted')
    return 1
  }
  return 0
}
