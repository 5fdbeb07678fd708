import { JournalSink } from '../../core/ports/journal-sink.js'
import { FileProvider, NodeFileProvider } from './file-provider.js'

export class FileJournalSink implements JournalSink {
  constructor(
    readonly path: string,
    private readonly fileProvider: FileProvider = new NodeFileProvider()
  ) {}

  async write(content: string, append: boolean): Promise<void> {
    if (append) {
      await this.fileProvider.append(this.path, content)
    } else {
      await this.fileProvider.write(this.path, content)
    }
  }
}
