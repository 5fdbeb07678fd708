import { DocumentTree } from '../domain/document.js'

export interface DocumentSource {
  /**
   * Load and parse the document stored at `path`.
   */
  load(path: string): Promise<DocumentTree>
}
