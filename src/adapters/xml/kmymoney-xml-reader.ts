/**
 * KMyMoney XML reader
 *
 * Reads `.kmy` files (gzip-compressed or plain XML) into a DocumentTree.
 * KMyMoney keeps its data in attributes, so text content is dropped.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { gunzipSync } from 'fflate'
import { DocumentTree, DocumentTreeBuilder, NodeHandle } from '../../core/domain/document.js'
import { DocumentFormatError } from '../../core/errors/document-format-error.js'
import { DocumentSource } from '../../core/ports/document-source.js'
import { FileProvider, NodeFileProvider } from '../file/file-provider.js'

// fast-xml-parser keeps attributes of an ordered element under this key
const ATTRIBUTES_KEY = ':@'
const TEXT_KEY = '#text'

const WHITESPACE_CONTROLS = /[\t\n\r]/g
const OTHER_CONTROLS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b
}

/**
 * Decode file bytes to text, inflating gzip data first.
 */
export function decodeDocument(data: Uint8Array): string {
  const bytes = isGzip(data) ? gunzipSync(data) : data
  return new TextDecoder('utf-8').decode(bytes)
}

/**
 * Remove control characters before parsing. Line breaks and tabs become
 * spaces so attributes split across lines stay separated.
 */
export function stripControlCharacters(xml: string): string {
  return xml.replace(WHITESPACE_CONTROLS, ' ').replace(OTHER_CONTROLS, '')
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {}
  if (!isRecord(raw)) {
    return attributes
  }
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      attributes[name] = value
    }
  }
  return attributes
}

function appendElements(builder: DocumentTreeBuilder, parent: NodeHandle, elements: unknown): void {
  if (!Array.isArray(elements)) {
    return
  }
  for (const element of elements) {
    if (!isRecord(element)) {
      continue
    }
    const attributes = readAttributes(element[ATTRIBUTES_KEY])
    for (const [tag, children] of Object.entries(element)) {
      if (tag === ATTRIBUTES_KEY || tag === TEXT_KEY) {
        continue
      }
      const handle = builder.addNode(parent, tag, attributes)
      appendElements(builder, handle, children)
    }
  }
}

/**
 * Parse KMyMoney XML (as text, or file bytes that may be gzip-compressed).
 */
export function parseKMyMoneyXml(data: Uint8Array | string): DocumentTree {
  const raw = typeof data === 'string' ? data : decodeDocument(data)
  const xml = stripControlCharacters(raw)

  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    throw new DocumentFormatError(
      `Invalid KMyMoney XML: ${validation.err.msg}`,
      validation.err.line,
      validation.err.col
    )
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseAttributeValue: false,
    parseTagValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    htmlEntities: true
  })

  const parsed: unknown = parser.parse(xml)
  const builder = new DocumentTreeBuilder()
  appendElements(builder, builder.root, parsed)
  return builder.build()
}

export interface KMyMoneyXmlReaderOptions {
  fileProvider?: FileProvider
}

export class KMyMoneyXmlReader implements DocumentSource {
  private readonly fileProvider: FileProvider

  constructor(options: KMyMoneyXmlReaderOptions = {}) {
    this.fileProvider = options.fileProvider ?? new NodeFileProvider()
  }

  async load(path: string): Promise<DocumentTree> {
    const data = await this.fileProvider.read(path)
    return parseKMyMoneyXml(data)
  }
}
