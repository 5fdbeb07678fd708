import type { Logger } from 'pino'
import { DocumentTree, NodeHandle } from '../domain/document.js'
import { ENTITY_PATHS, EntityIndex, EntityKind } from '../domain/kmymoney.js'

/**
 * Index every entity of `kind` by its `id` attribute.
 *
 * A missing section gives an empty index. When an id occurs twice the last
 * node wins.
 */
export function indexEntities(
  document: DocumentTree,
  kind: EntityKind,
  logger?: Logger
): EntityIndex {
  const index = new Map<string, NodeHandle>()

  for (const handle of document.findNodes(document.root, ENTITY_PATHS[kind])) {
    const id = document.attribute(handle, 'id')
    if (id === undefined) {
      continue
    }
    if (index.has(id)) {
      logger?.warn({ kind, id }, 'Duplicate entity id, keeping the last one')
    }
    index.set(id, handle)
  }

  return index
}

/**
 * Builds each entity index of a document on first use.
 */
export class EntityIndexer {
  private readonly indexes = new Map<EntityKind, EntityIndex>()

  constructor(
    private readonly document: DocumentTree,
    private readonly logger?: Logger
  ) {}

  get(kind: EntityKind): EntityIndex {
    let index = this.indexes.get(kind)
    if (index === undefined) {
      index = indexEntities(this.document, kind, this.logger)
      this.indexes.set(kind, index)
    }
    return index
  }

  get accounts(): EntityIndex {
    return this.get('accounts')
  }

  get payees(): EntityIndex {
    return this.get('payees')
  }

  get institutions(): EntityIndex {
    return this.get('institutions')
  }

  get transactions(): EntityIndex {
    return this.get('transactions')
  }

  get reports(): EntityIndex {
    return this.get('reports')
  }
}
