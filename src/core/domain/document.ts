/**
 * Handle of a node inside a {@link DocumentTree}.
 */
export type NodeHandle = number

export type NodeAttributes = Readonly<Record<string, string>>

/**
 * Tag names leading from a node down to its descendants, one level per entry.
 */
export type NodePath = readonly string[]

export interface DocumentNode {
  readonly tag: string
  readonly attributes: NodeAttributes
  readonly children: readonly NodeHandle[]
}

/**
 * Read-only element tree kept as an arena of nodes.
 *
 * Handle 0 is a synthetic root without tag or attributes; the top-level
 * elements of the source are its children.
 */
export class DocumentTree {
  static readonly ROOT: NodeHandle = 0

  private readonly nodes: readonly DocumentNode[]

  constructor(nodes: readonly DocumentNode[]) {
    if (nodes.length === 0) {
      throw new Error('Document tree needs a root node')
    }
    this.nodes = nodes
  }

  get root(): NodeHandle {
    return DocumentTree.ROOT
  }

  get size(): number {
    return this.nodes.length
  }

  tag(handle: NodeHandle): string {
    return this.node(handle).tag
  }

  attributes(handle: NodeHandle): NodeAttributes {
    return this.node(handle).attributes
  }

  attribute(handle: NodeHandle, name: string): string | undefined {
    const attributes = this.node(handle).attributes
    return Object.prototype.hasOwnProperty.call(attributes, name) ? attributes[name] : undefined
  }

  children(handle: NodeHandle): readonly NodeHandle[] {
    return this.node(handle).children
  }

  hasDescendant(handle: NodeHandle, path: NodePath): boolean {
    return this.findNode(handle, path) !== undefined
  }

  findNode(handle: NodeHandle, path: NodePath): NodeHandle | undefined {
    return this.findNodes(handle, path)[0]
  }

  /**
   * All nodes reached by following `path` from `handle`, in document order.
   */
  findNodes(handle: NodeHandle, path: NodePath): NodeHandle[] {
    let current: NodeHandle[] = [handle]

    for (const tag of path) {
      const next: NodeHandle[] = []
      for (const parent of current) {
        for (const child of this.node(parent).children) {
          if (this.node(child).tag === tag) {
            next.push(child)
          }
        }
      }
      if (next.length === 0) {
        return []
      }
      current = next
    }

    return current
  }

  private node(handle: NodeHandle): DocumentNode {
    const node = this.nodes[handle]
    if (node === undefined) {
      throw new RangeError(`Unknown node handle: ${handle}`)
    }
    return node
  }
}

interface MutableNode {
  tag: string
  attributes: Record<string, string>
  children: NodeHandle[]
}

export class DocumentTreeBuilder {
  private readonly nodes: MutableNode[] = [{ tag: '', attributes: {}, children: [] }]

  get root(): NodeHandle {
    return DocumentTree.ROOT
  }

  addNode(
    parent: NodeHandle,
    tag: string,
    attributes: Readonly<Record<string, string>> = {}
  ): NodeHandle {
    const parentNode = this.nodes[parent]
    if (parentNode === undefined) {
      throw new RangeError(`Unknown parent handle: ${parent}`)
    }
    const handle = this.nodes.length
    this.nodes.push({ tag, attributes: { ...attributes }, children: [] })
    parentNode.children.push(handle)
    return handle
  }

  build(): DocumentTree {
    return new DocumentTree(
      this.nodes.map((node) => Object.freeze({
        tag: node.tag,
        attributes: Object.freeze({ ...node.attributes }),
        children: Object.freeze([...node.children])
      }))
    )
  }
}
