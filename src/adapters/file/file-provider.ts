/**
 * Abstract file system provider.
 * Implement this interface for other storage than the local disk.
 */
export interface FileProvider {
  /**
   * Read file contents as raw bytes
   */
  read(path: string): Promise<Uint8Array>

  /**
   * Replace the file contents, creating the file if needed
   */
  write(path: string, content: string): Promise<void>

  /**
   * Add to the end of the file, creating it if needed
   */
  append(path: string, content: string): Promise<void>
}

/**
 * Node.js file system provider
 */
export class NodeFileProvider implements FileProvider {
  private fs: typeof import('node:fs/promises') | null = null

  private async getFs() {
    if (!this.fs) {
      this.fs = await import('node:fs/promises')
    }
    return this.fs
  }

  async read(path: string): Promise<Uint8Array> {
    const fs = await this.getFs()
    return fs.readFile(path)
  }

  async write(path: string, content: string): Promise<void> {
    const fs = await this.getFs()
    await fs.writeFile(path, content, 'utf-8')
  }

  async append(path: string, content: string): Promise<void> {
    const fs = await this.getFs()
    await fs.appendFile(path, content, 'utf-8')
  }
}

/**
 * In-memory file provider (useful for testing)
 */
export class InMemoryFileProvider implements FileProvider {
  private files = new Map<string, Uint8Array>()
  private readonly encoder = new TextEncoder()
  private readonly decoder = new TextDecoder('utf-8')

  async read(path: string): Promise<Uint8Array> {
    const content = this.files.get(path)
    if (content === undefined) {
      throw new Error(`ENOENT: no such file: ${path}`)
    }
    return content
  }

  async write(path: string, content: string): Promise<void> {
    this.files.set(path, this.encoder.encode(content))
  }

  async append(path: string, content: string): Promise<void> {
    const existing = this.files.get(path) ?? new Uint8Array()
    const added = this.encoder.encode(content)
    const combined = new Uint8Array(existing.length + added.length)
    combined.set(existing)
    combined.set(added, existing.length)
    this.files.set(path, combined)
  }

  // Helpers for testing
  put(path: string, content: string | Uint8Array): void {
    this.files.set(path, typeof content === 'string' ? this.encoder.encode(content) : content)
  }

  text(path: string): string | undefined {
    const content = this.files.get(path)
    return content === undefined ? undefined : this.decoder.decode(content)
  }

  has(path: string): boolean {
    return this.files.has(path)
  }
}
