import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

/**
 * Abstract file system provider.
 * Implement this interface for other environments or storage backends.
 */
export interface FileProvider {
  /**
   * Read file contents as string
   * @returns File contents, or null if the file doesn't exist
   */
  read(path: string): Promise<string | null>

  /**
   * Replace the file's contents. Readers see either the old or the new
   * contents, never a mix.
   */
  write(path: string, content: string): Promise<void>

  /**
   * Get file metadata
   */
  stat(path: string): Promise<{ lastModified: Date } | null>
}

/**
 * Node.js file system provider
 */
export class NodeFileProvider implements FileProvider {
  async read(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8')
    } catch (e) {
      if (isNotFound(e)) {
        return null
      }
      throw e
    }
  }

  async write(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true })
    // Write to temp file first, then rename (atomic)
    const tempPath = `${path}.tmp`
    await writeFile(tempPath, content, 'utf-8')
    await rename(tempPath, path)
  }

  async stat(path: string): Promise<{ lastModified: Date } | null> {
    try {
      const stats = await stat(path)
      return { lastModified: stats.mtime }
    } catch (e) {
      if (isNotFound(e)) {
        return null
      }
      throw e
    }
  }
}

/**
 * In-memory file provider (useful for testing)
 */
export class InMemoryFileProvider implements FileProvider {
  private files = new Map<string, { content: string; lastModified: Date }>()
  private writes = 0

  async read(path: string): Promise<string | null> {
    return this.files.get(path)?.content ?? null
  }

  async write(path: string, content: string): Promise<void> {
    // Distinct timestamps per write so stat() always reflects a change
    this.writes++
    this.files.set(path, { content, lastModified: new Date(this.writes) })
  }

  async stat(path: string): Promise<{ lastModified: Date } | null> {
    const file = this.files.get(path)
    return file ? { lastModified: file.lastModified } : null
  }

  // Helper for testing
  clear(): void {
    this.files.clear()
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}
