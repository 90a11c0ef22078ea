/**
 * Local File Store Service
 *
 * File-system access for the local photo mirror. Every path handed to this
 * service is relative to the configured photos root and '/'-separated, so the
 * sync engine never deals with platform separators or absolute paths.
 */
import { constants as fsConstants } from 'node:fs'
import fs from 'node:fs/promises'
import path from 'node:path'
import type {
  LocalFileEntry,
  LocalFileStore,
} from '@root/types/photo-sync.types.js'

export class LocalFileStoreService implements LocalFileStore {
  private readonly root: string

  constructor(root: string) {
    this.root = path.resolve(root)
  }

  get rootPath(): string {
    return this.root
  }

  /**
   * Resolves a root-relative path to an absolute one, refusing paths that
   * would escape the photos root.
   */
  resolve(relativePath: string): string {
    const absolute = path.resolve(this.root, ...relativePath.split('/'))
    const fromRoot = path.relative(this.root, absolute)
    if (
      fromRoot === '' ||
      fromRoot.startsWith('..') ||
      path.isAbsolute(fromRoot)
    ) {
      throw new Error(`Path escapes the photos root: ${relativePath}`)
    }
    return absolute
  }

  async ensureRoot(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true })
  }

  /**
   * True when the root directory exists and is writable
   */
  async isRootWritable(): Promise<boolean> {
    try {
      await fs.access(this.root, fsConstants.W_OK)
      return true
    } catch {
      return false
    }
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(relativePath))
      return true
    } catch {
      return false
    }
  }

  async readFile(relativePath: string): Promise<Buffer> {
    return fs.readFile(this.resolve(relativePath))
  }

  async writeFile(relativePath: string, bytes: Buffer): Promise<void> {
    const target = this.resolve(relativePath)
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, bytes)
  }

  async move(fromPath: string, toPath: string): Promise<void> {
    const target = this.resolve(toPath)
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.rename(this.resolve(fromPath), target)
  }

  async delete(relativePath: string): Promise<void> {
    await fs.unlink(this.resolve(relativePath))
  }

  async setModTime(relativePath: string, time: Date): Promise<void> {
    await fs.utimes(this.resolve(relativePath), time, time)
  }

  /**
   * Recursively lists every regular file below the root, skipping hidden
   * files and directories. Entries are sorted by relative path.
   */
  async walk(): Promise<LocalFileEntry[]> {
    const entries: LocalFileEntry[] = []

    const visit = async (segments: string[]): Promise<void> => {
      const directory = path.join(this.root, ...segments)
      const dirents = await fs.readdir(directory, { withFileTypes: true })

      for (const dirent of dirents) {
        if (dirent.name.startsWith('.')) continue

        if (dirent.isDirectory()) {
          await visit([...segments, dirent.name])
        } else if (dirent.isFile()) {
          entries.push({
            relativePath: [...segments, dirent.name].join('/'),
            folder: segments[0] ?? '',
            filename: dirent.name,
          })
        }
      }
    }

    try {
      await visit([])
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return []
      }
      throw error
    }

    // Code-unit order, independent of the host locale
    return entries.sort((a, b) =>
      a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0,
    )
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
