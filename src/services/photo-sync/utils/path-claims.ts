import type { ItemRecord } from '@root/types/item-record.types.js'
import type { LocalFileStore } from '@root/types/photo-sync.types.js'
import { computeLocalPath, splitFilename } from '@services/photo-sync/utils/paths.js'

/**
 * Which record owns each local path.
 *
 * File names are not unique, so two records can point at the same folder and
 * name. The file on disk belongs to the first of them in record order; every
 * other record pointing there is treated as having no local copy, and the
 * passes never read, move or delete that file on its behalf.
 */
export class PathClaims {
  private readonly owners = new Map<string, string>()

  static fromRecords(records: Iterable<ItemRecord>): PathClaims {
    const claims = new PathClaims()
    for (const record of records) {
      const path = computeLocalPath(record.localFolder, record.filename)
      if (!claims.owners.has(path)) {
        claims.owners.set(path, record.id)
      }
    }
    return claims
  }

  ownerOf(path: string): string | undefined {
    return this.owners.get(path)
  }

  /** True when the record's current path is its own */
  owns(record: ItemRecord): boolean {
    const path = computeLocalPath(record.localFolder, record.filename)
    return this.owners.get(path) === record.id
  }

  claim(path: string, id: string): void {
    this.owners.set(path, id)
  }

  /** Drops the claim if `id` holds it */
  release(path: string, id: string): void {
    if (this.owners.get(path) === id) {
      this.owners.delete(path)
    }
  }

  /**
   * Picks a name in the folder that is neither on disk nor claimed by another
   * record: the name itself, then `stem(1).ext`, `stem(2).ext`, …
   */
  async findFreeFilename(
    files: Pick<LocalFileStore, 'exists'>,
    folder: string,
    filename: string,
    id: string,
  ): Promise<string> {
    const isFree = async (candidate: string) => {
      const path = computeLocalPath(folder, candidate)
      const owner = this.owners.get(path)
      if (owner !== undefined && owner !== id) return false
      return !(await files.exists(path))
    }

    if (await isFree(filename)) return filename

    const { stem, ext } = splitFilename(filename)
    for (let counter = 1; ; counter++) {
      const candidate = `${stem}(${counter})${ext}`
      if (await isFree(candidate)) return candidate
    }
  }
}
