import type { MediaItem } from '@root/types/google-photos.types.js'
import {
  type ItemRecord,
  ROOT_FOLDER,
} from '@root/types/item-record.types.js'
import type { ItemRecordRepository } from '@services/photo-sync/state/item-record-repository.js'

/**
 * Outcome of folding one remote media item into the mapping
 */
export interface UpsertOutcome {
  record: ItemRecord
  created: boolean
}

export function createEmptyRecord(
  id: string,
  filename: string,
  localFolder: string = ROOT_FOLDER,
  creationTime: string | null = null,
): ItemRecord {
  return {
    id,
    filename,
    localFolder,
    isStarred: false,
    inWindow: false,
    albums: new Set(),
    creationTime,
  }
}

/**
 * Returns the record for a remote media item, creating it on first sighting
 * with the capture time from the remote payload.
 *
 * The filename of an existing record is left alone: once a file is on disk
 * its name may carry a collision suffix, and the record must keep pointing
 * at the physical file.
 */
export function upsertFromMediaItem(
  repository: ItemRecordRepository,
  item: MediaItem,
): UpsertOutcome {
  const existing = repository.get(item.id)
  if (existing) {
    if (existing.creationTime === null && item.mediaMetadata?.creationTime) {
      existing.creationTime = item.mediaMetadata.creationTime
      repository.markDirty()
    }
    return { record: existing, created: false }
  }

  const record = createEmptyRecord(
    item.id,
    item.filename,
    ROOT_FOLDER,
    item.mediaMetadata?.creationTime ?? null,
  )
  repository.insert(record)
  return { record, created: true }
}

/**
 * Sets the favorite tag
 *
 * @returns true when the value changed
 */
export function setStarred(
  repository: ItemRecordRepository,
  record: ItemRecord,
  value: boolean,
): boolean {
  if (record.isStarred === value) return false
  record.isStarred = value
  repository.markDirty()
  return true
}

/**
 * Sets the within-window tag
 *
 * @returns true when the value changed
 */
export function setInWindow(
  repository: ItemRecordRepository,
  record: ItemRecord,
  value: boolean,
): boolean {
  if (record.inWindow === value) return false
  record.inWindow = value
  repository.markDirty()
  return true
}

/**
 * @returns true when the album was not yet recorded
 */
export function addAlbum(
  repository: ItemRecordRepository,
  record: ItemRecord,
  title: string,
): boolean {
  if (record.albums.has(title)) return false
  record.albums.add(title)
  repository.markDirty()
  return true
}

/**
 * @returns true when the album was recorded and got removed
 */
export function removeAlbum(
  repository: ItemRecordRepository,
  record: ItemRecord,
  title: string,
): boolean {
  if (!record.albums.delete(title)) return false
  repository.markDirty()
  return true
}

/**
 * Records where the physical file now lives
 */
export function relocate(
  repository: ItemRecordRepository,
  record: ItemRecord,
  folder: string,
  filename: string = record.filename,
): void {
  if (record.localFolder === folder && record.filename === filename) return
  record.localFolder = folder
  record.filename = filename
  repository.markDirty()
}
