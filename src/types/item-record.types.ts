/**
 * Synchronization state for one remote media item, keyed by its remote id
 */
export interface ItemRecord {
  id: string
  /** Base name used both remotely and locally; not unique across records */
  filename: string
  /** Folder the file actually resides in ('' is the photos root) */
  localFolder: string
  isStarred: boolean
  inWindow: boolean
  albums: Set<string>
  /** ISO-8601 capture timestamp, set once when first seen remotely */
  creationTime: string | null
}

/**
 * Shape of an item record as returned by the HTTP API and persisted as JSON
 */
export interface SerializedItemRecord {
  id: string
  filename: string
  localFolder: string
  isStarred: boolean
  inWindow: boolean
  albums: string[]
  creationTime: string | null
}

/**
 * The root folder marker for {@link ItemRecord.localFolder}
 */
export const ROOT_FOLDER = ''

/**
 * A record is retained while at least one retention tag holds.
 * Non-retained records have no right to a local copy.
 */
export function isRetained(record: ItemRecord): boolean {
  return record.isStarred || record.inWindow || record.albums.size > 0
}

export function serializeItemRecord(record: ItemRecord): SerializedItemRecord {
  return {
    id: record.id,
    filename: record.filename,
    localFolder: record.localFolder,
    isStarred: record.isStarred,
    inWindow: record.inWindow,
    albums: [...record.albums].sort(),
    creationTime: record.creationTime,
  }
}

export function deserializeItemRecord(
  serialized: SerializedItemRecord,
): ItemRecord {
  return {
    ...serialized,
    albums: new Set(serialized.albums),
  }
}
