import type { ItemRecord } from '@root/types/item-record.types.js'

export interface GatherResult {
  created: number
  starred: number
  unstarred: number
  windowEntered: number
  windowExpired: number
  albumAdded: number
  albumRemoved: number
  missingAlbums: string[]
}

export interface FetchPassResult {
  downloaded: number
  failed: number
}

export interface PushPassResult {
  uploaded: number
  failed: number
  albumLinks: number
}

export interface PlacementPassResult {
  moved: number
  relabelled: number
  failed: number
}

export interface PruneResult {
  removed: number
  fileDeleteFailures: number
}

export type PhotoSyncResult = {
  startedAt: string
  finishedAt: string
  skipped: boolean
  cancelled: boolean
  gather: GatherResult
  fetch: FetchPassResult
  push: PushPassResult
  placement: PlacementPassResult
  prune: PruneResult
}

export interface PhotoSyncStatus {
  running: boolean
  lastRunStartedAt: string | null
  lastRunFinishedAt: string | null
  lastResult: PhotoSyncResult | null
}

/**
 * Settings the sync engine reads on every run
 */
export interface PhotoSyncSettings {
  windowDays: number
  albums: string[]
}

/**
 * Durable snapshot storage for item records
 */
export interface StateStore {
  loadItemRecords(): Promise<Map<string, ItemRecord>>
  saveItemRecords(records: ReadonlyMap<string, ItemRecord>): Promise<void>
}

/**
 * A file found while walking the photos root
 */
export interface LocalFileEntry {
  /** Path relative to the photos root, always '/'-separated */
  relativePath: string
  /** First path segment, or '' for files directly under the root */
  folder: string
  filename: string
}

/**
 * File-system boundary consumed by the sync engine. All paths are relative
 * to the photos root and '/'-separated.
 */
export interface LocalFileStore {
  exists(relativePath: string): Promise<boolean>
  readFile(relativePath: string): Promise<Buffer>
  writeFile(relativePath: string, bytes: Buffer): Promise<void>
  move(fromPath: string, toPath: string): Promise<void>
  delete(relativePath: string): Promise<void>
  setModTime(relativePath: string, time: Date): Promise<void>
  walk(): Promise<LocalFileEntry[]>
}
