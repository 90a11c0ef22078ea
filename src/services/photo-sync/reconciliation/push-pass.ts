import type { RemoteLibraryClient } from '@root/types/google-photos.types.js'
import type {
  LocalFileEntry,
  LocalFileStore,
  PushPassResult,
} from '@root/types/photo-sync.types.js'
import type { ItemRecordRepository } from '@services/photo-sync/state/item-record-repository.js'
import type { AlbumDirectory } from '@services/photo-sync/tag-gathering/album-directory.js'
import {
  computeWindowCutoff,
  isWithinWindow,
} from '@services/photo-sync/tag-gathering/window.js'
import {
  computeLocalPath,
  isMediaFile,
} from '@services/photo-sync/utils/paths.js'
import {
  addAlbum,
  createEmptyRecord,
  relocate,
} from '@services/photo-sync/utils/record-mutations.js'
import type { FastifyBaseLogger } from 'fastify'

export interface PushPassDeps {
  repository: ItemRecordRepository
  remote: Pick<
    RemoteLibraryClient,
    'uploadBytes' | 'finalizeUpload' | 'addMediaItemToAlbum'
  >
  files: LocalFileStore
  albumDirectory: AlbumDirectory
  /** Configured album titles; only these folders are linked to albums */
  trackedAlbums: readonly string[]
  logger: FastifyBaseLogger
  windowDays: number
  now: Date
  shouldStop?: () => boolean
}

/**
 * Resolves a folder name to a remote album id when the folder names a
 * configured album that exists remotely
 */
async function resolveAlbumFolder(
  folder: string,
  deps: PushPassDeps,
): Promise<string | null> {
  if (!folder || !deps.trackedAlbums.includes(folder)) {
    return null
  }
  return deps.albumDirectory.resolve(folder)
}

/**
 * Links the media item to the album remotely and records the membership
 *
 * @returns true when the link succeeded
 */
async function linkToAlbum(
  recordId: string,
  title: string,
  albumId: string,
  deps: PushPassDeps,
): Promise<boolean> {
  const { repository, logger } = deps
  const record = repository.get(recordId)
  if (!record) return false

  try {
    await deps.remote.addMediaItemToAlbum(albumId, recordId)
  } catch (error) {
    logger.error(
      { error, mediaItemId: recordId, albumId },
      `Failed to add ${record.filename} to album '${title}'`,
    )
    return false
  }

  addAlbum(repository, record, title)
  logger.info(`Added ${record.filename} to album '${title}'`)
  return true
}

/**
 * Uploads one untracked local file and creates its record
 *
 * @returns the new record id, or null when the upload failed
 */
async function uploadNewFile(
  entry: LocalFileEntry,
  deps: PushPassDeps,
): Promise<string | null> {
  const { repository, remote, files, logger } = deps
  logger.info(`New local file found, uploading: ${entry.relativePath}`)

  let mediaItemId: string
  let creationTime: string | null
  try {
    const bytes = await files.readFile(entry.relativePath)
    const uploadToken = await remote.uploadBytes(entry.filename, bytes)
    const item = await remote.finalizeUpload(uploadToken, entry.filename)
    mediaItemId = item.id
    creationTime = item.mediaMetadata?.creationTime ?? null
  } catch (error) {
    logger.error(
      { error, path: entry.relativePath },
      `Failed to upload ${entry.relativePath}`,
    )
    return null
  }

  const existing = repository.get(mediaItemId)
  if (existing) {
    // The remote library deduplicates identical uploads and hands back the
    // id of the item we already track
    const existingPath = computeLocalPath(existing.localFolder, existing.filename)
    if (await files.exists(existingPath)) {
      logger.info(
        { mediaItemId },
        `${entry.relativePath} duplicates ${existingPath}; removing the extra copy`,
      )
      await files.delete(entry.relativePath)
    } else {
      relocate(repository, existing, entry.folder, entry.filename)
    }
    return mediaItemId
  }

  const record = createEmptyRecord(
    mediaItemId,
    entry.filename,
    entry.folder,
    creationTime,
  )
  record.inWindow =
    isWithinWindow(creationTime, computeWindowCutoff(deps.now, deps.windowDays)) ??
    false
  repository.insert(record)
  return mediaItemId
}

/**
 * Uploads every untracked local media file, then makes sure every record
 * sitting in a configured album folder is a member of that album remotely.
 */
export async function runPushPass(deps: PushPassDeps): Promise<PushPassResult> {
  const { repository, files, logger } = deps
  const result: PushPassResult = { uploaded: 0, failed: 0, albumLinks: 0 }

  const knownPaths = new Set(
    repository
      .values()
      .map((record) => computeLocalPath(record.localFolder, record.filename)),
  )

  let entries: LocalFileEntry[] = []
  try {
    entries = await files.walk()
  } catch (error) {
    logger.error({ error }, 'Failed to scan the local photos folder')
  }

  for (const entry of entries) {
    if (deps.shouldStop?.()) break
    if (!isMediaFile(entry.filename) || knownPaths.has(entry.relativePath)) {
      continue
    }

    let mediaItemId: string | null
    try {
      mediaItemId = await uploadNewFile(entry, deps)
    } catch (error) {
      logger.error(
        { error, path: entry.relativePath },
        `Failed to record upload of ${entry.relativePath}`,
      )
      mediaItemId = null
    }

    if (!mediaItemId) {
      result.failed++
      continue
    }
    result.uploaded++
    knownPaths.add(entry.relativePath)

    const albumId = await resolveAlbumFolder(entry.folder, deps)
    if (albumId && (await linkToAlbum(mediaItemId, entry.folder, albumId, deps))) {
      result.albumLinks++
    }
  }

  // A record can reach an album folder before the album confirms it: via an
  // upload above, or a placement move from an earlier run
  for (const record of repository.values()) {
    if (deps.shouldStop?.()) break
    const folder = record.localFolder
    if (!folder || record.albums.has(folder)) continue

    const albumId = await resolveAlbumFolder(folder, deps)
    if (!albumId) continue

    logger.info(`Ensuring item ${record.id} is in album '${folder}'`)
    if (await linkToAlbum(record.id, folder, albumId, deps)) {
      result.albumLinks++
    }
  }

  await repository.flush()
  return result
}
