import type { RemoteLibraryClient } from '@root/types/google-photos.types.js'
import { isRetained } from '@root/types/item-record.types.js'
import type {
  FetchPassResult,
  LocalFileStore,
} from '@root/types/photo-sync.types.js'
import type { ItemRecordRepository } from '@services/photo-sync/state/item-record-repository.js'
import { PathClaims } from '@services/photo-sync/utils/path-claims.js'
import { computeLocalPath } from '@services/photo-sync/utils/paths.js'
import { relocate } from '@services/photo-sync/utils/record-mutations.js'
import { isValid, parseISO } from 'date-fns'
import type { FastifyBaseLogger } from 'fastify'

export interface FetchPassDeps {
  repository: ItemRecordRepository
  remote: Pick<RemoteLibraryClient, 'getMediaItem' | 'downloadMediaItem'>
  files: LocalFileStore
  logger: FastifyBaseLogger
  shouldStop?: () => boolean
}

/**
 * Downloads every retained record whose file is missing into the record's
 * current folder. A record pointing at a path another record owns counts
 * as missing and is downloaded under a disambiguated name. Failures are
 * logged and leave the record untouched for the next run.
 */
export async function runFetchPass(
  deps: FetchPassDeps,
): Promise<FetchPassResult> {
  const { repository, remote, files, logger } = deps
  const result: FetchPassResult = { downloaded: 0, failed: 0 }
  const claims = PathClaims.fromRecords(repository.values())

  for (const record of repository.values()) {
    if (deps.shouldStop?.()) break
    if (!isRetained(record)) continue

    const currentPath = computeLocalPath(record.localFolder, record.filename)

    try {
      if (claims.owns(record) && (await files.exists(currentPath))) continue

      const item = await remote.getMediaItem(record.id)
      if (!item) {
        logger.warn(
          { mediaItemId: record.id },
          `Media item for ${record.filename} not found remotely; skipping download`,
        )
        result.failed++
        continue
      }

      const bytes = await remote.downloadMediaItem(item)
      const filename = await claims.findFreeFilename(
        files,
        record.localFolder,
        record.filename,
        record.id,
      )
      const targetPath = computeLocalPath(record.localFolder, filename)
      await files.writeFile(targetPath, bytes)

      const captureTime = parseISO(
        item.mediaMetadata?.creationTime ?? record.creationTime ?? '',
      )
      if (isValid(captureTime)) {
        try {
          await files.setModTime(targetPath, captureTime)
        } catch (error) {
          logger.warn({ error, path: targetPath }, 'Failed to set file mtime')
        }
      }

      if (filename !== record.filename) {
        logger.info(
          `Name collision for ${currentPath}; stored as ${filename} instead`,
        )
        relocate(repository, record, record.localFolder, filename)
      }
      claims.claim(targetPath, record.id)

      result.downloaded++
      logger.info(`Downloaded item ${record.id} -> ${targetPath}`)
    } catch (error) {
      result.failed++
      logger.error(
        { error, mediaItemId: record.id },
        `Failed to download ${record.filename}`,
      )
    }
  }

  await repository.flush()
  return result
}
