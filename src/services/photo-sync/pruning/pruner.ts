import type { ItemRecord } from '@root/types/item-record.types.js'
import { isRetained } from '@root/types/item-record.types.js'
import type {
  LocalFileStore,
  PruneResult,
} from '@root/types/photo-sync.types.js'
import type { ItemRecordRepository } from '@services/photo-sync/state/item-record-repository.js'
import { PathClaims } from '@services/photo-sync/utils/path-claims.js'
import { computeLocalPath } from '@services/photo-sync/utils/paths.js'
import type { FastifyBaseLogger } from 'fastify'

export interface PruneDeps {
  repository: ItemRecordRepository
  files: Pick<LocalFileStore, 'exists' | 'delete'>
  logger: FastifyBaseLogger
}

/**
 * Deletes the local file of a record, if present
 *
 * @returns false when the file existed but could not be deleted
 */
async function deleteLocalCopy(
  record: ItemRecord,
  deps: PruneDeps,
): Promise<boolean> {
  const path = computeLocalPath(record.localFolder, record.filename)
  try {
    if (!(await deps.files.exists(path))) {
      return true
    }
    await deps.files.delete(path)
    deps.logger.info(`Deleted local file: ${path}`)
    return true
  } catch (error) {
    deps.logger.error(
      { error, mediaItemId: record.id },
      `Error deleting ${path}`,
    )
    return false
  }
}

/**
 * Removes every record that satisfies no retention tag, together with its
 * local file. A file owned by another record stays on disk; a failed file
 * delete is logged and the record is dropped anyway.
 */
export async function runPrune(deps: PruneDeps): Promise<PruneResult> {
  const { repository, logger } = deps
  const result: PruneResult = { removed: 0, fileDeleteFailures: 0 }

  const candidates = repository.values().filter((record) => !isRetained(record))
  if (candidates.length === 0) {
    logger.info('No files to remove')
    return result
  }

  const claims = PathClaims.fromRecords(repository.values())

  logger.info(`Cleaning up ${candidates.length} items no longer needed`)
  for (const record of candidates) {
    if (!claims.owns(record)) {
      const path = computeLocalPath(record.localFolder, record.filename)
      logger.debug(
        { mediaItemId: record.id },
        `Keeping ${path}: the file belongs to ${claims.ownerOf(path)}`,
      )
    } else if (!(await deleteLocalCopy(record, deps))) {
      result.fileDeleteFailures++
    }
    repository.delete(record.id)
    result.removed++
  }

  await repository.flush()
  return result
}
