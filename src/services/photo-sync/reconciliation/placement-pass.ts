import type {
  LocalFileStore,
  PlacementPassResult,
} from '@root/types/photo-sync.types.js'
import { resolvePlacement } from '@services/photo-sync/placement/placement-resolver.js'
import type { ItemRecordRepository } from '@services/photo-sync/state/item-record-repository.js'
import { PathClaims } from '@services/photo-sync/utils/path-claims.js'
import { computeLocalPath } from '@services/photo-sync/utils/paths.js'
import { relocate } from '@services/photo-sync/utils/record-mutations.js'
import type { FastifyBaseLogger } from 'fastify'

export interface PlacementPassDeps {
  repository: ItemRecordRepository
  files: LocalFileStore
  logger: FastifyBaseLogger
  shouldStop?: () => boolean
}

/**
 * Moves every record whose canonical folder differs from where its file
 * lives. A record with no file on disk, or pointing at a file another record
 * owns, only has its folder updated, under a name no other record holds.
 */
export async function runPlacementPass(
  deps: PlacementPassDeps,
): Promise<PlacementPassResult> {
  const { repository, files, logger } = deps
  const result: PlacementPassResult = { moved: 0, relabelled: 0, failed: 0 }
  const claims = PathClaims.fromRecords(repository.values())

  for (const record of repository.values()) {
    if (deps.shouldStop?.()) break

    const desiredFolder = resolvePlacement(record)
    if (desiredFolder === record.localFolder) continue

    const oldPath = computeLocalPath(record.localFolder, record.filename)

    try {
      const filename = await claims.findFreeFilename(
        files,
        desiredFolder,
        record.filename,
        record.id,
      )
      const newPath = computeLocalPath(desiredFolder, filename)

      if (!claims.owns(record) || !(await files.exists(oldPath))) {
        relocate(repository, record, desiredFolder, filename)
        claims.release(oldPath, record.id)
        claims.claim(newPath, record.id)
        result.relabelled++
        continue
      }

      logger.info(`Moving file from ${oldPath} to ${newPath}`)
      await files.move(oldPath, newPath)
      relocate(repository, record, desiredFolder, filename)
      claims.release(oldPath, record.id)
      claims.claim(newPath, record.id)
      result.moved++
    } catch (error) {
      result.failed++
      logger.error(
        { error, mediaItemId: record.id },
        `Failed to move ${oldPath} to folder '${desiredFolder}'`,
      )
    }
  }

  await repository.flush()
  return result
}
