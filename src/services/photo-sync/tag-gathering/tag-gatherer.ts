import type { RemoteLibraryClient } from '@root/types/google-photos.types.js'
import type { GatherResult } from '@root/types/photo-sync.types.js'
import type { ItemRecordRepository } from '@services/photo-sync/state/item-record-repository.js'
import {
  addAlbum,
  removeAlbum,
  setInWindow,
  setStarred,
  upsertFromMediaItem,
} from '@services/photo-sync/utils/record-mutations.js'
import type { FastifyBaseLogger } from 'fastify'
import type { AlbumDirectory } from './album-directory.js'
import { searchAllMediaItems } from './search-pager.js'
import {
  buildWindowDateRange,
  computeWindowCutoff,
  isWithinWindow,
} from './window.js'

export interface TagGatherDeps {
  repository: ItemRecordRepository
  remote: Pick<RemoteLibraryClient, 'searchMediaItems'>
  albumDirectory: AlbumDirectory
  logger: FastifyBaseLogger
  windowDays: number
  now: Date
}

export function createEmptyGatherResult(): GatherResult {
  return {
    created: 0,
    starred: 0,
    unstarred: 0,
    windowEntered: 0,
    windowExpired: 0,
    albumAdded: 0,
    albumRemoved: 0,
    missingAlbums: [],
  }
}

/**
 * Re-evaluates window membership of every record from its stored capture
 * time, without asking the remote service. Records without a capture time
 * are left untouched.
 */
export async function recheckWindowMembership(
  deps: Pick<TagGatherDeps, 'repository' | 'logger' | 'windowDays' | 'now'>,
  result: GatherResult,
): Promise<void> {
  const { repository, logger } = deps
  const cutoff = computeWindowCutoff(deps.now, deps.windowDays)

  for (const record of repository.values()) {
    const within = isWithinWindow(record.creationTime, cutoff)
    if (within === null) continue

    if (setInWindow(repository, record, within)) {
      if (within) {
        result.windowEntered++
      } else {
        result.windowExpired++
        logger.debug(`${record.filename} (${record.id}) left the time window`)
      }
    }
  }

  await repository.flush()
}

/**
 * Tags every current favorite and clears the tag on records no longer
 * favorited remotely.
 */
export async function gatherFavorites(
  deps: TagGatherDeps,
  result: GatherResult,
): Promise<void> {
  const { repository, logger } = deps
  logger.info('Gathering favorites')

  const outcome = await searchAllMediaItems(
    deps.remote,
    { filters: { featureFilter: { includedFeatures: ['FAVORITES'] } } },
    (item) => {
      const { record, created } = upsertFromMediaItem(repository, item)
      if (created) result.created++
      if (setStarred(repository, record, true)) result.starred++
    },
    logger,
    'favorites',
  )

  if (outcome.complete) {
    for (const record of repository.values()) {
      if (record.isStarred && !outcome.seenIds.has(record.id)) {
        setStarred(repository, record, false)
        result.unstarred++
      }
    }
  }

  logger.info(`Found ${outcome.seenIds.size} favorites`)
  await repository.flush()
}

/**
 * Tags every item captured inside the trailing window. Items leaving the
 * window are handled by {@link recheckWindowMembership}, not here.
 */
export async function gatherWindow(
  deps: TagGatherDeps,
  result: GatherResult,
): Promise<void> {
  const { repository, logger, windowDays, now } = deps
  logger.info(`Gathering items from the last ${windowDays} days`)

  const cutoff = computeWindowCutoff(now, windowDays)
  const outcome = await searchAllMediaItems(
    deps.remote,
    { filters: { dateFilter: { ranges: [buildWindowDateRange(now, windowDays)] } } },
    (item) => {
      const { record, created } = upsertFromMediaItem(repository, item)
      if (created) result.created++
      // The date filter works on whole days; the stored capture time decides
      // at the edge so the local recheck agrees with this query
      const within = isWithinWindow(record.creationTime, cutoff) ?? true
      if (setInWindow(repository, record, within) && within) {
        result.windowEntered++
      }
    },
    logger,
    'time window',
  )

  logger.info(`Found ${outcome.seenIds.size} items in the time window`)
  await repository.flush()
}

/**
 * Tags every member of the album and removes the album from records that
 * are no longer in it. An album title with no remote match is logged and
 * leaves the mapping untouched.
 */
export async function gatherAlbum(
  title: string,
  deps: TagGatherDeps,
  result: GatherResult,
): Promise<void> {
  const { repository, logger } = deps

  const albumId = await deps.albumDirectory.resolve(title)
  if (!albumId) {
    logger.warn(`Album '${title}' not found in the remote library`)
    result.missingAlbums.push(title)
    return
  }

  logger.info(`Gathering items from album '${title}' (ID=${albumId})`)
  const outcome = await searchAllMediaItems(
    deps.remote,
    { albumId },
    (item) => {
      const { record, created } = upsertFromMediaItem(repository, item)
      if (created) result.created++
      if (addAlbum(repository, record, title)) result.albumAdded++
    },
    logger,
    `album '${title}'`,
  )

  if (outcome.complete) {
    for (const record of repository.values()) {
      if (
        !outcome.seenIds.has(record.id) &&
        removeAlbum(repository, record, title)
      ) {
        result.albumRemoved++
      }
    }
  }

  logger.info(`Found ${outcome.seenIds.size} items in album '${title}'`)
  await repository.flush()
}

/**
 * Runs the full remote → record direction: window recheck, favorites,
 * window query, then each configured album in order.
 *
 * @param shouldStop - checked between queries; a stop leaves every
 * completed query committed
 */
export async function runTagGathering(
  deps: TagGatherDeps,
  albumTitles: readonly string[],
  shouldStop: () => boolean = () => false,
): Promise<GatherResult> {
  const result = createEmptyGatherResult()

  await recheckWindowMembership(deps, result)
  if (shouldStop()) return result

  await gatherFavorites(deps, result)
  if (shouldStop()) return result

  await gatherWindow(deps, result)

  for (const title of albumTitles) {
    if (shouldStop()) return result
    await gatherAlbum(title, deps, result)
  }

  return result
}
