import type {
  MediaItem,
  MediaItemSearchFilter,
  RemoteLibraryClient,
} from '@root/types/google-photos.types.js'
import type { FastifyBaseLogger } from 'fastify'

export interface SearchOutcome {
  /** Ids of every item returned across all pages fetched */
  seenIds: Set<string>
  /** False when a page request failed before the last page */
  complete: boolean
}

/**
 * Walks every page of a media item search, handing each item to `onItem`.
 *
 * A failed page ends the walk; items seen before the failure have already
 * been handed over, and the outcome reports the result as incomplete so the
 * caller can skip any step that relies on the full result set.
 */
export async function searchAllMediaItems(
  remote: Pick<RemoteLibraryClient, 'searchMediaItems'>,
  filter: MediaItemSearchFilter,
  onItem: (item: MediaItem) => void,
  logger: FastifyBaseLogger,
  queryLabel: string,
): Promise<SearchOutcome> {
  const seenIds = new Set<string>()
  let pageToken: string | undefined

  try {
    do {
      const page = await remote.searchMediaItems(filter, pageToken)
      for (const item of page.mediaItems) {
        seenIds.add(item.id)
        onItem(item)
      }
      pageToken = page.nextPageToken
    } while (pageToken)
  } catch (error) {
    logger.warn(
      { error, query: queryLabel, itemsSeen: seenIds.size },
      `Search for ${queryLabel} failed; keeping previous tags for unseen items`,
    )
    return { seenIds, complete: false }
  }

  return { seenIds, complete: true }
}
