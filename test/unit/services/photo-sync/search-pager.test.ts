import type { MediaItem } from '@root/types/google-photos.types.js'
import { searchAllMediaItems } from '@services/photo-sync/tag-gathering/index.js'
import { describe, expect, it } from 'vitest'
import { FakeRemoteLibrary } from '../../../mocks/fake-remote-library.js'
import { createMockLogger } from '../../../mocks/logger.js'

const favorites = {
  filters: { featureFilter: { includedFeatures: ['FAVORITES' as const] } },
}

function libraryWithFavorites(count: number): FakeRemoteLibrary {
  const remote = new FakeRemoteLibrary()
  for (let i = 1; i <= count; i++) {
    remote.addItem(`fav-${i}`, { favorite: true })
  }
  remote.addItem('plain')
  return remote
}

describe('searchAllMediaItems', () => {
  it('should walk every page and hand over items in order', async () => {
    const remote = libraryWithFavorites(5)
    const seen: MediaItem[] = []

    const outcome = await searchAllMediaItems(
      remote,
      favorites,
      (item) => seen.push(item),
      createMockLogger(),
      'favorites',
    )

    expect(outcome.complete).toBe(true)
    expect([...outcome.seenIds]).toEqual([
      'fav-1',
      'fav-2',
      'fav-3',
      'fav-4',
      'fav-5',
    ])
    expect(seen.map((item) => item.id)).toEqual([...outcome.seenIds])
  })

  it('should report an empty result as complete', async () => {
    const remote = new FakeRemoteLibrary()

    const outcome = await searchAllMediaItems(
      remote,
      favorites,
      () => {},
      createMockLogger(),
      'favorites',
    )

    expect(outcome).toEqual({ seenIds: new Set(), complete: true })
  })

  it('should keep items seen before a failed page and flag the result incomplete', async () => {
    const remote = libraryWithFavorites(5)
    remote.failSearch('favorites', 1)
    const logger = createMockLogger()
    const seen: string[] = []

    const outcome = await searchAllMediaItems(
      remote,
      favorites,
      (item) => seen.push(item.id),
      logger,
      'favorites',
    )

    expect(outcome.complete).toBe(false)
    expect(seen).toEqual(['fav-1', 'fav-2'])
    expect(logger.warn).toHaveBeenCalledWith(
      { error: expect.any(Error), query: 'favorites', itemsSeen: 2 },
      'Search for favorites failed; keeping previous tags for unseen items',
    )
  })
})
