import type { RemoteLibraryClient } from '@root/types/google-photos.types.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Per-run memo of album title → remote album id.
 *
 * The remote album list is walked once, on the first lookup; later lookups
 * are answered from memory. A failed listing is not cached, so the next
 * lookup tries again.
 */
export class AlbumDirectory {
  private titleToId: Map<string, string> | null = null

  constructor(
    private readonly remote: Pick<RemoteLibraryClient, 'listAlbums'>,
    private readonly logger: FastifyBaseLogger,
  ) {}

  /**
   * @returns the album id, or null when no remote album carries the title
   * or the album list could not be fetched
   */
  async resolve(title: string): Promise<string | null> {
    const directory = await this.load()
    return directory?.get(title) ?? null
  }

  private async load(): Promise<Map<string, string> | null> {
    if (this.titleToId) {
      return this.titleToId
    }

    const titleToId = new Map<string, string>()
    let pageToken: string | undefined
    try {
      do {
        const page = await this.remote.listAlbums(pageToken)
        for (const album of page.albums) {
          // First album wins when titles repeat
          if (album.title && !titleToId.has(album.title)) {
            titleToId.set(album.title, album.id)
          }
        }
        pageToken = page.nextPageToken
      } while (pageToken)
    } catch (error) {
      this.logger.error({ error }, 'Failed to list remote albums')
      return null
    }

    this.logger.debug(`Loaded ${titleToId.size} remote album titles`)
    this.titleToId = titleToId
    return titleToId
  }
}
