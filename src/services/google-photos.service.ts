/**
 * Google Photos Service
 *
 * Thin client for the Google Photos Library API v1: media item search and
 * lookup, album listing, raw-byte upload with batchCreate, and album linking.
 *
 * Every call throws {@link GooglePhotosApiError} on a non-success response,
 * a network failure or a timeout; callers decide whether that is fatal. The
 * only exception is {@link GooglePhotosService.getMediaItem}, which reports a
 * missing item as null.
 */
import type {
  AlbumListResponse,
  AlbumPage,
  BatchCreateResponse,
  MediaItem,
  MediaItemPage,
  MediaItemSearchFilter,
  MediaItemSearchResponse,
  RemoteLibraryClient,
} from '@root/types/google-photos.types.js'
import type { AccessTokenProvider } from '@services/google-auth.service.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export const PHOTOS_API_BASE = 'https://photoslibrary.googleapis.com/v1'

/** Remote maximum for mediaItems:search */
const SEARCH_PAGE_SIZE = 100

/** Remote maximum for albums.list */
const ALBUM_PAGE_SIZE = 50

const UPLOAD_DESCRIPTION = 'Uploaded by photo-mirror'

export class GooglePhotosApiError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly status?: number,
  ) {
    super(message)
    this.name = 'GooglePhotosApiError'
  }
}

export interface GooglePhotosServiceOptions {
  auth: AccessTokenProvider
  requestTimeoutMs: number
}

export class GooglePhotosService implements RemoteLibraryClient {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly options: GooglePhotosServiceOptions,
  ) {
    this.log = createServiceLogger(baseLog, 'GOOGLE_PHOTOS')
  }

  async searchMediaItems(
    filter: MediaItemSearchFilter,
    pageToken?: string,
  ): Promise<MediaItemPage> {
    const response = await this.send('search media items', '/mediaItems:search', {
      method: 'POST',
      body: JSON.stringify({
        pageSize: SEARCH_PAGE_SIZE,
        ...filter,
        ...(pageToken ? { pageToken } : {}),
      }),
    })
    const data = (await response.json()) as MediaItemSearchResponse

    return {
      mediaItems: data.mediaItems ?? [],
      nextPageToken: data.nextPageToken || undefined,
    }
  }

  async getMediaItem(id: string): Promise<MediaItem | null> {
    try {
      const response = await this.send(
        'get media item',
        `/mediaItems/${encodeURIComponent(id)}`,
        { method: 'GET' },
      )
      return (await response.json()) as MediaItem
    } catch (error) {
      if (error instanceof GooglePhotosApiError && error.status === 404) {
        this.log.debug(`Media item ${id} not found`)
        return null
      }
      throw error
    }
  }

  async listAlbums(pageToken?: string): Promise<AlbumPage> {
    const params = new URLSearchParams({ pageSize: String(ALBUM_PAGE_SIZE) })
    if (pageToken) {
      params.set('pageToken', pageToken)
    }

    const response = await this.send('list albums', `/albums?${params}`, {
      method: 'GET',
    })
    const data = (await response.json()) as AlbumListResponse

    return {
      albums: data.albums ?? [],
      nextPageToken: data.nextPageToken || undefined,
    }
  }

  /**
   * Downloads the original bytes of a media item. The base URL needs the
   * `=d` suffix for photos and `=dv` for videos.
   */
  async downloadMediaItem(item: MediaItem): Promise<Buffer> {
    if (!item.baseUrl) {
      throw new GooglePhotosApiError(
        `No baseUrl for item ${item.id}, can't download`,
        'download media item',
      )
    }

    const isVideo =
      item.mimeType?.startsWith('video/') || item.mediaMetadata?.video != null
    const url = `${item.baseUrl}=${isVideo ? 'dv' : 'd'}`

    const response = await this.fetchWithTimeout('download media item', url, {
      method: 'GET',
    })
    return Buffer.from(await response.arrayBuffer())
  }

  /**
   * Uploads raw bytes and returns the upload token for batchCreate
   */
  async uploadBytes(filename: string, bytes: Buffer): Promise<string> {
    const response = await this.send('upload bytes', '/uploads', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/octet-stream',
        'X-Goog-Upload-File-Name': encodeURIComponent(filename),
        'X-Goog-Upload-Protocol': 'raw',
      },
      body: new Blob([bytes]),
    })

    const uploadToken = (await response.text()).trim()
    if (!uploadToken) {
      throw new GooglePhotosApiError(
        `Upload of ${filename} returned no upload token`,
        'upload bytes',
        response.status,
      )
    }
    return uploadToken
  }

  /**
   * Turns an upload token into a media item
   *
   * @returns the created media item (id and, when the remote has parsed it,
   * the capture time)
   */
  async finalizeUpload(uploadToken: string, filename: string): Promise<MediaItem> {
    const response = await this.send('create media item', '/mediaItems:batchCreate', {
      method: 'POST',
      body: JSON.stringify({
        newMediaItems: [
          {
            description: UPLOAD_DESCRIPTION,
            simpleMediaItem: { uploadToken, fileName: filename },
          },
        ],
      }),
    })
    const data = (await response.json()) as BatchCreateResponse

    const result = data.newMediaItemResults?.[0]
    if (!result) {
      throw new GooglePhotosApiError(
        `No media item created for ${filename}`,
        'create media item',
        response.status,
      )
    }

    // A zero status code is omitted from the JSON
    const statusCode = result.status?.code ?? 0
    if (statusCode !== 0 || !result.mediaItem) {
      throw new GooglePhotosApiError(
        `Upload error for ${filename}: ${result.status?.message ?? 'Unknown'}`,
        'create media item',
        response.status,
      )
    }

    return result.mediaItem
  }

  async addMediaItemToAlbum(albumId: string, mediaItemId: string): Promise<void> {
    await this.send(
      'add media item to album',
      `/albums/${encodeURIComponent(albumId)}:batchAddMediaItems`,
      {
        method: 'POST',
        body: JSON.stringify({ mediaItemIds: [mediaItemId] }),
      },
    )
    this.log.debug(`Added media ${mediaItemId} to album ${albumId}`)
  }

  /**
   * Sends an authorized request to the Library API
   */
  private async send(
    operation: string,
    path: string,
    init: RequestInit & { headers?: Record<string, string> },
  ): Promise<Response> {
    let accessToken: string
    try {
      accessToken = await this.options.auth.getAccessToken()
    } catch (error) {
      throw new GooglePhotosApiError(
        `Cannot ${operation}: ${error instanceof Error ? error.message : String(error)}`,
        operation,
      )
    }

    return this.fetchWithTimeout(operation, `${PHOTOS_API_BASE}${path}`, {
      ...init,
      headers: {
        'Content-Type': 'application/json',
        ...init.headers,
        Authorization: `Bearer ${accessToken}`,
      },
    })
  }

  private async fetchWithTimeout(
    operation: string,
    url: string,
    init: RequestInit,
  ): Promise<Response> {
    let response: Response
    try {
      response = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      })
    } catch (error) {
      throw new GooglePhotosApiError(
        `Failed to ${operation}: ${error instanceof Error ? error.message : String(error)}`,
        operation,
      )
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '')
      throw new GooglePhotosApiError(
        `Failed to ${operation}: ${response.status} ${response.statusText}${detail ? ` - ${detail.slice(0, 200)}` : ''}`,
        operation,
        response.status,
      )
    }

    return response
  }
}
