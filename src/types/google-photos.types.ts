/**
 * Subset of the Google Photos Library API v1 payloads used by the sync engine
 */

export interface MediaMetadata {
  creationTime?: string
  width?: string
  height?: string
  photo?: Record<string, unknown>
  video?: Record<string, unknown>
}

export interface MediaItem {
  id: string
  filename: string
  mimeType?: string
  /** Fetchable content reference; needs a size/download suffix */
  baseUrl?: string
  productUrl?: string
  mediaMetadata?: MediaMetadata
}

export interface Album {
  id: string
  title?: string
  productUrl?: string
  mediaItemsCount?: string
}

export interface CalendarDate {
  year: number
  month: number
  day: number
}

export interface DateRange {
  startDate: CalendarDate
  endDate: CalendarDate
}

export type MediaFeature = 'FAVORITES' | 'NONE'

/**
 * Search filter for mediaItems:search. `albumId` and `filters` are mutually
 * exclusive on the remote side.
 */
export type MediaItemSearchFilter =
  | {
      albumId: string
    }
  | {
      filters: {
        featureFilter?: { includedFeatures: MediaFeature[] }
        dateFilter?: { ranges: DateRange[] }
      }
    }

export interface MediaItemPage {
  mediaItems: MediaItem[]
  nextPageToken?: string
}

export interface AlbumPage {
  albums: Album[]
  nextPageToken?: string
}

export interface MediaItemSearchResponse {
  mediaItems?: MediaItem[]
  nextPageToken?: string
}

export interface AlbumListResponse {
  albums?: Album[]
  nextPageToken?: string
}

export interface NewMediaItemResult {
  uploadToken?: string
  status?: {
    code?: number
    message?: string
  }
  mediaItem?: MediaItem
}

export interface BatchCreateResponse {
  newMediaItemResults?: NewMediaItemResult[]
}

export interface OAuthTokenResponse {
  access_token: string
  expires_in: number
  token_type?: string
  scope?: string
}

export interface OAuthErrorResponse {
  error?: string
  error_description?: string
}

/**
 * Remote library boundary consumed by the sync engine
 */
export interface RemoteLibraryClient {
  searchMediaItems(
    filter: MediaItemSearchFilter,
    pageToken?: string,
  ): Promise<MediaItemPage>
  getMediaItem(id: string): Promise<MediaItem | null>
  listAlbums(pageToken?: string): Promise<AlbumPage>
  downloadMediaItem(item: MediaItem): Promise<Buffer>
  uploadBytes(filename: string, bytes: Buffer): Promise<string>
  finalizeUpload(uploadToken: string, filename: string): Promise<MediaItem>
  addMediaItemToAlbum(albumId: string, mediaItemId: string): Promise<void>
}
