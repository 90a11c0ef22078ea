import {
  GooglePhotosApiError,
  GooglePhotosService,
  PHOTOS_API_BASE,
} from '@services/google-photos.service.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'
import { server } from '../../setup/msw-setup.js'

function createService(
  getAccessToken: () => Promise<string> = async () => 'test-access-token',
): GooglePhotosService {
  return new GooglePhotosService(createMockLogger(), {
    auth: { getAccessToken },
    requestTimeoutMs: 5000,
  })
}

describe('GooglePhotosService', () => {
  describe('searchMediaItems', () => {
    it('should post the filter with page size and token', async () => {
      const requests: Array<{ body: unknown; authorization: string | null }> = []
      server.use(
        http.post(/\/v1\/mediaItems:search$/, async ({ request }) => {
          requests.push({
            body: await request.json(),
            authorization: request.headers.get('authorization'),
          })
          return HttpResponse.json({
            mediaItems: [{ id: 'item-1', filename: 'IMG.jpg' }],
            nextPageToken: 'page-2',
          })
        }),
      )

      const page = await createService().searchMediaItems(
        { albumId: 'album-1' },
        'page-1',
      )

      expect(requests).toEqual([
        {
          body: { pageSize: 100, albumId: 'album-1', pageToken: 'page-1' },
          authorization: 'Bearer test-access-token',
        },
      ])
      expect(page).toEqual({
        mediaItems: [{ id: 'item-1', filename: 'IMG.jpg' }],
        nextPageToken: 'page-2',
      })
    })

    it('should treat a missing item list as an empty last page', async () => {
      server.use(
        http.post(/\/v1\/mediaItems:search$/, () => HttpResponse.json({})),
      )

      const page = await createService().searchMediaItems({
        filters: { featureFilter: { includedFeatures: ['FAVORITES'] } },
      })

      expect(page).toEqual({ mediaItems: [], nextPageToken: undefined })
    })

    it('should fail without a request when no access token is available', async () => {
      const service = createService(async () => {
        throw new Error('credentials missing')
      })

      await expect(
        service.searchMediaItems({ albumId: 'album-1' }),
      ).rejects.toMatchObject({
        name: 'GooglePhotosApiError',
        operation: 'search media items',
        message: 'Cannot search media items: credentials missing',
      })
    })
  })

  describe('getMediaItem', () => {
    it('should return the media item', async () => {
      server.use(
        http.get(`${PHOTOS_API_BASE}/mediaItems/:id`, ({ params }) =>
          HttpResponse.json({ id: params.id, filename: 'IMG.jpg' }),
        ),
      )

      expect(await createService().getMediaItem('item-1')).toEqual({
        id: 'item-1',
        filename: 'IMG.jpg',
      })
    })

    it('should return null for a missing item', async () => {
      server.use(
        http.get(`${PHOTOS_API_BASE}/mediaItems/:id`, () =>
          HttpResponse.json({ error: { code: 404 } }, { status: 404 }),
        ),
      )

      expect(await createService().getMediaItem('gone')).toBeNull()
    })

    it('should throw on other errors', async () => {
      server.use(
        http.get(`${PHOTOS_API_BASE}/mediaItems/:id`, () =>
          HttpResponse.text('backend error', { status: 500 }),
        ),
      )

      const error = await createService()
        .getMediaItem('item-1')
        .catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(GooglePhotosApiError)
      expect(error).toMatchObject({ operation: 'get media item', status: 500 })
    })
  })

  describe('listAlbums', () => {
    it('should request one page of albums', async () => {
      const queries: URLSearchParams[] = []
      server.use(
        http.get(`${PHOTOS_API_BASE}/albums`, ({ request }) => {
          queries.push(new URL(request.url).searchParams)
          return HttpResponse.json({
            albums: [{ id: 'album-1', title: 'Trip' }],
          })
        }),
      )

      const page = await createService().listAlbums('page-2')

      expect(queries).toHaveLength(1)
      expect(queries[0].get('pageSize')).toBe('50')
      expect(queries[0].get('pageToken')).toBe('page-2')
      expect(page).toEqual({
        albums: [{ id: 'album-1', title: 'Trip' }],
        nextPageToken: undefined,
      })
    })
  })

  describe('downloadMediaItem', () => {
    it('should download photos with the =d suffix and videos with =dv', async () => {
      const urls: string[] = []
      server.use(
        http.get('https://photos.test/*', ({ request }) => {
          urls.push(request.url)
          return new HttpResponse('original bytes')
        }),
      )
      const service = createService()

      const photo = await service.downloadMediaItem({
        id: 'photo',
        filename: 'IMG.jpg',
        baseUrl: 'https://photos.test/photo',
        mimeType: 'image/jpeg',
      })
      await service.downloadMediaItem({
        id: 'video',
        filename: 'clip.mp4',
        baseUrl: 'https://photos.test/video',
        mimeType: 'video/mp4',
      })

      expect(photo.toString()).toBe('original bytes')
      expect(urls).toEqual([
        'https://photos.test/photo=d',
        'https://photos.test/video=dv',
      ])
    })

    it('should refuse items without a base URL', async () => {
      await expect(
        createService().downloadMediaItem({ id: 'x', filename: 'x.jpg' }),
      ).rejects.toThrow("No baseUrl for item x, can't download")
    })
  })

  describe('uploads', () => {
    it('should upload raw bytes and return the trimmed token', async () => {
      const sent: Array<{ headers: Headers; content: string }> = []
      server.use(
        http.post(`${PHOTOS_API_BASE}/uploads`, async ({ request }) => {
          sent.push({ headers: request.headers, content: await request.text() })
          return HttpResponse.text('upload-token-1\n')
        }),
      )

      const token = await createService().uploadBytes(
        'My Photo.jpg',
        Buffer.from('raw-bytes'),
      )

      expect(token).toBe('upload-token-1')
      expect(sent).toHaveLength(1)
      const [{ headers, content }] = sent
      expect(content).toBe('raw-bytes')
      expect(headers.get('x-goog-upload-file-name')).toBe('My%20Photo.jpg')
      expect(headers.get('x-goog-upload-protocol')).toBe('raw')
      expect(headers.get('content-type')).toBe('application/octet-stream')
    })

    it('should fail when the upload returns no token', async () => {
      server.use(
        http.post(`${PHOTOS_API_BASE}/uploads`, () => HttpResponse.text('')),
      )

      await expect(
        createService().uploadBytes('a.jpg', Buffer.from('a')),
      ).rejects.toThrow('Upload of a.jpg returned no upload token')
    })

    it('should create the media item from the upload token', async () => {
      let body: unknown
      server.use(
        http.post(/\/v1\/mediaItems:batchCreate$/, async ({ request }) => {
          body = await request.json()
          return HttpResponse.json({
            newMediaItemResults: [
              {
                uploadToken: 'upload-token-1',
                status: { message: 'Success' },
                mediaItem: {
                  id: 'new-item',
                  filename: 'a.jpg',
                  mediaMetadata: { creationTime: '2024-06-01T08:00:00Z' },
                },
              },
            ],
          })
        }),
      )

      const item = await createService().finalizeUpload('upload-token-1', 'a.jpg')

      expect(item.id).toBe('new-item')
      expect(item.mediaMetadata?.creationTime).toBe('2024-06-01T08:00:00Z')
      expect(body).toEqual({
        newMediaItems: [
          {
            description: 'Uploaded by photo-mirror',
            simpleMediaItem: { uploadToken: 'upload-token-1', fileName: 'a.jpg' },
          },
        ],
      })
    })

    it('should surface a per-item creation error', async () => {
      server.use(
        http.post(/\/v1\/mediaItems:batchCreate$/, () =>
          HttpResponse.json({
            newMediaItemResults: [
              { status: { code: 3, message: 'Failed: invalid' } },
            ],
          }),
        ),
      )

      await expect(
        createService().finalizeUpload('upload-token-1', 'a.jpg'),
      ).rejects.toThrow('Upload error for a.jpg: Failed: invalid')
    })
  })

  describe('addMediaItemToAlbum', () => {
    it('should add the item to the album', async () => {
      let url = ''
      let body: unknown
      server.use(
        http.post(/\/v1\/albums\/[^/]+:batchAddMediaItems$/, async ({ request }) => {
          url = request.url
          body = await request.json()
          return HttpResponse.json({})
        }),
      )

      await createService().addMediaItemToAlbum('album-1', 'item-1')

      expect(url).toBe(`${PHOTOS_API_BASE}/albums/album-1:batchAddMediaItems`)
      expect(body).toEqual({ mediaItemIds: ['item-1'] })
    })
  })
})
