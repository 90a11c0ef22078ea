import type { ItemRecord } from '@root/types/item-record.types.js'
import type { ErrorResponse } from '@schemas/common/error.schema.js'
import type {
  ItemListResponse,
  ItemRecordResponse,
} from '@schemas/items/items.schema.js'
import type { FastifyInstance } from 'fastify'
import { describe, expect, it, vi } from 'vitest'
import { build } from '../../helpers/app.js'
import { makeRecord } from '../../mocks/memory-state-store.js'

const kept: ItemRecordResponse = {
  id: 'kept',
  filename: 'kept.jpg',
  localFolder: '',
  isStarred: false,
  inWindow: false,
  albums: ['Trip', 'Wedding'],
  creationTime: null,
  desiredFolder: 'Trip',
  retained: true,
}

const untagged: ItemRecordResponse = {
  id: 'untagged',
  filename: 'untagged.jpg',
  localFolder: 'Trip',
  isStarred: false,
  inWindow: false,
  albums: [],
  creationTime: '2020-01-01T00:00:00Z',
  desiredFolder: '',
  retained: false,
}

async function seed(app: FastifyInstance): Promise<void> {
  const records: ItemRecord[] = [
    makeRecord('kept', { albums: new Set(['Wedding', 'Trip']) }),
    makeRecord('untagged', {
      localFolder: 'Trip',
      creationTime: '2020-01-01T00:00:00Z',
    }),
  ]
  await app.db.saveItemRecords(
    new Map(records.map((record) => [record.id, record])),
  )
}

describe('Item Routes', () => {
  describe('GET /v1/items', () => {
    it('should return an empty list before the first run', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({ method: 'GET', url: '/v1/items' })

      expect(response.statusCode).toBe(200)
      expect(response.json<ItemListResponse>()).toEqual({ total: 0, items: [] })
    })

    it('should list records with their desired folder and retention', async (ctx) => {
      const app = await build(ctx)
      await seed(app)

      const response = await app.inject({ method: 'GET', url: '/v1/items' })

      expect(response.statusCode).toBe(200)
      expect(response.json<ItemListResponse>()).toEqual({
        total: 2,
        items: [kept, untagged],
      })
    })

    it('should filter by retention', async (ctx) => {
      const app = await build(ctx)
      await seed(app)

      const retained = await app.inject({
        method: 'GET',
        url: '/v1/items?retained=true',
      })
      const notRetained = await app.inject({
        method: 'GET',
        url: '/v1/items?retained=false',
      })

      expect(retained.json<ItemListResponse>().items).toEqual([kept])
      expect(notRetained.json<ItemListResponse>().items).toEqual([untagged])
    })

    it('should reject an invalid retention filter', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/v1/items?retained=maybe',
      })

      expect(response.statusCode).toBe(400)
      expect(response.json<ErrorResponse>()).toMatchObject({
        code: 'VALIDATION_ERROR',
        error: 'Bad Request',
      })
    })

    it('should return 500 when the records cannot be read', async (ctx) => {
      const app = await build(ctx)
      vi.spyOn(app.db, 'loadItemRecords').mockRejectedValue(
        new Error('SQLITE_CORRUPT'),
      )

      const response = await app.inject({ method: 'GET', url: '/v1/items' })

      expect(response.statusCode).toBe(500)
      expect(response.json<ErrorResponse>().error).toBe('Internal Server Error')
    })
  })

  describe('GET /v1/items/:id', () => {
    it('should return one record', async (ctx) => {
      const app = await build(ctx)
      await seed(app)

      const response = await app.inject({ method: 'GET', url: '/v1/items/kept' })

      expect(response.statusCode).toBe(200)
      expect(response.json<ItemRecordResponse>()).toEqual(kept)
    })

    it('should return 404 for an unknown id', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/v1/items/missing',
      })

      expect(response.statusCode).toBe(404)
      expect(response.json<ErrorResponse>()).toMatchObject({
        statusCode: 404,
        message: 'Item record missing not found',
      })
    })
  })
})
