import type { ItemRecord } from '@root/types/item-record.types.js'
import {
  isRetained,
  serializeItemRecord,
} from '@root/types/item-record.types.js'
import {
  ErrorSchema,
  ItemIdParamsSchema,
  ItemListQuerySchema,
  type ItemListResponse,
  ItemListResponseSchema,
  type ItemRecordResponse,
  ItemRecordSchema,
} from '@schemas/items/items.schema.js'
import { resolvePlacement } from '@services/photo-sync/placement/index.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

function toResponse(record: ItemRecord): ItemRecordResponse {
  return {
    ...serializeItemRecord(record),
    desiredFolder: resolvePlacement(record),
    retained: isRetained(record),
  }
}

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Querystring: z.infer<typeof ItemListQuerySchema>
    Reply: ItemListResponse
  }>(
    '/',
    {
      schema: {
        summary: 'List item records',
        operationId: 'listItemRecords',
        description:
          'Every tracked media item with its tags, current folder and the folder placement would choose',
        querystring: ItemListQuerySchema,
        response: {
          200: ItemListResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Items'],
      },
    },
    async (request, reply) => {
      try {
        const records = await fastify.db.loadItemRecords()
        const { retained } = request.query

        const items = [...records.values()]
          .filter(
            (record) =>
              retained === undefined ||
              isRetained(record) === (retained === 'true'),
          )
          .map(toResponse)

        return { total: items.length, items }
      } catch (err) {
        logRouteError(fastify.log, request, err, {
          message: 'Failed to list item records',
        })
        return reply.internalServerError('Unable to list item records')
      }
    },
  )

  fastify.get<{
    Params: z.infer<typeof ItemIdParamsSchema>
    Reply: ItemRecordResponse
  }>(
    '/:id',
    {
      schema: {
        summary: 'Get item record',
        operationId: 'getItemRecord',
        params: ItemIdParamsSchema,
        response: {
          200: ItemRecordSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Items'],
      },
    },
    async (request, reply) => {
      const { id } = request.params
      try {
        const records = await fastify.db.loadItemRecords()
        const record = records.get(id)
        if (!record) {
          return reply.notFound(`Item record ${id} not found`)
        }
        return toResponse(record)
      } catch (err) {
        logRouteError(fastify.log, request, err, {
          message: 'Failed to get item record',
          mediaItemId: id,
        })
        return reply.internalServerError('Unable to get item record')
      }
    },
  )
}

export default plugin
