import {
  ErrorSchema,
  type PhotoSyncResultResponse,
  PhotoSyncResultSchema,
  type PhotoSyncStatusResponse,
  PhotoSyncStatusSchema,
} from '@schemas/sync/sync.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  // Run the mirror pipeline now
  fastify.post<{
    Reply: PhotoSyncResultResponse
  }>(
    '/run',
    {
      schema: {
        summary: 'Run photo sync',
        operationId: 'runPhotoSync',
        description:
          'Runs tag gathering, the fetch, push and placement passes, and pruning once, and returns the run summary',
        response: {
          200: PhotoSyncResultSchema,
          409: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (request, reply) => {
      if (fastify.photoSync.isRunning) {
        return reply.conflict('A photo sync run is already in progress')
      }

      try {
        const result = await fastify.photoSync.run()
        if (result.skipped) {
          return reply.conflict('A photo sync run is already in progress')
        }
        return result
      } catch (err) {
        logRouteError(fastify.log, request, err, {
          message: 'Failed to run photo sync',
        })
        return reply.internalServerError('Unable to run photo sync')
      }
    },
  )

  fastify.get<{
    Reply: PhotoSyncStatusResponse
  }>(
    '/status',
    {
      schema: {
        summary: 'Get photo sync status',
        operationId: 'getPhotoSyncStatus',
        description:
          'Whether a run is in progress, and the summary of the latest finished run',
        response: {
          200: PhotoSyncStatusSchema,
        },
        tags: ['Sync'],
      },
    },
    async () => {
      return fastify.photoSync.getStatus()
    },
  )
}

export default plugin
