import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
  type HealthCheckStatus,
} from '@schemas/health/health.schema.js'
import type { FastifyInstance, FastifyPluginAsync } from 'fastify'

async function checkDatabase(fastify: FastifyInstance): Promise<HealthCheckStatus> {
  try {
    await fastify.db.knex.raw('SELECT 1')
    return 'ok'
  } catch (error) {
    fastify.log.error({ error }, 'Health check: database query failed')
    return 'failed'
  }
}

async function checkPhotosDir(fastify: FastifyInstance): Promise<HealthCheckStatus> {
  if (await fastify.localFiles.isRootWritable()) return 'ok'
  fastify.log.error(
    `Health check: photos directory ${fastify.localFiles.rootPath} is not writable`,
  )
  return 'failed'
}

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        summary: 'Health check',
        operationId: 'getHealth',
        description:
          'Reports whether the state database answers and the photos directory accepts writes. Either failing yields 503.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const [database, photosDir] = await Promise.all([
        checkDatabase(fastify),
        checkPhotosDir(fastify),
      ])
      const isHealthy = database === 'ok' && photosDir === 'ok'

      return reply.status(isHealthy ? 200 : 503).send({
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        checks: { database, photosDir },
      })
    },
  )
}

export default plugin
