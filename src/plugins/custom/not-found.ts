import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * 404 handler for unknown routes, throttled harder than the API itself so
 * path scanning stays cheap.
 */
async function notFoundHandler(fastify: FastifyInstance) {
  fastify.setNotFoundHandler(
    {
      preHandler: fastify.rateLimit({
        max: 5,
        timeWindow: 1000,
      }),
    },
    (request, reply) => {
      const path = request.url.split('?')[0]
      request.log.warn({ method: request.method, path }, 'Unknown route')
      reply.code(404)
      const response: ErrorResponse = {
        statusCode: 404,
        code: 'ROUTE_NOT_FOUND',
        error: 'Not Found',
        message: `Route ${request.method} ${path} not found`,
      }
      return response
    },
  )
}

export default fp(notFoundHandler, {
  name: 'not-found',
  dependencies: ['rate-limit'],
})
