import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyError, FastifyInstance, FastifyRequest } from 'fastify'
import fp from 'fastify-plugin'

function requestContext(request: FastifyRequest) {
  return {
    id: request.id,
    method: request.method,
    path: request.url.split('?')[0],
    route: request.routeOptions?.url,
  }
}

/**
 * Turns every thrown error into an {@link ErrorResponse}.
 *
 * Schema validation failures answer 400 with the failing part of the request
 * named in the message. Server errors never leak their message.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    if (err.validation) {
      request.log.warn(
        {
          request: requestContext(request),
          context: err.validationContext,
          issues: err.validation.map((issue) => issue.message),
        },
        'Request failed schema validation',
      )
      reply.code(400)
      const payload: ErrorResponse = {
        statusCode: 400,
        code: 'VALIDATION_ERROR',
        error: 'Bad Request',
        message: err.message,
      }
      return payload
    }

    const statusCode = err.statusCode ?? 500
    const isServerError = statusCode >= 500

    if (isServerError) {
      request.log.error(
        { err, request: requestContext(request) },
        'Request failed',
      )
    } else {
      request.log.warn(
        { err, request: requestContext(request) },
        'Request rejected',
      )
    }

    reply.code(statusCode)
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error: isServerError
        ? 'Internal Server Error'
        : 'error' in err && typeof err.error === 'string'
          ? err.error
          : 'Client Error',
      message: isServerError
        ? 'Internal Server Error'
        : err.message || 'Request could not be processed',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
