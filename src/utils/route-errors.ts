import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

/**
 * Logs an error caught inside a route handler with request context.
 *
 * Query strings are stripped from the logged path so tokens passed as
 * parameters never reach the log files.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  context: { message: string } & Record<string, unknown>,
): void {
  const { message, ...extra } = context
  log.error(
    {
      error,
      ...extra,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions.url,
      },
    },
    message,
  )
}
