import helmet, { type FastifyHelmetOptions } from '@fastify/helmet'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Security headers for a JSON-only API. CSP and HSTS are off: there are no
 * documents to protect and TLS is terminated in front of the service.
 */
const helmetOptions: FastifyHelmetOptions = {
  global: true,
  contentSecurityPolicy: false,
  crossOriginEmbedderPolicy: false,
  hsts: false,
  hidePoweredBy: true,
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
  frameguard: { action: 'deny' },
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(helmet, helmetOptions)
  },
  {
    name: 'helmet',
    dependencies: ['config'],
  },
)
