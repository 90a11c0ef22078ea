/**
 * Google Photos Plugin
 *
 * Registers the OAuth token provider and the Photos Library API client built
 * from the configured Google credentials.
 */
import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { GoogleAuthService } from '@services/google-auth.service.js'
import { GooglePhotosService } from '@services/google-photos.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    googleAuth: GoogleAuthService
    googlePhotos: GooglePhotosService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify

    const auth = new GoogleAuthService(
      fastify.log,
      {
        clientId: config.googleClientId,
        clientSecret: config.googleClientSecret,
        refreshToken: config.googleRefreshToken,
      },
      config.requestTimeoutMs,
    )
    if (!auth.isConfigured) {
      fastify.log.warn(
        'Google credentials are not configured; sync runs will fail until googleClientId, googleClientSecret and googleRefreshToken are set',
      )
    }

    fastify.decorate('googleAuth', auth)
    fastify.decorate(
      'googlePhotos',
      new GooglePhotosService(fastify.log, {
        auth,
        requestTimeoutMs: config.requestTimeoutMs,
      }),
    )
  },
  {
    name: 'google-photos',
    dependencies: ['config'],
  },
)
