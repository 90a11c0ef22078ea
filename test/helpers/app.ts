import serviceApp from '@root/app.js'
import type { FastifyInstance } from 'fastify'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import type { TestContext } from 'vitest'
import { createTempDir } from './database.js'

export interface BuildOptions {
  /** Extra environment values read by the config plugin */
  env?: Record<string, string>
}

/**
 * Build a Fastify application instance for testing
 *
 * Every instance gets its own in-memory database and an empty photos
 * directory. Google credentials are blank unless `env` sets them.
 *
 * @param t - Optional Vitest test context for automatic cleanup
 * @returns Fastify instance ready for testing
 */
export async function build(
  t?: TestContext,
  options: BuildOptions = {},
): Promise<FastifyInstance> {
  const photosDir = createTempDir('photos', t)

  Object.assign(process.env, {
    dbPath: ':memory:',
    photosDir,
    albums: '',
    windowDays: '90',
    syncIntervalMinutes: '0',
    googleClientId: '',
    googleClientSecret: '',
    googleRefreshToken: '',
    ...options.env,
  })

  const app = Fastify({
    logger: false, // Disable logging in tests
    // Match production AJV options from server.ts
    ajv: {
      customOptions: {
        coerceTypes: 'array',
        removeAdditional: 'all',
      },
    },
  })

  // Register the main app the way server.ts does, so its decorators are
  // visible on the returned instance
  await app.register(fp(serviceApp))
  await app.ready()

  // Auto-close app after test if context provided
  if (t) {
    t.onTestFinished(async () => {
      await app.close()
    })
  }

  return app
}
