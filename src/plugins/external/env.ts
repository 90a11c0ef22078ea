import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import type { Config, RawConfig } from '@root/types/config.types.js'
import {
  resolveDbPath,
  resolveEnvPath,
  resolvePhotosPath,
} from '@utils/data-dir.js'

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
    updateConfig(config: Partial<Config>): Promise<Config>
  }
}

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    port: {
      type: 'number',
      default: 3010,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    dbPath: {
      type: 'string',
      default: resolveDbPath(),
    },
    photosDir: {
      type: 'string',
      default: resolvePhotosPath(),
    },
    windowDays: {
      type: 'number',
      default: 90,
    },
    albums: {
      type: 'string',
      default: '',
    },
    syncIntervalMinutes: {
      type: 'number',
      default: 60,
    },
    requestTimeoutMs: {
      type: 'number',
      default: 30000,
    },
    googleClientId: {
      type: 'string',
      default: '',
    },
    googleClientSecret: {
      type: 'string',
      default: '',
    },
    googleRefreshToken: {
      type: 'string',
      default: '',
    },
  },
}

/**
 * Parses the albums setting: a JSON array of titles or a comma-separated
 * list. Titles are trimmed, empty entries dropped, duplicates removed.
 */
export function parseAlbumList(value: string): string[] {
  const trimmed = value.trim()
  if (!trimmed) return []

  let entries: unknown[] = trimmed.split(',')
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed)
    if (!Array.isArray(parsed)) {
      throw new Error('albums must be a JSON array of album titles')
    }
    entries = parsed
  }

  const titles: string[] = []
  for (const entry of entries) {
    if (typeof entry !== 'string') {
      throw new Error('albums must only contain strings')
    }
    const title = entry.trim()
    if (title && !titles.includes(title)) {
      titles.push(title)
    }
  }
  return titles
}

/**
 * Validates the raw environment values and turns them into the runtime
 * configuration
 */
export function buildConfig(raw: RawConfig): Config {
  if (!Number.isInteger(raw.windowDays) || raw.windowDays <= 0) {
    throw new Error(`windowDays must be a positive integer, got ${raw.windowDays}`)
  }
  if (!Number.isFinite(raw.syncIntervalMinutes) || raw.syncIntervalMinutes < 0) {
    throw new Error(
      `syncIntervalMinutes must be 0 or greater, got ${raw.syncIntervalMinutes}`,
    )
  }
  if (raw.requestTimeoutMs <= 0) {
    throw new Error(
      `requestTimeoutMs must be greater than 0, got ${raw.requestTimeoutMs}`,
    )
  }

  let albums: string[]
  try {
    albums = parseAlbumList(raw.albums)
  } catch (error) {
    throw new Error(
      `Invalid albums setting: ${error instanceof Error ? error.message : String(error)}`,
    )
  }

  return { ...raw, albums }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'rawConfig',
      schema,
      dotenv: {
        path: resolveEnvPath(),
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    const config = buildConfig(fastify.getEnvs<RawConfig>())
    fastify.decorate('config', config)

    fastify.decorate('updateConfig', async (newConfig: Partial<Config>) => {
      const updatedConfig = { ...fastify.config, ...newConfig }
      fastify.config = updatedConfig
      return updatedConfig
    })
  },
  {
    name: 'config',
  },
)
