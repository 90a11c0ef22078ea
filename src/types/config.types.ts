export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

/**
 * Raw configuration as produced by @fastify/env, before list-valued
 * settings are parsed
 */
export interface RawConfig {
  baseUrl: string
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  dbPath: string
  photosDir: string
  windowDays: number
  albums: string
  syncIntervalMinutes: number
  requestTimeoutMs: number
  googleClientId: string
  googleClientSecret: string
  googleRefreshToken: string
}

export interface Config extends Omit<RawConfig, 'albums'> {
  // Album titles to mirror, trimmed and deduplicated, in configured order
  albums: string[]
}
