import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export const projectRoot = resolve(__dirname, '..', '..')

/**
 * Resolves the photo-mirror data directory based on platform and environment.
 *
 * Priority:
 * 1. process.env.dataDir (explicit override)
 * 2. Windows: %PROGRAMDATA%\PhotoMirror
 * 3. macOS: ~/.config/PhotoMirror
 * 4. Linux/Docker: null (use project-relative paths)
 */
export function resolveDataDir(): string | null {
  if (process.env.dataDir) {
    return process.env.dataDir
  }

  if (process.platform === 'win32') {
    const programData = process.env.PROGRAMDATA || process.env.ALLUSERSPROFILE
    if (programData) {
      return resolve(programData, 'PhotoMirror')
    }
  }

  if (process.platform === 'darwin') {
    const home = process.env.HOME
    if (home) {
      return resolve(home, '.config', 'PhotoMirror')
    }
  }

  return null
}

function resolveInDataDir(...segments: string[]): string {
  const dataDir = resolveDataDir()
  return dataDir
    ? resolve(dataDir, ...segments)
    : resolve(projectRoot, 'data', ...segments)
}

/**
 * Resolves the default database file path.
 * With a data dir: {dataDir}/db/photo-mirror.db
 * Without (Linux/Docker): {projectRoot}/data/db/photo-mirror.db
 */
export function resolveDbPath(): string {
  return resolveInDataDir('db', 'photo-mirror.db')
}

/**
 * Resolves the log directory path.
 */
export function resolveLogPath(): string {
  return resolveInDataDir('logs')
}

/**
 * Resolves the default local photos root.
 */
export function resolvePhotosPath(): string {
  return resolveInDataDir('photos')
}

/**
 * Resolves the .env file path.
 * With a data dir: {dataDir}/.env
 * Without (Linux/Docker): {projectRoot}/.env
 */
export function resolveEnvPath(): string {
  const dataDir = resolveDataDir()
  return dataDir ? resolve(dataDir, '.env') : resolve(projectRoot, '.env')
}
