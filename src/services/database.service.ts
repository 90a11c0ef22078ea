/**
 * Database Service
 *
 * Durable state store for the photo sync engine, backed by better-sqlite3
 * through knex. This service is exposed to the application via the
 * 'database' Fastify plugin and can be accessed through the fastify.db
 * decorator.
 *
 * The sync engine keeps its item records in memory and hands complete
 * snapshots to {@link DatabaseService.saveItemRecords}; each save replaces
 * the table contents inside one transaction, so a crash mid-run leaves the
 * previous snapshot intact.
 *
 * @example
 * const records = await fastify.db.loadItemRecords()
 */
import fs from 'node:fs'
import { dirname } from 'node:path'
import { BundledMigrationSource } from '@root/db/migrations/index.js'
import type { ItemRecord } from '@root/types/item-record.types.js'
import {
  deserializeItemRecord,
  serializeItemRecord,
} from '@root/types/item-record.types.js'
import type { StateStore } from '@root/types/photo-sync.types.js'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'

/** SQLite keeps booleans as 0/1 */
interface ItemRecordRow {
  id: string
  filename: string
  local_folder: string
  is_starred: number | boolean
  in_window: number | boolean
  albums: string
  creation_time: string | null
  position: number
  updated_at: string
}

const INSERT_CHUNK_SIZE = 100

export class DatabaseService implements StateStore {
  readonly knex: Knex

  private constructor(
    private readonly log: FastifyBaseLogger,
    dbPath: string,
  ) {
    this.knex = knex(DatabaseService.createKnexConfig(dbPath, log))
  }

  /**
   * Opens the database, creating its directory when missing, and applies
   * pending migrations
   *
   * @param dbPath - SQLite file path, or ':memory:'
   */
  static async create(
    log: FastifyBaseLogger,
    dbPath: string,
  ): Promise<DatabaseService> {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(dirname(dbPath), { recursive: true })
    }

    const service = new DatabaseService(log, dbPath)
    const [, applied]: [number, string[]] =
      await service.knex.migrate.latest()
    if (applied.length > 0) {
      log.info(`Applied ${applied.length} database migration(s)`)
    }
    return service
  }

  /**
   * Creates Knex configuration for better-sqlite3
   *
   * A single pooled connection: SQLite serializes writers anyway, and an
   * in-memory database only lives as long as its connection.
   */
  private static createKnexConfig(
    dbPath: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
      },
      migrations: {
        migrationSource: new BundledMigrationSource(),
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  /**
   * Closes the database connection
   *
   * Should be called during application shutdown to properly clean up resources.
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }

  //=============================================================================
  // ITEM RECORDS
  //=============================================================================

  /**
   * Loads the item record mapping in the order it was saved
   */
  async loadItemRecords(): Promise<Map<string, ItemRecord>> {
    const rows = await this.knex<ItemRecordRow>('item_records')
      .select('*')
      .orderBy('position', 'asc')

    const records = new Map<string, ItemRecord>()
    for (const row of rows) {
      records.set(
        row.id,
        deserializeItemRecord({
          id: row.id,
          filename: row.filename,
          localFolder: row.local_folder,
          isStarred: Boolean(row.is_starred),
          inWindow: Boolean(row.in_window),
          albums: this.parseAlbums(row.albums, row.id),
          creationTime: row.creation_time,
        }),
      )
    }

    this.log.debug(`Loaded ${records.size} item records`)
    return records
  }

  /**
   * Replaces the stored mapping with the given snapshot
   */
  async saveItemRecords(
    records: ReadonlyMap<string, ItemRecord>,
  ): Promise<void> {
    const updatedAt = this.timestamp
    const rows = [...records.values()].map((record, position) => {
      const serialized = serializeItemRecord(record)
      return {
        id: serialized.id,
        filename: serialized.filename,
        local_folder: serialized.localFolder,
        is_starred: serialized.isStarred,
        in_window: serialized.inWindow,
        albums: JSON.stringify(serialized.albums),
        creation_time: serialized.creationTime,
        position,
        updated_at: updatedAt,
      }
    })

    await this.knex.transaction(async (trx) => {
      await trx('item_records').del()
      for (const chunk of this.chunkArray(rows, INSERT_CHUNK_SIZE)) {
        await trx('item_records').insert(chunk)
      }
    })

    this.log.debug(`Saved ${rows.length} item records`)
  }

  private parseAlbums(raw: string, id: string): string[] {
    try {
      const parsed: unknown = JSON.parse(raw)
      if (Array.isArray(parsed)) {
        return parsed.filter((title): title is string => typeof title === 'string')
      }
    } catch (error) {
      this.log.warn({ error, mediaItemId: id }, 'Unreadable albums column')
    }
    return []
  }

  private get timestamp() {
    return new Date().toISOString()
  }

  private chunkArray<T>(array: T[], size: number): T[][] {
    const chunks: T[][] = []
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size))
    }
    return chunks
  }
}
