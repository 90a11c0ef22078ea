import type { Knex } from 'knex'
import * as itemRecords from './001_item_records.js'

interface BundledMigration {
  name: string
  migration: Knex.Migration
}

// Append new migrations here, in order
const migrations: BundledMigration[] = [
  { name: '001_item_records', migration: itemRecords },
]

/**
 * Serves the migrations compiled into the application instead of reading a
 * directory at run time, so the same list works from src/ under tsx and from
 * dist/ after a build.
 */
export class BundledMigrationSource
  implements Knex.MigrationSource<BundledMigration>
{
  async getMigrations(): Promise<BundledMigration[]> {
    return migrations
  }

  getMigrationName(migration: BundledMigration): string {
    return migration.name
  }

  async getMigration(migration: BundledMigration): Promise<Knex.Migration> {
    return migration.migration
  }
}
