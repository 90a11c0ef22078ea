import type { Knex } from 'knex'

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('item_records', (table) => {
    table.string('id').primary()
    table.string('filename').notNullable()
    table.string('local_folder').notNullable().defaultTo('')
    table.boolean('is_starred').notNullable().defaultTo(false)
    table.boolean('in_window').notNullable().defaultTo(false)
    table.json('albums').notNullable()
    table.string('creation_time').nullable()
    table.integer('position').notNullable()
    table.timestamp('updated_at').defaultTo(knex.fn.now())
    table.index('local_folder')
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('item_records')
}
