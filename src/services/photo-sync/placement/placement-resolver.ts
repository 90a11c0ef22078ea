import {
  type ItemRecord,
  ROOT_FOLDER,
} from '@root/types/item-record.types.js'

/**
 * Maps a record's tags to its canonical local folder.
 *
 * - Album members live in the folder named after their smallest album title
 *   (code-unit ordering, so the choice is independent of insertion order).
 * - Favorites and in-window items live at the root.
 * - Anything else also maps to the root; such records fail the retention
 *   predicate and are removed by the pruner, so the value is never used.
 */
export function resolvePlacement(record: Pick<ItemRecord, 'albums'>): string {
  if (record.albums.size === 0) {
    return ROOT_FOLDER
  }
  return [...record.albums].sort()[0]
}
