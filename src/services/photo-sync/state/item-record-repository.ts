import type { ItemRecord } from '@root/types/item-record.types.js'
import type { StateStore } from '@root/types/photo-sync.types.js'

/**
 * In-memory authoritative copy of the item record mapping.
 *
 * Stages mutate records through this repository and call {@link flush} at
 * their boundaries; a flush only reaches the state store when something
 * changed since the previous one.
 */
export class ItemRecordRepository {
  private records = new Map<string, ItemRecord>()
  private dirty = false

  constructor(private readonly store: StateStore) {}

  async load(): Promise<void> {
    this.records = await this.store.loadItemRecords()
    this.dirty = false
  }

  get size(): number {
    return this.records.size
  }

  get(id: string): ItemRecord | undefined {
    return this.records.get(id)
  }

  has(id: string): boolean {
    return this.records.has(id)
  }

  /**
   * Records in insertion order. Returns a copy so callers may delete while
   * iterating.
   */
  values(): ItemRecord[] {
    return [...this.records.values()]
  }

  insert(record: ItemRecord): void {
    if (this.records.has(record.id)) {
      throw new Error(`Item record ${record.id} already exists`)
    }
    this.records.set(record.id, record)
    this.dirty = true
  }

  delete(id: string): boolean {
    const deleted = this.records.delete(id)
    if (deleted) {
      this.dirty = true
    }
    return deleted
  }

  /**
   * Flags the mapping as changed after an in-place mutation of a record
   */
  markDirty(): void {
    this.dirty = true
  }

  /**
   * Persists the mapping when it changed since the last flush
   */
  async flush(): Promise<void> {
    if (!this.dirty) {
      return
    }
    await this.store.saveItemRecords(this.records)
    this.dirty = false
  }
}
