import { resolvePlacement } from '@services/photo-sync/placement/index.js'
import { describe, expect, it } from 'vitest'

describe('resolvePlacement', () => {
  it('should place records without albums at the root', () => {
    expect(resolvePlacement({ albums: new Set() })).toBe('')
  })

  it('should pick the smallest album title', () => {
    expect(resolvePlacement({ albums: new Set(['Zoo', 'Alpha', 'Mid']) })).toBe(
      'Alpha',
    )
  })

  it('should not depend on insertion order', () => {
    expect(resolvePlacement({ albums: new Set(['Trip', 'Family']) })).toBe(
      resolvePlacement({ albums: new Set(['Family', 'Trip']) }),
    )
  })

  it('should compare titles by code unit', () => {
    // 'B' (66) sorts before 'a' (97)
    expect(resolvePlacement({ albums: new Set(['alpha', 'Beta']) })).toBe('Beta')
  })
})
