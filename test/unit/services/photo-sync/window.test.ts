import {
  buildWindowDateRange,
  computeWindowCutoff,
  isWithinWindow,
} from '@services/photo-sync/tag-gathering/index.js'
import { describe, expect, it } from 'vitest'

const now = new Date('2024-06-30T12:00:00.000Z')

describe('window', () => {
  describe('computeWindowCutoff', () => {
    it('should subtract the window length in days', () => {
      expect(computeWindowCutoff(now, 10).toISOString()).toBe(
        '2024-06-20T12:00:00.000Z',
      )
    })
  })

  describe('isWithinWindow', () => {
    const cutoff = computeWindowCutoff(now, 10)

    it('should return null for a missing capture time', () => {
      expect(isWithinWindow(null, cutoff)).toBeNull()
      expect(isWithinWindow(undefined, cutoff)).toBeNull()
      expect(isWithinWindow('', cutoff)).toBeNull()
    })

    it('should return null for an unparseable capture time', () => {
      expect(isWithinWindow('not-a-date', cutoff)).toBeNull()
    })

    it('should include a capture time exactly at the cutoff', () => {
      expect(isWithinWindow('2024-06-20T12:00:00.000Z', cutoff)).toBe(true)
    })

    it('should exclude a capture time just before the cutoff', () => {
      expect(isWithinWindow('2024-06-20T11:59:59.999Z', cutoff)).toBe(false)
    })

    it('should include recent capture times', () => {
      expect(isWithinWindow('2024-06-29T08:00:00Z', cutoff)).toBe(true)
    })
  })

  describe('buildWindowDateRange', () => {
    it('should cover the window in UTC calendar dates', () => {
      expect(buildWindowDateRange(now, 10)).toEqual({
        startDate: { year: 2024, month: 6, day: 20 },
        endDate: { year: 2024, month: 6, day: 30 },
      })
    })
  })
})
