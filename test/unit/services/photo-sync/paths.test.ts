import {
  computeLocalPath,
  isMediaFile,
  splitFilename,
} from '@services/photo-sync/utils/paths.js'
import { describe, expect, it } from 'vitest'

describe('paths', () => {
  describe('computeLocalPath', () => {
    it('should place root files without a folder prefix', () => {
      expect(computeLocalPath('', 'IMG_1.jpg')).toBe('IMG_1.jpg')
    })

    it('should join folder and file name with a slash', () => {
      expect(computeLocalPath('Wedding', 'IMG_1.jpg')).toBe('Wedding/IMG_1.jpg')
    })
  })

  describe('splitFilename', () => {
    it('should split at the last dot', () => {
      expect(splitFilename('IMG.1.jpg')).toEqual({ stem: 'IMG.1', ext: '.jpg' })
    })

    it('should treat a name without a dot as extensionless', () => {
      expect(splitFilename('README')).toEqual({ stem: 'README', ext: '' })
    })

    it('should not treat a leading dot as an extension', () => {
      expect(splitFilename('.hidden')).toEqual({ stem: '.hidden', ext: '' })
    })
  })

  describe('isMediaFile', () => {
    it('should match media extensions regardless of case', () => {
      expect(isMediaFile('IMG_1.JPG')).toBe(true)
      expect(isMediaFile('clip.mov')).toBe(true)
      expect(isMediaFile('photo.heic')).toBe(true)
    })

    it('should reject other files', () => {
      expect(isMediaFile('notes.txt')).toBe(false)
      expect(isMediaFile('jpg')).toBe(false)
    })
  })
})
