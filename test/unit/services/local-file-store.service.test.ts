import fs from 'node:fs'
import path from 'node:path'
import { LocalFileStoreService } from '@services/local-file-store.service.js'
import { describe, expect, it } from 'vitest'
import { createTempDir } from '../../helpers/database.js'

describe('LocalFileStoreService', () => {
  it('should write into nested folders and read the bytes back', async (ctx) => {
    const store = new LocalFileStoreService(createTempDir('store', ctx))

    await store.writeFile('Wedding/IMG.jpg', Buffer.from('img'))

    expect(await store.exists('Wedding/IMG.jpg')).toBe(true)
    expect((await store.readFile('Wedding/IMG.jpg')).toString()).toBe('img')
    expect(
      fs.readFileSync(path.join(store.rootPath, 'Wedding', 'IMG.jpg'), 'utf8'),
    ).toBe('img')
  })

  it('should refuse paths outside the root', (ctx) => {
    const store = new LocalFileStoreService(createTempDir('store', ctx))

    expect(() => store.resolve('../outside.jpg')).toThrow(
      'Path escapes the photos root: ../outside.jpg',
    )
    expect(() => store.resolve('')).toThrow('Path escapes the photos root: ')
  })

  it('should report missing and invalid paths as absent', async (ctx) => {
    const store = new LocalFileStoreService(createTempDir('store', ctx))

    expect(await store.exists('missing.jpg')).toBe(false)
    expect(await store.exists('../outside.jpg')).toBe(false)
  })

  it('should move files into folders that do not exist yet', async (ctx) => {
    const store = new LocalFileStoreService(createTempDir('store', ctx))
    await store.writeFile('IMG.jpg', Buffer.from('img'))

    await store.move('IMG.jpg', 'Trip/IMG.jpg')

    expect(await store.exists('IMG.jpg')).toBe(false)
    expect((await store.readFile('Trip/IMG.jpg')).toString()).toBe('img')
  })

  it('should fail to move a missing file', async (ctx) => {
    const store = new LocalFileStoreService(createTempDir('store', ctx))

    await expect(store.move('missing.jpg', 'Trip/missing.jpg')).rejects.toMatchObject(
      { code: 'ENOENT' },
    )
  })

  it('should delete files', async (ctx) => {
    const store = new LocalFileStoreService(createTempDir('store', ctx))
    await store.writeFile('IMG.jpg', Buffer.from('img'))

    await store.delete('IMG.jpg')

    expect(await store.exists('IMG.jpg')).toBe(false)
  })

  it('should set the modification time', async (ctx) => {
    const store = new LocalFileStoreService(createTempDir('store', ctx))
    await store.writeFile('IMG.jpg', Buffer.from('img'))
    const captured = new Date('2020-01-01T10:00:00.000Z')

    await store.setModTime('IMG.jpg', captured)

    const stat = fs.statSync(path.join(store.rootPath, 'IMG.jpg'))
    expect(stat.mtime.getTime()).toBe(captured.getTime())
  })

  it('should list visible files sorted by path with their top folder', async (ctx) => {
    const store = new LocalFileStoreService(createTempDir('store', ctx))
    for (const file of [
      'b.jpg',
      'Album/a.jpg',
      'Album/Sub/c.jpg',
      '.hidden.jpg',
      '.cache/x.jpg',
    ]) {
      await store.writeFile(file, Buffer.from(file))
    }

    expect(await store.walk()).toEqual([
      { relativePath: 'Album/Sub/c.jpg', folder: 'Album', filename: 'c.jpg' },
      { relativePath: 'Album/a.jpg', folder: 'Album', filename: 'a.jpg' },
      { relativePath: 'b.jpg', folder: '', filename: 'b.jpg' },
    ])
  })

  it('should treat a missing root as empty and not writable', async (ctx) => {
    const root = path.join(createTempDir('store', ctx), 'not-created')
    const store = new LocalFileStoreService(root)

    expect(await store.walk()).toEqual([])
    expect(await store.isRootWritable()).toBe(false)

    await store.ensureRoot()
    expect(await store.isRootWritable()).toBe(true)
  })
})
