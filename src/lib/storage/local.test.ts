import { mkdtemp, readFile, rm } from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { LocalFileStorage, resolveWithinRoot } from './local'

describe('resolveWithinRoot', () => {
  const root = path.resolve('/srv/uploads')

  it('resolves paths inside the root', () => {
    expect(resolveWithinRoot(root, 'a/b.png')).toBe(path.join(root, 'a', 'b.png'))
  })

  it('rejects the root itself and anything outside it', () => {
    expect(resolveWithinRoot(root, '')).toBeNull()
    expect(resolveWithinRoot(root, '../etc/passwd')).toBeNull()
    expect(resolveWithinRoot(root, 'a/../../uploads-other/x.png')).toBeNull()
  })
})

describe('LocalFileStorage', () => {
  let root: string
  let storage: LocalFileStorage

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    root = await mkdtemp(path.join(os.tmpdir(), 'tryon-storage-'))
    storage = new LocalFileStorage({ root, publicBaseUrl: 'http://localhost:3000/' })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(root, { recursive: true, force: true })
  })

  it('writes the bytes under the namespace and returns a files route url', async () => {
    const url = await storage.store(Buffer.from('PNGBYTES'), {
      namespace: 'tryon-results/1/3',
      contentType: 'image/png',
    })

    expect(url).toMatch(/^http:\/\/localhost:3000\/api\/files\/tryon-results\/1\/3\/[0-9a-f-]{36}\.png$/)
    const filePath = storage.pathFor(url)
    expect(filePath?.startsWith(path.join(root, 'tryon-results', '1', '3'))).toBe(true)
    expect(await readFile(filePath ?? '', 'utf8')).toBe('PNGBYTES')
  })

  it('deletes stored files and ignores missing or foreign urls', async () => {
    const url = await storage.store(Buffer.from('x'), { namespace: 'user-photos/1', contentType: 'image/jpeg' })

    await storage.delete(url)
    await expect(readFile(storage.pathFor(url) ?? '')).rejects.toMatchObject({ code: 'ENOENT' })

    await expect(storage.delete(url)).resolves.toBeUndefined()
    await expect(storage.delete('https://elsewhere.test/file.png')).resolves.toBeUndefined()
  })

  it('refuses a namespace that escapes the root', async () => {
    await expect(
      storage.store(Buffer.from('x'), { namespace: '../../outside', contentType: 'image/png' })
    ).rejects.toThrow('Invalid storage namespace: ../../outside')
  })

  it('does not map traversal urls to paths', () => {
    expect(storage.pathFor('http://localhost:3000/api/files/..%2F..%2Fsecret.txt')).toBeNull()
    expect(storage.pathFor('http://other.test/api/files/a.png')).toBeNull()
  })
})
