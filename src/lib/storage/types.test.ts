import { describe, expect, it, vi } from 'vitest'
import { deleteEach, extensionFor, objectName } from './types'

describe('extensionFor', () => {
  it('maps image types to file extensions', () => {
    expect(extensionFor('image/jpeg')).toBe('jpg')
    expect(extensionFor('image/PNG')).toBe('png')
    expect(extensionFor('image/webp; q=1')).toBe('webp')
  })

  it('defaults to jpg', () => {
    expect(extensionFor('application/octet-stream')).toBe('jpg')
  })
})

describe('objectName', () => {
  it('joins the namespace, id and extension', () => {
    expect(objectName({ namespace: 'tryon-results/1/3', contentType: 'image/png' }, 'abc')).toBe(
      'tryon-results/1/3/abc.png'
    )
  })

  it('trims slashes and a leading dot', () => {
    expect(objectName({ namespace: '/user-photos/2/', contentType: 'image/png', extension: '.webp' }, 'abc')).toBe(
      'user-photos/2/abc.webp'
    )
  })
})

describe('deleteEach', () => {
  it('attempts every url and logs the failures', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const attempted: string[] = []
    const storage = {
      async delete(url: string) {
        attempted.push(url)
        if (url === 'b') throw new Error('boom')
      },
    }

    await deleteEach(storage, ['a', 'b', 'c'])

    expect(attempted).toEqual(['a', 'b', 'c'])
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0][1]).toBe('b')
    warn.mockRestore()
  })
})
