import { describe, expect, it, vi } from 'vitest'
import { AppError } from '@/lib/errors'
import { buildGenerateContentBody, GeminiImageClient, parseGeneratedImage } from './gemini-image'

const garment = { bytes: Buffer.from('GARMENT'), mimeType: 'image/jpeg' }
const photo = { bytes: Buffer.from('PHOTO'), mimeType: 'image/png' }

function imageResponse(part: Record<string, unknown>) {
  return { candidates: [{ content: { parts: [part] } }] }
}

describe('buildGenerateContentBody', () => {
  it('serializes garment, photo and prompt in that order with snake_case fields', () => {
    const body = buildGenerateContentBody(garment, photo, 'Dress them')

    expect(JSON.stringify(body)).toBe(
      '{"contents":[{"parts":[' +
        '{"inline_data":{"mime_type":"image/jpeg","data":"R0FSTUVOVA=="}},' +
        '{"inline_data":{"mime_type":"image/png","data":"UEhPVE8="}},' +
        '{"text":"Dress them"}]}]}'
    )
  })
})

describe('parseGeneratedImage', () => {
  it('reads camelCase inlineData', () => {
    const image = parseGeneratedImage(imageResponse({ inlineData: { mimeType: 'image/webp', data: 'UE5HQllURVM=' } }))

    expect(image.bytes.toString()).toBe('PNGBYTES')
    expect(image.mimeType).toBe('image/webp')
  })

  it('reads snake_case inline_data and defaults the type to png', () => {
    const image = parseGeneratedImage(imageResponse({ inline_data: { data: 'UE5HQllURVM=' } }))

    expect(image.bytes.toString()).toBe('PNGBYTES')
    expect(image.mimeType).toBe('image/png')
  })

  it('skips text parts and parts without data', () => {
    const image = parseGeneratedImage({
      candidates: [
        {
          content: {
            parts: [
              { text: 'Here is the image' },
              { inlineData: { data: '' } },
              'not an object',
              { inline_data: { mime_type: 'image/jpeg', data: 'UE5HQllURVM=' } },
            ],
          },
        },
      ],
    })

    expect(image.bytes.toString()).toBe('PNGBYTES')
    expect(image.mimeType).toBe('image/jpeg')
  })

  it('fails with a remote service error when there is no image', () => {
    expect(() => parseGeneratedImage(imageResponse({ text: 'sorry' }))).toThrow(
      new AppError('REMOTE_SERVICE', 'No image data in response from image model')
    )
    expect(() => parseGeneratedImage({})).toThrow('No image data in response from image model')
  })

  it('reports safety blocks', () => {
    expect(() => parseGeneratedImage({ candidates: [{ finishReason: 'SAFETY' }] })).toThrow(
      'Image generation was blocked by the safety filter'
    )
  })

  it('rejects a malformed envelope', () => {
    expect(() => parseGeneratedImage({ candidates: 'nope' })).toThrow('Unexpected response shape from image model')
  })
})

describe('GeminiImageClient', () => {
  const options = {
    apiKey: 'test-gemini-key',
    apiBaseUrl: 'https://gemini.test/v1beta',
    model: 'gemini-2.5-flash-image',
    timeoutMs: 5_000,
  }

  it('posts the body with the api key header and decodes the image', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      Response.json(imageResponse({ inlineData: { mimeType: 'image/png', data: 'UE5HQllURVM=' } }))
    )
    const client = new GeminiImageClient({ ...options, fetchImpl })

    const image = await client.generate(garment, photo, 'Dress them')

    expect(image.bytes.toString()).toBe('PNGBYTES')
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    const [url, init] = fetchImpl.mock.calls[0]
    expect(url).toBe('https://gemini.test/v1beta/models/gemini-2.5-flash-image:generateContent')
    expect(init?.method).toBe('POST')
    expect(init?.headers).toEqual({
      'x-goog-api-key': 'test-gemini-key',
      'Content-Type': 'application/json',
    })
    expect(init?.body).toBe(JSON.stringify(buildGenerateContentBody(garment, photo, 'Dress them')))
  })

  it('turns a non-200 status into a remote service error', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('quota exceeded', { status: 429 }))
    const client = new GeminiImageClient({ ...options, fetchImpl })

    await expect(client.generate(garment, photo, 'p')).rejects.toThrow(
      new AppError('REMOTE_SERVICE', 'Image model returned HTTP 429')
    )
  })

  it('rejects a non-JSON body', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('<html>oops</html>', { status: 200 }))
    const client = new GeminiImageClient({ ...options, fetchImpl })

    await expect(client.generate(garment, photo, 'p')).rejects.toThrow('Image model returned a non-JSON response')
  })

  it('wraps network failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed')
    })
    const client = new GeminiImageClient({ ...options, fetchImpl })

    await expect(client.generate(garment, photo, 'p')).rejects.toThrow('Image model request failed: fetch failed')
  })
})
