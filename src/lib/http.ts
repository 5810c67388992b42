import { ioError } from '@/lib/errors'

export type FetchLike = typeof fetch

export interface FetchedImage {
  bytes: Buffer
  mimeType: string
}

export interface FetchImageOptions {
  timeoutMs: number
  fetchImpl?: FetchLike
}

const DEFAULT_IMAGE_TYPE = 'image/jpeg'

// `image/*` media type from a Content-Type header, without parameters
export function imageMimeType(contentType: string | null): string {
  const base = contentType?.split(';')[0].trim().toLowerCase()
  return base && base.startsWith('image/') ? base : DEFAULT_IMAGE_TYPE
}

export async function fetchImage(url: string, options: FetchImageOptions): Promise<FetchedImage> {
  const fetchImpl = options.fetchImpl ?? fetch

  let response: Response
  try {
    response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) })
  } catch (error) {
    const reason = error instanceof Error && error.name === 'TimeoutError'
      ? `timed out after ${options.timeoutMs}ms`
      : error instanceof Error ? error.message : String(error)
    throw ioError(`Failed to fetch image ${url}: ${reason}`, error)
  }

  if (!response.ok) {
    throw ioError(`Failed to fetch image ${url}: HTTP ${response.status}`)
  }

  let bytes: Buffer
  try {
    bytes = Buffer.from(await response.arrayBuffer())
  } catch (error) {
    throw ioError(`Failed to read image ${url}`, error)
  }
  if (bytes.length === 0) {
    throw ioError(`Image ${url} is empty`)
  }

  return { bytes, mimeType: imageMimeType(response.headers.get('content-type')) }
}
