/**
 * Gemini image generation over REST
 *
 * The request body uses the snake_case field names of the public REST API;
 * responses are accepted in either casing.
 */
import { z } from 'zod'
import { remoteServiceError } from '@/lib/errors'
import type { FetchLike } from '@/lib/http'

export interface InlineImage {
  bytes: Buffer
  mimeType: string
}

export interface GeneratedImage {
  bytes: Buffer
  mimeType: string
}

export interface ImageGenerator {
  generate(garment: InlineImage, photo: InlineImage, prompt: string): Promise<GeneratedImage>
}

export interface GenerateContentBody {
  contents: Array<{
    parts: Array<
      | { inline_data: { mime_type: string; data: string } }
      | { text: string }
    >
  }>
}

export function buildGenerateContentBody(
  garment: InlineImage,
  photo: InlineImage,
  prompt: string
): GenerateContentBody {
  return {
    contents: [
      {
        parts: [
          { inline_data: { mime_type: garment.mimeType, data: garment.bytes.toString('base64') } },
          { inline_data: { mime_type: photo.mimeType, data: photo.bytes.toString('base64') } },
          { text: prompt },
        ],
      },
    ],
  }
}

const inlineDataSchema = z.object({
  data: z.string().optional(),
  mimeType: z.string().optional(),
  mime_type: z.string().optional(),
})

const partSchema = z.object({
  inlineData: inlineDataSchema.optional(),
  inline_data: inlineDataSchema.optional(),
})

const responseSchema = z.object({
  candidates: z
    .array(
      z.object({
        finishReason: z.string().optional(),
        content: z.object({ parts: z.array(z.unknown()).optional() }).optional(),
      })
    )
    .optional(),
})

const DEFAULT_RESULT_TYPE = 'image/png'

// First inline image of the first candidate
export function parseGeneratedImage(payload: unknown): GeneratedImage {
  const parsed = responseSchema.safeParse(payload)
  if (!parsed.success) {
    throw remoteServiceError('Unexpected response shape from image model')
  }

  const candidate = parsed.data.candidates?.[0]
  for (const raw of candidate?.content?.parts || []) {
    const part = partSchema.safeParse(raw)
    if (!part.success) continue

    const inline = part.data.inlineData ?? part.data.inline_data
    if (inline?.data) {
      return {
        bytes: Buffer.from(inline.data, 'base64'),
        mimeType: inline.mimeType || inline.mime_type || DEFAULT_RESULT_TYPE,
      }
    }
  }

  if (candidate?.finishReason === 'SAFETY') {
    throw remoteServiceError('Image generation was blocked by the safety filter')
  }
  throw remoteServiceError('No image data in response from image model')
}

export interface GeminiImageClientOptions {
  apiKey: string
  apiBaseUrl: string
  model: string
  timeoutMs: number
  fetchImpl?: FetchLike
}

export class GeminiImageClient implements ImageGenerator {
  private readonly fetchImpl: FetchLike

  constructor(private readonly options: GeminiImageClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  get endpoint(): string {
    return `${this.options.apiBaseUrl}/models/${this.options.model}:generateContent`
  }

  async generate(garment: InlineImage, photo: InlineImage, prompt: string): Promise<GeneratedImage> {
    const body = buildGenerateContentBody(garment, photo, prompt)

    let response: Response
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'x-goog-api-key': this.options.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      })
    } catch (error) {
      const reason = error instanceof Error && error.name === 'TimeoutError'
        ? `timed out after ${this.options.timeoutMs}ms`
        : error instanceof Error ? error.message : String(error)
      throw remoteServiceError(`Image model request failed: ${reason}`, error)
    }

    const text = await response.text()
    if (!response.ok) {
      console.error(`[Gemini] ${this.options.model} returned ${response.status}:`, text.substring(0, 200))
      throw remoteServiceError(`Image model returned HTTP ${response.status}`)
    }

    let payload: unknown
    try {
      payload = JSON.parse(text)
    } catch (error) {
      console.error(`[Gemini] ${this.options.model} returned non-JSON response:`, text.substring(0, 100))
      throw remoteServiceError('Image model returned a non-JSON response', error)
    }

    return parseGeneratedImage(payload)
  }
}
