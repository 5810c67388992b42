import { validationError } from '@/lib/errors'
import type { UploadedFile } from '@/types'

export interface UploadRules {
  maxBytes: number
  allowedExtensions: string[]
}

const TYPE_BY_EXTENSION: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
}

export function fileExtension(name: string): string {
  const dot = name.lastIndexOf('.')
  return dot >= 0 ? name.slice(dot + 1).toLowerCase() : ''
}

// Declared type when it is an image type, otherwise derived from the extension
export function uploadContentType(file: Pick<UploadedFile, 'name' | 'type'>): string {
  if (file.type.startsWith('image/')) return file.type
  return TYPE_BY_EXTENSION[fileExtension(file.name)] || 'application/octet-stream'
}

export function validateUpload(file: UploadedFile, rules: UploadRules): void {
  if (file.size === 0 || file.bytes.length === 0) {
    throw validationError('File is empty')
  }
  if (file.size > rules.maxBytes) {
    throw validationError(`File size exceeds maximum allowed size of ${rules.maxBytes} bytes`)
  }
  const extension = fileExtension(file.name)
  if (!rules.allowedExtensions.includes(extension)) {
    throw validationError(
      `File type not allowed. Allowed types: ${rules.allowedExtensions.join(', ')}`
    )
  }
}

// Reads a multipart form entry into memory
export async function readUploadedFile(file: File): Promise<UploadedFile> {
  const arrayBuffer = await file.arrayBuffer()
  return {
    name: file.name,
    type: file.type,
    size: file.size,
    bytes: Buffer.from(arrayBuffer),
  }
}
