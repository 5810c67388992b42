export interface StoreOptions {
  // Directory-like prefix, e.g. `tryon-results/12/3`
  namespace: string
  contentType: string
  extension?: string
}

export interface FileStorage {
  // Returns the public URL of the stored object
  store(bytes: Buffer, options: StoreOptions): Promise<string>
  delete(url: string): Promise<void>
  // Best effort; failures are logged and skipped
  deleteMany(urls: string[]): Promise<void>
}

const EXTENSION_BY_TYPE: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
}

export function extensionFor(contentType: string): string {
  const base = contentType.split(';')[0].trim().toLowerCase()
  return EXTENSION_BY_TYPE[base] || 'jpg'
}

export function objectName(options: StoreOptions, id: string): string {
  const namespace = options.namespace.replace(/^\/+|\/+$/g, '')
  const extension = (options.extension || extensionFor(options.contentType)).replace(/^\./, '')
  return `${namespace}/${id}.${extension}`
}

export async function deleteEach(storage: Pick<FileStorage, 'delete'>, urls: string[]): Promise<void> {
  const results = await Promise.allSettled(urls.map(url => storage.delete(url)))
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      console.warn('[Storage] Failed to delete', urls[index], result.reason)
    }
  })
}
