import crypto from 'crypto'
import { mkdir, unlink, writeFile } from 'fs/promises'
import path from 'path'
import { ioError } from '@/lib/errors'
import { deleteEach, objectName, type FileStorage, type StoreOptions } from './types'

export const FILES_ROUTE = '/api/files'

/**
 * Absolute path of `relative` under `root`, or null when it would escape it.
 */
export function resolveWithinRoot(root: string, relative: string): string | null {
  const base = path.resolve(root)
  const target = path.resolve(base, relative)
  if (target === base || !target.startsWith(base + path.sep)) {
    return null
  }
  return target
}

export interface LocalStorageOptions {
  root: string
  publicBaseUrl: string
}

export class LocalFileStorage implements FileStorage {
  private readonly root: string
  private readonly urlPrefix: string

  constructor(options: LocalStorageOptions) {
    this.root = path.resolve(options.root)
    this.urlPrefix = `${options.publicBaseUrl.replace(/\/+$/, '')}${FILES_ROUTE}/`
  }

  async store(bytes: Buffer, options: StoreOptions): Promise<string> {
    const name = objectName(options, crypto.randomUUID())
    const target = resolveWithinRoot(this.root, name)
    if (!target) {
      throw ioError(`Invalid storage namespace: ${options.namespace}`)
    }

    try {
      await mkdir(path.dirname(target), { recursive: true })
      await writeFile(target, bytes)
    } catch (error) {
      throw ioError(`Failed to store file ${name}`, error)
    }

    console.log('[Storage] Stored', name, `(${bytes.length} bytes)`)
    return this.urlPrefix + name
  }

  async delete(url: string): Promise<void> {
    const target = this.pathFor(url)
    if (!target) return

    try {
      await unlink(target)
    } catch (error) {
      if (isMissingFile(error)) return
      throw ioError(`Failed to delete file ${url}`, error)
    }
  }

  deleteMany(urls: string[]): Promise<void> {
    return deleteEach(this, urls)
  }

  // Local path for a URL this storage produced, null for anything else
  pathFor(url: string): string | null {
    if (!url.startsWith(this.urlPrefix)) return null
    return resolveWithinRoot(this.root, decodeURIComponent(url.slice(this.urlPrefix.length)))
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
