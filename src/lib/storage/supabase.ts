import crypto from 'crypto'
import type { SupabaseClient } from '@supabase/supabase-js'
import { ioError } from '@/lib/errors'
import { deleteEach, objectName, type FileStorage, type StoreOptions } from './types'

export class SupabaseFileStorage implements FileStorage {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly bucket: string
  ) {}

  async store(bytes: Buffer, options: StoreOptions): Promise<string> {
    const name = objectName(options, crypto.randomUUID())

    const { error } = await this.supabase.storage
      .from(this.bucket)
      .upload(name, bytes, {
        contentType: options.contentType,
        upsert: false,
      })

    if (error) {
      console.error('[Storage] Upload error:', error.message)
      throw ioError(`Failed to upload ${name}`, error)
    }

    const { data: urlData } = this.supabase.storage
      .from(this.bucket)
      .getPublicUrl(name)

    return urlData.publicUrl
  }

  async delete(url: string): Promise<void> {
    const name = this.objectPath(url)
    if (!name) return

    const { error } = await this.supabase.storage.from(this.bucket).remove([name])
    if (error) {
      throw ioError(`Failed to delete ${name}`, error)
    }
  }

  deleteMany(urls: string[]): Promise<void> {
    return deleteEach(this, urls)
  }

  // Object path inside the bucket for one of its public URLs
  objectPath(url: string): string | null {
    const marker = `/storage/v1/object/public/${this.bucket}/`
    const index = url.indexOf(marker)
    if (index < 0) return null
    return decodeURIComponent(url.slice(index + marker.length).split('?')[0])
  }
}
