import type { SupabaseClient } from '@supabase/supabase-js'
import type { AppConfig } from '@/lib/config'
import { LocalFileStorage } from './local'
import { SupabaseFileStorage } from './supabase'
import type { FileStorage } from './types'

export type { FileStorage, StoreOptions } from './types'

export function createFileStorage(config: AppConfig['storage'], supabase: SupabaseClient): FileStorage {
  switch (config.driver) {
    case 'supabase':
      return new SupabaseFileStorage(supabase, config.bucket)
    case 'local':
      return new LocalFileStorage({ root: config.localPath, publicBaseUrl: config.publicBaseUrl })
  }
}
