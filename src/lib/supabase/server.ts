import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import type { AppConfig } from '@/lib/config'

// Service role client - bypasses RLS; session profiles are not Supabase users
export function createServiceClient(config: AppConfig['supabase']): SupabaseClient {
  return createClient(config.url, config.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  })
}

// PostgREST error shape, as much of it as the repositories look at
export interface DbError {
  message: string
  code?: string
}

// Unique constraint violation
export const UNIQUE_VIOLATION = '23505'

export function dbFailure(context: string, error: DbError): Error {
  console.error(`[Supabase] ${context}:`, error.message, error.code ?? '')
  return new Error(`${context}: ${error.message}`)
}
