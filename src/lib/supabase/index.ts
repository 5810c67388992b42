import type { SupabaseClient } from '@supabase/supabase-js'
import type { Repositories } from '@/lib/repositories'
import { createFavoriteRepository } from './favorites'
import { createGarmentImageRepository, createGarmentRepository } from './garments'
import { createUserPhotoRepository, createUserProfileRepository } from './profiles'
import { createTryonResultRepository } from './tryonResults'

export function createSupabaseRepositories(supabase: SupabaseClient): Repositories {
  return {
    garments: createGarmentRepository(supabase),
    garmentImages: createGarmentImageRepository(supabase),
    profiles: createUserProfileRepository(supabase),
    photos: createUserPhotoRepository(supabase),
    favorites: createFavoriteRepository(supabase),
    tryonResults: createTryonResultRepository(supabase),
  }
}
