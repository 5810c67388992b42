/**
 * Service wiring for route handlers
 *
 * Built lazily on first use so that `next build` does not need the runtime
 * environment.
 */
import { loadConfig, type AppConfig } from '@/lib/config'
import { fetchImage } from '@/lib/http'
import type { Repositories } from '@/lib/repositories'
import { createFileStorage, type FileStorage } from '@/lib/storage'
import { createServiceClient } from '@/lib/supabase/server'
import { createSupabaseRepositories } from '@/lib/supabase'
import { GeminiImageClient, type ImageGenerator } from '@/lib/tryon/gemini-image'
import { createPromptStrategies } from '@/lib/tryon/models'
import { createGeminiTextGenerator, PromptEnhancer, type TextGenerator } from '@/lib/tryon/prompt-enhancer'
import { createFavoriteService, type FavoriteService } from '@/lib/services/favoriteService'
import { createGarmentService, type GarmentService } from '@/lib/services/garmentService'
import { createTryOnService, type TryOnService } from '@/lib/services/tryOnService'
import { createUserSessionService, type UserSessionService } from '@/lib/services/userSessionService'

export interface Services {
  config: AppConfig
  tryOn: TryOnService
  garments: GarmentService
  sessions: UserSessionService
  favorites: FavoriteService
}

export interface ServiceOverrides {
  repositories?: Repositories
  storage?: FileStorage
  imageGenerator?: ImageGenerator
  textGenerator?: TextGenerator
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const needsSupabase = !overrides.repositories || (!overrides.storage && config.storage.driver === 'supabase')
  const supabase = needsSupabase ? createServiceClient(config.supabase) : null

  const repositories = overrides.repositories ?? createSupabaseRepositories(requireClient(supabase))
  const storage = overrides.storage ?? createFileStorage(config.storage, requireClient(supabase))
  const imageGenerator = overrides.imageGenerator ?? new GeminiImageClient({
    apiKey: config.gemini.apiKey,
    apiBaseUrl: config.gemini.apiBaseUrl,
    model: config.gemini.imageModel,
    timeoutMs: config.gemini.timeoutMs,
  })
  const textGenerator = overrides.textGenerator ?? createGeminiTextGenerator({
    apiKey: config.gemini.apiKey,
    model: config.gemini.textModel,
    timeoutMs: config.gemini.timeoutMs,
  })

  return {
    config,
    tryOn: createTryOnService({
      ...repositories,
      storage,
      imageGenerator,
      promptStrategies: createPromptStrategies(new PromptEnhancer(textGenerator)),
      fetchImage: url => fetchImage(url, { timeoutMs: config.imageFetchTimeoutMs }),
      placeholderImageUrl: config.placeholderImageUrl,
    }),
    garments: createGarmentService({ ...repositories, storage, uploads: config.upload }),
    sessions: createUserSessionService({ ...repositories, storage, uploads: config.upload }),
    favorites: createFavoriteService(repositories),
  }
}

function requireClient<T>(client: T | null): T {
  if (client === null) {
    throw new Error('Supabase client was not created')
  }
  return client
}

let services: Services | null = null

export function getServices(): Services {
  if (!services) {
    services = createServices(loadConfig())
  }
  return services
}
