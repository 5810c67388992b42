/**
 * Runtime configuration
 *
 * Read once from the environment and handed to the service factories.
 */
import { z } from 'zod'
import { AppError } from '@/lib/errors'

const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta'

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(value =>
      value
        .split(',')
        .map(item => item.trim().toLowerCase())
        .filter(Boolean)
    )

const optionalUrl = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined))
  .pipe(z.string().url().optional())

const envSchema = z.object({
  NEXT_PUBLIC_SUPABASE_URL: z.string().url({ message: 'NEXT_PUBLIC_SUPABASE_URL must be a URL' }),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'SUPABASE_SERVICE_ROLE_KEY is required'),
  GEMINI_API_KEY: z.string().min(1, 'GEMINI_API_KEY is required'),
  GEMINI_API_BASE_URL: z.string().url().default(DEFAULT_GEMINI_BASE_URL),
  GEMINI_IMAGE_MODEL: z.string().min(1).default('gemini-2.5-flash-image'),
  GEMINI_TEXT_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  IMAGE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  STORAGE_DRIVER: z.enum(['local', 'supabase']).default('local'),
  STORAGE_BUCKET: z.string().min(1).default('tryon'),
  LOCAL_STORAGE_PATH: z.string().min(1).default('uploads'),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:3000'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  ALLOWED_UPLOAD_EXTENSIONS: csv('jpg,jpeg,png,gif,webp'),
  ADMIN_API_TOKEN: z.string().optional(),
  TRYON_PLACEHOLDER_IMAGE_URL: optionalUrl,
})

export type StorageDriver = 'local' | 'supabase'

export interface AppConfig {
  supabase: {
    url: string
    serviceRoleKey: string
  }
  gemini: {
    apiKey: string
    apiBaseUrl: string
    imageModel: string
    textModel: string
    timeoutMs: number
  }
  imageFetchTimeoutMs: number
  storage: {
    driver: StorageDriver
    bucket: string
    localPath: string
    publicBaseUrl: string
  }
  upload: {
    maxBytes: number
    allowedExtensions: string[]
  }
  adminToken?: string
  // Opt-in degraded mode for failed generations
  placeholderImageUrl?: string
}

type Env = Record<string, string | undefined>

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new AppError('CONFIG', `Invalid configuration - ${details}`)
  }

  const e = parsed.data
  return {
    supabase: {
      url: e.NEXT_PUBLIC_SUPABASE_URL,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
    },
    gemini: {
      apiKey: e.GEMINI_API_KEY,
      apiBaseUrl: e.GEMINI_API_BASE_URL.replace(/\/+$/, ''),
      imageModel: e.GEMINI_IMAGE_MODEL,
      textModel: e.GEMINI_TEXT_MODEL,
      timeoutMs: e.GEMINI_TIMEOUT_MS,
    },
    imageFetchTimeoutMs: e.IMAGE_FETCH_TIMEOUT_MS,
    storage: {
      driver: e.STORAGE_DRIVER,
      bucket: e.STORAGE_BUCKET,
      localPath: e.LOCAL_STORAGE_PATH,
      publicBaseUrl: e.PUBLIC_BASE_URL.replace(/\/+$/, ''),
    },
    upload: {
      maxBytes: e.MAX_UPLOAD_BYTES,
      allowedExtensions: e.ALLOWED_UPLOAD_EXTENSIONS,
    },
    adminToken: e.ADMIN_API_TOKEN || undefined,
    placeholderImageUrl: e.TRYON_PLACEHOLDER_IMAGE_URL,
  }
}
