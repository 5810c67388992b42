import { describe, expect, it } from 'vitest'
import { loadConfig } from './config'

const baseEnv = {
  NEXT_PUBLIC_SUPABASE_URL: 'https://project.supabase.test',
  SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
  GEMINI_API_KEY: 'test-gemini-key',
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(baseEnv)

    expect(config.gemini).toEqual({
      apiKey: 'test-gemini-key',
      apiBaseUrl: 'https://generativelanguage.googleapis.com/v1beta',
      imageModel: 'gemini-2.5-flash-image',
      textModel: 'gemini-2.5-flash',
      timeoutMs: 60_000,
    })
    expect(config.storage).toEqual({
      driver: 'local',
      bucket: 'tryon',
      localPath: 'uploads',
      publicBaseUrl: 'http://localhost:3000',
    })
    expect(config.upload).toEqual({
      maxBytes: 10 * 1024 * 1024,
      allowedExtensions: ['jpg', 'jpeg', 'png', 'gif', 'webp'],
    })
    expect(config.adminToken).toBeUndefined()
    expect(config.placeholderImageUrl).toBeUndefined()
  })

  it('reads overrides and normalizes them', () => {
    const config = loadConfig({
      ...baseEnv,
      GEMINI_API_BASE_URL: 'https://proxy.test/v1beta/',
      GEMINI_TIMEOUT_MS: '15000',
      STORAGE_DRIVER: 'supabase',
      PUBLIC_BASE_URL: 'https://tryon.test/',
      ALLOWED_UPLOAD_EXTENSIONS: ' PNG, webp ,',
      ADMIN_API_TOKEN: 'test-admin-token',
      TRYON_PLACEHOLDER_IMAGE_URL: 'https://cdn.test/placeholder.png',
    })

    expect(config.gemini.apiBaseUrl).toBe('https://proxy.test/v1beta')
    expect(config.gemini.timeoutMs).toBe(15000)
    expect(config.storage.driver).toBe('supabase')
    expect(config.storage.publicBaseUrl).toBe('https://tryon.test')
    expect(config.upload.allowedExtensions).toEqual(['png', 'webp'])
    expect(config.adminToken).toBe('test-admin-token')
    expect(config.placeholderImageUrl).toBe('https://cdn.test/placeholder.png')
  })

  it('treats a blank placeholder url as unset', () => {
    expect(loadConfig({ ...baseEnv, TRYON_PLACEHOLDER_IMAGE_URL: '  ' }).placeholderImageUrl).toBeUndefined()
  })

  it('names the missing variables', () => {
    const { GEMINI_API_KEY: _omitted, ...env } = baseEnv

    expect(() => loadConfig(env)).toThrow('Invalid configuration - GEMINI_API_KEY: Required')
  })

  it('rejects an unknown storage driver', () => {
    expect(() => loadConfig({ ...baseEnv, STORAGE_DRIVER: 's3' })).toThrow(/STORAGE_DRIVER/)
  })
})
