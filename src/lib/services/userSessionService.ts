import crypto from 'crypto'
import { isAppError, validationError } from '@/lib/errors'
import type {
  FavoriteRepository,
  TryonResultRepository,
  UserPhotoRepository,
  UserProfileRepository,
} from '@/lib/repositories'
import type { FileStorage } from '@/lib/storage'
import { fileExtension, uploadContentType, validateUpload, type UploadRules } from '@/lib/uploads'
import type { UploadedFile, UserPhoto, UserPhotoDto, UserProfile, UserStatistics } from '@/types'
import { requireOwnedPhoto, requireProfile } from './profiles'

const DAY_MS = 24 * 60 * 60 * 1000

export interface UserSessionServiceDeps {
  profiles: UserProfileRepository
  photos: UserPhotoRepository
  favorites: FavoriteRepository
  tryonResults: TryonResultRepository
  storage: FileStorage
  uploads: UploadRules
  clock?: () => number
}

export type UserSessionService = ReturnType<typeof createUserSessionService>

function toPhotoDto(photo: UserPhoto, tryonCount: number): UserPhotoDto {
  return {
    id: photo.id,
    photoUrl: photo.photoUrl,
    photoName: photo.photoName,
    uploadedAt: photo.uploadedAt,
    tryonCount,
    hasBeenUsed: tryonCount > 0,
  }
}

function requireName(name: string, label: string): string {
  const trimmed = name.trim()
  if (!trimmed) {
    throw validationError(`${label} must not be blank`)
  }
  return trimmed
}

export function createUserSessionService(deps: UserSessionServiceDeps) {
  const clock = deps.clock ?? Date.now

  async function photoDto(photo: UserPhoto): Promise<UserPhotoDto> {
    const counts = await deps.tryonResults.countByPhotoIds([photo.id])
    return toPhotoDto(photo, counts.get(photo.id) || 0)
  }

  async function createOrGetProfile(sessionId: string, profileName?: string | null): Promise<UserProfile> {
    const existing = await deps.profiles.findBySessionId(sessionId)
    if (existing) return existing

    try {
      const profile = await deps.profiles.insert(sessionId, profileName?.trim() || null)
      console.log(`[Session] Created profile ${profile.id}`)
      return profile
    } catch (error) {
      // Lost a race with a concurrent request for the same session
      if (isAppError(error) && error.kind === 'CONFLICT') {
        return requireProfile(deps.profiles, sessionId)
      }
      throw error
    }
  }

  async function updateProfileName(sessionId: string, profileName: string): Promise<UserProfile> {
    const profile = await requireProfile(deps.profiles, sessionId)
    return deps.profiles.updateName(profile.id, requireName(profileName, 'Profile name'))
  }

  async function deleteProfile(sessionId: string): Promise<void> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const photos = await deps.photos.findByProfileId(profile.id)
    const tryonImages = await deps.tryonResults.findImageUrls({ profileId: profile.id })
    await deps.profiles.delete(profile.id)
    await deps.storage.deleteMany([...photos.map(photo => photo.photoUrl), ...tryonImages])
    console.log(`[Session] Deleted profile ${profile.id}`)
  }

  async function uploadPhoto(sessionId: string, file: UploadedFile, photoName?: string | null): Promise<UserPhotoDto> {
    const profile = await requireProfile(deps.profiles, sessionId)
    validateUpload(file, deps.uploads)

    const photoUrl = await deps.storage.store(file.bytes, {
      namespace: `user-photos/${profile.id}`,
      contentType: uploadContentType(file),
      extension: fileExtension(file.name),
    })
    try {
      const photo = await deps.photos.insert({
        userProfileId: profile.id,
        photoUrl,
        photoName: photoName?.trim() || file.name,
      })
      return toPhotoDto(photo, 0)
    } catch (error) {
      await deps.storage.deleteMany([photoUrl])
      throw error
    }
  }

  async function listPhotos(sessionId: string): Promise<UserPhotoDto[]> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const photos = await deps.photos.findByProfileId(profile.id)
    const counts = await deps.tryonResults.countByPhotoIds(photos.map(photo => photo.id))
    return photos.map(photo => toPhotoDto(photo, counts.get(photo.id) || 0))
  }

  async function deletePhoto(sessionId: string, photoId: number): Promise<void> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const photo = await requireOwnedPhoto(deps.photos, photoId, profile)
    const tryonImages = await deps.tryonResults.findImageUrls({ photoId: photo.id })
    await deps.photos.delete(photo.id)
    await deps.storage.deleteMany([photo.photoUrl, ...tryonImages])
  }

  async function renamePhoto(sessionId: string, photoId: number, name: string): Promise<UserPhotoDto> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const photo = await requireOwnedPhoto(deps.photos, photoId, profile)
    return photoDto(await deps.photos.updateName(photo.id, requireName(name, 'Photo name')))
  }

  async function generateSessionId(): Promise<string> {
    let sessionId = crypto.randomUUID()
    while (await deps.profiles.existsBySessionId(sessionId)) {
      sessionId = crypto.randomUUID()
    }
    return sessionId
  }

  async function isValidSession(sessionId?: string | null): Promise<boolean> {
    if (!sessionId) return false
    return deps.profiles.existsBySessionId(sessionId)
  }

  async function statistics(sessionId: string): Promise<UserStatistics> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const [photoCount, favoriteCount, tryonResultCount] = await Promise.all([
      deps.photos.countByProfileId(profile.id),
      deps.favorites.countByProfileId(profile.id),
      deps.tryonResults.countByProfileId(profile.id),
    ])
    return {
      photoCount,
      favoriteCount,
      tryonResultCount,
      profileCreatedAt: profile.createdAt,
      hasProfileName: Boolean(profile.profileName?.trim()),
    }
  }

  // Removes profiles older than `days` that never uploaded, favorited or generated anything
  async function cleanupOldSessions(days: number): Promise<number> {
    if (!Number.isInteger(days) || days < 1) {
      throw validationError('days must be a positive integer')
    }
    const cutoff = new Date(clock() - days * DAY_MS).toISOString()
    const candidates = await deps.profiles.findCreatedBefore(cutoff)

    let removed = 0
    for (const profile of candidates) {
      const [photoCount, favoriteCount, tryonResultCount] = await Promise.all([
        deps.photos.countByProfileId(profile.id),
        deps.favorites.countByProfileId(profile.id),
        deps.tryonResults.countByProfileId(profile.id),
      ])
      if (photoCount + favoriteCount + tryonResultCount > 0) continue

      await deps.profiles.delete(profile.id)
      removed++
    }

    console.log(`[Session] Cleaned up ${removed} inactive profiles older than ${days} days`)
    return removed
  }

  return {
    createOrGetProfile,
    getProfile: (sessionId: string) => requireProfile(deps.profiles, sessionId),
    updateProfileName,
    deleteProfile,
    uploadPhoto,
    listPhotos,
    deletePhoto,
    renamePhoto,
    generateSessionId,
    isValidSession,
    statistics,
    cleanupOldSessions,
  }
}
