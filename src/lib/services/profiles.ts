import { forbidden, notFound } from '@/lib/errors'
import type { UserPhotoRepository, UserProfileRepository } from '@/lib/repositories'
import type { UserPhoto, UserProfile } from '@/types'

export async function requireProfile(
  profiles: UserProfileRepository,
  sessionId: string
): Promise<UserProfile> {
  const profile = await profiles.findBySessionId(sessionId)
  if (!profile) {
    throw notFound(`User profile not found for session: ${sessionId}`)
  }
  return profile
}

export async function requireOwnedPhoto(
  photos: UserPhotoRepository,
  photoId: number,
  profile: UserProfile
): Promise<UserPhoto> {
  const photo = await photos.findById(photoId)
  if (!photo) {
    throw notFound(`User photo not found with ID: ${photoId}`)
  }
  if (photo.userProfileId !== profile.id) {
    throw forbidden(`User photo ${photoId} does not belong to this session`)
  }
  return photo
}

// Given name, else the stored file name
export function photoDisplayName(photo: Pick<UserPhoto, 'photoName' | 'photoUrl'>): string {
  const name = photo.photoName?.trim()
  if (name) return name
  const path = photo.photoUrl.split('?')[0]
  return decodeURIComponent(path.slice(path.lastIndexOf('/') + 1))
}
