import type { SupabaseClient } from '@supabase/supabase-js'
import { conflict } from '@/lib/errors'
import type { NewUserPhoto, UserPhotoRepository, UserProfileRepository } from '@/lib/repositories'
import type { UserPhoto, UserProfile } from '@/types'
import { dbFailure, UNIQUE_VIOLATION } from './server'

interface UserProfileRow {
  id: number
  session_id: string
  profile_name: string | null
  created_at: string
}

interface UserPhotoRow {
  id: number
  user_profile_id: number
  photo_url: string
  photo_name: string | null
  uploaded_at: string
}

function toProfile(row: UserProfileRow): UserProfile {
  return {
    id: row.id,
    sessionId: row.session_id,
    profileName: row.profile_name,
    createdAt: row.created_at,
  }
}

function toPhoto(row: UserPhotoRow): UserPhoto {
  return {
    id: row.id,
    userProfileId: row.user_profile_id,
    photoUrl: row.photo_url,
    photoName: row.photo_name,
    uploadedAt: row.uploaded_at,
  }
}

export function createUserProfileRepository(supabase: SupabaseClient): UserProfileRepository {
  return {
    async findBySessionId(sessionId) {
      const { data, error } = await supabase
        .from('user_profiles')
        .select('*')
        .eq('session_id', sessionId)
        .maybeSingle<UserProfileRow>()
      if (error) throw dbFailure('Failed to load profile', error)
      return data ? toProfile(data) : null
    },

    async existsBySessionId(sessionId) {
      const { count, error } = await supabase
        .from('user_profiles')
        .select('id', { count: 'exact', head: true })
        .eq('session_id', sessionId)
      if (error) throw dbFailure('Failed to check session', error)
      return (count || 0) > 0
    },

    async insert(sessionId, profileName) {
      const { data, error } = await supabase
        .from('user_profiles')
        .insert({ session_id: sessionId, profile_name: profileName })
        .select()
        .single<UserProfileRow>()
      if (error) {
        if (error.code === UNIQUE_VIOLATION) {
          throw conflict(`Profile for session ${sessionId} already exists`)
        }
        throw dbFailure('Failed to create profile', error)
      }
      return toProfile(data)
    },

    async updateName(id, profileName) {
      const { data, error } = await supabase
        .from('user_profiles')
        .update({ profile_name: profileName })
        .eq('id', id)
        .select()
        .single<UserProfileRow>()
      if (error) throw dbFailure('Failed to rename profile', error)
      return toProfile(data)
    },

    async findCreatedBefore(cutoff) {
      const { data, error } = await supabase
        .from('user_profiles')
        .select('*')
        .lt('created_at', cutoff)
        .returns<UserProfileRow[]>()
      if (error) throw dbFailure('Failed to list old profiles', error)
      return (data || []).map(toProfile)
    },

    async delete(id) {
      const { error } = await supabase.from('user_profiles').delete().eq('id', id)
      if (error) throw dbFailure('Failed to delete profile', error)
    },
  }
}

export function createUserPhotoRepository(supabase: SupabaseClient): UserPhotoRepository {
  return {
    async findById(id) {
      const { data, error } = await supabase
        .from('user_photos')
        .select('*')
        .eq('id', id)
        .maybeSingle<UserPhotoRow>()
      if (error) throw dbFailure('Failed to load photo', error)
      return data ? toPhoto(data) : null
    },

    async findByProfileId(profileId) {
      const { data, error } = await supabase
        .from('user_photos')
        .select('*')
        .eq('user_profile_id', profileId)
        .order('uploaded_at', { ascending: false })
        .returns<UserPhotoRow[]>()
      if (error) throw dbFailure('Failed to list photos', error)
      return (data || []).map(toPhoto)
    },

    async countByProfileId(profileId) {
      const { count, error } = await supabase
        .from('user_photos')
        .select('id', { count: 'exact', head: true })
        .eq('user_profile_id', profileId)
      if (error) throw dbFailure('Failed to count photos', error)
      return count || 0
    },

    async insert(photo: NewUserPhoto) {
      const { data, error } = await supabase
        .from('user_photos')
        .insert({
          user_profile_id: photo.userProfileId,
          photo_url: photo.photoUrl,
          photo_name: photo.photoName,
        })
        .select()
        .single<UserPhotoRow>()
      if (error) throw dbFailure('Failed to save photo', error)
      return toPhoto(data)
    },

    async updateName(id, photoName) {
      const { data, error } = await supabase
        .from('user_photos')
        .update({ photo_name: photoName })
        .eq('id', id)
        .select()
        .single<UserPhotoRow>()
      if (error) throw dbFailure('Failed to rename photo', error)
      return toPhoto(data)
    },

    async delete(id) {
      const { error } = await supabase.from('user_photos').delete().eq('id', id)
      if (error) throw dbFailure('Failed to delete photo', error)
    },
  }
}
