import type { SupabaseClient } from '@supabase/supabase-js'
import type { NewTryonResult, TryonResultRepository } from '@/lib/repositories'
import type { TryonResult } from '@/types'
import { dbFailure } from './server'

interface TryonResultRow {
  id: number
  user_profile_id: number
  garment_id: number
  user_photo_id: number
  result_image_url: string
  ai_model_used: string | null
  created_at: string
}

function toTryonResult(row: TryonResultRow): TryonResult {
  return {
    id: row.id,
    userProfileId: row.user_profile_id,
    garmentId: row.garment_id,
    userPhotoId: row.user_photo_id,
    resultImageUrl: row.result_image_url,
    aiModelUsed: row.ai_model_used,
    createdAt: row.created_at,
  }
}

export function createTryonResultRepository(supabase: SupabaseClient): TryonResultRepository {
  return {
    async findById(id) {
      const { data, error } = await supabase
        .from('tryon_results')
        .select('*')
        .eq('id', id)
        .maybeSingle<TryonResultRow>()
      if (error) throw dbFailure('Failed to load try-on result', error)
      return data ? toTryonResult(data) : null
    },

    async findByProfileId(profileId, page) {
      const from = page.page * page.size
      const { data, error, count } = await supabase
        .from('tryon_results')
        .select('*', { count: 'exact' })
        .eq('user_profile_id', profileId)
        .order('created_at', { ascending: false })
        .order('id', { ascending: false })
        .range(from, from + page.size - 1)
        .returns<TryonResultRow[]>()
      if (error) throw dbFailure('Failed to list try-on results', error)
      return { items: (data || []).map(toTryonResult), total: count || 0 }
    },

    async findImageUrls(where) {
      let query = supabase.from('tryon_results').select('result_image_url')
      if (where.profileId !== undefined) query = query.eq('user_profile_id', where.profileId)
      if (where.photoId !== undefined) query = query.eq('user_photo_id', where.photoId)
      if (where.garmentId !== undefined) query = query.eq('garment_id', where.garmentId)
      const { data, error } = await query.returns<{ result_image_url: string }[]>()
      if (error) throw dbFailure('Failed to list try-on images', error)
      return (data || []).map(row => row.result_image_url)
    },

    async countByProfileId(profileId) {
      const { count, error } = await supabase
        .from('tryon_results')
        .select('id', { count: 'exact', head: true })
        .eq('user_profile_id', profileId)
      if (error) throw dbFailure('Failed to count try-on results', error)
      return count || 0
    },

    async countByPhotoIds(photoIds) {
      const counts = new Map<number, number>()
      if (photoIds.length === 0) return counts
      const { data, error } = await supabase
        .from('tryon_results')
        .select('user_photo_id')
        .in('user_photo_id', photoIds)
        .returns<{ user_photo_id: number }[]>()
      if (error) throw dbFailure('Failed to count photo usage', error)
      for (const row of data || []) {
        counts.set(row.user_photo_id, (counts.get(row.user_photo_id) || 0) + 1)
      }
      return counts
    },

    async insert(result: NewTryonResult) {
      const { data, error } = await supabase
        .from('tryon_results')
        .insert({
          user_profile_id: result.userProfileId,
          garment_id: result.garmentId,
          user_photo_id: result.userPhotoId,
          result_image_url: result.resultImageUrl,
          ai_model_used: result.aiModelUsed,
        })
        .select()
        .single<TryonResultRow>()
      if (error) throw dbFailure('Failed to save try-on result', error)
      return toTryonResult(data)
    },

    async delete(id) {
      const { error } = await supabase.from('tryon_results').delete().eq('id', id)
      if (error) throw dbFailure('Failed to delete try-on result', error)
    },
  }
}
