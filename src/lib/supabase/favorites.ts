import type { SupabaseClient } from '@supabase/supabase-js'
import type { FavoriteRepository } from '@/lib/repositories'
import type { Favorite } from '@/types'
import { dbFailure, UNIQUE_VIOLATION } from './server'
import { conflict } from '@/lib/errors'

interface FavoriteRow {
  id: number
  user_profile_id: number
  garment_id: number
  created_at: string
}

function toFavorite(row: FavoriteRow): Favorite {
  return {
    id: row.id,
    userProfileId: row.user_profile_id,
    garmentId: row.garment_id,
    createdAt: row.created_at,
  }
}

export function createFavoriteRepository(supabase: SupabaseClient): FavoriteRepository {
  return {
    async exists(profileId, garmentId) {
      const { count, error } = await supabase
        .from('favorites')
        .select('id', { count: 'exact', head: true })
        .eq('user_profile_id', profileId)
        .eq('garment_id', garmentId)
      if (error) throw dbFailure('Failed to check favorite', error)
      return (count || 0) > 0
    },

    async insert(profileId, garmentId) {
      const { data, error } = await supabase
        .from('favorites')
        .insert({ user_profile_id: profileId, garment_id: garmentId })
        .select()
        .single<FavoriteRow>()
      if (error) {
        if (error.code === UNIQUE_VIOLATION) {
          throw conflict(`Garment ${garmentId} is already a favorite`)
        }
        throw dbFailure('Failed to add favorite', error)
      }
      return toFavorite(data)
    },

    async delete(profileId, garmentId) {
      const { data, error } = await supabase
        .from('favorites')
        .delete()
        .eq('user_profile_id', profileId)
        .eq('garment_id', garmentId)
        .select('id')
        .returns<{ id: number }[]>()
      if (error) throw dbFailure('Failed to remove favorite', error)
      return (data || []).length
    },

    async deleteByProfileId(profileId) {
      const { data, error } = await supabase
        .from('favorites')
        .delete()
        .eq('user_profile_id', profileId)
        .select('id')
        .returns<{ id: number }[]>()
      if (error) throw dbFailure('Failed to clear favorites', error)
      return (data || []).length
    },

    async findByProfileId(profileId, page) {
      let query = supabase
        .from('favorites')
        .select('*', { count: 'exact' })
        .eq('user_profile_id', profileId)
        .order('created_at', { ascending: false })
        .order('id', { ascending: false })
      if (page) {
        const from = page.page * page.size
        query = query.range(from, from + page.size - 1)
      }
      const { data, error, count } = await query.returns<FavoriteRow[]>()
      if (error) throw dbFailure('Failed to list favorites', error)
      return { items: (data || []).map(toFavorite), total: count || 0 }
    },

    async findByProfileSince(profileId, since) {
      const { data, error } = await supabase
        .from('favorites')
        .select('*')
        .eq('user_profile_id', profileId)
        .gte('created_at', since)
        .order('created_at', { ascending: false })
        .returns<FavoriteRow[]>()
      if (error) throw dbFailure('Failed to list recent favorites', error)
      return (data || []).map(toFavorite)
    },

    async countByProfileId(profileId) {
      const { count, error } = await supabase
        .from('favorites')
        .select('id', { count: 'exact', head: true })
        .eq('user_profile_id', profileId)
      if (error) throw dbFailure('Failed to count favorites', error)
      return count || 0
    },

    async findFavoritedGarmentIds(profileId, garmentIds) {
      if (garmentIds.length === 0) return []
      const { data, error } = await supabase
        .from('favorites')
        .select('garment_id')
        .eq('user_profile_id', profileId)
        .in('garment_id', garmentIds)
        .returns<{ garment_id: number }[]>()
      if (error) throw dbFailure('Failed to check favorites', error)
      return (data || []).map(row => row.garment_id)
    },

    async findGarmentIdsSince(since) {
      const { data, error } = await supabase
        .from('favorites')
        .select('garment_id')
        .gte('created_at', since)
        .returns<{ garment_id: number }[]>()
      if (error) throw dbFailure('Failed to load trending favorites', error)
      return (data || []).map(row => row.garment_id)
    },

    async mostFavorited(limit) {
      const { data, error } = await supabase
        .from('garment_favorite_counts')
        .select('garment_id, favorite_count')
        .order('favorite_count', { ascending: false })
        .order('garment_id', { ascending: true })
        .limit(limit)
        .returns<{ garment_id: number; favorite_count: number }[]>()
      if (error) throw dbFailure('Failed to load popular garments', error)
      return (data || []).map(row => ({
        garmentId: row.garment_id,
        favoriteCount: Number(row.favorite_count),
      }))
    },

    async statsByCategory() {
      const { data, error } = await supabase
        .from('favorite_category_stats')
        .select('category, favorite_count')
        .order('favorite_count', { ascending: false })
        .returns<{ category: string; favorite_count: number }[]>()
      if (error) throw dbFailure('Failed to load favorite stats', error)
      return (data || []).map(row => ({
        category: row.category,
        favoriteCount: Number(row.favorite_count),
      }))
    },
  }
}
