import type { SupabaseClient } from '@supabase/supabase-js'
import { conflict } from '@/lib/errors'
import type { GarmentImageRepository, GarmentRepository, NewGarmentImage } from '@/lib/repositories'
import type {
  Garment,
  GarmentFacet,
  GarmentFilter,
  GarmentImage,
  GarmentInput,
  GarmentSort,
  PriceRange,
} from '@/types'
import { dbFailure, UNIQUE_VIOLATION } from './server'

// Database rows (snake_case as stored)
export interface GarmentRow {
  id: number
  name_id: string
  garment_name: string
  category: string
  subcategory: string | null
  garment_type: string
  color: string
  pattern_style: string | null
  price: number | string
  stock_quantity: number | null
  created_at: string
  updated_at: string
}

interface GarmentImageRow {
  id: number
  garment_id: number
  image_url: string
  is_primary: boolean
  display_order: number | null
  created_at: string
}

export function toGarment(row: GarmentRow): Garment {
  return {
    id: row.id,
    nameId: row.name_id,
    garmentName: row.garment_name,
    category: row.category,
    subcategory: row.subcategory,
    garmentType: row.garment_type,
    color: row.color,
    patternStyle: row.pattern_style,
    price: Number(row.price),
    stockQuantity: row.stock_quantity ?? 0,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function toGarmentRow(input: GarmentInput) {
  return {
    name_id: input.nameId,
    garment_name: input.garmentName,
    category: input.category,
    subcategory: input.subcategory,
    garment_type: input.garmentType,
    color: input.color,
    pattern_style: input.patternStyle,
    price: input.price,
    stock_quantity: input.stockQuantity,
  }
}

function toGarmentImage(row: GarmentImageRow): GarmentImage {
  return {
    id: row.id,
    garmentId: row.garment_id,
    imageUrl: row.image_url,
    isPrimary: row.is_primary,
    displayOrder: row.display_order ?? 0,
    createdAt: row.created_at,
  }
}

export const FACET_COLUMNS: Record<GarmentFacet, string> = {
  category: 'category',
  subcategory: 'subcategory',
  color: 'color',
  garmentType: 'garment_type',
  patternStyle: 'pattern_style',
}

export const SORT_ORDER: Record<GarmentSort, { column: string; ascending: boolean }> = {
  price_asc: { column: 'price', ascending: true },
  price_desc: { column: 'price', ascending: false },
  name_asc: { column: 'garment_name', ascending: true },
  name_desc: { column: 'garment_name', ascending: false },
  newest: { column: 'created_at', ascending: false },
  oldest: { column: 'created_at', ascending: true },
}

const SEARCH_COLUMNS = ['garment_name', 'category', 'subcategory', 'color', 'pattern_style']

/**
 * PostgREST `or` expression matching the term anywhere in the searchable
 * columns, case-insensitively. Characters that PostgREST treats as syntax
 * inside a filter list are replaced by spaces.
 */
export function buildSearchExpression(term: string): string {
  const safe = term.replace(/[,()"\\%*]/g, ' ').replace(/\s+/g, ' ').trim()
  return SEARCH_COLUMNS.map(column => `${column}.ilike.%${safe}%`).join(',')
}

export function createGarmentRepository(supabase: SupabaseClient): GarmentRepository {
  return {
    async findById(id) {
      const { data, error } = await supabase
        .from('garments')
        .select('*')
        .eq('id', id)
        .maybeSingle<GarmentRow>()
      if (error) throw dbFailure('Failed to load garment', error)
      return data ? toGarment(data) : null
    },

    async findByIds(ids) {
      if (ids.length === 0) return []
      const { data, error } = await supabase
        .from('garments')
        .select('*')
        .in('id', ids)
        .returns<GarmentRow[]>()
      if (error) throw dbFailure('Failed to load garments', error)
      return (data || []).map(toGarment)
    },

    async findByNameId(nameId) {
      const { data, error } = await supabase
        .from('garments')
        .select('*')
        .eq('name_id', nameId)
        .maybeSingle<GarmentRow>()
      if (error) throw dbFailure('Failed to load garment', error)
      return data ? toGarment(data) : null
    },

    async existsByNameId(nameId) {
      const { count, error } = await supabase
        .from('garments')
        .select('id', { count: 'exact', head: true })
        .eq('name_id', nameId)
      if (error) throw dbFailure('Failed to check garment name id', error)
      return (count || 0) > 0
    },

    async search(filter: GarmentFilter) {
      let query = supabase.from('garments').select('*', { count: 'exact' })

      if (filter.searchTerm) {
        query = query.or(buildSearchExpression(filter.searchTerm))
      }
      if (filter.categories?.length) {
        query = query.in('category', filter.categories)
      }
      if (filter.colors?.length) {
        query = query.in('color', filter.colors)
      }
      if (filter.minPrice !== undefined) {
        query = query.gte('price', filter.minPrice)
      }
      if (filter.maxPrice !== undefined) {
        query = query.lte('price', filter.maxPrice)
      }

      const sort = SORT_ORDER[filter.sortBy ?? 'newest']
      const from = filter.page * filter.size
      const { data, error, count } = await query
        .order(sort.column, { ascending: sort.ascending })
        .range(from, from + filter.size - 1)
        .returns<GarmentRow[]>()

      if (error) throw dbFailure('Failed to search garments', error)
      return { items: (data || []).map(toGarment), total: count || 0 }
    },

    async distinctValues(facet, where) {
      const column = FACET_COLUMNS[facet]
      let query = supabase.from('garments').select(column).not(column, 'is', null)
      if (where?.category) {
        query = query.eq('category', where.category)
      }
      const { data, error } = await query
        .order(column, { ascending: true })
        .returns<Record<string, string | null>[]>()
      if (error) throw dbFailure(`Failed to list ${facet} values`, error)

      const values = new Set<string>()
      for (const row of data || []) {
        const value = row[column]
        if (value) values.add(value)
      }
      return Array.from(values).sort((a, b) => a.localeCompare(b))
    },

    async priceRange(): Promise<PriceRange> {
      const edge = async (ascending: boolean) => {
        const { data, error } = await supabase
          .from('garments')
          .select('price')
          .order('price', { ascending })
          .limit(1)
          .maybeSingle<{ price: number | string }>()
        if (error) throw dbFailure('Failed to load price range', error)
        return data ? Number(data.price) : null
      }
      return { minPrice: await edge(true), maxPrice: await edge(false) }
    },

    async insert(input) {
      const { data, error } = await supabase
        .from('garments')
        .insert(toGarmentRow(input))
        .select()
        .single<GarmentRow>()
      if (error) {
        if (error.code === UNIQUE_VIOLATION) {
          throw conflict(`Garment with nameId ${input.nameId} already exists`)
        }
        throw dbFailure('Failed to create garment', error)
      }
      return toGarment(data)
    },

    async update(id, input) {
      const { data, error } = await supabase
        .from('garments')
        .update({ ...toGarmentRow(input), updated_at: new Date().toISOString() })
        .eq('id', id)
        .select()
        .single<GarmentRow>()
      if (error) {
        if (error.code === UNIQUE_VIOLATION) {
          throw conflict(`Garment with nameId ${input.nameId} already exists`)
        }
        throw dbFailure('Failed to update garment', error)
      }
      return toGarment(data)
    },

    async delete(id) {
      const { error } = await supabase.from('garments').delete().eq('id', id)
      if (error) throw dbFailure('Failed to delete garment', error)
    },
  }
}

export function createGarmentImageRepository(supabase: SupabaseClient): GarmentImageRepository {
  return {
    async findById(id) {
      const { data, error } = await supabase
        .from('garment_images')
        .select('*')
        .eq('id', id)
        .maybeSingle<GarmentImageRow>()
      if (error) throw dbFailure('Failed to load garment image', error)
      return data ? toGarmentImage(data) : null
    },

    async findByGarmentIds(garmentIds) {
      if (garmentIds.length === 0) return []
      const { data, error } = await supabase
        .from('garment_images')
        .select('*')
        .in('garment_id', garmentIds)
        .order('display_order', { ascending: true })
        .order('id', { ascending: true })
        .returns<GarmentImageRow[]>()
      if (error) throw dbFailure('Failed to load garment images', error)
      return (data || []).map(toGarmentImage)
    },

    async insert(image: NewGarmentImage) {
      const { data, error } = await supabase
        .from('garment_images')
        .insert({
          garment_id: image.garmentId,
          image_url: image.imageUrl,
          is_primary: image.isPrimary,
          display_order: image.displayOrder,
        })
        .select()
        .single<GarmentImageRow>()
      if (error) throw dbFailure('Failed to save garment image', error)
      return toGarmentImage(data)
    },

    async clearPrimary(garmentId) {
      const { error } = await supabase
        .from('garment_images')
        .update({ is_primary: false })
        .eq('garment_id', garmentId)
        .eq('is_primary', true)
      if (error) throw dbFailure('Failed to clear primary image', error)
    },

    async delete(id) {
      const { error } = await supabase.from('garment_images').delete().eq('id', id)
      if (error) throw dbFailure('Failed to delete garment image', error)
    },
  }
}
