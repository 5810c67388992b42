import { isAppError, notFound } from '@/lib/errors'
import type { FavoriteRepository, GarmentImageRepository, GarmentRepository, UserProfileRepository } from '@/lib/repositories'
import {
  toPage,
  type CategoryFavoriteStat,
  type Favorite,
  type GarmentDto,
  type Page,
  type PageRequest,
  type PopularGarment,
} from '@/types'
import { toGarmentDtos } from './garmentDto'
import { requireProfile } from './profiles'

const DAY_MS = 24 * 60 * 60 * 1000

export const DEFAULT_RECENT_DAYS = 7
export const DEFAULT_TRENDING_DAYS = 7
export const DEFAULT_ANALYTICS_LIMIT = 10

export interface FavoriteServiceDeps {
  profiles: UserProfileRepository
  favorites: FavoriteRepository
  garments: GarmentRepository
  garmentImages: GarmentImageRepository
  clock?: () => number
}

export type FavoriteService = ReturnType<typeof createFavoriteService>

/**
 * Garment ids ordered by how often they appear, most frequent first;
 * ties go to the lower id.
 */
export function rankByFrequency(garmentIds: number[], limit: number): number[] {
  const counts = new Map<number, number>()
  for (const id of garmentIds) {
    counts.set(id, (counts.get(id) || 0) + 1)
  }
  return Array.from(counts.entries())
    .sort(([idA, countA], [idB, countB]) => countB - countA || idA - idB)
    .slice(0, limit)
    .map(([id]) => id)
}

export function createFavoriteService(deps: FavoriteServiceDeps) {
  const clock = deps.clock ?? Date.now
  const since = (days: number) => new Date(clock() - days * DAY_MS).toISOString()

  // Garments in favorite order
  async function garmentsFor(favorites: Favorite[]): Promise<GarmentDto[]> {
    const garments = await deps.garments.findByIds(favorites.map(favorite => favorite.garmentId))
    const dtos = await toGarmentDtos(garments, deps.garmentImages)
    const byId = new Map(dtos.map(dto => [dto.id, dto]))
    return favorites.flatMap(favorite => {
      const dto = byId.get(favorite.garmentId)
      return dto ? [dto] : []
    })
  }

  async function add(sessionId: string, garmentId: number): Promise<boolean> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const garment = await deps.garments.findById(garmentId)
    if (!garment) {
      throw notFound(`Garment not found with ID: ${garmentId}`)
    }
    if (await deps.favorites.exists(profile.id, garmentId)) {
      return false
    }

    try {
      await deps.favorites.insert(profile.id, garmentId)
      return true
    } catch (error) {
      if (isAppError(error) && error.kind === 'CONFLICT') return false
      throw error
    }
  }

  async function remove(sessionId: string, garmentId: number): Promise<boolean> {
    const profile = await requireProfile(deps.profiles, sessionId)
    return (await deps.favorites.delete(profile.id, garmentId)) > 0
  }

  async function toggle(sessionId: string, garmentId: number): Promise<boolean> {
    const profile = await requireProfile(deps.profiles, sessionId)
    if (await deps.favorites.exists(profile.id, garmentId)) {
      await remove(sessionId, garmentId)
      return false
    }
    await add(sessionId, garmentId)
    return true
  }

  async function isFavorited(sessionId: string, garmentId: number): Promise<boolean> {
    const profile = await requireProfile(deps.profiles, sessionId)
    return deps.favorites.exists(profile.id, garmentId)
  }

  async function list(sessionId: string, page: PageRequest): Promise<Page<GarmentDto>> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const slice = await deps.favorites.findByProfileId(profile.id, page)
    return toPage({ items: await garmentsFor(slice.items), total: slice.total }, page)
  }

  async function all(sessionId: string): Promise<GarmentDto[]> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const { items } = await deps.favorites.findByProfileId(profile.id)
    return garmentsFor(items)
  }

  async function byCategory(sessionId: string, category: string): Promise<GarmentDto[]> {
    const wanted = category.trim().toLowerCase()
    return (await all(sessionId)).filter(garment => garment.category.toLowerCase() === wanted)
  }

  async function recent(sessionId: string, days = DEFAULT_RECENT_DAYS): Promise<GarmentDto[]> {
    const profile = await requireProfile(deps.profiles, sessionId)
    return garmentsFor(await deps.favorites.findByProfileSince(profile.id, since(days)))
  }

  async function count(sessionId: string): Promise<number> {
    const profile = await requireProfile(deps.profiles, sessionId)
    return deps.favorites.countByProfileId(profile.id)
  }

  async function favoritedIds(sessionId: string, garmentIds: number[]): Promise<number[]> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const ids = await deps.favorites.findFavoritedGarmentIds(profile.id, Array.from(new Set(garmentIds)))
    return Array.from(new Set(ids))
  }

  async function clear(sessionId: string): Promise<number> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const removed = await deps.favorites.deleteByProfileId(profile.id)
    console.log(`[Favorites] Cleared ${removed} favorites for profile ${profile.id}`)
    return removed
  }

  async function trending(days = DEFAULT_TRENDING_DAYS, limit = DEFAULT_ANALYTICS_LIMIT): Promise<number[]> {
    return rankByFrequency(await deps.favorites.findGarmentIdsSince(since(days)), limit)
  }

  return {
    add,
    remove,
    toggle,
    isFavorited,
    list,
    all,
    byCategory,
    recent,
    count,
    favoritedIds,
    clear,
    trending,
    popular: (limit = DEFAULT_ANALYTICS_LIMIT): Promise<PopularGarment[]> => deps.favorites.mostFavorited(limit),
    statsByCategory: (): Promise<CategoryFavoriteStat[]> => deps.favorites.statsByCategory(),
  }
}
