/**
 * Data access contracts
 *
 * Supabase-backed implementations live in `@/lib/supabase/*`; the services
 * only see these interfaces.
 */
import type {
  CategoryFavoriteStat,
  Favorite,
  Garment,
  GarmentFacet,
  GarmentFilter,
  GarmentImage,
  GarmentInput,
  PageRequest,
  PopularGarment,
  PriceRange,
  Slice,
  TryonResult,
  UserPhoto,
  UserProfile,
} from '@/types'

export interface GarmentRepository {
  findById(id: number): Promise<Garment | null>
  findByIds(ids: number[]): Promise<Garment[]>
  findByNameId(nameId: string): Promise<Garment | null>
  existsByNameId(nameId: string): Promise<boolean>
  search(filter: GarmentFilter): Promise<Slice<Garment>>
  // Distinct non-null values, sorted
  distinctValues(facet: GarmentFacet, where?: { category?: string }): Promise<string[]>
  priceRange(): Promise<PriceRange>
  insert(input: GarmentInput): Promise<Garment>
  update(id: number, input: GarmentInput): Promise<Garment>
  delete(id: number): Promise<void>
}

export interface NewGarmentImage {
  garmentId: number
  imageUrl: string
  isPrimary: boolean
  displayOrder: number
}

export interface GarmentImageRepository {
  findById(id: number): Promise<GarmentImage | null>
  // Ordered by display order
  findByGarmentIds(garmentIds: number[]): Promise<GarmentImage[]>
  insert(image: NewGarmentImage): Promise<GarmentImage>
  clearPrimary(garmentId: number): Promise<void>
  delete(id: number): Promise<void>
}

export interface UserProfileRepository {
  findBySessionId(sessionId: string): Promise<UserProfile | null>
  existsBySessionId(sessionId: string): Promise<boolean>
  insert(sessionId: string, profileName: string | null): Promise<UserProfile>
  updateName(id: number, profileName: string): Promise<UserProfile>
  findCreatedBefore(cutoff: string): Promise<UserProfile[]>
  delete(id: number): Promise<void>
}

export interface NewUserPhoto {
  userProfileId: number
  photoUrl: string
  photoName: string | null
}

export interface UserPhotoRepository {
  findById(id: number): Promise<UserPhoto | null>
  // Newest first
  findByProfileId(profileId: number): Promise<UserPhoto[]>
  countByProfileId(profileId: number): Promise<number>
  insert(photo: NewUserPhoto): Promise<UserPhoto>
  updateName(id: number, photoName: string): Promise<UserPhoto>
  delete(id: number): Promise<void>
}

export interface FavoriteRepository {
  exists(profileId: number, garmentId: number): Promise<boolean>
  insert(profileId: number, garmentId: number): Promise<Favorite>
  // Returns the number of rows removed
  delete(profileId: number, garmentId: number): Promise<number>
  deleteByProfileId(profileId: number): Promise<number>
  // Newest first
  findByProfileId(profileId: number, page?: PageRequest): Promise<Slice<Favorite>>
  findByProfileSince(profileId: number, since: string): Promise<Favorite[]>
  countByProfileId(profileId: number): Promise<number>
  findFavoritedGarmentIds(profileId: number, garmentIds: number[]): Promise<number[]>
  // Garment ids of every favorite created at or after `since`
  findGarmentIdsSince(since: string): Promise<number[]>
  mostFavorited(limit: number): Promise<PopularGarment[]>
  statsByCategory(): Promise<CategoryFavoriteStat[]>
}

export interface NewTryonResult {
  userProfileId: number
  garmentId: number
  userPhotoId: number
  resultImageUrl: string
  aiModelUsed: string
}

export interface TryonResultRepository {
  findById(id: number): Promise<TryonResult | null>
  // Newest first
  findByProfileId(profileId: number, page: PageRequest): Promise<Slice<TryonResult>>
  findImageUrls(where: { profileId?: number; photoId?: number; garmentId?: number }): Promise<string[]>
  countByProfileId(profileId: number): Promise<number>
  countByPhotoIds(photoIds: number[]): Promise<Map<number, number>>
  insert(result: NewTryonResult): Promise<TryonResult>
  delete(id: number): Promise<void>
}

export interface Repositories {
  garments: GarmentRepository
  garmentImages: GarmentImageRepository
  profiles: UserProfileRepository
  photos: UserPhotoRepository
  favorites: FavoriteRepository
  tryonResults: TryonResultRepository
}
