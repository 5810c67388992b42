import type { ErrorKind } from '@/lib/errors'

// Catalog

export interface Garment {
  id: number
  nameId: string
  garmentName: string
  category: string
  subcategory: string | null
  garmentType: string
  color: string
  patternStyle: string | null
  price: number
  stockQuantity: number
  createdAt: string
  updatedAt: string
}

export interface GarmentImage {
  id: number
  garmentId: number
  imageUrl: string
  isPrimary: boolean
  displayOrder: number
  createdAt: string
}

// Writable garment fields (admin create/update)
export interface GarmentInput {
  nameId: string
  garmentName: string
  category: string
  subcategory: string | null
  garmentType: string
  color: string
  patternStyle: string | null
  price: number
  stockQuantity: number
}

export interface GarmentDto extends Garment {
  primaryImageUrl: string | null
  imageUrls: string[]
  inStock: boolean
  lowStock: boolean
}

export type GarmentSort = 'price_asc' | 'price_desc' | 'name_asc' | 'name_desc' | 'newest' | 'oldest'

export interface GarmentFilter {
  searchTerm?: string
  categories?: string[]
  colors?: string[]
  minPrice?: number
  maxPrice?: number
  sortBy?: GarmentSort
  page: number
  size: number
}

// Columns exposed as filter options
export type GarmentFacet = 'category' | 'subcategory' | 'color' | 'garmentType' | 'patternStyle'

export interface PriceRange {
  minPrice: number | null
  maxPrice: number | null
}

// Session profiles

export interface UserProfile {
  id: number
  sessionId: string
  profileName: string | null
  createdAt: string
}

export interface UserPhoto {
  id: number
  userProfileId: number
  photoUrl: string
  photoName: string | null
  uploadedAt: string
}

export interface UserPhotoDto {
  id: number
  photoUrl: string
  photoName: string | null
  uploadedAt: string
  tryonCount: number
  hasBeenUsed: boolean
}

export interface UserStatistics {
  photoCount: number
  favoriteCount: number
  tryonResultCount: number
  profileCreatedAt: string
  hasProfileName: boolean
}

// Favorites

export interface Favorite {
  id: number
  userProfileId: number
  garmentId: number
  createdAt: string
}

export interface PopularGarment {
  garmentId: number
  favoriteCount: number
}

export interface CategoryFavoriteStat {
  category: string
  favoriteCount: number
}

// Try-on

export interface TryonResult {
  id: number
  userProfileId: number
  garmentId: number
  userPhotoId: number
  resultImageUrl: string
  aiModelUsed: string | null
  createdAt: string
}

export interface TryonRequest {
  garmentId: number
  userPhotoId: number
  aiModel?: string
  customPrompt?: string
  style?: string
}

interface TryonResultBase {
  aiModelUsed: string
  garmentId: number
  userPhotoId: number
  createdAt: string
}

export interface TryonSuccessDto extends TryonResultBase {
  status: 'SUCCESS'
  id: number
  resultImageUrl: string
  garmentName: string | null
  garmentImageUrl: string | null
  userPhotoName: string | null
  userPhotoUrl: string | null
  processingTimeMs?: number
}

// Placeholder returned in degraded mode; never persisted
export interface TryonDegradedDto extends TryonResultBase {
  status: 'DEGRADED'
  resultImageUrl: string
  errorMessage: string
  errorCode: ErrorKind
  processingTimeMs: number
}

export interface TryonFailureDto extends TryonResultBase {
  status: 'FAILED'
  errorMessage: string
  errorCode: ErrorKind
  processingTimeMs: number
}

export type TryonResultDto = TryonSuccessDto | TryonDegradedDto | TryonFailureDto

// Paging

export interface PageRequest {
  page: number
  size: number
}

export interface Page<T> {
  items: T[]
  total: number
  page: number
  pageSize: number
  hasMore: boolean
}

export interface Slice<T> {
  items: T[]
  total: number
}

export function toPage<T>(slice: Slice<T>, request: PageRequest): Page<T> {
  return {
    items: slice.items,
    total: slice.total,
    page: request.page,
    pageSize: request.size,
    hasMore: slice.total > (request.page + 1) * request.size,
  }
}

// An upload as received from multipart form data
export interface UploadedFile {
  name: string
  type: string
  size: number
  bytes: Buffer
}
