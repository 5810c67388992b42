import crypto from 'crypto'
import { conflict, notFound, validationError } from '@/lib/errors'
import type {
  GarmentImageRepository,
  GarmentRepository,
  TryonResultRepository,
} from '@/lib/repositories'
import type { FileStorage } from '@/lib/storage'
import { fileExtension, uploadContentType, validateUpload, type UploadRules } from '@/lib/uploads'
import {
  toPage,
  type Garment,
  type GarmentDto,
  type GarmentFilter,
  type GarmentImage,
  type GarmentInput,
  type Page,
  type PriceRange,
  type UploadedFile,
} from '@/types'
import { toGarmentDto, toGarmentDtos } from './garmentDto'

// Price bounds applied when any structured filter is present
export const DEFAULT_MIN_PRICE = 0
export const DEFAULT_MAX_PRICE = 999999.99

export const DEFAULT_GARMENT_TYPE = 'Traditional'

export interface GarmentServiceDeps {
  garments: GarmentRepository
  garmentImages: GarmentImageRepository
  tryonResults: TryonResultRepository
  storage: FileStorage
  uploads: UploadRules
}

// Garment fields accepted by the admin multipart form
export type NewGarmentInput = Omit<GarmentInput, 'nameId' | 'garmentType'> & {
  nameId?: string
  garmentType?: string
}

export type GarmentService = ReturnType<typeof createGarmentService>

function hasStructuredFilters(filter: GarmentFilter): boolean {
  return (
    (filter.categories?.length ?? 0) > 0 ||
    (filter.colors?.length ?? 0) > 0 ||
    filter.minPrice !== undefined ||
    filter.maxPrice !== undefined
  )
}

/**
 * Query actually sent to the repository: a search term wins over every
 * other filter; structured filters get default price bounds.
 */
export function normalizeGarmentFilter(filter: GarmentFilter): GarmentFilter {
  const paging = { sortBy: filter.sortBy, page: filter.page, size: filter.size }
  const searchTerm = filter.searchTerm?.trim()

  if (searchTerm) {
    return { ...paging, searchTerm }
  }
  if (hasStructuredFilters(filter)) {
    return {
      ...paging,
      categories: filter.categories?.length ? filter.categories : undefined,
      colors: filter.colors?.length ? filter.colors : undefined,
      minPrice: filter.minPrice ?? DEFAULT_MIN_PRICE,
      maxPrice: filter.maxPrice ?? DEFAULT_MAX_PRICE,
    }
  }
  return paging
}

// `SAR-7F3K2Q` for a saree
export function generateNameId(category: string): string {
  const letters = category.replace(/[^a-z]/gi, '').toUpperCase()
  const prefix = (letters || 'GAR').slice(0, 3)
  const suffix = crypto.randomUUID().replace(/-/g, '').slice(0, 6).toUpperCase()
  return `${prefix}-${suffix}`
}

export function createGarmentService(deps: GarmentServiceDeps) {
  async function requireGarment(id: number): Promise<Garment> {
    const garment = await deps.garments.findById(id)
    if (!garment) {
      throw notFound(`Garment not found with ID: ${id}`)
    }
    return garment
  }

  async function toDto(garment: Garment): Promise<GarmentDto> {
    const images = await deps.garmentImages.findByGarmentIds([garment.id])
    return toGarmentDto(garment, images)
  }

  async function storeImage(garmentId: number, file: UploadedFile): Promise<string> {
    return deps.storage.store(file.bytes, {
      namespace: `garments/${garmentId}`,
      contentType: uploadContentType(file),
      extension: fileExtension(file.name),
    })
  }

  async function uniqueNameId(category: string): Promise<string> {
    let nameId = generateNameId(category)
    while (await deps.garments.existsByNameId(nameId)) {
      nameId = generateNameId(category)
    }
    return nameId
  }

  async function search(filter: GarmentFilter): Promise<Page<GarmentDto>> {
    const slice = await deps.garments.search(normalizeGarmentFilter(filter))
    const items = await toGarmentDtos(slice.items, deps.garmentImages)
    return toPage({ items, total: slice.total }, filter)
  }

  async function create(input: GarmentInput): Promise<GarmentDto> {
    if (await deps.garments.existsByNameId(input.nameId)) {
      throw conflict(`Garment with nameId ${input.nameId} already exists`)
    }
    const garment = await deps.garments.insert(input)
    console.log(`[Garments] Created ${garment.id} (${garment.nameId})`)
    return toDto(garment)
  }

  async function createWithImages(
    input: NewGarmentInput,
    files: UploadedFile[],
    primaryImageIndex = 0
  ): Promise<GarmentDto> {
    if (files.length === 0) {
      throw validationError('At least one image is required')
    }
    files.forEach(file => validateUpload(file, deps.uploads))

    const nameId = input.nameId?.trim() || (await uniqueNameId(input.category))
    const garment = await deps.garments.insert({
      ...input,
      nameId,
      garmentType: input.garmentType?.trim() || DEFAULT_GARMENT_TYPE,
    })

    const primary = primaryImageIndex >= 0 && primaryImageIndex < files.length ? primaryImageIndex : 0
    const images: GarmentImage[] = []
    const storedUrls: string[] = []
    try {
      for (const [index, file] of files.entries()) {
        const imageUrl = await storeImage(garment.id, file)
        storedUrls.push(imageUrl)
        images.push(
          await deps.garmentImages.insert({
            garmentId: garment.id,
            imageUrl,
            isPrimary: index === primary,
            displayOrder: index + 1,
          })
        )
      }
    } catch (error) {
      console.error(`[Garments] Failed to add images to ${garment.id}, rolling back:`, error)
      await deps.storage.deleteMany(storedUrls)
      await deps.garments.delete(garment.id)
      throw error
    }

    console.log(`[Garments] Created ${garment.id} (${garment.nameId}) with ${images.length} images`)
    return toGarmentDto(garment, images)
  }

  async function update(id: number, input: GarmentInput): Promise<GarmentDto> {
    const existing = await requireGarment(id)
    if (existing.nameId !== input.nameId && (await deps.garments.existsByNameId(input.nameId))) {
      throw conflict(`Garment with nameId ${input.nameId} already exists`)
    }
    return toDto(await deps.garments.update(id, input))
  }

  async function remove(id: number): Promise<void> {
    await requireGarment(id)
    const images = await deps.garmentImages.findByGarmentIds([id])
    const tryonImages = await deps.tryonResults.findImageUrls({ garmentId: id })
    await deps.garments.delete(id)
    await deps.storage.deleteMany([...images.map(image => image.imageUrl), ...tryonImages])
    console.log(`[Garments] Deleted ${id}`)
  }

  async function addImage(garmentId: number, file: UploadedFile, isPrimary: boolean): Promise<GarmentImage> {
    await requireGarment(garmentId)
    validateUpload(file, deps.uploads)

    const existing = await deps.garmentImages.findByGarmentIds([garmentId])
    const maxOrder = existing.reduce((max, image) => Math.max(max, image.displayOrder), 0)
    const imageUrl = await storeImage(garmentId, file)

    if (isPrimary) {
      await deps.garmentImages.clearPrimary(garmentId)
    }
    return deps.garmentImages.insert({
      garmentId,
      imageUrl,
      isPrimary,
      displayOrder: maxOrder + 1,
    })
  }

  async function removeImage(garmentId: number, imageId: number): Promise<void> {
    const image = await deps.garmentImages.findById(imageId)
    if (!image) {
      throw notFound(`Image not found with ID: ${imageId}`)
    }
    if (image.garmentId !== garmentId) {
      throw validationError('Image does not belong to the specified garment')
    }
    await deps.garmentImages.delete(image.id)
    await deps.storage.deleteMany([image.imageUrl])
  }

  return {
    search,
    getById: async (id: number) => toDto(await requireGarment(id)),
    async getByNameId(nameId: string): Promise<GarmentDto> {
      const garment = await deps.garments.findByNameId(nameId)
      if (!garment) {
        throw notFound(`Garment not found with nameId: ${nameId}`)
      }
      return toDto(garment)
    },
    categories: () => deps.garments.distinctValues('category'),
    subcategories: (category: string) => deps.garments.distinctValues('subcategory', { category }),
    colors: () => deps.garments.distinctValues('color'),
    garmentTypes: () => deps.garments.distinctValues('garmentType'),
    patternStyles: () => deps.garments.distinctValues('patternStyle'),
    priceRange: (): Promise<PriceRange> => deps.garments.priceRange(),
    create,
    createWithImages,
    update,
    delete: remove,
    addImage,
    removeImage,
  }
}
