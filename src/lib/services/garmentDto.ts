import type { GarmentImageRepository } from '@/lib/repositories'
import type { Garment, GarmentDto, GarmentImage } from '@/types'

export const LOW_STOCK_THRESHOLD = 5

export function primaryImageOf(images: GarmentImage[]): GarmentImage | null {
  return images.find(image => image.isPrimary) ?? null
}

// `images` must already be in display order
export function toGarmentDto(garment: Garment, images: GarmentImage[]): GarmentDto {
  return {
    ...garment,
    primaryImageUrl: primaryImageOf(images)?.imageUrl ?? null,
    imageUrls: images.map(image => image.imageUrl),
    inStock: garment.stockQuantity > 0,
    lowStock: garment.stockQuantity > 0 && garment.stockQuantity < LOW_STOCK_THRESHOLD,
  }
}

// One image query for the whole list
export async function toGarmentDtos(
  garments: Garment[],
  garmentImages: GarmentImageRepository
): Promise<GarmentDto[]> {
  const images = await garmentImages.findByGarmentIds(garments.map(garment => garment.id))

  const byGarment = new Map<number, GarmentImage[]>()
  for (const image of images) {
    const list = byGarment.get(image.garmentId)
    if (list) list.push(image)
    else byGarment.set(image.garmentId, [image])
  }

  return garments.map(garment => toGarmentDto(garment, byGarment.get(garment.id) || []))
}
