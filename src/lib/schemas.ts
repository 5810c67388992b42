/**
 * Request schemas for the route handlers
 */
import { z } from 'zod'
import type { GarmentSort } from '@/types'

export const MAX_PAGE_SIZE = 100
export const DEFAULT_PAGE_SIZE = 20
export const MAX_CUSTOM_PROMPT_LENGTH = 500

const GARMENT_SORTS: readonly GarmentSort[] = ['price_asc', 'price_desc', 'name_asc', 'name_desc', 'newest', 'oldest']

function isGarmentSort(value: string): value is GarmentSort {
  return GARMENT_SORTS.some(sort => sort === value)
}

const positiveId = z.coerce.number().int().positive()

// Comma separated list, blanks dropped
const csvList = z
  .string()
  .optional()
  .transform(value => {
    const items = (value || '').split(',').map(item => item.trim()).filter(Boolean)
    return items.length ? items : undefined
  })

const optionalText = z
  .string()
  .optional()
  .transform(value => value?.trim() || undefined)

export const pageSchema = z.object({
  page: z.coerce.number().int().min(0).default(0),
  size: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_PAGE_SIZE)
    .transform(size => Math.min(size, MAX_PAGE_SIZE)),
})

export const garmentSearchSchema = pageSchema.extend({
  searchTerm: optionalText,
  categories: csvList,
  colors: csvList,
  minPrice: z.coerce.number().nonnegative().optional(),
  maxPrice: z.coerce.number().nonnegative().optional(),
  // Unknown values fall back to the default order
  sortBy: z
    .string()
    .optional()
    .transform(value => (value && isGarmentSort(value) ? value : undefined)),
})

export const garmentInputSchema = z.object({
  nameId: z.string().trim().min(1).max(100),
  garmentName: z.string().trim().min(1).max(255),
  category: z.string().trim().min(1).max(100),
  subcategory: z.string().trim().max(100).nullish().transform(value => value || null),
  garmentType: z.string().trim().min(1).max(100),
  color: z.string().trim().min(1).max(50),
  patternStyle: z.string().trim().max(100).nullish().transform(value => value || null),
  price: z.coerce.number().nonnegative(),
  stockQuantity: z.coerce.number().int().min(0).default(0),
})

// Multipart fields of the admin create form
export const newGarmentFormSchema = z.object({
  nameId: optionalText,
  garmentName: z.string().trim().min(1).max(255),
  category: z.string().trim().min(1).max(100),
  subcategory: optionalText.transform(value => value ?? null),
  garmentType: optionalText,
  color: z.string().trim().min(1).max(50),
  patternStyle: optionalText.transform(value => value ?? null),
  price: z.coerce.number().nonnegative(),
  stockQuantity: z.coerce.number().int().min(0),
  primaryImageIndex: z.coerce.number().int().default(0),
})

export const tryonRequestSchema = z.object({
  garmentId: z.number().int().positive(),
  userPhotoId: z.number().int().positive(),
  aiModel: z.string().optional(),
  customPrompt: z.string().max(MAX_CUSTOM_PROMPT_LENGTH).optional(),
  style: z.string().max(200).optional(),
})

export const garmentIdSchema = z.object({ garmentId: positiveId })

export const garmentIdsSchema = z.array(z.number().int().positive()).max(500)

export const nameSchema = z.object({ name: z.string().trim().min(1).max(255) })

export const profileSchema = z.object({ profileName: z.string().trim().max(255).optional() })

export const daysSchema = (fallback: number) =>
  z.object({ days: z.coerce.number().int().min(1).max(365).default(fallback) })

export const analyticsSchema = (fallbackDays: number, fallbackLimit: number) =>
  z.object({
    days: z.coerce.number().int().min(1).max(365).default(fallbackDays),
    limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(fallbackLimit),
  })
