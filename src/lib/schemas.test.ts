import { describe, expect, it } from 'vitest'
import { analyticsSchema, garmentInputSchema, garmentSearchSchema, pageSchema, tryonRequestSchema } from './schemas'

describe('pageSchema', () => {
  it('defaults and clamps the page size', () => {
    expect(pageSchema.parse({})).toEqual({ page: 0, size: 20 })
    expect(pageSchema.parse({ page: '2', size: '500' })).toEqual({ page: 2, size: 100 })
    expect(pageSchema.safeParse({ size: '0' }).success).toBe(false)
  })
})

describe('garmentSearchSchema', () => {
  it('splits list parameters and ignores unknown sort orders', () => {
    expect(
      garmentSearchSchema.parse({ categories: 'Saree, Vesti,,', colors: '', minPrice: '100', sortBy: 'random' })
    ).toEqual({
      page: 0,
      size: 20,
      searchTerm: undefined,
      categories: ['Saree', 'Vesti'],
      colors: undefined,
      minPrice: 100,
      maxPrice: undefined,
      sortBy: undefined,
    })
  })

  it('keeps known sort orders', () => {
    expect(garmentSearchSchema.parse({ sortBy: 'price_desc', searchTerm: ' silk ' })).toMatchObject({
      sortBy: 'price_desc',
      searchTerm: 'silk',
    })
  })
})

describe('garmentInputSchema', () => {
  it('turns blank optional text into null', () => {
    const parsed = garmentInputSchema.parse({
      nameId: 'SAR001',
      garmentName: 'Silk Saree',
      category: 'Saree',
      subcategory: '',
      garmentType: 'Traditional',
      color: 'Red',
      price: '2500',
    })

    expect(parsed).toMatchObject({ subcategory: null, patternStyle: null, price: 2500, stockQuantity: 0 })
  })
})

describe('tryonRequestSchema', () => {
  it('limits the custom prompt length', () => {
    expect(tryonRequestSchema.safeParse({ garmentId: 1, userPhotoId: 2, customPrompt: 'x'.repeat(501) }).success).toBe(false)
    expect(tryonRequestSchema.parse({ garmentId: 1, userPhotoId: 2 })).toEqual({ garmentId: 1, userPhotoId: 2 })
  })
})

describe('analyticsSchema', () => {
  it('applies the fallbacks', () => {
    expect(analyticsSchema(7, 10).parse({})).toEqual({ days: 7, limit: 10 })
    expect(analyticsSchema(7, 10).parse({ days: '30', limit: '5' })).toEqual({ days: 30, limit: 5 })
  })
})
