import { describe, expect, it } from 'vitest'
import { buildSearchExpression, toGarment, type GarmentRow } from './garments'

describe('buildSearchExpression', () => {
  it('matches the term in every searchable column', () => {
    expect(buildSearchExpression('silk')).toBe(
      'garment_name.ilike.%silk%,category.ilike.%silk%,subcategory.ilike.%silk%,color.ilike.%silk%,pattern_style.ilike.%silk%'
    )
  })

  it('neutralizes filter syntax characters', () => {
    const expression = buildSearchExpression('red,(silk)')

    expect(expression.split(',')).toHaveLength(5)
    expect(expression.startsWith('garment_name.ilike.%red silk%,')).toBe(true)
    expect(buildSearchExpression('50%*"off"')).toContain('garment_name.ilike.%50 off%')
  })
})

describe('toGarment', () => {
  const row: GarmentRow = {
    id: 3,
    name_id: 'SAR001',
    garment_name: 'Silk Saree',
    category: 'Saree',
    subcategory: null,
    garment_type: 'Traditional',
    color: 'Red',
    pattern_style: 'Zari Border',
    price: '2500.00',
    stock_quantity: null,
    created_at: '2024-05-01T10:00:00+00:00',
    updated_at: '2024-05-02T10:00:00+00:00',
  }

  it('maps columns to camelCase and coerces numeric fields', () => {
    expect(toGarment(row)).toEqual({
      id: 3,
      nameId: 'SAR001',
      garmentName: 'Silk Saree',
      category: 'Saree',
      subcategory: null,
      garmentType: 'Traditional',
      color: 'Red',
      patternStyle: 'Zari Border',
      price: 2500,
      stockQuantity: 0,
      createdAt: '2024-05-01T10:00:00+00:00',
      updatedAt: '2024-05-02T10:00:00+00:00',
    })
  })
})
