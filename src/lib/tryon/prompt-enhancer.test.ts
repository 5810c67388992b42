import { afterEach, describe, expect, it, vi } from 'vitest'
import { buildEnhancePrompt } from '@/prompts/tryon'
import type { Garment } from '@/types'
import { cleanEnhancedPrompt, PromptEnhancer } from './prompt-enhancer'

const garment: Garment = {
  id: 1,
  nameId: 'VES001',
  garmentName: 'Kasavu Vesti',
  category: 'Vesti',
  subcategory: null,
  garmentType: 'Traditional',
  color: 'Cream',
  patternStyle: null,
  price: 899,
  stockQuantity: 3,
  createdAt: '2024-05-01T10:00:00.000Z',
  updatedAt: '2024-05-01T10:00:00.000Z',
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('cleanEnhancedPrompt', () => {
  it('strips wrapping quotes and backticks', () => {
    expect(cleanEnhancedPrompt('  "Drape it well"  ')).toBe('Drape it well')
    expect(cleanEnhancedPrompt('```Drape it well```')).toBe('Drape it well')
  })

  it('collapses runs of blank lines', () => {
    expect(cleanEnhancedPrompt('First\n\n\n\nSecond')).toBe('First\n\nSecond')
  })
})

describe('PromptEnhancer', () => {
  it('sends the garment details to the text model', async () => {
    const generateText = vi.fn(async (_prompt: string) => 'Enhanced prompt')
    const enhancer = new PromptEnhancer({ generateText })

    const result = await enhancer.enhance('BASE', garment)

    expect(result).toBe('Enhanced prompt')
    expect(generateText).toHaveBeenCalledWith(
      buildEnhancePrompt({
        basePrompt: 'BASE',
        category: 'Vesti',
        garmentType: 'Traditional',
        garmentName: 'Kasavu Vesti',
        color: 'Cream',
        patternStyle: null,
      })
    )
  })

  it('keeps the base prompt when the text model returns nothing', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const empty = new PromptEnhancer({ generateText: async () => null })
    const blank = new PromptEnhancer({ generateText: async () => ' "" ' })

    expect(await empty.enhance('BASE', garment)).toBe('BASE')
    expect(await blank.enhance('BASE', garment)).toBe('BASE')
  })

  it('keeps the base prompt when the text model fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const enhancer = new PromptEnhancer({
      generateText: async () => {
        throw new Error('quota exceeded')
      },
    })

    expect(await enhancer.enhance('BASE', garment)).toBe('BASE')
    expect(warn).toHaveBeenCalledWith('[TryOn] Prompt enhancement failed, using base prompt:', 'quota exceeded')
  })
})
