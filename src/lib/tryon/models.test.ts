import { describe, expect, it, vi } from 'vitest'
import { buildTryOnPrompt } from '@/prompts/tryon'
import type { Garment } from '@/types'
import { availableModels, createPromptStrategies, isTryOnModelId, resolveTryOnModel } from './models'
import { PromptEnhancer } from './prompt-enhancer'

const garment: Garment = {
  id: 3,
  nameId: 'SAR001',
  garmentName: 'Silk Saree',
  category: 'Saree',
  subcategory: 'Silk',
  garmentType: 'Traditional',
  color: 'Red',
  patternStyle: 'Zari Border',
  price: 2500,
  stockQuantity: 10,
  createdAt: '2024-05-01T10:00:00.000Z',
  updatedAt: '2024-05-01T10:00:00.000Z',
}

describe('resolveTryOnModel', () => {
  it('uses the default model when none is given', () => {
    expect(resolveTryOnModel()).toBe('gemini-tryon')
    expect(resolveTryOnModel(null)).toBe('gemini-tryon')
    expect(resolveTryOnModel('  ')).toBe('gemini-tryon')
  })

  it('accepts known ids with surrounding whitespace', () => {
    expect(resolveTryOnModel(' gemini-tryon-enhanced ')).toBe('gemini-tryon-enhanced')
  })

  it('rejects unknown ids and lists the supported ones', () => {
    expect(() => resolveTryOnModel('dall-e')).toThrow(
      'Unsupported AI model: dall-e. Supported models: gemini-tryon, gemini-tryon-enhanced'
    )
  })

  it('narrows strings with isTryOnModelId', () => {
    expect(isTryOnModelId('gemini-tryon')).toBe(true)
    expect(isTryOnModelId('Gemini-Tryon')).toBe(false)
  })
})

describe('availableModels', () => {
  it('lists every model with exactly one default', () => {
    const models = availableModels()

    expect(models.map(model => model.id)).toEqual(['gemini-tryon', 'gemini-tryon-enhanced'])
    expect(models.filter(model => model.isDefault).map(model => model.id)).toEqual(['gemini-tryon'])
    expect(models[1].name).toBe('Gemini Try-On (enhanced prompt)')
  })
})

describe('createPromptStrategies', () => {
  it('sends the category prompt unchanged for the base model', async () => {
    const generateText = vi.fn(async () => 'unused')
    const strategies = createPromptStrategies(new PromptEnhancer({ generateText }))

    const prompt = await strategies['gemini-tryon']({ garment, customPrompt: 'festive' })

    expect(prompt).toBe(buildTryOnPrompt({ garmentName: 'Silk Saree', category: 'Saree', customPrompt: 'festive' }))
    expect(generateText).not.toHaveBeenCalled()
  })

  it('rewrites the prompt through the text model for the enhanced model', async () => {
    const generateText = vi.fn(async () => '"A richer prompt"')
    const strategies = createPromptStrategies(new PromptEnhancer({ generateText }))

    const prompt = await strategies['gemini-tryon-enhanced']({ garment })

    expect(prompt).toBe('A richer prompt')
    expect(generateText).toHaveBeenCalledTimes(1)
  })
})
