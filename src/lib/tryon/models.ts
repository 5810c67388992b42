import { validationError } from '@/lib/errors'
import { buildTryOnPrompt } from '@/prompts/tryon'
import type { Garment } from '@/types'
import type { PromptEnhancer } from './prompt-enhancer'

export const TRY_ON_MODEL_IDS = ['gemini-tryon', 'gemini-tryon-enhanced'] as const

export type TryOnModelId = (typeof TRY_ON_MODEL_IDS)[number]

export const DEFAULT_TRY_ON_MODEL: TryOnModelId = 'gemini-tryon'

export interface TryOnModelInfo {
  id: TryOnModelId
  name: string
  description: string
  isDefault: boolean
}

const MODEL_DETAILS: Record<TryOnModelId, { name: string; description: string }> = {
  'gemini-tryon': {
    name: 'Gemini Try-On',
    description: 'Category-specific draping prompt sent straight to the image model',
  },
  'gemini-tryon-enhanced': {
    name: 'Gemini Try-On (enhanced prompt)',
    description: 'Draping prompt rewritten by a text model with the garment details before generation',
  },
}

export function isTryOnModelId(value: string): value is TryOnModelId {
  return TRY_ON_MODEL_IDS.some(id => id === value)
}

// Missing or blank selects the default model
export function resolveTryOnModel(value?: string | null): TryOnModelId {
  const id = value?.trim()
  if (!id) return DEFAULT_TRY_ON_MODEL
  if (!isTryOnModelId(id)) {
    throw validationError(`Unsupported AI model: ${id}. Supported models: ${TRY_ON_MODEL_IDS.join(', ')}`)
  }
  return id
}

export function availableModels(): TryOnModelInfo[] {
  return TRY_ON_MODEL_IDS.map(id => ({
    id,
    ...MODEL_DETAILS[id],
    isDefault: id === DEFAULT_TRY_ON_MODEL,
  }))
}

export interface PromptContext {
  garment: Garment
  customPrompt?: string
  style?: string
}

export type PromptStrategy = (context: PromptContext) => Promise<string>

export function createPromptStrategies(enhancer: PromptEnhancer): Record<TryOnModelId, PromptStrategy> {
  const basePrompt = ({ garment, customPrompt, style }: PromptContext) =>
    buildTryOnPrompt({
      garmentName: garment.garmentName,
      category: garment.category,
      customPrompt,
      style,
    })

  return {
    'gemini-tryon': async context => basePrompt(context),
    'gemini-tryon-enhanced': async context => enhancer.enhance(basePrompt(context), context.garment),
  }
}
