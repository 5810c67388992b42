import { extractText, getGenAIClient, safetySettings } from '@/lib/genai'
import { buildEnhancePrompt } from '@/prompts/tryon'
import type { Garment } from '@/types'

export interface TextGenerator {
  generateText(prompt: string): Promise<string | null>
}

export function createGeminiTextGenerator(options: {
  apiKey: string
  model: string
  timeoutMs: number
}): TextGenerator {
  return {
    async generateText(prompt) {
      const genAI = getGenAIClient(options.apiKey)
      const result = await genAI.models.generateContent({
        model: options.model,
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        config: {
          safetySettings,
          httpOptions: { timeout: options.timeoutMs },
        },
      })
      return extractText(result)
    },
  }
}

// Strip wrapping quotes and collapse blank lines the text model likes to add
export function cleanEnhancedPrompt(text: string): string {
  return text
    .trim()
    .replace(/^["'`]+|["'`]+$/g, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
}

export class PromptEnhancer {
  constructor(private readonly generator: TextGenerator) {}

  // Falls back to the base prompt when the text model fails or returns nothing
  async enhance(basePrompt: string, garment: Garment): Promise<string> {
    const request = buildEnhancePrompt({
      basePrompt,
      category: garment.category,
      garmentType: garment.garmentType,
      garmentName: garment.garmentName,
      color: garment.color,
      patternStyle: garment.patternStyle,
    })

    try {
      const text = await this.generator.generateText(request)
      const enhanced = text ? cleanEnhancedPrompt(text) : ''
      if (!enhanced) {
        console.warn('[TryOn] Prompt enhancement returned no text, using base prompt')
        return basePrompt
      }
      return enhanced
    } catch (error) {
      console.warn('[TryOn] Prompt enhancement failed, using base prompt:', error instanceof Error ? error.message : error)
      return basePrompt
    }
  }
}
