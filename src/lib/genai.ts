/**
 * Gemini text utilities
 * Uses the @google/genai SDK with an API key (Gemini Developer API)
 */
import {
  FinishReason,
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
  type GenerateContentResponse,
} from '@google/genai'

// One client per API key
const genAIClients = new Map<string, GoogleGenAI>()

export function getGenAIClient(apiKey: string): GoogleGenAI {
  let client = genAIClients.get(apiKey)
  if (!client) {
    client = new GoogleGenAI({ apiKey })
    genAIClients.set(apiKey, client)
  }
  return client
}

// Garment descriptions trip the default filters on body-related wording
export const safetySettings = [
  {
    category: HarmCategory.HARM_CATEGORY_HARASSMENT,
    threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH,
  },
  {
    category: HarmCategory.HARM_CATEGORY_HATE_SPEECH,
    threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH,
  },
  {
    category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
    threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH,
  },
  {
    category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
    threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH,
  },
]

// Helper: text parts of the first candidate, joined by newlines
export function extractText(response: GenerateContentResponse): string | null {
  const candidate = response.candidates?.[0]
  if (candidate?.finishReason === FinishReason.SAFETY) {
    console.warn('[GenAI] Text response blocked by safety filter')
    return null
  }

  const textParts: string[] = []
  for (const part of candidate?.content?.parts || []) {
    if (typeof part.text === 'string' && !part.thought) {
      textParts.push(part.text)
    }
  }
  return textParts.length > 0 ? textParts.join('\n') : null
}
