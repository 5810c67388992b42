// Virtual try-on prompts
// Part order sent to the image model: garment photo, person photo, this text

export type DrapingStyle = 'male-draping' | 'female-draping' | 'generic'

const MALE_DRAPING_CATEGORIES = new Set(['vesti', 'dhoti', 'lungi'])
const FEMALE_DRAPING_CATEGORIES = new Set(['saree', 'sari'])

export const KEEP_SUBJECT_INSTRUCTIONS = `Keep the person's face, body shape, skin tone, pose, background and lighting exactly as they are in the second image.`

export const KEEP_GARMENT_INSTRUCTIONS = `Reproduce the fabric texture, weave, border, pattern and colour of the garment from the first image faithfully, without inventing or removing any element.`

// Vesti / dhoti / lungi: wrapped around the waist
export const buildMaleDrapingPrompt = (garmentName: string) => `Virtual try-on. Dress the man in the second image in the "${garmentName}" shown in the first image.

Drape it the traditional way: wrapped around the waist and falling to the ankles, with natural pleats at the front and the border visible along the hem.

${KEEP_SUBJECT_INSTRUCTIONS}

${KEEP_GARMENT_INSTRUCTIONS}

Output a single photorealistic image.`

// Saree / sari: pleated skirt portion and pallu over the shoulder
export const buildFemaleDrapingPrompt = (garmentName: string) => `Virtual try-on. Dress the woman in the second image in the "${garmentName}" saree shown in the first image.

Drape it in the classic Nivi style: neat pleats at the front of the waist, the pallu taken over the left shoulder and falling down the back, with the border following every edge.

${KEEP_SUBJECT_INSTRUCTIONS}

${KEEP_GARMENT_INSTRUCTIONS}

Output a single photorealistic image.`

export const buildGenericTryOnPrompt = (garmentName: string, category: string) => `Virtual try-on. Dress the person in the second image in the "${garmentName}" (${category}) shown in the first image.

Fit it naturally to the body with realistic folds and drape for this kind of garment.

${KEEP_SUBJECT_INSTRUCTIONS}

${KEEP_GARMENT_INSTRUCTIONS}

Output a single photorealistic image.`

export function drapingStyleFor(category: string): DrapingStyle {
  const key = category.trim().toLowerCase()
  if (MALE_DRAPING_CATEGORIES.has(key)) return 'male-draping'
  if (FEMALE_DRAPING_CATEGORIES.has(key)) return 'female-draping'
  return 'generic'
}

export function selectTryOnPrompt(garment: { garmentName: string; category: string }): string {
  switch (drapingStyleFor(garment.category)) {
    case 'male-draping':
      return buildMaleDrapingPrompt(garment.garmentName)
    case 'female-draping':
      return buildFemaleDrapingPrompt(garment.garmentName)
    case 'generic':
      return buildGenericTryOnPrompt(garment.garmentName, garment.category)
  }
}

export const buildTryOnPrompt = (params: {
  garmentName: string
  category: string
  customPrompt?: string
  style?: string
}) => {
  let prompt = selectTryOnPrompt(params)

  const customPrompt = params.customPrompt?.trim()
  if (customPrompt) {
    prompt += `

Additional instructions: ${customPrompt}`
  }

  const style = params.style?.trim()
  if (style) {
    prompt += `

Style: ${style}`
  }

  return prompt
}

// Text model request that rewrites a try-on prompt using the garment's attributes
export const buildEnhancePrompt = (params: {
  basePrompt: string
  category: string
  garmentType: string
  garmentName: string
  color: string
  patternStyle: string | null
}) => `You write prompts for a virtual try-on image model.

Rewrite the prompt below into a more detailed one for a ${params.category} ${params.garmentType} called "${params.garmentName}". The garment is ${params.color} with ${params.patternStyle || 'no specific'} pattern. Focus on realistic fit, natural draping and appropriate styling.

Keep every instruction of the original prompt, including the order of the images it refers to.

Return only the rewritten prompt, no additional text.

Prompt:
${params.basePrompt}`
