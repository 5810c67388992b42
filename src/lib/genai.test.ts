import { FinishReason, GenerateContentResponse } from '@google/genai'
import { describe, expect, it, vi } from 'vitest'
import { extractText, getGenAIClient } from './genai'

describe('extractText', () => {
  it('joins text parts and skips thoughts', () => {
    const response = new GenerateContentResponse()
    response.candidates = [
      { content: { parts: [{ text: 'First' }, { text: 'reasoning', thought: true }, { text: 'Second' }] } },
    ]

    expect(extractText(response)).toBe('First\nSecond')
  })

  it('returns null for blocked or empty responses', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const blocked = new GenerateContentResponse()
    blocked.candidates = [{ finishReason: FinishReason.SAFETY, content: { parts: [{ text: 'x' }] } }]

    expect(extractText(blocked)).toBeNull()
    expect(extractText(new GenerateContentResponse())).toBeNull()
    vi.restoreAllMocks()
  })
})

describe('getGenAIClient', () => {
  it('reuses one client per key', () => {
    expect(getGenAIClient('test-key-a')).toBe(getGenAIClient('test-key-a'))
    expect(getGenAIClient('test-key-a')).not.toBe(getGenAIClient('test-key-b'))
  })
})
