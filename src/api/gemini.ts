/**
 * Gemini adapter (Google GenAI SDK)
 */

import { GoogleGenAI } from '@google/genai'
import type { ModelProvider, ProviderRequest } from '../types/index.js'

import { ProviderError } from '../utils/errors.js'

export const GEMINI_DEFAULT_MODEL = 'gemini-2.5-flash'

export const createGeminiProvider = (apiKey: string): ModelProvider => {
  const client = new GoogleGenAI({ apiKey })

  return {
    name: 'gemini',
    defaultModel: GEMINI_DEFAULT_MODEL,
    generate: async ({ model, prompt, maxTokens, signal }: ProviderRequest) => {
      const response = await client.models.generateContent({
        model,
        contents: prompt,
        config: {
          maxOutputTokens: maxTokens,
          temperature: 0.4,
          abortSignal: signal,
        },
      })

      const text = response.text
      if (text === undefined) {
        const reason = response.promptFeedback?.blockReason
        throw new ProviderError(
          'malformed_response',
          reason ? `Gemini blocked the prompt (${reason})` : 'Gemini returned no text'
        )
      }
      return text
    },
  }
}
