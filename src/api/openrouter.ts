/**
 * OpenRouter adapter (OpenRouter SDK)
 */

import { OpenRouter } from '@openrouter/sdk'
import type { ModelProvider, ProviderRequest } from '../types/index.js'

import { ProviderError } from '../utils/errors.js'
import { isRecord, isString } from '../utils/type-guards.js'

export const OPENROUTER_DEFAULT_MODEL = 'google/gemini-2.5-flash'

/**
 * Pull the first choice's text out of a chat completion.
 * Content may be a string or an array of typed parts.
 */
export const extractCompletionText = (completion: unknown): string => {
  if (!isRecord(completion) || !Array.isArray(completion.choices)) {
    throw new ProviderError('malformed_response', 'OpenRouter response has no choices')
  }
  const first: unknown = completion.choices[0]
  const message = isRecord(first) ? first.message : undefined
  const content = isRecord(message) ? message.content : undefined

  if (isString(content)) return content
  if (Array.isArray(content)) {
    const parts: unknown[] = content
    return parts
      .map((part) => (isRecord(part) && isString(part.text) ? part.text : ''))
      .join('')
  }
  throw new ProviderError('malformed_response', 'OpenRouter response has no message content')
}

export const createOpenRouterProvider = (apiKey: string): ModelProvider => {
  const client = new OpenRouter({ apiKey })

  return {
    name: 'openrouter',
    defaultModel: OPENROUTER_DEFAULT_MODEL,
    generate: async ({ model, prompt, maxTokens }: ProviderRequest) => {
      // The per-attempt deadline is enforced by the inference client
      const completion: unknown = await client.chat.send({
        model,
        messages: [
          {
            role: 'user',
            content: prompt,
          },
        ],
        maxTokens,
      })
      return extractCompletionText(completion)
    },
  }
}
