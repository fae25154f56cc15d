/**
 * Provider registry
 */

import type { ModelProvider, ProviderName, Settings } from '../types/index.js'

import { createGeminiProvider } from './gemini.js'
import { createOpenRouterProvider } from './openrouter.js'
import { ErrorMessages } from '../utils/error-helpers.js'

interface ProviderEntry {
  envVar: string
  apiKey: (settings: Settings) => string
  create: (apiKey: string) => ModelProvider
}

export const PROVIDERS: Record<ProviderName, ProviderEntry> = {
  gemini: {
    envVar: 'GEMINI_API_KEY',
    apiKey: (s) => s.geminiApiKey,
    create: createGeminiProvider,
  },
  openrouter: {
    envVar: 'OPENROUTER_API_KEY',
    apiKey: (s) => s.openrouterApiKey,
    create: createOpenRouterProvider,
  },
}

/** Build the configured provider, failing before any work when its key is missing. */
export const createProvider = (settings: Settings): ModelProvider => {
  const entry = PROVIDERS[settings.provider]
  const apiKey = entry.apiKey(settings).trim()
  if (!apiKey) {
    throw ErrorMessages.missingApiKey(settings.provider, entry.envVar)
  }
  return entry.create(apiKey)
}
