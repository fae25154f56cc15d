import { vi } from 'vitest'

import type {
  CommitRecord,
  ModelProvider,
  ProviderRequest,
  Settings,
} from '../../src/types/index.js'

import { DEFAULT_SETTINGS } from '../../src/utils/config.js'

export const testSettings = (overrides: Partial<Settings> = {}): Settings => ({
  ...DEFAULT_SETTINGS,
  retryBaseDelayMs: 0,
  timeoutMs: 1000,
  useColor: false,
  openrouterApiKey: 'test-secret',
  ...overrides,
})

export interface StubProvider extends ModelProvider {
  requests: ProviderRequest[]
}

/** Provider whose reply is computed from the request; throwing simulates a failure. */
export const stubProvider = (
  respond: (request: ProviderRequest) => string | Promise<string>
): StubProvider => {
  const requests: ProviderRequest[] = []
  return {
    name: 'openrouter',
    defaultModel: 'stub/model',
    requests,
    generate: async (request) => {
      requests.push(request)
      return respond(request)
    },
  }
}

export const makeRecord = (hash: string, message: string, position = 0): CommitRecord => ({
  hash,
  tree: `tree-${hash}`,
  parents: [],
  author: { name: 'Test Author', email: 'author@example.com', date: '1700000000 +0000' },
  committer: { name: 'Test Committer', email: 'committer@example.com', date: '1700000000 +0000' },
  message: `${message}\n`,
  encoding: null,
  position,
  originalMessage: message,
  diff: `diff --git a/${hash}.ts b/${hash}.ts`,
  diffSummarized: false,
})

export const silenceConsole = () => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
}

export const noSleep = async (_ms: number): Promise<void> => {}
