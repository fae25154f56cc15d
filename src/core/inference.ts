/**
 * Inference client: one prompt in, one normalized message (or a classified
 * failure) out. Never rejects.
 */

import type { FailureKind, ModelProvider, ProviderResult } from '../types/index.js'

import { classifyError, isTransientKind } from '../utils/ai-errors.js'
import { normalizeModelText } from '../utils/commit-helpers.js'
import { ProviderError } from '../utils/errors.js'
import { log } from '../utils/logging.js'
import { getErrorMessage } from '../utils/type-guards.js'

export interface InferenceOptions {
  provider: ModelProvider
  /** Extra attempts after the first, for transient failures only. */
  retries: number
  timeoutMs: number
  baseDelayMs: number
  stripQuotes: boolean
  maxTokens: number
  /** Run-wide cancellation; stops further attempts. */
  signal?: AbortSignal
  sleep?: (ms: number) => Promise<void>
}

export interface InferenceClient {
  send(prompt: string, model: string): Promise<ProviderResult>
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/** Delay before attempt `attempt + 1`. */
export const backoffDelay = (baseDelayMs: number, attempt: number): number =>
  baseDelayMs * 2 ** (attempt - 1)

const withTimeout = async <T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer: AbortSignal | undefined
): Promise<T> => {
  const controller = new AbortController()
  const onOuterAbort = () => controller.abort()
  outer?.addEventListener('abort', onOuterAbort, { once: true })

  let timer: NodeJS.Timeout | undefined
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new ProviderError('timeout', `No response within ${timeoutMs}ms`))
    }, timeoutMs)
  })

  try {
    return await Promise.race([run(controller.signal), deadline])
  } finally {
    clearTimeout(timer)
    outer?.removeEventListener('abort', onOuterAbort)
  }
}

export const createInferenceClient = (options: InferenceOptions): InferenceClient => {
  const sleep = options.sleep ?? defaultSleep
  const maxAttempts = Math.max(1, options.retries + 1)

  const fail = (kind: FailureKind, message: string, attempts: number): ProviderResult => ({
    ok: false,
    failure: { kind, message, attempts },
  })

  return {
    send: async (prompt, model) => {
      let lastKind: FailureKind = 'network_error'
      let lastMessage = 'No attempt made'

      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (options.signal?.aborted) {
          return fail(lastKind, 'Cancelled', attempt - 1)
        }
        try {
          const raw = await withTimeout(
            (signal) =>
              options.provider.generate({ model, prompt, maxTokens: options.maxTokens, signal }),
            options.timeoutMs,
            options.signal
          )
          const text = normalizeModelText(raw, options.stripQuotes)
          if (!text) {
            return fail('malformed_response', 'Model returned an empty message', attempt)
          }
          return { ok: true, text, attempts: attempt }
        } catch (error: unknown) {
          lastKind = classifyError(error)
          lastMessage = getErrorMessage(error)
          log.debug(`${options.provider.name} attempt ${attempt}/${maxAttempts}: ${lastKind} (${lastMessage})`)

          if (!isTransientKind(lastKind) || attempt === maxAttempts) {
            return fail(lastKind, lastMessage, attempt)
          }
          await sleep(backoffDelay(options.baseDelayMs, attempt))
        }
      }
      return fail(lastKind, lastMessage, maxAttempts)
    },
  }
}
