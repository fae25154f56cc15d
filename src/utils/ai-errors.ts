/**
 * AI error classification
 */

import type { FailureKind } from '../types/index.js'

import { ProviderError } from './errors.js'
import { getErrorCode, getErrorMessage, getErrorStatus, isRecord } from './type-guards.js'

const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
])

/**
 * Heuristics to detect rate limiting and quota exhaustion from an error text.
 */
export function isRateLimitText(s: string | null | undefined): boolean {
  if (!s) {
    return false
  }
  const low = s.toLowerCase()

  if (/rate[\s_-]?limit(ed)?/.test(low) || /too many requests/.test(low)) {
    return true
  }
  if (/quota|resource[\s_]exhausted/.test(low)) {
    return true
  }
  return /insufficient\s+credits?|out\s+of\s+credits|out_of_credits/.test(low)
}

export function isAuthText(s: string | null | undefined): boolean {
  if (!s) {
    return false
  }
  const low = s.toLowerCase()
  return (
    /api[\s_-]?key (not valid|invalid)|invalid api[\s_-]?key|unauthori[sz]ed|permission[\s_]denied/.test(
      low
    ) || /no auth credentials|authentication/.test(low)
  )
}

/** Detect errors caused by model/context token length limits. */
export function isContextLimitText(s: string | null | undefined): boolean {
  if (!s) {
    return false
  }
  const low = s.toLowerCase()

  if (low.includes('maximum context length') || low.includes('context length is')) {
    return true
  }
  if (low.includes('context window') || low.includes('token limit')) {
    return true
  }
  return low.includes('tokens') && (low.includes('too many') || low.includes('exceed'))
}

const kindFromStatus = (status: number): FailureKind | null => {
  if (status === 401 || status === 403) return 'auth_invalid'
  if (status === 429) return 'rate_limited'
  if (status === 408 || status === 504) return 'timeout'
  if (status >= 500) return 'network_error'
  if (status >= 400) return 'malformed_response'
  return null
}

const isAbortLike = (error: unknown): boolean =>
  isRecord(error) && (error.name === 'AbortError' || error.name === 'TimeoutError')

/**
 * Map anything an adapter throws onto a failure kind.
 *
 * Order: explicit ProviderError, abort, HTTP status, socket error codes,
 * then message text. Unknown errors count as network errors so they are
 * retried.
 */
export function classifyError(error: unknown): FailureKind {
  if (error instanceof ProviderError) return error.kind
  if (isAbortLike(error)) return 'timeout'

  const status = getErrorStatus(error)
  const byStatus = status === null ? null : kindFromStatus(status)
  if (byStatus) return byStatus

  const code = getErrorCode(error)
  if (code && NETWORK_CODES.has(code)) {
    return code === 'ETIMEDOUT' || code === 'UND_ERR_CONNECT_TIMEOUT' ? 'timeout' : 'network_error'
  }

  const message = getErrorMessage(error)
  if (isRateLimitText(message)) return 'rate_limited'
  if (isAuthText(message)) return 'auth_invalid'
  if (isContextLimitText(message)) return 'malformed_response'
  if (/timed? ?out/i.test(message)) return 'timeout'
  return 'network_error'
}

export const isTransientKind = (kind: FailureKind): boolean =>
  kind === 'timeout' || kind === 'rate_limited' || kind === 'network_error'
