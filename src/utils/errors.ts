/**
 * Error taxonomy for a rewrite run.
 *
 * - PreconditionError: raised before any mutation; the repository is untouched.
 * - ProviderError: one commit's generation failed; the run continues with the
 *   original message for that commit.
 * - ApplyError: replay failed or was cancelled after mutation began; the branch
 *   has been reset to its backup (see `rolledBack`).
 * - CancelledError: interrupted before anything was applied.
 */

import type { FailureKind } from '../types/index.js'

export class RemessageError extends Error {
  readonly hints: string[]

  constructor(message: string, hints: string[] = [], options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RemessageError'
    this.hints = hints
  }
}

export type PreconditionCode =
  | 'dirty_tree'
  | 'stale_plan'
  | 'not_a_repo'
  | 'detached_head'
  | 'no_provider'
  | 'bad_target'

export class PreconditionError extends RemessageError {
  readonly code: PreconditionCode

  constructor(code: PreconditionCode, message: string, hints: string[] = []) {
    super(message, hints)
    this.name = 'PreconditionError'
    this.code = code
  }
}

export class ProviderError extends RemessageError {
  readonly kind: FailureKind
  readonly status: number | null

  constructor(kind: FailureKind, message: string, status: number | null = null) {
    super(message)
    this.name = 'ProviderError'
    this.kind = kind
    this.status = status
  }
}

export class ApplyError extends RemessageError {
  readonly rolledBack: boolean
  readonly backupRef: string

  constructor(
    message: string,
    details: { rolledBack: boolean; backupRef: string; cause?: unknown },
    hints: string[] = []
  ) {
    super(message, hints, { cause: details.cause })
    this.name = 'ApplyError'
    this.rolledBack = details.rolledBack
    this.backupRef = details.backupRef
  }
}

export class CancelledError extends RemessageError {
  constructor(message = 'Cancelled') {
    super(message)
    this.name = 'CancelledError'
  }
}

/** Throws CancelledError when the run's signal has fired. */
export const throwIfCancelled = (signal: AbortSignal | undefined, where: string): void => {
  if (signal?.aborted) {
    throw new CancelledError(`Cancelled during ${where}`)
  }
}
