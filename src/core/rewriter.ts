/**
 * History rewriter.
 *
 * idle → preflight → backed-up → applying → committed
 *                                   └──→ rolling-back → idle
 *
 * Nothing is mutated before the backup ref exists. Once applying starts,
 * any failure or cancellation resets the branch to the backup and verifies
 * it before the error surfaces.
 */

import type { HistoryBackend, RewritePlan } from '../types/index.js'

import { BACKUP_REF_PREFIX } from './constants.js'
import { countChanges } from './plan.js'
import { ErrorMessages } from '../utils/error-helpers.js'
import { ApplyError, CancelledError, throwIfCancelled } from '../utils/errors.js'
import { log } from '../utils/logging.js'
import { getErrorMessage } from '../utils/type-guards.js'

export type RewriterState =
  | 'idle'
  | 'preflight'
  | 'backed-up'
  | 'applying'
  | 'committed'
  | 'rolling-back'

export interface ApplyOptions {
  keepBackup: boolean
  signal?: AbortSignal
  /** Called after each replayed entry. */
  onProgress?: (done: number, total: number) => void
}

export interface ApplyResult {
  status: 'applied' | 'noop'
  oldTip: string
  newTip: string
  /** Messages replaced. */
  rewritten: number
  /** Left in place only when keepBackup is set. */
  backupRef: string | null
}

export const backupRefFor = (branch: string) => `${BACKUP_REF_PREFIX}/${branch}`

/** Git stores messages newline-terminated. */
const asStoredMessage = (message: string) => `${message.trim()}\n`

export class HistoryRewriter {
  private current: RewriterState = 'idle'

  constructor(private readonly backend: HistoryBackend) {}

  get state(): RewriterState {
    return this.current
  }

  async apply(plan: RewritePlan, options: ApplyOptions): Promise<ApplyResult> {
    if (this.current !== 'idle' && this.current !== 'committed') {
      throw new Error(`Rewriter is busy (${this.current})`)
    }

    const rewritten = countChanges(plan)
    if (rewritten === 0) {
      log.info(`No message changes for ${plan.branch}; leaving history untouched`)
      this.current = 'idle'
      return { status: 'noop', oldTip: plan.baseTip, newTip: plan.baseTip, rewritten, backupRef: null }
    }

    this.current = 'preflight'
    let chainLength: number
    try {
      chainLength = await this.preflight(plan)
      throwIfCancelled(options.signal, 'preflight')
    } catch (error: unknown) {
      this.current = 'idle'
      throw error
    }

    const backupRef = backupRefFor(plan.branch)
    try {
      await this.backend.updateRef(backupRef, plan.baseTip)
    } catch (error: unknown) {
      this.current = 'idle'
      throw error
    }
    this.current = 'backed-up'
    log.debug(`Backup ${backupRef} -> ${plan.baseTip}`)

    this.current = 'applying'
    let newTip: string
    try {
      newTip = await this.replay(plan, options)
      throwIfCancelled(options.signal, 'applying')
      await this.backend.updateRef(plan.ref, newTip, plan.baseTip)
      await this.verify(plan, newTip, chainLength)
    } catch (error: unknown) {
      return this.rollback(plan, backupRef, error)
    }
    this.current = 'committed'

    const result: ApplyResult = { status: 'applied', oldTip: plan.baseTip, newTip, rewritten, backupRef }
    return options.keepBackup ? result : this.releaseBackup(result)
  }

  /** Delete the backup ref of an applied rewrite. It stays when the delete fails. */
  async releaseBackup(result: ApplyResult): Promise<ApplyResult> {
    if (result.backupRef === null) return result
    try {
      await this.backend.deleteRef(result.backupRef)
    } catch (error: unknown) {
      log.warn(`Rewrite succeeded but ${result.backupRef} could not be removed: ${getErrorMessage(error)}`)
      return result
    }
    return { ...result, backupRef: null }
  }

  /**
   * Put an applied branch back on its old tip, e.g. when a later branch of
   * the same run fails. Only moves the ref while it still points at newTip.
   */
  async revert(plan: RewritePlan, result: ApplyResult): Promise<void> {
    if (result.status === 'noop') return
    log.warn(`Restoring ${plan.branch} to ${result.oldTip.slice(0, 7)}`)
    await this.backend.updateRef(plan.ref, result.oldTip, result.newTip)
    const restored = await this.backend.resolve(plan.ref)
    if (restored !== result.oldTip) {
      throw new Error(`${plan.ref} resolves to ${restored ?? 'nothing'}`)
    }
  }

  /** Returns the first-parent length of the current tip. */
  private async preflight(plan: RewritePlan): Promise<number> {
    const status = await this.backend.workingTreeStatus()
    if (status.modified.length > 0 || status.untracked.length > 0) {
      throw ErrorMessages.dirtyTree(status.modified.length, status.untracked.length)
    }

    const live = await this.backend.resolve(plan.ref)
    if (live !== plan.baseTip) {
      throw ErrorMessages.stalePlan(plan.branch, 'the branch tip moved')
    }

    const chain = await this.backend.firstParentChain(plan.baseTip)
    const tail = chain.slice(-plan.entries.length)
    const matches =
      tail.length === plan.entries.length &&
      plan.entries.every((entry, i) => entry.commit.hash === tail[i])
    if (!matches) {
      throw ErrorMessages.stalePlan(plan.branch, 'its history no longer matches the plan')
    }
    return chain.length
  }

  /** Recreate the chain oldest → newest; returns the new tip. */
  private async replay(plan: RewritePlan, options: ApplyOptions): Promise<string> {
    let prev: string | null = null
    const total = plan.entries.length

    for (const [i, entry] of plan.entries.entries()) {
      throwIfCancelled(options.signal, 'applying')
      const { commit } = entry
      const parentsUnchanged = prev === null || prev === commit.parents[0]

      if (parentsUnchanged && entry.newMessage === null) {
        prev = commit.hash
      } else {
        prev = await this.backend.createCommit({
          tree: commit.tree,
          parents: prev === null ? commit.parents : [prev, ...commit.parents.slice(1)],
          author: commit.author,
          committer: commit.committer,
          message: entry.newMessage === null ? commit.message : asStoredMessage(entry.newMessage),
          // A new message is written as UTF-8.
          encoding: entry.newMessage === null ? commit.encoding : null,
        })
      }
      options.onProgress?.(i + 1, total)
    }

    if (prev === null) {
      throw new Error('Empty plan')
    }
    return prev
  }

  private async verify(plan: RewritePlan, newTip: string, chainLength: number): Promise<void> {
    const resolved = await this.backend.resolve(plan.ref)
    if (resolved !== newTip) {
      throw new Error(`${plan.ref} resolves to ${resolved ?? 'nothing'} instead of ${newTip}`)
    }
    const length = (await this.backend.firstParentChain(newTip)).length
    if (length !== chainLength) {
      throw new Error(`New history has ${length} commits, expected ${chainLength}`)
    }
  }

  private async rollback(plan: RewritePlan, backupRef: string, cause: unknown): Promise<never> {
    this.current = 'rolling-back'
    log.warn(`Restoring ${plan.branch} to ${plan.baseTip.slice(0, 7)}`)

    try {
      await this.backend.updateRef(plan.ref, plan.baseTip)
      const restored = await this.backend.resolve(plan.ref)
      if (restored !== plan.baseTip) {
        throw new Error(`${plan.ref} resolves to ${restored ?? 'nothing'}`)
      }
    } catch (rollbackError: unknown) {
      this.current = 'idle'
      throw new ApplyError(
        `Could not restore ${plan.branch}: ${getErrorMessage(rollbackError)}`,
        { rolledBack: false, backupRef, cause: rollbackError }
      )
    }

    this.current = 'idle'
    const message =
      cause instanceof CancelledError
        ? `Rewrite of ${plan.branch} cancelled; branch restored`
        : `Rewrite of ${plan.branch} failed (${getErrorMessage(cause)}); branch restored`
    throw new ApplyError(message, { rolledBack: true, backupRef, cause })
  }
}
