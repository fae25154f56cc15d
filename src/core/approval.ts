/**
 * Approval: decide, per commit, which generated message is kept.
 */

import type {
  CommitDecision,
  CommitRecord,
  Generation,
  ProviderFailure,
  RunContext,
} from '../types/index.js'

import { REVIEW_CHOICES, type ReviewChoice } from './constants.js'
import { truncateSubject } from '../utils/commit-helpers.js'
import { throwIfCancelled } from '../utils/errors.js'
import { log } from '../utils/logging.js'

/** Interaction surface used in interactive mode. */
export interface ApprovalPrompter {
  review(record: CommitRecord, proposed: string): Promise<ReviewChoice>
  /** Returns the edited text; '' means the user cleared it. */
  edit(proposed: string): Promise<string>
  askRationale(label: string): Promise<string>
  confirm(question: string, defaultYes?: boolean): Promise<boolean>
}

export type Regenerate = (record: CommitRecord, rationale: string | null) => Promise<Generation>

const short = (hash: string) => hash.slice(0, 7)

const sameMessage = (a: string, b: string) => a.trim() === b.trim()

const recordFailure = (ctx: RunContext, record: CommitRecord, failure: ProviderFailure) => {
  ctx.failures.push({ hash: record.hash, failure })
  log.warn(
    `${short(record.hash)}: generation failed (${failure.kind}: ${failure.message}); keeping the original message`
  )
}

const decide = (record: CommitRecord, text: string, edited = false): CommitDecision => {
  if (sameMessage(text, record.originalMessage)) {
    return { hash: record.hash, message: null, reason: 'unchanged' }
  }
  return { hash: record.hash, message: text, reason: edited ? 'edited' : 'accepted' }
}

const reviewOne = async (
  record: CommitRecord,
  initial: { text: string; rationale: string | null },
  remaining: number,
  ctx: RunContext,
  prompter: ApprovalPrompter,
  regenerate: Regenerate
): Promise<CommitDecision> => {
  let text = initial.text

  for (;;) {
    throwIfCancelled(ctx.signal, 'review')
    const choice = await prompter.review(record, text)

    switch (choice) {
      case REVIEW_CHOICES.ACCEPT: {
        return decide(record, text)
      }
      case REVIEW_CHOICES.SKIP: {
        return { hash: record.hash, message: null, reason: 'skipped' }
      }
      case REVIEW_CHOICES.EDIT: {
        const edited = (await prompter.edit(text)).trim()
        if (!edited) {
          log.info(`${short(record.hash)}: empty message, skipping`)
          return { hash: record.hash, message: null, reason: 'skipped' }
        }
        return decide(record, edited, true)
      }
      case REVIEW_CHOICES.WHY: {
        const reason = (await prompter.askRationale(short(record.hash))).trim()
        if (!reason) {
          continue
        }
        if (
          remaining > 0 &&
          (await prompter.confirm(`Use this reason for the remaining ${remaining} commit(s)?`, true))
        ) {
          ctx.rationale = reason
          ctx.rationaleSource = 'prompt'
        }
        const next = await regenerate(record, reason)
        if (next.status === 'generated') {
          text = next.text
        } else if (next.status === 'failed') {
          ctx.failures.push({ hash: record.hash, failure: next.failure })
          log.warn(`Regeneration failed (${next.failure.kind}); showing the previous suggestion`)
        }
        continue
      }
    }
  }
}

/**
 * Produce one decision per record, in order.
 *
 * Automatic mode (settings.autoApply) takes every successful generation
 * without prompting. Failed generations always keep the original message
 * and are recorded on ctx.failures.
 */
export const approve = async (
  records: CommitRecord[],
  generations: Generation[],
  ctx: RunContext,
  prompter: ApprovalPrompter | null,
  regenerate: Regenerate
): Promise<CommitDecision[]> => {
  const decisions: CommitDecision[] = []
  const interactive = !ctx.settings.autoApply && prompter !== null

  for (const [i, record] of records.entries()) {
    let generation = generations[i]
    if (!generation) {
      throw new Error(`No generation for commit ${short(record.hash)}`)
    }

    // A rationale given during review applies to later commits too
    if (
      interactive &&
      generation.status === 'generated' &&
      ctx.rationale !== null &&
      generation.rationale !== ctx.rationale
    ) {
      generation = await regenerate(record, ctx.rationale)
    }

    if (generation.status === 'meaningful') {
      log.info(
        `${short(record.hash)}: keeping "${truncateSubject(record.originalMessage)}" (score ${generation.score})`
      )
      decisions.push({ hash: record.hash, message: null, reason: 'meaningful' })
      continue
    }

    if (generation.status === 'failed') {
      recordFailure(ctx, record, generation.failure)
      decisions.push({ hash: record.hash, message: null, reason: 'failed' })
      continue
    }

    if (!interactive || !prompter) {
      decisions.push(decide(record, generation.text))
      continue
    }

    decisions.push(
      await reviewOne(record, generation, records.length - i - 1, ctx, prompter, regenerate)
    )
  }

  return decisions
}
