/**
 * Rewrite plan construction
 */

import type {
  CommitDecision,
  HistoryBackend,
  PlanEntry,
  RewritePlan,
  SelectedBranch,
} from '../types/index.js'

import { ErrorMessages } from '../utils/error-helpers.js'

export const branchRef = (branch: string) => `refs/heads/${branch}`

/**
 * Build the plan for one branch: every first-parent commit from the oldest
 * selected one up to the tip, with the approved message where there is one.
 */
export const buildPlan = async (
  backend: HistoryBackend,
  selected: SelectedBranch,
  decisions: CommitDecision[]
): Promise<RewritePlan> => {
  const chain = await backend.firstParentChain(selected.tip)
  const oldest = selected.hashes[0]
  const start = oldest === undefined ? -1 : chain.indexOf(oldest)
  if (start === -1) {
    throw ErrorMessages.stalePlan(selected.branch, 'selected commits are no longer on the branch')
  }

  const messages = new Map<string, string>()
  for (const d of decisions) {
    if (d.message !== null) messages.set(d.hash, d.message)
  }

  const entries: PlanEntry[] = []
  for (const hash of chain.slice(start)) {
    entries.push({
      commit: await backend.readCommit(hash),
      newMessage: messages.get(hash) ?? null,
    })
  }

  return {
    branch: selected.branch,
    ref: branchRef(selected.branch),
    baseTip: selected.tip,
    entries,
  }
}

/** Number of entries that change a message. */
export const countChanges = (plan: RewritePlan): number =>
  plan.entries.filter((e) => e.newMessage !== null).length
