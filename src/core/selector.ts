/**
 * Commit selection: turn a target spec into ordered commit ids per branch.
 */

import type { HistoryBackend, SelectedBranch, TargetSpec } from '../types/index.js'

import { ErrorMessages } from '../utils/error-helpers.js'
import { log } from '../utils/logging.js'

export interface SelectOptions {
  /** Branch to read instead of the current one. */
  branch?: string | null
  includeMerges: boolean
}

const MAINLINE_BRANCHES = ['main', 'master']

const short = (hash: string) => hash.slice(0, 7)

/** First of main/master that exists locally. */
export const findMainline = async (backend: HistoryBackend): Promise<string | null> => {
  const branches = await backend.localBranches()
  return MAINLINE_BRANCHES.find((b) => branches.includes(b)) ?? null
}

const resolveBranches = async (
  backend: HistoryBackend,
  target: TargetSpec,
  override: string | null | undefined
): Promise<string[]> => {
  if (target.kind === 'all-branches') {
    return backend.localBranches()
  }
  if (override) {
    return [override]
  }
  const current = await backend.currentBranch()
  if (!current) {
    throw ErrorMessages.detachedHead()
  }
  return [current]
}

/** Commits after the merge-base with main/master, or the whole chain. */
const sinceMainline = async (
  backend: HistoryBackend,
  branch: string,
  chain: string[]
): Promise<string[]> => {
  const mainline = await findMainline(backend)
  if (!mainline || mainline === branch) {
    return chain
  }
  const base = await backend.mergeBase(`refs/heads/${branch}`, `refs/heads/${mainline}`)
  if (!base) {
    log.warn(`No common ancestor with ${mainline}; using the whole branch`)
    return chain
  }
  const idx = chain.indexOf(base)
  if (idx === -1) {
    log.warn(`Merge-base with ${mainline} is not on the first-parent chain; using the whole branch`)
    return chain
  }
  return chain.slice(idx + 1)
}

const selectOnBranch = async (
  backend: HistoryBackend,
  target: TargetSpec,
  branch: string,
  chain: string[],
  includeMerges: boolean
): Promise<string[]> => {
  const mergeCache = new Map<string, boolean>()
  const isMerge = async (hash: string): Promise<boolean> => {
    let merge = mergeCache.get(hash)
    if (merge === undefined) {
      merge = (await backend.readCommit(hash)).parents.length > 1
      mergeCache.set(hash, merge)
    }
    return merge
  }
  const eligible = async (hash: string) => includeMerges || !(await isMerge(hash))

  // Collect up to `count` eligible commits walking `order`
  const take = async (order: string[], count: number): Promise<string[]> => {
    const picked: string[] = []
    for (const hash of order) {
      if (picked.length >= count) break
      if (await eligible(hash)) picked.push(hash)
    }
    return picked
  }

  const filterEligible = async (hashes: string[]): Promise<string[]> => {
    const out: string[] = []
    let skipped = 0
    for (const hash of hashes) {
      if (await eligible(hash)) {
        out.push(hash)
      } else {
        skipped++
      }
    }
    if (skipped > 0) {
      log.warn(`Skipping ${skipped} merge commit(s) on ${branch} (use --include-merges to keep them)`)
    }
    return out
  }

  switch (target.kind) {
    case 'last': {
      return (await take([...chain].reverse(), target.count)).reverse()
    }
    case 'first': {
      return take(chain, target.count)
    }
    case 'all':
    case 'all-branches': {
      return filterEligible(chain)
    }
    case 'branch': {
      return filterEligible(await sinceMainline(backend, branch, chain))
    }
    case 'commit': {
      const positions = new Map(chain.map((hash, i) => [hash, i]))
      const wanted = new Set<string>()
      for (const rev of target.revs) {
        const hash = await backend.resolve(rev)
        if (!hash) {
          log.warn(`Unknown revision ${rev}; skipping`)
          continue
        }
        if (!positions.has(hash)) {
          log.warn(`${short(hash)} is not on the first-parent history of ${branch}; skipping`)
          continue
        }
        if (!(await eligible(hash))) {
          log.warn(`${short(hash)} is a merge commit; skipping (use --include-merges to keep it)`)
          continue
        }
        wanted.add(hash)
      }
      return [...wanted].sort((a, b) => (positions.get(a) ?? 0) - (positions.get(b) ?? 0))
    }
  }
}

/**
 * Resolve `target` into per-branch commit lists, oldest first.
 * Branches with nothing selected are left out.
 */
export const selectCommits = async (
  backend: HistoryBackend,
  target: TargetSpec,
  options: SelectOptions
): Promise<SelectedBranch[]> => {
  const branches = await resolveBranches(backend, target, options.branch)
  const selected: SelectedBranch[] = []

  for (const branch of branches) {
    const tip = await backend.resolve(`refs/heads/${branch}`)
    if (!tip) {
      throw ErrorMessages.unknownRevision(branch)
    }
    const chain = await backend.firstParentChain(tip)
    const hashes = await selectOnBranch(backend, target, branch, chain, options.includeMerges)

    if (hashes.length === 0) {
      log.debug(`Nothing selected on ${branch}`)
      continue
    }
    selected.push({ branch, tip, hashes })
  }

  return selected
}
