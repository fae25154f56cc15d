import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { ProviderRequest, Settings, TargetSpec } from '../../src/types/index.js'

import { REVIEW_CHOICES } from '../../src/core/constants.js'
import { createRunContext, runPipeline } from '../../src/core/pipeline.js'
import { ApplyError, CancelledError, ProviderError } from '../../src/utils/errors.js'
import { noSleep, silenceConsole, stubProvider, testSettings } from '../helpers/fixtures.js'
import { MemoryRepo } from '../helpers/memory-repo.js'

/** Names the commit after the file its diff touches. */
const messageFromDiff = (request: ProviderRequest): string => {
  const file = /\+\+\+ b\/(\S+)/.exec(request.prompt)?.[1] ?? 'unknown'
  return `feat: update ${file}`
}

const setup = () => {
  const repo = new MemoryRepo()
  const c1 = repo.commit('main', 'init', { 'a.ts': 'export const a = 1' })
  const c2 = repo.commit('main', 'wip', { 'b.ts': 'export const b = 2' })
  const c3 = repo.commit('main', 'tmp', { 'c.ts': 'export const c = 3' })
  return { repo, c1, c2, c3 }
}

/** main: c1 → c2 → c3, feature: c1 → f1 → f2 */
const setupBranches = () => {
  const repo = new MemoryRepo()
  const c1 = repo.commit('main', 'init', { 'a.ts': 'export const a = 1' })
  repo.refs.set('refs/heads/feature', c1)
  repo.commit('feature', 'f1', { 'f.ts': 'export const f = 1' })
  const f2 = repo.commit('feature', 'f2', { 'g.ts': 'export const g = 1' })
  repo.commit('main', 'wip', { 'b.ts': 'export const b = 2' })
  const c3 = repo.commit('main', 'tmp', { 'c.ts': 'export const c = 3' })
  return { repo, f2, c3 }
}

const backupRefs = (repo: MemoryRepo) =>
  [...repo.refs.keys()].filter((ref) => ref.startsWith('refs/remessage/'))

const run = (
  repo: MemoryRepo,
  respond: (request: ProviderRequest) => string,
  settings: Partial<Settings> = {},
  options: {
    rationale?: string
    signal?: AbortSignal
    beforeApply?: () => Promise<boolean>
    target?: TargetSpec
  } = {}
) => {
  const provider = stubProvider(respond)
  const ctx = createRunContext(testSettings({ autoApply: true, ...settings }), provider, {
    rationale: options.rationale,
    signal: options.signal ?? new AbortController().signal,
  })
  const result = runPipeline(options.target ?? { kind: 'last', count: 3 }, null, ctx, {
    backend: repo,
    provider,
    prompter: null,
    beforeApply: options.beforeApply,
    sleep: noSleep,
  })
  return { provider, ctx, result }
}

describe('runPipeline', () => {
  beforeEach(() => {
    silenceConsole()
  })

  it('rewrites every selected commit in automatic mode', async () => {
    const { repo, c3 } = setup()

    const { provider, result } = run(repo, messageFromDiff)
    const { branches, failures } = await result

    expect(failures).toEqual([])
    expect(repo.log('main')).toEqual(['feat: update a.ts', 'feat: update b.ts', 'feat: update c.ts'])
    expect(branches[0]?.result?.oldTip).toBe(c3)
    expect(provider.requests.every((r) => r.model === 'stub/model')).toBe(true)
  })

  it('keeps the original message of a commit whose generation keeps failing', async () => {
    const { repo, c2 } = setup()

    const { provider, result } = run(
      repo,
      (request) => {
        if (request.prompt.includes('+++ b/b.ts')) {
          throw new ProviderError('rate_limited', 'slow down', 429)
        }
        return messageFromDiff(request)
      },
      { retries: 2 }
    )
    const { branches, failures } = await result

    expect(failures).toEqual([
      { hash: c2, failure: { kind: 'rate_limited', message: 'slow down', attempts: 3 } },
    ])
    expect(branches[0]?.decisions.map((d) => d.reason)).toEqual(['accepted', 'failed', 'accepted'])
    expect(repo.log('main')).toEqual(['feat: update a.ts', 'wip', 'feat: update c.ts'])
    expect(provider.requests).toHaveLength(5)
  })

  it('changes nothing when run again on its own output', async () => {
    const { repo } = setup()
    await run(repo, messageFromDiff).result
    const tip = repo.tip('main')

    const { branches } = await run(repo, messageFromDiff).result

    expect(branches[0]?.decisions.map((d) => d.reason)).toEqual(['unchanged', 'unchanged', 'unchanged'])
    expect(branches[0]?.result?.status).toBe('noop')
    expect(repo.tip('main')).toBe(tip)
  })

  it('leaves good messages alone when skipping meaningful ones', async () => {
    const repo = new MemoryRepo()
    repo.commit('main', 'feat(parser): add tokenizer for expressions', { 'a.ts': 'a' })
    repo.commit('main', 'wip', { 'b.ts': 'b' })

    const { provider, result } = run(repo, messageFromDiff, { skipMeaningful: true })
    const { branches } = await result

    expect(provider.requests).toHaveLength(1)
    expect(branches[0]?.decisions.map((d) => d.reason)).toEqual(['meaningful', 'accepted'])
    expect(repo.log('main')).toEqual([
      'feat(parser): add tokenizer for expressions',
      'feat: update b.ts',
    ])
  })

  it('does not apply a plan that is declined', async () => {
    const { repo, c3 } = setup()
    const beforeApply = vi.fn(async () => false)

    const { branches } = await run(repo, messageFromDiff, {}, { beforeApply }).result

    expect(beforeApply).toHaveBeenCalledTimes(1)
    expect(branches[0]?.result).toBeNull()
    expect(branches[0]?.plan.entries).toHaveLength(3)
    expect(repo.tip('main')).toBe(c3)
  })

  it('puts a stated reason into every prompt', async () => {
    const { repo } = setup()

    const { provider, ctx, result } = run(repo, messageFromDiff, {}, { rationale: ' users hit a race ' })
    await result

    expect(ctx.rationaleSource).toBe('flag')
    expect(provider.requests).toHaveLength(3)
    for (const request of provider.requests) {
      expect(request.prompt).toContain(
        'Stated reason for this change (takes precedence over the diff when they conflict):\nusers hit a race'
      )
    }
  })

  it('asks once for a shared reason in interactive mode', async () => {
    const { repo, c1 } = setup()
    const provider = stubProvider(messageFromDiff)
    const ctx = createRunContext(testSettings({ askWhy: true }), provider, {
      signal: new AbortController().signal,
    })
    const prompter = {
      review: vi.fn(async () => REVIEW_CHOICES.ACCEPT),
      edit: vi.fn(async () => ''),
      askRationale: vi.fn(async () => 'users hit a race'),
      confirm: vi.fn(async () => true),
    }

    await runPipeline({ kind: 'all' }, null, ctx, {
      backend: repo,
      provider,
      prompter,
      sleep: noSleep,
    })

    expect(prompter.askRationale).toHaveBeenCalledTimes(1)
    expect(prompter.askRationale).toHaveBeenCalledWith(`${c1.slice(0, 7)} and 2 more`)
    expect(prompter.review).toHaveBeenCalledTimes(3)
    expect(provider.requests).toHaveLength(3)
    expect(provider.requests.every((r) => r.prompt.includes('users hit a race'))).toBe(true)
  })

  it('stops before anything is generated once cancelled', async () => {
    const { repo, c3 } = setup()
    const controller = new AbortController()
    controller.abort()

    const { provider, result } = run(repo, messageFromDiff, {}, { signal: controller.signal })

    await expect(result).rejects.toBeInstanceOf(CancelledError)
    expect(provider.requests).toHaveLength(0)
    expect(repo.tip('main')).toBe(c3)
  })

  describe('with every branch selected', () => {
    const allBranches: TargetSpec = { kind: 'all-branches' }

    it('rewrites each branch and drops the backups at the end', async () => {
      const { repo } = setupBranches()

      const { branches } = await run(repo, messageFromDiff, {}, { target: allBranches }).result

      expect(branches.map((b) => b.branch)).toEqual(['feature', 'main'])
      expect(repo.log('feature')).toEqual(['feat: update a.ts', 'feat: update f.ts', 'feat: update g.ts'])
      expect(repo.log('main')).toEqual(['feat: update a.ts', 'feat: update b.ts', 'feat: update c.ts'])
      expect(branches.map((b) => b.result?.backupRef)).toEqual([null, null])
      expect(backupRefs(repo)).toEqual([])
    })

    it('restores branches already rewritten when a later one fails', async () => {
      const { repo, f2, c3 } = setupBranches()
      // feature needs three new commits; the fourth is main's first
      repo.beforeCreateCommit = (count) => {
        if (count === 3) throw new Error('object store full')
      }

      const { result } = run(repo, messageFromDiff, {}, { target: allBranches })

      const error = await result.catch((e: unknown) => e)
      expect(error).toBeInstanceOf(ApplyError)
      expect(error).toMatchObject({
        message: 'Rewrite of main failed (object store full); branch restored; also restored feature',
        rolledBack: true,
        backupRef: 'refs/remessage/backup/main',
      })
      expect(repo.tip('feature')).toBe(f2)
      expect(repo.tip('main')).toBe(c3)
      expect(repo.log('feature')).toEqual(['init', 'f1', 'f2'])
    })

    it('rewrites nothing when cancelled while the second branch is generating', async () => {
      const { repo, f2, c3 } = setupBranches()
      const controller = new AbortController()

      const { result } = run(
        repo,
        (request) => {
          if (request.prompt.includes('+++ b/c.ts')) controller.abort()
          return messageFromDiff(request)
        },
        {},
        { target: allBranches, signal: controller.signal }
      )

      await expect(result).rejects.toBeInstanceOf(CancelledError)
      expect(repo.tip('feature')).toBe(f2)
      expect(repo.tip('main')).toBe(c3)
      expect(repo.createdCommits).toHaveLength(0)
    })
  })
})
