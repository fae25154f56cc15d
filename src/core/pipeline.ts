/**
 * Rewrite pipeline.
 *
 * Per branch: select → extract + generate (bounded pool) → approve → plan.
 * Only when every branch has a plan are they applied, one after another.
 * Backups stay until the last branch commits; if any branch fails, the
 * branches already rewritten are reset to their old tips.
 */

import type {
  CommitDecision,
  CommitFailure,
  CommitRecord,
  Generation,
  HistoryBackend,
  ModelProvider,
  RewritePlan,
  RunContext,
  Settings,
  TargetSpec,
} from '../types/index.js'

import { approve, type ApprovalPrompter } from './approval.js'
import { extractChange } from './extractor.js'
import { createInferenceClient, type InferenceClient } from './inference.js'
import { buildPlan } from './plan.js'
import { buildPrompt } from './prompt-builder.js'
import { HistoryRewriter, backupRefFor, type ApplyResult } from './rewriter.js'
import { selectCommits } from './selector.js'
import { scoreMessage } from '../utils/commit-helpers.js'
import { mapWithConcurrency } from '../utils/concurrency.js'
import { ApplyError, throwIfCancelled } from '../utils/errors.js'
import { log } from '../utils/logging.js'
import { withSpinner } from '../utils/spinner-wrapper.js'
import { getErrorMessage } from '../utils/type-guards.js'

export interface PipelineDeps {
  backend: HistoryBackend
  provider: ModelProvider
  /** null runs without any interaction (auto mode, tests). */
  prompter: ApprovalPrompter | null
  /**
   * Called with each branch's plan before it is applied.
   * Returning false leaves the branch untouched (dry run, declined).
   */
  beforeApply?: (plan: RewritePlan, decisions: CommitDecision[]) => Promise<boolean>
  sleep?: (ms: number) => Promise<void>
}

export interface BranchOutcome {
  branch: string
  records: CommitRecord[]
  decisions: CommitDecision[]
  plan: RewritePlan
  /** null when the plan was not applied. */
  result: ApplyResult | null
}

export interface PipelineResult {
  branches: BranchOutcome[]
  failures: CommitFailure[]
}

export interface RunContextOptions {
  model?: string | null
  rationale?: string | null
  signal: AbortSignal
}

export const createRunContext = (
  settings: Settings,
  provider: ModelProvider,
  options: RunContextOptions
): RunContext => {
  const rationale = options.rationale?.trim() || null
  return {
    settings,
    model: options.model ?? settings.model ?? provider.defaultModel,
    rationale,
    rationaleSource: rationale ? 'flag' : null,
    signal: options.signal,
    failures: [],
  }
}

const short = (hash: string) => hash.slice(0, 7)

const generate = async (
  client: InferenceClient,
  record: CommitRecord,
  ctx: RunContext,
  rationale: string | null
): Promise<Generation> => {
  const prompt = buildPrompt({
    diff: record.diff,
    originalMessage: record.originalMessage,
    rationale,
    style: ctx.settings.style,
    diffSummarized: record.diffSummarized,
  })
  const result = await client.send(prompt, ctx.model)
  return result.ok
    ? { status: 'generated', text: result.text, rationale }
    : { status: 'failed', failure: result.failure }
}

const askSharedRationale = async (
  selectedCount: number,
  firstHash: string,
  ctx: RunContext,
  prompter: ApprovalPrompter
): Promise<void> => {
  const label =
    selectedCount > 1 ? `${short(firstHash)} and ${selectedCount - 1} more` : short(firstHash)
  const reason = (await prompter.askRationale(label)).trim()
  if (reason) {
    ctx.rationale = reason
    ctx.rationaleSource = 'prompt'
  }
}

/** Reset every applied branch after a later one failed; returns the error to raise. */
const revertApplied = async (
  rewriter: HistoryRewriter,
  applied: BranchOutcome[],
  cause: unknown
): Promise<ApplyError> => {
  const stuck: string[] = []
  for (const outcome of [...applied].reverse()) {
    if (!outcome.result) continue
    try {
      await rewriter.revert(outcome.plan, outcome.result)
      outcome.result = null
    } catch (error: unknown) {
      log.error(`Could not restore ${outcome.branch}: ${getErrorMessage(error)}`)
      stuck.push(outcome.branch)
    }
  }

  const names = applied.map((o) => o.branch).join(', ')
  const firstBackup = backupRefFor(applied[0]?.branch ?? '')
  if (stuck.length > 0) {
    return new ApplyError(
      `${getErrorMessage(cause)}; could not restore ${stuck.join(', ')}`,
      { rolledBack: false, backupRef: backupRefFor(stuck[0] ?? ''), cause }
    )
  }
  return new ApplyError(`${getErrorMessage(cause)}; also restored ${names}`, {
    rolledBack: cause instanceof ApplyError ? cause.rolledBack : true,
    backupRef: cause instanceof ApplyError ? cause.backupRef : firstBackup,
    cause,
  })
}

/** Apply every approved plan, all or nothing. */
const applyAll = async (
  rewriter: HistoryRewriter,
  outcomes: BranchOutcome[],
  approved: Set<BranchOutcome>,
  ctx: RunContext
): Promise<void> => {
  const applied: BranchOutcome[] = []
  try {
    for (const outcome of outcomes) {
      if (!approved.has(outcome)) continue
      outcome.result = await rewriter.apply(outcome.plan, { keepBackup: true, signal: ctx.signal })
      if (outcome.result.status === 'applied') applied.push(outcome)
    }
  } catch (error: unknown) {
    if (applied.length === 0) throw error
    throw await revertApplied(rewriter, applied, error)
  }

  if (ctx.settings.keepBackup) return
  for (const outcome of applied) {
    if (outcome.result) outcome.result = await rewriter.releaseBackup(outcome.result)
  }
}

/** Run every stage for one target. Throws on precondition or apply errors. */
export const runPipeline = async (
  target: TargetSpec,
  branch: string | null,
  ctx: RunContext,
  deps: PipelineDeps
): Promise<PipelineResult> => {
  const { backend, prompter } = deps
  const { settings } = ctx

  const selected = await selectCommits(backend, target, {
    branch,
    includeMerges: settings.includeMerges,
  })
  if (selected.length === 0) {
    log.info('No commits to process')
    return { branches: [], failures: ctx.failures }
  }

  const client = createInferenceClient({
    provider: deps.provider,
    retries: settings.retries,
    timeoutMs: settings.timeoutMs,
    baseDelayMs: settings.retryBaseDelayMs,
    stripQuotes: settings.stripQuotes,
    maxTokens: settings.maxTokens,
    signal: ctx.signal,
    sleep: deps.sleep,
  })

  const first = selected[0]?.hashes[0]
  if (settings.askWhy && !settings.autoApply && prompter && ctx.rationale === null && first) {
    const total = selected.reduce((n, s) => n + s.hashes.length, 0)
    await askSharedRationale(total, first, ctx, prompter)
  }

  const regenerate = (record: CommitRecord, rationale: string | null) =>
    withSpinner(`Regenerating ${short(record.hash)}...`, () =>
      generate(client, record, ctx, rationale)
    )

  const branches: BranchOutcome[] = []
  const approved = new Set<BranchOutcome>()

  for (const sel of selected) {
    throwIfCancelled(ctx.signal, 'selection')
    log.step(`${sel.branch}: ${sel.hashes.length} commit(s)`)

    let done = 0
    const spinner = log.spinner()
    spinner.start(`Generating messages with ${ctx.model} (0/${sel.hashes.length})`)
    let records: CommitRecord[]
    let generations: Generation[]
    try {
      const pairs = await mapWithConcurrency(sel.hashes, settings.concurrency, async (hash, i) => {
        throwIfCancelled(ctx.signal, 'generation')
        const record = await extractChange(backend, hash, i, {
          diffBudget: settings.diffBudget,
          style: settings.style,
        })
        const score = settings.skipMeaningful ? scoreMessage(record.originalMessage) : 0
        const generation: Generation =
          settings.skipMeaningful && score >= settings.qualityThreshold
            ? { status: 'meaningful', score }
            : await generate(client, record, ctx, ctx.rationale)
        done++
        spinner.update(`Generating messages with ${ctx.model} (${done}/${sel.hashes.length})`)
        return { record, generation }
      })
      records = pairs.map((p) => p.record)
      generations = pairs.map((p) => p.generation)
    } finally {
      spinner.stop()
    }
    throwIfCancelled(ctx.signal, 'generation')

    const decisions = await approve(records, generations, ctx, prompter, regenerate)
    throwIfCancelled(ctx.signal, 'review')

    const plan = await buildPlan(backend, sel, decisions)
    const proceed = deps.beforeApply ? await deps.beforeApply(plan, decisions) : true

    const outcome: BranchOutcome = { branch: sel.branch, records, decisions, plan, result: null }
    branches.push(outcome)
    if (proceed) approved.add(outcome)
  }

  throwIfCancelled(ctx.signal, 'review')
  await applyAll(new HistoryRewriter(backend), branches, approved, ctx)

  return { branches, failures: ctx.failures }
}
