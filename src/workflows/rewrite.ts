/**
 * Rewrite workflow: the CLI-facing run of the pipeline.
 * Returns the process exit code.
 */

import type {
  CommitDecision,
  HistoryBackend,
  ModelProvider,
  RewritePlan,
  Settings,
  TargetSpec,
} from '../types/index.js'

import { createProvider } from '../api/providers.js'
import type { CliOptions } from '../cli/args.js'
import { confirm } from '../cli/input.js'
import { createTerminalPrompter } from '../cli/terminal-prompter.js'
import type { ApprovalPrompter } from '../core/approval.js'
import { PROTECTED_BRANCHES } from '../core/constants.js'
import { createRunContext, runPipeline, type PipelineResult } from '../core/pipeline.js'
import { countChanges } from '../core/plan.js'
import { backupRefFor } from '../core/rewriter.js'
import { findMainline } from '../core/selector.js'
import { colors, setColorEnabled } from '../utils/colors.js'
import { loadSettings } from '../utils/config.js'
import { isDryRun, logDryRun, printDryRunBanner, setDryRun } from '../utils/dry-run.js'
import { ErrorMessages, displayError, toErrorWithHints } from '../utils/error-helpers.js'
import { CancelledError } from '../utils/errors.js'
import { createGitBackend } from '../utils/git.js'
import { log } from '../utils/logging.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_CANCELLED = 130

export interface RewriteDeps {
  backend?: HistoryBackend
  settings?: Settings
  provider?: ModelProvider
  prompter?: ApprovalPrompter | null
  /** Final confirmation before a branch is rewritten. */
  confirmApply?: (question: string) => Promise<boolean>
}

// ── Preview ────────────────────────────────────────────────────────

const printPreview = (plan: RewritePlan) => {
  const changes = plan.entries.filter((e) => e.newMessage !== null)
  const line = '─'.repeat(56)
  console.log('')
  console.log(`  ${colors.cyan}┌${line}┐${colors.reset}`)
  console.log(
    `  ${colors.cyan}│${colors.reset} ${colors.bright}Changes to apply on ${plan.branch} (${changes.length} commit${changes.length > 1 ? 's' : ''})${colors.reset}`
  )
  console.log(`  ${colors.cyan}├${line}┤${colors.reset}`)

  for (const [i, entry] of changes.entries()) {
    if (i > 0) {
      console.log(`  ${colors.cyan}│${colors.reset}`)
    }
    const oldTitle = entry.commit.message.trim().split('\n')[0] ?? ''
    const newTitle = entry.newMessage?.split('\n')[0] ?? ''
    console.log(
      `  ${colors.cyan}│${colors.reset}  ${colors.yellow}${entry.commit.hash.slice(0, 7)}${colors.reset}`
    )
    console.log(`  ${colors.cyan}│${colors.reset}  ${colors.red}− ${oldTitle}${colors.reset}`)
    console.log(`  ${colors.cyan}│${colors.reset}  ${colors.green}+ ${newTitle}${colors.reset}`)
  }

  const replayed = plan.entries.length - changes.length
  if (replayed > 0) {
    console.log(`  ${colors.cyan}│${colors.reset}`)
    console.log(
      `  ${colors.cyan}│${colors.reset}  ${colors.gray}${replayed} later commit(s) re-parented with their messages unchanged${colors.reset}`
    )
  }
  console.log(`  ${colors.cyan}└${line}┘${colors.reset}`)
  console.log('')
}

const warnSharedBranch = (branch: string) => {
  console.log(
    `  ${colors.red}⚠ WARNING:${colors.reset} You are about to rewrite history on ${colors.cyan}${branch}${colors.reset}, a shared branch.`
  )
  console.log(
    `  ${colors.gray}Everyone who pulled ${branch} will need to reset onto the new history.${colors.reset}`
  )
  console.log(`  ${colors.gray}Consider rewriting on a feature branch instead.${colors.reset}`)
  console.log('')
}

// ── Report ─────────────────────────────────────────────────────────

const countReasons = (decisions: CommitDecision[]) => {
  const counts = new Map<string, number>()
  for (const d of decisions) {
    counts.set(d.reason, (counts.get(d.reason) ?? 0) + 1)
  }
  return [...counts.entries()].map(([reason, n]) => `${n} ${reason}`).join(', ')
}

const printReport = (result: PipelineResult) => {
  for (const outcome of result.branches) {
    const tally = countReasons(outcome.decisions)
    if (!outcome.result) {
      log.info(`${outcome.branch}: not rewritten (${tally})`)
      continue
    }
    if (outcome.result.status === 'noop') {
      log.info(`${outcome.branch}: nothing to rewrite (${tally})`)
      continue
    }
    log.success(
      `${outcome.branch}: ${outcome.result.rewritten} message(s) rewritten, tip ${outcome.result.oldTip.slice(0, 7)} → ${outcome.result.newTip.slice(0, 7)}`
    )
    if (outcome.result.backupRef) {
      console.log(`  ${colors.gray}Previous history kept at ${outcome.result.backupRef}${colors.reset}`)
    }
  }

  if (result.failures.length > 0) {
    log.warn(`${result.failures.length} commit(s) kept their original message after errors:`)
    for (const { hash, failure } of result.failures) {
      console.log(
        `  ${colors.yellow}${hash.slice(0, 7)}${colors.reset} ${failure.kind} after ${failure.attempts} attempt(s): ${colors.gray}${failure.message}${colors.reset}`
      )
    }
  }
}

// ── Entry ──────────────────────────────────────────────────────────

export const handleRewrite = async (cli: CliOptions, deps: RewriteDeps = {}): Promise<number> => {
  const controller = new AbortController()
  let interrupted = false
  const onSigint = () => {
    if (interrupted) {
      process.exit(EXIT_CANCELLED)
    }
    interrupted = true
    log.warn('Interrupted; stopping (press Ctrl+C again to force quit)')
    controller.abort()
  }
  process.on('SIGINT', onSigint)

  try {
    const settings = deps.settings ?? loadSettings({ flags: cli.flags })
    setColorEnabled(settings.useColor)
    setDryRun(cli.dryRun)

    const backend = deps.backend ?? createGitBackend()
    if (!(await backend.isRepository())) {
      throw ErrorMessages.notGitRepo()
    }

    let branch = cli.branch
    if (cli.onlyMain) {
      branch = await findMainline(backend)
      if (!branch) {
        throw ErrorMessages.unknownRevision('main/master')
      }
    }
    const target: TargetSpec = cli.target ?? { kind: 'last', count: settings.defaultCommitCount }

    const provider = deps.provider ?? createProvider(settings)
    const ctx = createRunContext(settings, provider, {
      model: settings.model,
      rationale: cli.rationale,
      signal: controller.signal,
    })
    const prompter =
      deps.prompter === undefined
        ? settings.autoApply
          ? null
          : createTerminalPrompter({ showDiff: settings.showDiff })
        : deps.prompter
    const confirmApply = deps.confirmApply ?? (async (q: string) => confirm(q))

    log.banner()
    if (isDryRun()) printDryRunBanner()
    log.ai(`Using ${provider.name} (${ctx.model}), style ${settings.style}`)

    const beforeApply = async (plan: RewritePlan): Promise<boolean> => {
      const changes = countChanges(plan)
      if (changes === 0) return true
      printPreview(plan)

      if (isDryRun()) {
        logDryRun(plan.branch, changes, plan.entries.length)
        return false
      }

      const shared =
        PROTECTED_BRANCHES.includes(plan.branch) || (await backend.hasUpstream(plan.branch))
      if (settings.warnOnSharedBranch && shared) {
        warnSharedBranch(plan.branch)
      }
      if (settings.autoApply) return true

      log.info(`A backup of the current tip is written to ${backupRefFor(plan.branch)} first`)
      return confirmApply(`Rewrite ${changes} commit message(s) on ${plan.branch}?`)
    }

    const result = await runPipeline(target, branch, ctx, {
      backend,
      provider,
      prompter,
      beforeApply,
    })

    printReport(result)
    return EXIT_OK
  } catch (error: unknown) {
    if (error instanceof CancelledError) {
      log.warn(`${error.message}; nothing was rewritten`)
      return EXIT_CANCELLED
    }
    displayError(toErrorWithHints(error))
    return EXIT_FAILURE
  } finally {
    process.removeListener('SIGINT', onSigint)
  }
}
