/**
 * Structured error message helpers
 */

import { colors } from './colors.js'
import { ApplyError, PreconditionError, RemessageError } from './errors.js'
import { getErrorMessage } from './type-guards.js'

export interface ErrorWithHints {
  message: string
  hints?: string[]
}

/**
 * Display a structured error with actionable hints
 */
export function displayError(error: ErrorWithHints): void {
  console.log(`\n${colors.red}✗ ${error.message}${colors.reset}`)

  if (error.hints && error.hints.length > 0) {
    for (const hint of error.hints) {
      console.log(`${colors.yellow}  → ${hint}${colors.reset}`)
    }
  }

  console.log('')
}

/**
 * Common error scenarios with hints
 */
export const ErrorMessages = {
  notGitRepo: (): PreconditionError =>
    new PreconditionError('not_a_repo', 'Not a git repository', [
      'Run remessage from inside a git working tree',
      'Initialize git with: git init',
    ]),

  detachedHead: (): PreconditionError =>
    new PreconditionError('detached_head', 'HEAD is detached; no branch to rewrite', [
      'Check out a branch first: git switch <branch>',
      'Or name one explicitly: --branch <name>',
    ]),

  dirtyTree: (modified: number, untracked: number): PreconditionError =>
    new PreconditionError(
      'dirty_tree',
      `Working tree is not clean (${modified} modified, ${untracked} untracked)`,
      [
        'Commit or stash your changes: git stash --include-untracked',
        'History is only rewritten from a clean working tree',
      ]
    ),

  stalePlan: (branch: string, detail: string): PreconditionError =>
    new PreconditionError('stale_plan', `Branch ${branch} changed during the run: ${detail}`, [
      'Nothing was rewritten',
      'Run remessage again to build a fresh plan',
    ]),

  missingApiKey: (provider: string, envVar: string): PreconditionError =>
    new PreconditionError('no_provider', `${provider} API key not found`, [
      `Export ${envVar}=<key>`,
      `Or add ${envVar.toLowerCase()} = "<key>" to .remessage/config.toml`,
    ]),

  unknownRevision: (rev: string): PreconditionError =>
    new PreconditionError('bad_target', `Unknown branch or revision: ${rev}`, [
      'List branches with: git branch',
    ]),
}

/** Turn any thrown value into something displayError can render. */
export function toErrorWithHints(error: unknown): ErrorWithHints {
  if (error instanceof ApplyError) {
    const hints = error.rolledBack
      ? [
          `Branch restored to its previous tip; backup kept at ${error.backupRef}`,
          'Delete it once inspected: git update-ref -d ' + error.backupRef,
        ]
      : [
          `Restore manually: git update-ref <branch-ref> ${error.backupRef}`,
          'Inspect with: git log --oneline ' + error.backupRef,
        ]
    return { message: error.message, hints: [...hints, ...error.hints] }
  }
  if (error instanceof RemessageError) {
    return { message: error.message, hints: error.hints }
  }
  return { message: getErrorMessage(error) }
}
