/**
 * Command-line parsing
 */

import type { Settings, TargetSpec } from '../types/index.js'

import { MESSAGE_STYLES, PROVIDER_NAMES } from '../core/constants.js'

export interface CliOptions {
  /** null = `last <defaultCommitCount>` */
  target: TargetSpec | null
  branch: string | null
  onlyMain: boolean
  rationale: string | null
  dryRun: boolean
  showVersion: boolean
  showHelp: boolean
  /** Settings overridden on the command line. */
  flags: Partial<Settings>
}

export type ParseResult = { ok: true; options: CliOptions } | { ok: false; error: string }

const VALUE_FLAGS = new Set(['--why', '--model', '--provider', '--style', '--branch'])

const BOOLEAN_FLAGS = new Set([
  '--all-branches',
  '--only-main',
  '--just-fix-it',
  '--ask-why',
  '--include-merges',
  '--skip-meaningful',
  '--keep-backup',
  '--dry-run',
  '--no-color',
  '-v',
  '--version',
  '-h',
  '--help',
])

const parseCount = (raw: string | undefined, word: string): number | string => {
  if (raw === undefined) return `"${word}" needs a commit count`
  const n = Number(raw)
  return Number.isInteger(n) && n > 0 ? n : `Invalid commit count: ${raw}`
}

export const parseArgs = (argv: string[]): ParseResult => {
  const options: CliOptions = {
    target: null,
    branch: null,
    onlyMain: false,
    rationale: null,
    dryRun: false,
    showVersion: false,
    showHelp: false,
    flags: {},
  }
  const revs: string[] = []
  let allBranches = false

  const setTarget = (target: TargetSpec): string | null => {
    if (options.target || revs.length > 0) return 'Only one target may be given'
    options.target = target
    return null
  }

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i] ?? ''

    if (raw.startsWith('-')) {
      const eq = raw.indexOf('=')
      const flag = eq === -1 ? raw : raw.slice(0, eq)

      if (VALUE_FLAGS.has(flag)) {
        const value = eq === -1 ? argv[++i] : raw.slice(eq + 1)
        if (value === undefined || value === '') {
          return { ok: false, error: `${flag} needs a value` }
        }
        switch (flag) {
          case '--why': {
            options.rationale = value
            break
          }
          case '--model': {
            options.flags.model = value
            break
          }
          case '--branch': {
            options.branch = value
            break
          }
          case '--provider': {
            const provider = PROVIDER_NAMES.find((p) => p === value)
            if (!provider) {
              return { ok: false, error: `Unknown provider: ${value} (${PROVIDER_NAMES.join(', ')})` }
            }
            options.flags.provider = provider
            break
          }
          case '--style': {
            const style = MESSAGE_STYLES.find((s) => s === value)
            if (!style) {
              return { ok: false, error: `Unknown style: ${value} (${MESSAGE_STYLES.join(', ')})` }
            }
            options.flags.style = style
            break
          }
        }
        continue
      }

      if (!BOOLEAN_FLAGS.has(raw)) {
        return { ok: false, error: `Unknown flag: ${raw}` }
      }
      switch (raw) {
        case '--all-branches': {
          allBranches = true
          break
        }
        case '--only-main': {
          options.onlyMain = true
          break
        }
        case '--just-fix-it': {
          options.flags.autoApply = true
          break
        }
        case '--ask-why': {
          options.flags.askWhy = true
          break
        }
        case '--include-merges': {
          options.flags.includeMerges = true
          break
        }
        case '--skip-meaningful': {
          options.flags.skipMeaningful = true
          break
        }
        case '--keep-backup': {
          options.flags.keepBackup = true
          break
        }
        case '--dry-run': {
          options.dryRun = true
          break
        }
        case '--no-color': {
          options.flags.useColor = false
          break
        }
        case '-v':
        case '--version': {
          options.showVersion = true
          break
        }
        default: {
          options.showHelp = true
        }
      }
      continue
    }

    let error: string | null = null
    switch (raw) {
      case 'last':
      case 'first': {
        const count = parseCount(argv[++i], raw)
        if (typeof count === 'string') return { ok: false, error: count }
        error = setTarget({ kind: raw, count })
        break
      }
      case 'all': {
        error = setTarget({ kind: 'all' })
        break
      }
      case '.': {
        error = setTarget({ kind: 'branch' })
        break
      }
      default: {
        if (options.target) error = 'Only one target may be given'
        else revs.push(raw)
      }
    }
    if (error) return { ok: false, error }
  }

  if (revs.length > 0) {
    options.target = { kind: 'commit', revs }
  }

  if (options.onlyMain && options.branch) {
    return { ok: false, error: '--only-main and --branch cannot be combined' }
  }
  if (allBranches) {
    if (options.onlyMain || options.branch) {
      return { ok: false, error: '--all-branches cannot be combined with --only-main or --branch' }
    }
    if (options.target && options.target.kind !== 'all') {
      return { ok: false, error: '--all-branches rewrites whole branches; drop the target' }
    }
    options.target = { kind: 'all-branches' }
  }

  return { ok: true, options }
}

export const HELP_TEXT = `remessage · rewrite commit messages from their diffs

Usage: remessage [target] [options]

Targets:
  last <N>             The newest N commits of the branch (default: last 5)
  first <N>            The oldest N commits of the branch
  all                  Every commit on the branch
  .                    Commits since the branch left main/master
  <rev>...             Specific commits

Options:
  --all-branches       Rewrite every local branch
  --only-main          Work on main/master instead of the current branch
  --branch <name>      Work on another local branch
  --just-fix-it        Apply every generated message without asking
  --ask-why            Ask once for the reason behind the changes
  --why <text>         Reason used for every commit
  --model <id>         Model to use
  --provider <name>    gemini | openrouter
  --style <style>      concise | descriptive | detailed | conventional
  --include-merges     Also rewrite merge commits
  --skip-meaningful    Leave commits that already have a good message
  --keep-backup        Keep refs/remessage/backup/<branch> after success
  --dry-run            Show the changes without rewriting anything
  --no-color           Disable colors
  -v, --version        Show version
  -h, --help           Show this help message

Config: ~/.remessage/config.toml, ./.remessage/config.toml
Env:    REMESSAGE_PROVIDER, REMESSAGE_MODEL, REMESSAGE_STYLE, REMESSAGE_AUTO_APPLY,
        GEMINI_API_KEY, OPENROUTER_API_KEY`
