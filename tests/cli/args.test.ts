import { describe, expect, it } from 'vitest'

import { parseArgs, type CliOptions } from '../../src/cli/args.js'

const parseOk = (argv: string[]): CliOptions => {
  const result = parseArgs(argv)
  if (!result.ok) throw new Error(result.error)
  return result.options
}

const parseError = (argv: string[]): string => {
  const result = parseArgs(argv)
  if (result.ok) throw new Error(`expected ${argv.join(' ')} to fail`)
  return result.error
}

describe('parseArgs', () => {
  it('leaves the target unset by default', () => {
    const options = parseOk([])
    expect(options.target).toBeNull()
    expect(options.flags).toEqual({})
    expect(options.dryRun).toBe(false)
  })

  it('parses last N with auto-apply', () => {
    const options = parseOk(['last', '3', '--just-fix-it'])
    expect(options.target).toEqual({ kind: 'last', count: 3 })
    expect(options.flags).toEqual({ autoApply: true })
  })

  it('parses the current-branch target with a reason', () => {
    const options = parseOk(['.', '--why', 'fix login race'])
    expect(options.target).toEqual({ kind: 'branch' })
    expect(options.rationale).toBe('fix login race')
  })

  it('collects explicit revisions', () => {
    expect(parseOk(['abc1234', 'def5678']).target).toEqual({
      kind: 'commit',
      revs: ['abc1234', 'def5678'],
    })
  })

  it('accepts --flag=value', () => {
    expect(parseOk(['--model=google/gemini-2.5-pro']).flags).toEqual({
      model: 'google/gemini-2.5-pro',
    })
  })

  it('maps setting flags', () => {
    const options = parseOk([
      '--provider',
      'gemini',
      '--style',
      'conventional',
      '--include-merges',
      '--skip-meaningful',
      '--keep-backup',
      '--ask-why',
      '--no-color',
      '--dry-run',
    ])
    expect(options.flags).toEqual({
      provider: 'gemini',
      style: 'conventional',
      includeMerges: true,
      skipMeaningful: true,
      keepBackup: true,
      askWhy: true,
      useColor: false,
    })
    expect(options.dryRun).toBe(true)
  })

  it('selects every branch with --all-branches', () => {
    expect(parseOk(['--all-branches']).target).toEqual({ kind: 'all-branches' })
  })

  it('rejects unknown flags', () => {
    expect(parseError(['--frobnicate'])).toBe('Unknown flag: --frobnicate')
  })

  it('rejects bad counts', () => {
    expect(parseError(['last', '0'])).toBe('Invalid commit count: 0')
    expect(parseError(['last'])).toBe('"last" needs a commit count')
  })

  it('rejects unknown styles and providers', () => {
    expect(parseError(['--style', 'fancy'])).toBe(
      'Unknown style: fancy (concise, descriptive, detailed, conventional)'
    )
    expect(parseError(['--provider=ollama'])).toBe('Unknown provider: ollama (gemini, openrouter)')
  })

  it('rejects conflicting targets', () => {
    expect(parseError(['last', '2', 'abc1234'])).toBe('Only one target may be given')
    expect(parseError(['all', '.'])).toBe('Only one target may be given')
    expect(parseError(['--all-branches', '--only-main'])).toBe(
      '--all-branches cannot be combined with --only-main or --branch'
    )
  })

  it('rejects a value flag without a value', () => {
    expect(parseError(['--why'])).toBe('--why needs a value')
  })
})
