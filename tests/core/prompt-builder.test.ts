import { describe, expect, it } from 'vitest'

import { STYLE_INSTRUCTIONS, buildPrompt } from '../../src/core/prompt-builder.js'
import { MESSAGE_STYLES } from '../../src/core/constants.js'

const base = {
  diff: 'diff --git a/src/retry.ts b/src/retry.ts\n+export const retry = () => {}',
  originalMessage: 'wip',
  rationale: null,
  style: 'descriptive' as const,
  diffSummarized: false,
}

describe('buildPrompt', () => {
  it('frames the task and forbids commentary', () => {
    const prompt = buildPrompt(base)
    expect(prompt).toContain('You are rewriting the message of an existing git commit')
    expect(prompt).toContain('No commentary, no preamble')
    expect(prompt).toContain('do not wrap it in quotes')
  })

  it('includes the style clause, original message and diff', () => {
    const prompt = buildPrompt(base)
    expect(prompt).toContain(STYLE_INSTRUCTIONS.descriptive)
    expect(prompt).toContain('Original message:\nwip')
    expect(prompt).toContain(`Diff:\n${base.diff}`)
  })

  it('gives the stated reason precedence over the diff', () => {
    const prompt = buildPrompt({ ...base, rationale: '  users hit a race on login ' })
    expect(prompt).toContain(
      'Stated reason for this change (takes precedence over the diff when they conflict):\nusers hit a race on login'
    )
  })

  it('omits the reason section when there is none', () => {
    expect(buildPrompt(base)).not.toContain('Stated reason')
    expect(buildPrompt({ ...base, rationale: '   ' })).not.toContain('Stated reason')
  })

  it('labels a summarized diff as approximate', () => {
    const prompt = buildPrompt({ ...base, diffSummarized: true })
    expect(prompt).toContain('Changes (approximate: the diff was too large and is summarized per file):')
    expect(prompt).not.toContain('Diff:\n')
  })

  it('produces a distinct prompt per style', () => {
    const prompts = new Set(MESSAGE_STYLES.map((style) => buildPrompt({ ...base, style })))
    expect(prompts.size).toBe(MESSAGE_STYLES.length)
  })

  it('marks an empty original message', () => {
    expect(buildPrompt({ ...base, originalMessage: '' })).toContain('Original message:\n(empty)')
  })
})
