/**
 * Prompt construction for commit message rewriting
 */

import type { MessageStyle } from '../types/index.js'

export interface PromptInput {
  diff: string
  originalMessage: string
  rationale: string | null
  style: MessageStyle
  diffSummarized: boolean
}

const FRAMING = `You are rewriting the message of an existing git commit so it accurately describes the change.
Output ONLY the new commit message. No commentary, no preamble, no explanation, no markdown.
Return exactly one message and do not wrap it in quotes.`

export const STYLE_INSTRUCTIONS: Record<MessageStyle, string> = {
  concise: 'Style: a single line of at most 50 characters, imperative mood, no body.',
  descriptive:
    'Style: an imperative subject line of at most 72 characters, then a blank line and a short body (1-3 lines) explaining what changed and why.',
  detailed:
    'Style: an imperative subject line of at most 72 characters, then a blank line and a body wrapped at 72 characters covering what changed, why, and any notable side effects.',
  conventional:
    'Style: Conventional Commits, `<type>(<scope>): <summary>` with type one of feat, fix, docs, style, refactor, test, chore, perf, ci, build, revert; subject at most 72 characters; optional body after a blank line.',
}

/** Build the model prompt for one commit. Pure. */
export const buildPrompt = ({
  diff,
  originalMessage,
  rationale,
  style,
  diffSummarized,
}: PromptInput): string => {
  const sections = [FRAMING, STYLE_INSTRUCTIONS[style]]

  sections.push(`Original message:\n${originalMessage.trim() || '(empty)'}`)

  const reason = rationale?.trim()
  if (reason) {
    sections.push(
      `Stated reason for this change (takes precedence over the diff when they conflict):\n${reason}`
    )
  }

  sections.push(
    diffSummarized
      ? `Changes (approximate: the diff was too large and is summarized per file):\n${diff}`
      : `Diff:\n${diff}`
  )

  return sections.join('\n\n')
}
