/**
 * Commit message normalization and quality helpers
 */

export const COMMIT_TYPES = [
  'feat',
  'fix',
  'docs',
  'style',
  'refactor',
  'test',
  'chore',
  'perf',
  'ci',
  'build',
  'revert',
] as const

export type CommitType = (typeof COMMIT_TYPES)[number]

/** Messages that say nothing about the change. */
const GENERIC_MESSAGES = new Set([
  'wip',
  'fix',
  'fixes',
  'fixed',
  'update',
  'updates',
  'updated',
  'change',
  'changes',
  'stuff',
  'misc',
  'tmp',
  'temp',
  'test',
  'typo',
  'asdf',
  'commit',
  'save',
  'done',
  '.',
])

const QUOTE_PAIRS: Array<[string, string]> = [
  ['"', '"'],
  ["'", "'"],
  ['`', '`'],
  ['“', '”'],
  ['‘', '’'],
]

const CONVENTIONAL_RE = new RegExp(`^(${COMMIT_TYPES.join('|')})(\\([^)]*\\))?!?: \\S`)

/** Subject line of a message. */
export const firstLine = (message: string): string => message.trim().split('\n')[0]?.trim() ?? ''

export function isConventionalLine(line: string): boolean {
  return CONVENTIONAL_RE.test(line.trim())
}

export function stripCodeFences(text: string): string {
  return text.replaceAll(/```[\w-]*\n?/g, '').replaceAll('```', '')
}

/** Remove one matching pair of quotes around the whole text, repeatedly. */
export function stripSurroundingQuotes(text: string): string {
  let t = text.trim()
  let changed = true
  while (changed && t.length >= 2) {
    changed = false
    for (const [open, close] of QUOTE_PAIRS) {
      if (t.startsWith(open) && t.endsWith(close)) {
        t = t.slice(open.length, t.length - close.length).trim()
        changed = true
        break
      }
    }
  }
  return t
}

/**
 * Clean raw model output into a commit message.
 * Returns '' when nothing usable is left.
 */
export function normalizeModelText(raw: string, stripQuotes: boolean): string {
  let t = stripCodeFences(raw.replaceAll('\r\n', '\n'))
  if (stripQuotes) {
    t = stripSurroundingQuotes(t)
  }
  // Collapse runs of blank lines left by fence removal
  return t.replaceAll(/\n{3,}/g, '\n\n').trim()
}

export function isGenericMessage(message: string): boolean {
  const subject = firstLine(message).toLowerCase()
  return subject === '' || GENERIC_MESSAGES.has(subject)
}

/**
 * Score an existing commit message from 0 to 100.
 *
 * Empty and generic one-word messages score 0. Otherwise points are given
 * for a subject of at least 10 characters (30), at least three words (20),
 * a subject within 72 characters (10), a conventional prefix (20), a body
 * (10) and a subject starting with a letter (10).
 */
export function scoreMessage(message: string): number {
  if (isGenericMessage(message)) return 0

  const subject = firstLine(message)
  const lines = message.trim().split('\n')
  const hasBody = lines.slice(1).some((l) => l.trim() !== '')

  let score = 0
  if (subject.length >= 10) score += 30
  if (subject.split(/\s+/).filter(Boolean).length >= 3) score += 20
  if (subject.length <= 72) score += 10
  if (isConventionalLine(subject)) score += 20
  if (hasBody) score += 10
  if (/^\p{L}/u.test(subject)) score += 10
  return score
}

/** Shorten a message to its subject for one-line display. */
export function truncateSubject(message: string, max = 60): string {
  const subject = firstLine(message)
  return subject.length > max ? `${subject.slice(0, max - 1)}…` : subject
}
