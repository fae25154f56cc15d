/**
 * Change extraction: commit metadata plus a diff that fits the budget.
 */

import type { CommitRecord, FileChange, HistoryBackend, MessageStyle } from '../types/index.js'

import { buildPrompt } from './prompt-builder.js'

export const SUMMARY_HEADER = 'APPROXIMATE SUMMARY (full diff exceeded the size budget)'
export const OMITTED_MARKER = '[diff omitted]'

const formatChange = (change: FileChange): string =>
  change.added === null || change.removed === null
    ? `${change.path} (binary)`
    : `${change.path} +${change.added} -${change.removed}`

/**
 * Structural summary of an oversized diff: one line per file with line
 * deltas, at most `limit` characters. Lines are added whole or not at all.
 */
export const summarizeDiff = (
  files: FileChange[],
  diffLength: number,
  budget: number,
  limit = Math.floor(budget / 2)
): string => {
  const added = files.reduce((n, f) => n + (f.added ?? 0), 0)
  const removed = files.reduce((n, f) => n + (f.removed ?? 0), 0)

  const head = [
    SUMMARY_HEADER,
    `Diff size: ${diffLength} characters (budget ${budget})`,
    `Files changed: ${files.length}, +${added} -${removed}`,
  ]
  const footer = OMITTED_MARKER

  const lines = [...head]
  let size = head.join('\n').length + 1 + footer.length
  const overflow = files.length > 0 ? `... and ${files.length} more files`.length + 1 : 0
  if (size + overflow > limit) {
    return `${SUMMARY_HEADER}\n${footer}`
  }
  let shown = 0
  for (const file of files) {
    const line = formatChange(file)
    const remaining = files.length - shown - 1
    // Leave room for the "... and N more files" line if this is not the last file
    const reserve = remaining > 0 ? `... and ${remaining} more files`.length + 1 : 0
    if (size + line.length + 1 + reserve > limit) break
    lines.push(line)
    size += line.length + 1
    shown++
  }
  if (shown < files.length) {
    lines.push(`... and ${files.length - shown} more files`)
  }
  lines.push(footer)
  return lines.join('\n')
}

export interface ExtractOptions {
  diffBudget: number
  style: MessageStyle
}

/**
 * Room left for a summary once the prompt's fixed text and the original
 * message are counted, so the summarized prompt stays under the budget.
 */
export const summaryLimit = (budget: number, originalMessage: string, style: MessageStyle): number => {
  const overhead = buildPrompt({
    diff: '',
    originalMessage,
    rationale: null,
    style,
    diffSummarized: true,
  }).length
  return Math.max(0, Math.min(Math.floor(budget / 2), budget - overhead - 1))
}

/** Read one commit and its diff against the first parent (or the empty tree). */
export const extractChange = async (
  backend: HistoryBackend,
  hash: string,
  position: number,
  { diffBudget, style }: ExtractOptions
): Promise<CommitRecord> => {
  const commit = await backend.readCommit(hash)
  const base = commit.parents[0] ?? null
  const diff = await backend.diff(hash, base)
  const originalMessage = commit.message.trim()

  if (diff.length <= diffBudget) {
    return { ...commit, position, originalMessage, diff, diffSummarized: false }
  }

  const files = await backend.numstat(hash, base)
  return {
    ...commit,
    position,
    originalMessage,
    diff: summarizeDiff(files, diff.length, diffBudget, summaryLimit(diffBudget, originalMessage, style)),
    diffSummarized: true,
  }
}
