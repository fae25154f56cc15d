/**
 * Terminal implementation of the approval prompts
 */

import type { CommitRecord } from '../types/index.js'

import { askQuestion, confirm, editInline, highlightDiff } from './input.js'
import { select } from './menu.js'
import type { ApprovalPrompter } from '../core/approval.js'
import { REVIEW_CHOICES, type ReviewChoice } from '../core/constants.js'
import { colors } from '../utils/colors.js'

const MAX_DIFF_LINES = 20

const printDiff = (diff: string) => {
  const lines = diff.split('\n')
  const shown = lines.slice(0, MAX_DIFF_LINES).join('\n')
  console.log(highlightDiff(shown))
  if (lines.length > MAX_DIFF_LINES) {
    console.log(`${colors.gray}... ${lines.length - MAX_DIFF_LINES} more lines ...${colors.reset}`)
  }
}

const printMessage = (label: string, color: string, message: string) => {
  const [title = '', ...body] = message.split('\n')
  console.log(`  ${colors.gray}${label}${colors.reset} ${color}${title}${colors.reset}`)
  for (const line of body) {
    console.log(`  ${' '.repeat(label.length)} ${color}${line}${colors.reset}`)
  }
}

export const createTerminalPrompter = (options: { showDiff: boolean }): ApprovalPrompter => ({
  review: async (record: CommitRecord, proposed: string): Promise<ReviewChoice> => {
    const line = '─'.repeat(56)
    console.log('')
    console.log(`  ${colors.cyan}┌${line}┐${colors.reset}`)
    console.log(
      `  ${colors.cyan}│${colors.reset} ${colors.yellow}${record.hash.slice(0, 7)}${colors.reset}  ${colors.gray}${record.author.name} <${record.author.email}>${colors.reset}`
    )
    console.log(`  ${colors.cyan}└${line}┘${colors.reset}`)

    if (options.showDiff) {
      if (record.diffSummarized) {
        console.log(`${colors.gray}${record.diff}${colors.reset}`)
      } else {
        printDiff(record.diff)
      }
      console.log('')
    }

    printMessage('Original:', colors.red, record.originalMessage || '(empty)')
    printMessage('Proposed:', colors.green, proposed)
    console.log('')

    return select<ReviewChoice>(
      'Use the proposed message?',
      [
        { label: 'Accept', value: REVIEW_CHOICES.ACCEPT, key: 'y' },
        { label: 'Edit', value: REVIEW_CHOICES.EDIT, key: 'e' },
        { label: 'Skip (keep original)', value: REVIEW_CHOICES.SKIP, key: 's' },
        { label: 'Explain why, then regenerate', value: REVIEW_CHOICES.WHY, key: 'w' },
      ],
      REVIEW_CHOICES.SKIP
    )
  },

  edit: async (proposed: string) => editInline(proposed, 'Edit commit message (empty = skip)'),

  askRationale: async (label: string) =>
    askQuestion(`Why did you make this change (${label})? `),

  confirm: async (question: string, defaultYes = true) => confirm(question, defaultYes),
})
