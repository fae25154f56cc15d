/**
 * Interactive input utilities
 */

import { spawnSync } from 'node:child_process'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import { colors } from '../utils/colors.js'
import { log } from '../utils/logging.js'

/**
 * Ask a question and return user input
 */
export const askQuestion = (question: string, defaultValue?: string): string => {
  if (process.stdin.isTTY && process.stdin.isRaw) {
    process.stdin.setRawMode(false)
  }

  // Ensure cursor is visible (may have been hidden by a spinner)
  process.stdout.write('\u001B[?25h')

  const fullQuestion = defaultValue ? `${question} (${defaultValue}) ` : question
  process.stdout.write(`\n${fullQuestion}`)

  const result =
    os.platform() === 'win32'
      ? spawnSync('powershell', ['-Command', '$input = Read-Host; Write-Output $input'], {
          stdio: ['inherit', 'pipe', 'inherit'],
          encoding: 'utf8',
        })
      : spawnSync('bash', ['-c', 'read -r line && echo "$line"'], {
          stdio: ['inherit', 'pipe', 'inherit'],
          encoding: 'utf8',
        })

  const input = result.stdout?.trim() ?? ''
  return input || defaultValue || ''
}

/**
 * Syntax highlighting for git diff output
 */
export const highlightDiff = (diff: string): string => {
  return diff
    .replaceAll(/^((\+{3}|-{3}).*)$/gm, `${colors.cyan}$1${colors.reset}`)
    .replaceAll(/^(@@.*@@.*)$/gm, `${colors.yellow}$1${colors.reset}`)
    .replaceAll(/^(\+(?!\+\+).*)$/gm, `${colors.green}$1${colors.reset}`)
    .replaceAll(/^(-(?!--).*)$/gm, `${colors.red}$1${colors.reset}`)
}

/**
 * Ask a yes/no confirmation question
 */
export const confirm = (question: string, defaultYes: boolean = true): boolean => {
  const suffix = defaultYes ? ' (Y/n): ' : ' (y/N): '
  const answer = askQuestion(`${question}${suffix}`)
  if (answer === '') {
    return defaultYes
  }
  return answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes'
}

/**
 * Open the message in $VISUAL / $EDITOR (nano / notepad when unset).
 * Returns the trimmed result; '' when the file was emptied or the editor failed.
 */
export const editInline = (initialText: string, label = 'Edit message'): string => {
  if (process.stdin.isTTY && process.stdin.isRaw) {
    process.stdin.setRawMode(false)
  }
  process.stdout.write('\u001B[?25h')

  console.log(`\n  ${colors.cyan}${label}${colors.reset}`)

  const tmpPath = path.join(os.tmpdir(), `remessage-${process.pid}-${Date.now()}.txt`)
  fs.writeFileSync(tmpPath, initialText, { encoding: 'utf8' })

  const fallback = process.platform === 'win32' ? 'notepad' : 'nano'
  const editor = process.env.VISUAL ?? process.env.EDITOR ?? fallback
  try {
    // $EDITOR may carry arguments ("code --wait")
    const result = spawnSync(`${editor} "${tmpPath}"`, { stdio: 'inherit', shell: true })
    if (result.error || result.status !== 0) {
      log.warn(`Editor "${editor}" exited abnormally; message left empty`)
      return ''
    }
    return fs.readFileSync(tmpPath, { encoding: 'utf8' }).trim()
  } finally {
    fs.rmSync(tmpPath, { force: true })
  }
}
