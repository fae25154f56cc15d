/**
 * Interactive menu utilities
 */

import { askQuestion } from './input.js'
import { colors } from '../utils/colors.js'

export interface SelectOption<T extends string = string> {
  label: string
  value: T
  /** Single-key shortcut */
  key?: string
}

/**
 * Arrow-key select menu. Shortcut keys pick an option directly.
 * Ctrl+C re-raises SIGINT for the run's handler and resolves with `fallback`.
 */
export const select = async <T extends string>(
  question: string,
  options: Array<SelectOption<T>>,
  fallback: T
): Promise<T> => {
  // Piped stdin: read one line and match a shortcut key
  if (!process.stdin.isTTY) {
    const keys = options.flatMap((o) => (o.key ? [o.key] : [])).join('/')
    const answer = askQuestion(`${question} [${keys}]: `).toLowerCase()
    return options.find((o) => o.key === answer)?.value ?? fallback
  }

  return new Promise((resolve) => {
    let selectedIndex = 0

    const renderItem = (opt: SelectOption<T>, idx: number) => {
      const prefix = idx === selectedIndex ? `${colors.cyan}❯${colors.reset}` : ' '
      const hotkey = opt.key ? `${colors.gray}[${opt.key}]${colors.reset} ` : ''
      const label =
        idx === selectedIndex
          ? `${colors.cyan}${colors.bright}${opt.label}${colors.reset}`
          : `${colors.gray}${opt.label}${colors.reset}`
      return `${prefix} ${hotkey}${label}`
    }

    const render = (redraw: boolean) => {
      if (redraw) {
        for (let i = 0; i < options.length + 1; i++) {
          process.stdout.write('\u001B[1A\u001B[2K')
        }
      }
      for (const [idx, opt] of options.entries()) {
        console.log(renderItem(opt, idx))
      }
      console.log(`${colors.gray}  (↑↓/jk arrows, Enter select, or press a shortcut key)${colors.reset}`)
    }

    console.log(`${colors.cyan}?${colors.reset} ${question}`)
    render(false)

    process.stdin.setRawMode(true)
    process.stdin.resume()

    const finish = (value: T) => {
      process.stdin.removeListener('data', onKeypress)
      process.stdin.setRawMode(false)
      process.stdin.pause()
      resolve(value)
    }

    const onKeypress = (key: Buffer) => {
      const keyStr = key.toString()

      switch (keyStr) {
        case '\u001B[A':
        case 'k': {
          selectedIndex = selectedIndex > 0 ? selectedIndex - 1 : options.length - 1
          render(true)
          return
        }
        case '\u001B[B':
        case 'j': {
          selectedIndex = selectedIndex < options.length - 1 ? selectedIndex + 1 : 0
          render(true)
          return
        }
        case '\r':
        case '\n': {
          finish(options[selectedIndex]?.value ?? fallback)
          return
        }
        case '\u0003': {
          finish(fallback)
          process.kill(process.pid, 'SIGINT')
          return
        }
        default: {
          const hit = options.find((o) => o.key === keyStr.toLowerCase())
          if (hit) finish(hit.value)
        }
      }
    }

    process.stdin.on('data', onKeypress)
  })
}
