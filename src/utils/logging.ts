/**
 * Logging utilities with colored output
 */

import { colors } from './colors.js'

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

class Spinner {
  private interval: NodeJS.Timeout | null = null
  private currentFrame = 0
  private message = ''
  private startTime = 0

  start(message: string): void {
    this.message = message
    this.currentFrame = 0
    this.startTime = Date.now()
    // Piped output gets the message once, no animation
    if (!process.stdout.isTTY) {
      console.log(message)
      return
    }
    process.stdout.write('\u001B[?25l') // Hide cursor
    this.interval = setInterval(() => {
      const frame = SPINNER_FRAMES[this.currentFrame]
      const elapsed = Math.floor((Date.now() - this.startTime) / 1000)
      const timeDisplay = elapsed > 0 ? ` ${colors.gray}(${elapsed}s)${colors.reset}` : ''
      process.stdout.write(`\r${colors.cyan}${frame}${colors.reset} ${this.message}${timeDisplay}`)
      this.currentFrame = (this.currentFrame + 1) % SPINNER_FRAMES.length
    }, 80)
  }

  update(message: string): void {
    this.message = message
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
      process.stdout.write('\r\u001B[K') // Clear line
      process.stdout.write('\u001B[?25h') // Show cursor
    }
  }
}

export type { Spinner }

export const log = {
  info: (msg: string) => {
    console.log(`${colors.blue}ℹ${colors.reset} ${msg}`)
  },
  success: (msg: string) => {
    console.log(`${colors.green}✓${colors.reset} ${msg}`)
  },
  warn: (msg: string) => {
    console.log(`${colors.yellow}⚠${colors.reset} ${msg}`)
  },
  error: (msg: string) => {
    console.log(`${colors.red}✗${colors.reset} ${msg}`)
  },
  step: (msg: string) => {
    console.log(`\n${colors.cyan}${colors.bright}▶ ${msg}${colors.reset}`)
  },
  ai: (msg: string) => {
    console.log(`${colors.cyan}[AI]${colors.reset} ${msg}`)
  },
  debug: (msg: string) => {
    if (process.env.REMESSAGE_DEBUG) {
      console.log(`${colors.gray}· ${msg}${colors.reset}`)
    }
  },
  spinner: () => new Spinner(),
  banner: () => {
    console.log(
      `${colors.cyan}${colors.bright}remessage${colors.reset} ${colors.gray}· rewrite commit messages from their diffs${colors.reset}`
    )
  },
} as const
