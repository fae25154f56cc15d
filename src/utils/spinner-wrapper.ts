/**
 * Spinner wrapper utilities for progress indication
 */

import { log } from './logging.js'

/**
 * Execute async function with spinner
 */
export async function withSpinner<T>(message: string, fn: () => Promise<T>): Promise<T> {
  const spinner = log.spinner()
  spinner.start(message)
  try {
    return await fn()
  } finally {
    spinner.stop()
  }
}
