/**
 * Dry-run mode: the rewrite is previewed and nothing is written.
 */

import { colors } from './colors.js'

let dryRunEnabled = false

/** Enable or disable dry-run mode globally. */
export const setDryRun = (enabled: boolean): void => {
  dryRunEnabled = enabled
}

export const isDryRun = (): boolean => dryRunEnabled

/** Print the dry-run banner at the start of execution. */
export const printDryRunBanner = (): void => {
  console.log('')
  console.log(
    `  ${colors.yellow}${colors.bright}⚡ DRY-RUN MODE${colors.reset}  ${colors.gray}(no history will be rewritten)${colors.reset}`
  )
  console.log('')
}

/** Note the rewrite a dry run leaves out. */
export const logDryRun = (branch: string, changes: number, recreated: number): void => {
  console.log(
    `${colors.yellow}⚡ [DRY-RUN]${colors.reset} ${branch}: ${changes} message(s) would be rewritten, ${recreated} commit(s) re-created`
  )
}
