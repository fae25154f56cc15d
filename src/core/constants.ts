/**
 * Shared constants
 */

import type { MessageStyle, ProviderName } from '../types/index.js'

export const MESSAGE_STYLES: readonly MessageStyle[] = [
  'concise',
  'descriptive',
  'detailed',
  'conventional',
] as const

export const PROVIDER_NAMES: readonly ProviderName[] = ['gemini', 'openrouter'] as const

/** Smallest diff budget that still leaves room for the prompt around a summary. */
export const MIN_DIFF_BUDGET = 1000

export const BACKUP_REF_PREFIX = 'refs/remessage/backup'

export const CONFIG_DIR = '.remessage'
export const CONFIG_FILE = 'config.toml'

/** Branches whose history is usually shared. */
export const PROTECTED_BRANCHES = ['main', 'master', 'develop', 'production', 'staging']

/** Review answers accepted by the interactive approval prompt. */
export const REVIEW_CHOICES = {
  ACCEPT: 'accept',
  EDIT: 'edit',
  SKIP: 'skip',
  WHY: 'why',
} as const

export type ReviewChoice = (typeof REVIEW_CHOICES)[keyof typeof REVIEW_CHOICES]
