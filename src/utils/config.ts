/**
 * Configuration loading.
 *
 * Layers, lowest to highest: defaults → ~/.remessage/config.toml →
 * ./.remessage/config.toml → environment → CLI flags.
 *
 * Files use flat `key = value` lines:
 *   provider = "openrouter"
 *   model = "anthropic/claude-3.5-haiku"
 *   auto_apply = false
 *   diff_budget = 6000
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { MessageStyle, ProviderName, Settings } from '../types/index.js'

import {
  CONFIG_DIR,
  CONFIG_FILE,
  MESSAGE_STYLES,
  MIN_DIFF_BUDGET,
  PROVIDER_NAMES,
} from '../core/constants.js'
import { log } from './logging.js'

export const DEFAULT_SETTINGS: Settings = {
  provider: 'openrouter',
  model: null,
  style: 'descriptive',
  autoApply: false,
  includeMerges: false,
  diffBudget: 8000,
  maxTokens: 400,
  retries: 2,
  timeoutMs: 30_000,
  retryBaseDelayMs: 1000,
  concurrency: 3,
  stripQuotes: true,
  skipMeaningful: false,
  qualityThreshold: 70,
  keepBackup: false,
  showDiff: true,
  warnOnSharedBranch: true,
  defaultCommitCount: 5,
  askWhy: false,
  useColor: true,
  geminiApiKey: '',
  openrouterApiKey: '',
}

/** Environment variable → config key. */
const ENV_KEYS: Record<string, string> = {
  REMESSAGE_PROVIDER: 'provider',
  REMESSAGE_MODEL: 'model',
  REMESSAGE_STYLE: 'style',
  REMESSAGE_AUTO_APPLY: 'auto_apply',
  GEMINI_API_KEY: 'gemini_api_key',
  OPENROUTER_API_KEY: 'openrouter_api_key',
}

/**
 * Read `key = value` pairs. Section headers and comments are ignored;
 * values may be quoted with " or '.
 */
export const parseConfigFile = (content: string): Record<string, string> => {
  const values: Record<string, string> = {}
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim()
    if (!line || line.startsWith('#') || line.startsWith('[')) continue
    const m = line.match(/^([A-Za-z_][\w-]*)\s*=\s*(.*)$/)
    if (!m?.[1]) continue
    let value = (m[2] ?? '').trim()
    const quoted = value.match(/^(["'])(.*)\1/)
    if (quoted) {
      value = quoted[2] ?? ''
    } else {
      value = value.replace(/\s+#.*$/, '')
    }
    values[m[1].toLowerCase().replaceAll('-', '_')] = value
  }
  return values
}

const isProviderName = (v: string): v is ProviderName =>
  PROVIDER_NAMES.some((name) => name === v)

const isMessageStyle = (v: string): v is MessageStyle =>
  MESSAGE_STYLES.some((style) => style === v)

const set = <K extends keyof Settings>(
  layer: Partial<Settings>,
  key: K,
  value: Settings[K] | undefined
): void => {
  if (value !== undefined) layer[key] = value
}

/**
 * Convert raw string values into typed settings.
 * Invalid values are dropped with a warning so the lower layer wins.
 */
export const readLayer = (values: Record<string, string>, source: string): Partial<Settings> => {
  const layer: Partial<Settings> = {}
  const invalid = (key: string, expected: string): undefined => {
    log.warn(`Ignoring ${key} = "${values[key]}" from ${source} (expected ${expected})`)
    return undefined
  }

  const str = (key: string): string | undefined => {
    const v = values[key]
    return v === undefined || v === '' ? undefined : v
  }
  const bool = (key: string): boolean | undefined => {
    const v = str(key)?.toLowerCase()
    if (v === undefined) return undefined
    if (['true', 'yes', '1', 'on'].includes(v)) return true
    if (['false', 'no', '0', 'off'].includes(v)) return false
    return invalid(key, 'true or false')
  }
  const int = (key: string, min: number): number | undefined => {
    const v = str(key)
    if (v === undefined) return undefined
    const n = Number(v.replaceAll('_', ''))
    return Number.isInteger(n) && n >= min ? n : invalid(key, `an integer >= ${min}`)
  }

  const provider = str('provider')
  if (provider !== undefined) {
    set(layer, 'provider', isProviderName(provider) ? provider : invalid('provider', PROVIDER_NAMES.join(' | ')))
  }
  const style = str('style') ?? str('message_style')
  if (style !== undefined) {
    set(layer, 'style', isMessageStyle(style) ? style : invalid('style', MESSAGE_STYLES.join(' | ')))
  }
  set(layer, 'model', str('model') ?? str('engine'))
  set(layer, 'autoApply', bool('auto_apply'))
  set(layer, 'includeMerges', bool('include_merges'))
  set(layer, 'diffBudget', int('diff_budget', MIN_DIFF_BUDGET))
  set(layer, 'maxTokens', int('max_tokens', 16))
  set(layer, 'retries', int('retries', 0))
  set(layer, 'timeoutMs', int('timeout_ms', 1))
  set(layer, 'retryBaseDelayMs', int('retry_base_delay_ms', 0))
  set(layer, 'concurrency', int('concurrency', 1))
  set(layer, 'stripQuotes', bool('strip_quotes') ?? bool('remove_quotes'))
  set(layer, 'skipMeaningful', bool('skip_meaningful'))
  set(layer, 'qualityThreshold', int('quality_threshold', 0))
  set(layer, 'keepBackup', bool('keep_backup'))
  set(layer, 'showDiff', bool('show_diff'))
  set(layer, 'warnOnSharedBranch', bool('warn_on_shared_branches'))
  set(layer, 'defaultCommitCount', int('default_commit_count', 1))
  set(layer, 'askWhy', bool('ask_why') ?? bool('prompt_user_for_why'))
  set(layer, 'useColor', bool('use_color'))
  set(layer, 'geminiApiKey', str('gemini_api_key'))
  set(layer, 'openrouterApiKey', str('openrouter_api_key'))
  return layer
}

const readConfigFile = (file: string): Partial<Settings> => {
  try {
    if (!fs.existsSync(file)) return {}
    return readLayer(parseConfigFile(fs.readFileSync(file, 'utf8')), file)
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error)
    log.warn(`Could not read ${file}: ${msg}`)
    return {}
  }
}

const readEnv = (env: NodeJS.ProcessEnv): Partial<Settings> => {
  const values: Record<string, string> = {}
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const v = env[name]
    if (v !== undefined) values[key] = v
  }
  if (env.NO_COLOR) values.use_color = 'false'
  return readLayer(values, 'environment')
}

export interface LoadSettingsOptions {
  cwd?: string
  homeDir?: string
  env?: NodeJS.ProcessEnv
  flags?: Partial<Settings>
}

/** Path of the project-local config file. */
export const getProjectConfigPath = (cwd: string = process.cwd()): string =>
  path.join(cwd, CONFIG_DIR, CONFIG_FILE)

/** Resolve the settings object for one run. */
export const loadSettings = (options: LoadSettingsOptions = {}): Settings => {
  const cwd = options.cwd ?? process.cwd()
  const home = options.homeDir ?? os.homedir()
  return {
    ...DEFAULT_SETTINGS,
    ...readConfigFile(path.join(home, CONFIG_DIR, CONFIG_FILE)),
    ...readConfigFile(getProjectConfigPath(cwd)),
    ...readEnv(options.env ?? process.env),
    ...options.flags,
  }
}
