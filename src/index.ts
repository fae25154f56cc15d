#!/usr/bin/env node
/**
 * remessage - rewrite commit messages from their diffs
 * Main entry point - parses flags and hands off to the rewrite workflow
 */
import { readFileSync } from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { HELP_TEXT, parseArgs } from './cli/args.js'
import { handleRewrite } from './workflows/rewrite.js'

const filename = fileURLToPath(import.meta.url)
const dir = path.dirname(filename)

const packageJson = JSON.parse(readFileSync(path.join(dir, '../package.json'), 'utf8')) as {
  version: string
}
const version = packageJson.version

const parsed = parseArgs(process.argv.slice(2))

if (!parsed.ok) {
  console.error(parsed.error)
  console.error('Use --help to see available options')
  process.exit(1)
}

const { options } = parsed

if (options.showVersion) {
  console.log(`remessage v${version}`)
  process.exit(0)
}

if (options.showHelp) {
  console.log(HELP_TEXT)
  process.exit(0)
}

handleRewrite(options)
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error)
    process.exitCode = 1
  })
