/** Execute git commands. */

import { spawn } from 'node:child_process'

import { log } from './logging.js'

export interface ExecResult {
  code: number
  stdout: string
  /** stdout as the child wrote it, for output that is not UTF-8. */
  stdoutBytes: Buffer
  stderr: string
}

export interface ExecOptions {
  cwd?: string
  /** Written to the child's stdin, then closed. Without it stdin is not opened. */
  input?: string | Buffer
  env?: NodeJS.ProcessEnv
  /** Exit codes that resolve instead of reject (0 is always accepted). */
  okCodes?: number[]
}

export type ExecError = Error & ExecResult

/**
 * Run a command without a shell and capture its output.
 * Rejects with stdout/stderr attached when the exit code is not accepted.
 */
export const execFileAsync = (
  file: string,
  args: string[],
  options: ExecOptions = {}
): Promise<ExecResult> => {
  const okCodes = new Set([0, ...(options.okCodes ?? [])])

  return new Promise((resolve, reject) => {
    const { input } = options
    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: [input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
    })
    const out: Buffer[] = []
    const err: Buffer[] = []

    child.stdout?.on('data', (d: Buffer) => {
      out.push(d)
    })
    child.stderr?.on('data', (d: Buffer) => {
      err.push(d)
    })
    child.on('error', reject)

    child.on('close', (code) => {
      const exitCode = code ?? 1
      const stdoutBytes = Buffer.concat(out)
      const result = {
        code: exitCode,
        stdout: stdoutBytes.toString('utf8'),
        stdoutBytes,
        stderr: Buffer.concat(err).toString('utf8'),
      }
      if (okCodes.has(exitCode)) {
        resolve(result)
        return
      }
      const errObj: ExecError = Object.assign(
        new Error(`Command failed: ${file} ${args.join(' ')} (code ${exitCode})`),
        result
      )
      reject(errObj)
    })

    if (child.stdin && input !== undefined) {
      // The child may exit without reading its input; the exit code decides.
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code !== 'EPIPE') reject(error)
      })
      child.stdin.end(input)
    }
  })
}

/** Run a git subcommand. */
export const execGit = async (args: string[], options: ExecOptions = {}): Promise<ExecResult> => {
  log.debug(`git ${args.join(' ')}`)
  return execFileAsync('git', args, options)
}

/** Run a git subcommand and return stdout without the trailing newline. */
export const gitOutput = async (args: string[], options: ExecOptions = {}): Promise<string> => {
  const { stdout } = await execGit(args, options)
  return stdout.replace(/\n$/, '')
}
