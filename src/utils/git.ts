/** HistoryBackend over the git binary. */

import type {
  CommitObject,
  FileChange,
  HistoryBackend,
  Identity,
  NewCommit,
  WorkingTreeStatus,
} from '../types/index.js'

import { execGit, gitOutput } from './exec.js'

const IDENTITY_RE = /^(.*) <([^>]*)> (\d+ [+-]\d{4})$/

const parseIdentity = (raw: string, field: string): Identity => {
  const m = IDENTITY_RE.exec(raw)
  if (!m) {
    throw new Error(`Malformed ${field} line: ${raw}`)
  }
  return { name: m[1] ?? '', email: m[2] ?? '', date: m[3] ?? '' }
}

const isUtf8 = (encoding: string | null): boolean =>
  encoding === null || /^utf-?8$/i.test(encoding)

/**
 * Parse `git cat-file commit` output. Continuation lines (gpgsig, mergetag)
 * start with a space and are skipped. A message in a legacy `encoding` is
 * decoded byte for byte (latin1) so writing it back reproduces the same bytes.
 */
export const parseCommitObject = (hash: string, raw: Buffer | string): CommitObject => {
  const bytes = typeof raw === 'string' ? Buffer.from(raw, 'utf8') : raw
  const split = bytes.indexOf('\n\n')
  const header = (split === -1 ? bytes : bytes.subarray(0, split)).toString('utf8')
  const body = split === -1 ? Buffer.alloc(0) : bytes.subarray(split + 2)

  let tree = ''
  let author: Identity | null = null
  let committer: Identity | null = null
  let encoding: string | null = null
  const parents: string[] = []

  for (const line of header.split('\n')) {
    if (line.startsWith(' ')) continue
    const space = line.indexOf(' ')
    const key = line.slice(0, space)
    const value = line.slice(space + 1)
    switch (key) {
      case 'tree': {
        tree = value
        break
      }
      case 'parent': {
        parents.push(value)
        break
      }
      case 'author': {
        author = parseIdentity(value, 'author')
        break
      }
      case 'committer': {
        committer = parseIdentity(value, 'committer')
        break
      }
      case 'encoding': {
        encoding = value
        break
      }
      default: {
        break
      }
    }
  }

  if (!tree || !author || !committer) {
    throw new Error(`Could not parse commit ${hash}`)
  }
  const message = body.toString(isUtf8(encoding) ? 'utf8' : 'latin1')
  return { hash, tree, parents, author, committer, message, encoding }
}

/** Parse `git diff --numstat` output. */
export const parseNumstat = (raw: string): FileChange[] =>
  raw
    .split('\n')
    .filter(Boolean)
    .map((line) => {
      const [added = '-', removed = '-', ...rest] = line.split('\t')
      return {
        path: rest.join('\t'),
        added: added === '-' ? null : Number(added),
        removed: removed === '-' ? null : Number(removed),
      }
    })

/** Parse `git status --porcelain` output. */
export const parseStatus = (raw: string): WorkingTreeStatus => {
  const modified: string[] = []
  const untracked: string[] = []
  for (const line of raw.split('\n')) {
    if (!line.trim()) continue
    const file = line.slice(3)
    if (line.startsWith('??')) {
      untracked.push(file)
    } else {
      modified.push(file)
    }
  }
  return { modified, untracked }
}

const identityEnv = (prefix: 'AUTHOR' | 'COMMITTER', who: Identity): NodeJS.ProcessEnv => ({
  [`GIT_${prefix}_NAME`]: who.name,
  [`GIT_${prefix}_EMAIL`]: who.email,
  // '@' forces the raw "<seconds> <offset>" form
  [`GIT_${prefix}_DATE`]: `@${who.date}`,
})

export const createGitBackend = (cwd: string = process.cwd()): HistoryBackend => {
  let emptyTree: string | null = null

  const git = (args: string[], okCodes?: number[]) => execGit(args, { cwd, okCodes })
  const out = (args: string[]) => gitOutput(args, { cwd })

  const baseOf = async (base: string | null): Promise<string> => {
    if (base) return base
    // Computed rather than hard-coded so sha256 repositories work too
    emptyTree ??= await gitOutput(['hash-object', '-t', 'tree', '--stdin'], { cwd, input: '' })
    return emptyTree
  }

  return {
    isRepository: async () => {
      try {
        return (await out(['rev-parse', '--is-inside-work-tree'])) === 'true'
      } catch {
        return false
      }
    },

    currentBranch: async () => {
      const res = await git(['symbolic-ref', '--quiet', '--short', 'HEAD'], [1])
      return res.code === 0 ? res.stdout.trim() : null
    },

    localBranches: async () => {
      const raw = await out(['for-each-ref', '--format=%(refname:short)', 'refs/heads'])
      return raw.split('\n').filter(Boolean)
    },

    resolve: async (rev) => {
      const res = await git(['rev-parse', '--verify', '--quiet', `${rev}^{commit}`], [1, 128])
      return res.code === 0 ? res.stdout.trim() : null
    },

    firstParentChain: async (tip) => {
      const raw = await out(['rev-list', '--first-parent', '--reverse', tip])
      return raw.split('\n').filter(Boolean)
    },

    readCommit: async (hash) => {
      const { stdoutBytes } = await git(['cat-file', 'commit', hash])
      return parseCommitObject(hash, stdoutBytes)
    },

    diff: async (hash, base) =>
      out(['diff', '--no-color', '--no-ext-diff', await baseOf(base), hash]),

    numstat: async (hash, base) =>
      parseNumstat(await out(['diff', '--numstat', '--no-color', await baseOf(base), hash])),

    mergeBase: async (a, b) => {
      const res = await git(['merge-base', a, b], [1])
      return res.code === 0 ? res.stdout.trim() : null
    },

    hasUpstream: async (branch) => {
      const res = await git(
        ['rev-parse', '--abbrev-ref', '--symbolic-full-name', `${branch}@{upstream}`],
        [128]
      )
      return res.code === 0 && res.stdout.trim() !== ''
    },

    workingTreeStatus: async () =>
      parseStatus(await out(['status', '--porcelain=v1', '--untracked-files=normal'])),

    createCommit: async (commit: NewCommit) => {
      const legacy = isUtf8(commit.encoding) ? null : commit.encoding
      const args = legacy === null ? [] : ['-c', `i18n.commitEncoding=${legacy}`]
      args.push('commit-tree', commit.tree)
      for (const parent of commit.parents) {
        args.push('-p', parent)
      }
      const hash = await gitOutput(args, {
        cwd,
        input: legacy === null ? commit.message : Buffer.from(commit.message, 'latin1'),
        env: {
          ...process.env,
          ...identityEnv('AUTHOR', commit.author),
          ...identityEnv('COMMITTER', commit.committer),
        },
      })
      return hash.trim()
    },

    updateRef: async (ref, hash, expected) => {
      const args = ['update-ref', '-m', 'remessage: rewrite messages', ref, hash]
      if (expected) args.push(expected)
      await git(args)
    },

    deleteRef: async (ref) => {
      await git(['update-ref', '-d', ref])
    },
  }
}
