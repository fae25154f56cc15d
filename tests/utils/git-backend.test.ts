import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { HistoryBackend, RewritePlan } from '../../src/types/index.js'

import { HistoryRewriter } from '../../src/core/rewriter.js'
import { execGit, gitOutput } from '../../src/utils/exec.js'
import { createGitBackend } from '../../src/utils/git.js'
import { silenceConsole } from '../helpers/fixtures.js'

let dir: string
let backend: HistoryBackend

const git = (args: string[], input?: string | Buffer) =>
  execGit(args, {
    cwd: dir,
    input,
    env: {
      ...process.env,
      GIT_AUTHOR_DATE: '1700000000 +0100',
      GIT_COMMITTER_DATE: '1700000100 -0500',
    },
  })

const commitFile = async (
  name: string,
  content: string,
  message: string | Buffer,
  config: string[] = []
): Promise<string> => {
  fs.writeFileSync(path.join(dir, name), content)
  await git(['add', name])
  await git([...config, 'commit', '-q', '-F', '-'], message)
  return gitOutput(['rev-parse', 'HEAD'], { cwd: dir })
}

const rawCommit = async (hash: string): Promise<Buffer> =>
  (await git(['cat-file', 'commit', hash])).stdoutBytes

/** Header lines other than `parent`, and the message bytes. */
const splitCommit = (raw: Buffer) => {
  const at = raw.indexOf('\n\n')
  return {
    headers: raw
      .subarray(0, at)
      .toString('utf8')
      .split('\n')
      .filter((line) => !line.startsWith('parent ')),
    body: raw.subarray(at + 2),
  }
}

const LATIN1_MESSAGE = Buffer.from([0x43, 0x61, 0x66, 0xe9, 0x0a])

describe('createGitBackend', () => {
  let c1: string
  let c2: string
  let c3: string

  beforeEach(async () => {
    silenceConsole()
    vi.stubEnv('GIT_CONFIG_NOSYSTEM', '1')
    vi.stubEnv('GIT_CONFIG_GLOBAL', os.devNull)
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'remessage-git-'))
    await git(['init', '-q'])
    await git(['symbolic-ref', 'HEAD', 'refs/heads/main'])
    await git(['config', 'user.name', 'Test Author'])
    await git(['config', 'user.email', 'author@example.com'])
    await git(['config', 'commit.gpgsign', 'false'])

    c1 = await commitFile('README.md', '# demo\n', 'init\n')
    c2 = await commitFile('b.txt', 'b\n', LATIN1_MESSAGE, ['-c', 'i18n.commitEncoding=ISO-8859-1'])
    c3 = await commitFile('c.txt', 'c\n', 'tmp\n')
    backend = createGitBackend(dir)
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('reads the branch and its first-parent chain', async () => {
    expect(await backend.isRepository()).toBe(true)
    expect(await backend.currentBranch()).toBe('main')
    expect(await backend.localBranches()).toEqual(['main'])
    expect(await backend.resolve('main')).toBe(c3)
    expect(await backend.resolve('no-such-branch')).toBeNull()
    expect(await backend.firstParentChain(c3)).toEqual([c1, c2, c3])
  })

  it('parses identities and a legacy encoding', async () => {
    const commit = await backend.readCommit(c2)

    expect(commit.parents).toEqual([c1])
    expect(commit.author).toEqual({
      name: 'Test Author',
      email: 'author@example.com',
      date: '1700000000 +0100',
    })
    expect(commit.committer.date).toBe('1700000100 -0500')
    expect(commit.encoding).toBe('ISO-8859-1')
    expect(commit.message).toBe('Caf\u00e9\n')
  })

  it('recreates a commit with the same id from its parsed fields', async () => {
    for (const hash of [c1, c2, c3]) {
      const { tree, parents, author, committer, message, encoding } = await backend.readCommit(hash)
      const recreated = await backend.createCommit({ tree, parents, author, committer, message, encoding })
      expect(recreated).toBe(hash)
    }
  })

  it('rewrites one message and keeps every other byte', async () => {
    const before = await Promise.all([c1, c2, c3].map(rawCommit))
    const plan: RewritePlan = {
      branch: 'main',
      ref: 'refs/heads/main',
      baseTip: c3,
      entries: [
        { commit: await backend.readCommit(c1), newMessage: 'docs: add readme' },
        { commit: await backend.readCommit(c2), newMessage: null },
        { commit: await backend.readCommit(c3), newMessage: null },
      ],
    }

    const result = await new HistoryRewriter(backend).apply(plan, { keepBackup: false })

    const chain = await backend.firstParentChain('main')
    expect(chain).toHaveLength(3)
    expect(chain[2]).toBe(result.newTip)
    expect(result.backupRef).toBeNull()
    expect(await backend.resolve('refs/remessage/backup/main')).toBeNull()

    const after = await Promise.all(chain.map(rawCommit))
    for (const [i, raw] of after.entries()) {
      const old = splitCommit(before[i] ?? Buffer.alloc(0))
      const rewritten = splitCommit(raw)
      expect(rewritten.headers).toEqual(old.headers)
      if (i > 0) expect(rewritten.body).toEqual(old.body)
    }
    expect(splitCommit(after[0] ?? Buffer.alloc(0)).body.toString('utf8')).toBe('docs: add readme\n')
    expect(splitCommit(after[1] ?? Buffer.alloc(0)).body).toEqual(LATIN1_MESSAGE)
    expect((await backend.readCommit(chain[1] ?? '')).parents).toEqual([chain[0]])
  })

  it('refuses to move a ref that no longer holds the expected commit', async () => {
    await expect(backend.updateRef('refs/heads/main', c1, c2)).rejects.toThrow(
      'Command failed: git update-ref'
    )
    expect(await backend.resolve('main')).toBe(c3)

    await backend.updateRef('refs/heads/main', c2, c3)
    expect(await backend.resolve('main')).toBe(c2)
  })

  it('reports untracked and modified files', async () => {
    expect(await backend.workingTreeStatus()).toEqual({ modified: [], untracked: [] })

    fs.writeFileSync(path.join(dir, 'notes.txt'), 'scratch\n')
    fs.writeFileSync(path.join(dir, 'README.md'), '# demo\nmore\n')

    expect(await backend.workingTreeStatus()).toEqual({
      modified: ['README.md'],
      untracked: ['notes.txt'],
    })
  })

  it('diffs a root commit against the empty tree', async () => {
    const diff = await backend.diff(c1, null)

    expect(diff).toContain('+++ b/README.md')
    expect(diff).toContain('+# demo')
    expect(await backend.numstat(c1, null)).toEqual([{ path: 'README.md', added: 1, removed: 0 }])
    expect(await backend.numstat(c2, c1)).toEqual([{ path: 'b.txt', added: 1, removed: 0 }])
    expect(await backend.mergeBase('main', c2)).toBe(c2)
  })
})
