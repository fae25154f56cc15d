// ── Git ────────────────────────────────────────────────────────────

export interface Identity {
  name: string
  email: string
  /** Raw git date (`<unix-seconds> <tz-offset>`), carried over verbatim. */
  date: string
}

export interface CommitObject {
  hash: string
  tree: string
  parents: string[]
  author: Identity
  committer: Identity
  /** Message exactly as stored in the commit object. */
  message: string
  /** The commit's `encoding` header; null means UTF-8. */
  encoding: string | null
}

export interface FileChange {
  path: string
  /** null for binary files */
  added: number | null
  removed: number | null
}

export interface WorkingTreeStatus {
  modified: string[]
  untracked: string[]
}

export interface NewCommit {
  tree: string
  parents: string[]
  author: Identity
  committer: Identity
  message: string
  encoding: string | null
}

/** Git primitives the pipeline orchestrates. */
export interface HistoryBackend {
  isRepository(): Promise<boolean>
  currentBranch(): Promise<string | null>
  localBranches(): Promise<string[]>
  resolve(rev: string): Promise<string | null>
  /** First-parent ancestry of `tip`, oldest first. */
  firstParentChain(tip: string): Promise<string[]>
  readCommit(hash: string): Promise<CommitObject>
  /** Unified diff of `hash` against `base` (null = empty tree). */
  diff(hash: string, base: string | null): Promise<string>
  numstat(hash: string, base: string | null): Promise<FileChange[]>
  mergeBase(a: string, b: string): Promise<string | null>
  hasUpstream(branch: string): Promise<boolean>
  workingTreeStatus(): Promise<WorkingTreeStatus>
  createCommit(commit: NewCommit): Promise<string>
  /** Move `ref` to `hash`; when `expected` is given the update only happens if `ref` still points there. */
  updateRef(ref: string, hash: string, expected?: string): Promise<void>
  deleteRef(ref: string): Promise<void>
}

// ── Pipeline ───────────────────────────────────────────────────────

export type MessageStyle = 'concise' | 'descriptive' | 'detailed' | 'conventional'

export type ProviderName = 'gemini' | 'openrouter'

export interface CommitRecord extends CommitObject {
  position: number
  /** Trimmed message used for display and prompting. */
  originalMessage: string
  diff: string
  diffSummarized: boolean
}

export interface PlanEntry {
  commit: CommitObject
  /** null leaves the stored message untouched */
  newMessage: string | null
}

export interface RewritePlan {
  branch: string
  ref: string
  /** Branch tip the plan was built against. */
  baseTip: string
  entries: PlanEntry[]
}

export type TargetSpec =
  | { kind: 'last'; count: number }
  | { kind: 'first'; count: number }
  | { kind: 'all' }
  | { kind: 'branch' }
  | { kind: 'commit'; revs: string[] }
  | { kind: 'all-branches' }

export interface SelectedBranch {
  branch: string
  tip: string
  /** Oldest first. */
  hashes: string[]
}

// ── Inference ──────────────────────────────────────────────────────

export type FailureKind =
  | 'timeout'
  | 'rate_limited'
  | 'auth_invalid'
  | 'malformed_response'
  | 'network_error'

export interface ProviderFailure {
  kind: FailureKind
  message: string
  attempts: number
}

export type ProviderResult =
  | { ok: true; text: string; attempts: number }
  | { ok: false; failure: ProviderFailure }

export interface ProviderRequest {
  model: string
  prompt: string
  maxTokens: number
  signal?: AbortSignal
}

export interface ModelProvider {
  name: ProviderName
  defaultModel: string
  /** Raw model text; throws on any failure. */
  generate(request: ProviderRequest): Promise<string>
}

export type Generation =
  | { status: 'generated'; text: string; rationale: string | null }
  | { status: 'failed'; failure: ProviderFailure }
  | { status: 'meaningful'; score: number }

export type DecisionReason =
  | 'accepted'
  | 'edited'
  | 'skipped'
  | 'failed'
  | 'meaningful'
  | 'unchanged'

export interface CommitDecision {
  hash: string
  /** Set only for accepted or edited messages. */
  message: string | null
  reason: DecisionReason
}

// ── Settings / run state ───────────────────────────────────────────

export interface Settings {
  provider: ProviderName
  /** null = provider default */
  model: string | null
  style: MessageStyle
  autoApply: boolean
  includeMerges: boolean
  diffBudget: number
  maxTokens: number
  retries: number
  timeoutMs: number
  retryBaseDelayMs: number
  concurrency: number
  stripQuotes: boolean
  skipMeaningful: boolean
  qualityThreshold: number
  keepBackup: boolean
  showDiff: boolean
  warnOnSharedBranch: boolean
  defaultCommitCount: number
  askWhy: boolean
  useColor: boolean
  geminiApiKey: string
  openrouterApiKey: string
}

export interface CommitFailure {
  hash: string
  failure: ProviderFailure
}

export interface RunContext {
  settings: Settings
  model: string
  /** Reason reused for every remaining commit once set. */
  rationale: string | null
  rationaleSource: 'flag' | 'prompt' | null
  signal: AbortSignal
  failures: CommitFailure[]
}
