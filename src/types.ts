/**
 * wt - Shared Type Definitions
 *
 * Interfaces shared between the lifecycle orchestrator, the git gateway,
 * the hook runner and the CLI. Types are contracts between all modules.
 */

import type { WtError } from './errors.js';

// =============================================================================
// Worktree Types
// =============================================================================

/**
 * One entry of the git worktree registry, as reported by
 * `git worktree list --porcelain`.
 */
export interface WorktreeEntry {
  /** Absolute path to the worktree directory */
  path: string;
  /** Short branch name, or null for a detached HEAD */
  branch: string | null;
  /** Full commit SHA checked out in the worktree */
  head: string;
  /** Whether this is the bare repository entry */
  isBare: boolean;
  /** Lock reason when the worktree is locked ('' for a lock without reason) */
  locked: string | null;
  /** Whether git marked the entry prunable (directory gone) */
  prunable: boolean;
}

/**
 * Live status projection of one worktree. Recomputed on every query.
 */
export interface WorktreeStatus {
  path: string;
  branch: string | null;
  shaShort: string;
  isDirty: boolean;
  /** Remote-tracking branch, or null when the branch has no upstream */
  upstream: string | null;
  /** Commits on the branch not on its upstream (0 without upstream) */
  ahead: number;
  /** Commits on the upstream not on the branch (0 without upstream) */
  behind: number;
  /** Commits on the base branch not on the branch */
  behindBase: number;
  locked: string | null;
  isCurrent: boolean;
  /** Set when probing this worktree failed; the counters are then zero */
  error?: WtError;
}

// =============================================================================
// Template Types
// =============================================================================

/**
 * Immutable variable table used for path templates and hook environments.
 * Keys are upper-case names such as REPO_ROOT or BRANCH_NAME.
 */
export type TemplateContext = Readonly<Record<string, string>>;

// =============================================================================
// Hook Types
// =============================================================================

/** Where a hook was discovered */
export type HookOrigin = 'local' | 'global';

/**
 * How a hook is started: through its `#!` interpreter line, or directly.
 */
export type HookKind = 'script' | 'binary';

/**
 * A discovered post-create hook. Ephemeral, recomputed for every creation.
 */
export interface HookDescriptor {
  /** Absolute path to the hook file */
  path: string;
  /** File name, used for ordering */
  name: string;
  origin: HookOrigin;
  /** Position within its origin, after sorting */
  rank: number;
  kind: HookKind;
  /** Interpreter command from the `#!` line (script hooks only) */
  interpreter?: string[];
}

export type HookStatus = 'succeeded' | 'failed' | 'timed_out' | 'skipped';

/**
 * Outcome of one hook during a creation event.
 */
export interface HookResult {
  hook: HookDescriptor;
  status: HookStatus;
  /** Exit code, null when the hook timed out, was skipped or never started */
  exitCode: number | null;
  durationMs: number;
  stdout: string;
  stderr: string;
  error?: WtError;
}

// =============================================================================
// Configuration Types
// =============================================================================

export type UpdateStrategy = 'rebase' | 'merge' | 'ff-only';

export const UPDATE_STRATEGIES: readonly UpdateStrategy[] = ['rebase', 'merge', 'ff-only'];

/**
 * Resolved configuration. Validated once and treated as immutable for the
 * duration of an operation.
 */
export interface WtConfig {
  paths: {
    /** Worktree root template; empty means <parent>/<repo>-worktrees */
    worktreeRoot: string;
    worktreePathTemplate: string;
  };
  branches: {
    autoPrefix: string;
  };
  hooks: {
    /** Hook directory, relative to the config directory */
    postCreateDir: string;
    continueOnError: boolean;
    timeoutSeconds: number;
  };
  update: {
    base: string;
    strategy: UpdateStrategy;
    autoStash: boolean;
  };
  prune: {
    protected: string[];
    deleteBranchWithWorktree: boolean;
  };
  lock: {
    /** How long to wait for a held lock; 0 fails immediately */
    waitSeconds: number;
  };
  ui: {
    jsonIndent: number;
  };
}

// =============================================================================
// Repository Types
// =============================================================================

/**
 * Where the repository lives. Discovered once per invocation.
 */
export interface RepoLocation {
  /** Main repository root (not the root of a linked worktree) */
  root: string;
  /** Shared git metadata directory (git rev-parse --git-common-dir) */
  commonDir: string;
  /** Directory the command was started from */
  cwd: string;
}

// =============================================================================
// Utility Types and Functions
// =============================================================================

/**
 * Result type for operations that can fail.
 * Use instead of throwing exceptions for expected failures.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** Create a success result */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Create an error result */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Get current timestamp in ISO 8601 format */
export function now(): string {
  return new Date().toISOString();
}
