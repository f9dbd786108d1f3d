/**
 * wt - Git Gateway
 *
 * The only place that talks to the git executable. Every repository query
 * and mutation the lifecycle engine needs goes through GitGateway, which
 * keeps the engine testable against an in-memory repository model.
 */

import { spawn } from 'child_process';
import { isAbsolute, resolve, basename, dirname } from 'path';
import { createWtError } from '../errors.js';
import { type Logger, createNoopLogger, formatDuration, truncateOutput } from '../logger.js';
import type { WorktreeEntry } from '../types.js';

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * Captured outcome of one git invocation. Output is trimmed.
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs `git <args>` in a directory. Never rejects for a non-zero exit.
 */
export type CommandRunner = (args: string[], cwd: string) => Promise<CommandResult>;

export interface AddWorktreeOptions {
  path: string;
  branch: string;
  /** Start point for a new branch */
  source: string;
  /** Create the branch with -b (it does not exist yet) */
  createBranch: boolean;
}

export interface AheadBehind {
  ahead: number;
  behind: number;
}

/**
 * Repository operations used by the lifecycle engine. `cwd` is the
 * repository root or a worktree path, depending on what the command reads.
 */
export interface GitGateway {
  /** `git --version`, or null when git is not installed */
  version(): Promise<string | null>;
  /** Absolute shared metadata directory (git-common-dir) */
  commonDir(cwd: string): Promise<string>;
  /** Absolute root of the main working tree */
  repoRoot(cwd: string): Promise<string>;
  listWorktrees(cwd: string): Promise<WorktreeEntry[]>;
  worktreePathForBranch(cwd: string, branch: string): Promise<string | null>;
  branchExists(cwd: string, branch: string): Promise<boolean>;
  refExists(cwd: string, ref: string): Promise<boolean>;
  /** origin/main, else origin/master, else null */
  defaultBranch(cwd: string): Promise<string | null>;
  /** Branch checked out in `cwd`, or null when detached */
  currentBranch(cwd: string): Promise<string | null>;
  isDirty(cwd: string): Promise<boolean>;
  upstreamOf(cwd: string, branch?: string): Promise<string | null>;
  aheadBehind(cwd: string, upstream: string): Promise<AheadBehind>;
  countBehind(cwd: string, base: string): Promise<number>;
  /** Commits on `branch` that are not on its upstream; 0 without upstream */
  countUnpushed(cwd: string, branch: string): Promise<number>;
  isAncestor(cwd: string, ancestor: string, descendant: string): Promise<boolean>;
  shortSha(cwd: string, ref?: string): Promise<string>;
  fetch(cwd: string): Promise<void>;
  mergedBranches(cwd: string, base: string): Promise<string[]>;
  addWorktree(cwd: string, options: AddWorktreeOptions): Promise<void>;
  removeWorktree(cwd: string, path: string, force: boolean): Promise<void>;
  deleteBranch(cwd: string, branch: string, force: boolean): Promise<void>;
  pruneWorktrees(cwd: string): Promise<void>;
  setUpstream(cwd: string, branch: string, upstream: string): Promise<void>;
  rebase(cwd: string, base: string): Promise<void>;
  merge(cwd: string, base: string): Promise<void>;
  mergeFastForward(cwd: string, base: string): Promise<void>;
  /** Stash tracked and untracked changes; false when there was nothing to stash */
  stashPush(cwd: string, message: string): Promise<boolean>;
  stashPop(cwd: string): Promise<void>;
}

export interface GitGatewayOptions {
  runner?: CommandRunner;
  logger?: Logger;
}

// =============================================================================
// Command Execution
// =============================================================================

/**
 * Default runner: spawns git and captures both streams.
 */
export function createSpawnRunner(logger: Logger = createNoopLogger()): CommandRunner {
  return (args, cwd) =>
    new Promise<CommandResult>((resolvePromise) => {
      const startTime = Date.now();
      const commandStr = `git ${args.join(' ')}`;

      logger.git.debug('cmd_start', { args: args.join(' '), cwd }, `Executing: ${commandStr}`);

      const proc = spawn('git', args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      proc.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      proc.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      let settled = false;
      const finish = (result: CommandResult): void => {
        if (settled) return;
        settled = true;

        const duration = formatDuration(Date.now() - startTime);
        if (result.exitCode === 0) {
          logger.git.debug('cmd_complete', { exitCode: 0, duration }, `Completed: ${commandStr} (${duration})`);
        } else {
          logger.git.debug(
            'cmd_failed',
            { exitCode: result.exitCode, duration, stderr: truncateOutput(result.stderr, 500) },
            `Failed: ${commandStr} - ${truncateOutput(result.stderr, 200)}`
          );
        }
        resolvePromise(result);
      };

      proc.on('error', (error) => {
        finish({ exitCode: -1, stdout: '', stderr: error.message });
      });

      proc.on('close', (code) => {
        finish({
          exitCode: code ?? -1,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8').trim(),
          stderr: Buffer.concat(stderrChunks).toString('utf-8').trim(),
        });
      });
    });
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse `git worktree list --porcelain` output.
 */
export function parseWorktreeListOutput(output: string): WorktreeEntry[] {
  const results: WorktreeEntry[] = [];
  let current: WorktreeEntry | null = null;

  for (const line of output.split('\n')) {
    if (line.startsWith('worktree ')) {
      if (current) {
        results.push(current);
      }
      current = {
        path: line.substring(9),
        branch: null,
        head: '',
        isBare: false,
        locked: null,
        prunable: false,
      };
    } else if (!current) {
      continue;
    } else if (line.startsWith('HEAD ')) {
      current.head = line.substring(5);
    } else if (line.startsWith('branch ')) {
      current.branch = line.substring(7).replace(/^refs\/heads\//, '');
    } else if (line === 'bare') {
      current.isBare = true;
    } else if (line === 'locked' || line.startsWith('locked ')) {
      current.locked = line.substring(7);
    } else if (line === 'prunable' || line.startsWith('prunable ')) {
      current.prunable = true;
    } else if (line === '') {
      results.push(current);
      current = null;
    }
  }

  // Final entry without a trailing blank line
  if (current) {
    results.push(current);
  }

  return results;
}

function parseCount(output: string, command: string): number {
  const value = Number.parseInt(output.trim(), 10);
  if (Number.isNaN(value)) {
    throw createWtError('VCS_COMMAND_FAILED', {
      message: `Unexpected output from git ${command}: ${truncateOutput(output, 80)}`,
    });
  }
  return value;
}

// =============================================================================
// Gateway Implementation
// =============================================================================

/**
 * Create a gateway over a command runner (the spawning runner by default).
 */
export function createGitGateway(options: GitGatewayOptions = {}): GitGateway {
  const logger = options.logger ?? createNoopLogger();
  const run = options.runner ?? createSpawnRunner(logger);

  /** Run a command that must succeed; returns its stdout. */
  const mustRun = async (args: string[], cwd: string): Promise<string> => {
    const result = await run(args, cwd);
    if (result.exitCode !== 0) {
      throw createWtError('VCS_COMMAND_FAILED', {
        message: `git ${args.join(' ')} failed (exit ${result.exitCode})`,
        details: result.stderr || result.stdout,
        context: { cwd },
      });
    }
    return result.stdout;
  };

  const refExists = async (cwd: string, ref: string): Promise<boolean> => {
    const result = await run(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`], cwd);
    return result.exitCode === 0;
  };

  const upstreamOf = async (cwd: string, branch?: string): Promise<string | null> => {
    const result = await run(['rev-parse', '--abbrev-ref', `${branch ?? ''}@{u}`], cwd);
    return result.exitCode === 0 && result.stdout ? result.stdout : null;
  };

  const commonDir = async (cwd: string): Promise<string> => {
    const result = await run(['rev-parse', '--git-common-dir'], cwd);
    if (result.exitCode !== 0 || !result.stdout) {
      throw createWtError('NOT_A_REPO', {
        message: `Not a git repository: ${cwd}`,
        path: cwd,
        details: result.stderr,
      });
    }
    return isAbsolute(result.stdout) ? result.stdout : resolve(cwd, result.stdout);
  };

  const listWorktrees = async (cwd: string): Promise<WorktreeEntry[]> =>
    parseWorktreeListOutput(await mustRun(['worktree', 'list', '--porcelain'], cwd));

  /** Run an update command; a failure leaves git's conflict state in place. */
  const runUpdate = async (args: string[], cwd: string, base: string): Promise<void> => {
    const result = await run(args, cwd);
    if (result.exitCode !== 0) {
      throw createWtError('UPDATE_CONFLICT', {
        message: `git ${args[0]} onto ${base} stopped in ${cwd}`,
        path: cwd,
        details: result.stderr || result.stdout,
      });
    }
  };

  return {
    async version() {
      const result = await run(['--version'], process.cwd());
      return result.exitCode === 0 ? result.stdout : null;
    },

    commonDir,

    async repoRoot(cwd) {
      const common = await commonDir(cwd);
      // A non-bare repository keeps its metadata in <root>/.git
      if (basename(common) === '.git') {
        return dirname(common);
      }
      return resolve(await mustRun(['rev-parse', '--show-toplevel'], cwd));
    },

    listWorktrees,

    async worktreePathForBranch(cwd, branch) {
      const entries = await listWorktrees(cwd);
      return entries.find((entry) => entry.branch === branch)?.path ?? null;
    },

    async branchExists(cwd, branch) {
      const result = await run(['show-ref', '--verify', '--quiet', `refs/heads/${branch}`], cwd);
      return result.exitCode === 0;
    },

    refExists,

    async defaultBranch(cwd) {
      for (const candidate of ['origin/main', 'origin/master']) {
        if (await refExists(cwd, candidate)) {
          return candidate;
        }
      }
      return null;
    },

    async currentBranch(cwd) {
      const result = await run(['rev-parse', '--abbrev-ref', 'HEAD'], cwd);
      if (result.exitCode !== 0 || result.stdout === 'HEAD') {
        return null;
      }
      return result.stdout;
    },

    async isDirty(cwd) {
      return (await mustRun(['status', '--porcelain'], cwd)).length > 0;
    },

    upstreamOf,

    async aheadBehind(cwd, upstream) {
      // Left side counts upstream-only commits, right side HEAD-only commits
      const output = await mustRun(['rev-list', '--left-right', '--count', `${upstream}...HEAD`], cwd);
      const [behind, ahead] = output.split(/\s+/);
      return {
        ahead: parseCount(ahead ?? '', 'rev-list --left-right'),
        behind: parseCount(behind ?? '', 'rev-list --left-right'),
      };
    },

    async countBehind(cwd, base) {
      return parseCount(await mustRun(['rev-list', '--count', `HEAD..${base}`], cwd), 'rev-list --count');
    },

    async countUnpushed(cwd, branch) {
      const upstream = await upstreamOf(cwd, branch);
      if (!upstream) {
        return 0;
      }
      return parseCount(await mustRun(['rev-list', '--count', `${upstream}..${branch}`], cwd), 'rev-list --count');
    },

    async isAncestor(cwd, ancestor, descendant) {
      const result = await run(['merge-base', '--is-ancestor', ancestor, descendant], cwd);
      if (result.exitCode === 0) return true;
      if (result.exitCode === 1) return false;
      throw createWtError('VCS_COMMAND_FAILED', {
        message: `git merge-base --is-ancestor ${ancestor} ${descendant} failed`,
        details: result.stderr,
      });
    },

    async shortSha(cwd, ref = 'HEAD') {
      return mustRun(['rev-parse', '--short', ref], cwd);
    },

    async fetch(cwd) {
      logger.git.info('fetch', { cwd }, 'Fetching origin');
      await mustRun(['fetch', 'origin', '--prune'], cwd);
    },

    async mergedBranches(cwd, base) {
      const output = await mustRun(['branch', '--format=%(refname:short)', `--merged=${base}`], cwd);
      return output
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    },

    async addWorktree(cwd, { path, branch, source, createBranch }) {
      const args = createBranch
        ? ['worktree', 'add', '-b', branch, path, source]
        : ['worktree', 'add', path, branch];

      const result = await run(args, cwd);
      if (result.exitCode === 0) {
        logger.git.info('worktree_added', { branch, path }, `Added worktree ${path}`);
        return;
      }

      if (/already checked out|already used by worktree/.test(result.stderr)) {
        const existing = result.stderr.match(/(?:checked out|used by worktree) at '([^']+)'/)?.[1];
        throw createWtError('BRANCH_CHECKED_OUT', {
          message: existing
            ? `Branch '${branch}' is already checked out at ${existing}`
            : `Branch '${branch}' is already checked out in another worktree`,
          branch,
          path: existing,
          details: result.stderr,
        });
      }

      throw createWtError('VCS_COMMAND_FAILED', {
        message: `git worktree add failed for '${branch}'`,
        branch,
        path,
        details: result.stderr,
      });
    },

    async removeWorktree(cwd, path, force) {
      await mustRun(force ? ['worktree', 'remove', '--force', path] : ['worktree', 'remove', path], cwd);
      logger.git.info('worktree_removed', { path, force }, `Removed worktree ${path}`);
    },

    async deleteBranch(cwd, branch, force) {
      await mustRun(['branch', force ? '-D' : '-d', branch], cwd);
      logger.git.info('branch_deleted', { branch, force }, `Deleted branch ${branch}`);
    },

    async pruneWorktrees(cwd) {
      await mustRun(['worktree', 'prune'], cwd);
    },

    async setUpstream(cwd, branch, upstream) {
      await mustRun(['branch', '-u', upstream, branch], cwd);
    },

    async rebase(cwd, base) {
      await runUpdate(['rebase', base], cwd, base);
    },

    async merge(cwd, base) {
      await runUpdate(['merge', '--no-edit', base], cwd, base);
    },

    async mergeFastForward(cwd, base) {
      const result = await run(['merge', '--ff-only', base], cwd);
      if (result.exitCode !== 0) {
        throw createWtError('DIVERGED', {
          message: `Cannot fast-forward ${cwd} to ${base}`,
          path: cwd,
          details: result.stderr,
        });
      }
    },

    async stashPush(cwd, message) {
      const output = await mustRun(['stash', 'push', '-u', '-m', message], cwd);
      return !output.includes('No local changes to save');
    },

    async stashPop(cwd) {
      const result = await run(['stash', 'pop'], cwd);
      if (result.exitCode !== 0) {
        throw createWtError('STASH_RESTORE_CONFLICT', {
          message: `Stashed changes could not be restored in ${cwd}`,
          path: cwd,
          details: result.stderr || result.stdout,
        });
      }
    },
  };
}
