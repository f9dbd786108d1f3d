/**
 * wt - Lifecycle Orchestrator
 *
 * Coordinates worktree creation, update, pruning, removal and cleanup.
 * Mutating operations run inside the repository lock and follow the same
 * shape: acquire the lock, refresh from the remote, plan, apply per item,
 * report, release. Per-item failures are recorded on the item and never
 * abort the rest of a batch; gateway and lock failures abort the operation.
 */

import { accessSync, constants, existsSync, mkdirSync, readdirSync, rmdirSync, statSync } from 'fs';
import { dirname, join, resolve, sep } from 'path';
import { loadTomlFile } from './config.js';
import { type WtError, createWtError, isWtError, wrapError } from './errors.js';
import {
  type HookDirectory,
  allHooksSucceeded,
  discoverHooks,
  findNonExecutableHooks,
  getHookDirectories,
  runHooks,
} from './hooks.js';
import { type LockOptions, withRepoLock } from './lock.js';
import { type Logger, createNoopLogger } from './logger.js';
import type { GitGateway } from './managers/git.js';
import { findUnknownTemplateVariables, resolveWorktreePath, resolveWorktreeRoot } from './paths.js';
import {
  type HookResult,
  type RepoLocation,
  type Result,
  type UpdateStrategy,
  type WorktreeEntry,
  type WorktreeStatus,
  type WtConfig,
  err,
  ok,
} from './types.js';

// =============================================================================
// Constants
// =============================================================================

export const AUTOSTASH_MESSAGE = 'wt-autostash';

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * Asked before destructive operations. Returning false aborts with
 * CONFIRMATION_REQUIRED.
 */
export type Confirmer = (message: string, plan: string[]) => boolean | Promise<boolean>;

export interface LifecycleOptions {
  repo: RepoLocation;
  config: WtConfig;
  git: GitGateway;
  logger?: Logger;
  /** Defaults to refusing every destructive operation without --yes */
  confirm?: Confirmer;
  /** Directory holding the global config and global hooks */
  globalConfigDir: string;
  /** Directory holding the local config and local hooks (<repo>/.wt) */
  localConfigDir?: string;
  /** Lock tuning; the wait time comes from lock.wait_seconds */
  lockOptions?: Omit<LockOptions, 'waitMs' | 'logger'>;
  /** Base environment for hooks */
  hookEnv?: NodeJS.ProcessEnv;
  /** Clock for DATE_ISO and TIME_ISO */
  clock?: () => Date;
}

export type OperationName = 'create' | 'pull-main' | 'prune-merged' | 'remove' | 'gc';

export type LifecycleEvent =
  | { type: 'lock_acquired'; operation: OperationName; lockPath: string }
  | { type: 'refreshed'; operation: OperationName }
  | { type: 'planned'; operation: OperationName; targets: string[] }
  | { type: 'worktree_created'; branch: string; path: string }
  | { type: 'hook_finished'; result: HookResult }
  | { type: 'item_finished'; operation: OperationName; branch: string | null; path: string | null; error?: WtError }
  | { type: 'warning'; message: string }
  | { type: 'lock_released'; operation: OperationName };

export type EventHandler = (event: LifecycleEvent) => void;

export interface CreateRequest {
  branch: string;
  /** Source ref; defaults to update.base */
  from?: string;
  /** Track origin/<branch> when it exists */
  track?: boolean;
  /** Reuse the target directory when it exists and is empty */
  force?: boolean;
}

export interface CreateResult {
  /** Git branch name, after auto-prefixing */
  branch: string;
  path: string;
  sourceBranch: string;
  createdBranch: boolean;
  upstream: string | null;
  hooks: HookResult[];
  warnings: string[];
  /** False when any hook failed; the worktree exists either way */
  ok: boolean;
}

export interface StatusOptions {
  fetch?: boolean;
  base?: string;
}

export interface PullMainOptions {
  base?: string;
  strategy?: UpdateStrategy;
  stash?: boolean;
}

export type PullOutcome = 'updated' | 'skipped' | 'failed';

export interface PullItem {
  branch: string | null;
  path: string;
  outcome: PullOutcome;
  stashed: boolean;
  /** Set when the update succeeded but restoring the stash did not */
  warning?: WtError;
  error?: WtError;
  note?: string;
}

export interface PullMainResult {
  base: string;
  strategy: UpdateStrategy;
  items: PullItem[];
  ok: boolean;
}

export interface PruneOptions {
  base?: string;
  protected?: string[];
  yes?: boolean;
  deleteBranch?: boolean;
  force?: boolean;
}

export interface PruneItem {
  branch: string;
  path: string | null;
  worktreeRemoved: boolean;
  branchDeleted: boolean;
  error?: WtError;
}

export interface PruneResult {
  base: string;
  candidates: string[];
  items: PruneItem[];
  ok: boolean;
}

export interface RemoveRequest {
  branch: string;
  yes?: boolean;
  deleteBranch?: boolean;
  force?: boolean;
}

export interface RemoveResult {
  branch: string;
  path: string;
  branchDeleted: boolean;
}

export interface GcResult {
  worktreeRoot: string;
  /** Registry entries pointing at missing directories that were dropped */
  prunedEntries: number;
  removedDirectories: string[];
}

export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
  details?: string[];
}

export interface DoctorReport {
  checks: DoctorCheck[];
  ok: boolean;
}

// =============================================================================
// Repository Discovery
// =============================================================================

/**
 * Locate the repository containing `cwd`. Fails with NOT_A_REPO.
 */
export async function discoverRepository(git: GitGateway, cwd: string): Promise<RepoLocation> {
  const absolute = resolve(cwd);
  const commonDir = await git.commonDir(absolute);
  const root = await git.repoRoot(absolute);
  return { root, commonDir, cwd: absolute };
}

// =============================================================================
// Helpers
// =============================================================================

function isInside(child: string, parent: string): boolean {
  const c = resolve(child);
  const p = resolve(parent);
  return c === p || c.startsWith(p.endsWith(sep) ? p : p + sep);
}

/**
 * The worktree containing `cwd`; the deepest match wins when worktrees nest.
 */
export function findCurrentWorktree(entries: WorktreeEntry[], cwd: string): WorktreeEntry | null {
  let best: WorktreeEntry | null = null;
  for (const entry of entries) {
    if (isInside(cwd, entry.path) && (!best || entry.path.length > best.path.length)) {
      best = entry;
    }
  }
  return best;
}

function countMissing(entries: WorktreeEntry[]): number {
  return entries.filter((entry) => !entry.isBare && (entry.prunable || !existsSync(entry.path))).length;
}

/**
 * Every directory below `root`, not descending into registered worktrees.
 */
function collectDirectories(root: string, registered: Set<string>): string[] {
  const found: string[] = [];
  const walk = (directory: string): void => {
    for (const entry of readdirSync(directory, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const path = join(directory, entry.name);
      if (registered.has(resolve(path))) continue;
      found.push(path);
      walk(path);
    }
  };
  walk(root);
  return found;
}

async function attempt<T>(fn: () => Promise<T>): Promise<Result<T, WtError>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(wrapError(error, 'VCS_COMMAND_FAILED'));
  }
}

const refuseConfirmation: Confirmer = () => false;

// =============================================================================
// Lifecycle Orchestrator
// =============================================================================

export class WorktreeLifecycle {
  private readonly repo: RepoLocation;
  private readonly config: WtConfig;
  private readonly git: GitGateway;
  private readonly logger: Logger;
  private readonly confirm: Confirmer;
  private readonly hookDirectories: HookDirectory[];
  private readonly lockOptions: LockOptions;
  private readonly hookEnv: NodeJS.ProcessEnv;
  private readonly clock: () => Date;
  private eventHandlers: Set<EventHandler> = new Set();

  constructor(options: LifecycleOptions) {
    this.repo = options.repo;
    this.config = options.config;
    this.git = options.git;
    this.logger = options.logger ?? createNoopLogger();
    this.confirm = options.confirm ?? refuseConfirmation;
    this.hookDirectories = getHookDirectories(
      options.repo.root,
      options.globalConfigDir,
      options.config,
      options.localConfigDir
    );
    this.lockOptions = {
      ...options.lockOptions,
      waitMs: options.config.lock.waitSeconds * 1000,
      logger: this.logger,
    };
    this.hookEnv = options.hookEnv ?? process.env;
    this.clock = options.clock ?? (() => new Date());
  }

  get worktreeRoot(): string {
    return resolveWorktreeRoot(this.repo.root, this.config);
  }

  // ===========================================================================
  // Creation
  // ===========================================================================

  /**
   * Create a worktree for a branch and run the post-create hooks.
   */
  async create(request: CreateRequest): Promise<CreateResult> {
    return this.locked('create', async () => {
      const branch = this.applyPrefix(request.branch);
      const root = this.repo.root;

      await this.refresh('create');

      const sourceBranch = await this.resolveBase(request.from);
      if (!(await this.git.refExists(root, sourceBranch))) {
        throw createWtError('SOURCE_NOT_FOUND', {
          message: `Source branch '${sourceBranch}' does not exist`,
          branch: sourceBranch,
        });
      }

      const existing = await this.git.worktreePathForBranch(root, branch);
      if (existing) {
        throw createWtError('BRANCH_CHECKED_OUT', {
          message: `Branch '${branch}' already has a worktree at ${existing}`,
          branch,
          path: existing,
        });
      }

      const { path, context } = resolveWorktreePath(root, branch, sourceBranch, this.config, this.clock());
      this.emit({ type: 'planned', operation: 'create', targets: [path] });

      if (existsSync(path)) {
        const isEmptyDir = statSync(path).isDirectory() && readdirSync(path).length === 0;
        if (!(request.force && isEmptyDir)) {
          throw createWtError('PATH_EXISTS', {
            message: `Directory already exists: ${path}`,
            path,
          });
        }
        rmdirSync(path);
      }
      mkdirSync(dirname(path), { recursive: true });

      const createdBranch = !(await this.git.branchExists(root, branch));
      await this.git.addWorktree(root, { path, branch, source: sourceBranch, createBranch: createdBranch });
      this.logger.lifecycle.info(
        'worktree_created',
        { branch, path, source: sourceBranch, createdBranch },
        `Created worktree for ${branch} at ${path}`
      );
      this.emit({ type: 'worktree_created', branch, path });

      let upstream: string | null = null;
      if (request.track) {
        const candidate = `origin/${branch}`;
        if (await this.git.refExists(root, candidate)) {
          await this.git.setUpstream(path, branch, candidate);
          upstream = candidate;
        } else {
          this.warn(`No remote branch ${candidate}; upstream not set`);
        }
      }

      const warnings: string[] = [];
      for (const hookPath of findNonExecutableHooks(this.hookDirectories)) {
        const message = `Hook '${hookPath}' is not executable. Run: chmod +x ${hookPath}`;
        warnings.push(message);
        this.warn(message);
      }

      const hooks = await runHooks(discoverHooks(this.hookDirectories), {
        cwd: path,
        context,
        timeoutMs: this.config.hooks.timeoutSeconds * 1000,
        continueOnError: this.config.hooks.continueOnError,
        env: this.hookEnv,
        logger: this.logger,
        onResult: (result) => this.emit({ type: 'hook_finished', result }),
      });

      return {
        branch,
        path,
        sourceBranch,
        createdBranch,
        upstream,
        hooks,
        warnings,
        ok: allHooksSucceeded(hooks),
      };
    });
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Registry entries, as git reports them.
   */
  async list(): Promise<WorktreeEntry[]> {
    return this.git.listWorktrees(this.repo.root);
  }

  /**
   * Live status of every non-bare worktree. A failure probing one worktree is
   * recorded on that item.
   */
  async status(options: StatusOptions = {}): Promise<WorktreeStatus[]> {
    const root = this.repo.root;
    if (options.fetch) {
      await this.git.fetch(root);
    }

    const base = await this.resolveBase(options.base);
    const baseExists = await this.git.refExists(root, base);
    if (!baseExists) {
      this.warn(`Base ${base} not found; behind-base counts are 0`);
    }

    const entries = await this.git.listWorktrees(root);
    const current = findCurrentWorktree(entries, this.repo.cwd);
    const statuses: WorktreeStatus[] = [];

    for (const entry of entries) {
      if (entry.isBare) continue;

      const status: WorktreeStatus = {
        path: entry.path,
        branch: entry.branch,
        shaShort: entry.head.substring(0, 7),
        isDirty: false,
        upstream: null,
        ahead: 0,
        behind: 0,
        behindBase: 0,
        locked: entry.locked,
        isCurrent: current?.path === entry.path,
      };

      const probe = await attempt(async () => {
        status.shaShort = await this.git.shortSha(entry.path);
        status.isDirty = await this.git.isDirty(entry.path);
        status.upstream = await this.git.upstreamOf(entry.path);
        if (status.upstream) {
          const counts = await this.git.aheadBehind(entry.path, status.upstream);
          status.ahead = counts.ahead;
          status.behind = counts.behind;
        }
        if (baseExists) {
          status.behindBase = await this.git.countBehind(entry.path, base);
        }
      });

      if (!probe.ok) {
        status.error = probe.error;
        this.logger.lifecycle.warn('status_probe_failed', { path: entry.path }, probe.error.message);
      }
      statuses.push(status);
    }

    return statuses;
  }

  /**
   * Path of the worktree holding a branch.
   */
  async where(branchName: string): Promise<string> {
    const branch = this.applyPrefix(branchName);
    const path = await this.git.worktreePathForBranch(this.repo.root, branch);
    if (!path) {
      throw createWtError('WORKTREE_NOT_FOUND', {
        message: `No worktree found for branch '${branch}'`,
        branch,
      });
    }
    return path;
  }

  // ===========================================================================
  // Updates
  // ===========================================================================

  /**
   * Bring every worktree up to date with the base branch.
   */
  async pullMain(options: PullMainOptions = {}): Promise<PullMainResult> {
    return this.locked('pull-main', async () => {
      const root = this.repo.root;
      await this.refresh('pull-main');

      const base = await this.resolveBase(options.base);
      const strategy = options.strategy ?? this.config.update.strategy;
      const autoStash = options.stash ?? this.config.update.autoStash;

      const entries = (await this.git.listWorktrees(root)).filter((entry) => !entry.isBare);
      this.emit({ type: 'planned', operation: 'pull-main', targets: entries.map((entry) => entry.path) });

      const items: PullItem[] = [];
      for (const entry of entries) {
        const item = await this.updateWorktree(entry, base, strategy, autoStash);
        items.push(item);
        this.emit({
          type: 'item_finished',
          operation: 'pull-main',
          branch: item.branch,
          path: item.path,
          error: item.error,
        });
      }

      return { base, strategy, items, ok: items.every((item) => item.outcome !== 'failed') };
    });
  }

  private async updateWorktree(
    entry: WorktreeEntry,
    base: string,
    strategy: UpdateStrategy,
    autoStash: boolean
  ): Promise<PullItem> {
    const item: PullItem = { branch: entry.branch, path: entry.path, outcome: 'skipped', stashed: false };

    if (!entry.branch) {
      item.note = 'detached HEAD';
      return item;
    }

    const dirty = await attempt(() => this.git.isDirty(entry.path));
    if (!dirty.ok) {
      return { ...item, outcome: 'failed', error: dirty.error };
    }

    if (dirty.value && !autoStash) {
      item.error = createWtError('SKIPPED_DIRTY', {
        message: `Skipped ${entry.branch}: uncommitted changes (use --stash to auto-stash)`,
        branch: entry.branch,
        path: entry.path,
      });
      return item;
    }

    if (dirty.value) {
      const stash = await attempt(() => this.git.stashPush(entry.path, AUTOSTASH_MESSAGE));
      if (!stash.ok) {
        return { ...item, outcome: 'failed', error: stash.error };
      }
      item.stashed = stash.value;
    }

    const update = await attempt(() => this.applyStrategy(entry.path, base, strategy));
    if (!update.ok) {
      item.outcome = 'failed';
      item.error = update.error;
      if (item.stashed) {
        item.note = "changes remain stashed; run 'git stash pop' after resolving";
      }
      this.logger.lifecycle.warn('update_failed', { branch: entry.branch, code: update.error.code }, update.error.message);
      return item;
    }

    item.outcome = 'updated';
    this.logger.lifecycle.info('worktree_updated', { branch: entry.branch, strategy }, `Updated ${entry.branch} with ${strategy}`);

    if (item.stashed) {
      const restore = await attempt(() => this.git.stashPop(entry.path));
      if (!restore.ok) {
        item.warning = restore.error.code === 'STASH_RESTORE_CONFLICT'
          ? restore.error
          : createWtError('STASH_RESTORE_CONFLICT', {
              path: entry.path,
              details: restore.error.details,
              cause: restore.error,
            });
        item.note = "run 'git stash pop' to recover your changes";
      }
    }

    return item;
  }

  private async applyStrategy(path: string, base: string, strategy: UpdateStrategy): Promise<void> {
    switch (strategy) {
      case 'rebase':
        return this.git.rebase(path, base);
      case 'merge':
        return this.git.merge(path, base);
      case 'ff-only':
        // Divergence is detected up front so the worktree is never touched
        if (!(await this.git.isAncestor(path, 'HEAD', base))) {
          throw createWtError('DIVERGED', {
            message: `Cannot fast-forward ${path} to ${base}: branch has diverged`,
            path,
          });
        }
        return this.git.mergeFastForward(path, base);
    }
  }

  // ===========================================================================
  // Removal
  // ===========================================================================

  /**
   * Remove the worktrees of branches already merged into the base branch.
   */
  async pruneMerged(options: PruneOptions = {}): Promise<PruneResult> {
    return this.locked('prune-merged', async () => {
      const root = this.repo.root;
      await this.refresh('prune-merged');

      const base = await this.resolveBase(options.base);
      const protectedBranches = new Set(options.protected ?? this.config.prune.protected);
      const deleteBranch = options.deleteBranch ?? this.config.prune.deleteBranchWithWorktree;
      const force = options.force ?? false;

      const excluded = new Set<string>(protectedBranches);
      for (const cwd of [root, this.repo.cwd]) {
        const current = await this.git.currentBranch(cwd);
        if (current) excluded.add(current);
      }

      const merged = await this.git.mergedBranches(root, base);
      const candidates = merged.filter((branch) => !excluded.has(branch));
      this.emit({ type: 'planned', operation: 'prune-merged', targets: candidates });

      if (candidates.length === 0) {
        return { base, candidates, items: [], ok: true };
      }

      await this.requireConfirmation(
        options.yes,
        `Refusing to prune ${candidates.length} merged branch(es) without confirmation`,
        candidates
      );

      const items: PruneItem[] = [];
      for (const branch of candidates) {
        const item = await this.pruneBranch(branch, deleteBranch, force);
        items.push(item);
        this.emit({ type: 'item_finished', operation: 'prune-merged', branch, path: item.path, error: item.error });
      }

      return { base, candidates, items, ok: items.every((item) => !item.error) };
    });
  }

  private async pruneBranch(branch: string, deleteBranch: boolean, force: boolean): Promise<PruneItem> {
    const root = this.repo.root;
    const item: PruneItem = { branch, path: null, worktreeRemoved: false, branchDeleted: false };

    const found = await attempt(() => this.git.worktreePathForBranch(root, branch));
    if (!found.ok) {
      return { ...item, error: found.error };
    }
    item.path = found.value;

    if (item.path) {
      const worktreePath = item.path;
      // Merged work is safe to discard, so removal is always forced
      const removed = await attempt(() => this.git.removeWorktree(root, worktreePath, true));
      if (!removed.ok) {
        return { ...item, error: removed.error };
      }
      item.worktreeRemoved = true;
    }

    if (!deleteBranch) {
      return item;
    }

    const unpushed = await attempt(() => this.git.countUnpushed(root, branch));
    if (!unpushed.ok) {
      return { ...item, error: unpushed.error };
    }
    if (unpushed.value > 0 && !force) {
      return { ...item, error: this.unpushedError(branch, unpushed.value) };
    }

    const deleted = await attempt(() => this.git.deleteBranch(root, branch, force));
    if (!deleted.ok) {
      return { ...item, error: deleted.error };
    }
    item.branchDeleted = true;
    return item;
  }

  /**
   * Remove one branch's worktree, optionally deleting the branch.
   */
  async remove(request: RemoveRequest): Promise<RemoveResult> {
    return this.locked('remove', async () => {
      const root = this.repo.root;
      const branch = this.applyPrefix(request.branch);
      const force = request.force ?? false;

      const path = await this.git.worktreePathForBranch(root, branch);
      if (!path) {
        throw createWtError('WORKTREE_NOT_FOUND', {
          message: `No worktree found for branch '${branch}'`,
          branch,
        });
      }

      // Checked before anything is touched
      if (request.deleteBranch && !force) {
        const unpushed = await this.git.countUnpushed(root, branch);
        if (unpushed > 0) {
          throw this.unpushedError(branch, unpushed);
        }
      }

      this.emit({ type: 'planned', operation: 'remove', targets: [path] });
      await this.requireConfirmation(request.yes, `Refusing to remove worktree at ${path} without confirmation`, [path]);

      await this.git.removeWorktree(root, path, force);
      let branchDeleted = false;
      if (request.deleteBranch) {
        await this.git.deleteBranch(root, branch, force);
        branchDeleted = true;
      }

      this.emit({ type: 'item_finished', operation: 'remove', branch, path });
      return { branch, path, branchDeleted };
    });
  }

  // ===========================================================================
  // Maintenance
  // ===========================================================================

  /**
   * Drop registry entries whose directories are gone, then remove empty,
   * unregistered directories under the worktree root (deepest first).
   */
  async gc(): Promise<GcResult> {
    return this.locked('gc', async () => {
      const root = this.repo.root;
      const worktreeRoot = this.worktreeRoot;

      const missingBefore = countMissing(await this.git.listWorktrees(root));
      await this.git.pruneWorktrees(root);
      const entries = await this.git.listWorktrees(root);
      const prunedEntries = Math.max(0, missingBefore - countMissing(entries));

      const removedDirectories: string[] = [];
      if (existsSync(worktreeRoot)) {
        const registered = new Set(entries.map((entry) => resolve(entry.path)));
        const directories = collectDirectories(worktreeRoot, registered).sort(
          (a, b) => b.split(sep).length - a.split(sep).length || (a < b ? 1 : a > b ? -1 : 0)
        );

        for (const directory of directories) {
          if (readdirSync(directory).length === 0) {
            rmdirSync(directory);
            removedDirectories.push(directory);
          }
        }
      }

      this.logger.lifecycle.info(
        'gc_complete',
        { prunedEntries, removedDirectories: removedDirectories.length },
        `Pruned ${prunedEntries} entries, removed ${removedDirectories.length} directories`
      );

      return { worktreeRoot, prunedEntries, removedDirectories };
    });
  }

  /**
   * Check the environment and configuration. Never locks, never mutates.
   */
  async doctor(configFiles: { global: string; local?: string }): Promise<DoctorReport> {
    const checks: DoctorCheck[] = [];

    const version = await this.git.version();
    checks.push(
      version
        ? { name: 'git', status: 'ok', message: version }
        : { name: 'git', status: 'fail', message: 'git is not available on PATH' }
    );

    checks.push({ name: 'repository', status: 'ok', message: `Repository root: ${this.repo.root}` });

    const configEntries: Array<[string, string | undefined]> = [
      ['global config', configFiles.global],
      ['local config', configFiles.local],
    ];
    for (const [name, path] of configEntries) {
      if (!path || !existsSync(path)) {
        checks.push({ name, status: 'ok', message: `Not present (optional)${path ? `: ${path}` : ''}` });
        continue;
      }
      try {
        loadTomlFile(path);
        checks.push({ name, status: 'ok', message: path });
      } catch (error) {
        checks.push({ name, status: 'fail', message: isWtError(error) ? error.message : String(error) });
      }
    }

    const unknownVariables = findUnknownTemplateVariables(this.config);
    checks.push(
      unknownVariables.length === 0
        ? { name: 'templates', status: 'ok', message: 'All path template variables are known' }
        : {
            name: 'templates',
            status: 'fail',
            message: `${unknownVariables.length} unknown template variable(s)`,
            details: unknownVariables,
          }
    );

    checks.push(this.checkWorktreeRoot());

    const hooks = discoverHooks(this.hookDirectories);
    const localCount = hooks.filter((hook) => hook.origin === 'local').length;
    checks.push({
      name: 'hooks',
      status: 'ok',
      message: `Found ${localCount} local + ${hooks.length - localCount} global hooks`,
      details: hooks.map((hook) => hook.path),
    });

    const nonExecutable = findNonExecutableHooks(this.hookDirectories);
    if (nonExecutable.length > 0) {
      checks.push({
        name: 'hook permissions',
        status: 'fail',
        message: `${nonExecutable.length} hook(s) are not executable`,
        details: nonExecutable.map((path) => `chmod +x ${path}`),
      });
    }

    return { checks, ok: checks.every((check) => check.status !== 'fail') };
  }

  private checkWorktreeRoot(): DoctorCheck {
    let worktreeRoot: string;
    try {
      worktreeRoot = this.worktreeRoot;
    } catch (error) {
      return {
        name: 'worktree root',
        status: 'fail',
        message: `Cannot resolve: ${isWtError(error) ? error.message : String(error)}`,
      };
    }

    if (!existsSync(worktreeRoot)) {
      return { name: 'worktree root', status: 'ok', message: `${worktreeRoot} (will be created)` };
    }
    try {
      accessSync(worktreeRoot, constants.W_OK);
      return { name: 'worktree root', status: 'ok', message: `${worktreeRoot} is writable` };
    } catch {
      return { name: 'worktree root', status: 'fail', message: `Cannot write to ${worktreeRoot}` };
    }
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  /**
   * Subscribe to lifecycle events.
   */
  on(handler: EventHandler): void {
    this.eventHandlers.add(handler);
  }

  /**
   * Unsubscribe from events.
   */
  off(handler: EventHandler): void {
    this.eventHandlers.delete(handler);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private emit(event: LifecycleEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.lifecycle.error('event_handler_failed', { event: event.type }, String(error));
      }
    }
  }

  private warn(message: string): void {
    this.logger.lifecycle.warn('warning', {}, message);
    this.emit({ type: 'warning', message });
  }

  /**
   * Run a mutating operation under the repository lock.
   */
  private async locked<T>(operation: OperationName, fn: () => Promise<T>): Promise<T> {
    return withRepoLock(this.repo.commonDir, this.lockOptions, async (handle) => {
      this.emit({ type: 'lock_acquired', operation, lockPath: handle.lockPath });
      try {
        return await fn();
      } finally {
        this.emit({ type: 'lock_released', operation });
      }
    });
  }

  private async refresh(operation: OperationName): Promise<void> {
    await this.git.fetch(this.repo.root);
    this.emit({ type: 'refreshed', operation });
  }

  private applyPrefix(branch: string): string {
    const prefix = this.config.branches.autoPrefix;
    return prefix && !branch.startsWith(prefix) ? prefix + branch : branch;
  }

  /**
   * The configured base, with origin/main falling back to origin/master when
   * only the latter exists.
   */
  private async resolveBase(explicit?: string): Promise<string> {
    const base = explicit ?? this.config.update.base;
    if (base === 'origin/main' && !(await this.git.refExists(this.repo.root, base))) {
      return (await this.git.defaultBranch(this.repo.root)) ?? base;
    }
    return base;
  }

  private async requireConfirmation(yes: boolean | undefined, message: string, plan: string[]): Promise<void> {
    if (yes) return;
    if (!(await this.confirm(message, plan))) {
      throw createWtError('CONFIRMATION_REQUIRED', { message });
    }
  }

  private unpushedError(branch: string, count: number): WtError {
    return createWtError('UNPUSHED_COMMITS', {
      message: `Branch '${branch}' has ${count} unpushed commit${count === 1 ? '' : 's'}`,
      branch,
      context: { unpushed: count },
    });
  }
}
