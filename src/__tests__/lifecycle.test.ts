/**
 * Lifecycle Orchestrator Tests
 *
 * Drives WorktreeLifecycle against the in-memory FakeGit. Worktree
 * directories, hooks and the lock file live in a temporary directory.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { chmodSync, existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getDefaultConfig } from '../config.js';
import { isWtError } from '../errors.js';
import {
  type Confirmer,
  type LifecycleEvent,
  WorktreeLifecycle,
  discoverRepository,
  findCurrentWorktree,
} from '../lifecycle.js';
import { getLockPath } from '../lock.js';
import type { WtConfig } from '../types.js';
import { FakeGit } from './fake-git.js';

// =============================================================================
// Test Helpers
// =============================================================================

const FIXED_TIME = new Date(2024, 0, 5, 9, 3, 7);

let tempDir: string;
let root: string;
let commonDir: string;
let worktreeRoot: string;
let globalDir: string;
let localHooks: string;
let git: FakeGit;
let config: WtConfig;

interface Setup {
  confirm?: Confirmer;
  cwd?: string;
}

function lifecycle(setup: Setup = {}): WorktreeLifecycle {
  return new WorktreeLifecycle({
    repo: { root, commonDir, cwd: setup.cwd ?? root },
    config,
    git,
    confirm: setup.confirm,
    globalConfigDir: globalDir,
    hookEnv: { PATH: process.env.PATH },
    clock: () => FIXED_TIME,
  });
}

function writeHook(name: string, body: string, mode: number = 0o755): string {
  mkdirSync(localHooks, { recursive: true });
  const path = join(localHooks, name);
  writeFileSync(path, `#!/bin/sh\n${body}\n`);
  chmodSync(path, mode);
  return path;
}

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'wt-lifecycle-'));
  root = join(tempDir, 'app');
  commonDir = join(root, '.git');
  worktreeRoot = join(tempDir, 'app-worktrees');
  globalDir = join(tempDir, 'global');
  localHooks = join(root, '.wt', 'hooks', 'post_create.d');
  git = new FakeGit(root, commonDir);
  mkdirSync(commonDir, { recursive: true });
  config = getDefaultConfig();
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

// =============================================================================
// Repository Discovery
// =============================================================================

describe('Lifecycle - discovery', () => {
  test('discoverRepository reports root, metadata dir and cwd', async () => {
    expect(await discoverRepository(git, root)).toEqual({ root, commonDir, cwd: root });
  });

  test('findCurrentWorktree picks the deepest containing worktree', async () => {
    const nested = git.addEntry(join(root, 'vendor', 'lib'), 'lib');
    const entries = await git.listWorktrees();

    expect(findCurrentWorktree(entries, join(nested.path, 'src'))?.branch).toBe('lib');
    expect(findCurrentWorktree(entries, join(root, 'docs'))?.branch).toBe('main');
    expect(findCurrentWorktree(entries, tempDir)).toBeNull();
  });
});

// =============================================================================
// Creation
// =============================================================================

describe('Lifecycle - create', () => {
  test('creates a prefixed branch worktree and runs hooks with its context', async () => {
    config.branches.autoPrefix = 'alice/';
    writeHook('10-info', 'echo "$WT_BRANCH_NAME|$WT_SOURCE_BRANCH|$WT_DATE_ISO" > info.txt');
    const expectedPath = join(worktreeRoot, 'alice', 'login');

    const result = await lifecycle().create({ branch: 'login' });

    expect(result.branch).toBe('alice/login');
    expect(result.path).toBe(expectedPath);
    expect(result.sourceBranch).toBe('origin/main');
    expect(result.createdBranch).toBe(true);
    expect(result.upstream).toBeNull();
    expect(result.ok).toBe(true);
    expect(result.hooks.map((hook) => hook.status)).toEqual(['succeeded']);
    expect(git.calls).toEqual(['fetch', `addWorktree alice/login ${expectedPath} -b`]);
    expect(readFileSync(join(expectedPath, 'info.txt'), 'utf-8')).toBe('alice/login|origin/main|2024-01-05\n');
  });

  test('an existing prefix is not applied twice', async () => {
    config.branches.autoPrefix = 'alice/';
    const result = await lifecycle().create({ branch: 'alice/login' });
    expect(result.branch).toBe('alice/login');
  });

  test('an existing branch is checked out without -b', async () => {
    git.branches.add('feature/x');
    const result = await lifecycle().create({ branch: 'feature/x' });

    expect(result.createdBranch).toBe(false);
    expect(git.calls).toEqual(['fetch', `addWorktree feature/x ${join(worktreeRoot, 'feature', 'x')}`]);
  });

  test('missing source branch fails before touching anything', async () => {
    const error = await captureRejection(lifecycle().create({ branch: 'x', from: 'origin/nope' }));

    expect(isWtError(error, 'SOURCE_NOT_FOUND')).toBe(true);
    expect(isWtError(error) && error.message).toBe("Source branch 'origin/nope' does not exist");
    expect(git.calls).toEqual(['fetch']);
    expect(existsSync(getLockPath(commonDir))).toBe(false);
  });

  test('falls back to origin/master when origin/main is absent', async () => {
    git.remoteRefs = new Set(['origin/master']);
    const result = await lifecycle().create({ branch: 'x' });
    expect(result.sourceBranch).toBe('origin/master');
  });

  test('a branch that already has a worktree is BRANCH_CHECKED_OUT', async () => {
    const existing = git.addEntry(join(worktreeRoot, 'x'), 'x');
    const error = await captureRejection(lifecycle().create({ branch: 'x' }));

    expect(isWtError(error, 'BRANCH_CHECKED_OUT')).toBe(true);
    expect(isWtError(error) && error.path).toBe(existing.path);
    expect(git.calls).toEqual(['fetch']);
  });

  test('an occupied target directory is PATH_EXISTS', async () => {
    const target = join(worktreeRoot, 'x');
    mkdirSync(target, { recursive: true });
    writeFileSync(join(target, 'notes.txt'), 'keep me');

    const error = await captureRejection(lifecycle().create({ branch: 'x', force: true }));

    expect(isWtError(error, 'PATH_EXISTS')).toBe(true);
    expect(readFileSync(join(target, 'notes.txt'), 'utf-8')).toBe('keep me');
  });

  test('force reuses an empty target directory', async () => {
    mkdirSync(join(worktreeRoot, 'x'), { recursive: true });
    const result = await lifecycle().create({ branch: 'x', force: true });
    expect(result.path).toBe(join(worktreeRoot, 'x'));
  });

  test('an empty target directory without force is PATH_EXISTS', async () => {
    mkdirSync(join(worktreeRoot, 'x'), { recursive: true });
    const error = await captureRejection(lifecycle().create({ branch: 'x' }));
    expect(isWtError(error, 'PATH_EXISTS')).toBe(true);
  });

  test('track sets the upstream when the remote branch exists', async () => {
    git.remoteRefs.add('origin/x');
    const result = await lifecycle().create({ branch: 'x', track: true });

    expect(result.upstream).toBe('origin/x');
    expect(git.calls).toContain('setUpstream x origin/x');
  });

  test('a failing hook keeps the worktree and reports not ok', async () => {
    writeHook('10-fail', 'exit 2');
    writeHook('20-next', 'true');

    const result = await lifecycle().create({ branch: 'x' });

    expect(result.ok).toBe(false);
    expect(result.hooks.map((hook) => hook.status)).toEqual(['failed', 'skipped']);
    expect(existsSync(result.path)).toBe(true);
  });

  test('non-executable hooks produce a warning', async () => {
    const hookPath = writeHook('setup.sh', 'true', 0o644);
    const result = await lifecycle().create({ branch: 'x' });

    expect(result.warnings).toEqual([`Hook '${hookPath}' is not executable. Run: chmod +x ${hookPath}`]);
    expect(result.hooks).toEqual([]);
  });

  test('a held lock fails with LOCK_HELD and no git calls', async () => {
    writeFileSync(getLockPath(commonDir), JSON.stringify({ pid: process.pid, acquiredAt: 'earlier' }));
    const error = await captureRejection(lifecycle().create({ branch: 'x' }));

    expect(isWtError(error, 'LOCK_HELD')).toBe(true);
    expect(git.calls).toEqual([]);
  });

  test('events arrive in lifecycle order', async () => {
    const wt = lifecycle();
    const events: LifecycleEvent['type'][] = [];
    wt.on((event) => events.push(event.type));

    await wt.create({ branch: 'x' });

    expect(events).toEqual(['lock_acquired', 'refreshed', 'planned', 'worktree_created', 'lock_released']);
  });

  test('a throwing event handler does not break the operation', async () => {
    const wt = lifecycle();
    wt.on(() => {
      throw new Error('handler bug');
    });
    const result = await wt.create({ branch: 'x' });
    expect(result.ok).toBe(true);
  });
});

// =============================================================================
// Queries
// =============================================================================

describe('Lifecycle - status and where', () => {
  test('reports per-worktree state without fetching', async () => {
    const a = git.addEntry(join(worktreeRoot, 'a'), 'a');
    git.dirty.add(a.path);
    git.upstreams.set('a', 'origin/a');
    git.counts.set(a.path, { ahead: 1, behind: 2 });
    git.behindBase.set(a.path, 3);
    git.addEntry(join(tempDir, 'mirror.git'), null, { isBare: true });

    const statuses = await lifecycle().status();

    expect(git.calls).toEqual([]);
    expect(statuses.map((status) => status.branch)).toEqual(['main', 'a']);
    expect(statuses[0]?.isCurrent).toBe(true);
    expect(statuses[1]).toMatchObject({
      path: a.path,
      branch: 'a',
      shaShort: a.head.substring(0, 7),
      isDirty: true,
      upstream: 'origin/a',
      ahead: 1,
      behind: 2,
      behindBase: 3,
      isCurrent: false,
    });
  });

  test('fetches when asked', async () => {
    await lifecycle().status({ fetch: true });
    expect(git.calls).toEqual(['fetch']);
  });

  test('a failed probe is recorded on its item', async () => {
    const broken = git.addEntry(join(worktreeRoot, 'broken'), 'broken');
    git.brokenStatus.add(broken.path);

    const statuses = await lifecycle().status();

    expect(statuses[0]?.error).toBeUndefined();
    expect(statuses[1]?.error?.code).toBe('VCS_COMMAND_FAILED');
    expect(statuses[1]?.isDirty).toBe(false);
  });

  test('where returns the worktree path of a prefixed branch', async () => {
    config.branches.autoPrefix = 'alice/';
    const entry = git.addEntry(join(worktreeRoot, 'alice', 'login'), 'alice/login');
    expect(await lifecycle().where('login')).toBe(entry.path);
  });

  test('where for an unknown branch is WORKTREE_NOT_FOUND', async () => {
    const error = await captureRejection(lifecycle().where('nope'));
    expect(isWtError(error, 'WORKTREE_NOT_FOUND')).toBe(true);
  });
});

// =============================================================================
// Updates
// =============================================================================

describe('Lifecycle - pullMain', () => {
  let aPath: string;

  beforeEach(() => {
    aPath = git.addEntry(join(worktreeRoot, 'a'), 'a').path;
  });

  test('rebases every worktree onto the base', async () => {
    const result = await lifecycle().pullMain();

    expect(result.base).toBe('origin/main');
    expect(result.strategy).toBe('rebase');
    expect(result.items.map((item) => `${item.branch}:${item.outcome}`)).toEqual(['main:updated', 'a:updated']);
    expect(result.ok).toBe(true);
    expect(git.calls).toEqual(['fetch', `rebase ${root} origin/main`, `rebase ${aPath} origin/main`]);
  });

  test('ff-only leaves a diverged worktree untouched', async () => {
    git.diverged.add(aPath);
    const result = await lifecycle().pullMain({ strategy: 'ff-only' });

    expect(result.items[1]?.outcome).toBe('failed');
    expect(result.items[1]?.error?.code).toBe('DIVERGED');
    expect(result.ok).toBe(false);
    expect(git.calls).toEqual(['fetch', `mergeFastForward ${root} origin/main`]);
  });

  test('dirty worktrees are skipped without auto-stash', async () => {
    git.dirty.add(aPath);
    const result = await lifecycle().pullMain();

    expect(result.items[1]?.outcome).toBe('skipped');
    expect(result.items[1]?.error?.code).toBe('SKIPPED_DIRTY');
    expect(result.ok).toBe(true);
    expect(git.calls).not.toContain(`stashPush ${aPath}`);
  });

  test('auto-stash wraps the update', async () => {
    git.dirty.add(aPath);
    const result = await lifecycle().pullMain({ stash: true });

    expect(result.items[1]).toEqual({ branch: 'a', path: aPath, outcome: 'updated', stashed: true });
    expect(git.calls.slice(-3)).toEqual([`stashPush ${aPath}`, `rebase ${aPath} origin/main`, `stashPop ${aPath}`]);
  });

  test('a failed stash restore is a warning on an updated item', async () => {
    git.dirty.add(aPath);
    git.stashPopConflicts.add(aPath);
    const result = await lifecycle().pullMain({ stash: true });

    expect(result.items[1]?.outcome).toBe('updated');
    expect(result.items[1]?.warning?.code).toBe('STASH_RESTORE_CONFLICT');
    expect(result.items[1]?.note).toBe("run 'git stash pop' to recover your changes");
    expect(result.ok).toBe(true);
  });

  test('a conflict keeps the stash and continues the batch', async () => {
    const bPath = git.addEntry(join(worktreeRoot, 'b'), 'b').path;
    git.dirty.add(aPath);
    git.conflicts.add(aPath);
    const result = await lifecycle().pullMain({ stash: true, strategy: 'merge' });

    expect(result.items[1]?.outcome).toBe('failed');
    expect(result.items[1]?.error?.code).toBe('UPDATE_CONFLICT');
    expect(result.items[1]?.note).toBe("changes remain stashed; run 'git stash pop' after resolving");
    expect(result.items[2]?.outcome).toBe('updated');
    expect(git.calls).not.toContain(`stashPop ${aPath}`);
    expect(git.calls).toContain(`merge ${bPath} origin/main`);
  });

  test('detached worktrees are skipped and bare ones ignored', async () => {
    const detached = git.addEntry(join(worktreeRoot, 'detached'), null);
    git.addEntry(join(tempDir, 'mirror.git'), null, { isBare: true });

    const result = await lifecycle().pullMain();

    expect(result.items).toHaveLength(3);
    expect(result.items[2]).toEqual({
      branch: null,
      path: detached.path,
      outcome: 'skipped',
      stashed: false,
      note: 'detached HEAD',
    });
  });

  test('reports every item as it finishes', async () => {
    const wt = lifecycle();
    const finished: Array<string | null> = [];
    wt.on((event) => {
      if (event.type === 'item_finished') finished.push(event.branch);
    });

    await wt.pullMain();

    expect(finished).toEqual(['main', 'a']);
  });
});

// =============================================================================
// Removal
// =============================================================================

describe('Lifecycle - pruneMerged', () => {
  const approve: Confirmer = () => true;

  test('removes merged worktrees except protected and current branches', async () => {
    const done = git.addEntry(join(worktreeRoot, 'feature', 'done'), 'feature/done');
    git.merged = ['main', 'develop', 'feature/done', 'feature/gone'];
    const confirm = vi.fn(approve);

    const result = await lifecycle({ confirm }).pruneMerged();

    expect(result.candidates).toEqual(['feature/done', 'feature/gone']);
    expect(confirm).toHaveBeenCalledWith('Refusing to prune 2 merged branch(es) without confirmation', [
      'feature/done',
      'feature/gone',
    ]);
    expect(result.items).toEqual([
      { branch: 'feature/done', path: done.path, worktreeRemoved: true, branchDeleted: false },
      { branch: 'feature/gone', path: null, worktreeRemoved: false, branchDeleted: false },
    ]);
    expect(result.ok).toBe(true);
    expect(git.calls).toEqual(['fetch', `removeWorktree ${done.path} --force`]);
    expect(existsSync(done.path)).toBe(false);
  });

  test('the branch checked out where the command runs is never pruned', async () => {
    const here = git.addEntry(join(worktreeRoot, 'here'), 'here');
    git.merged = ['here', 'other'];

    const result = await lifecycle({ confirm: approve, cwd: here.path }).pruneMerged();

    expect(result.candidates).toEqual(['other']);
  });

  test('explicit protected list replaces the configured one', async () => {
    git.merged = ['develop', 'release'];
    const result = await lifecycle({ confirm: approve }).pruneMerged({ protected: ['release'] });
    expect(result.candidates).toEqual(['develop']);
  });

  test('refusing confirmation changes nothing', async () => {
    const done = git.addEntry(join(worktreeRoot, 'done'), 'done');
    git.merged = ['done'];

    const error = await captureRejection(lifecycle().pruneMerged());

    expect(isWtError(error, 'CONFIRMATION_REQUIRED')).toBe(true);
    expect(git.calls).toEqual(['fetch']);
    expect(existsSync(done.path)).toBe(true);
  });

  test('nothing to prune skips the confirmation', async () => {
    git.merged = ['main'];
    const confirm = vi.fn(approve);

    const result = await lifecycle({ confirm }).pruneMerged();

    expect(result.items).toEqual([]);
    expect(result.ok).toBe(true);
    expect(confirm).not.toHaveBeenCalled();
  });

  test('unpushed commits keep the branch unless forced', async () => {
    git.addEntry(join(worktreeRoot, 'done'), 'done');
    git.addEntry(join(worktreeRoot, 'clean'), 'clean');
    git.merged = ['done', 'clean'];
    git.unpushed.set('done', 2);

    const result = await lifecycle().pruneMerged({ yes: true, deleteBranch: true });

    expect(result.items[0]?.worktreeRemoved).toBe(true);
    expect(result.items[0]?.branchDeleted).toBe(false);
    expect(result.items[0]?.error?.code).toBe('UNPUSHED_COMMITS');
    expect(result.items[0]?.error?.message).toBe("Branch 'done' has 2 unpushed commits");
    expect(result.items[1]?.branchDeleted).toBe(true);
    expect(result.ok).toBe(false);
    expect(git.calls).toContain('deleteBranch clean -d');
    expect(git.calls).not.toContain('deleteBranch done -d');
  });

  test('force deletes branches with unpushed commits', async () => {
    git.merged = ['done'];
    git.branches.add('done');
    git.unpushed.set('done', 1);

    const result = await lifecycle().pruneMerged({ yes: true, deleteBranch: true, force: true });

    expect(result.items[0]?.branchDeleted).toBe(true);
    expect(git.calls).toContain('deleteBranch done -D');
  });
});

describe('Lifecycle - remove', () => {
  let xPath: string;

  beforeEach(() => {
    xPath = git.addEntry(join(worktreeRoot, 'x'), 'x').path;
  });

  test('unknown branch is WORKTREE_NOT_FOUND', async () => {
    const error = await captureRejection(lifecycle().remove({ branch: 'nope', yes: true }));
    expect(isWtError(error, 'WORKTREE_NOT_FOUND')).toBe(true);
  });

  test('requires confirmation', async () => {
    const error = await captureRejection(lifecycle().remove({ branch: 'x' }));

    expect(isWtError(error, 'CONFIRMATION_REQUIRED')).toBe(true);
    expect(isWtError(error) && error.message).toBe(`Refusing to remove worktree at ${xPath} without confirmation`);
    expect(git.calls).toEqual([]);
    expect(existsSync(xPath)).toBe(true);
  });

  test('removes the worktree and keeps the branch by default', async () => {
    const result = await lifecycle({ confirm: () => true }).remove({ branch: 'x' });

    expect(result).toEqual({ branch: 'x', path: xPath, branchDeleted: false });
    expect(git.calls).toEqual([`removeWorktree ${xPath}`]);
    expect(existsSync(xPath)).toBe(false);
  });

  test('unpushed commits block branch deletion before anything changes', async () => {
    git.unpushed.set('x', 1);
    const error = await captureRejection(lifecycle().remove({ branch: 'x', yes: true, deleteBranch: true }));

    expect(isWtError(error, 'UNPUSHED_COMMITS')).toBe(true);
    expect(isWtError(error) && error.message).toBe("Branch 'x' has 1 unpushed commit");
    expect(git.calls).toEqual([]);
  });

  test('force removes and deletes regardless', async () => {
    git.unpushed.set('x', 1);
    const result = await lifecycle().remove({ branch: 'x', yes: true, deleteBranch: true, force: true });

    expect(result.branchDeleted).toBe(true);
    expect(git.calls).toEqual([`removeWorktree ${xPath} --force`, 'deleteBranch x -D']);
  });
});

// =============================================================================
// Maintenance
// =============================================================================

describe('Lifecycle - gc', () => {
  test('drops missing entries and empty directories, then is idempotent', async () => {
    git.addEntry(join(worktreeRoot, 'gone'), 'gone', { prunable: true });
    const kept = git.addEntry(join(worktreeRoot, 'kept'), 'kept');
    mkdirSync(join(kept.path, 'empty-inside'));
    mkdirSync(join(worktreeRoot, 'empty', 'nested'), { recursive: true });

    const first = await lifecycle().gc();

    expect(first.worktreeRoot).toBe(worktreeRoot);
    expect(first.prunedEntries).toBe(1);
    expect(first.removedDirectories).toEqual([
      join(worktreeRoot, 'empty', 'nested'),
      join(worktreeRoot, 'empty'),
    ]);
    expect(existsSync(join(kept.path, 'empty-inside'))).toBe(true);

    const second = await lifecycle().gc();

    expect(second.prunedEntries).toBe(0);
    expect(second.removedDirectories).toEqual([]);
  });

  test('a missing worktree root is not an error', async () => {
    const result = await lifecycle().gc();
    expect(result).toEqual({ worktreeRoot, prunedEntries: 0, removedDirectories: [] });
  });
});

describe('Lifecycle - doctor', () => {
  test('reports a healthy setup', async () => {
    writeHook('10-ok', 'true');
    const report = await lifecycle().doctor({ global: join(globalDir, 'config.toml') });

    expect(report.ok).toBe(true);
    expect(report.checks.map((check) => `${check.name}:${check.status}`)).toEqual([
      'git:ok',
      'repository:ok',
      'global config:ok',
      'local config:ok',
      'templates:ok',
      'worktree root:ok',
      'hooks:ok',
    ]);
    expect(report.checks[6]?.message).toBe('Found 1 local + 0 global hooks');
  });

  test('reports unknown variables in path templates', async () => {
    config.paths.worktreeRoot = '$HOME_DIR/trees';
    config.paths.worktreePathTemplate = '$WT_ROOT/$TICKET/$BRANCH_NAME';

    const report = await lifecycle().doctor({ global: join(globalDir, 'config.toml') });

    expect(report.ok).toBe(false);
    const templates = report.checks.find((check) => check.name === 'templates');
    expect(templates?.status).toBe('fail');
    expect(templates?.message).toBe('2 unknown template variable(s)');
    expect(templates?.details).toEqual(['paths.worktree_root: $HOME_DIR', 'paths.worktree_path_template: $TICKET']);
    expect(report.checks.find((check) => check.name === 'worktree root')).toEqual({
      name: 'worktree root',
      status: 'fail',
      message: 'Cannot resolve: Unknown template variable: $HOME_DIR',
    });
  });

  test('fails on missing git, bad config and non-executable hooks', async () => {
    git.gitVersion = null;
    const localConfig = join(root, '.wt', 'config.toml');
    mkdirSync(join(root, '.wt'), { recursive: true });
    writeFileSync(localConfig, '[update\n');
    const hookPath = writeHook('setup.sh', 'true', 0o644);

    const report = await lifecycle().doctor({ global: join(globalDir, 'config.toml'), local: localConfig });

    expect(report.ok).toBe(false);
    const failed = report.checks.filter((check) => check.status === 'fail').map((check) => check.name);
    expect(failed).toEqual(['git', 'local config', 'hook permissions']);
    expect(report.checks.find((check) => check.name === 'hook permissions')?.details).toEqual([
      `chmod +x ${hookPath}`,
    ]);
  });

  test('never takes the lock', async () => {
    writeFileSync(getLockPath(commonDir), JSON.stringify({ pid: process.pid, acquiredAt: 'earlier' }));
    const report = await lifecycle().doctor({ global: join(globalDir, 'config.toml') });
    expect(report.ok).toBe(true);
  });
});
