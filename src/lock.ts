/**
 * wt - Repository Lock
 *
 * Advisory, repo-scoped mutual exclusion for mutating commands. The lock file
 * lives in the shared git metadata directory, so every worktree of one
 * repository contends for the same file while different repositories never
 * contend at all.
 *
 * The file is created exclusively and holds the owner's PID and a random lock
 * id. A file whose PID is no longer alive (or that cannot be parsed) is stale.
 * A stale file is renamed aside before it is deleted, so a lock that another
 * process wrote in the meantime is put back instead of removed.
 */

import { randomUUID } from 'crypto';
import { linkSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createWtError, isWtError } from './errors.js';
import { type Logger, createNoopLogger, formatDuration } from './logger.js';
import { now } from './types.js';

// =============================================================================
// Constants
// =============================================================================

export const LOCK_FILE_NAME = 'wt.lock';
const DEFAULT_POLL_INTERVAL_MS = 100;

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * A held claim on a repository lock. Pass it back to releaseLock.
 */
export interface LockHandle {
  lockPath: string;
  pid: number;
  lockId: string;
  acquiredAt: string;
  released: boolean;
}

/**
 * Contents written to the lock file.
 */
interface LockRecord {
  pid: number;
  acquiredAt: string;
  /** Absent in bare-PID files */
  lockId?: string;
}

export interface LockOptions {
  /** How long to wait for a live holder; 0 fails immediately (default) */
  waitMs?: number;
  /** Delay between attempts while waiting */
  pollIntervalMs?: number;
  /** PID recorded as the owner (default: this process) */
  pid?: number;
  /** Liveness probe, replaceable for tests */
  isProcessAlive?: (pid: number) => boolean;
  logger?: Logger;
}

// =============================================================================
// Internal Helpers
// =============================================================================

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Signal 0 probes for existence without delivering a signal. EPERM means the
 * process exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

function parseLockRecord(content: string): LockRecord | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'pid' in parsed &&
      typeof parsed.pid === 'number' &&
      'acquiredAt' in parsed &&
      typeof parsed.acquiredAt === 'string'
    ) {
      const lockId = 'lockId' in parsed && typeof parsed.lockId === 'string' ? parsed.lockId : undefined;
      return { pid: parsed.pid, acquiredAt: parsed.acquiredAt, lockId };
    }
  } catch {
    // Fall back to the bare-PID format below
  }

  const pid = Number.parseInt(content.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? { pid, acquiredAt: '' } : null;
}

function readLockFile(lockPath: string): string | undefined {
  try {
    return readFileSync(lockPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

function readLockRecord(lockPath: string): LockRecord | null | undefined {
  const content = readLockFile(lockPath);
  return content === undefined ? undefined : parseLockRecord(content);
}

function removeIfPresent(lockPath: string): void {
  try {
    unlinkSync(lockPath);
  } catch (error) {
    if (!(isErrnoException(error) && error.code === 'ENOENT')) {
      throw error;
    }
  }
}

/**
 * Remove a stale lock file only if it still holds `staleContent`. The file is
 * first renamed to a name private to this attempt; when the renamed file turns
 * out to be a newer lock, it is linked back into place.
 */
function reclaimStale(lockPath: string, staleContent: string, lockId: string, logger: Logger): void {
  const asidePath = `${lockPath}.${lockId}.stale`;
  try {
    renameSync(lockPath, asidePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return;
    }
    throw error;
  }

  try {
    if (readLockFile(asidePath) === staleContent) {
      return;
    }
    logger.lock.debug('lock_reclaim_lost', { path: lockPath }, 'Lock changed while reclaiming; restoring it');
    try {
      linkSync(asidePath, lockPath);
    } catch (error) {
      if (!(isErrnoException(error) && error.code === 'EEXIST')) {
        throw error;
      }
    }
  } finally {
    removeIfPresent(asidePath);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * One acquisition attempt. Returns the handle, or the PID of the live holder.
 */
function tryAcquire(
  lockPath: string,
  pid: number,
  alive: (pid: number) => boolean,
  logger: Logger
): LockHandle | { heldBy: number } {
  const lockId = randomUUID();

  // Bounded: each pass either creates the file, finds a live holder, or
  // moves a stale file aside.
  for (let attempt = 0; attempt < 5; attempt++) {
    const record: LockRecord = { pid, acquiredAt: now(), lockId };

    try {
      writeFileSync(lockPath, JSON.stringify(record), { flag: 'wx' });
    } catch (error) {
      if (!(isErrnoException(error) && error.code === 'EEXIST')) {
        throw createWtError('LOCK_HELD', {
          message: `Cannot create lock file at ${lockPath}: ${error instanceof Error ? error.message : String(error)}`,
          path: lockPath,
          cause: error,
        });
      }

      const content = readLockFile(lockPath);
      if (content === undefined) {
        // Released between our write and read; try again
        continue;
      }

      const existing = parseLockRecord(content);
      if (existing !== null && alive(existing.pid)) {
        return { heldBy: existing.pid };
      }

      logger.lock.warn(
        'lock_stale',
        { path: lockPath, pid: existing?.pid },
        existing
          ? `Reclaiming stale lock held by dead process ${existing.pid}`
          : 'Reclaiming unreadable lock file'
      );
      reclaimStale(lockPath, content, lockId, logger);
      continue;
    }

    // The file must still be ours once written
    const written = readLockRecord(lockPath);
    if (written?.lockId === lockId) {
      return { lockPath, pid, lockId, acquiredAt: record.acquiredAt, released: false };
    }
    logger.lock.debug('lock_race_lost', { path: lockPath }, 'Lock file replaced right after creation; retrying');
  }

  throw createWtError('LOCK_HELD', {
    message: `Could not acquire lock at ${lockPath}: lock file keeps changing`,
    path: lockPath,
  });
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Path of the lock file for a repository's shared metadata directory.
 */
export function getLockPath(metadataDir: string): string {
  return join(metadataDir, LOCK_FILE_NAME);
}

/**
 * Acquire the repository lock. Fails with LOCK_HELD when another live process
 * holds it and no wait is configured, or LOCK_TIMEOUT after waiting.
 */
export async function acquireLock(metadataDir: string, options: LockOptions = {}): Promise<LockHandle> {
  const lockPath = getLockPath(metadataDir);
  const pid = options.pid ?? process.pid;
  const alive = options.isProcessAlive ?? isProcessAlive;
  const logger = options.logger ?? createNoopLogger();
  const waitMs = options.waitMs ?? 0;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const startTime = Date.now();

  for (;;) {
    const outcome = tryAcquire(lockPath, pid, alive, logger);

    if ('lockPath' in outcome) {
      logger.lock.debug('lock_acquired', { path: lockPath, pid }, `Acquired ${lockPath}`);
      return outcome;
    }

    const waited = Date.now() - startTime;
    if (waitMs <= 0) {
      throw createWtError('LOCK_HELD', {
        message: `Lock held by PID ${outcome.heldBy} (another wt process running?)`,
        path: lockPath,
        context: { pid: outcome.heldBy },
      });
    }
    if (waited >= waitMs) {
      throw createWtError('LOCK_TIMEOUT', {
        message: `Lock still held by PID ${outcome.heldBy} after ${formatDuration(waited)}`,
        path: lockPath,
        context: { pid: outcome.heldBy, waitedMs: waited },
      });
    }

    logger.lock.debug('lock_wait', { path: lockPath, holder: outcome.heldBy }, `Waiting for PID ${outcome.heldBy}`);
    await sleep(Math.min(pollIntervalMs, waitMs - waited));
  }
}

/**
 * Release a lock. Idempotent; a file that no longer carries this handle's
 * lock id is left alone.
 */
export function releaseLock(handle: LockHandle, logger: Logger = createNoopLogger()): void {
  if (handle.released) {
    return;
  }
  handle.released = true;

  const current = readLockRecord(handle.lockPath);
  if (current && current.lockId === handle.lockId) {
    removeIfPresent(handle.lockPath);
    logger.lock.debug('lock_released', { path: handle.lockPath }, `Released ${handle.lockPath}`);
  } else {
    logger.lock.warn('lock_not_owned', { path: handle.lockPath }, 'Lock file no longer belongs to this handle');
  }
}

/**
 * Run `fn` while holding the repository lock. The lock is released on every
 * exit path, including a throw from `fn`.
 */
export async function withRepoLock<T>(
  metadataDir: string,
  options: LockOptions,
  fn: (handle: LockHandle) => Promise<T>
): Promise<T> {
  const handle = await acquireLock(metadataDir, options);
  try {
    return await fn(handle);
  } finally {
    try {
      releaseLock(handle, options.logger);
    } catch (error) {
      // A failed release must not mask the operation's own outcome
      options.logger?.lock.error(
        'lock_release_failed',
        { path: handle.lockPath },
        `Failed to release lock: ${isWtError(error) ? error.message : String(error)}`
      );
    }
  }
}
