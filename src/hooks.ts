/**
 * wt - Hook Runner
 *
 * Discovers post-create hooks in the local (<repo>/.wt) and global config
 * directories and runs them in a deterministic order against a new worktree.
 * Local hooks always run before global hooks; within each directory hooks run
 * in ascending filename order.
 *
 * Hooks receive the creation's template context as WT_* environment
 * variables and run with the worktree as their working directory.
 */

import { spawn } from 'child_process';
import { accessSync, closeSync, constants, existsSync, openSync, readSync, readdirSync, statSync } from 'fs';
import { extname, join } from 'path';
import { createWtError } from './errors.js';
import { type Logger, createNoopLogger, formatDuration, truncateOutput } from './logger.js';
import { toHookEnv } from './paths.js';
import type { HookDescriptor, HookOrigin, HookResult, TemplateContext, WtConfig } from './types.js';

// =============================================================================
// Constants
// =============================================================================

/** Suffixes that look like hooks when found without the execute bit */
const HOOK_LIKE_SUFFIXES = ['.sh', '.bash', '.py', ''];

const DEFAULT_KILL_GRACE_MS = 2000;
const SHEBANG_READ_BYTES = 256;

// =============================================================================
// Type Definitions
// =============================================================================

export interface HookDirectory {
  path: string;
  origin: HookOrigin;
}

export interface RunHooksOptions {
  /** Working directory for every hook (the new worktree) */
  cwd: string;
  context: TemplateContext;
  timeoutMs: number;
  continueOnError: boolean;
  /** Base environment; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Delay between SIGTERM and SIGKILL on timeout */
  killGraceMs?: number;
  platform?: NodeJS.Platform;
  logger?: Logger;
  /** Called after each hook finishes, including skipped ones */
  onResult?: (result: HookResult) => void;
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * Hook directories for a repository: local first, then global.
 */
export function getHookDirectories(
  repoRoot: string,
  globalConfigDir: string,
  config: WtConfig,
  localConfigDir: string = join(repoRoot, '.wt')
): HookDirectory[] {
  return [
    { path: join(localConfigDir, config.hooks.postCreateDir), origin: 'local' },
    { path: join(globalConfigDir, config.hooks.postCreateDir), origin: 'global' },
  ];
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Whether a symlink resolves to a regular file. Dangling links do not.
 */
function linksToFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Regular, non-hidden files of a directory, sorted by name.
 */
function listCandidateFiles(directory: string): string[] {
  if (!existsSync(directory) || !statSync(directory).isDirectory()) {
    return [];
  }

  return readdirSync(directory, { withFileTypes: true })
    .filter((entry) => !entry.name.startsWith('.'))
    .filter((entry) => entry.isFile() || (entry.isSymbolicLink() && linksToFile(join(directory, entry.name))))
    .map((entry) => entry.name)
    .sort(compareCodeUnits);
}

/**
 * Interpreter from a `#!` first line, or null when the file has none.
 */
export function readShebang(path: string): string[] | null {
  const buffer = Buffer.alloc(SHEBANG_READ_BYTES);
  const fd = openSync(path, 'r');
  let bytesRead: number;
  try {
    bytesRead = readSync(fd, buffer, 0, SHEBANG_READ_BYTES, 0);
  } finally {
    closeSync(fd);
  }

  const head = buffer.subarray(0, bytesRead).toString('utf-8');
  if (!head.startsWith('#!')) {
    return null;
  }

  const firstLine = head.slice(2).split(/\r?\n/)[0] ?? '';
  const parts = firstLine.trim().split(/\s+/).filter((part) => part.length > 0);
  return parts.length > 0 ? parts : null;
}

function hasExecuteBit(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether a file can run as a hook. Windows has no execute bit, so a known
 * executable suffix or a `#!` line qualifies instead.
 */
export function isExecutableHook(path: string, platform: NodeJS.Platform = process.platform): boolean {
  if (platform !== 'win32') {
    return hasExecuteBit(path);
  }

  const pathExt = (process.env.PATHEXT ?? '.COM;.EXE;.BAT;.CMD')
    .split(';')
    .map((ext) => ext.toLowerCase())
    .filter((ext) => ext.length > 0);

  return pathExt.includes(extname(path).toLowerCase()) || readShebang(path) !== null;
}

/**
 * Discover hooks across directories in execution order.
 */
export function discoverHooks(
  directories: HookDirectory[],
  platform: NodeJS.Platform = process.platform
): HookDescriptor[] {
  const hooks: HookDescriptor[] = [];

  for (const directory of directories) {
    let rank = 0;
    for (const name of listCandidateFiles(directory.path)) {
      const path = join(directory.path, name);
      if (!isExecutableHook(path, platform)) {
        continue;
      }

      const interpreter = readShebang(path);
      hooks.push({
        path,
        name,
        origin: directory.origin,
        rank: rank++,
        kind: interpreter ? 'script' : 'binary',
        ...(interpreter ? { interpreter } : {}),
      });
    }
  }

  return hooks;
}

/**
 * Files that look like hooks but lack the execute bit (POSIX only).
 */
export function findNonExecutableHooks(
  directories: HookDirectory[],
  platform: NodeJS.Platform = process.platform
): string[] {
  if (platform === 'win32') {
    return [];
  }

  const found: string[] = [];
  for (const directory of directories) {
    for (const name of listCandidateFiles(directory.path)) {
      const path = join(directory.path, name);
      if (HOOK_LIKE_SUFFIXES.includes(extname(name)) && !hasExecuteBit(path)) {
        found.push(path);
      }
    }
  }
  return found;
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Command line for a hook. On POSIX the kernel honors the `#!` line itself.
 */
export function hookCommand(
  hook: HookDescriptor,
  platform: NodeJS.Platform = process.platform
): { command: string; args: string[] } {
  if (platform === 'win32' && hook.kind === 'script' && hook.interpreter) {
    // `/usr/bin/env bash` means "bash from PATH"
    const [first, ...rest] = hook.interpreter;
    const parts = first.endsWith('/env') && rest.length > 0 ? rest : [first.split('/').pop() ?? first, ...rest];
    const [command, ...args] = parts;
    return { command, args: [...args, hook.path] };
  }
  return { command: hook.path, args: [] };
}

function skippedResult(hook: HookDescriptor): HookResult {
  return { hook, status: 'skipped', exitCode: null, durationMs: 0, stdout: '', stderr: '' };
}

/**
 * Run one hook to completion or timeout.
 */
export function runHook(hook: HookDescriptor, options: RunHooksOptions): Promise<HookResult> {
  const logger = options.logger ?? createNoopLogger();
  const platform = options.platform ?? process.platform;
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  const env = toHookEnv(options.context, options.env ?? process.env);
  const { command, args } = hookCommand(hook, platform);

  return new Promise<HookResult>((resolvePromise) => {
    const startTime = Date.now();
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let spawnError: Error | null = null;
    let killTimer: NodeJS.Timeout | undefined;

    logger.hooks.debug('hook_start', { hook: hook.name, origin: hook.origin }, `Running ${hook.path}`);

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: platform === 'win32' && hook.kind === 'binary',
    });

    proc.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      logger.hooks.warn('hook_timeout', { hook: hook.name, timeout: options.timeoutMs }, `${hook.name} timed out, terminating`);
      proc.kill('SIGTERM');
      killTimer = setTimeout(() => proc.kill('SIGKILL'), killGraceMs);
    }, options.timeoutMs);

    proc.on('error', (error) => {
      spawnError = error;
    });

    proc.on('exit', () => {
      if (timedOut) {
        // Grandchildren may still hold the pipes open
        proc.stdout.destroy();
        proc.stderr.destroy();
      }
    });

    proc.on('close', (code) => {
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);

      const durationMs = Date.now() - startTime;
      const stdout = Buffer.concat(stdoutChunks).toString('utf-8').trim();
      const stderr = Buffer.concat(stderrChunks).toString('utf-8').trim();
      const base = { hook, durationMs, stdout, stderr };

      if (timedOut) {
        resolvePromise({
          ...base,
          status: 'timed_out',
          exitCode: null,
          error: createWtError('HOOK_TIMEOUT', {
            message: `${hook.name} timed out after ${formatDuration(options.timeoutMs)}`,
            path: hook.path,
            details: stderr,
          }),
        });
        return;
      }

      if (spawnError) {
        logger.hooks.error('hook_spawn_failed', { hook: hook.name }, spawnError.message);
        resolvePromise({
          ...base,
          status: 'failed',
          exitCode: null,
          error: createWtError('HOOK_FAILED', {
            message: `Failed to execute ${hook.name}: ${spawnError.message}`,
            path: hook.path,
            cause: spawnError,
          }),
        });
        return;
      }

      if (code !== 0) {
        logger.hooks.warn(
          'hook_failed',
          { hook: hook.name, exitCode: code ?? 'signal', duration: formatDuration(durationMs), stderr: truncateOutput(stderr, 500) },
          `${hook.name} failed`
        );
        resolvePromise({
          ...base,
          status: 'failed',
          exitCode: code,
          error: createWtError('HOOK_FAILED', {
            message: code === null ? `${hook.name} was terminated by a signal` : `${hook.name} exited with code ${code}`,
            path: hook.path,
            details: stderr,
          }),
        });
        return;
      }

      logger.hooks.info('hook_complete', { hook: hook.name, duration: formatDuration(durationMs) }, `${hook.name} succeeded`);
      resolvePromise({ ...base, status: 'succeeded', exitCode: 0 });
    });
  });
}

/**
 * Run hooks in order. Without continueOnError the first failure stops the
 * queue and every later hook is reported as skipped.
 */
export async function runHooks(hooks: HookDescriptor[], options: RunHooksOptions): Promise<HookResult[]> {
  const results: HookResult[] = [];
  let stopped = false;

  for (const hook of hooks) {
    const result = stopped ? skippedResult(hook) : await runHook(hook, options);
    results.push(result);
    options.onResult?.(result);

    if (result.status !== 'succeeded' && result.status !== 'skipped' && !options.continueOnError) {
      stopped = true;
    }
  }

  return results;
}

/**
 * Whether every hook that ran succeeded.
 */
export function allHooksSucceeded(results: HookResult[]): boolean {
  return results.every((result) => result.status === 'succeeded');
}
