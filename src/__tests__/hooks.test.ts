/**
 * Hook Runner Tests
 *
 * Hooks are real `#!/bin/sh` scripts in temporary directories.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, readFileSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getDefaultConfig } from '../config.js';
import {
  allHooksSucceeded,
  discoverHooks,
  findNonExecutableHooks,
  getHookDirectories,
  hookCommand,
  isExecutableHook,
  readShebang,
  runHooks,
  type HookDirectory,
  type RunHooksOptions,
} from '../hooks.js';
import type { TemplateContext } from '../types.js';

// =============================================================================
// Test Helpers
// =============================================================================

let tempDir: string;
let localDir: string;
let globalDir: string;
let worktree: string;
let directories: HookDirectory[];

function writeHook(directory: string, name: string, body: string, mode: number = 0o755): string {
  mkdirSync(directory, { recursive: true });
  const path = join(directory, name);
  writeFileSync(path, `#!/bin/sh\n${body}\n`);
  chmodSync(path, mode);
  return path;
}

function context(): TemplateContext {
  return Object.freeze({
    REPO_ROOT: '/home/dev/src/app',
    REPO_NAME: 'app',
    BRANCH_NAME: 'alice/login',
    SOURCE_BRANCH: 'origin/main',
    WORKTREE_PATH: worktree,
  });
}

function options(overrides: Partial<RunHooksOptions> = {}): RunHooksOptions {
  return {
    cwd: worktree,
    context: context(),
    timeoutMs: 10000,
    continueOnError: false,
    env: { PATH: process.env.PATH },
    ...overrides,
  };
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'wt-hooks-'));
  localDir = join(tempDir, 'local');
  globalDir = join(tempDir, 'global');
  worktree = join(tempDir, 'worktree');
  mkdirSync(worktree);
  directories = [
    { path: localDir, origin: 'local' },
    { path: globalDir, origin: 'global' },
  ];
});

afterEach(() => {
  vi.unstubAllEnvs();
  rmSync(tempDir, { recursive: true, force: true });
});

// =============================================================================
// Discovery
// =============================================================================

describe('Hook Runner - discovery', () => {
  test('hook directories put local before global', () => {
    const config = getDefaultConfig();
    expect(getHookDirectories('/repo', '/home/dev/.config/wt', config)).toEqual([
      { path: '/repo/.wt/hooks/post_create.d', origin: 'local' },
      { path: '/home/dev/.config/wt/hooks/post_create.d', origin: 'global' },
    ]);
  });

  test('local hooks sort before global hooks, each by name', () => {
    writeHook(localDir, '20-b', 'true');
    writeHook(localDir, '10-a', 'true');
    writeHook(globalDir, '20-d', 'true');
    writeHook(globalDir, '10-c', 'true');

    const hooks = discoverHooks(directories, 'linux');

    expect(hooks.map((hook) => `${hook.origin}:${hook.name}:${hook.rank}`)).toEqual([
      'local:10-a:0',
      'local:20-b:1',
      'global:10-c:0',
      'global:20-d:1',
    ]);
    expect(hooks[0]?.kind).toBe('script');
    expect(hooks[0]?.interpreter).toEqual(['/bin/sh']);
  });

  test('hidden and non-executable files are not hooks', () => {
    writeHook(localDir, '10-run', 'true');
    writeHook(localDir, '.20-hidden', 'true');
    writeHook(localDir, 'setup.sh', 'true', 0o644);

    expect(discoverHooks(directories, 'linux').map((hook) => hook.name)).toEqual(['10-run']);
  });

  test('missing directories yield no hooks', () => {
    expect(discoverHooks([{ path: join(tempDir, 'absent'), origin: 'local' }], 'linux')).toEqual([]);
  });

  test('non-executable hook-like files are reported', () => {
    const setup = writeHook(localDir, 'setup.sh', 'true', 0o644);
    writeHook(localDir, 'README.md', 'docs', 0o644);
    writeHook(localDir, '.keep', '', 0o644);

    expect(findNonExecutableHooks(directories, 'linux')).toEqual([setup]);
    expect(findNonExecutableHooks(directories, 'win32')).toEqual([]);
  });

  test('dangling symlinks are skipped', () => {
    writeHook(localDir, '01-ok.sh', 'true');
    symlinkSync(join(tempDir, 'missing.sh'), join(localDir, '02-link.sh'));

    expect(discoverHooks(directories, 'linux').map((hook) => hook.name)).toEqual(['01-ok.sh']);
    expect(findNonExecutableHooks(directories, 'linux')).toEqual([]);
  });

  test('symlinks to executable files are hooks', () => {
    const target = writeHook(join(tempDir, 'shared'), 'setup', 'true');
    mkdirSync(localDir, { recursive: true });
    symlinkSync(target, join(localDir, '10-shared'));

    expect(discoverHooks(directories, 'linux').map((hook) => hook.name)).toEqual(['10-shared']);
  });

  test('readShebang splits the interpreter line', () => {
    mkdirSync(localDir, { recursive: true });
    const path = join(localDir, 'env-hook');
    writeFileSync(path, '#!/usr/bin/env bash -e\necho hi\n');
    expect(readShebang(path)).toEqual(['/usr/bin/env', 'bash', '-e']);

    const plain = join(localDir, 'plain');
    writeFileSync(plain, 'echo hi\n');
    expect(readShebang(plain)).toBeNull();
  });
});

// =============================================================================
// Windows Discovery
// =============================================================================

describe('Hook Runner - Windows discovery', () => {
  function writePlain(directory: string, name: string, content: string): string {
    mkdirSync(directory, { recursive: true });
    const path = join(directory, name);
    writeFileSync(path, content);
    chmodSync(path, 0o644);
    return path;
  }

  beforeEach(() => {
    vi.stubEnv('PATHEXT', '.COM;.EXE;.BAT;.CMD');
  });

  test('a PATHEXT suffix or a shebang makes a file executable', () => {
    const cmd = writePlain(localDir, '10-setup.cmd', '@echo off\r\n');
    const script = writePlain(localDir, '20-script', '#!/usr/bin/env bash\necho hi\n');
    const plain = writePlain(localDir, 'notes', 'echo hi\n');

    expect(isExecutableHook(cmd, 'win32')).toBe(true);
    expect(isExecutableHook(script, 'win32')).toBe(true);
    expect(isExecutableHook(plain, 'win32')).toBe(false);
    expect(isExecutableHook(cmd, 'linux')).toBe(false);
  });

  test('suffix matching ignores case', () => {
    const exe = writePlain(localDir, '30-TOOL.EXE', 'MZ');
    expect(isExecutableHook(exe, 'win32')).toBe(true);
  });

  test('hooks keep local-then-global order and get their kind', () => {
    writePlain(localDir, '20-script', '#!/usr/bin/env bash\necho hi\n');
    writePlain(localDir, '10-setup.cmd', '@echo off\r\n');
    writePlain(localDir, 'notes', 'echo hi\n');
    writePlain(globalDir, '05-global.bat', '@echo off\r\n');

    const hooks = discoverHooks(directories, 'win32');

    expect(hooks.map((hook) => `${hook.origin}:${hook.name}:${hook.rank}:${hook.kind}`)).toEqual([
      'local:10-setup.cmd:0:binary',
      'local:20-script:1:script',
      'global:05-global.bat:0:binary',
    ]);
    expect(hooks[1]?.interpreter).toEqual(['/usr/bin/env', 'bash']);
    expect(hooks[0]?.interpreter).toBeUndefined();
  });

  test('script hooks run through their interpreter by name', () => {
    const envScript = writePlain(localDir, '10-env', '#!/usr/bin/env bash -e\necho hi\n');
    const shScript = writePlain(localDir, '20-sh', '#!/bin/sh\necho hi\n');
    const cmd = writePlain(localDir, '30-setup.cmd', '@echo off\r\n');
    const [env, sh, binary] = discoverHooks(directories, 'win32');

    expect(env && hookCommand(env, 'win32')).toEqual({ command: 'bash', args: ['-e', envScript] });
    expect(sh && hookCommand(sh, 'win32')).toEqual({ command: 'sh', args: [shScript] });
    expect(binary && hookCommand(binary, 'win32')).toEqual({ command: cmd, args: [] });
    expect(sh && hookCommand(sh, 'linux')).toEqual({ command: shScript, args: [] });
  });
});

// =============================================================================
// Execution
// =============================================================================

describe('Hook Runner - execution', () => {
  test('hooks run in order with the worktree as cwd', async () => {
    writeHook(localDir, '20-b', 'echo b >> order.log');
    writeHook(localDir, '10-a', 'echo a >> order.log');
    writeHook(globalDir, '20-d', 'echo d >> order.log');
    writeHook(globalDir, '10-c', 'echo c >> order.log');

    const results = await runHooks(discoverHooks(directories, 'linux'), options());

    expect(results.map((result) => result.status)).toEqual(['succeeded', 'succeeded', 'succeeded', 'succeeded']);
    expect(readFileSync(join(worktree, 'order.log'), 'utf-8')).toBe('a\nb\nc\nd\n');
    expect(allHooksSucceeded(results)).toBe(true);
  });

  test('context is exported as WT_ variables', async () => {
    writeHook(localDir, '10-env', 'echo "$WT_BRANCH_NAME|$WT_SOURCE_BRANCH|$WT_REPO_NAME"\npwd -P');

    const [result] = await runHooks(discoverHooks(directories, 'linux'), options());

    expect(result?.stdout).toBe(`alice/login|origin/main|app\n${realpathSync(worktree)}`);
  });

  test('a failure skips the remaining hooks', async () => {
    writeHook(localDir, '10-fail', 'echo broken >&2\nexit 3');
    writeHook(localDir, '20-after', 'echo ran > after.log');

    const results = await runHooks(discoverHooks(directories, 'linux'), options());

    expect(results.map((result) => result.status)).toEqual(['failed', 'skipped']);
    expect(results[0]?.exitCode).toBe(3);
    expect(results[0]?.stderr).toBe('broken');
    expect(results[0]?.error?.code).toBe('HOOK_FAILED');
    expect(results[0]?.error?.message).toBe('10-fail exited with code 3');
    expect(results[1]?.exitCode).toBeNull();
    expect(allHooksSucceeded(results)).toBe(false);
  });

  test('continueOnError runs the remaining hooks', async () => {
    writeHook(localDir, '10-fail', 'exit 1');
    writeHook(localDir, '20-after', 'true');

    const results = await runHooks(discoverHooks(directories, 'linux'), options({ continueOnError: true }));

    expect(results.map((result) => result.status)).toEqual(['failed', 'succeeded']);
  });

  test('a hook past its timeout is terminated', async () => {
    writeHook(localDir, '10-slow', 'exec sleep 5');
    writeHook(localDir, '20-next', 'true');

    const started = Date.now();
    const results = await runHooks(
      discoverHooks(directories, 'linux'),
      options({ timeoutMs: 200, killGraceMs: 100 })
    );

    expect(results.map((result) => result.status)).toEqual(['timed_out', 'skipped']);
    expect(results[0]?.error?.code).toBe('HOOK_TIMEOUT');
    expect(results[0]?.error?.message).toBe('10-slow timed out after 200ms');
    expect(Date.now() - started).toBeLessThan(4000);
  });

  test('onResult sees every hook, skipped ones included', async () => {
    writeHook(localDir, '10-fail', 'exit 1');
    writeHook(localDir, '20-after', 'true');
    const seen: string[] = [];

    await runHooks(
      discoverHooks(directories, 'linux'),
      options({ onResult: (result) => seen.push(`${result.hook.name}:${result.status}`) })
    );

    expect(seen).toEqual(['10-fail:failed', '20-after:skipped']);
  });
});
