/**
 * Template Resolver Tests
 *
 * Covers template rendering, creation contexts, worktree root and path
 * resolution, and the hook environment projection.
 */

import { describe, expect, test } from 'vitest';
import { getDefaultConfig } from '../config.js';
import { isWtError } from '../errors.js';
import {
  buildTemplateContext,
  defaultWorktreeRoot,
  extendContext,
  findUnknownTemplateVariables,
  formatDateIso,
  formatTimeIso,
  renderTemplate,
  resolveWorktreePath,
  resolveWorktreeRoot,
  templateVariables,
  toHookEnv,
} from '../paths.js';
import type { WtConfig } from '../types.js';

// =============================================================================
// Test Helpers
// =============================================================================

const REPO = '/home/dev/src/app';
const FIXED_TIME = new Date(2024, 0, 5, 9, 3, 7);

function configWith(paths: Partial<WtConfig['paths']>): WtConfig {
  const base = getDefaultConfig();
  return { ...base, paths: { ...base.paths, ...paths } };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

// =============================================================================
// Rendering
// =============================================================================

describe('Template Resolver - renderTemplate', () => {
  test('substitutes every referenced variable', () => {
    const result = renderTemplate('$WT_ROOT/$BRANCH_NAME', {
      WT_ROOT: '/trees',
      BRANCH_NAME: 'feature/login',
    });
    expect(result).toBe('/trees/feature/login');
  });

  test('unknown variable fails instead of rendering empty', () => {
    const error = captureError(() => renderTemplate('$WT_ROOT/$NOPE', { WT_ROOT: '/trees' }));
    expect(isWtError(error, 'UNKNOWN_TEMPLATE_VARIABLE')).toBe(true);
    expect(isWtError(error) && error.message).toBe('Unknown template variable: $NOPE');
  });

  test('substituted values are never re-scanned', () => {
    const result = renderTemplate('$BRANCH_NAME', { BRANCH_NAME: '$REPO_ROOT', REPO_ROOT: '/secret' });
    expect(result).toBe('$REPO_ROOT');
  });

  test('lower-case names are left as literal text', () => {
    expect(renderTemplate('$WT_ROOT/$home', { WT_ROOT: '/trees' })).toBe('/trees/$home');
  });

  test('templateVariables lists names in order', () => {
    expect(templateVariables('$WT_ROOT/$DATE_ISO-$BRANCH_NAME')).toEqual(['WT_ROOT', 'DATE_ISO', 'BRANCH_NAME']);
  });

  test('unknown names are found per configured template', () => {
    expect(findUnknownTemplateVariables(getDefaultConfig())).toEqual([]);
    expect(
      findUnknownTemplateVariables(
        configWith({ worktreeRoot: '$REPO_ROOT/../$WT_ROOT', worktreePathTemplate: '$WT_ROOT/$DATE_ISO/$USER' })
      )
    ).toEqual(['paths.worktree_root: $WT_ROOT', 'paths.worktree_path_template: $USER']);
  });
});

// =============================================================================
// Context Construction
// =============================================================================

describe('Template Resolver - buildTemplateContext', () => {
  test('produces every creation variable', () => {
    const context = buildTemplateContext(
      { repoRoot: REPO, worktreeRoot: '/home/dev/src/app-worktrees', branchName: 'alice/login', sourceBranch: 'origin/main' },
      FIXED_TIME
    );

    expect(context).toEqual({
      REPO_ROOT: REPO,
      REPO_NAME: 'app',
      WT_ROOT: '/home/dev/src/app-worktrees',
      BRANCH_NAME: 'alice/login',
      SOURCE_BRANCH: 'origin/main',
      DATE_ISO: '2024-01-05',
      TIME_ISO: '09:03:07',
    });
  });

  test('context is frozen', () => {
    const context = buildTemplateContext(
      { repoRoot: REPO, worktreeRoot: '/trees', branchName: 'x', sourceBranch: 'origin/main' },
      FIXED_TIME
    );
    expect(Object.isFrozen(context)).toBe(true);
  });

  test('extendContext returns a new frozen context', () => {
    const context = Object.freeze({ A: '1' });
    const extended = extendContext(context, 'B', '2');
    expect(extended).toEqual({ A: '1', B: '2' });
    expect(context).toEqual({ A: '1' });
    expect(Object.isFrozen(extended)).toBe(true);
  });

  test('date and time are zero-padded', () => {
    const date = new Date(2023, 8, 1, 4, 5, 6);
    expect(formatDateIso(date)).toBe('2023-09-01');
    expect(formatTimeIso(date)).toBe('04:05:06');
  });
});

// =============================================================================
// Path Resolution
// =============================================================================

describe('Template Resolver - path resolution', () => {
  test('default worktree root is a sibling directory', () => {
    expect(defaultWorktreeRoot(REPO)).toBe('/home/dev/src/app-worktrees');
  });

  test('empty configured root falls back to the default', () => {
    expect(resolveWorktreeRoot(REPO, configWith({ worktreeRoot: '' }))).toBe('/home/dev/src/app-worktrees');
  });

  test('configured root may reference REPO_ROOT and REPO_NAME', () => {
    const config = configWith({ worktreeRoot: '$REPO_ROOT/../trees/$REPO_NAME' });
    expect(resolveWorktreeRoot(REPO, config)).toBe('/home/dev/src/trees/app');
  });

  test('relative configured root resolves against the repository', () => {
    expect(resolveWorktreeRoot(REPO, configWith({ worktreeRoot: '.trees' }))).toBe('/home/dev/src/app/.trees');
  });

  test('configured root cannot reference creation variables', () => {
    const error = captureError(() => resolveWorktreeRoot(REPO, configWith({ worktreeRoot: '/trees/$BRANCH_NAME' })));
    expect(isWtError(error, 'UNKNOWN_TEMPLATE_VARIABLE')).toBe(true);
  });

  test('branch slashes become nested directories', () => {
    const { path, worktreeRoot, context } = resolveWorktreePath(
      REPO,
      'alice/login',
      'origin/main',
      getDefaultConfig(),
      FIXED_TIME
    );

    expect(worktreeRoot).toBe('/home/dev/src/app-worktrees');
    expect(path).toBe('/home/dev/src/app-worktrees/alice/login');
    expect(context.WORKTREE_PATH).toBe(path);
    expect(context.BRANCH_NAME).toBe('alice/login');
  });

  test('identical inputs resolve to identical paths', () => {
    const config = configWith({ worktreePathTemplate: '$WT_ROOT/$DATE_ISO/$BRANCH_NAME' });
    const first = resolveWorktreePath(REPO, 'fix', 'origin/main', config, FIXED_TIME);
    const second = resolveWorktreePath(REPO, 'fix', 'origin/main', config, FIXED_TIME);

    expect(first.path).toBe('/home/dev/src/app-worktrees/2024-01-05/fix');
    expect(second.path).toBe(first.path);
  });

  test('unknown variable in the path template fails', () => {
    const config = configWith({ worktreePathTemplate: '$WT_ROOT/$TICKET' });
    const error = captureError(() => resolveWorktreePath(REPO, 'fix', 'origin/main', config, FIXED_TIME));
    expect(isWtError(error, 'UNKNOWN_TEMPLATE_VARIABLE')).toBe(true);
  });
});

// =============================================================================
// Hook Environment
// =============================================================================

describe('Template Resolver - toHookEnv', () => {
  test('exports every key with the WT_ prefix over the base environment', () => {
    const env = toHookEnv({ BRANCH_NAME: 'alice/login', REPO_NAME: 'app' }, { PATH: '/usr/bin', WT_BRANCH_NAME: 'stale' });
    expect(env).toEqual({
      PATH: '/usr/bin',
      WT_BRANCH_NAME: 'alice/login',
      WT_REPO_NAME: 'app',
    });
  });
});
