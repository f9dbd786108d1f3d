/**
 * wt - Template Resolver
 *
 * Expands `$NAME` placeholders into worktree paths and hook environments.
 * Substitution is literal: values are inserted verbatim and never re-scanned,
 * so a branch name or path can never inject another placeholder.
 */

import { basename, dirname, isAbsolute, join, resolve } from 'path';
import { createWtError } from './errors.js';
import type { TemplateContext, WtConfig } from './types.js';

// =============================================================================
// Constants
// =============================================================================

const VARIABLE_PATTERN = /\$([A-Z_][A-Z0-9_]*)/g;

/** Prefix for template variables exported to hooks */
export const HOOK_ENV_PREFIX = 'WT_';

/** Names available to `paths.worktree_root` */
export const ROOT_TEMPLATE_VARIABLES: readonly string[] = ['REPO_ROOT', 'REPO_NAME'];

/** Names available to `paths.worktree_path_template` */
export const PATH_TEMPLATE_VARIABLES: readonly string[] = [
  ...ROOT_TEMPLATE_VARIABLES,
  'WT_ROOT',
  'BRANCH_NAME',
  'SOURCE_BRANCH',
  'DATE_ISO',
  'TIME_ISO',
];

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * Inputs for a creation-time template context.
 */
export interface TemplateContextInput {
  repoRoot: string;
  worktreeRoot: string;
  branchName: string;
  sourceBranch: string;
  /** Known once the worktree path has been resolved */
  worktreePath?: string;
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * List the variable names a template references, in order of appearance.
 */
export function templateVariables(template: string): string[] {
  return Array.from(template.matchAll(VARIABLE_PATTERN), (match) => match[1]);
}

/**
 * Render a template against a context. Every referenced name must be present
 * in the context; an unknown name fails, it never renders as an empty string.
 */
export function renderTemplate(template: string, context: TemplateContext): string {
  return template.replace(VARIABLE_PATTERN, (_match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(context, name)) {
      throw createWtError('UNKNOWN_TEMPLATE_VARIABLE', {
        message: `Unknown template variable: $${name}`,
        context: { template, variable: name },
      });
    }
    return context[name];
  });
}

/**
 * Unknown variables in the configured path templates, as `<key>: $NAME`.
 * Found ahead of time so no creation has to fail on them.
 */
export function findUnknownTemplateVariables(config: WtConfig): string[] {
  const templates: Array<[string, string, readonly string[]]> = [
    ['paths.worktree_root', config.paths.worktreeRoot, ROOT_TEMPLATE_VARIABLES],
    ['paths.worktree_path_template', config.paths.worktreePathTemplate, PATH_TEMPLATE_VARIABLES],
  ];

  const unknown: string[] = [];
  for (const [key, template, known] of templates) {
    for (const name of templateVariables(template)) {
      if (!known.includes(name)) {
        unknown.push(`${key}: $${name}`);
      }
    }
  }
  return unknown;
}

// =============================================================================
// Context Construction
// =============================================================================

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local date as YYYY-MM-DD.
 */
export function formatDateIso(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Local time as HH:MM:SS.
 */
export function formatTimeIso(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Build the frozen context for one creation event.
 */
export function buildTemplateContext(
  input: TemplateContextInput,
  timestamp: Date = new Date()
): TemplateContext {
  const context: Record<string, string> = {
    REPO_ROOT: resolve(input.repoRoot),
    REPO_NAME: basename(resolve(input.repoRoot)),
    WT_ROOT: resolve(input.worktreeRoot),
    BRANCH_NAME: input.branchName,
    SOURCE_BRANCH: input.sourceBranch,
    DATE_ISO: formatDateIso(timestamp),
    TIME_ISO: formatTimeIso(timestamp),
  };

  if (input.worktreePath) {
    context.WORKTREE_PATH = resolve(input.worktreePath);
  }

  return Object.freeze(context);
}

/**
 * Return a copy of a context with one more variable.
 */
export function extendContext(context: TemplateContext, name: string, value: string): TemplateContext {
  return Object.freeze({ ...context, [name]: value });
}

// =============================================================================
// Path Resolution
// =============================================================================

/**
 * Default worktree root: a sibling directory named <repo>-worktrees.
 */
export function defaultWorktreeRoot(repoRoot: string): string {
  const absolute = resolve(repoRoot);
  return join(dirname(absolute), `${basename(absolute)}-worktrees`);
}

/**
 * Resolve the worktree root. The configured value is itself a template that
 * may reference $REPO_ROOT and $REPO_NAME; relative results are taken
 * relative to the repository root.
 */
export function resolveWorktreeRoot(repoRoot: string, config: WtConfig): string {
  const configured = config.paths.worktreeRoot.trim();
  if (!configured) {
    return defaultWorktreeRoot(repoRoot);
  }

  const absoluteRepo = resolve(repoRoot);
  const rendered = renderTemplate(configured, {
    REPO_ROOT: absoluteRepo,
    REPO_NAME: basename(absoluteRepo),
  });

  return isAbsolute(rendered) ? resolve(rendered) : resolve(absoluteRepo, rendered);
}

/**
 * Resolve the full worktree path for a branch. Slashes in the branch name are
 * kept, so `feature/login` becomes a nested `feature/login` directory.
 */
export function resolveWorktreePath(
  repoRoot: string,
  branchName: string,
  sourceBranch: string,
  config: WtConfig,
  timestamp: Date = new Date()
): { path: string; worktreeRoot: string; context: TemplateContext } {
  const worktreeRoot = resolveWorktreeRoot(repoRoot, config);
  const context = buildTemplateContext({ repoRoot, worktreeRoot, branchName, sourceBranch }, timestamp);
  const rendered = renderTemplate(config.paths.worktreePathTemplate, context);
  const path = isAbsolute(rendered) ? resolve(rendered) : resolve(repoRoot, rendered);

  return { path, worktreeRoot, context: extendContext(context, 'WORKTREE_PATH', path) };
}

// =============================================================================
// Hook Environment
// =============================================================================

/**
 * Merge a context into an environment: every key is exported as WT_<KEY>.
 */
export function toHookEnv(
  context: TemplateContext,
  baseEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv };

  for (const [key, value] of Object.entries(context)) {
    env[`${HOOK_ENV_PREFIX}${key.toUpperCase()}`] = value;
  }

  return env;
}
