/**
 * wt - Terminal Output
 *
 * stdout carries results only (paths, tables, JSON) so it can be piped;
 * progress, warnings and errors go to stderr.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { DoctorCheck, PruneItem, PullItem } from './lifecycle.js';
import type { HookResult, WorktreeEntry, WorktreeStatus } from './types.js';

// =============================================================================
// Settings
// =============================================================================

export type OutputLevel = 'info' | 'success' | 'warning' | 'error' | 'debug';

export interface OutputSettings {
  color: boolean;
  verbose: boolean;
}

const SYMBOLS = {
  info: 'i',
  success: '[ok]',
  warning: '[!]',
  error: '[x]',
  debug: '*',
} as const;

const settings: OutputSettings = {
  color: !process.env.NO_COLOR,
  verbose: false,
};

export function configureOutput(update: Partial<OutputSettings>): void {
  Object.assign(settings, update);
  if (!settings.color) {
    chalk.level = 0;
  }
}

export function isVerbose(): boolean {
  return settings.verbose;
}

// =============================================================================
// Printing
// =============================================================================

/**
 * Print a result line to stdout.
 */
export function print(message: string): void {
  console.log(message);
}

/**
 * Print a diagnostic line to stderr with level styling.
 */
export function report(message: string, level?: OutputLevel): void {
  if (level === 'debug' && !settings.verbose) {
    return;
  }

  switch (level) {
    case 'info':
      console.error(`${chalk.blue(SYMBOLS.info)} ${message}`);
      break;
    case 'success':
      console.error(`${chalk.green(SYMBOLS.success)} ${chalk.green(message)}`);
      break;
    case 'warning':
      console.error(`${chalk.yellow(SYMBOLS.warning)} ${chalk.yellow(message)}`);
      break;
    case 'error':
      console.error(`${chalk.red(SYMBOLS.error)} ${chalk.red(message)}`);
      break;
    case 'debug':
      console.error(`${chalk.gray(SYMBOLS.debug)} ${chalk.gray(message)}`);
      break;
    default:
      console.error(message);
  }
}

export function printJson(data: unknown, indent: number): void {
  console.log(JSON.stringify(data, null, indent));
}

/**
 * Render a table with cyan headers.
 */
export function renderTable(headers: string[], rows: string[][]): string {
  const table = new Table({
    head: headers.map((header) => chalk.cyan(header)),
    style: { head: [], border: [] },
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

// =============================================================================
// Formatters
// =============================================================================

function formatBranch(branch: string | null): string {
  return branch ?? chalk.gray('(detached)');
}

export function formatListTable(entries: WorktreeEntry[]): string {
  return renderTable(
    ['Branch', 'Path', 'HEAD', 'Flags'],
    entries.map((entry) => {
      const flags: string[] = [];
      if (entry.isBare) flags.push('bare');
      if (entry.locked !== null) flags.push(entry.locked ? `locked: ${entry.locked}` : 'locked');
      if (entry.prunable) flags.push('prunable');
      return [formatBranch(entry.branch), entry.path, entry.head.substring(0, 7), flags.join(', ')];
    })
  );
}

export function formatStatusTable(statuses: WorktreeStatus[]): string {
  return renderTable(
    ['', 'Branch', 'SHA', 'State', 'Upstream', 'Ahead', 'Behind', 'Behind base', 'Path'],
    statuses.map((status) => [
      status.isCurrent ? chalk.green('*') : '',
      formatBranch(status.branch),
      status.shaShort,
      status.error ? chalk.red('error') : status.isDirty ? chalk.yellow('dirty') : chalk.green('clean'),
      status.upstream ?? chalk.gray('-'),
      String(status.ahead),
      String(status.behind),
      String(status.behindBase),
      status.locked !== null ? `${status.path} ${chalk.gray('(locked)')}` : status.path,
    ])
  );
}

/**
 * JSON projection of a status row (snake_case keys).
 */
export function statusToJson(status: WorktreeStatus): Record<string, unknown> {
  return {
    path: status.path,
    branch: status.branch,
    sha: status.shaShort,
    dirty: status.isDirty,
    upstream: status.upstream,
    ahead: status.ahead,
    behind: status.behind,
    behind_base: status.behindBase,
    locked: status.locked,
    current: status.isCurrent,
    ...(status.error ? { error: { code: status.error.code, message: status.error.message } } : {}),
  };
}

export function entryToJson(entry: WorktreeEntry): Record<string, unknown> {
  return {
    path: entry.path,
    branch: entry.branch,
    sha: entry.head,
    is_bare: entry.isBare,
    locked: entry.locked,
    prunable: entry.prunable,
  };
}

export function formatHookResult(result: HookResult): string {
  const label = `${result.hook.origin}/${result.hook.name}`;
  switch (result.status) {
    case 'succeeded':
      return `hook ${label} succeeded`;
    case 'skipped':
      return `hook ${label} skipped`;
    default:
      return `hook ${label}: ${result.error?.message ?? result.status}`;
  }
}

export function formatPullItem(item: PullItem): string {
  const name = item.branch ?? '(detached)';
  const parts = [`${name}: ${item.outcome}`];
  if (item.error) parts.push(item.error.message);
  if (item.warning) parts.push(item.warning.message);
  if (item.note) parts.push(item.note);
  return parts.join(' - ');
}

export function formatPruneItem(item: PruneItem): string {
  if (item.error) {
    return `${item.branch}: ${item.error.message}`;
  }
  const done: string[] = [];
  if (item.worktreeRemoved) done.push('worktree removed');
  if (item.branchDeleted) done.push('branch deleted');
  return `${item.branch}: ${done.length > 0 ? done.join(', ') : 'no worktree'}`;
}

export function formatCheck(check: DoctorCheck): string {
  const symbol =
    check.status === 'ok' ? chalk.green('[ok]') : check.status === 'warn' ? chalk.yellow('[!]') : chalk.red('[x]');
  return `${symbol} ${check.name}: ${check.message}`;
}
