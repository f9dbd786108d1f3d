/**
 * wt - Error Taxonomy
 *
 * Every failure the lifecycle engine reports carries a machine-readable code
 * from the table below. Fatal errors (gateway, lock, configuration) are thrown
 * and abort the whole operation; per-item errors (hooks, batch items) are
 * recorded on the item result and never thrown.
 */

// =============================================================================
// Error Types and Taxonomy
// =============================================================================

/**
 * Categories of errors.
 */
export type ErrorCategory =
  | 'TEMPLATE_ERROR'  // Path template references an unknown variable
  | 'LOCK_ERROR'      // Repository lock contention
  | 'VCS_ERROR'       // git refused or failed
  | 'HOOK_ERROR'      // Post-create hook failed or timed out
  | 'SAFETY_ERROR'    // Operation refused to protect work
  | 'CONFIG_ERROR'    // Configuration could not be loaded or validated
  | 'USER_ERROR';     // Bad input or missing target

/**
 * Severity levels for errors.
 */
export type ErrorSeverity =
  | 'fatal'    // Aborts the whole operation
  | 'error'    // Fails one item, the batch continues
  | 'warning'; // Reported, the item still counts as done

export type WtErrorCode =
  | 'UNKNOWN_TEMPLATE_VARIABLE'
  | 'LOCK_HELD'
  | 'LOCK_TIMEOUT'
  | 'VCS_COMMAND_FAILED'
  | 'BRANCH_CHECKED_OUT'
  | 'UPDATE_CONFLICT'
  | 'DIVERGED'
  | 'STASH_RESTORE_CONFLICT'
  | 'UNPUSHED_COMMITS'
  | 'SKIPPED_DIRTY'
  | 'HOOK_FAILED'
  | 'HOOK_TIMEOUT'
  | 'NOT_A_REPO'
  | 'SOURCE_NOT_FOUND'
  | 'WORKTREE_NOT_FOUND'
  | 'PATH_EXISTS'
  | 'CONFIG_INVALID'
  | 'CONFIRMATION_REQUIRED';

/**
 * Error code definition with default properties.
 */
export interface ErrorCodeDefinition {
  code: WtErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  retryable: boolean;
}

// =============================================================================
// Error Code Definitions
// =============================================================================

export const ERROR_DEFINITIONS: Record<WtErrorCode, ErrorCodeDefinition> = {
  UNKNOWN_TEMPLATE_VARIABLE: {
    code: 'UNKNOWN_TEMPLATE_VARIABLE',
    category: 'TEMPLATE_ERROR',
    severity: 'fatal',
    message: 'Template references an unknown variable',
    retryable: false,
  },
  LOCK_HELD: {
    code: 'LOCK_HELD',
    category: 'LOCK_ERROR',
    severity: 'fatal',
    message: 'Another wt process holds the repository lock',
    retryable: true,
  },
  LOCK_TIMEOUT: {
    code: 'LOCK_TIMEOUT',
    category: 'LOCK_ERROR',
    severity: 'fatal',
    message: 'Timed out waiting for the repository lock',
    retryable: true,
  },
  VCS_COMMAND_FAILED: {
    code: 'VCS_COMMAND_FAILED',
    category: 'VCS_ERROR',
    severity: 'fatal',
    message: 'git command failed',
    retryable: false,
  },
  BRANCH_CHECKED_OUT: {
    code: 'BRANCH_CHECKED_OUT',
    category: 'VCS_ERROR',
    severity: 'fatal',
    message: 'Branch is already checked out in another worktree',
    retryable: false,
  },
  UPDATE_CONFLICT: {
    code: 'UPDATE_CONFLICT',
    category: 'VCS_ERROR',
    severity: 'error',
    message: 'Update stopped on a conflict',
    retryable: false,
  },
  DIVERGED: {
    code: 'DIVERGED',
    category: 'VCS_ERROR',
    severity: 'error',
    message: 'Branch has diverged from base; fast-forward is not possible',
    retryable: false,
  },
  STASH_RESTORE_CONFLICT: {
    code: 'STASH_RESTORE_CONFLICT',
    category: 'VCS_ERROR',
    severity: 'warning',
    message: 'Stashed changes could not be restored cleanly',
    retryable: false,
  },
  UNPUSHED_COMMITS: {
    code: 'UNPUSHED_COMMITS',
    category: 'SAFETY_ERROR',
    severity: 'error',
    message: 'Branch has commits that are not on its upstream',
    retryable: false,
  },
  SKIPPED_DIRTY: {
    code: 'SKIPPED_DIRTY',
    category: 'SAFETY_ERROR',
    severity: 'error',
    message: 'Worktree has uncommitted changes',
    retryable: false,
  },
  HOOK_FAILED: {
    code: 'HOOK_FAILED',
    category: 'HOOK_ERROR',
    severity: 'error',
    message: 'Hook exited with a non-zero status',
    retryable: false,
  },
  HOOK_TIMEOUT: {
    code: 'HOOK_TIMEOUT',
    category: 'HOOK_ERROR',
    severity: 'error',
    message: 'Hook exceeded its time limit',
    retryable: false,
  },
  NOT_A_REPO: {
    code: 'NOT_A_REPO',
    category: 'USER_ERROR',
    severity: 'fatal',
    message: 'Not inside a git repository',
    retryable: false,
  },
  SOURCE_NOT_FOUND: {
    code: 'SOURCE_NOT_FOUND',
    category: 'USER_ERROR',
    severity: 'fatal',
    message: 'Source branch does not exist',
    retryable: false,
  },
  WORKTREE_NOT_FOUND: {
    code: 'WORKTREE_NOT_FOUND',
    category: 'USER_ERROR',
    severity: 'fatal',
    message: 'No worktree found for branch',
    retryable: false,
  },
  PATH_EXISTS: {
    code: 'PATH_EXISTS',
    category: 'USER_ERROR',
    severity: 'fatal',
    message: 'Target directory already exists',
    retryable: false,
  },
  CONFIG_INVALID: {
    code: 'CONFIG_INVALID',
    category: 'CONFIG_ERROR',
    severity: 'fatal',
    message: 'Configuration is invalid',
    retryable: false,
  },
  CONFIRMATION_REQUIRED: {
    code: 'CONFIRMATION_REQUIRED',
    category: 'USER_ERROR',
    severity: 'fatal',
    message: 'Destructive operation was not confirmed',
    retryable: false,
  },
};

// =============================================================================
// Error Class and Factory Functions
// =============================================================================

export interface WtErrorOptions {
  message?: string;
  /** Captured diagnostic text (stderr), shown in verbose output */
  details?: string;
  branch?: string;
  path?: string;
  context?: Record<string, string | number | boolean>;
  cause?: unknown;
}

/**
 * Structured error with machine-readable code.
 */
export class WtError extends Error {
  readonly code: WtErrorCode;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly retryable: boolean;
  readonly details?: string;
  readonly branch?: string;
  readonly path?: string;
  readonly context?: Record<string, string | number | boolean>;

  constructor(code: WtErrorCode, options: WtErrorOptions = {}) {
    const definition = ERROR_DEFINITIONS[code];
    super(options.message ?? definition.message, { cause: options.cause });
    this.name = 'WtError';
    this.code = code;
    this.category = definition.category;
    this.severity = definition.severity;
    this.retryable = definition.retryable;
    this.details = options.details;
    this.branch = options.branch;
    this.path = options.path;
    this.context = options.context;
  }
}

/**
 * Create a WtError from an error code.
 */
export function createWtError(code: WtErrorCode, options: WtErrorOptions = {}): WtError {
  return new WtError(code, options);
}

/**
 * Type guard for WtError, optionally narrowed to one code.
 */
export function isWtError(value: unknown, code?: WtErrorCode): value is WtError {
  if (!(value instanceof WtError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

/**
 * Wrap a native Error or unknown value as a WtError.
 */
export function wrapError(
  error: unknown,
  code: WtErrorCode,
  options: Omit<WtErrorOptions, 'cause'> = {}
): WtError {
  if (isWtError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new WtError(code, { message, ...options, cause: error });
}

// =============================================================================
// Error Reporting
// =============================================================================

/**
 * Format an error for display. The first line names the code, the message and
 * the branch or path involved; verbose output adds the captured diagnostics.
 */
export function formatError(error: WtError, verbose: boolean = false): string {
  let output = `${error.code}: ${error.message}`;

  if (error.branch && !error.message.includes(error.branch)) {
    output += ` (branch: ${error.branch})`;
  } else if (error.path && !error.message.includes(error.path)) {
    output += ` (path: ${error.path})`;
  }

  if (verbose) {
    if (error.details) {
      output += `\n  Details: ${error.details}`;
    }
    if (error.context) {
      output += `\n  Context: ${JSON.stringify(error.context)}`;
    }
  }

  return output;
}

/**
 * Get actionable suggestions for an error.
 */
export function getSuggestions(error: WtError): string[] {
  switch (error.code) {
    case 'UNKNOWN_TEMPLATE_VARIABLE':
      return [
        'Check paths.worktree_root and paths.worktree_path_template in your config',
        'Available variables: $REPO_ROOT $REPO_NAME $WT_ROOT $BRANCH_NAME $SOURCE_BRANCH $DATE_ISO $TIME_ISO',
      ];

    case 'LOCK_HELD':
    case 'LOCK_TIMEOUT':
      return [
        'Wait for the other wt command in this repository to finish',
        'Set lock.wait_seconds to wait instead of failing immediately',
      ];

    case 'BRANCH_CHECKED_OUT':
      return error.path
        ? [`Use the existing worktree: cd ${error.path}`]
        : ['Run: wt list'];

    case 'UNPUSHED_COMMITS':
      return ['Push the branch first, or pass --force to delete it anyway'];

    case 'SKIPPED_DIRTY':
      return ['Commit your changes, or pass --stash to stash them during the update'];

    case 'UPDATE_CONFLICT':
      return error.path
        ? [`Resolve the conflict in ${error.path}, or abort with git rebase --abort / git merge --abort`]
        : ['Resolve the conflict, or abort the rebase/merge'];

    case 'DIVERGED':
      return ['Use --strategy rebase or --strategy merge for diverged branches'];

    case 'STASH_RESTORE_CONFLICT':
      return ['Your changes are still in the stash: run git stash pop after resolving'];

    case 'HOOK_FAILED':
    case 'HOOK_TIMEOUT':
      return [
        'The worktree was created; fix the hook and re-run it by hand',
        'Set hooks.continue_on_error = true to run the remaining hooks anyway',
      ];

    case 'PATH_EXISTS':
      return ['Remove the directory, or pass --force if it is empty'];

    case 'SOURCE_NOT_FOUND':
      return ['Check the --from value, or run git fetch origin'];

    case 'CONFIRMATION_REQUIRED':
      return ['Re-run with --yes to confirm'];

    case 'NOT_A_REPO':
      return ['Run wt inside a git repository, or pass --repo <path>'];

    default:
      return error.retryable ? ['Wait a moment and retry'] : [];
  }
}
