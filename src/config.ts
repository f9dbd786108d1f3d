/**
 * wt - Configuration
 *
 * Loads TOML configuration with precedence CLI > --config file > local >
 * global > defaults, validates the merged result, and converts it into the
 * immutable WtConfig the rest of the engine consumes.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { parse as parseToml } from 'smol-toml';
import { z, type ZodError } from 'zod';
import { createWtError } from './errors.js';
import { UPDATE_STRATEGIES, type WtConfig } from './types.js';

// =============================================================================
// Constants
// =============================================================================

export const CONFIG_FILE_NAME = 'config.toml';
export const LOCAL_CONFIG_DIR = '.wt';

/** Largest hook timeout a Node timer can hold (2^31 - 1 ms) */
export const MAX_HOOK_TIMEOUT_SECONDS = 2147483;

/**
 * Raw (snake-cased) configuration tree.
 */
export type RawConfig = { [key: string]: unknown };

export const DEFAULT_RAW_CONFIG: RawConfig = {
  paths: {
    worktree_root: '',
    worktree_path_template: '$WT_ROOT/$BRANCH_NAME',
  },
  branches: {
    auto_prefix: '',
  },
  hooks: {
    post_create_dir: 'hooks/post_create.d',
    continue_on_error: false,
    timeout_seconds: 300,
  },
  update: {
    base: 'origin/main',
    strategy: 'rebase',
    auto_stash: false,
  },
  prune: {
    protected: ['main', 'master', 'develop'],
    delete_branch_with_worktree: false,
  },
  lock: {
    wait_seconds: 0,
  },
  ui: {
    json_indent: 2,
  },
};

// =============================================================================
// Schema
// =============================================================================

const strategySchema = z.enum(['rebase', 'merge', 'ff-only']);

const rawConfigSchema = z.object({
  paths: z.object({
    worktree_root: z.string(),
    worktree_path_template: z.string().min(1, 'worktree_path_template cannot be empty'),
  }),
  branches: z.object({
    auto_prefix: z.string(),
  }),
  hooks: z.object({
    post_create_dir: z.string().min(1, 'post_create_dir cannot be empty'),
    continue_on_error: z.boolean(),
    timeout_seconds: z
      .number()
      .positive('timeout_seconds must be positive')
      .max(MAX_HOOK_TIMEOUT_SECONDS, `timeout_seconds cannot exceed ${MAX_HOOK_TIMEOUT_SECONDS}`),
  }),
  update: z.object({
    base: z.string().min(1, 'base cannot be empty'),
    strategy: strategySchema,
    auto_stash: z.boolean(),
  }),
  prune: z.object({
    protected: z.array(z.string()),
    delete_branch_with_worktree: z.boolean(),
  }),
  lock: z.object({
    wait_seconds: z.number().nonnegative('wait_seconds cannot be negative'),
  }),
  ui: z.object({
    json_indent: z.number().int().min(0).max(8),
  }),
});

type ValidatedRawConfig = z.infer<typeof rawConfigSchema>;

// =============================================================================
// Locations
// =============================================================================

/**
 * Directory holding the global config and global hooks.
 * WT_CONFIG_HOME overrides ~/.config/wt.
 */
export function getGlobalConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.WT_CONFIG_HOME || join(homedir(), '.config', 'wt');
}

export function getGlobalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getGlobalConfigDir(env), CONFIG_FILE_NAME);
}

export function getLocalConfigDir(repoRoot: string): string {
  return join(repoRoot, LOCAL_CONFIG_DIR);
}

export function getLocalConfigPath(repoRoot: string): string {
  return join(getLocalConfigDir(repoRoot), CONFIG_FILE_NAME);
}

// =============================================================================
// Loading and Merging
// =============================================================================

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Merge two config trees. Tables merge recursively; arrays and scalars in
 * the override replace the base value.
 */
export function mergeConfigs(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      result[key] = mergeConfigs(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Load one TOML file. A missing file is an empty table.
 */
export function loadTomlFile(path: string): RawConfig {
  if (!existsSync(path)) {
    return {};
  }

  try {
    return parseToml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw createWtError('CONFIG_INVALID', {
      message: `Failed to load config from ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path,
      cause: error,
    });
  }
}

function describeIssues(error: ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a merged raw tree and convert it to WtConfig.
 */
export function validateConfig(raw: RawConfig, source: string = 'configuration'): WtConfig {
  const parsed = rawConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw createWtError('CONFIG_INVALID', {
      message: `Invalid ${source}: ${describeIssues(parsed.error)}`,
    });
  }
  return toWtConfig(parsed.data);
}

function toWtConfig(raw: ValidatedRawConfig): WtConfig {
  return {
    paths: {
      worktreeRoot: raw.paths.worktree_root,
      worktreePathTemplate: raw.paths.worktree_path_template,
    },
    branches: {
      autoPrefix: raw.branches.auto_prefix,
    },
    hooks: {
      postCreateDir: raw.hooks.post_create_dir,
      continueOnError: raw.hooks.continue_on_error,
      timeoutSeconds: raw.hooks.timeout_seconds,
    },
    update: {
      base: raw.update.base,
      strategy: raw.update.strategy,
      autoStash: raw.update.auto_stash,
    },
    prune: {
      protected: [...raw.prune.protected],
      deleteBranchWithWorktree: raw.prune.delete_branch_with_worktree,
    },
    lock: {
      waitSeconds: raw.lock.wait_seconds,
    },
    ui: {
      jsonIndent: raw.ui.json_indent,
    },
  };
}

/**
 * Options for loadConfig.
 */
export interface LoadConfigOptions {
  /** Repository root; no local config is read when omitted */
  repoRoot?: string;
  /** Explicit config file (--config), merged above the local file */
  configFile?: string;
  /** Raw overrides from CLI flags, highest precedence */
  overrides?: RawConfig;
  env?: NodeJS.ProcessEnv;
}

/**
 * Where a loaded configuration came from.
 */
export interface LoadedConfig {
  config: WtConfig;
  globalConfigPath: string;
  globalConfigDir: string;
  localConfigPath?: string;
  localConfigDir?: string;
  /** Files that existed and were merged, lowest precedence first */
  sources: string[];
}

/**
 * Load configuration with precedence: CLI > --config > local > global > defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const globalConfigPath = getGlobalConfigPath(options.env);
  const sources: string[] = [];
  let merged: RawConfig = DEFAULT_RAW_CONFIG;

  const layers: string[] = [globalConfigPath];
  const localConfigPath = options.repoRoot ? getLocalConfigPath(options.repoRoot) : undefined;
  if (localConfigPath) {
    layers.push(localConfigPath);
  }
  if (options.configFile) {
    if (!existsSync(options.configFile)) {
      throw createWtError('CONFIG_INVALID', {
        message: `Config file not found: ${options.configFile}`,
        path: options.configFile,
      });
    }
    layers.push(options.configFile);
  }

  for (const layer of layers) {
    if (existsSync(layer)) {
      merged = mergeConfigs(merged, loadTomlFile(layer));
      sources.push(layer);
    }
  }

  if (options.overrides) {
    merged = mergeConfigs(merged, options.overrides);
  }

  const source = sources.length > 0 ? `configuration (${sources.join(', ')})` : 'configuration';

  return {
    config: validateConfig(merged, source),
    globalConfigPath,
    globalConfigDir: dirname(globalConfigPath),
    localConfigPath,
    localConfigDir: localConfigPath ? dirname(localConfigPath) : undefined,
    sources,
  };
}

/**
 * Configuration with every default applied.
 */
export function getDefaultConfig(): WtConfig {
  return validateConfig(DEFAULT_RAW_CONFIG, 'default configuration');
}

/**
 * Type guard for strategy names coming from CLI flags.
 */
export function isUpdateStrategy(value: string): value is WtConfig['update']['strategy'] {
  return UPDATE_STRATEGIES.some((strategy) => strategy === value);
}
