/**
 * wt - Command Definitions
 *
 * The command table, argument parser and handlers behind the `wt` binary.
 * Handlers return an exit code; only the entry point touches process state.
 */

import { getLocalConfigDir, isUpdateStrategy, loadConfig } from './config.js';
import { type WtError, formatError, getSuggestions, isWtError } from './errors.js';
import {
  type LifecycleEvent,
  WorktreeLifecycle,
  discoverRepository,
} from './lifecycle.js';
import { createLogger } from './logger.js';
import { createGitGateway } from './managers/git.js';
import {
  configureOutput,
  entryToJson,
  formatCheck,
  formatHookResult,
  formatListTable,
  formatPruneItem,
  formatPullItem,
  formatStatusTable,
  isVerbose,
  print,
  printJson,
  report,
  statusToJson,
} from './output.js';
import { UPDATE_STRATEGIES, type WtConfig } from './types.js';

// =============================================================================
// Type Definitions
// =============================================================================

export interface Command {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  arguments: CommandArgument[];
  options: CommandOption[];
  examples: string[];
  handler: CommandHandler;
}

export interface CommandArgument {
  name: string;
  description: string;
  required: boolean;
}

export interface CommandOption {
  name: string;
  short?: string;
  description: string;
  type: 'boolean' | 'string';
  choices?: readonly string[];
  default?: boolean | string;
}

export type CommandHandler = (args: ParsedArgs) => Promise<number>;

export interface ParsedArgs {
  command: string;
  positional: string[];
  options: Record<string, boolean | string>;
}

export interface ParseError {
  type: 'unknown_command' | 'missing_argument' | 'invalid_option' | 'validation_error';
  message: string;
  suggestion?: string;
}

export type ParseResult =
  | { success: true; args: ParsedArgs }
  | { success: false; error: ParseError };

/**
 * Everything a repository command needs, built once per invocation.
 */
interface Session {
  lifecycle: WorktreeLifecycle;
  config: WtConfig;
  globalConfigPath: string;
  localConfigPath?: string;
}

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  INVALID_ARGS: 2,
  LOCK_CONTENTION: 3,
  CONFIRMATION_REQUIRED: 4,
} as const;

export const GLOBAL_OPTIONS: CommandOption[] = [
  { name: 'repo', description: 'Repository path (default: discovered from cwd)', type: 'string' },
  { name: 'config', description: 'Extra config file, above the local config', type: 'string' },
  { name: 'verbose', short: 'v', description: 'Show debug output', type: 'boolean' },
  { name: 'color', description: 'Colored output (--no-color to disable)', type: 'boolean', default: true },
  { name: 'version', description: 'Print the version', type: 'boolean' },
  { name: 'help', short: 'h', description: 'Show help', type: 'boolean' },
];

// =============================================================================
// Argument Parsing
// =============================================================================

function findCommand(name: string, commands: Map<string, Command>): Command | undefined {
  for (const [commandName, command] of commands) {
    if (commandName === name || command.aliases?.includes(name)) {
      return command;
    }
  }
  return undefined;
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Global options are accepted before and after the command name.
 */
export function parseArgs(argv: string[], commands: Map<string, Command>): ParseResult {
  const positional: string[] = [];
  const options: Record<string, boolean | string> = {};
  let command: Command | undefined;

  for (const opt of GLOBAL_OPTIONS) {
    if (opt.default !== undefined) options[opt.name] = opt.default;
  }

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    const available = command ? [...GLOBAL_OPTIONS, ...command.options] : GLOBAL_OPTIONS;

    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      const inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);

      if (name.startsWith('no-')) {
        const negated = available.find((o) => o.name === name.slice(3) && o.type === 'boolean');
        if (negated) {
          options[negated.name] = false;
          i++;
          continue;
        }
      }

      const opt = available.find((o) => o.name === name);
      if (!opt) {
        return {
          success: false,
          error: {
            type: 'invalid_option',
            message: `Unknown option: --${name}`,
            suggestion: command ? `Run 'wt help ${command.name}' for available options` : "Run 'wt help' for usage",
          },
        };
      }

      if (opt.type === 'boolean') {
        options[opt.name] = true;
      } else {
        const value = inlineValue ?? argv[++i];
        if (value === undefined) {
          return { success: false, error: { type: 'invalid_option', message: `Option --${name} requires a value` } };
        }
        options[opt.name] = value;
      }
    } else if (arg.startsWith('-') && arg.length === 2) {
      const opt = available.find((o) => o.short === arg[1]);
      if (!opt) {
        return { success: false, error: { type: 'invalid_option', message: `Unknown option: ${arg}` } };
      }
      if (opt.type === 'boolean') {
        options[opt.name] = true;
      } else {
        const value = argv[++i];
        if (value === undefined) {
          return { success: false, error: { type: 'invalid_option', message: `Option ${arg} requires a value` } };
        }
        options[opt.name] = value;
      }
    } else if (!command) {
      command = findCommand(arg, commands);
      if (!command) {
        return {
          success: false,
          error: {
            type: 'unknown_command',
            message: `Unknown command: ${arg}`,
            suggestion: `Available commands: ${Array.from(commands.keys()).join(', ')}`,
          },
        };
      }
      for (const opt of command.options) {
        if (opt.default !== undefined) options[opt.name] = opt.default;
      }
    } else {
      positional.push(arg);
    }

    i++;
  }

  if (!command) {
    if (options.version === true || options.help === true) {
      return { success: true, args: { command: options.version === true ? 'version' : 'help', positional, options } };
    }
    return {
      success: false,
      error: { type: 'missing_argument', message: 'No command specified', suggestion: "Run 'wt help' for usage" },
    };
  }

  if (options.help === true) {
    return { success: true, args: { command: 'help', positional: [command.name], options } };
  }

  for (const opt of command.options) {
    const value = options[opt.name];
    if (opt.choices && typeof value === 'string' && !opt.choices.includes(value)) {
      return {
        success: false,
        error: {
          type: 'validation_error',
          message: `Invalid value for --${opt.name}: ${value}`,
          suggestion: `Choices: ${opt.choices.join(', ')}`,
        },
      };
    }
  }

  for (let j = 0; j < command.arguments.length; j++) {
    const cmdArg = command.arguments[j];
    if (cmdArg.required && positional[j] === undefined) {
      return {
        success: false,
        error: {
          type: 'missing_argument',
          message: `Missing required argument: ${cmdArg.name}`,
          suggestion: `Usage: ${command.usage}`,
        },
      };
    }
  }

  return { success: true, args: { command: command.name, positional, options } };
}

function stringOption(args: ParsedArgs, name: string): string | undefined {
  const value = args.options[name];
  return typeof value === 'string' ? value : undefined;
}

function flag(args: ParsedArgs, name: string): boolean | undefined {
  const value = args.options[name];
  return typeof value === 'boolean' ? value : undefined;
}

// =============================================================================
// Error Handling
// =============================================================================

/**
 * Exit code for an error that aborted a command.
 */
export function exitCodeFor(error: WtError): number {
  switch (error.code) {
    case 'LOCK_HELD':
    case 'LOCK_TIMEOUT':
      return EXIT_CODES.LOCK_CONTENTION;
    case 'CONFIRMATION_REQUIRED':
      return EXIT_CODES.CONFIRMATION_REQUIRED;
    default:
      return EXIT_CODES.FAILURE;
  }
}

/**
 * Report an error with suggestions and return the exit code.
 */
export function handleError(error: unknown): number {
  if (isWtError(error)) {
    report(formatError(error, isVerbose()), 'error');
    for (const suggestion of getSuggestions(error)) {
      report(suggestion, 'info');
    }
    return exitCodeFor(error);
  }

  report(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`, 'error');
  if (isVerbose() && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  return EXIT_CODES.FAILURE;
}

// =============================================================================
// Session Setup
// =============================================================================

function subscribeToEvents(lifecycle: WorktreeLifecycle): void {
  lifecycle.on((event: LifecycleEvent) => {
    switch (event.type) {
      case 'lock_acquired':
        report(`Acquired ${event.lockPath}`, 'debug');
        break;
      case 'refreshed':
        report('Fetched from origin', 'debug');
        break;
      case 'planned':
        if (event.operation === 'prune-merged' && event.targets.length > 0) {
          report(`Found ${event.targets.length} merged branch(es):`);
          for (const branch of event.targets) report(`  - ${branch}`);
        } else if (event.operation === 'remove') {
          report(`Removing worktree at ${event.targets.join(', ')}`);
        }
        break;
      case 'worktree_created':
        report(`Created worktree for '${event.branch}' at ${event.path}`, 'success');
        break;
      case 'hook_finished':
        if (event.result.status === 'succeeded' || event.result.status === 'skipped') {
          report(formatHookResult(event.result), 'debug');
        } else {
          report(formatHookResult(event.result), 'error');
          if (event.result.stdout) report(event.result.stdout);
          if (event.result.stderr) report(event.result.stderr);
        }
        break;
      case 'warning':
        report(event.message, 'warning');
        break;
      case 'item_finished':
      case 'lock_released':
        break;
    }
  });
}

async function openSession(args: ParsedArgs): Promise<Session> {
  const logger = createLogger({ consoleLevel: flag(args, 'verbose') ? 'debug' : 'warn' });
  const git = createGitGateway({ logger });
  const repo = await discoverRepository(git, stringOption(args, 'repo') ?? process.cwd());
  const loaded = loadConfig({ repoRoot: repo.root, configFile: stringOption(args, 'config') });

  const lifecycle = new WorktreeLifecycle({
    repo,
    config: loaded.config,
    git,
    logger,
    globalConfigDir: loaded.globalConfigDir,
    localConfigDir: getLocalConfigDir(repo.root),
  });
  subscribeToEvents(lifecycle);

  return {
    lifecycle,
    config: loaded.config,
    globalConfigPath: loaded.globalConfigPath,
    localConfigPath: loaded.localConfigPath,
  };
}

// =============================================================================
// Command Handlers
// =============================================================================

async function handleNew(args: ParsedArgs): Promise<number> {
  const { lifecycle } = await openSession(args);
  const result = await lifecycle.create({
    branch: args.positional[0],
    from: stringOption(args, 'from'),
    track: flag(args, 'track'),
    force: flag(args, 'force'),
  });

  if (result.upstream) {
    report(`Set upstream to ${result.upstream}`, 'info');
  }
  print(result.path);

  if (!result.ok) {
    report('Worktree created, but post-create hooks failed', 'error');
    return EXIT_CODES.FAILURE;
  }
  return EXIT_CODES.SUCCESS;
}

async function handleList(args: ParsedArgs): Promise<number> {
  const { lifecycle, config } = await openSession(args);
  const entries = await lifecycle.list();

  if (flag(args, 'json')) {
    printJson(entries.map(entryToJson), config.ui.jsonIndent);
  } else {
    print(formatListTable(entries));
  }
  return EXIT_CODES.SUCCESS;
}

async function handleStatus(args: ParsedArgs): Promise<number> {
  const { lifecycle, config } = await openSession(args);
  const statuses = await lifecycle.status({ fetch: flag(args, 'fetch'), base: stringOption(args, 'base') });

  if (flag(args, 'json')) {
    printJson(statuses.map(statusToJson), config.ui.jsonIndent);
  } else {
    print(formatStatusTable(statuses));
    for (const status of statuses) {
      if (status.error) report(`${status.path}: ${status.error.message}`, 'warning');
    }
  }
  return statuses.some((status) => status.error) ? EXIT_CODES.FAILURE : EXIT_CODES.SUCCESS;
}

async function handleRemove(args: ParsedArgs): Promise<number> {
  const { lifecycle } = await openSession(args);
  const result = await lifecycle.remove({
    branch: args.positional[0],
    yes: flag(args, 'yes'),
    deleteBranch: flag(args, 'delete-branch'),
    force: flag(args, 'force'),
  });

  report(`Removed worktree at ${result.path}`, 'success');
  if (result.branchDeleted) {
    report(`Deleted branch '${result.branch}'`, 'success');
  }
  return EXIT_CODES.SUCCESS;
}

async function handlePullMain(args: ParsedArgs): Promise<number> {
  const { lifecycle } = await openSession(args);
  const strategy = stringOption(args, 'strategy');
  const result = await lifecycle.pullMain({
    base: stringOption(args, 'base'),
    strategy: strategy !== undefined && isUpdateStrategy(strategy) ? strategy : undefined,
    stash: flag(args, 'stash'),
  });

  report(`Updating worktrees from ${result.base} (${result.strategy})`, 'info');
  for (const item of result.items) {
    const level = item.outcome === 'failed' ? 'error' : item.warning || item.error ? 'warning' : 'success';
    report(formatPullItem(item), level);
  }
  return result.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
}

async function handlePruneMerged(args: ParsedArgs): Promise<number> {
  const { lifecycle } = await openSession(args);
  const protectedList = stringOption(args, 'protected');
  const result = await lifecycle.pruneMerged({
    base: stringOption(args, 'base'),
    protected: protectedList?.split(',').map((name) => name.trim()).filter((name) => name.length > 0),
    yes: flag(args, 'yes'),
    deleteBranch: flag(args, 'delete-branch'),
    force: flag(args, 'force'),
  });

  if (result.candidates.length === 0) {
    report(`Nothing to prune (no branches merged into ${result.base})`, 'info');
    return EXIT_CODES.SUCCESS;
  }

  for (const item of result.items) {
    report(formatPruneItem(item), item.error ? 'error' : 'success');
  }
  return result.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
}

async function handleWhere(args: ParsedArgs): Promise<number> {
  const { lifecycle } = await openSession(args);
  print(await lifecycle.where(args.positional[0]));
  return EXIT_CODES.SUCCESS;
}

async function handleGc(args: ParsedArgs): Promise<number> {
  const { lifecycle } = await openSession(args);
  const result = await lifecycle.gc();

  report(`Pruned ${result.prunedEntries} stale worktree entr${result.prunedEntries === 1 ? 'y' : 'ies'}`, 'success');
  for (const directory of result.removedDirectories) {
    report(`Removed empty directory ${directory}`, 'debug');
  }
  report(`Removed ${result.removedDirectories.length} empty director${result.removedDirectories.length === 1 ? 'y' : 'ies'} under ${result.worktreeRoot}`, 'success');
  return EXIT_CODES.SUCCESS;
}

async function handleDoctor(args: ParsedArgs): Promise<number> {
  let session: Session;
  try {
    session = await openSession(args);
  } catch (error) {
    if (isWtError(error, 'NOT_A_REPO') || isWtError(error, 'CONFIG_INVALID')) {
      print(formatCheck({ name: error.code === 'NOT_A_REPO' ? 'repository' : 'config', status: 'fail', message: error.message }));
      return EXIT_CODES.FAILURE;
    }
    throw error;
  }

  const doctorReport = await session.lifecycle.doctor({
    global: session.globalConfigPath,
    local: session.localConfigPath,
  });

  for (const check of doctorReport.checks) {
    print(formatCheck(check));
    for (const detail of check.details ?? []) {
      print(`    ${detail}`);
    }
  }

  const failures = doctorReport.checks.filter((check) => check.status === 'fail').length;
  print('');
  print(failures === 0 ? 'All checks passed' : `Found ${failures} issue(s)`);
  return doctorReport.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
}

function formatOptionLine(opt: CommandOption): string {
  const shortStr = opt.short ? `-${opt.short}, ` : '    ';
  const valueStr = opt.type === 'string' ? ` <${opt.choices ? opt.choices.join('|') : 'value'}>` : '';
  return `  ${shortStr}--${`${opt.name}${valueStr}`.padEnd(28)} ${opt.description}`;
}

async function handleHelp(args: ParsedArgs, commands: Map<string, Command>): Promise<number> {
  const commandName = args.positional[0];

  if (commandName) {
    const command = findCommand(commandName, commands);
    if (!command) {
      report(`Unknown command: ${commandName}`, 'error');
      return EXIT_CODES.INVALID_ARGS;
    }

    print(`Usage: ${command.usage}`);
    print('');
    print(command.description);
    if (command.aliases?.length) {
      print(`Aliases: ${command.aliases.join(', ')}`);
    }

    if (command.arguments.length > 0) {
      print('');
      print('Arguments:');
      for (const arg of command.arguments) {
        print(`  ${arg.name.padEnd(15)} ${arg.description}${arg.required ? '' : ' (optional)'}`);
      }
    }

    if (command.options.length > 0) {
      print('');
      print('Options:');
      for (const opt of command.options) print(formatOptionLine(opt));
    }

    if (command.examples.length > 0) {
      print('');
      print('Examples:');
      for (const example of command.examples) print(`  ${example}`);
    }
    return EXIT_CODES.SUCCESS;
  }

  print('wt - git worktree lifecycle manager');
  print('');
  print('Usage: wt [global options] <command> [options]');
  print('');
  print('Commands:');
  const commandList = Array.from(commands.values());
  const maxLen = Math.max(...commandList.map((c) => c.name.length));
  for (const cmd of commandList) {
    print(`  ${cmd.name.padEnd(maxLen + 2)} ${cmd.description}`);
  }
  print('');
  print('Global options:');
  for (const opt of GLOBAL_OPTIONS) print(formatOptionLine(opt));
  print('');
  print("Run 'wt help <command>' for details.");
  return EXIT_CODES.SUCCESS;
}

// =============================================================================
// Command Definitions
// =============================================================================

const JSON_OPTION: CommandOption = { name: 'json', description: 'Output as JSON', type: 'boolean' };
const BASE_OPTION: CommandOption = { name: 'base', description: 'Base branch (default: update.base)', type: 'string' };

/**
 * Define all CLI commands.
 */
export function defineCommands(): Map<string, Command> {
  const commands = new Map<string, Command>();

  commands.set('new', {
    name: 'new',
    description: 'Create a worktree for a branch and run post-create hooks',
    usage: 'wt new <branch> [--from <ref>] [--track] [--force]',
    arguments: [{ name: 'branch', description: 'Branch name (auto-prefix applied)', required: true }],
    options: [
      { name: 'from', description: 'Source ref for a new branch (default: update.base)', type: 'string' },
      { name: 'track', description: 'Track origin/<branch> when it exists', type: 'boolean' },
      { name: 'force', description: 'Reuse the target directory if it is empty', type: 'boolean' },
    ],
    examples: ['wt new feature/login', 'wt new hotfix --from origin/release-1.2', 'cd "$(wt new spike)"'],
    handler: handleNew,
  });

  commands.set('list', {
    name: 'list',
    aliases: ['ls'],
    description: 'List registered worktrees',
    usage: 'wt list [--json]',
    arguments: [],
    options: [JSON_OPTION],
    examples: ['wt list', 'wt list --json'],
    handler: handleList,
  });

  commands.set('status', {
    name: 'status',
    description: 'Show dirty state and ahead/behind counts for every worktree',
    usage: 'wt status [--json] [--fetch] [--base <ref>]',
    arguments: [],
    options: [
      JSON_OPTION,
      { name: 'fetch', description: 'Fetch origin first', type: 'boolean' },
      BASE_OPTION,
    ],
    examples: ['wt status', 'wt status --fetch --json'],
    handler: handleStatus,
  });

  commands.set('rm', {
    name: 'rm',
    aliases: ['remove'],
    description: "Remove a branch's worktree",
    usage: 'wt rm <branch> --yes [--delete-branch] [--force]',
    arguments: [{ name: 'branch', description: 'Branch whose worktree to remove', required: true }],
    options: [
      { name: 'yes', short: 'y', description: 'Confirm the removal', type: 'boolean' },
      { name: 'delete-branch', description: 'Also delete the branch', type: 'boolean' },
      { name: 'force', description: 'Discard local changes and unpushed commits', type: 'boolean' },
    ],
    examples: ['wt rm feature/login --yes', 'wt rm spike --yes --delete-branch --force'],
    handler: handleRemove,
  });

  commands.set('pull-main', {
    name: 'pull-main',
    description: 'Update every worktree from the base branch',
    usage: 'wt pull-main [--base <ref>] [--strategy rebase|merge|ff-only] [--stash]',
    arguments: [],
    options: [
      BASE_OPTION,
      { name: 'strategy', description: 'Update strategy (default: update.strategy)', type: 'string', choices: UPDATE_STRATEGIES },
      { name: 'stash', description: 'Stash dirty worktrees around the update', type: 'boolean' },
    ],
    examples: ['wt pull-main', 'wt pull-main --strategy ff-only', 'wt pull-main --stash'],
    handler: handlePullMain,
  });

  commands.set('prune-merged', {
    name: 'prune-merged',
    description: 'Remove worktrees of branches merged into the base branch',
    usage: 'wt prune-merged --yes [--base <ref>] [--protected a,b] [--delete-branch] [--force]',
    arguments: [],
    options: [
      BASE_OPTION,
      { name: 'protected', description: 'Comma-separated branches to keep (default: prune.protected)', type: 'string' },
      { name: 'yes', short: 'y', description: 'Confirm the pruning', type: 'boolean' },
      { name: 'delete-branch', description: 'Also delete the merged branches', type: 'boolean' },
      { name: 'force', description: 'Delete branches with unpushed commits', type: 'boolean' },
    ],
    examples: ['wt prune-merged', 'wt prune-merged --yes --delete-branch'],
    handler: handlePruneMerged,
  });

  commands.set('where', {
    name: 'where',
    aliases: ['open'],
    description: "Print the path of a branch's worktree",
    usage: 'wt where <branch>',
    arguments: [{ name: 'branch', description: 'Branch name', required: true }],
    options: [],
    examples: ['cd "$(wt where feature/login)"'],
    handler: handleWhere,
  });

  commands.set('gc', {
    name: 'gc',
    description: 'Prune stale registry entries and empty directories',
    usage: 'wt gc',
    arguments: [],
    options: [],
    examples: ['wt gc'],
    handler: handleGc,
  });

  commands.set('doctor', {
    name: 'doctor',
    description: 'Check git, configuration, worktree root and hooks',
    usage: 'wt doctor',
    arguments: [],
    options: [],
    examples: ['wt doctor'],
    handler: handleDoctor,
  });

  commands.set('help', {
    name: 'help',
    description: 'Show help for a command',
    usage: 'wt help [command]',
    arguments: [{ name: 'command', description: 'Command name', required: false }],
    options: [],
    examples: ['wt help', 'wt help pull-main'],
    handler: async (args) => handleHelp(args, commands),
  });

  return commands;
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Run the CLI and return its exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const commands = defineCommands();
  const parseResult = parseArgs(argv, commands);

  if (!parseResult.success) {
    report(`Error: ${parseResult.error.message}`, 'error');
    if (parseResult.error.suggestion) {
      report(parseResult.error.suggestion, 'info');
    }
    return EXIT_CODES.INVALID_ARGS;
  }

  const { args } = parseResult;
  configureOutput({ color: flag(args, 'color') !== false, verbose: flag(args, 'verbose') === true });

  if (args.command === 'version') {
    print(`wt v${VERSION}`);
    return EXIT_CODES.SUCCESS;
  }

  const command = commands.get(args.command);
  if (!command) {
    report(`Unknown command: ${args.command}`, 'error');
    return EXIT_CODES.INVALID_ARGS;
  }

  try {
    return await command.handler(args);
  } catch (error) {
    return handleError(error);
  }
}

