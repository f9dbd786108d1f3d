/**
 * wt - Library Entry Point
 *
 * Re-exports the lifecycle engine and its building blocks for programmatic
 * use. The `wt` binary lives in cli.ts.
 */

export * from './types.js';
export * from './errors.js';
export * from './paths.js';
export * from './lock.js';
export * from './hooks.js';
export * from './config.js';
export * from './lifecycle.js';
export { type GitGateway, type CommandRunner, type CommandResult, createGitGateway, createSpawnRunner, parseWorktreeListOutput } from './managers/git.js';
export { type Logger, type LoggerOptions, createLogger, createNoopLogger } from './logger.js';
