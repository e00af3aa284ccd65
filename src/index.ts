/**
 * ca-deploy library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the engine for use from code.
 */

export * from './api/index.js';
export * from './config/index.js';
export * from './templates/index.js';
export * from './reconcilers/index.js';
export * from './errors.js';
export { deployCommand, planCommand, createTokenProvider } from './commands/index.js';
export type { DeployOptions, PlanOptions, DeployCommandDependencies } from './commands/index.js';
export type { GlobalOptions, CommandContext, CommandResult, OutputFormat } from './types.js';
