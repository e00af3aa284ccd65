/**
 * Shared types and interfaces for the ca-deploy CLI
 */

import type { ApiLogger } from './api/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Path to a ca-deploy.yaml file */
  config?: string;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  logger: ApiLogger;
  /** Environment to read CA_DEPLOY_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory relative paths resolve against (default: process.cwd()) */
  cwd?: string;
}

/**
 * Result returned by command handlers
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
