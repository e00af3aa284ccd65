#!/usr/bin/env node
/**
 * ca-deploy CLI - Deploy Conditional Access policy templates to Entra ID
 *
 * Commands:
 * - deploy: Create or update one policy per template in the templates folder
 * - plan: Show the names and groups a deploy would use, without signing in
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import { deployCommand, planCommand, type DeployOptions, type PlanOptions } from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { createLogger, parseLogLevel } from './api/logger.js';
import { isDeployError } from './errors.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const logger = createLogger({
    level: options.verbose ? 'debug' : (parseLogLevel(process.env.CA_DEPLOY_LOG_LEVEL) ?? 'warn'),
    json: process.env.CA_DEPLOY_LOG_JSON === 'true',
  });

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    logger,
  };
}

/**
 * Print a command result and exit with its status
 */
function finish<T>(ctx: CommandContext, result: CommandResult<T>): never {
  printResult(
    ctx.outputFormat === 'json' ? result : { success: result.success, message: result.message },
    ctx.outputFormat
  );
  process.exit(result.success ? 0 : 1);
}

/**
 * Report a command failure and exit
 */
function fail(ctx: CommandContext, label: string, err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);

  if (ctx.outputFormat === 'json') {
    printResult(
      {
        success: false,
        message: `${label} failed: ${message}`,
        errors: [message],
        data: isDeployError(err) ? { code: err.code, details: err.details } : undefined,
      },
      ctx.outputFormat
    );
  } else if (isDeployError(err)) {
    error(`${label} failed`);
    console.error(err.toUserMessage());
  } else {
    error(`${label} failed: ${message}`);
  }

  process.exit(1);
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('ca-deploy')
  .description('Deploy Conditional Access policy templates to a Microsoft Entra ID tenant')
  .version(VERSION)
  // Global options available to all commands
  .addOption(new Option('-c, --config <path>', 'Path to a ca-deploy.yaml file'))
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * Options shared by deploy and plan
 */
function addNamingOptions(command: Command): Command {
  return command
    .option('--prefix <prefix>', 'Run prefix, e.g. CA (policies are named CA01, CA02, ...)')
    .option('--templates <path>', 'Folder of policy template JSON files')
    .option('--exclusion-prefix <prefix>', 'Name prefix of per-policy exclusion groups')
    .option('--aadp2-group <name>', 'Name of the Entra ID P2 licensed users group')
    .option('--sync-accounts-group <name>', 'Name of the synchronization service accounts group')
    .option('--emergency-access-group <name>', 'Name of the emergency access accounts group')
    .option('--start <n>', 'First sequence number');
}

/**
 * deploy command - Create or update policies
 */
addNamingOptions(
  program
    .command('deploy')
    .description('Create or update one Conditional Access policy per template')
)
  .option('--tenant-id <id>', 'Directory (tenant) id to sign in to')
  .option('--client-id <id>', 'Application (client) id of the public client app registration')
  .option('--graph-url <url>', 'Microsoft Graph base URL')
  .option('--pacing <ms>', 'Delay between templates in milliseconds')
  .option('--timeout <ms>', 'Request timeout in milliseconds')
  .option('--no-aadp2-dynamic', 'Create the AADP2 group as a plain security group')
  .addOption(
    new Option('--state <state>', 'Override the state of every deployed policy')
      .choices(['enabled', 'disabled', 'enabledForReportingButNotEnforced'])
  )
  .action(async (cmdOpts: DeployOptions, command: Command) => {
    const globalOpts = program.opts<GlobalOptions>();
    const ctx = createContext(globalOpts);

    // --no-aadp2-dynamic defaults to true; only an explicit flag overrides the config file
    const aadp2Dynamic = command.getOptionValueSource('aadp2Dynamic') === 'cli' ? cmdOpts.aadp2Dynamic : undefined;

    try {
      const result = await deployCommand(ctx, { ...cmdOpts, aadp2Dynamic });
      finish(ctx, result);
    } catch (err) {
      fail(ctx, 'Deploy', err);
    }
  });

/**
 * plan command - Offline preview
 */
addNamingOptions(
  program
    .command('plan')
    .description('Preview policy names, match names and groups without signing in')
).action(async (cmdOpts: PlanOptions) => {
  const globalOpts = program.opts<GlobalOptions>();
  const ctx = createContext(globalOpts);

  try {
    const result = await planCommand(ctx, cmdOpts);
    finish(ctx, result);
  } catch (err) {
    fail(ctx, 'Plan', err);
  }
});

await program.parseAsync(process.argv);
