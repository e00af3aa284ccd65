/**
 * deploy command - Create or update Conditional Access policies from templates
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { GraphClient } from '../api/client.js';
import type { TokenProvider } from '../api/types.js';
import type { ApiLogger } from '../api/logger.js';
import { createClient } from '../api/client.js';
import { ConfigError } from '../errors.js';
import {
  resolveDeployConfig,
  createDeviceCodeTokenProvider,
  createStaticTokenProvider,
  type ConfigOverrides,
  type DeployConfig,
} from '../config/index.js';
import { loadTemplates } from '../templates/index.js';
import { createGroupResolver } from '../reconcilers/groups/index.js';
import {
  createSequenceGenerator,
  deployTemplates,
  type DeployReport,
  type SequenceGenerator,
} from '../reconcilers/policies/index.js';
import { printDeployReport, dryRunNotice, info, verbose, warn } from '../utils/output.js';

export type DeployOptions = ConfigOverrides;

/**
 * Collaborators the command would otherwise build itself
 */
export interface DeployCommandDependencies {
  /** Use this client instead of signing in */
  client?: GraphClient;
  sequence?: SequenceGenerator;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Pick the token provider for the configured credentials
 */
export function createTokenProvider(config: DeployConfig, logger: ApiLogger): TokenProvider {
  if (config.auth.accessToken) {
    return createStaticTokenProvider(config.auth.accessToken);
  }

  const { tenantId, clientId } = config.auth;
  if (!tenantId || !clientId) {
    throw new ConfigError('A tenant id and client id are required for sign-in', tenantId ? 'client-id' : 'tenant-id');
  }

  return createDeviceCodeTokenProvider({
    tenantId,
    clientId,
    logger,
    onDeviceCode: (message) => console.error(message),
  });
}

/**
 * Execute the deploy command
 * Loads the templates folder and syncs every template to the tenant
 */
export async function deployCommand(
  ctx: CommandContext,
  options: DeployOptions = {},
  deps: DeployCommandDependencies = {}
): Promise<CommandResult<DeployReport>> {
  const { options: globalOpts, outputFormat, logger } = ctx;
  const dryRun = globalOpts.dryRun;

  const config = resolveDeployConfig({
    cli: { ...options, config: options.config ?? globalOpts.config },
    env: ctx.env,
    cwd: ctx.cwd,
    requireAuth: !deps.client,
  });

  verbose(`Executing deploy command`, globalOpts.verbose);
  verbose(`Prefix: ${config.prefix}`, globalOpts.verbose);
  verbose(`Templates: ${config.templatesDir}`, globalOpts.verbose);
  verbose(`Graph: ${config.graphBaseUrl}`, globalOpts.verbose);

  const entries = await loadTemplates(config.templatesDir);

  if (outputFormat === 'human') {
    if (dryRun) {
      dryRunNotice();
    }
    info(`Deploying ${entries.length} template(s) from ${config.templatesDir}`);
  }

  const client =
    deps.client ??
    createClient({
      tokenProvider: createTokenProvider(config, logger),
      baseUrl: config.graphBaseUrl,
      timeout: config.timeoutMs,
      logger,
    });

  const report = await deployTemplates(
    {
      client,
      groups: createGroupResolver(client, { dryRun, logger }),
      sequence: deps.sequence ?? createSequenceGenerator(config.prefix, config.sequenceStart),
      sleep: deps.sleep,
      logger,
    },
    entries,
    {
      exclusionGroupPrefix: config.exclusionGroupPrefix,
      sharedGroups: config.groups,
      aadp2ServicePlanId: config.aadp2Dynamic ? config.aadp2ServicePlanId : undefined,
      pacingMs: config.pacingMs,
      dryRun,
      stateOverride: config.stateOverride,
    }
  );

  if (outputFormat === 'human') {
    printDeployReport(report, outputFormat);
    if (report.stats.skipped > 0) {
      warn(`${report.stats.skipped} template file(s) could not be read`);
    }
  }

  const { created, updated, skipped, failed } = report.stats;
  const errors = report.outcomes.flatMap((outcome) =>
    outcome.error ? [`${outcome.fileName}: ${outcome.error.message}`] : []
  );

  return {
    success: failed === 0 && skipped === 0,
    message: `${dryRun ? 'Dry run: ' : ''}${created} created, ${updated} updated, ${skipped} skipped, ${failed} failed`,
    data: report,
    errors: errors.length > 0 ? errors : undefined,
  };
}
