/**
 * plan command - Preview a deployment without signing in
 */

import type { CommandContext, CommandResult } from '../types.js';
import { resolveDeployConfig, type ConfigOverrides } from '../config/index.js';
import { loadTemplates } from '../templates/index.js';
import { createSequenceGenerator, planTemplates, type PlanEntry } from '../reconcilers/policies/index.js';
import { printPlan, verbose } from '../utils/output.js';

export type PlanOptions = Pick<
  ConfigOverrides,
  'config' | 'prefix' | 'exclusionPrefix' | 'aadp2Group' | 'syncAccountsGroup' | 'emergencyAccessGroup' | 'templates' | 'start'
>;

/**
 * Execute the plan command
 * Renders names, match names and group names for every template
 */
export async function planCommand(
  ctx: CommandContext,
  options: PlanOptions = {}
): Promise<CommandResult<PlanEntry[]>> {
  const { options: globalOpts, outputFormat } = ctx;

  const config = resolveDeployConfig({
    cli: { ...options, config: options.config ?? globalOpts.config },
    env: ctx.env,
    cwd: ctx.cwd,
    requireAuth: false,
  });

  verbose(`Executing plan command`, globalOpts.verbose);
  verbose(`Templates: ${config.templatesDir}`, globalOpts.verbose);

  const entries = await loadTemplates(config.templatesDir);
  const plan = planTemplates(entries, {
    sequence: createSequenceGenerator(config.prefix, config.sequenceStart),
    exclusionGroupPrefix: config.exclusionGroupPrefix,
    sharedGroups: config.groups,
  });

  if (outputFormat === 'human') {
    printPlan(plan, outputFormat);
  }

  const invalid = plan.filter((entry) => entry.error);
  const warnings = plan.reduce((count, entry) => count + entry.warnings.length, 0);

  return {
    success: invalid.length === 0,
    message: `${plan.length - invalid.length} template(s) ready, ${invalid.length} invalid, ${warnings} warning(s)`,
    data: plan,
    errors: invalid.length > 0 ? invalid.map((entry) => `${entry.fileName}: ${entry.error?.message ?? ''}`) : undefined,
  };
}
