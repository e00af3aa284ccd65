/**
 * Batch deployment of policy templates
 *
 * Runs the templates of one folder through group resolution, substitution,
 * lookup and apply with:
 * - Sequential execution in file-name order
 * - Failure isolation (a failed template does not stop the batch)
 * - Pacing between templates to stay clear of Graph throttling
 * - Aggregated outcome reporting
 *
 * @module reconcilers/policies/batch
 */

import type { GraphClient } from '../../api/client.js';
import type { PolicyState } from '../../api/types.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import { ApiRequestError, sleep as defaultSleep } from '../../api/retry.js';
import { GroupResolutionError, type MalformedTemplateError, isDeployError } from '../../errors.js';
import type { TemplateEntry } from '../../templates/types.js';
import type { GroupResolution, GroupResolver, GroupSpec } from '../groups/types.js';
import { applyPolicy, applyStateOverride } from './apply.js';
import { checkMatchName, findPoliciesByMatchName, requireMatchName } from './lookup.js';
import { substituteTemplate } from './placeholders.js';
import type {
  DeployReport,
  DeployStats,
  OutcomeError,
  ResolvedGroupIds,
  SequenceGenerator,
  TemplateOutcome,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Names of the groups every template shares
 */
export interface SharedGroupNames {
  aadp2: string;
  syncAccounts: string;
  emergencyAccess: string;
}

/**
 * Collaborators for a batch run (injected so tests can substitute them)
 */
export interface DeployDependencies {
  client: GraphClient;
  /** Should be created with the same dryRun setting as the batch */
  groups: GroupResolver;
  sequence: SequenceGenerator;
  sleep?: (ms: number) => Promise<void>;
  logger?: ApiLogger;
}

export interface DeployTemplatesOptions {
  exclusionGroupPrefix: string;
  sharedGroups: SharedGroupNames;
  /** When set, the AADP2 group is created as a dynamic group on this service plan */
  aadp2ServicePlanId?: string;
  /** Delay between templates (default: 0) */
  pacingMs?: number;
  dryRun?: boolean;
  stateOverride?: PolicyState;
  /** Keep going after a failed template (default: true) */
  continueOnError?: boolean;
  /** Called after each template with its outcome */
  onTemplateComplete?: (outcome: TemplateOutcome, index: number, total: number) => void;
}

// =============================================================================
// Helpers
// =============================================================================

function toOutcomeError(err: unknown): OutcomeError {
  if (isDeployError(err)) {
    return { code: err.code, message: err.message, details: err.details };
  }
  if (err instanceof ApiRequestError) {
    return { code: 'REQUEST_FAILED', message: `${err.message} (HTTP ${err.status})`, details: err.details };
  }
  if (err instanceof Error) {
    return { code: 'UNEXPECTED', message: err.message };
  }
  return { code: 'UNEXPECTED', message: String(err) };
}

/**
 * Tally outcomes by action
 */
export function summarizeOutcomes(outcomes: TemplateOutcome[]): DeployStats {
  const stats: DeployStats = { total: outcomes.length, created: 0, updated: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    switch (outcome.action) {
      case 'create':
        stats.created++;
        break;
      case 'update':
        stats.updated++;
        break;
      case 'skip':
        stats.skipped++;
        break;
      case 'error':
        stats.failed++;
        break;
    }
  }
  return stats;
}

/**
 * Resolve the AADP2, sync accounts and emergency access groups
 *
 * @throws GroupResolutionError (fatal) when any of them cannot be resolved
 */
export async function resolveSharedGroups(
  groups: GroupResolver,
  names: SharedGroupNames,
  aadp2ServicePlanId?: string
): Promise<Omit<ResolvedGroupIds, 'exclusion'>> {
  const aadp2Spec: GroupSpec = aadp2ServicePlanId
    ? { kind: 'license', servicePlanId: aadp2ServicePlanId }
    : { kind: 'security' };

  try {
    const aadp2 = await groups.resolve(names.aadp2, aadp2Spec);
    const syncAccounts = await groups.resolve(names.syncAccounts);
    const emergencyAccess = await groups.resolve(names.emergencyAccess);
    return { aadp2: aadp2.id, syncAccounts: syncAccounts.id, emergencyAccess: emergencyAccess.id };
  } catch (err) {
    if (err instanceof GroupResolutionError) {
      throw err.asFatal();
    }
    throw err;
  }
}

// =============================================================================
// Batch Execution
// =============================================================================

/**
 * Deploy every template in order
 *
 * Malformed entries are reported as skipped and take no sequence number.
 * Fatal errors (auth, shared groups) are re-thrown and end the run.
 */
export async function deployTemplates(
  deps: DeployDependencies,
  entries: TemplateEntry[],
  options: DeployTemplatesOptions
): Promise<DeployReport> {
  const log = deps.logger ?? defaultLogger;
  const wait = deps.sleep ?? defaultSleep;
  const dryRun = options.dryRun ?? false;
  const pacingMs = options.pacingMs ?? 0;
  const continueOnError = options.continueOnError ?? true;
  const startedAt = new Date().toISOString();

  const shared = await resolveSharedGroups(deps.groups, options.sharedGroups, options.aadp2ServicePlanId);
  const sharedGroups: GroupResolution[] = deps.groups.history();

  const outcomes: TemplateOutcome[] = [];
  let paceBeforeNext = false;

  const skip = (fileName: string, index: number, error: MalformedTemplateError): void => {
    log.warn(error.message);
    const outcome: TemplateOutcome = { fileName, action: 'skip', warnings: [], error: toOutcomeError(error) };
    outcomes.push(outcome);
    options.onTemplateComplete?.(outcome, index, entries.length);
  };

  for (const [index, entry] of entries.entries()) {
    if (!entry.ok) {
      skip(entry.fileName, index, entry.error);
      continue;
    }
    const nameError = checkMatchName(entry.template.displayName, entry.fileName);
    if (nameError) {
      skip(entry.fileName, index, nameError);
      continue;
    }

    if (paceBeforeNext && !dryRun && pacingMs > 0) {
      await wait(pacingMs);
    }
    paceBeforeNext = true;

    const sequence = deps.sequence.next();
    const outcome: TemplateOutcome = {
      fileName: entry.fileName,
      action: 'error',
      sequence: sequence.prefixAndNumber,
      warnings: [],
    };

    try {
      const exclusionGroup = await deps.groups.resolve(`${options.exclusionGroupPrefix}${sequence.prefixAndNumber}`);
      outcome.exclusionGroup = exclusionGroup;

      const substitution = substituteTemplate(entry.template, sequence, { ...shared, exclusion: exclusionGroup.id });
      outcome.warnings = substitution.warnings;
      for (const warning of substitution.warnings) {
        log.warn(`${entry.fileName}: ${warning.message}`);
      }

      const payload = applyStateOverride(substitution.payload, options.stateOverride);
      outcome.displayName = payload.displayName;

      const matchName = requireMatchName(payload.displayName, entry.fileName);
      outcome.matchName = matchName;

      const match = await findPoliciesByMatchName(deps.client, matchName);
      const result = await applyPolicy(deps.client, payload, match, {
        templateName: entry.fileName,
        matchName,
        dryRun,
      });

      outcome.action = result.action;
      outcome.policyId = result.policyId;
      log.info(`${dryRun ? 'Would ' : ''}${result.action} policy ${payload.displayName}`, {
        fileName: entry.fileName,
        policyId: result.policyId,
      });
    } catch (err) {
      if (isDeployError(err) && err.fatal) {
        throw err;
      }
      outcome.action = 'error';
      outcome.error = toOutcomeError(err);
      log.error(`${entry.fileName}: ${outcome.error.message}`);
    }

    outcomes.push(outcome);
    options.onTemplateComplete?.(outcome, index, entries.length);

    if (outcome.action === 'error' && !continueOnError) {
      log.warn('Stopping after the first failed template');
      break;
    }
  }

  return {
    startedAt,
    completedAt: new Date().toISOString(),
    dryRun,
    sharedGroups,
    outcomes,
    stats: summarizeOutcomes(outcomes),
  };
}
