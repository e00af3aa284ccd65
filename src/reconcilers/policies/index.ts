/**
 * Conditional Access policy reconciliation
 */

export { createSequenceGenerator, formatSequenceNumber, sequenceContext } from './sequence.js';
export { substituteTemplate, findPlaceholders, PREFIX_TOKEN, GROUP_PLACEHOLDERS } from './placeholders.js';
export { deriveMatchName, checkMatchName, requireMatchName, endsWithMatchName, classifyMatches, findPoliciesByMatchName } from './lookup.js';
export { decideSyncAction, applyStateOverride, applyPolicy, type ApplyPolicyOptions } from './apply.js';
export {
  deployTemplates,
  resolveSharedGroups,
  summarizeOutcomes,
  type DeployDependencies,
  type DeployTemplatesOptions,
  type SharedGroupNames,
} from './batch.js';
export { planTemplates, type PlanEntry, type PlanTemplatesOptions } from './plan.js';

export type {
  SequenceContext,
  SequenceGenerator,
  ResolvedGroupIds,
  PlaceholderKind,
  GroupPlaceholderKind,
  GroupListField,
  GroupPlaceholderDefinition,
  SubstitutionWarning,
  SubstitutionWarningCode,
  SubstitutionResult,
  PolicyMatch,
  SyncAction,
  ApplyPolicyResult,
  OutcomeAction,
  OutcomeError,
  TemplateOutcome,
  DeployStats,
  DeployReport,
} from './types.js';
