/**
 * Types for Conditional Access policy reconciliation
 */

import type { PolicyPayload, RemotePolicy } from '../../api/types.js';
import type { GroupResolution } from '../groups/types.js';

// =============================================================================
// Sequence
// =============================================================================

/**
 * Position of a template in the run
 */
export interface SequenceContext {
  /** 1-based sequence number */
  number: number;
  /** Run prefix joined to the zero-padded number, e.g. "CA01" */
  prefixAndNumber: string;
}

/**
 * Hands out sequence contexts in order
 */
export interface SequenceGenerator {
  next(): SequenceContext;
}

// =============================================================================
// Placeholders
// =============================================================================

/**
 * Group ids available for substitution into one template
 */
export interface ResolvedGroupIds {
  aadp2: string;
  exclusion: string;
  syncAccounts: string;
  emergencyAccess: string;
}

/**
 * Placeholder kinds a template may use
 */
export type PlaceholderKind =
  | 'PREFIX'
  | 'AADP2Group'
  | 'ExclusionGroup'
  | 'SynchronizationServiceAccountsGroup'
  | 'EmergencyAccessAccountsGroup';

export type GroupPlaceholderKind = Exclude<PlaceholderKind, 'PREFIX'>;

/**
 * User group list a group placeholder belongs to
 */
export type GroupListField = 'includeGroups' | 'excludeGroups';

export interface GroupPlaceholderDefinition {
  kind: GroupPlaceholderKind;
  /** Literal text in the template, e.g. "<ExclusionGroup>" */
  token: string;
  field: GroupListField;
  /** Which resolved id replaces the token */
  source: keyof ResolvedGroupIds;
}

export type SubstitutionWarningCode =
  | 'MISSING_PREFIX_TOKEN'
  | 'UNKNOWN_PLACEHOLDER'
  | 'MISPLACED_PLACEHOLDER';

export interface SubstitutionWarning {
  code: SubstitutionWarningCode;
  message: string;
  /** Offending token, when there is one */
  token?: string;
}

export interface SubstitutionResult {
  /** New payload; the template is left untouched */
  payload: PolicyPayload;
  warnings: SubstitutionWarning[];
  /** Placeholder kinds that were replaced */
  substituted: PlaceholderKind[];
}

// =============================================================================
// Lookup & Sync
// =============================================================================

/**
 * Remote policies matching a template, classified
 */
export type PolicyMatch =
  | { state: 'none' }
  | { state: 'one'; policy: RemotePolicy }
  | { state: 'many'; policies: RemotePolicy[] };

export type SyncAction = 'create' | 'update';

export interface ApplyPolicyResult {
  action: SyncAction;
  /** Id of the created or updated policy (absent for a dry-run create) */
  policyId?: string;
  dryRun: boolean;
}

// =============================================================================
// Batch Report
// =============================================================================

/**
 * What happened to one template
 * - create / update: the policy was written (or would be, in a dry run)
 * - skip: the template file could not be used
 * - error: processing failed; nothing was written for this template
 */
export type OutcomeAction = SyncAction | 'skip' | 'error';

export interface OutcomeError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface TemplateOutcome {
  fileName: string;
  action: OutcomeAction;
  /** e.g. "CA01" */
  sequence?: string;
  displayName?: string;
  matchName?: string;
  policyId?: string;
  exclusionGroup?: GroupResolution;
  warnings: SubstitutionWarning[];
  error?: OutcomeError;
}

export interface DeployStats {
  total: number;
  created: number;
  updated: number;
  skipped: number;
  failed: number;
}

export interface DeployReport {
  startedAt: string;
  completedAt: string;
  dryRun: boolean;
  /** Shared groups resolved before the first template */
  sharedGroups: GroupResolution[];
  outcomes: TemplateOutcome[];
  stats: DeployStats;
}
