/**
 * Types for directory group resolution
 */

/**
 * Mail nickname given to every group this tool creates. Graph requires one
 * even for groups that are not mail-enabled.
 */
export const PLACEHOLDER_MAIL_NICKNAME = 'NotSet';

/**
 * How a group name was resolved
 * - found: the group already existed
 * - created: the group was created during this run
 * - planned: dry-run, the group does not exist and would be created
 */
export type GroupResolutionStatus = 'found' | 'created' | 'planned';

export interface GroupResolution {
  status: GroupResolutionStatus;
  /** Group object id (a `dry-run:` placeholder when planned) */
  id: string;
  name: string;
}

/**
 * Kind of group to create when a name is not found
 * - security: plain assigned-membership security group
 * - license: dynamic security group of users holding a service plan
 */
export type GroupSpec =
  | { kind: 'security' }
  | { kind: 'license'; servicePlanId: string };

export interface EnsureGroupOptions {
  /** Look up only; report missing groups as planned */
  dryRun?: boolean;
  /** What to create when missing (default: security) */
  spec?: GroupSpec;
}

/**
 * Resolves group names to ids for one run, creating missing groups once
 */
export interface GroupResolver {
  resolve(name: string, spec?: GroupSpec): Promise<GroupResolution>;
  /** Every resolution made so far, in order */
  history(): GroupResolution[];
}
