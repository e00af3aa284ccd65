/**
 * Group ensure operations (idempotent create-if-not-exists)
 *
 * Key behaviors:
 * - Look up by display name first (startswith query, exact name match)
 * - Create only if not found, never modify an existing group
 * - More than one group with the same name is an error, not a guess
 */

import type { GraphClient } from '../../api/client.js';
import type { CreateGroupRequest, Group } from '../../api/types.js';
import { ApiRequestError } from '../../api/retry.js';
import { GroupResolutionError, isDeployError } from '../../errors.js';
import type { EnsureGroupOptions, GroupResolution, GroupSpec } from './types.js';
import { PLACEHOLDER_MAIL_NICKNAME } from './types.js';

/** Prefix of the ids handed out for groups a dry run would create */
export const DRY_RUN_ID_PREFIX = 'dry-run:';

function describeFailure(err: unknown): { reason: string; cause?: Error; status?: number } {
  if (err instanceof ApiRequestError) {
    return { reason: `${err.message} (HTTP ${err.status})`, cause: err, status: err.status };
  }
  if (err instanceof Error) {
    return { reason: err.message, cause: err };
  }
  return { reason: String(err) };
}

/**
 * Membership rule selecting users with an enabled assignment of a service plan
 */
export function buildLicenseMembershipRule(servicePlanId: string): string {
  return (
    `user.assignedPlans -any (assignedPlan.servicePlanId -eq "${servicePlanId}" ` +
    `-and assignedPlan.capabilityStatus -eq "Enabled")`
  );
}

/**
 * Build the create request for a group name
 */
export function buildCreateGroupRequest(name: string, spec: GroupSpec = { kind: 'security' }): CreateGroupRequest {
  const base: CreateGroupRequest = {
    displayName: name,
    mailEnabled: false,
    mailNickname: PLACEHOLDER_MAIL_NICKNAME,
    securityEnabled: true,
  };

  if (spec.kind === 'license') {
    return {
      ...base,
      description: `Users licensed for service plan ${spec.servicePlanId}`,
      groupTypes: ['DynamicMembership'],
      membershipRule: buildLicenseMembershipRule(spec.servicePlanId),
      membershipRuleProcessingState: 'On',
    };
  }

  return base;
}

/**
 * Find the one group with exactly this display name
 *
 * Display names are compared case-insensitively, as the directory does.
 *
 * @returns The group, or null when there is none
 * @throws GroupResolutionError when the lookup fails or the name is ambiguous
 */
export async function findGroupByName(client: GraphClient, name: string): Promise<Group | null> {
  let candidates: Group[];
  try {
    candidates = await client.groups.listByDisplayNamePrefix(name);
  } catch (err) {
    if (isDeployError(err)) throw err;
    const { reason, cause, status } = describeFailure(err);
    throw new GroupResolutionError(name, `lookup failed: ${reason}`, { cause, details: { status } });
  }

  const wanted = name.toLowerCase();
  const exact = candidates.filter((group) => group.displayName.toLowerCase() === wanted);

  if (exact.length > 1) {
    throw new GroupResolutionError(name, `${exact.length} groups share this name`, {
      details: { candidates: exact.map((group) => group.id) },
    });
  }

  return exact[0] ?? null;
}

/**
 * Ensure a group exists, creating it if not found
 *
 * Running it repeatedly with the same name returns the same group and never
 * creates a second one.
 *
 * @throws GroupResolutionError if lookup or creation fails
 */
export async function resolveOrCreateGroup(
  client: GraphClient,
  name: string,
  options: EnsureGroupOptions = {}
): Promise<GroupResolution> {
  const existing = await findGroupByName(client, name);
  if (existing) {
    return { status: 'found', id: existing.id, name };
  }

  if (options.dryRun) {
    return { status: 'planned', id: `${DRY_RUN_ID_PREFIX}${name}`, name };
  }

  try {
    const created = await client.groups.create(buildCreateGroupRequest(name, options.spec));
    return { status: 'created', id: created.id, name };
  } catch (err) {
    if (isDeployError(err)) throw err;
    const { reason, cause, status } = describeFailure(err);
    throw new GroupResolutionError(name, `create failed: ${reason}`, { cause, details: { status } });
  }
}
