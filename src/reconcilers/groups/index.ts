/**
 * Directory group resolution
 */

export {
  resolveOrCreateGroup,
  findGroupByName,
  buildCreateGroupRequest,
  buildLicenseMembershipRule,
  DRY_RUN_ID_PREFIX,
} from './ensure.js';

export { createGroupResolver, type GroupResolverOptions } from './resolver.js';

export {
  PLACEHOLDER_MAIL_NICKNAME,
  type GroupResolution,
  type GroupResolutionStatus,
  type GroupResolver,
  type GroupSpec,
  type EnsureGroupOptions,
} from './types.js';
