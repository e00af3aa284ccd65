/**
 * Create-or-update of one Conditional Access policy
 *
 * Key behaviors:
 * - No match: POST a new policy
 * - One match: PATCH that policy with the whole payload
 * - Several matches: refuse, nothing is written
 * - Dry run: decide the action but send nothing
 */

import type { GraphClient } from '../../api/client.js';
import type { PolicyPayload, PolicyState } from '../../api/types.js';
import { ApiRequestError } from '../../api/retry.js';
import { AmbiguousMatchError, isDeployError, RemoteWriteError } from '../../errors.js';
import type { ApplyPolicyResult, PolicyMatch, SyncAction } from './types.js';

export interface ApplyPolicyOptions {
  /** Template file name, for error reports */
  templateName: string;
  /** Run-independent name the match was made on */
  matchName: string;
  dryRun?: boolean;
}

/**
 * Decide what a match calls for
 *
 * @throws AmbiguousMatchError when more than one policy matches
 */
export function decideSyncAction(match: PolicyMatch, matchName: string): SyncAction {
  switch (match.state) {
    case 'none':
      return 'create';
    case 'one':
      return 'update';
    case 'many':
      throw new AmbiguousMatchError(
        matchName,
        match.policies.map((policy) => ({ id: policy.id, displayName: policy.displayName }))
      );
  }
}

/**
 * Replace the payload's state (used for --state)
 */
export function applyStateOverride(payload: PolicyPayload, state: PolicyState | undefined): PolicyPayload {
  return state ? { ...payload, state } : payload;
}

function toRemoteWriteError(templateName: string, action: SyncAction, err: unknown): RemoteWriteError {
  if (err instanceof ApiRequestError) {
    return new RemoteWriteError(templateName, action, err.status, err.details, err);
  }
  const cause = err instanceof Error ? err : new Error(String(err));
  return new RemoteWriteError(templateName, action, undefined, undefined, cause);
}

/**
 * Create or update the remote policy for one template
 *
 * @throws AmbiguousMatchError when the match is ambiguous
 * @throws RemoteWriteError when Graph rejects the write
 * @throws AuthError when Graph keeps rejecting the token
 */
export async function applyPolicy(
  client: GraphClient,
  payload: PolicyPayload,
  match: PolicyMatch,
  options: ApplyPolicyOptions
): Promise<ApplyPolicyResult> {
  const action = decideSyncAction(match, options.matchName);
  const existingId = match.state === 'one' ? match.policy.id : undefined;

  if (options.dryRun) {
    return { action, policyId: existingId, dryRun: true };
  }

  try {
    if (existingId !== undefined) {
      await client.policies.update(existingId, payload);
      return { action, policyId: existingId, dryRun: false };
    }

    const created = await client.policies.create(payload);
    return { action, policyId: created.id, dryRun: false };
  } catch (err) {
    if (isDeployError(err)) throw err;
    throw toRemoteWriteError(options.templateName, action, err);
  }
}
