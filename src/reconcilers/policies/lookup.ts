/**
 * Remote policy lookup
 *
 * A template is matched to an existing policy by the part of its display name
 * that does not depend on the run: the text after the first "-". Sequence
 * numbers shift between runs, so "CA07 - Block Legacy Auth" must still be
 * found when the template now renders as "CA03 - Block Legacy Auth".
 */

import type { GraphClient } from '../../api/client.js';
import type { RemotePolicy } from '../../api/types.js';
import { MalformedTemplateError } from '../../errors.js';
import type { PolicyMatch } from './types.js';

/**
 * Derive the run-independent match name from a template display name
 *
 * "<PREFIX> - Block Legacy Auth" -> "Block Legacy Auth"
 * "Block Legacy Auth" -> "Block Legacy Auth"
 */
export function deriveMatchName(displayName: string): string {
  const dash = displayName.indexOf('-');
  return (dash === -1 ? displayName : displayName.slice(dash + 1)).trim();
}

/**
 * Reject a display name with nothing to match on
 *
 * A name like "CA01 -" leaves an empty match name; deploying it would create
 * a new policy on every run.
 */
export function checkMatchName(displayName: string, fileName: string): MalformedTemplateError | undefined {
  if (deriveMatchName(displayName)) return undefined;
  return new MalformedTemplateError(
    fileName,
    `display name "${displayName}" has no text after the first "-" to match existing policies on`
  );
}

/**
 * @throws MalformedTemplateError when the match name is empty
 */
export function requireMatchName(displayName: string, fileName: string): string {
  const error = checkMatchName(displayName, fileName);
  if (error) throw error;
  return deriveMatchName(displayName);
}

/**
 * Does a remote display name end with the match name?
 *
 * Graph's endswith filter is case-insensitive; this check mirrors it so a
 * loose server-side filter cannot widen the result.
 */
export function endsWithMatchName(displayName: string, matchName: string): boolean {
  return displayName.trim().toLowerCase().endsWith(matchName.toLowerCase());
}

/**
 * Classify lookup results
 */
export function classifyMatches(policies: RemotePolicy[]): PolicyMatch {
  const [first] = policies;
  if (!first) {
    return { state: 'none' };
  }
  if (policies.length === 1) {
    return { state: 'one', policy: first };
  }
  return { state: 'many', policies };
}

/**
 * Find remote policies whose display name ends with the match name
 */
export async function findPoliciesByMatchName(client: GraphClient, matchName: string): Promise<PolicyMatch> {
  if (!matchName) {
    throw new RangeError('A non-empty match name is required to look up policies');
  }

  const candidates = await client.policies.listByDisplayNameSuffix(matchName);
  return classifyMatches(candidates.filter((policy) => endsWithMatchName(policy.displayName, matchName)));
}
