/**
 * Placeholder substitution for policy templates
 *
 * Templates carry literal tokens where tenant-specific values belong:
 *
 * | Token                                   | Field                                 | Replaced by                    |
 * |-----------------------------------------|---------------------------------------|--------------------------------|
 * | <PREFIX>                                | displayName                           | prefix + sequence, e.g. CA01   |
 * | <AADP2Group>                            | conditions.users.includeGroups        | AADP2 licensing group id       |
 * | <ExclusionGroup>                        | conditions.users.excludeGroups        | per-template exclusion group id|
 * | <SynchronizationServiceAccountsGroup>   | conditions.users.excludeGroups        | sync service accounts group id |
 * | <EmergencyAccessAccountsGroup>          | conditions.users.excludeGroups        | emergency access group id      |
 *
 * Group tokens are removed from their list and the id appended once. Every
 * other field passes through untouched.
 */

import type { PolicyTemplate } from '../../templates/types.js';
import type {
  GroupListField,
  GroupPlaceholderDefinition,
  PlaceholderKind,
  ResolvedGroupIds,
  SequenceContext,
  SubstitutionResult,
  SubstitutionWarning,
} from './types.js';

export const PREFIX_TOKEN = '<PREFIX>';

export const GROUP_PLACEHOLDERS: readonly GroupPlaceholderDefinition[] = [
  { kind: 'AADP2Group', token: '<AADP2Group>', field: 'includeGroups', source: 'aadp2' },
  { kind: 'ExclusionGroup', token: '<ExclusionGroup>', field: 'excludeGroups', source: 'exclusion' },
  {
    kind: 'SynchronizationServiceAccountsGroup',
    token: '<SynchronizationServiceAccountsGroup>',
    field: 'excludeGroups',
    source: 'syncAccounts',
  },
  {
    kind: 'EmergencyAccessAccountsGroup',
    token: '<EmergencyAccessAccountsGroup>',
    field: 'excludeGroups',
    source: 'emergencyAccess',
  },
];

const GROUP_LIST_FIELDS: readonly GroupListField[] = ['includeGroups', 'excludeGroups'];

/** Anything shaped like a token: <Word> */
const TOKEN_PATTERN = /^<[^<>\s]+>$/;

function substituteGroupList(
  list: readonly string[],
  field: GroupListField,
  ids: ResolvedGroupIds,
  warnings: SubstitutionWarning[],
  substituted: PlaceholderKind[]
): string[] {
  const kept: string[] = [];
  const appended: string[] = [];

  for (const entry of list) {
    const definition = GROUP_PLACEHOLDERS.find((candidate) => candidate.token === entry);

    if (definition && definition.field === field) {
      if (!substituted.includes(definition.kind)) {
        substituted.push(definition.kind);
      }
      const id = ids[definition.source];
      if (!appended.includes(id)) {
        appended.push(id);
      }
      continue;
    }

    if (definition) {
      warnings.push({
        code: 'MISPLACED_PLACEHOLDER',
        message: `${entry} is only substituted in ${definition.field}; left as is in ${field}`,
        token: entry,
      });
    } else if (TOKEN_PATTERN.test(entry)) {
      warnings.push({
        code: 'UNKNOWN_PLACEHOLDER',
        message: `Unrecognized token ${entry} in ${field}; left as is`,
        token: entry,
      });
    }
    kept.push(entry);
  }

  for (const id of appended) {
    if (!kept.includes(id)) {
      kept.push(id);
    }
  }

  return kept;
}

/**
 * Produce the deployable payload for one template
 *
 * Pure: the template is deep-copied and never mutated.
 *
 * @example
 * ```typescript
 * const { payload } = substituteTemplate(
 *   { displayName: '<PREFIX> - Block Legacy Auth', conditions: { users: { excludeGroups: ['<ExclusionGroup>'] } } },
 *   { number: 1, prefixAndNumber: 'CA01' },
 *   ids
 * );
 * // payload.displayName === 'CA01 - Block Legacy Auth'
 * // payload.conditions.users.excludeGroups === [ids.exclusion]
 * ```
 */
export function substituteTemplate(
  template: PolicyTemplate,
  sequence: SequenceContext,
  ids: ResolvedGroupIds
): SubstitutionResult {
  const payload = structuredClone(template);
  const warnings: SubstitutionWarning[] = [];
  const substituted: PlaceholderKind[] = [];

  if (payload.displayName.includes(PREFIX_TOKEN)) {
    payload.displayName = payload.displayName.split(PREFIX_TOKEN).join(sequence.prefixAndNumber);
    substituted.push('PREFIX');
  } else {
    warnings.push({
      code: 'MISSING_PREFIX_TOKEN',
      message: `Display name "${payload.displayName}" has no ${PREFIX_TOKEN} token; deployed as is`,
    });
  }

  const users = payload.conditions?.users;
  if (users) {
    for (const field of GROUP_LIST_FIELDS) {
      const list = users[field];
      if (list) {
        users[field] = substituteGroupList(list, field, ids, warnings, substituted);
      }
    }
  }

  return { payload, warnings, substituted };
}

/**
 * Placeholder kinds a template uses, in table order
 */
export function findPlaceholders(template: PolicyTemplate): PlaceholderKind[] {
  const found: PlaceholderKind[] = [];
  if (template.displayName.includes(PREFIX_TOKEN)) {
    found.push('PREFIX');
  }

  const users = template.conditions?.users;
  for (const definition of GROUP_PLACEHOLDERS) {
    if (users?.[definition.field]?.includes(definition.token)) {
      found.push(definition.kind);
    }
  }

  return found;
}
