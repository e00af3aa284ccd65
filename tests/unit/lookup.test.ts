/**
 * Unit Tests: Remote Policy Lookup
 *
 * @see src/reconcilers/policies/lookup.ts
 */

import { describe, it, expect, vi } from 'vitest';
import {
  deriveMatchName,
  endsWithMatchName,
  classifyMatches,
  findPoliciesByMatchName,
  requireMatchName,
} from '../../src/reconcilers/policies/lookup.js';
import type { RemotePolicy } from '../../src/api/types.js';
import { createFakeGraph } from '../helpers/fake-graph.js';

const LEGACY: RemotePolicy = { id: 'policy-legacy', displayName: 'CA07 - Block Legacy Auth' };
const MFA: RemotePolicy = { id: 'policy-mfa', displayName: 'CA02 - Require MFA' };

describe('deriveMatchName', () => {
  it('drops the prefix and sequence segment', () => {
    expect(deriveMatchName('CA07 - Block Legacy Auth')).toBe('Block Legacy Auth');
  });

  it('splits on the first dash only', () => {
    expect(deriveMatchName('CA01 - Require MFA - Admins')).toBe('Require MFA - Admins');
  });

  it('trims the remainder', () => {
    expect(deriveMatchName('  CA01-Block Legacy Auth  ')).toBe('Block Legacy Auth');
  });

  it('uses the whole trimmed name when there is no dash', () => {
    expect(deriveMatchName(' Block Legacy Auth ')).toBe('Block Legacy Auth');
  });
});

describe('requireMatchName', () => {
  it('returns the match name', () => {
    expect(requireMatchName('CA01 - Block Legacy Auth', '1-legacy.json')).toBe('Block Legacy Auth');
  });

  it('rejects a display name with nothing after the dash', () => {
    expect(() => requireMatchName('CA01 - ', 'blank.json')).toThrow(
      'Malformed template blank.json: display name "CA01 - " has no text after the first "-" to match existing policies on'
    );
  });
});

describe('endsWithMatchName', () => {
  it('compares case-insensitively', () => {
    expect(endsWithMatchName('CA07 - BLOCK legacy auth', 'Block Legacy Auth')).toBe(true);
  });

  it('rejects names with trailing text', () => {
    expect(endsWithMatchName('CA07 - Block Legacy Auth (old)', 'Block Legacy Auth')).toBe(false);
  });
});

describe('classifyMatches', () => {
  it('classifies zero, one and many', () => {
    expect(classifyMatches([])).toEqual({ state: 'none' });
    expect(classifyMatches([LEGACY])).toEqual({ state: 'one', policy: LEGACY });
    expect(classifyMatches([LEGACY, MFA])).toEqual({ state: 'many', policies: [LEGACY, MFA] });
  });
});

describe('findPoliciesByMatchName', () => {
  it('finds a policy deployed under an older sequence number', async () => {
    const fake = createFakeGraph({ policies: [LEGACY, MFA] });

    const match = await findPoliciesByMatchName(fake.client, 'Block Legacy Auth');

    expect(match).toEqual({ state: 'one', policy: LEGACY });
    expect(fake.callsTo('policies.list')).toEqual([{ operation: 'policies.list', args: ['Block Legacy Auth'] }]);
  });

  it('reports every policy sharing the suffix', async () => {
    const other: RemotePolicy = { id: 'policy-other', displayName: 'CA09 - Block Legacy Auth' };
    const fake = createFakeGraph({ policies: [LEGACY, MFA, other] });

    const match = await findPoliciesByMatchName(fake.client, 'Block Legacy Auth');

    expect(match).toEqual({ state: 'many', policies: [LEGACY, other] });
  });

  it('drops results that do not end with the match name', async () => {
    const fake = createFakeGraph();
    vi.spyOn(fake.client.policies, 'listByDisplayNameSuffix').mockResolvedValue([LEGACY, MFA]);

    const match = await findPoliciesByMatchName(fake.client, 'Require MFA');

    expect(match).toEqual({ state: 'one', policy: MFA });
  });

  it('refuses an empty match name without querying', async () => {
    const fake = createFakeGraph({ policies: [LEGACY] });

    await expect(findPoliciesByMatchName(fake.client, '')).rejects.toThrow(
      'A non-empty match name is required to look up policies'
    );
    expect(fake.calls).toEqual([]);
  });
});
