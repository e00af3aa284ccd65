/**
 * Unit Tests: Policy Create-or-Update
 *
 * Tests the sync decision and write path including:
 * - Create when nothing matches, update when one policy matches
 * - Refusal on ambiguous matches
 * - Dry-run mode
 * - Error wrapping
 *
 * @see src/reconcilers/policies/apply.ts
 */

import { describe, it, expect } from 'vitest';
import { applyPolicy, applyStateOverride, decideSyncAction } from '../../src/reconcilers/policies/apply.js';
import type { PolicyPayload, RemotePolicy } from '../../src/api/types.js';
import { ApiRequestError } from '../../src/api/retry.js';
import { AmbiguousMatchError, AuthError, RemoteWriteError } from '../../src/errors.js';
import { createFakeGraph } from '../helpers/fake-graph.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const PAYLOAD: PolicyPayload = {
  displayName: 'CA01 - Block Legacy Auth',
  state: 'enabled',
  conditions: { users: { excludeGroups: ['exclusion-id'] } },
};

const EXISTING: RemotePolicy = { id: 'policy-legacy', displayName: 'CA07 - Block Legacy Auth', state: 'disabled' };
const DUPLICATE: RemotePolicy = { id: 'policy-dup', displayName: 'CA09 - Block Legacy Auth' };

const OPTIONS = { templateName: '01-block-legacy-auth.json', matchName: 'Block Legacy Auth' };

// =============================================================================
// Sync Decision
// =============================================================================

describe('decideSyncAction', () => {
  it('creates when nothing matches', () => {
    expect(decideSyncAction({ state: 'none' }, 'Block Legacy Auth')).toBe('create');
  });

  it('updates when one policy matches', () => {
    expect(decideSyncAction({ state: 'one', policy: EXISTING }, 'Block Legacy Auth')).toBe('update');
  });

  it('refuses when several policies match', () => {
    try {
      decideSyncAction({ state: 'many', policies: [EXISTING, DUPLICATE] }, 'Block Legacy Auth');
      expect.fail('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(AmbiguousMatchError);
      if (err instanceof AmbiguousMatchError) {
        expect(err.candidates).toEqual([
          { id: 'policy-legacy', displayName: 'CA07 - Block Legacy Auth' },
          { id: 'policy-dup', displayName: 'CA09 - Block Legacy Auth' },
        ]);
        expect(err.fatal).toBe(false);
      }
    }
  });
});

// =============================================================================
// Apply
// =============================================================================

describe('applyPolicy', () => {
  it('creates a new policy', async () => {
    const fake = createFakeGraph();

    const result = await applyPolicy(fake.client, PAYLOAD, { state: 'none' }, OPTIONS);

    expect(result).toEqual({ action: 'create', policyId: 'policy-1', dryRun: false });
    expect(fake.policies).toEqual([{ ...PAYLOAD, id: 'policy-1' }]);
  });

  it('updates the matched policy with the whole payload', async () => {
    const fake = createFakeGraph({ policies: [EXISTING] });

    const result = await applyPolicy(fake.client, PAYLOAD, { state: 'one', policy: EXISTING }, OPTIONS);

    expect(result).toEqual({ action: 'update', policyId: 'policy-legacy', dryRun: false });
    expect(fake.callsTo('policies.update')).toEqual([
      { operation: 'policies.update', args: ['policy-legacy', PAYLOAD] },
    ]);
    expect(fake.policies[0]?.displayName).toBe('CA01 - Block Legacy Auth');
    expect(fake.callsTo('policies.create')).toEqual([]);
  });

  it('writes nothing in dry-run mode', async () => {
    const fake = createFakeGraph({ policies: [EXISTING] });

    const create = await applyPolicy(fake.client, PAYLOAD, { state: 'none' }, { ...OPTIONS, dryRun: true });
    const update = await applyPolicy(
      fake.client,
      PAYLOAD,
      { state: 'one', policy: EXISTING },
      { ...OPTIONS, dryRun: true }
    );

    expect(create).toEqual({ action: 'create', policyId: undefined, dryRun: true });
    expect(update).toEqual({ action: 'update', policyId: 'policy-legacy', dryRun: true });
    expect(fake.calls).toEqual([]);
  });

  it('writes nothing when the match is ambiguous', async () => {
    const fake = createFakeGraph({ policies: [EXISTING, DUPLICATE] });

    await expect(
      applyPolicy(fake.client, PAYLOAD, { state: 'many', policies: [EXISTING, DUPLICATE] }, OPTIONS)
    ).rejects.toBeInstanceOf(AmbiguousMatchError);
    expect(fake.calls).toEqual([]);
  });

  it('wraps a rejected write in RemoteWriteError', async () => {
    const fake = createFakeGraph();
    const body = { error: { code: 'BadRequest', message: 'Invalid conditions' } };
    fake.fail('policies.create', new ApiRequestError('Invalid conditions', 400, { code: 'BadRequest', details: body }));

    try {
      await applyPolicy(fake.client, PAYLOAD, { state: 'none' }, OPTIONS);
      expect.fail('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(RemoteWriteError);
      if (err instanceof RemoteWriteError) {
        expect(err.action).toBe('create');
        expect(err.status).toBe(400);
        expect(err.body).toEqual(body);
        expect(err.message).toBe(
          'Failed to create policy "01-block-legacy-auth.json" (HTTP 400): Invalid conditions'
        );
      }
    }
  });

  it('lets auth failures through unchanged', async () => {
    const fake = createFakeGraph({ policies: [EXISTING] });
    const authError = new AuthError('token rejected');
    fake.fail('policies.update', authError);

    await expect(
      applyPolicy(fake.client, PAYLOAD, { state: 'one', policy: EXISTING }, OPTIONS)
    ).rejects.toBe(authError);
  });
});

describe('applyStateOverride', () => {
  it('replaces the state when one is given', () => {
    expect(applyStateOverride(PAYLOAD, 'disabled').state).toBe('disabled');
  });

  it('returns the payload unchanged otherwise', () => {
    expect(applyStateOverride(PAYLOAD, undefined)).toBe(PAYLOAD);
  });
});
