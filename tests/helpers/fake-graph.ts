/**
 * In-memory Graph client for unit tests
 *
 * Holds groups and policies in arrays, records every call, and can be told to
 * fail a given operation a number of times.
 */

import type { GraphClient } from '../../src/api/client.js';
import type { CreateGroupRequest, Group, PolicyPayload, RemotePolicy } from '../../src/api/types.js';
import { ApiRequestError } from '../../src/api/retry.js';

export type FakeOperation =
  | 'groups.list'
  | 'groups.create'
  | 'policies.list'
  | 'policies.create'
  | 'policies.update';

export interface FakeCall {
  operation: FakeOperation;
  args: unknown[];
}

export interface FakeGraphSeed {
  groups?: Group[];
  policies?: RemotePolicy[];
}

export interface FakeGraph {
  client: GraphClient;
  groups: Group[];
  policies: RemotePolicy[];
  calls: FakeCall[];
  /** Make the next `times` calls of an operation throw `error` */
  fail(operation: FakeOperation, error: Error, times?: number): void;
  /** Calls of one operation, in order */
  callsTo(operation: FakeOperation): FakeCall[];
}

export function createFakeGraph(seed: FakeGraphSeed = {}): FakeGraph {
  const groups: Group[] = [...(seed.groups ?? [])];
  const policies: RemotePolicy[] = [...(seed.policies ?? [])];
  const calls: FakeCall[] = [];
  const failures = new Map<FakeOperation, { error: Error; remaining: number }>();
  let groupCounter = 0;
  let policyCounter = 0;

  function record(operation: FakeOperation, ...args: unknown[]): void {
    calls.push({ operation, args });
    const failure = failures.get(operation);
    if (failure && failure.remaining > 0) {
      failure.remaining -= 1;
      throw failure.error;
    }
  }

  const client: GraphClient = {
    groups: {
      async listByDisplayNamePrefix(prefix: string): Promise<Group[]> {
        record('groups.list', prefix);
        const wanted = prefix.toLowerCase();
        return groups.filter((group) => group.displayName.toLowerCase().startsWith(wanted));
      },

      async create(request: CreateGroupRequest): Promise<Group> {
        record('groups.create', request);
        groupCounter += 1;
        const group: Group = { ...request, id: `group-${groupCounter}` };
        groups.push(group);
        return group;
      },
    },

    policies: {
      async listByDisplayNameSuffix(suffix: string): Promise<RemotePolicy[]> {
        record('policies.list', suffix);
        const wanted = suffix.toLowerCase();
        return policies.filter((policy) => policy.displayName.toLowerCase().endsWith(wanted));
      },

      async create(payload: PolicyPayload): Promise<RemotePolicy> {
        record('policies.create', payload);
        policyCounter += 1;
        const policy: RemotePolicy = { ...payload, id: `policy-${policyCounter}` };
        policies.push(policy);
        return policy;
      },

      async update(policyId: string, payload: PolicyPayload): Promise<void> {
        record('policies.update', policyId, payload);
        const index = policies.findIndex((policy) => policy.id === policyId);
        if (index === -1) {
          throw new ApiRequestError('Policy not found', 404, { code: 'ResourceNotFound' });
        }
        policies[index] = { ...payload, id: policyId };
      },
    },

    getConfig() {
      return { baseUrl: 'https://graph.test/v1.0', timeout: 1000 };
    },
  };

  return {
    client,
    groups,
    policies,
    calls,
    fail(operation, error, times = 1) {
      failures.set(operation, { error, remaining: times });
    },
    callsTo(operation) {
      return calls.filter((call) => call.operation === operation);
    },
  };
}
