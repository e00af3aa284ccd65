/**
 * Run-scoped group resolver
 *
 * Wraps resolveOrCreateGroup with a cache keyed by lower-cased display name,
 * so a name costs at most one lookup and one create per run.
 */

import type { GraphClient } from '../../api/client.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import { resolveOrCreateGroup } from './ensure.js';
import type { GroupResolution, GroupResolver, GroupSpec } from './types.js';

export interface GroupResolverOptions {
  dryRun?: boolean;
  logger?: ApiLogger;
}

/**
 * Create a group resolver bound to a client
 */
export function createGroupResolver(client: GraphClient, options: GroupResolverOptions = {}): GroupResolver {
  const log = options.logger ?? defaultLogger;
  const cache = new Map<string, GroupResolution>();
  const resolutions: GroupResolution[] = [];

  return {
    async resolve(name: string, spec?: GroupSpec): Promise<GroupResolution> {
      const key = name.toLowerCase();
      const cached = cache.get(key);
      if (cached) {
        return cached;
      }

      const resolution = await resolveOrCreateGroup(client, name, { dryRun: options.dryRun, spec });
      cache.set(key, resolution);
      resolutions.push(resolution);

      switch (resolution.status) {
        case 'created':
          log.info(`Created group ${name}`, { groupId: resolution.id });
          break;
        case 'planned':
          log.info(`Group ${name} does not exist and would be created`);
          break;
        default:
          log.debug(`Found group ${name}`, { groupId: resolution.id });
      }

      return resolution;
    },

    history(): GroupResolution[] {
      return [...resolutions];
    },
  };
}
