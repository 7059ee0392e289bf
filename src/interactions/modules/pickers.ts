/**
 * Pickers
 *
 * Reusable "choose one" browses used by create flows. Each caller passes
 * its own cache, so no module reads another module's state.
 *
 * @module interactions/modules/pickers
 */

import type { TavusApi } from '../../core/api-client.js';
import type { Persona, Replica } from '../../core/models.js';
import { browse, type ListSource } from '../pagination/browse.js';
import type { Renderer } from '../types.js';
import { refreshCache, type ResourceCache } from './resource-cache.js';

export const REPLICA_FILTERS = ['user', 'system', 'all'] as const;

export type ReplicaFilter = (typeof REPLICA_FILTERS)[number];

export function isReplicaFilter(value: string): value is ReplicaFilter {
  return REPLICA_FILTERS.some((filter) => filter === value);
}

/**
 * Sections for a replica filter: user first, then system
 */
export function replicaSource(replicas: readonly Replica[], filter: string): ListSource<Replica> {
  const user = replicas.filter((replica) => replica.isUser());
  const system = replicas.filter((replica) => replica.isSystem());

  switch (filter) {
    case 'user':
      return { kind: 'sectioned', sections: [{ name: 'User Replicas', items: user }] };
    case 'system':
      return { kind: 'sectioned', sections: [{ name: 'System Replicas', items: system }] };
    default:
      return {
        kind: 'sectioned',
        sections: [
          { name: 'User Replicas', items: user },
          { name: 'System Replicas', items: system },
        ],
      };
  }
}

export interface PickerDeps {
  renderer: Renderer;
  client: TavusApi;
  pageSize: number;
}

/**
 * Refresh the caller's replica cache and let the operator pick one.
 * Returns null when there is nothing to pick or the operator backs out.
 */
export async function pickReplica(deps: PickerDeps, cache: ResourceCache<Replica>): Promise<Replica | null> {
  const { renderer, client, pageSize } = deps;
  await refreshCache(renderer, cache, 'Loading replicas...', () => client.listReplicas());

  if (cache.size() === 0) {
    await renderer.display({ message: 'No replicas found. Please create a replica first.', format: 'warning' });
    await renderer.waitForEnter();
    return null;
  }

  const outcome = await browse<Replica>({
    renderer,
    title: 'Replicas',
    pageSize,
    policy: { kind: 'pick' },
    filters: { initial: 'all', choices: REPLICA_FILTERS },
    prompt: 'Select a replica:',
    load: async (filter) => replicaSource(cache.all(), filter),
  });

  return outcome.type === 'picked' ? outcome.item : null;
}

/**
 * Refresh the caller's persona cache with user personas and let the
 * operator pick one. Returns null when skipped.
 */
export async function pickPersona(deps: PickerDeps, cache: ResourceCache<Persona>): Promise<Persona | null> {
  const { renderer, client, pageSize } = deps;
  await refreshCache(renderer, cache, 'Loading personas...', () => client.listPersonas('user'));

  if (cache.size() === 0) {
    await renderer.display({ message: 'No user personas found.', format: 'info' });
    return null;
  }

  const outcome = await browse<Persona>({
    renderer,
    title: 'Personas',
    pageSize,
    policy: { kind: 'pick' },
    prompt: 'Select a persona (Go Back to skip):',
    load: async () => ({ kind: 'plain', items: cache.all() }),
  });

  return outcome.type === 'picked' ? outcome.item : null;
}
