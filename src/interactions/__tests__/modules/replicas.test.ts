/**
 * Replica Module Tests
 *
 * @module interactions/__tests__/modules/replicas.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ReplicaModule, ReplicaScreens } from '../../modules/replicas.js';
import { NO_CLIENT_MESSAGE } from '../../modules/base-module.js';
import type { NavigationContext } from '../../types.js';
import { createMockRenderer, labelsOf, optionStartingWith, type MockRenderer } from '../mocks/renderer.js';
import { createRecordingLogger } from '../mocks/logger.js';
import { FakeTavusApi, FAILURE_MESSAGE } from '../mocks/api.js';
import { makeReplica, makeReplicas } from '../mocks/factories.js';

describe('ReplicaModule', () => {
  let renderer: MockRenderer;
  let api: FakeTavusApi;
  let context: NavigationContext;
  let module: ReplicaModule;

  beforeEach(() => {
    renderer = createMockRenderer();
    api = new FakeTavusApi();
    context = { apiKey: 'test-secret', client: api };
    module = new ReplicaModule({ renderer, logger: createRecordingLogger(), pageSize: 10 });
  });

  function seedCache(count: number): void {
    module.cache.replaceAll(
      Array.from({ length: count }, (_, index) => makeReplica({ id: `r${index + 1}`, name: `Replica ${index + 1}` }))
    );
  }

  it('contributes one main menu entry', () => {
    expect(module.menuEntries.map((entry) => entry.label)).toEqual(['Work with Replicas']);
    expect(module.screens).toEqual([
      'work_with_replicas',
      'create_replica',
      'list_replicas',
      'rename_replica',
      'delete_replica',
    ]);
  });

  it('refuses every screen without a client', async () => {
    context.client = null;

    const next = await module.execute(ReplicaScreens.List, context);

    expect(next).toBe('main_menu');
    expect(renderer.displayInteractions).toEqual([{ message: NO_CLIENT_MESSAGE, format: 'error' }]);
  });

  it('warms the cache up from the API without its own progress output', async () => {
    api.replicas = makeReplicas(2, 'user');

    await module.prepare(context);

    expect(module.cache.size()).toBe(2);
    expect(renderer.callCounts.progress).toBe(0);
  });

  it('fails the warm-up when the list cannot be fetched', async () => {
    api.failing.add('listReplicas');

    await expect(module.prepare(context)).rejects.toThrow(FAILURE_MESSAGE);
    expect(module.cache.isLoaded()).toBe(false);
  });

  describe('home', () => {
    it('refreshes the cache and returns the chosen screen', async () => {
      api.replicas = makeReplicas(3, 'user');
      renderer.selectResponses = [ReplicaScreens.List];

      const next = await module.execute(ReplicaScreens.Home, context);

      expect(next).toBe('list_replicas');
      expect(module.cache.size()).toBe(3);
      expect(labelsOf(renderer.selectInteractions[0])).toEqual([
        'Create a Replica',
        'List Replicas',
        'Rename a Replica',
        'Delete a Replica',
        'Back to Main Menu',
      ]);
    });

    it('keeps the previous cache when the refresh fails', async () => {
      seedCache(2);
      api.failing.add('listReplicas');
      renderer.selectResponses = [null];

      const next = await module.execute(ReplicaScreens.Home, context);

      expect(next).toBe('main_menu');
      expect(module.cache.size()).toBe(2);
      expect(renderer.lastProgressHandle?.failMessage).toBe(FAILURE_MESSAGE);
    });
  });

  describe('create', () => {
    it('creates a replica after confirmation', async () => {
      renderer.inputResponses = ['My Twin', 'https://example.test/train.mp4', 'https://example.test/consent.mp4'];
      renderer.confirmResponses = [true];

      const next = await module.execute(ReplicaScreens.Create, context);

      expect(next).toBe('work_with_replicas');
      expect(api.lastCreateReplica).toEqual({
        replicaName: 'My Twin',
        trainVideoUrl: 'https://example.test/train.mp4',
        consentVideoUrl: 'https://example.test/consent.mp4',
      });
      expect(renderer.displayedMessages).toContain('Replica ID: r-new\nStatus: training');
      expect(renderer.callCounts.waitForEnter).toBe(1);
    });

    it('stops on an empty name', async () => {
      renderer.inputResponses = ['   '];

      const next = await module.execute(ReplicaScreens.Create, context);

      expect(next).toBe('work_with_replicas');
      expect(renderer.displayInteractions).toContainEqual({
        message: 'Replica name cannot be empty. Please try again.',
        format: 'warning',
      });
      expect(api.count('createReplica')).toBe(0);
    });

    it('stops on an empty consent URL', async () => {
      renderer.inputResponses = ['My Twin', 'https://example.test/train.mp4', ''];

      await module.execute(ReplicaScreens.Create, context);

      expect(renderer.displayedMessages).toContain('Video URL cannot be empty. Please try again.');
      expect(api.count('createReplica')).toBe(0);
    });

    it('does nothing when the operator declines', async () => {
      renderer.inputResponses = ['My Twin', 'https://example.test/train.mp4', 'https://example.test/consent.mp4'];
      renderer.confirmResponses = [false];

      await module.execute(ReplicaScreens.Create, context);

      expect(renderer.displayedMessages).toContain('Replica creation cancelled.');
      expect(api.count('createReplica')).toBe(0);
    });

    it('reports an API failure', async () => {
      api.failing.add('createReplica');
      renderer.inputResponses = ['My Twin', 'https://example.test/train.mp4', 'https://example.test/consent.mp4'];
      renderer.confirmResponses = [true];

      await module.execute(ReplicaScreens.Create, context);

      expect(renderer.displayInteractions).toContainEqual({ message: FAILURE_MESSAGE, format: 'error' });
    });
  });

  describe('list', () => {
    it('returns to the replica home on Go Back without touching the API', async () => {
      seedCache(3);
      renderer.selectResponses = ['← Go Back', '← Go Back'];

      const first = await module.execute(ReplicaScreens.List, context);
      const second = await module.execute(ReplicaScreens.List, context);

      expect(first).toBe('work_with_replicas');
      expect(second).toBe('work_with_replicas');
      expect(api.calls).toEqual([]);
    });

    it('sections the list and offers the replica filters', async () => {
      module.cache.replaceAll([...makeReplicas(2, 'user'), ...makeReplicas(1, 'system')]);
      renderer.selectResponses = ['Current filter: all', 'system', '← Go Back'];

      await module.execute(ReplicaScreens.List, context);

      expect(labelsOf(renderer.selectInteractions[0])).toEqual([
        'Current filter: all',
        '--- User Replicas ---',
        '1. ✅ user replica 1 (u1) - completed - 100/100',
        '2. ✅ user replica 2 (u2) - completed - 100/100',
        '--- System Replicas ---',
        '3. ✅ system replica 1 (s1) - completed - 100/100',
        '← Go Back',
      ]);
      expect(labelsOf(renderer.selectInteractions[1])).toEqual(['user', 'system', 'all']);
      expect(labelsOf(renderer.selectInteractions[2])).toEqual([
        'Current filter: system',
        '--- System Replicas ---',
        '1. ✅ system replica 1 (s1) - completed - 100/100',
        '← Go Back',
      ]);
    });
  });

  describe('delete', () => {
    it('removes exactly the chosen replica from the cache without a re-fetch', async () => {
      seedCache(9);
      renderer.selectResponses = [optionStartingWith('7. ')];
      renderer.confirmResponses = [true];

      const next = await module.execute(ReplicaScreens.Delete, context);

      expect(next).toBe('work_with_replicas');
      expect(module.cache.all().map((replica) => replica.id)).toEqual(['r1', 'r2', 'r3', 'r4', 'r5', 'r6', 'r8', 'r9']);
      expect(api.calls).toEqual(['deleteReplica']);
      expect(renderer.displayedMessages).toContain('Replica deleted successfully: Replica 7');
    });

    it('offers only user replicas', async () => {
      module.cache.replaceAll([...makeReplicas(1, 'user'), ...makeReplicas(2, 'system')]);
      renderer.selectResponses = ['← Go Back'];

      await module.execute(ReplicaScreens.Delete, context);

      expect(labelsOf(renderer.selectInteractions[0])).toEqual([
        '--- User Replicas ---',
        '1. ✅ user replica 1 (u1) - completed - 100/100',
        '← Go Back',
      ]);
    });

    it('keeps the cache when the API refuses', async () => {
      seedCache(3);
      api.failing.add('deleteReplica');
      renderer.selectResponses = [optionStartingWith('2. ')];
      renderer.confirmResponses = [true];

      await module.execute(ReplicaScreens.Delete, context);

      expect(module.cache.size()).toBe(3);
      expect(renderer.displayedMessages).toContain(`Error deleting replica: ${FAILURE_MESSAGE}`);
    });
  });

  describe('rename', () => {
    it('updates the cached name in place on success', async () => {
      seedCache(3);
      renderer.selectResponses = [optionStartingWith('2. ')];
      renderer.inputResponses = ['Renamed'];
      renderer.confirmResponses = [true];

      const next = await module.execute(ReplicaScreens.Rename, context);

      expect(next).toBe('work_with_replicas');
      expect(module.cache.all().map((replica) => replica.name)).toEqual(['Replica 1', 'Renamed', 'Replica 3']);
      expect(renderer.displayedMessages).toContain('Replica renamed successfully to: Renamed');
      expect(api.count('listReplicas')).toBe(0);
    });

    it('leaves the cache unchanged and shows the failure', async () => {
      seedCache(3);
      api.failing.add('renameReplica');
      renderer.selectResponses = [optionStartingWith('2. ')];
      renderer.inputResponses = ['Renamed'];
      renderer.confirmResponses = [true];

      await module.execute(ReplicaScreens.Rename, context);

      expect(module.cache.find('r2')?.name).toBe('Replica 2');
      expect(renderer.displayInteractions).toContainEqual({
        message: `Error renaming replica: ${FAILURE_MESSAGE}`,
        format: 'error',
      });
    });

    it('returns to the list when the new name is empty', async () => {
      seedCache(3);
      renderer.selectResponses = [optionStartingWith('1. '), '← Go Back'];
      renderer.inputResponses = [''];

      const next = await module.execute(ReplicaScreens.Rename, context);

      expect(next).toBe('work_with_replicas');
      expect(renderer.callCounts.select).toBe(2);
      expect(api.count('renameReplica')).toBe(0);
    });
  });
});
