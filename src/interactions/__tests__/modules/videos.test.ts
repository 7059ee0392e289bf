/**
 * Video Module Tests
 *
 * @module interactions/__tests__/modules/videos.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { VideoModule, VideoScreens } from '../../modules/videos.js';
import type { NavigationContext } from '../../types.js';
import { createMockRenderer, labelsOf, optionStartingWith, type MockRenderer } from '../mocks/renderer.js';
import { createRecordingLogger } from '../mocks/logger.js';
import { FakeTavusApi, FAILURE_MESSAGE } from '../mocks/api.js';
import { makeReplica, makeVideo } from '../mocks/factories.js';

describe('VideoModule', () => {
  let renderer: MockRenderer;
  let api: FakeTavusApi;
  let context: NavigationContext;
  let module: VideoModule;

  beforeEach(() => {
    renderer = createMockRenderer();
    api = new FakeTavusApi();
    context = { apiKey: 'test-secret', client: api };
    module = new VideoModule({ renderer, logger: createRecordingLogger(), pageSize: 10 });
  });

  it('has no warm-up hook', () => {
    expect('prepare' in module).toBe(false);
  });

  it('refreshes videos on the home screen', async () => {
    api.videos = [makeVideo(), makeVideo({ id: 'v2', name: 'Video 2', status: 'generating' })];
    renderer.selectResponses = [VideoScreens.Generate];

    const next = await module.execute(VideoScreens.Home, context);

    expect(next).toBe('generate_video');
    expect(module.cache.size()).toBe(2);
    expect(renderer.progressMessages).toEqual(['Loading videos...', '✓ Successfully fetched 2 video(s)']);
  });

  describe('generate', () => {
    it('generates a video with the picked replica', async () => {
      api.replicas = [makeReplica()];
      renderer.inputResponses = ['Welcome', 'Hello there'];
      renderer.selectResponses = [optionStartingWith('1. ')];
      renderer.confirmResponses = [true];

      const next = await module.execute(VideoScreens.Generate, context);

      expect(next).toBe('work_with_videos');
      expect(renderer.selectInteractions[0]?.message).toBe('Select a replica:');
      expect(api.lastGenerateVideo).toEqual({ videoName: 'Welcome', replicaId: 'r1', script: 'Hello there' });
      expect(renderer.displayedMessages).toContain('Video ID: v-new\nVideo Name: Welcome\nStatus: queued');
    });

    it('shortens long scripts in the confirmation summary', async () => {
      api.replicas = [makeReplica()];
      renderer.inputResponses = ['Welcome', 'x'.repeat(120)];
      renderer.selectResponses = [optionStartingWith('1. ')];
      renderer.confirmResponses = [false];

      await module.execute(VideoScreens.Generate, context);

      expect(renderer.displayedMessages).toContain(
        `Confirm video generation:\n  Name: Welcome\n  Replica ID: r1\n  Script: ${'x'.repeat(100)}...`
      );
      expect(renderer.displayedMessages).toContain('Video generation cancelled.');
      expect(api.count('generateVideo')).toBe(0);
    });

    it('stops when no replica is picked', async () => {
      api.replicas = [makeReplica()];
      renderer.inputResponses = ['Welcome'];
      renderer.selectResponses = ['← Go Back'];

      const next = await module.execute(VideoScreens.Generate, context);

      expect(next).toBe('work_with_videos');
      expect(renderer.displayedMessages).toContain('Replica selection cancelled.');
      expect(renderer.callCounts.input).toBe(1);
      expect(api.count('generateVideo')).toBe(0);
    });

    it('reports an API failure', async () => {
      api.replicas = [makeReplica()];
      api.failing.add('generateVideo');
      renderer.inputResponses = ['Welcome', 'Hello there'];
      renderer.selectResponses = [optionStartingWith('1. ')];
      renderer.confirmResponses = [true];

      await module.execute(VideoScreens.Generate, context);

      expect(renderer.displayInteractions).toContainEqual({ message: FAILURE_MESSAGE, format: 'error' });
    });
  });

  describe('list', () => {
    it('lists cached videos without a filter toggle', async () => {
      module.cache.replaceAll([makeVideo(), makeVideo({ id: 'v2', name: 'Video 2', status: 'error' })]);
      renderer.selectResponses = ['← Go Back'];

      const next = await module.execute(VideoScreens.List, context);

      expect(next).toBe('work_with_videos');
      expect(labelsOf(renderer.selectInteractions[0])).toEqual([
        '1. ✅ Video 1 (v1) - ready',
        '2. ❌ Video 2 (v2) - error',
        '← Go Back',
      ]);
      expect(api.calls).toEqual([]);
    });

    it('offers only Go Back for an empty cache', async () => {
      renderer.selectResponses = ['← Go Back'];

      await module.execute(VideoScreens.List, context);

      expect(labelsOf(renderer.selectInteractions[0])).toEqual(['← Go Back']);
      expect(renderer.displayedMessages).toContain('No all videos found.');
    });
  });

  describe('rename', () => {
    it('renames the cached video', async () => {
      module.cache.replaceAll([makeVideo()]);
      renderer.selectResponses = [optionStartingWith('1. ')];
      renderer.inputResponses = ['Intro'];
      renderer.confirmResponses = [true];

      await module.execute(VideoScreens.Rename, context);

      expect(module.cache.find('v1')?.name).toBe('Intro');
      expect(renderer.displayedMessages).toContain('Video renamed successfully to: Intro');
    });
  });

  describe('delete', () => {
    it('removes the cached video', async () => {
      module.cache.replaceAll([makeVideo(), makeVideo({ id: 'v2', name: 'Video 2' })]);
      renderer.selectResponses = [optionStartingWith('1. ')];
      renderer.confirmResponses = [true];

      await module.execute(VideoScreens.Delete, context);

      expect(module.cache.all().map((video) => video.id)).toEqual(['v2']);
      expect(renderer.displayedMessages).toContain('Video deleted successfully: Video 1');
    });

    it('keeps the cache on failure', async () => {
      module.cache.replaceAll([makeVideo()]);
      api.failing.add('deleteVideo');
      renderer.selectResponses = [optionStartingWith('1. ')];
      renderer.confirmResponses = [true];

      await module.execute(VideoScreens.Delete, context);

      expect(module.cache.size()).toBe(1);
      expect(renderer.displayedMessages).toContain(`Error deleting video: ${FAILURE_MESSAGE}`);
    });
  });
});
