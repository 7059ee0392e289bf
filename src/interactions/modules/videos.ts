/**
 * Video Module
 *
 * @module interactions/modules/videos
 */

import type { TavusApi } from '../../core/api-client.js';
import { preview } from '../../core/format.js';
import type { Replica, Video } from '../../core/models.js';
import { browse } from '../pagination/browse.js';
import { showDetails } from '../pagination/paginated-list.js';
import { ReservedScreens, type MenuEntry, type NavigationContext, type ScreenId } from '../types.js';
import { BaseModule, type ModuleDeps } from './base-module.js';
import { pickReplica } from './pickers.js';
import { ResourceCache, refreshCache } from './resource-cache.js';

export const VideoScreens = {
  Home: 'work_with_videos',
  Generate: 'generate_video',
  List: 'list_videos',
  Rename: 'rename_video',
  Delete: 'delete_video',
} as const;

type VideoScreen = (typeof VideoScreens)[keyof typeof VideoScreens];

const SCRIPT_SUMMARY_LENGTH = 100;

export class VideoModule extends BaseModule {
  readonly name = 'video';
  readonly screens: readonly VideoScreen[] = Object.values(VideoScreens);
  readonly menuEntries: readonly MenuEntry[] = [
    {
      label: 'Work with Videos',
      screen: VideoScreens.Home,
      icon: '🎬',
      description: 'Generate, list, rename or delete videos',
    },
  ];
  protected readonly home = VideoScreens.Home;

  readonly cache = new ResourceCache<Video>();
  private readonly replicas = new ResourceCache<Replica>();

  constructor(deps: ModuleDeps) {
    super(deps, 'videos');
  }

  protected async handle(screen: ScreenId, context: NavigationContext): Promise<ScreenId> {
    const client = await this.requireClient(context);
    if (!client) return ReservedScreens.MainMenu;

    switch (screen) {
      case VideoScreens.Home:
        return this.showHome(client);
      case VideoScreens.Generate:
        return this.generate(client);
      case VideoScreens.List:
        return this.list();
      case VideoScreens.Rename:
        return this.rename(client);
      case VideoScreens.Delete:
        return this.remove(client);
      default:
        return ReservedScreens.MainMenu;
    }
  }

  private async showHome(client: TavusApi): Promise<ScreenId> {
    await this.heading('Work with Videos');
    await refreshCache(this.renderer, this.cache, 'Loading videos...', () => client.listVideos());

    return this.homeMenu('What would you like to do with Videos?', [
      { label: 'Generate a Video', screen: VideoScreens.Generate },
      { label: 'List Videos', screen: VideoScreens.List },
      { label: 'Rename a Video', screen: VideoScreens.Rename },
      { label: 'Delete a Video', screen: VideoScreens.Delete },
    ]);
  }

  private async generate(client: TavusApi): Promise<ScreenId> {
    await this.heading('Generate Video');

    const videoName = await this.askRequired('Video Name:', 'Video name cannot be empty. Please try again.');
    if (videoName === null) return VideoScreens.Home;

    await this.say('Select a replica for this video:');
    const replica = await pickReplica({ renderer: this.renderer, client, pageSize: this.pageSize }, this.replicas);
    if (!replica) {
      await this.say('Replica selection cancelled.', 'info');
      await this.pause();
      return VideoScreens.Home;
    }

    const script = await this.askRequired('Script:', 'Script cannot be empty. Please try again.');
    if (script === null) return VideoScreens.Home;

    await this.say(
      [
        'Confirm video generation:',
        `  Name: ${videoName}`,
        `  Replica ID: ${replica.id}`,
        `  Script: ${preview(script, SCRIPT_SUMMARY_LENGTH)}`,
      ].join('\n')
    );
    if (!(await this.confirmOrCancel('Proceed with video generation?', 'Video generation cancelled.'))) {
      return VideoScreens.Home;
    }

    const progress = this.renderer.progress({ message: 'Generating video...' });
    const result = await client.generateVideo({ videoName, replicaId: replica.id, script });
    progress.stop();

    if (result.ok) {
      await this.say(result.message, 'success');
      await this.say(
        [
          `Video ID: ${result.data.id}`,
          `Video Name: ${result.data.name || 'N/A'}`,
          `Status: ${result.data.status || 'N/A'}`,
        ].join('\n')
      );
      await this.say('Video generation is now in progress. You can check the status later.', 'info');
    } else {
      await this.say(result.message, 'error');
    }

    await this.pause();
    return VideoScreens.Home;
  }

  private async list(): Promise<ScreenId> {
    await this.heading('List Videos');

    await browse<Video>({
      renderer: this.renderer,
      title: 'Videos',
      pageSize: this.pageSize,
      policy: { kind: 'details' },
      load: async () => ({ kind: 'plain', items: this.cache.all() }),
    });

    return VideoScreens.Home;
  }

  private async rename(client: TavusApi): Promise<ScreenId> {
    await this.heading('Rename Video');

    const outcome = await browse<Video>({
      renderer: this.renderer,
      title: 'Videos',
      pageSize: this.pageSize,
      policy: { kind: 'act', run: (video) => this.renameOne(client, video) },
      load: async () => ({ kind: 'plain', items: this.cache.all() }),
    });

    return outcome.type === 'screen' ? outcome.screen : VideoScreens.Home;
  }

  private async renameOne(client: TavusApi, video: Video): Promise<ScreenId | null> {
    await this.say(`Renaming video: ${video.name} (${video.id})`);
    await showDetails(this.renderer, video);

    const answer = await this.renderer.input({ message: 'New name:' });
    const newName = answer?.trim() ?? '';
    if (newName.length === 0) {
      await this.say('Video name cannot be empty. Please try again.', 'warning');
      await this.pause();
      return null;
    }

    await this.say(['Confirm rename operation:', `  From: ${video.name}`, `  To:   ${newName}`].join('\n'));
    if (!(await this.confirmOrCancel('Are you sure you want to rename this video?', 'Rename operation cancelled.'))) {
      return null;
    }

    const progress = this.renderer.progress({ message: 'Renaming video...' });
    const status = await client.renameVideo(video.id, newName);
    progress.stop();

    if (status.ok) {
      this.cache.update(video.id, (current) => current.withName(newName));
      await this.say(`Video renamed successfully to: ${newName}`, 'success');
    } else {
      await this.say(`Error renaming video: ${status.message}`, 'error');
    }

    await this.pause();
    return VideoScreens.Home;
  }

  private async remove(client: TavusApi): Promise<ScreenId> {
    await this.heading('Delete Video');

    const outcome = await browse<Video>({
      renderer: this.renderer,
      title: 'Videos',
      pageSize: this.pageSize,
      policy: { kind: 'act', run: (video) => this.removeOne(client, video) },
      load: async () => ({ kind: 'plain', items: this.cache.all() }),
    });

    return outcome.type === 'screen' ? outcome.screen : VideoScreens.Home;
  }

  private async removeOne(client: TavusApi, video: Video): Promise<ScreenId | null> {
    await this.say(`Deleting video: ${video.name} (${video.id})`);
    await showDetails(this.renderer, video);

    await this.say(
      ['Confirm delete operation:', `  Video Name: ${video.name}`, `  Video ID: ${video.id}`, `  Status: ${video.status}`].join('\n')
    );
    await this.say('WARNING: This action cannot be undone!', 'warning');
    if (!(await this.confirmOrCancel('Are you sure you want to delete this video?', 'Delete operation cancelled.'))) {
      return null;
    }

    const progress = this.renderer.progress({ message: 'Deleting video...' });
    const status = await client.deleteVideo(video.id);
    progress.stop();

    if (status.ok) {
      this.cache.remove(video.id);
      await this.say(`Video deleted successfully: ${video.name}`, 'success');
    } else {
      await this.say(`Error deleting video: ${status.message}`, 'error');
    }

    await this.pause();
    return VideoScreens.Home;
  }
}
