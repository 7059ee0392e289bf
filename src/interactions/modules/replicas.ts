/**
 * Replica Module
 *
 * Screens for creating, browsing, renaming and deleting replicas. The list
 * is sectioned into user and system replicas; only user replicas can be
 * renamed or deleted.
 *
 * @module interactions/modules/replicas
 */

import type { TavusApi } from '../../core/api-client.js';
import type { Replica } from '../../core/models.js';
import { browse } from '../pagination/browse.js';
import { showDetails } from '../pagination/paginated-list.js';
import { ReservedScreens, type MenuEntry, type NavigationContext, type ScreenId } from '../types.js';
import { BaseModule, type ModuleDeps } from './base-module.js';
import { REPLICA_FILTERS, replicaSource } from './pickers.js';
import { ResourceCache, loadCache, refreshCache } from './resource-cache.js';

export const ReplicaScreens = {
  Home: 'work_with_replicas',
  Create: 'create_replica',
  List: 'list_replicas',
  Rename: 'rename_replica',
  Delete: 'delete_replica',
} as const;

type ReplicaScreen = (typeof ReplicaScreens)[keyof typeof ReplicaScreens];

export class ReplicaModule extends BaseModule {
  readonly name = 'replica';
  readonly screens: readonly ReplicaScreen[] = Object.values(ReplicaScreens);
  readonly menuEntries: readonly MenuEntry[] = [
    {
      label: 'Work with Replicas',
      screen: ReplicaScreens.Home,
      icon: '🧑',
      description: 'Create, list, rename or delete replicas',
    },
  ];
  protected readonly home = ReplicaScreens.Home;

  readonly cache = new ResourceCache<Replica>();

  constructor(deps: ModuleDeps) {
    super(deps, 'replicas');
  }

  /**
   * Initial replica load at startup; the navigator owns the progress output
   *
   * @throws Error when the list cannot be fetched
   */
  async prepare(context: NavigationContext): Promise<void> {
    if (!context.client) return;

    const client = context.client;
    const result = await loadCache(this.cache, () => client.listReplicas());
    if (!result.ok) {
      throw new Error(result.message);
    }
  }

  protected async handle(screen: ScreenId, context: NavigationContext): Promise<ScreenId> {
    const client = await this.requireClient(context);
    if (!client) return ReservedScreens.MainMenu;

    switch (screen) {
      case ReplicaScreens.Home:
        return this.showHome(client);
      case ReplicaScreens.Create:
        return this.create(client);
      case ReplicaScreens.List:
        return this.list();
      case ReplicaScreens.Rename:
        return this.rename(client);
      case ReplicaScreens.Delete:
        return this.remove(client);
      default:
        return ReservedScreens.MainMenu;
    }
  }

  private async refresh(client: TavusApi): Promise<boolean> {
    return refreshCache(this.renderer, this.cache, 'Loading replicas...', () => client.listReplicas());
  }

  private async showHome(client: TavusApi): Promise<ScreenId> {
    await this.heading('Work with Replicas');
    await this.refresh(client);

    return this.homeMenu('What would you like to do with Replicas?', [
      { label: 'Create a Replica', screen: ReplicaScreens.Create },
      { label: 'List Replicas', screen: ReplicaScreens.List },
      { label: 'Rename a Replica', screen: ReplicaScreens.Rename },
      { label: 'Delete a Replica', screen: ReplicaScreens.Delete },
    ]);
  }

  private async create(client: TavusApi): Promise<ScreenId> {
    await this.heading('Create Replica');

    const replicaName = await this.askRequired('Replica Name:', 'Replica name cannot be empty. Please try again.');
    if (replicaName === null) return ReplicaScreens.Home;

    const trainVideoUrl = await this.askRequired('Training Video URL:', 'Video URL cannot be empty. Please try again.');
    if (trainVideoUrl === null) return ReplicaScreens.Home;

    const consentVideoUrl = await this.askRequired('Consent Video URL:', 'Video URL cannot be empty. Please try again.');
    if (consentVideoUrl === null) return ReplicaScreens.Home;

    await this.say(
      [
        'Confirm replica creation:',
        `  Name: ${replicaName}`,
        `  Training Video URL: ${trainVideoUrl}`,
        `  Consent Video URL: ${consentVideoUrl}`,
      ].join('\n')
    );
    if (!(await this.confirmOrCancel('Proceed with replica creation?', 'Replica creation cancelled.'))) {
      return ReplicaScreens.Home;
    }

    const progress = this.renderer.progress({ message: 'Creating replica...' });
    const result = await client.createReplica({ replicaName, trainVideoUrl, consentVideoUrl });
    progress.stop();

    if (result.ok) {
      await this.say(result.message, 'success');
      await this.say(`Replica ID: ${result.data.id}\nStatus: ${result.data.status || 'N/A'}`);
      await this.say('Replica training is now in progress. You can check the status later.', 'info');
    } else {
      await this.say(result.message, 'error');
    }

    await this.pause();
    return ReplicaScreens.Home;
  }

  private async list(): Promise<ScreenId> {
    await this.heading('List Replicas');

    await browse<Replica>({
      renderer: this.renderer,
      title: 'Replicas',
      pageSize: this.pageSize,
      policy: { kind: 'details' },
      filters: { initial: 'all', choices: REPLICA_FILTERS },
      load: async (filter) => replicaSource(this.cache.all(), filter),
    });

    return ReplicaScreens.Home;
  }

  private async rename(client: TavusApi): Promise<ScreenId> {
    await this.heading('Rename Replica');
    await this.say('Only user replicas can be renamed. System replicas cannot be modified.', 'info');

    const outcome = await browse<Replica>({
      renderer: this.renderer,
      title: 'Replicas',
      pageSize: this.pageSize,
      policy: { kind: 'act', run: (replica) => this.renameOne(client, replica) },
      load: async () => replicaSource(this.cache.all(), 'user'),
    });

    return outcome.type === 'screen' ? outcome.screen : ReplicaScreens.Home;
  }

  private async renameOne(client: TavusApi, replica: Replica): Promise<ScreenId | null> {
    if (!(await this.ensureUserReplica(replica, 'rename'))) return null;

    await this.say(`Renaming replica: ${replica.name} (${replica.id})`);
    await showDetails(this.renderer, replica);

    const answer = await this.renderer.input({ message: 'New name:' });
    const newName = answer?.trim() ?? '';
    if (newName.length === 0) {
      await this.say('Replica name cannot be empty. Please try again.', 'warning');
      await this.pause();
      return null;
    }

    await this.say(['Confirm rename operation:', `  From: ${replica.name}`, `  To:   ${newName}`].join('\n'));
    if (!(await this.confirmOrCancel('Are you sure you want to rename this replica?', 'Rename operation cancelled.'))) {
      return null;
    }

    const progress = this.renderer.progress({ message: 'Renaming replica...' });
    const status = await client.renameReplica(replica.id, newName);
    progress.stop();

    if (status.ok) {
      this.cache.update(replica.id, (current) => current.withName(newName));
      await this.say(`Replica renamed successfully to: ${newName}`, 'success');
    } else {
      await this.say(`Error renaming replica: ${status.message}`, 'error');
    }

    await this.pause();
    return ReplicaScreens.Home;
  }

  private async remove(client: TavusApi): Promise<ScreenId> {
    await this.heading('Delete Replica');
    await this.say('Only user replicas can be deleted. System replicas cannot be modified.', 'info');

    const outcome = await browse<Replica>({
      renderer: this.renderer,
      title: 'Replicas',
      pageSize: this.pageSize,
      policy: { kind: 'act', run: (replica) => this.removeOne(client, replica) },
      load: async () => replicaSource(this.cache.all(), 'user'),
    });

    return outcome.type === 'screen' ? outcome.screen : ReplicaScreens.Home;
  }

  private async removeOne(client: TavusApi, replica: Replica): Promise<ScreenId | null> {
    if (!(await this.ensureUserReplica(replica, 'delete'))) return null;

    await this.say(`Deleting replica: ${replica.name} (${replica.id})`);
    await showDetails(this.renderer, replica);

    await this.say(
      [
        'Confirm delete operation:',
        `  Replica Name: ${replica.name}`,
        `  Replica ID: ${replica.id}`,
        `  Replica Type: ${replica.type}`,
      ].join('\n')
    );
    await this.say('WARNING: This action cannot be undone!', 'warning');
    if (!(await this.confirmOrCancel('Are you sure you want to delete this replica?', 'Delete operation cancelled.'))) {
      return null;
    }

    const progress = this.renderer.progress({ message: 'Deleting replica...' });
    const status = await client.deleteReplica(replica.id);
    progress.stop();

    if (status.ok) {
      this.cache.remove(replica.id);
      await this.say(`Replica deleted successfully: ${replica.name}`, 'success');
    } else {
      await this.say(`Error deleting replica: ${status.message}`, 'error');
    }

    await this.pause();
    return ReplicaScreens.Home;
  }

  private async ensureUserReplica(replica: Replica, verb: 'rename' | 'delete'): Promise<boolean> {
    if (replica.isUser()) return true;

    await this.say(
      `Cannot ${verb} system replicas. This replica is of type '${replica.type}'. Only user replicas can be ${verb}d.`,
      'error'
    );
    await this.pause();
    return false;
  }
}
