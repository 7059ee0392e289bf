/**
 * Persona Module
 *
 * Screens for personas. The cache holds one persona type at a time (user
 * or system) and is re-fetched when the list filter switches type.
 *
 * @module interactions/modules/personas
 */

import type { CreatePersonaInput, TavusApi } from '../../core/api-client.js';
import type { Persona, PersonaType, Replica } from '../../core/models.js';
import { browse, type ListSource } from '../pagination/browse.js';
import { showDetails } from '../pagination/paginated-list.js';
import { ReservedScreens, type MenuEntry, type NavigationContext, type ScreenId } from '../types.js';
import { BaseModule, type ModuleDeps } from './base-module.js';
import { pickReplica } from './pickers.js';
import { ResourceCache, loadCache, refreshCache } from './resource-cache.js';

export const PersonaScreens = {
  Home: 'work_with_personas',
  Create: 'create_persona',
  List: 'list_personas',
  Rename: 'rename_persona',
  Delete: 'delete_persona',
} as const;

type PersonaScreen = (typeof PersonaScreens)[keyof typeof PersonaScreens];

export const PERSONA_FILTERS: readonly PersonaType[] = ['user', 'system'];

function toPersonaType(filter: string): PersonaType {
  return filter === 'system' ? 'system' : 'user';
}

export class PersonaModule extends BaseModule {
  readonly name = 'persona';
  readonly screens: readonly PersonaScreen[] = Object.values(PersonaScreens);
  readonly menuEntries: readonly MenuEntry[] = [
    {
      label: 'Work with Personas',
      screen: PersonaScreens.Home,
      icon: '👤',
      description: 'Create, list, rename or delete personas',
    },
  ];
  protected readonly home = PersonaScreens.Home;

  readonly cache = new ResourceCache<Persona>();
  /** Persona type currently held by the cache */
  private cachedType: PersonaType | null = null;
  /** Replicas offered as a default when creating a persona */
  private readonly replicas = new ResourceCache<Replica>();

  constructor(deps: ModuleDeps) {
    super(deps, 'personas');
  }

  getCachedType(): PersonaType | null {
    return this.cachedType;
  }

  /**
   * Initial user persona load at startup
   *
   * @throws Error when the list cannot be fetched
   */
  async prepare(context: NavigationContext): Promise<void> {
    if (!context.client) return;

    const client = context.client;
    const result = await loadCache(this.cache, () => client.listPersonas('user'));
    if (!result.ok) {
      throw new Error(result.message);
    }
    this.cachedType = 'user';
  }

  protected async handle(screen: ScreenId, context: NavigationContext): Promise<ScreenId> {
    const client = await this.requireClient(context);
    if (!client) return ReservedScreens.MainMenu;

    switch (screen) {
      case PersonaScreens.Home:
        return this.showHome(client);
      case PersonaScreens.Create:
        return this.create(client);
      case PersonaScreens.List:
        return this.list(client);
      case PersonaScreens.Rename:
        return this.rename(client);
      case PersonaScreens.Delete:
        return this.remove(client);
      default:
        return ReservedScreens.MainMenu;
    }
  }

  private async refresh(client: TavusApi, personaType: PersonaType): Promise<boolean> {
    const message = personaType === 'user' ? 'Loading personas...' : `Loading ${personaType} personas...`;
    const ok = await refreshCache(this.renderer, this.cache, message, () => client.listPersonas(personaType));
    if (ok) {
      this.cachedType = personaType;
    }
    return ok;
  }

  /**
   * List source for a filter, fetching only when the type changes
   */
  private async source(client: TavusApi, filter: string): Promise<ListSource<Persona>> {
    const personaType = toPersonaType(filter);
    if (this.cachedType !== personaType) {
      const ok = await this.refresh(client, personaType);
      if (!ok) return { kind: 'plain', items: [] };
    }
    return { kind: 'plain', items: this.cache.all() };
  }

  private async showHome(client: TavusApi): Promise<ScreenId> {
    await this.heading('Work with Personas');
    await this.refresh(client, 'user');

    return this.homeMenu('What would you like to do with Personas?', [
      { label: 'Create a Persona', screen: PersonaScreens.Create },
      { label: 'List Personas', screen: PersonaScreens.List },
      { label: 'Rename a Persona', screen: PersonaScreens.Rename },
      { label: 'Delete a Persona', screen: PersonaScreens.Delete },
    ]);
  }

  private async create(client: TavusApi): Promise<ScreenId> {
    await this.heading('Create Persona');

    const personaName = await this.askRequired('Persona Name:', 'Persona name cannot be empty. Please try again.');
    if (personaName === null) return PersonaScreens.Home;

    const systemPrompt = await this.askRequired('System Prompt:', 'System prompt cannot be empty. Please try again.');
    if (systemPrompt === null) return PersonaScreens.Home;

    const context = await this.askOptional('Context (optional):');

    await this.say('Select a default replica for this persona (optional):');
    const replica = await pickReplica(
      { renderer: this.renderer, client, pageSize: this.pageSize },
      this.replicas
    );
    if (!replica) {
      await this.say('No default replica selected.', 'info');
    }

    await this.say(
      [
        'Confirm persona creation:',
        `  Name: ${personaName}`,
        `  System Prompt: ${systemPrompt}`,
        `  Context: ${context ?? ''}`,
        `  Default Replica: ${replica?.id ?? 'None'}`,
      ].join('\n')
    );
    if (!(await this.confirmOrCancel('Proceed with persona creation?', 'Persona creation cancelled.'))) {
      return PersonaScreens.Home;
    }

    const input: CreatePersonaInput = { personaName, systemPrompt };
    if (context !== undefined) input.context = context;
    if (replica) input.defaultReplicaId = replica.id;

    const progress = this.renderer.progress({ message: 'Creating persona...' });
    const result = await client.createPersona(input);
    progress.stop();

    if (result.ok) {
      await this.say(result.message, 'success');
      await this.say(`Persona ID: ${result.data.id}\nPersona Name: ${result.data.name || 'N/A'}`);
    } else {
      await this.say(result.message, 'error');
    }

    await this.pause();
    return PersonaScreens.Home;
  }

  private async list(client: TavusApi): Promise<ScreenId> {
    await this.heading('List Personas');
    await this.refresh(client, 'user');

    await browse<Persona>({
      renderer: this.renderer,
      title: 'Personas',
      pageSize: this.pageSize,
      policy: { kind: 'details' },
      filters: { initial: 'user', choices: PERSONA_FILTERS },
      load: (filter) => this.source(client, filter),
    });

    return PersonaScreens.Home;
  }

  private async rename(client: TavusApi): Promise<ScreenId> {
    await this.heading('Rename Persona');
    await this.say('Only user personas can be renamed. System personas cannot be modified.', 'info');

    const outcome = await browse<Persona>({
      renderer: this.renderer,
      title: 'Personas',
      pageSize: this.pageSize,
      policy: { kind: 'act', run: (persona) => this.renameOne(client, persona) },
      load: () => this.source(client, 'user'),
    });

    return outcome.type === 'screen' ? outcome.screen : PersonaScreens.Home;
  }

  private async renameOne(client: TavusApi, persona: Persona): Promise<ScreenId | null> {
    await this.say(`Renaming persona: ${persona.name} (${persona.id})`);
    await showDetails(this.renderer, persona);

    const answer = await this.renderer.input({ message: 'New name:' });
    const newName = answer?.trim() ?? '';
    if (newName.length === 0) {
      await this.say('Persona name cannot be empty. Please try again.', 'warning');
      await this.pause();
      return null;
    }

    await this.say(['Confirm rename operation:', `  From: ${persona.name}`, `  To:   ${newName}`].join('\n'));
    if (!(await this.confirmOrCancel('Are you sure you want to rename this persona?', 'Rename operation cancelled.'))) {
      return null;
    }

    const progress = this.renderer.progress({ message: 'Renaming persona...' });
    const status = await client.renamePersona(persona.id, newName);
    progress.stop();

    if (status.ok) {
      this.cache.update(persona.id, (current) => current.withName(newName));
      await this.say(`Persona renamed successfully to: ${newName}`, 'success');
    } else {
      await this.say(`Error renaming persona: ${status.message}`, 'error');
    }

    await this.pause();
    return PersonaScreens.Home;
  }

  private async remove(client: TavusApi): Promise<ScreenId> {
    await this.heading('Delete Persona');
    await this.say('Only user personas can be deleted. System personas cannot be modified.', 'info');

    const outcome = await browse<Persona>({
      renderer: this.renderer,
      title: 'Personas',
      pageSize: this.pageSize,
      policy: { kind: 'act', run: (persona) => this.removeOne(client, persona) },
      load: () => this.source(client, 'user'),
    });

    return outcome.type === 'screen' ? outcome.screen : PersonaScreens.Home;
  }

  private async removeOne(client: TavusApi, persona: Persona): Promise<ScreenId | null> {
    await this.say(`Deleting persona: ${persona.name} (${persona.id})`);
    await showDetails(this.renderer, persona);

    await this.say(['Confirm delete operation:', `  Persona Name: ${persona.name}`, `  Persona ID: ${persona.id}`].join('\n'));
    await this.say('WARNING: This action cannot be undone!', 'warning');
    if (!(await this.confirmOrCancel('Are you sure you want to delete this persona?', 'Delete operation cancelled.'))) {
      return null;
    }

    const progress = this.renderer.progress({ message: 'Deleting persona...' });
    const status = await client.deletePersona(persona.id);
    progress.stop();

    if (status.ok) {
      this.cache.remove(persona.id);
      await this.say(`Persona deleted successfully: ${persona.name}`, 'success');
    } else {
      await this.say(`Error deleting persona: ${status.message}`, 'error');
    }

    await this.pause();
    return PersonaScreens.Home;
  }
}
