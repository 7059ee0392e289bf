/**
 * Conversation Module
 *
 * Screens for real-time conversations: create (with optional persona and
 * replica), browse, end an active conversation, delete.
 *
 * @module interactions/modules/conversations
 */

import type { CreateConversationInput, TavusApi } from '../../core/api-client.js';
import type { Conversation, Persona, Replica } from '../../core/models.js';
import { browse } from '../pagination/browse.js';
import { showDetails } from '../pagination/paginated-list.js';
import { ReservedScreens, type MenuEntry, type NavigationContext, type ScreenId } from '../types.js';
import { BaseModule, type ModuleDeps } from './base-module.js';
import { pickPersona, pickReplica, type PickerDeps } from './pickers.js';
import { ResourceCache, refreshCache } from './resource-cache.js';

export const ConversationScreens = {
  Home: 'work_with_conversations',
  Create: 'create_conversation',
  List: 'list_conversations',
  End: 'end_conversation',
  Delete: 'delete_conversation',
} as const;

type ConversationScreen = (typeof ConversationScreens)[keyof typeof ConversationScreens];

export class ConversationModule extends BaseModule {
  readonly name = 'conversation';
  readonly screens: readonly ConversationScreen[] = Object.values(ConversationScreens);
  readonly menuEntries: readonly MenuEntry[] = [
    {
      label: 'Work with Conversations',
      screen: ConversationScreens.Home,
      icon: '💬',
      description: 'Create, list, end or delete conversations',
    },
  ];
  protected readonly home = ConversationScreens.Home;

  readonly cache = new ResourceCache<Conversation>();
  private readonly personas = new ResourceCache<Persona>();
  private readonly replicas = new ResourceCache<Replica>();

  constructor(deps: ModuleDeps) {
    super(deps, 'conversations');
  }

  protected async handle(screen: ScreenId, context: NavigationContext): Promise<ScreenId> {
    const client = await this.requireClient(context);
    if (!client) return ReservedScreens.MainMenu;

    switch (screen) {
      case ConversationScreens.Home:
        return this.showHome(client);
      case ConversationScreens.Create:
        return this.create(client);
      case ConversationScreens.List:
        return this.list();
      case ConversationScreens.End:
        return this.end(client);
      case ConversationScreens.Delete:
        return this.remove(client);
      default:
        return ReservedScreens.MainMenu;
    }
  }

  private pickerDeps(client: TavusApi): PickerDeps {
    return { renderer: this.renderer, client, pageSize: this.pageSize };
  }

  private async showHome(client: TavusApi): Promise<ScreenId> {
    await this.heading('Work with Conversations');
    await refreshCache(this.renderer, this.cache, 'Loading conversations...', () => client.listConversations());

    return this.homeMenu('What would you like to do with Conversations?', [
      { label: 'Create a Conversation', screen: ConversationScreens.Create },
      { label: 'List Conversations', screen: ConversationScreens.List },
      { label: 'End a Conversation', screen: ConversationScreens.End },
      { label: 'Delete a Conversation', screen: ConversationScreens.Delete },
    ]);
  }

  private async create(client: TavusApi): Promise<ScreenId> {
    await this.heading('Create Conversation');
    const input: CreateConversationInput = {};

    await this.say('Select a persona for this conversation (optional):');
    const persona = await pickPersona(this.pickerDeps(client), this.personas);
    if (persona) {
      input.personaId = persona.id;
    } else {
      await this.say('No persona selected.', 'info');
    }

    if (persona?.hasDefaultReplica()) {
      await this.say(`Using the persona's default replica: ${persona.defaultReplicaId}`, 'info');
    } else {
      await this.say('Select a replica for this conversation:');
      const replica = await pickReplica(this.pickerDeps(client), this.replicas);
      if (!replica) {
        await this.say('A replica is required when the persona has no default replica.', 'warning');
        await this.pause();
        return ConversationScreens.Home;
      }
      input.replicaId = replica.id;
    }

    const conversationName = await this.askOptional('Conversation Name (optional):');
    if (conversationName !== undefined) input.conversationName = conversationName;

    const conversationalContext = await this.askOptional('Conversational Context (optional):');
    if (conversationalContext !== undefined) input.conversationalContext = conversationalContext;

    await this.say(
      [
        'Confirm conversation creation:',
        `  Name: ${conversationName ?? 'None'}`,
        `  Persona ID: ${input.personaId ?? 'None'}`,
        `  Replica ID: ${input.replicaId ?? persona?.defaultReplicaId ?? 'None'}`,
        `  Context: ${conversationalContext ?? 'None'}`,
      ].join('\n')
    );
    if (!(await this.confirmOrCancel('Proceed with conversation creation?', 'Conversation creation cancelled.'))) {
      return ConversationScreens.Home;
    }

    const progress = this.renderer.progress({ message: 'Creating conversation...' });
    const result = await client.createConversation(input);
    progress.stop();

    if (result.ok) {
      await this.say(result.message, 'success');
      await this.say(
        [
          `Conversation ID: ${result.data.id}`,
          `Status: ${result.data.status || 'N/A'}`,
          `Join URL: ${result.data.url || 'N/A'}`,
        ].join('\n')
      );
    } else {
      await this.say(result.message, 'error');
    }

    await this.pause();
    return ConversationScreens.Home;
  }

  private async list(): Promise<ScreenId> {
    await this.heading('List Conversations');

    await browse<Conversation>({
      renderer: this.renderer,
      title: 'Conversations',
      pageSize: this.pageSize,
      policy: { kind: 'details' },
      load: async () => ({ kind: 'plain', items: this.cache.all() }),
    });

    return ConversationScreens.Home;
  }

  private async end(client: TavusApi): Promise<ScreenId> {
    await this.heading('End Conversation');
    await this.say('Only active conversations can be ended.', 'info');

    const outcome = await browse<Conversation>({
      renderer: this.renderer,
      title: 'Conversations',
      pageSize: this.pageSize,
      policy: { kind: 'act', run: (conversation) => this.endOne(client, conversation) },
      load: async () => ({ kind: 'plain', items: this.cache.filter((conversation) => conversation.isActive()) }),
    });

    return outcome.type === 'screen' ? outcome.screen : ConversationScreens.Home;
  }

  private async endOne(client: TavusApi, conversation: Conversation): Promise<ScreenId | null> {
    await showDetails(this.renderer, conversation);
    if (!(await this.confirmOrCancel('Are you sure you want to end this conversation?', 'End operation cancelled.'))) {
      return null;
    }

    const progress = this.renderer.progress({ message: 'Ending conversation...' });
    const status = await client.endConversation(conversation.id);
    progress.stop();

    if (status.ok) {
      this.cache.update(conversation.id, (current) => current.withStatus('ended'));
      await this.say(`Conversation ended: ${conversation.name}`, 'success');
    } else {
      await this.say(`Error ending conversation: ${status.message}`, 'error');
    }

    await this.pause();
    return ConversationScreens.Home;
  }

  private async remove(client: TavusApi): Promise<ScreenId> {
    await this.heading('Delete Conversation');

    const outcome = await browse<Conversation>({
      renderer: this.renderer,
      title: 'Conversations',
      pageSize: this.pageSize,
      policy: { kind: 'act', run: (conversation) => this.removeOne(client, conversation) },
      load: async () => ({ kind: 'plain', items: this.cache.all() }),
    });

    return outcome.type === 'screen' ? outcome.screen : ConversationScreens.Home;
  }

  private async removeOne(client: TavusApi, conversation: Conversation): Promise<ScreenId | null> {
    await showDetails(this.renderer, conversation);
    await this.say('WARNING: This action cannot be undone!', 'warning');
    if (!(await this.confirmOrCancel('Are you sure you want to delete this conversation?', 'Delete operation cancelled.'))) {
      return null;
    }

    const progress = this.renderer.progress({ message: 'Deleting conversation...' });
    const status = await client.deleteConversation(conversation.id);
    progress.stop();

    if (status.ok) {
      this.cache.remove(conversation.id);
      await this.say(`Conversation deleted successfully: ${conversation.name}`, 'success');
    } else {
      await this.say(`Error deleting conversation: ${status.message}`, 'error');
    }

    await this.pause();
    return ConversationScreens.Home;
  }
}
