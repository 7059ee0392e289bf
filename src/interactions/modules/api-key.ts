/**
 * API Key Module
 *
 * The only writer of the navigation context: swaps the active credential
 * and the client bound to it, and optionally saves the key file.
 *
 * @module interactions/modules/api-key
 */

import type { TavusApi } from '../../core/api-client.js';
import type { CredentialStore } from '../../core/credential-store.js';
import { describeError } from '../../core/errors.js';
import { maskApiKey } from '../../core/format.js';
import { ReservedScreens, type MenuEntry, type NavigationContext, type ScreenId } from '../types.js';
import { BaseModule, type ModuleDeps } from './base-module.js';

export const ApiKeyScreens = {
  Set: 'set_api_key',
} as const;

export interface ApiKeyModuleDeps extends ModuleDeps {
  /** Build a client for a new key */
  createClient: (apiKey: string) => TavusApi;
  /** Where a new key may be saved; null disables saving */
  store: CredentialStore | null;
}

export class ApiKeyModule extends BaseModule {
  readonly name = 'api_key';
  readonly screens = [ApiKeyScreens.Set];
  readonly menuEntries: readonly MenuEntry[] = [
    { label: 'Set API Key', screen: ApiKeyScreens.Set, icon: '🔑', description: 'Change the active credential' },
  ];
  protected readonly home = ReservedScreens.MainMenu;

  private readonly createClient: (apiKey: string) => TavusApi;
  private readonly store: CredentialStore | null;

  constructor(deps: ApiKeyModuleDeps) {
    super(deps, 'api-key');
    this.createClient = deps.createClient;
    this.store = deps.store;
  }

  protected async handle(_screen: ScreenId, context: NavigationContext): Promise<ScreenId> {
    await this.heading('Set API Key');
    await this.say(`Currently set API key: ${maskApiKey(context.apiKey)}`);

    const change = await this.renderer.confirm({ message: 'Would you like to set a new API key?' });
    if (!change) {
      return ReservedScreens.MainMenu;
    }

    const answer = await this.renderer.input({
      message: 'Enter your Tavus API Key:',
      mask: true,
      validate: (value) => (value.trim().length > 0 ? null : 'API key cannot be empty'),
    });
    const apiKey = answer?.trim() ?? '';
    if (apiKey.length === 0) {
      await this.say('API key not changed.', 'info');
      return ReservedScreens.MainMenu;
    }

    context.apiKey = apiKey;
    context.client = this.createClient(apiKey);
    this.logger.debug('API key replaced');
    await this.say(`API key set: ${maskApiKey(apiKey)}`, 'success');

    if (this.store) {
      await this.offerSave(apiKey, this.store);
    }

    return ReservedScreens.MainMenu;
  }

  private async offerSave(apiKey: string, store: CredentialStore): Promise<void> {
    const save = await this.renderer.confirm({ message: `Save API key to ${store.getPath()}?` });
    if (!save) return;

    try {
      await store.save(apiKey);
      await this.say(`API key saved to ${store.getPath()}`, 'success');
    } catch (error) {
      this.logger.warn('Could not save API key', error);
      await this.say(`Could not save API key: ${describeError(error)}`, 'warning');
    }
  }
}
