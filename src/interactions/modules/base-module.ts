/**
 * Base Module
 *
 * Shared plumbing for resource modules: screen dispatch with error
 * containment, the missing-client guard, and the small prompts every
 * create/rename flow repeats.
 *
 * @module interactions/modules/base-module
 */

import type { TavusApi } from '../../core/api-client.js';
import { describeError } from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import {
  ReservedScreens,
  type MenuEntry,
  type NavigationContext,
  type NavigationModule,
  type Renderer,
  type ScreenId,
} from '../types.js';

/**
 * Collaborators handed to every module
 */
export interface ModuleDeps {
  renderer: Renderer;
  logger: Logger;
  /** Rows per list page */
  pageSize: number;
}

/**
 * One row of a module's home menu
 */
export interface HomeChoice {
  label: string;
  screen: ScreenId;
}

export const NO_CLIENT_MESSAGE = 'API client not initialized. Please set your API key first.';

export abstract class BaseModule implements NavigationModule {
  abstract readonly name: string;
  abstract readonly screens: readonly ScreenId[];
  abstract readonly menuEntries: readonly MenuEntry[];
  /** Screen to fall back to after an unexpected failure */
  protected abstract readonly home: ScreenId;

  protected readonly renderer: Renderer;
  protected readonly logger: Logger;
  protected readonly pageSize: number;

  constructor(deps: ModuleDeps, scope: string) {
    this.renderer = deps.renderer;
    this.logger = deps.logger.child(scope);
    this.pageSize = deps.pageSize;
  }

  /**
   * Run one of this module's screens
   */
  protected abstract handle(screen: ScreenId, context: NavigationContext): Promise<ScreenId>;

  async execute(screen: ScreenId, context: NavigationContext): Promise<ScreenId> {
    if (!this.screens.includes(screen)) {
      this.logger.error(`Screen "${screen}" is not handled by ${this.name}`);
      return ReservedScreens.MainMenu;
    }

    try {
      return await this.handle(screen, context);
    } catch (error) {
      this.logger.error(`Screen "${screen}" failed`, error);
      await this.renderer.display({ message: `Error: ${describeError(error)}`, format: 'error' });
      return this.home;
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  protected async heading(title: string): Promise<void> {
    await this.renderer.display({ message: title, format: 'heading' });
  }

  protected async say(message: string, format: 'plain' | 'info' | 'success' | 'warning' | 'error' = 'plain'): Promise<void> {
    await this.renderer.display({ message, format });
  }

  protected async pause(): Promise<void> {
    await this.renderer.waitForEnter();
  }

  /**
   * Client bound to the active key, or null after telling the operator
   */
  protected async requireClient(context: NavigationContext): Promise<TavusApi | null> {
    if (context.client === null) {
      await this.say(NO_CLIENT_MESSAGE, 'error');
      return null;
    }
    return context.client;
  }

  /**
   * Ask for a required value. Empty or cancelled input yields null after
   * the given message and an acknowledgement pause.
   */
  protected async askRequired(message: string, emptyMessage: string): Promise<string | null> {
    const answer = await this.renderer.input({ message });
    const value = answer?.trim() ?? '';
    if (value.length === 0) {
      await this.say(emptyMessage, 'warning');
      await this.pause();
      return null;
    }
    return value;
  }

  /**
   * Ask for an optional value; empty or cancelled input yields undefined
   */
  protected async askOptional(message: string): Promise<string | undefined> {
    const answer = await this.renderer.input({ message });
    const value = answer?.trim() ?? '';
    return value.length > 0 ? value : undefined;
  }

  /**
   * Ask for confirmation; a decline prints the cancellation notice
   */
  protected async confirmOrCancel(message: string, cancelled: string): Promise<boolean> {
    const confirmed = await this.renderer.confirm({ message, destructive: true });
    if (!confirmed) {
      await this.say(cancelled, 'info');
      await this.pause();
    }
    return confirmed;
  }

  /**
   * Show a module home menu and return the chosen screen.
   * Cancelling returns to the main menu.
   */
  protected async homeMenu(prompt: string, choices: readonly HomeChoice[]): Promise<ScreenId> {
    const answer = await this.renderer.select({
      message: prompt,
      options: [
        ...choices.map((choice) => ({ id: choice.screen, label: choice.label })),
        { id: ReservedScreens.MainMenu, label: 'Back to Main Menu' },
      ],
    });
    return answer ?? ReservedScreens.MainMenu;
  }
}
