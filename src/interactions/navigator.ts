/**
 * Navigator
 *
 * The screen state machine. Starts on the main menu, hands every other
 * screen to the module that owns it, and stops on Exit.
 *
 * Platform-agnostic - works with any Renderer implementation.
 *
 * @module interactions/navigator
 */

import { describeError } from '../core/errors.js';
import { maskApiKey } from '../core/format.js';
import type { Logger } from '../core/logger.js';
import type { ModuleRegistry } from './registry.js';
import {
  ReservedScreens,
  type NavigationContext,
  type Renderer,
  type ScreenId,
  type SelectOption,
} from './types.js';

const EXIT_OPTION_ID = '__exit__';

export class Navigator {
  private current: ScreenId = ReservedScreens.MainMenu;

  constructor(
    private readonly registry: ModuleRegistry,
    private readonly renderer: Renderer,
    private readonly context: NavigationContext,
    private readonly logger: Logger
  ) {}

  getCurrentScreen(): ScreenId {
    return this.current;
  }

  getContext(): NavigationContext {
    return this.context;
  }

  /**
   * Run every module's warm-up hook, in registration order
   */
  async warmUp(): Promise<void> {
    const modules = this.registry.getModules().filter((module) => module.prepare !== undefined);
    if (modules.length === 0) return;

    const progress = this.renderer.progress({ message: 'Loading initial data...' });
    let failures = 0;

    for (const module of modules) {
      progress.update(`Loading ${module.name}...`);
      try {
        await module.prepare?.(this.context);
      } catch (error) {
        failures++;
        this.logger.error(`Warm-up failed for ${module.name}`, error);
      }
    }

    if (failures > 0) {
      progress.fail(`Initial data loaded with ${failures} error(s)`);
    } else {
      progress.succeed('Initial data loaded');
    }
  }

  /**
   * Run one transition and return the next screen
   */
  async step(): Promise<ScreenId> {
    const from = this.current;
    let next: ScreenId;

    if (from === ReservedScreens.MainMenu) {
      next = await this.mainMenu();
    } else {
      next = await this.dispatch(from);
    }

    this.logger.debug(`transition ${from} -> ${next}`);
    this.current = next;
    return next;
  }

  /**
   * Loop until Exit. Never throws.
   */
  async run(): Promise<void> {
    while (this.current !== ReservedScreens.Exit) {
      await this.step();
    }
  }

  private async dispatch(screen: ScreenId): Promise<ScreenId> {
    const module = this.registry.resolve(screen);
    if (!module) {
      this.logger.error(`No module owns screen "${screen}", returning to main menu`);
      return ReservedScreens.MainMenu;
    }

    try {
      return await module.execute(screen, this.context);
    } catch (error) {
      this.logger.error(`Module ${module.name} failed on "${screen}"`, error);
      await this.safeDisplay(`Error: ${describeError(error)}`);
      return ReservedScreens.MainMenu;
    }
  }

  private async mainMenu(): Promise<ScreenId> {
    try {
      await this.renderer.display({ message: 'Main Menu', format: 'heading' });
      await this.renderer.display({
        message: `Tavus API key: ${maskApiKey(this.context.apiKey)}`,
        format: 'plain',
      });

      const options: SelectOption[] = this.registry.menuEntries().map((entry) => {
        const option: SelectOption = { id: entry.label, label: entry.label };
        if (entry.icon !== undefined) option.icon = entry.icon;
        if (entry.description !== undefined) option.description = entry.description;
        return option;
      });
      options.push({ id: EXIT_OPTION_ID, label: 'Exit', icon: '👋' });

      const answer = await this.renderer.select({
        message: 'What would you like to do?',
        options,
      });

      if (answer === null || answer === EXIT_OPTION_ID) {
        return ReservedScreens.Exit;
      }

      return this.registry.screenForLabel(answer) ?? ReservedScreens.MainMenu;
    } catch (error) {
      this.logger.error('Main menu failed', error);
      return ReservedScreens.Exit;
    }
  }

  private async safeDisplay(message: string): Promise<void> {
    try {
      await this.renderer.display({ message, format: 'error' });
    } catch (error) {
      this.logger.error('Could not display error', error);
    }
  }
}
