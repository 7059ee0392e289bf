/**
 * Module Registry
 *
 * Aggregates navigation modules into one dispatch table. Built once at
 * startup, sealed, then read-only for the lifetime of the navigator.
 *
 * @module interactions/registry
 */

import { ConfigurationError } from '../core/errors.js';
import { isReservedScreen, type MenuEntry, type NavigationModule, type ScreenId } from './types.js';

export class ModuleRegistry {
  private readonly modules: NavigationModule[] = [];
  private readonly owners = new Map<ScreenId, NavigationModule>();
  private readonly labels = new Map<string, ScreenId>();
  private sealed = false;

  /**
   * Add a module
   *
   * @throws ConfigurationError on any collision or once sealed
   */
  register(module: NavigationModule): this {
    if (this.sealed) {
      throw new ConfigurationError(`Cannot register module "${module.name}": registry is sealed`);
    }
    if (module.screens.length === 0) {
      throw new ConfigurationError(`Module "${module.name}" owns no screens`);
    }
    if (this.modules.some((existing) => existing.name === module.name)) {
      throw new ConfigurationError(`Module "${module.name}" is already registered`);
    }

    const claimed = new Set<ScreenId>();
    for (const screen of module.screens) {
      if (isReservedScreen(screen)) {
        throw new ConfigurationError(`Module "${module.name}" claims reserved screen "${screen}"`);
      }
      const owner = this.owners.get(screen);
      if (owner || claimed.has(screen)) {
        const holder = owner?.name ?? module.name;
        throw new ConfigurationError(
          `Screen "${screen}" claimed by module "${module.name}" is already owned by "${holder}"`
        );
      }
      claimed.add(screen);
    }

    const labels = new Set<string>();
    for (const entry of module.menuEntries) {
      if (this.labels.has(entry.label) || labels.has(entry.label)) {
        throw new ConfigurationError(`Menu label "${entry.label}" is already registered`);
      }
      labels.add(entry.label);
    }

    this.modules.push(module);
    for (const screen of module.screens) {
      this.owners.set(screen, module);
    }
    for (const entry of module.menuEntries) {
      this.labels.set(entry.label, entry.screen);
    }
    return this;
  }

  /**
   * Verify menu targets and freeze the registry
   *
   * @throws ConfigurationError when a menu entry targets an unknown screen
   */
  seal(): this {
    for (const entry of this.menuEntries()) {
      if (!this.owners.has(entry.screen) && !isReservedScreen(entry.screen)) {
        throw new ConfigurationError(`Menu entry "${entry.label}" targets unknown screen "${entry.screen}"`);
      }
    }
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  resolve(screen: ScreenId): NavigationModule | null {
    return this.owners.get(screen) ?? null;
  }

  /**
   * Main menu entries, flattened in registration order
   */
  menuEntries(): MenuEntry[] {
    return this.modules.flatMap((module) => [...module.menuEntries]);
  }

  /**
   * Target screen for a main menu label
   */
  screenForLabel(label: string): ScreenId | null {
    return this.labels.get(label) ?? null;
  }

  getModules(): readonly NavigationModule[] {
    return this.modules;
  }
}
