/**
 * Interaction System
 *
 * Renderer contract, list engines, module registry and the navigator that
 * drives them.
 *
 * @module interactions
 */

// Types
export type {
  SelectOption,
  SelectInteraction,
  InputInteraction,
  ConfirmInteraction,
  ProgressInteraction,
  DisplayInteraction,
  DisplayFormat,
  ProgressHandle,
  Renderer,
  ScreenId,
  ReservedScreen,
  NavigationContext,
  MenuEntry,
  NavigationModule,
} from './types.js';
export { ReservedScreens, isReservedScreen } from './types.js';

// Registry and navigator
export { ModuleRegistry } from './registry.js';
export { Navigator } from './navigator.js';

// CLI Renderer
export { cliRenderer, printHeader, printBanner } from './renderers/cli.js';

// List engines
export * from './pagination/index.js';

// Modules
export * from './modules/index.js';
