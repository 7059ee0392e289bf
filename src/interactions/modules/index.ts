/**
 * Resource Modules
 *
 * @module interactions/modules
 */

import { ModuleRegistry } from '../registry.js';
import type { NavigationModule } from '../types.js';
import { ApiKeyModule, type ApiKeyModuleDeps } from './api-key.js';
import { ConversationModule } from './conversations.js';
import { PersonaModule } from './personas.js';
import { ReplicaModule } from './replicas.js';
import { VideoModule } from './videos.js';

export { BaseModule, NO_CLIENT_MESSAGE, type ModuleDeps, type HomeChoice } from './base-module.js';
export { ResourceCache, loadCache, refreshCache } from './resource-cache.js';
export * from './pickers.js';
export { ApiKeyModule, ApiKeyScreens, type ApiKeyModuleDeps } from './api-key.js';
export { ReplicaModule, ReplicaScreens } from './replicas.js';
export { PersonaModule, PersonaScreens, PERSONA_FILTERS } from './personas.js';
export { VideoModule, VideoScreens } from './videos.js';
export { ConversationModule, ConversationScreens } from './conversations.js';

/**
 * The standard module set, in main menu order
 */
export function createDefaultModules(deps: ApiKeyModuleDeps): NavigationModule[] {
  return [
    new ApiKeyModule(deps),
    new ReplicaModule(deps),
    new PersonaModule(deps),
    new VideoModule(deps),
    new ConversationModule(deps),
  ];
}

/**
 * Register the standard modules and seal the registry
 *
 * @throws ConfigurationError on a registration conflict
 */
export function createDefaultRegistry(deps: ApiKeyModuleDeps): ModuleRegistry {
  const registry = new ModuleRegistry();
  for (const module of createDefaultModules(deps)) {
    registry.register(module);
  }
  return registry.seal();
}
