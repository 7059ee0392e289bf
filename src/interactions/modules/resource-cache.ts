/**
 * Resource Cache
 *
 * Per-module snapshot of one resource kind. Replaced wholesale on fetch,
 * patched in place after rename/end and filtered by id after delete, so a
 * mutation never needs a re-fetch.
 *
 * @module interactions/modules/resource-cache
 */

import type { ApiResult } from '../../core/api-client.js';
import type { Renderer } from '../types.js';

export class ResourceCache<T extends { readonly id: string }> {
  private items: T[] = [];
  private loaded = false;

  replaceAll(items: readonly T[]): void {
    this.items = [...items];
    this.loaded = true;
  }

  all(): readonly T[] {
    return this.items;
  }

  size(): number {
    return this.items.length;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  filter(predicate: (item: T) => boolean): T[] {
    return this.items.filter(predicate);
  }

  find(id: string): T | null {
    return this.items.find((item) => item.id === id) ?? null;
  }

  /**
   * Replace one item, keeping its position
   *
   * @returns false when no item has this id
   */
  update(id: string, change: (item: T) => T): boolean {
    const index = this.items.findIndex((item) => item.id === id);
    const current = this.items[index];
    if (current === undefined) return false;

    this.items[index] = change(current);
    return true;
  }

  /**
   * Drop the item with this id; the rest keep their order
   *
   * @returns false when no item has this id
   */
  remove(id: string): boolean {
    const before = this.items.length;
    this.items = this.items.filter((item) => item.id !== id);
    return this.items.length !== before;
  }
}

/**
 * Fetch a list and store it on success, without any progress output
 */
export async function loadCache<T extends { readonly id: string }>(
  cache: ResourceCache<T>,
  load: () => Promise<ApiResult<T[]>>
): Promise<ApiResult<T[]>> {
  const result = await load();
  if (result.ok) {
    cache.replaceAll(result.data);
  }
  return result;
}

/**
 * Fetch a list behind a progress indicator and store it on success.
 * On failure the cache keeps its previous contents.
 */
export async function refreshCache<T extends { readonly id: string }>(
  renderer: Renderer,
  cache: ResourceCache<T>,
  message: string,
  load: () => Promise<ApiResult<T[]>>
): Promise<boolean> {
  const progress = renderer.progress({ message });
  const result = await loadCache(cache, load);

  if (result.ok) {
    progress.succeed(result.message);
    return true;
  }

  progress.fail(result.message);
  return false;
}
