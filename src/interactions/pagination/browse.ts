/**
 * Browse Loop
 *
 * Drives a list engine until the operator goes back or an item selection
 * ends the interaction. Page moves, detail views and filter changes are
 * handled here by re-rendering, never by re-entering the caller.
 *
 * @module interactions/pagination/browse
 */

import type { ListItem } from '../../core/models.js';
import type { Renderer, ScreenId } from '../types.js';
import {
  clampPage,
  DEFAULT_FILTER,
  PaginatedList,
  type PaginationAction,
  type ShowOptions,
} from './paginated-list.js';
import { SectionedPaginatedList, type Section } from './sectioned-list.js';

/**
 * Items to show for one filter value
 */
export type ListSource<T> =
  | { kind: 'plain'; items: readonly T[] }
  | { kind: 'sectioned'; sections: readonly Section<T>[] };

/**
 * What happens when the operator chooses an item
 *
 * - details: show the verbose view and stay on the page
 * - pick: end the loop and hand the item to the caller
 * - act: run an operation; a screen id ends the loop, null stays on the list
 */
export type SelectionPolicy<T> =
  | { kind: 'details' }
  | { kind: 'pick' }
  | { kind: 'act'; run: (item: T) => Promise<ScreenId | null> };

export interface FilterChoices {
  /** Filter shown first */
  initial: string;
  /** Values offered by the filter chooser */
  choices: readonly string[];
}

export interface BrowseOptions<T> {
  renderer: Renderer;
  /** Plural resource title, e.g. "Personas" */
  title: string;
  pageSize: number;
  policy: SelectionPolicy<T>;
  /** Produce the list for a filter; called on entry and after a filter change */
  load: (filter: string) => Promise<ListSource<T>>;
  /** Omit to hide the filter toggle */
  filters?: FilterChoices;
  prompt?: string;
}

export type BrowseOutcome<T> =
  | { type: 'back'; filter: string }
  | { type: 'picked'; item: T; filter: string }
  | { type: 'screen'; screen: ScreenId; filter: string };

export function buildList<T extends ListItem>(
  source: ListSource<T>,
  pageSize: number,
  renderer: Renderer
): PaginatedList<T> {
  return source.kind === 'sectioned'
    ? new SectionedPaginatedList(source.sections, pageSize, renderer)
    : new PaginatedList(source.items, pageSize, renderer);
}

/**
 * Ask for a new filter value. Returns null when cancelled.
 */
export async function chooseFilter(
  renderer: Renderer,
  title: string,
  choices: readonly string[]
): Promise<string | null> {
  await renderer.display({ message: `Filter ${title}`, format: 'heading' });
  return renderer.select({
    message: 'Select filter type:',
    options: choices.map((choice) => ({ id: choice, label: choice })),
  });
}

/**
 * Run the list until GoBack or a terminating selection
 */
export async function browse<T extends ListItem>(options: BrowseOptions<T>): Promise<BrowseOutcome<T>> {
  const { renderer, title, pageSize, policy, filters } = options;
  let filter = filters?.initial ?? DEFAULT_FILTER;
  let list = buildList(await options.load(filter), pageSize, renderer);

  const onSelect =
    policy.kind === 'details'
      ? undefined
      : async (item: T): Promise<PaginationAction<T>> => ({ type: 'item_selected', item });

  for (;;) {
    const showOptions: ShowOptions<T> = {
      title,
      filter,
      showFilter: filters !== undefined,
    };
    if (onSelect) showOptions.onSelect = onSelect;
    if (options.prompt !== undefined) showOptions.prompt = options.prompt;

    const action = await list.show(showOptions);

    switch (action.type) {
      case 'previous_page':
      case 'next_page':
      case 'no_action':
        continue;

      case 'go_back':
        return { type: 'back', filter };

      case 'filter_changed': {
        const chosen = filters ? await chooseFilter(renderer, title, filters.choices) : null;
        if (chosen === null) continue;
        filter = chosen;
        list = buildList(await options.load(filter), pageSize, renderer);
        continue;
      }

      case 'item_selected': {
        if (policy.kind === 'pick') {
          return { type: 'picked', item: action.item, filter };
        }
        if (policy.kind === 'act') {
          const screen = await policy.run(action.item);
          if (screen !== null) {
            return { type: 'screen', screen, filter };
          }
          const page = list.getCurrentPage();
          list = buildList(await options.load(filter), pageSize, renderer);
          list.setPage(clampPage(page, list.getItemsCount(), pageSize));
        }
        continue;
      }
    }
  }
}
