/**
 * Paginated List Engine
 *
 * Turns an item sequence and a page size into one bounded menu
 * interaction, then translates the answer back into a PaginationAction.
 *
 * Menu layout for a non-empty list:
 *
 *   [Current filter: <f>]  (optional)
 *   [← Previous Page]      (when not on the first page)
 *   <n>. <item label>      (global 1-based numbering)
 *   [→ Next Page]          (when not on the last page)
 *   ← Go Back
 *
 * @module interactions/pagination/paginated-list
 */

import type { ListItem } from '../../core/models.js';
import type { Renderer, SelectOption } from '../types.js';

export const DEFAULT_FILTER = 'all';

/**
 * Fixed navigation labels. Item labels always start with a number, so
 * none of these can collide with an item row.
 */
export const NavLabels = {
  previous: '← Previous Page',
  next: '→ Next Page',
  back: '← Go Back',
  filter: (filter: string): string => `Current filter: ${filter}`,
  header: (section: string): string => `--- ${section} ---`,
} as const;

// ============================================================================
// Actions
// ============================================================================

/**
 * Tagged outcome of one render/interpret cycle
 */
export type PaginationAction<T> =
  | { type: 'previous_page'; page: number }
  | { type: 'next_page'; page: number }
  | { type: 'go_back' }
  | { type: 'item_selected'; item: T }
  | { type: 'filter_changed'; filter: string }
  | { type: 'no_action'; page: number };

export interface ShowOptions<T> {
  /** Plural resource title, e.g. "Replicas" */
  title: string;
  /** Active filter token */
  filter?: string;
  /** Offer the filter toggle entry (default true) */
  showFilter?: boolean;
  /** Menu prompt override */
  prompt?: string;
  /**
   * Called with the chosen item. When omitted the item's detail view is
   * shown and the list stays on the current page.
   */
  onSelect?: (item: T) => Promise<PaginationAction<T>>;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Index of the last page; 0 for an empty list
 */
export function lastPageIndex(itemCount: number, pageSize: number): number {
  return itemCount > 0 ? Math.floor((itemCount - 1) / pageSize) : 0;
}

/**
 * Clamp a page index into the valid range for a list
 */
export function clampPage(page: number, itemCount: number, pageSize: number): number {
  return Math.min(Math.max(0, Math.trunc(page)), lastPageIndex(itemCount, pageSize));
}

const NUMBERED_LABEL = /^(\d+)\. /;

function assertPageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
  }
}

// ============================================================================
// Engine
// ============================================================================

export class PaginatedList<T extends ListItem> {
  protected readonly items: readonly T[];
  protected readonly pageSize: number;
  private currentPage = 0;

  constructor(
    items: readonly T[],
    pageSize: number,
    protected readonly renderer: Renderer
  ) {
    assertPageSize(pageSize);
    this.items = items;
    this.pageSize = pageSize;
  }

  getItems(): readonly T[] {
    return this.items;
  }

  getItemsCount(): number {
    return this.items.length;
  }

  getPageSize(): number {
    return this.pageSize;
  }

  getCurrentPage(): number {
    return this.currentPage;
  }

  getLastPage(): number {
    return lastPageIndex(this.items.length, this.pageSize);
  }

  /**
   * Move to a page. Out-of-range pages are a caller defect.
   *
   * @throws RangeError when the page is outside [0, last page]
   */
  setPage(page: number): void {
    if (!Number.isInteger(page) || page < 0 || page > this.getLastPage()) {
      throw new RangeError(`Page ${page} is outside 0..${this.getLastPage()}`);
    }
    this.currentPage = page;
  }

  /**
   * Items visible on a page
   */
  pageSlice(page: number = this.currentPage): readonly T[] {
    const start = page * this.pageSize;
    return this.items.slice(start, Math.min(start + this.pageSize, this.items.length));
  }

  /**
   * Build the menu for the current page
   */
  buildOptions(filter: string = DEFAULT_FILTER, showFilter = true): SelectOption[] {
    const options: SelectOption[] = [];
    const entry = (label: string): SelectOption => ({ id: label, label });

    if (showFilter) {
      options.push(entry(NavLabels.filter(filter)));
    }

    if (this.items.length === 0) {
      options.push(entry(NavLabels.back));
      return options;
    }

    if (this.currentPage > 0) {
      options.push(entry(NavLabels.previous));
    }

    const start = this.currentPage * this.pageSize;
    options.push(...this.itemOptions(start, this.pageSlice()));

    if (this.currentPage < this.getLastPage()) {
      options.push(entry(NavLabels.next));
    }

    options.push(entry(NavLabels.back));
    return options;
  }

  /**
   * Rows for the visible items. `start` is the global index of the first.
   */
  protected itemOptions(start: number, visible: readonly T[]): SelectOption[] {
    return visible.map((item, offset) => {
      const label = `${start + offset + 1}. ${item.displayShort()}`;
      return { id: label, label };
    });
  }

  /**
   * Translate a menu answer into an action. Never throws: stale or
   * unparseable answers become NoAction on the current page.
   */
  interpret(answer: string | null, filter: string = DEFAULT_FILTER, showFilter = true): PaginationAction<T> {
    const stay: PaginationAction<T> = { type: 'no_action', page: this.currentPage };

    if (answer === null) {
      return { type: 'go_back' };
    }
    if (showFilter && answer === NavLabels.filter(filter)) {
      return { type: 'filter_changed', filter };
    }
    if (answer === NavLabels.back) {
      return { type: 'go_back' };
    }
    if (answer === NavLabels.previous) {
      return this.currentPage > 0 ? { type: 'previous_page', page: this.currentPage - 1 } : stay;
    }
    if (answer === NavLabels.next) {
      return this.currentPage < this.getLastPage() ? { type: 'next_page', page: this.currentPage + 1 } : stay;
    }

    const match = NUMBERED_LABEL.exec(answer);
    if (!match?.[1]) {
      return stay;
    }

    const item = this.items[Number(match[1]) - 1];
    return item ? { type: 'item_selected', item } : stay;
  }

  /**
   * Render the current page and return the resulting action.
   * Previous/next moves are applied to the page index before returning.
   */
  async show(options: ShowOptions<T>): Promise<PaginationAction<T>> {
    const filter = options.filter ?? DEFAULT_FILTER;
    const showFilter = options.showFilter ?? true;
    const noun = options.title.toLowerCase();

    let message: string;
    if (this.items.length === 0) {
      await this.renderer.display({ message: `No ${filter} ${noun} found.`, format: 'plain' });
      message = `No ${noun} found. What would you like to do?`;
    } else {
      await this.renderer.display({
        message: `Page ${this.currentPage + 1} of ${this.getLastPage() + 1} (${this.items.length} ${filter} ${noun})`,
        format: 'plain',
      });
      message = options.prompt ?? `Select from ${noun} to view details or navigate:`;
    }

    const answer = await this.renderer.select({
      message,
      options: this.buildOptions(filter, showFilter),
    });
    const action = this.interpret(answer, filter, showFilter);

    switch (action.type) {
      case 'previous_page':
      case 'next_page':
        this.setPage(action.page);
        return action;

      case 'item_selected':
        if (options.onSelect) {
          return options.onSelect(action.item);
        }
        await showDetails(this.renderer, action.item);
        return { type: 'no_action', page: this.currentPage };

      default:
        return action;
    }
  }
}

/**
 * Detail view for one item, followed by an acknowledgement pause
 */
export async function showDetails(renderer: Renderer, item: ListItem): Promise<void> {
  await renderer.display({ message: `${item.kind.toUpperCase()} DETAILS`, format: 'heading' });
  await renderer.display({ message: item.displayVerbose(), format: 'plain' });
  await renderer.waitForEnter();
}
