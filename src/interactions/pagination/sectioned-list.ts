/**
 * Sectioned List Engine
 *
 * Paginated list over named, ordered sections ("User Replicas",
 * "System Replicas"). Sections are concatenated before paging, so page math
 * is unchanged; a non-selectable header row is inserted before the first
 * item of each non-empty section.
 *
 * @module interactions/pagination/sectioned-list
 */

import type { ListItem } from '../../core/models.js';
import type { Renderer, SelectOption } from '../types.js';
import { NavLabels, PaginatedList } from './paginated-list.js';

export interface Section<T> {
  name: string;
  items: readonly T[];
}

export class SectionedPaginatedList<T extends ListItem> extends PaginatedList<T> {
  private readonly sections: readonly Section<T>[];
  /** Global index of each section's first item */
  private readonly starts: readonly number[];

  constructor(sections: readonly Section<T>[], pageSize: number, renderer: Renderer) {
    super(
      sections.flatMap((section) => section.items),
      pageSize,
      renderer
    );
    this.sections = sections;

    const starts: number[] = [];
    let offset = 0;
    for (const section of sections) {
      starts.push(offset);
      offset += section.items.length;
    }
    this.starts = starts;
  }

  getSections(): readonly Section<T>[] {
    return this.sections;
  }

  /**
   * Index of the section a global item index falls into, by cumulative
   * section lengths. Returns -1 when out of range.
   */
  sectionIndexOf(globalIndex: number): number {
    if (globalIndex < 0 || globalIndex >= this.items.length) return -1;

    for (let i = this.sections.length - 1; i >= 0; i--) {
      const start = this.starts[i] ?? 0;
      const size = this.sections[i]?.items.length ?? 0;
      if (size > 0 && globalIndex >= start) {
        return i;
      }
    }
    return -1;
  }

  /**
   * Name of the section starting exactly at this global index, if any
   */
  headerAt(globalIndex: number): string | null {
    const index = this.sectionIndexOf(globalIndex);
    if (index < 0 || this.starts[index] !== globalIndex) return null;
    return this.sections[index]?.name ?? null;
  }

  protected override itemOptions(start: number, visible: readonly T[]): SelectOption[] {
    const rows = super.itemOptions(start, visible);
    const options: SelectOption[] = [];

    rows.forEach((row, offset) => {
      const header = this.headerAt(start + offset);
      if (header !== null) {
        const label = NavLabels.header(header);
        options.push({ id: label, label, separator: true });
      }
      options.push(row);
    });

    return options;
  }
}
