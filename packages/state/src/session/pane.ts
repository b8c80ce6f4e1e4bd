/**
 * A file list pane: its location, directory history, filters, sorting
 * and pane-local options.
 */

import { MatcherError, NameFilter } from './matchers.js';
import { OptionSet } from './options.js';
import { defaultSortKeys } from './sorting.js';

export interface DirHistoryEntry {
  dir: string;
  file: string;
  /** Cursor offset from the top of the visible list. */
  relPos: number;
}

/**
 * Navigation history of a pane, oldest first. The cursor points at the
 * entry for the directory currently shown; visiting a new directory
 * drops everything after the cursor.
 */
export class DirHistory {
  private items: DirHistoryEntry[] = [];
  private cursor = -1;
  private capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(0, capacity);
  }

  get size(): number {
    return this.items.length;
  }

  get pos(): number {
    return this.cursor;
  }

  get limit(): number {
    return this.capacity;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /** Slots left between the cursor and the capacity limit. */
  freeSlotsAfterCursor(): number {
    return this.capacity - 1 - this.cursor;
  }

  contains(dir: string): boolean {
    return this.items.some(entry => entry.dir === dir);
  }

  entries(): DirHistoryEntry[] {
    return this.items.map(entry => ({ ...entry }));
  }

  save(dir: string, file: string, relPos: number): void {
    if (this.capacity === 0) return;

    const current = this.items[this.cursor];
    if (current && current.dir === dir) {
      current.file = file;
      current.relPos = relPos;
      return;
    }

    this.items.length = this.cursor + 1;
    const existing = this.items.findIndex(entry => entry.dir === dir);
    if (existing !== -1) this.items.splice(existing, 1);
    this.items.push({ dir, file, relPos });
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
    this.cursor = this.items.length - 1;
  }

  /** Change capacity, dropping the oldest entries when shrinking. */
  resize(capacity: number): void {
    this.capacity = Math.max(0, capacity);
    const excess = this.items.length - this.capacity;
    if (excess > 0) {
      this.items.splice(0, excess);
      this.cursor = Math.max(this.cursor - excess, this.items.length > 0 ? 0 : -1);
    }
  }

  clear(): void {
    this.items = [];
    this.cursor = -1;
  }
}

export interface PaneFilters {
  invert: boolean;
  hideDot: boolean;
  manual: NameFilter;
  /** Expression of the last manual filter that was set. */
  prevManual: string;
  auto: NameFilter;
}

export class PaneView {
  currDir: string;
  currFile = '';
  relPos = 0;
  readonly history: DirHistory;
  readonly filters: PaneFilters = {
    invert: true,
    hideDot: false,
    manual: NameFilter.empty(),
    prevManual: '',
    auto: NameFilter.empty(),
  };
  sortKeys: number[] = defaultSortKeys();
  readonly options = new OptionSet('view');

  constructor(currDir: string, historyLength: number) {
    this.currDir = currDir;
    this.history = new DirHistory(historyLength);
  }

  /** Record the shown directory and cursor in the directory history. */
  saveCurrentPosition(): void {
    this.history.save(this.currDir, this.currFile, this.relPos);
  }

  /**
   * Replace the manual filter. An expression that does not compile
   * leaves an empty filter behind. Returns whether `expr` was taken.
   */
  setManualFilter(expr: string): boolean {
    try {
      this.filters.manual = NameFilter.compile(expr);
      this.filters.prevManual = expr;
      return true;
    } catch (err) {
      if (!(err instanceof MatcherError)) throw err;
      this.filters.manual = NameFilter.empty();
      this.filters.prevManual = '';
      return false;
    }
  }
}
