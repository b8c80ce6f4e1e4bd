/**
 * Tagged bookmarks keyed by path.
 */

export class BookmarkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BookmarkError';
  }
}

export interface Bookmark {
  path: string;
  /** Comma-separated tag list. */
  tags: string;
  /** Seconds since the epoch. */
  ts: number;
}

function validateTags(tags: string): void {
  const list = tags.split(',');
  if (list.some(tag => tag === '' || /\s/.test(tag))) {
    throw new BookmarkError(`invalid tags: "${tags}"`);
  }
}

export class BookmarkStore {
  private bookmarks: Map<string, Bookmark> = new Map();

  /** Add or replace a bookmark. Throws BookmarkError for bad input. */
  setup(path: string, tags: string, ts: number): void {
    if (path === '') {
      throw new BookmarkError('empty bookmark path');
    }
    validateTags(tags);
    this.bookmarks.set(path, { path, tags, ts });
  }

  get(path: string): Bookmark | undefined {
    return this.bookmarks.get(path);
  }

  remove(path: string): boolean {
    return this.bookmarks.delete(path);
  }

  list(): Bookmark[] {
    return [...this.bookmarks.values()];
  }

  /** True when the bookmark is unset or its timestamp is strictly less than `ts`. */
  isOlder(path: string, ts: number): boolean {
    const bmark = this.bookmarks.get(path);
    return bmark === undefined || bmark.ts < ts;
  }
}
