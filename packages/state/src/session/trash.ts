/**
 * Record of files moved to trash and where they came from.
 */

export interface TrashEntry {
  trashed: string;
  original: string;
}

export class TrashStore {
  private entries: TrashEntry[] = [];

  /** Returns false when the pair is already recorded. */
  add(original: string, trashed: string): boolean {
    if (this.has(original, trashed)) return false;
    this.entries.push({ trashed, original });
    return true;
  }

  has(original: string, trashed: string): boolean {
    return this.entries.some(e => e.original === original && e.trashed === trashed);
  }

  remove(trashed: string): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter(e => e.trashed !== trashed);
    return this.entries.length !== before;
  }

  get size(): number {
    return this.entries.length;
  }

  list(): TrashEntry[] {
    return this.entries.map(e => ({ ...e }));
  }
}
