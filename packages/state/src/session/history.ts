/**
 * Bounded string histories (command line, search, prompt, filter).
 *
 * Items are kept newest first. Re-adding an item moves it to the front.
 */

export class StringHistory {
  private items: string[] = [];
  private capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(0, capacity);
  }

  get size(): number {
    return this.items.length;
  }

  get limit(): number {
    return this.capacity;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  add(item: string): void {
    if (item === '' || this.capacity === 0) return;
    const existing = this.items.indexOf(item);
    if (existing !== -1) this.items.splice(existing, 1);
    this.items.unshift(item);
    if (this.items.length > this.capacity) {
      this.items.length = this.capacity;
    }
  }

  /** Change capacity, dropping the oldest items when shrinking. */
  resize(capacity: number): void {
    this.capacity = Math.max(0, capacity);
    if (this.items.length > this.capacity) {
      this.items.length = this.capacity;
    }
  }

  clear(): void {
    this.items = [];
  }

  newestFirst(): string[] {
    return [...this.items];
  }

  oldestFirst(): string[] {
    return [...this.items].reverse();
  }
}
