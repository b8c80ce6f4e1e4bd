/**
 * Stack of saved pane locations (`:pushd`/`:popd`).
 *
 * `freeze()` marks the current content as the startup baseline; any
 * later push, pop or clear counts as a change, even one that restores
 * the same content.
 */

export interface DirStackEntry {
  leftDir: string;
  leftFile: string;
  rightDir: string;
  rightFile: string;
}

export class DirStack {
  private entries: DirStackEntry[] = [];
  private mutated = false;

  push(entry: DirStackEntry): void {
    this.entries.push({ ...entry });
    this.mutated = true;
  }

  pop(): DirStackEntry | undefined {
    const entry = this.entries.pop();
    if (entry) this.mutated = true;
    return entry;
  }

  clear(): void {
    if (this.entries.length > 0) this.mutated = true;
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }

  /** Bottom to top. */
  list(): DirStackEntry[] {
    return this.entries.map(entry => ({ ...entry }));
  }

  freeze(): void {
    this.mutated = false;
  }

  changed(): boolean {
    return this.mutated;
  }
}
