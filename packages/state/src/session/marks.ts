/**
 * Directory marks.
 *
 * Names come from a fixed set. `<` and `>` (selection bounds) and `'`
 * (previous position) are maintained by the navigation engine and are
 * never persisted.
 */

export const VALID_MARKS =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789<>\'';

export const SPECIAL_MARKS = '<>\'';

export interface Mark {
  name: string;
  dir: string;
  file: string;
  /** Seconds since the epoch. */
  ts: number;
}

export function isValidMark(name: string): boolean {
  return name.length === 1 && VALID_MARKS.includes(name);
}

export function isSpecialMark(name: string): boolean {
  return name.length === 1 && SPECIAL_MARKS.includes(name);
}

export class MarkStore {
  private marks: Map<string, Mark> = new Map();

  /** Set a user mark. Returns false for invalid or special names. */
  setUserMark(name: string, dir: string, file: string, ts: number): boolean {
    if (!isValidMark(name) || isSpecialMark(name) || dir === '') {
      return false;
    }
    this.marks.set(name, { name, dir, file, ts });
    return true;
  }

  setSpecialMark(name: string, dir: string, file: string, ts: number): boolean {
    if (!isSpecialMark(name)) return false;
    this.marks.set(name, { name, dir, file, ts });
    return true;
  }

  get(name: string): Mark | undefined {
    return this.marks.get(name);
  }

  clear(name: string): void {
    this.marks.delete(name);
  }

  /** All set marks, ordered by the valid-name table. */
  list(): Mark[] {
    const out: Mark[] = [];
    for (const name of VALID_MARKS) {
      const mark = this.marks.get(name);
      if (mark) out.push(mark);
    }
    return out;
  }

  /** Set marks that are written to the state file. */
  persistent(): Mark[] {
    return this.list().filter(mark => !isSpecialMark(mark.name));
  }

  /** True when the mark is unset or its timestamp is strictly less than `ts`. */
  isOlder(name: string, ts: number): boolean {
    const mark = this.marks.get(name);
    return mark === undefined || mark.ts < ts;
  }
}
