/**
 * Sort descriptors: a comma-separated list of signed sort key ids.
 * A negative id sorts that key in descending order; 0 fills unused slots.
 */

export const MAX_SORT_KEY = 23;
export const SORT_KEY_SLOTS = 23;
/** Sort by name. */
export const DEFAULT_SORT_KEY = 2;
export const NO_SORT_KEY = 0;

export function defaultSortKeys(): number[] {
  const keys = new Array<number>(SORT_KEY_SLOTS).fill(NO_SORT_KEY);
  keys[0] = DEFAULT_SORT_KEY;
  return keys;
}

function clamp(n: number): number {
  const clamped = Math.min(MAX_SORT_KEY, Math.max(-MAX_SORT_KEY, n));
  return clamped === 0 ? NO_SORT_KEY : clamped;
}

/**
 * Parse a descriptor into exactly SORT_KEY_SLOTS keys. Commas and
 * whitespace separate keys; parsing stops at the first token that is not
 * a signed integer. Without any key the default key is used.
 */
export function parseSortDescriptor(text: string): number[] {
  const keys: number[] = [];
  let rest = text;
  while (keys.length < SORT_KEY_SLOTS) {
    rest = rest.replace(/^[\s,]+/, '');
    const match = /^[+-]?\d+/.exec(rest);
    if (!match) break;
    keys.push(clamp(Number.parseInt(match[0], 10)));
    rest = rest.slice(match[0].length);
  }
  if (keys.length === 0) return defaultSortKeys();
  while (keys.length < SORT_KEY_SLOTS) keys.push(NO_SORT_KEY);
  return keys;
}

/** Keys up to the first empty slot, comma-joined. */
export function formatSortDescriptor(keys: readonly number[]): string {
  const used: number[] = [];
  for (const key of keys.slice(0, SORT_KEY_SLOTS)) {
    if (key === NO_SORT_KEY) break;
    used.push(key);
  }
  return used.join(',');
}
