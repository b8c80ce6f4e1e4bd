/**
 * Persistence categories: which parts of the session are written to and
 * merged into the state file.
 */

export const PERSIST_CATEGORIES = [
  'options',
  'filetypes',
  'commands',
  'marks',
  'bookmarks',
  'tui',
  'dhistory',
  'state',
  'cs',
  'savedirs',
  'chistory',
  'shistory',
  'phistory',
  'fhistory',
  'dirstack',
  'registers',
] as const;

export type PersistCategory = (typeof PERSIST_CATEGORIES)[number];

export type CategorySet = ReadonlySet<PersistCategory>;

const KNOWN: ReadonlySet<string> = new Set(PERSIST_CATEGORIES);

export function isPersistCategory(name: string): name is PersistCategory {
  return KNOWN.has(name);
}

export interface ParsedCategories {
  categories: Set<PersistCategory>;
  /** Names that are not categories, in input order. */
  unknown: string[];
}

/** Split a comma-separated category list. Empty items are ignored. */
export function parseCategories(text: string): ParsedCategories {
  const categories = new Set<PersistCategory>();
  const unknown: string[] = [];
  for (const raw of text.split(',')) {
    const name = raw.trim();
    if (name === '') continue;
    if (isPersistCategory(name)) categories.add(name);
    else unknown.push(name);
  }
  return { categories, unknown };
}

/** Every category, for callers that persist everything. */
export function allCategories(): Set<PersistCategory> {
  return new Set(PERSIST_CATEGORIES);
}

export function formatCategories(categories: CategorySet): string {
  return PERSIST_CATEGORIES.filter(c => categories.has(c)).join(',');
}
