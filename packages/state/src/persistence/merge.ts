/**
 * Merging a state file written by another instance into this instance's
 * freshly serialized state.
 *
 * `current` is the serialized live state and wins every conflict except
 * for marks and bookmarks, where the newer timestamp wins. `admixture`
 * is what another instance stored since this one last loaded or saved.
 * Only `current` is modified; live state is only consulted.
 */

import { statSync } from 'node:fs';
import { DocArray, deepCopy } from '../document/value.js';
import type { DocObject } from '../document/value.js';
import { describeError, errorCode, logError } from '../log.js';
import type { AssocList } from '../session/assocs.js';
import type { PaneView } from '../session/pane.js';
import type { Session } from '../session/session.js';
import type { CategorySet } from './categories.js';

export interface MergeContext {
  session: Session;
  categories: CategorySet;
  /** Directory probe for directory history entries. */
  isDirectory?: (path: string) => boolean;
}

function defaultIsDirectory(path: string): boolean {
  try {
    return statSync(path, { throwIfNoEntry: false })?.isDirectory() === true;
  } catch (err) {
    if (errorCode(err) !== 'ENOTDIR') {
      logError(`can't stat ${path}: ${describeError(err)}`);
    }
    return false;
  }
}

function arrayOf(root: DocObject, key: string): DocArray {
  return root.getArray(key) ?? root.addArray(key);
}

function objectOf(root: DocObject, key: string): DocObject {
  return root.getObject(key) ?? root.addObject(key);
}

/** Left and right pane tabs, when there is one global tab and one tab per pane. */
function soleTabs(root: DocObject): [DocObject, DocObject] | null {
  const gtabs = root.getArray('gtabs');
  if (gtabs?.length !== 1) return null;
  const panes = gtabs.getObject(0)?.getArray('panes');
  const tabs: DocObject[] = [];
  for (const index of [0, 1]) {
    const ptabs = panes?.getObject(index)?.getArray('ptabs');
    const tab = ptabs?.getObject(0);
    if (ptabs?.length !== 1 || !tab) return null;
    tabs.push(tab);
  }
  return [tabs[0], tabs[1]];
}

function mergeDirHistory(
  current: DocObject,
  admixture: DocObject,
  view: PaneView,
  isDirectory: (path: string) => boolean,
): void {
  const updated = admixture.getArray('history');
  if (view.history.freeSlotsAfterCursor() <= 0 || !updated || updated.length === 0) {
    return;
  }

  const merged = new DocArray();
  for (const entry of updated.objects()) {
    const dir = entry.getString('dir');
    if (dir !== undefined && !view.history.contains(dir) && isDirectory(dir)) {
      merged.push(deepCopy(entry));
    }
  }
  for (const entry of current.getArray('history')?.values() ?? []) {
    merged.push(deepCopy(entry));
  }
  current.set('history', merged);
}

function mergeTabs(current: DocObject, admixture: DocObject, ctx: MergeContext): void {
  if (!ctx.categories.has('dhistory')) return;

  const currentTabs = soleTabs(current);
  const updatedTabs = soleTabs(admixture);
  if (!currentTabs || !updatedTabs) return;

  const isDirectory = ctx.isDirectory ?? defaultIsDirectory;
  const views = ctx.session.panes();
  for (const index of [0, 1] as const) {
    mergeDirHistory(currentTabs[index], updatedTabs[index], views[index], isDirectory);
  }
}

function mergeAssocs(current: DocObject, admixture: DocObject, key: string, live: AssocList): void {
  const updated = admixture.getArray(key);
  if (!updated) return;
  const entries = arrayOf(current, key);
  for (const entry of updated.objects()) {
    const matchers = entry.getString('matchers');
    const cmd = entry.getString('cmd');
    if (matchers !== undefined && cmd !== undefined && !live.exists(matchers, cmd)) {
      entries.push(deepCopy(entry));
    }
  }
}

function mergeCommands(current: DocObject, admixture: DocObject): void {
  const updated = admixture.getObject('cmds');
  if (!updated) return;
  const cmds = objectOf(current, 'cmds');
  for (const name of updated.keys()) {
    const body = updated.getString(name);
    if (body !== undefined && !cmds.has(name)) {
      cmds.setString(name, body);
    }
  }
}

function mergeTimestamped(
  current: DocObject,
  admixture: DocObject,
  key: string,
  isOlder: (name: string, ts: number) => boolean,
): void {
  const updated = admixture.getObject(key);
  if (!updated) return;
  const target = objectOf(current, key);
  for (const name of updated.keys()) {
    const item = updated.getObject(name);
    const ts = item?.getNumber('ts');
    if (item && ts !== undefined && isOlder(name, Math.trunc(ts))) {
      target.set(name, deepCopy(item));
    }
  }
}

/** Entries only the admixture has, then all of current's (most recent last). */
function mergeHistory(current: DocObject, admixture: DocObject, key: string): void {
  const updated = admixture.getArray(key);
  if (!updated || updated.length === 0) return;

  const entries = current.getArray(key)?.strings() ?? [];
  const known = new Set(entries);
  const merged = new DocArray();
  for (const item of updated.strings()) {
    if (!known.has(item)) merged.appendString(item);
  }
  for (const item of entries) {
    merged.appendString(item);
  }
  current.set(key, merged);
}

function mergeRegisters(current: DocObject, admixture: DocObject): void {
  const updated = admixture.getObject('regs');
  if (!updated) return;
  const regs = objectOf(current, 'regs');
  for (const [name, files] of updated.entries()) {
    if (!regs.has(name)) {
      regs.set(name, deepCopy(files));
    }
  }
}

function mergeDirStack(current: DocObject, admixture: DocObject, session: Session): void {
  if (session.dirStack.changed()) return;
  const updated = admixture.get('dir-stack');
  if (updated !== undefined) {
    current.set('dir-stack', deepCopy(updated));
  }
}

function mergeTrash(current: DocObject, admixture: DocObject, session: Session): void {
  const updated = admixture.getArray('trash');
  if (!updated) return;
  const trash = arrayOf(current, 'trash');
  for (const entry of updated.objects()) {
    const trashed = entry.getString('trashed');
    const original = entry.getString('original');
    if (trashed !== undefined && original !== undefined
      && !session.trash.has(original, trashed)) {
      trash.push(deepCopy(entry));
    }
  }
}

/** Fold `admixture` into `current` in place. */
export function mergeStates(current: DocObject, admixture: DocObject, ctx: MergeContext): void {
  const { session, categories } = ctx;

  mergeTabs(current, admixture, ctx);

  if (categories.has('filetypes')) {
    mergeAssocs(current, admixture, 'assocs', session.assocs.filetypes);
    mergeAssocs(current, admixture, 'xassocs', session.assocs.xfiletypes);
    mergeAssocs(current, admixture, 'viewers', session.assocs.viewers);
  }

  if (categories.has('commands')) {
    mergeCommands(current, admixture);
  }

  if (categories.has('marks')) {
    mergeTimestamped(current, admixture, 'marks', (name, ts) => session.marks.isOlder(name, ts));
  }

  if (categories.has('bookmarks')) {
    mergeTimestamped(current, admixture, 'bmarks', (path, ts) => session.bookmarks.isOlder(path, ts));
  }

  if (categories.has('chistory')) mergeHistory(current, admixture, 'cmd-hist');
  if (categories.has('shistory')) mergeHistory(current, admixture, 'search-hist');
  if (categories.has('phistory')) mergeHistory(current, admixture, 'prompt-hist');
  if (categories.has('fhistory')) mergeHistory(current, admixture, 'lfilt-hist');

  if (categories.has('registers')) {
    mergeRegisters(current, admixture);
  }

  if (categories.has('dirstack')) {
    mergeDirStack(current, admixture, session);
  }

  mergeTrash(current, admixture, session);
}
