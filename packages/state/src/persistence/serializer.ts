/**
 * Session -> state document.
 *
 * Only sections whose persistence category is enabled are emitted; the
 * trash record is always written when non-empty.
 */

import { DocObject } from '../document/value.js';
import type { DocArray } from '../document/value.js';
import { formatRecord } from '../session/assocs.js';
import type { AssocList } from '../session/assocs.js';
import type { StringHistory } from '../session/history.js';
import type { PaneView } from '../session/pane.js';
import type { Session } from '../session/session.js';
import { formatSortDescriptor } from '../session/sorting.js';
import type { CategorySet } from './categories.js';

function storeAssocs(root: DocObject, key: string, list: AssocList): void {
  const entries = root.addArray(key);
  for (const assoc of list.entries()) {
    for (const record of assoc.records) {
      if (record.command === '' || record.type === 'builtin') continue;
      const entry = entries.appendObject();
      entry.setString('matchers', assoc.matchers.expr);
      entry.setString('cmd', formatRecord(record));
    }
  }
}

/** Written oldest first; omitted entirely when empty. */
function storeHistory(root: DocObject, key: string, history: StringHistory): void {
  if (history.size === 0) return;
  const entries = root.addArray(key);
  for (const item of history.oldestFirst()) {
    entries.appendString(item);
  }
}

function storeStrings(target: DocArray, items: string[]): void {
  for (const item of items) target.appendString(item);
}

function storeDirHistory(tab: DocObject, pane: PaneView, categories: CategorySet): void {
  pane.saveCurrentPosition();

  const history = tab.addArray('history');
  const entries = pane.history.entries();
  for (let i = 0; i <= pane.history.pos && i < entries.length; i++) {
    const entry = history.appendObject();
    entry.setString('dir', entries[i].dir);
    entry.setString('file', entries[i].file);
    entry.setNumber('relpos', entries[i].relPos);
  }

  tab.setBool('restore-last-location', categories.has('savedirs'));
}

function storePane(pane: DocObject, view: PaneView, session: Session, categories: CategorySet): void {
  const tab = pane.addArray('ptabs').appendObject();

  if (categories.has('dhistory') && session.historyLength > 0) {
    storeDirHistory(tab, view, categories);
  }

  if (categories.has('state')) {
    const filters = tab.addObject('filters');
    filters.setBool('invert', view.filters.invert);
    filters.setBool('dot', view.filters.hideDot);
    filters.setString('manual', view.filters.manual.expr);
    filters.setString('auto', view.filters.auto.expr);
  }

  if (categories.has('options')) {
    storeStrings(tab.addArray('options'), view.options.settings());
  }

  if (categories.has('tui')) {
    tab.setString('sorting', formatSortDescriptor(view.sortKeys));
  }
}

function storeGlobalTab(gtab: DocObject, session: Session, categories: CategorySet): void {
  const panes = gtab.addArray('panes');
  for (const view of session.panes()) {
    storePane(panes.appendObject(), view, session, categories);
  }

  if (categories.has('tui')) {
    gtab.setNumber('active-pane', session.activePane);
    gtab.setBool('preview', session.preview);
    const splitter = gtab.addObject('splitter');
    splitter.setNumber('pos', session.splitterPos);
    splitter.setString('orientation', session.splitOrientation);
    splitter.setBool('expanded', session.windowCount === 1);
  }
}

/**
 * Build the state document for `session`. Records each pane's current
 * position in its directory history first, the way leaving the
 * directory would.
 */
export function serializeState(session: Session, categories: CategorySet): DocObject {
  const root = new DocObject();

  storeGlobalTab(root.addArray('gtabs').appendObject(), session, categories);

  if (session.trash.size > 0) {
    const trash = root.addArray('trash');
    for (const item of session.trash.list()) {
      const entry = trash.appendObject();
      entry.setString('trashed', item.trashed);
      entry.setString('original', item.original);
    }
  }

  if (categories.has('options')) {
    storeStrings(root.addArray('options'), session.options.settings());
  }

  if (categories.has('filetypes')) {
    storeAssocs(root, 'assocs', session.assocs.filetypes);
    storeAssocs(root, 'xassocs', session.assocs.xfiletypes);
    storeAssocs(root, 'viewers', session.assocs.viewers);
  }

  if (categories.has('commands')) {
    const cmds = root.addObject('cmds');
    for (const [name, body] of session.commands.list()) {
      cmds.setString(name, body);
    }
  }

  if (categories.has('marks')) {
    const marks = root.addObject('marks');
    for (const mark of session.marks.persistent()) {
      const entry = marks.addObject(mark.name);
      entry.setString('dir', mark.dir);
      entry.setString('file', mark.file);
      entry.setNumber('ts', mark.ts);
    }
  }

  if (categories.has('bookmarks')) {
    const bmarks = root.addObject('bmarks');
    for (const bmark of session.bookmarks.list()) {
      const entry = bmarks.addObject(bmark.path);
      entry.setString('tags', bmark.tags);
      entry.setNumber('ts', bmark.ts);
    }
  }

  if (categories.has('chistory')) storeHistory(root, 'cmd-hist', session.cmdHistory);
  if (categories.has('shistory')) storeHistory(root, 'search-hist', session.searchHistory);
  if (categories.has('phistory')) storeHistory(root, 'prompt-hist', session.promptHistory);
  if (categories.has('fhistory')) storeHistory(root, 'lfilt-hist', session.filterHistory);

  if (categories.has('registers')) {
    const regs = root.addObject('regs');
    for (const reg of session.registers.list()) {
      storeStrings(regs.addArray(reg.name), reg.files);
    }
  }

  if (categories.has('dirstack')) {
    const entries = root.addArray('dir-stack');
    for (const item of session.dirStack.list()) {
      const entry = entries.appendObject();
      entry.setString('left-dir', item.leftDir);
      entry.setString('left-file', item.leftFile);
      entry.setString('right-dir', item.rightDir);
      entry.setString('right-file', item.rightFile);
    }
  }

  if (categories.has('state')) {
    root.setBool('use-term-multiplexer', session.useTermMultiplexer);
  }

  if (categories.has('cs')) {
    root.setString('color-scheme', session.colorScheme);
  }

  return root;
}
