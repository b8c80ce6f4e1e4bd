/**
 * State document -> session.
 *
 * Every field is optional: a missing section or a value of the wrong
 * type leaves the corresponding live state as it is. Bad entries are
 * logged and skipped.
 */

import type { DocObject } from '../document/value.js';
import { describeError, logError } from '../log.js';
import type { AssocKind } from '../session/assocs.js';
import { Matchers, NameFilter } from '../session/matchers.js';
import type { StringHistory } from '../session/history.js';
import type { PaneView } from '../session/pane.js';
import type { Session } from '../session/session.js';
import { parseSortDescriptor } from '../session/sorting.js';

export interface LoadOptions {
  /**
   * Re-reading state into a running session. Pane layout, the active
   * pane and the last-location jump are left alone.
   */
  reread?: boolean;
}

function loadSettings(parent: DocObject, session: Session, pane?: PaneView): void {
  const options = parent.getArray('options');
  if (!options) return;
  for (const setting of options.strings()) {
    try {
      session.applySetting(setting, pane);
    } catch (err) {
      logError(`can't apply option "${setting}": ${describeError(err)}`);
    }
  }
}

/** Grow every history by one when `full`, so the next insert fits. */
function ensureRoom(session: Session, full: boolean): void {
  if (full) {
    session.resizeHistories(session.historyLength + 1);
  }
}

function loadDirHistory(tab: DocObject, view: PaneView, session: Session, reread: boolean): void {
  const history = tab.getArray('history');
  let lastDir: string | undefined;
  if (history) {
    for (const entry of history.objects()) {
      const dir = entry.getString('dir');
      const file = entry.getString('file');
      const relPos = entry.getInt('relpos');
      if (dir === undefined || file === undefined || relPos === undefined) continue;
      ensureRoom(session, view.history.isFull());
      view.history.save(dir, file, Math.max(0, relPos));
      lastDir = dir;
    }
  }

  if (tab.getBool('restore-last-location') === true && !reread && lastDir !== undefined) {
    view.currDir = lastDir;
  }
}

function loadFilters(tab: DocObject, view: PaneView): void {
  const filters = tab.getObject('filters');
  if (!filters) return;

  const invert = filters.getBool('invert');
  if (invert !== undefined) view.filters.invert = invert;

  const dot = filters.getBool('dot');
  if (dot !== undefined) view.filters.hideDot = dot;

  const manual = filters.getString('manual');
  if (manual !== undefined && !view.setManualFilter(manual)) {
    logError(`bad manual filter "${manual}", reset to empty`);
  }

  const auto = filters.getString('auto');
  if (auto !== undefined) {
    try {
      view.filters.auto = NameFilter.compile(auto);
    } catch (err) {
      logError(`error setting auto filename filter to "${auto}": ${describeError(err)}`);
    }
  }
}

function loadPane(pane: DocObject | undefined, view: PaneView, session: Session, reread: boolean): void {
  const ptabs = pane?.getArray('ptabs');
  if (!ptabs) return;
  for (const tab of ptabs.objects()) {
    loadDirHistory(tab, view, session, reread);
    loadFilters(tab, view);
    loadSettings(tab, session, view);
    const sorting = tab.getString('sorting');
    if (sorting !== undefined) {
      view.sortKeys = parseSortDescriptor(sorting);
    }
  }
}

function loadGlobalTab(gtab: DocObject, session: Session, reread: boolean): void {
  const panes = gtab.getArray('panes');
  loadPane(panes?.getObject(0), session.left, session, reread);
  loadPane(panes?.getObject(1), session.right, session, reread);

  if (reread) return;

  const activePane = gtab.getInt('active-pane');
  if (activePane === 0 || activePane === 1) session.activePane = activePane;

  const preview = gtab.getBool('preview');
  if (preview !== undefined) session.preview = preview;

  const splitter = gtab.getObject('splitter');
  if (!splitter) return;

  const orientation = splitter.getString('orientation');
  if (orientation !== undefined) {
    session.splitOrientation = orientation.startsWith('v') ? 'v' : 'h';
  }
  const pos = splitter.getInt('pos');
  if (pos !== undefined) session.splitterPos = pos;

  const expanded = splitter.getBool('expanded');
  if (expanded !== undefined) session.windowCount = expanded ? 1 : 2;
}

function loadAssocs(root: DocObject, key: string, kind: AssocKind, session: Session): void {
  const entries = root.getArray(key);
  if (!entries) return;
  for (const entry of entries.objects()) {
    const expr = entry.getString('matchers');
    const cmd = entry.getString('cmd');
    if (expr === undefined || cmd === undefined) continue;
    let matchers: Matchers;
    try {
      matchers = Matchers.parse(expr);
    } catch (err) {
      logError(`error with matchers of ${kind} "${expr}": ${describeError(err)}`);
      continue;
    }
    if (kind === 'viewer') session.assocs.setViewers(matchers, cmd);
    else session.assocs.setPrograms(matchers, cmd, kind === 'xfiletype');
  }
}

function loadCommands(root: DocObject, session: Session): void {
  const cmds = root.getObject('cmds');
  if (!cmds) return;
  for (const name of cmds.keys()) {
    const body = cmds.getString(name);
    if (body === undefined) continue;
    try {
      session.commands.define(name, body);
    } catch (err) {
      logError(`can't define command ${name}: ${describeError(err)}`);
    }
  }
}

function loadMarks(root: DocObject, session: Session): void {
  const marks = root.getObject('marks');
  if (!marks) return;
  for (const name of marks.keys()) {
    const mark = marks.getObject(name);
    const dir = mark?.getString('dir');
    const file = mark?.getString('file');
    const ts = mark?.getNumber('ts');
    if (dir === undefined || file === undefined || ts === undefined) continue;
    session.marks.setUserMark(name, dir, file, Math.trunc(ts));
  }
}

function loadBookmarks(root: DocObject, session: Session): void {
  const bmarks = root.getObject('bmarks');
  if (!bmarks) return;
  for (const path of bmarks.keys()) {
    const bmark = bmarks.getObject(path);
    const tags = bmark?.getString('tags');
    const ts = bmark?.getNumber('ts');
    if (tags === undefined || ts === undefined) continue;
    try {
      session.bookmarks.setup(path, tags, Math.trunc(ts));
    } catch (err) {
      logError(`can't add a bookmark: ${path} (${tags}): ${describeError(err)}`);
    }
  }
}

function loadRegisters(root: DocObject, session: Session): void {
  const regs = root.getObject('regs');
  if (!regs) return;
  for (const name of regs.keys()) {
    const files = regs.getArray(name);
    if (!files) continue;
    for (const file of files.strings()) {
      session.registers.append(name, file);
    }
  }
}

function loadDirStack(root: DocObject, session: Session): void {
  const entries = root.getArray('dir-stack');
  if (!entries) return;
  for (const entry of entries.objects()) {
    const leftDir = entry.getString('left-dir');
    const leftFile = entry.getString('left-file');
    const rightDir = entry.getString('right-dir');
    const rightFile = entry.getString('right-file');
    if (leftDir === undefined || leftFile === undefined
      || rightDir === undefined || rightFile === undefined) {
      continue;
    }
    session.dirStack.push({ leftDir, leftFile, rightDir, rightFile });
  }
}

function loadTrash(root: DocObject, session: Session): void {
  const entries = root.getArray('trash');
  if (!entries) return;
  for (const entry of entries.objects()) {
    const trashed = entry.getString('trashed');
    const original = entry.getString('original');
    if (trashed !== undefined && original !== undefined) {
      session.trash.add(original, trashed);
    }
  }
}

/** Items are stored oldest first; each insert makes it the newest. */
function loadHistory(root: DocObject, key: string, history: StringHistory, session: Session): void {
  const entries = root.getArray(key);
  if (!entries) return;
  for (const item of entries.strings()) {
    ensureRoom(session, history.isFull());
    history.add(item);
  }
}

/** Apply a state document to a live session. */
export function loadState(root: DocObject, session: Session, options?: LoadOptions): void {
  const reread = options?.reread ?? false;

  const useTermMultiplexer = root.getBool('use-term-multiplexer');
  if (useTermMultiplexer !== undefined) session.useTermMultiplexer = useTermMultiplexer;

  const colorScheme = root.getString('color-scheme');
  if (colorScheme !== undefined) session.colorScheme = colorScheme;

  // Global options first: a stored `history` may only grow what is loaded after it.
  loadSettings(root, session);

  const gtabs = root.getArray('gtabs');
  if (gtabs) {
    for (const gtab of gtabs.objects()) {
      loadGlobalTab(gtab, session, reread);
    }
  }

  loadAssocs(root, 'assocs', 'filetype', session);
  loadAssocs(root, 'xassocs', 'xfiletype', session);
  loadAssocs(root, 'viewers', 'viewer', session);
  loadCommands(root, session);
  loadMarks(root, session);
  loadBookmarks(root, session);
  loadRegisters(root, session);
  loadDirStack(root, session);
  loadTrash(root, session);
  loadHistory(root, 'cmd-hist', session.cmdHistory, session);
  loadHistory(root, 'search-hist', session.searchHistory, session);
  loadHistory(root, 'prompt-hist', session.promptHistory, session);
  loadHistory(root, 'lfilt-hist', session.filterHistory, session);
}
