/**
 * Reader for the legacy line-oriented state file.
 *
 * The file is converted into the same document shape the JSON state
 * file uses, so a single loader handles both. Every section the legacy
 * format can express is created up front, even when empty.
 */

import { accessSync, constants, lstatSync, readFileSync, statSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { DocObject } from '../document/value.js';
import type { DocArray } from '../document/value.js';
import { describeError, errorCode, logError } from '../log.js';
import { isValidRegister } from '../session/registers.js';
import { LineStream, leadingInt, wholeInt } from './line-stream.js';
import {
  BUILTIN_COMMAND,
  LEFT_PANE_OPTION,
  LineTag,
  PaneProperty,
  RIGHT_PANE_OPTION,
} from './tags.js';

export interface LegacyReadOptions {
  /** Trash directory that relative trash paths were stored against. */
  trashDir?: string;
  /** Seconds since the epoch, for marks stored without a timestamp. */
  now?: () => number;
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** Probe failures other than ENOTDIR are logged and count as a miss. */
function probeFailed(path: string, err: unknown): false {
  if (errorCode(err) !== 'ENOTDIR') {
    logError(`can't check ${path}: ${describeError(err)}`);
  }
  return false;
}

function isWritableDir(dir: string): boolean {
  try {
    if (statSync(dir, { throwIfNoEntry: false })?.isDirectory() !== true) return false;
  } catch (err) {
    return probeFailed(dir, err);
  }
  try {
    accessSync(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

function existsNoFollow(path: string): boolean {
  try {
    return lstatSync(path, { throwIfNoEntry: false }) !== undefined;
  } catch (err) {
    return probeFailed(path, err);
  }
}

/** Resolve a trash path stored relative to the trash directory. */
function convertTrashPath(path: string, trashDir: string | undefined): string {
  if (trashDir === undefined || isAbsolute(path) || !isWritableDir(trashDir)) {
    return path;
  }
  const full = join(trashDir, path);
  return existsNoFollow(full) ? full : path;
}

interface PaneTabNodes {
  tab: DocObject;
  history: DocArray;
  filters: DocObject;
  options: DocArray;
}

function addPane(panes: DocArray): PaneTabNodes {
  const pane = panes.appendObject();
  const tab = pane.addArray('ptabs').appendObject();
  return {
    tab,
    history: tab.addArray('history'),
    filters: tab.addObject('filters'),
    options: tab.addArray('options'),
  };
}

/** Convert legacy file text into a state document. */
export function parseLegacyState(text: string, options?: LegacyReadOptions): DocObject {
  const now = options?.now ?? nowSeconds;
  const trashDir = options?.trashDir;

  const root = new DocObject();
  const globalOptions = root.addArray('options');
  const assocs = root.addArray('assocs');
  const xassocs = root.addArray('xassocs');
  const viewers = root.addArray('viewers');
  const cmds = root.addObject('cmds');
  const marks = root.addObject('marks');
  const bmarks = root.addObject('bmarks');
  const cmdHist = root.addArray('cmd-hist');
  const searchHist = root.addArray('search-hist');
  const promptHist = root.addArray('prompt-hist');
  const filterHist = root.addArray('lfilt-hist');
  const dirStack = root.addArray('dir-stack');
  const trash = root.addArray('trash');
  const regs = root.addObject('regs');

  const gtab = root.addArray('gtabs').appendObject();
  const splitter = gtab.addObject('splitter');
  const panes = gtab.addArray('panes');
  const left = addPane(panes);
  const right = addPane(panes);

  const stream = new LineStream(text);
  let line: string | null;
  while ((line = stream.nextLine()) !== null) {
    const tag = line.charAt(0);
    const value = line.slice(1);

    switch (tag) {
      case '':
      case LineTag.Comment:
        break;

      case LineTag.Option:
        if (value.startsWith(LEFT_PANE_OPTION)) {
          left.options.appendString(value.slice(1));
        } else if (value.startsWith(RIGHT_PANE_OPTION)) {
          right.options.appendString(value.slice(1));
        } else {
          globalOptions.appendString(value);
        }
        break;

      case LineTag.Filetype:
      case LineTag.XFiletype:
      case LineTag.FileViewer: {
        const cmd = stream.nextLine();
        if (cmd === null) break;
        if (tag !== LineTag.FileViewer && cmd.endsWith(`}${BUILTIN_COMMAND}`)) break;
        const list = tag === LineTag.Filetype ? assocs : tag === LineTag.XFiletype ? xassocs : viewers;
        const entry = list.appendObject();
        entry.setString('matchers', value);
        entry.setString('cmd', cmd);
        break;
      }

      case LineTag.Command: {
        const body = stream.nextLine();
        if (body !== null) cmds.setString(value, body);
        break;
      }

      case LineTag.Mark: {
        const dir = stream.nextLine();
        if (dir === null) break;
        const file = stream.nextLine();
        if (file === null) break;
        let ts = stream.readOptionalNumber();
        if (ts === -1) ts = now();
        const mark = marks.addObject(value.charAt(0));
        mark.setString('dir', dir);
        mark.setString('file', file);
        mark.setNumber('ts', ts);
        break;
      }

      case LineTag.Bookmark: {
        const tags = stream.nextLine();
        if (tags === null) break;
        const tsLine = stream.nextLine();
        const ts = tsLine === null ? undefined : wholeInt(tsLine);
        if (ts === undefined) break;
        const bmark = bmarks.addObject(value);
        bmark.setString('tags', tags);
        bmark.setNumber('ts', ts);
        break;
      }

      case LineTag.ActivePane:
        gtab.setNumber('active-pane', value.charAt(0) === 'l' ? 0 : 1);
        break;

      case LineTag.QuickView:
        gtab.setBool('preview', leadingInt(value) !== 0);
        break;

      case LineTag.WindowCount:
        splitter.setBool('expanded', leadingInt(value) === 1);
        break;

      case LineTag.SplitOrientation:
        splitter.setString('orientation', value.charAt(0) === 'v' ? 'v' : 'h');
        break;

      case LineTag.SplitPosition:
        splitter.setNumber('pos', leadingInt(value));
        break;

      case LineTag.LeftSort:
        left.tab.setString('sorting', value);
        break;

      case LineTag.RightSort:
        right.tab.setString('sorting', value);
        break;

      case LineTag.LeftHistory:
      case LineTag.RightHistory: {
        const pane = tag === LineTag.LeftHistory ? left : right;
        if (value === '') {
          pane.tab.setBool('restore-last-location', true);
          break;
        }
        const file = stream.nextLine();
        if (file === null) break;
        const entry = pane.history.appendObject();
        entry.setString('dir', value);
        entry.setString('file', file);
        entry.setNumber('relpos', stream.readOptionalNumber());
        break;
      }

      case LineTag.CmdlineHistory:
        cmdHist.appendString(value);
        break;

      case LineTag.SearchHistory:
        searchHist.appendString(value);
        break;

      case LineTag.PromptHistory:
        promptHist.appendString(value);
        break;

      case LineTag.FilterHistory:
        filterHist.appendString(value);
        break;

      case LineTag.DirStack: {
        const leftFile = stream.nextLine();
        if (leftFile === null) break;
        const rightDir = stream.nextLine();
        if (rightDir === null) break;
        const rightFile = stream.nextLine();
        if (rightFile === null) break;
        const entry = dirStack.appendObject();
        entry.setString('left-dir', value);
        entry.setString('left-file', leftFile);
        entry.setString('right-dir', rightDir.slice(1));
        entry.setString('right-file', rightFile);
        break;
      }

      case LineTag.Trash: {
        const original = stream.nextLine();
        if (original === null) break;
        const entry = trash.appendObject();
        entry.setString('trashed', convertTrashPath(value, trashDir));
        entry.setString('original', original);
        break;
      }

      case LineTag.Register: {
        const name = value.charAt(0);
        if (!isValidRegister(name)) break;
        const files = regs.getArray(name) ?? regs.addArray(name);
        files.appendString(value.slice(1));
        break;
      }

      case LineTag.LeftFilter:
        left.filters.setString('manual', value);
        break;

      case LineTag.RightFilter:
        right.filters.setString('manual', value);
        break;

      case LineTag.LeftFilterInvert:
        left.filters.setBool('invert', leadingInt(value) !== 0);
        break;

      case LineTag.RightFilterInvert:
        right.filters.setBool('invert', leadingInt(value) !== 0);
        break;

      case LineTag.UseTermMultiplexer:
        root.setBool('use-term-multiplexer', leadingInt(value) !== 0);
        break;

      case LineTag.ColorScheme:
        root.setString('color-scheme', value);
        break;

      case LineTag.LeftPaneProperty:
      case LineTag.RightPaneProperty: {
        const filters = tag === LineTag.LeftPaneProperty ? left.filters : right.filters;
        const prop = value.charAt(0);
        if (prop === PaneProperty.DotFiles) {
          filters.setBool('dot', leadingInt(value.slice(1)) !== 0);
        } else if (prop === PaneProperty.AutoFilter) {
          filters.setString('auto', value.slice(1));
        }
        break;
      }

      default:
        break;
    }
  }

  return root;
}

/**
 * Read a legacy state file. Returns null when the file cannot be read.
 */
export function readLegacyState(path: string, options?: LegacyReadOptions): DocObject | null {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      logError(`can't read ${path}: ${describeError(err)}`);
    }
    return null;
  }
  return parseLegacyState(text, options);
}
