/**
 * Tests for applying a state document to a live session.
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { parseDocument } from '../document/codec.js';
import type { DocObject } from '../document/value.js';
import { loadState } from '../persistence/loader.js';
import { NameFilter } from '../session/matchers.js';
import { Session } from '../session/session.js';

function doc(value: unknown): DocObject {
  const root = parseDocument(JSON.stringify(value));
  if (!root) throw new Error('test document is not an object');
  return root;
}

function withLeftTab(tab: unknown, gtab: Record<string, unknown> = {}): DocObject {
  return doc({ gtabs: [{ panes: [{ ptabs: [tab] }, { ptabs: [{}] }], ...gtab }] });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadState', () => {
  it('leaves the session alone for an empty document', () => {
    const session = new Session({ startDir: '/start' });
    loadState(doc({}), session);
    expect(session.left.currDir).toBe('/start');
    expect(session.left.history.size).toBe(0);
    expect(session.activePane).toBe(0);
  });

  it('restores directory history and clamps negative positions', () => {
    const session = new Session({ startDir: '/start' });
    loadState(withLeftTab({
      history: [
        { dir: '/a', file: 'x', relpos: -3 },
        { dir: '/b', file: 'y', relpos: 2 },
      ],
      'restore-last-location': true,
    }), session);

    expect(session.left.history.entries()).toEqual([
      { dir: '/a', file: 'x', relPos: 0 },
      { dir: '/b', file: 'y', relPos: 2 },
    ]);
    expect(session.left.currDir).toBe('/b');
    expect(session.right.currDir).toBe('/start');
  });

  it('skips history entries with missing fields', () => {
    const session = new Session();
    loadState(withLeftTab({
      history: [{ dir: '/a', file: 'x' }, { dir: '/b', file: '', relpos: 1 }, 'junk'],
    }), session);
    expect(session.left.history.entries()).toEqual([{ dir: '/b', file: '', relPos: 1 }]);
  });

  it('does not jump to the last location on a reread', () => {
    const session = new Session({ startDir: '/start' });
    loadState(withLeftTab({
      history: [{ dir: '/b', file: 'y', relpos: 0 }],
      'restore-last-location': true,
    }), session, { reread: true });
    expect(session.left.currDir).toBe('/start');
    expect(session.left.history.size).toBe(1);
  });

  it('grows histories instead of dropping loaded items', () => {
    const session = new Session({ historyLength: 2 });
    loadState(doc({ 'cmd-hist': ['a', 'b', 'c'] }), session);

    expect(session.historyLength).toBe(3);
    expect(session.cmdHistory.oldestFirst()).toEqual(['a', 'b', 'c']);
    expect(session.left.history.limit).toBe(3);
    expect(session.searchHistory.limit).toBe(3);
  });

  it('keeps every history entry when the stored history option is smaller', () => {
    const session = new Session({ historyLength: 3 });
    loadState(doc({
      gtabs: [{
        panes: [
          { ptabs: [{ history: ['/a', '/b', '/c', '/d', '/e'].map(dir => ({ dir, file: '', relpos: 0 })) }] },
          { ptabs: [{}] },
        ],
      }],
      options: ['history=3'],
    }), session);

    expect(session.left.history.entries().map(entry => entry.dir)).toEqual(['/a', '/b', '/c', '/d', '/e']);
    expect(session.historyLength).toBe(5);
  });

  it('restores the layout of the global tab', () => {
    const session = new Session();
    loadState(withLeftTab({}, {
      'active-pane': 1,
      preview: true,
      splitter: { pos: 20, orientation: 'horizontal', expanded: true },
    }), session);

    expect(session.activePane).toBe(1);
    expect(session.preview).toBe(true);
    expect(session.splitterPos).toBe(20);
    expect(session.splitOrientation).toBe('h');
    expect(session.windowCount).toBe(1);
  });

  it('keeps the layout on a reread', () => {
    const session = new Session();
    loadState(withLeftTab({}, {
      'active-pane': 1,
      preview: true,
      splitter: { pos: 20, orientation: 'h', expanded: true },
    }), session, { reread: true });

    expect(session.activePane).toBe(0);
    expect(session.preview).toBe(false);
    expect(session.splitterPos).toBe(-1);
    expect(session.splitOrientation).toBe('v');
    expect(session.windowCount).toBe(2);
  });

  it('ignores an out of range active pane', () => {
    const session = new Session();
    loadState(withLeftTab({}, { 'active-pane': 2 }), session);
    expect(session.activePane).toBe(0);
  });

  it('restores filters and resets a bad manual filter', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const session = new Session();
    session.left.filters.auto = NameFilter.compile('\\.o$');
    session.left.setManualFilter('old');

    loadState(withLeftTab({
      filters: { invert: false, dot: true, manual: '(', auto: '[' },
    }), session);

    expect(session.left.filters.invert).toBe(false);
    expect(session.left.filters.hideDot).toBe(true);
    expect(session.left.filters.manual.expr).toBe('');
    expect(session.left.filters.auto.expr).toBe('\\.o$');
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('applies global, shared and pane options', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const session = new Session();
    loadState(doc({
      gtabs: [{ panes: [{ ptabs: [{ options: ['number'], sorting: '-3,5' }] }, { ptabs: [{}] }] }],
      options: ['notitle', 'bogus', 'dotfiles'],
    }), session);

    expect(session.options.getBool('title')).toBe(false);
    expect(session.left.options.getBool('dotfiles')).toBe(true);
    expect(session.right.options.getBool('dotfiles')).toBe(true);
    expect(session.left.options.getBool('number')).toBe(true);
    expect(session.right.options.getBool('number')).toBe(false);
    expect(session.left.sortKeys.slice(0, 3)).toEqual([-3, 5, 0]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe(
      '[twinpane] can\'t apply option "bogus": unknown option in: bogus',
    );
  });

  it('registers associations and skips bad matchers', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const session = new Session();
    loadState(doc({
      assocs: [
        { matchers: '*.pdf', cmd: '{Read}zathura' },
        { matchers: '{*.c', cmd: 'cc' },
      ],
      xassocs: [{ matchers: '*.png', cmd: 'gimp' }],
      viewers: [{ matchers: '<text/*>', cmd: 'cat' }],
    }), session);

    expect(session.assocs.filetypes.exists('*.pdf', '{Read}zathura')).toBe(true);
    expect(session.assocs.filetypes.count).toBe(1);
    expect(session.assocs.xfiletypes.exists('*.png', 'gimp')).toBe(true);
    expect(session.assocs.viewers.exists('<text/*>', 'cat')).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('defines commands and skips invalid ones', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const session = new Session();
    loadState(doc({ cmds: { build: 'make', '1bad': 'x', empty: 7 } }), session);

    expect(session.commands.list()).toEqual([['build', 'make']]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('restores marks and bookmarks', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const session = new Session();
    loadState(doc({
      marks: {
        a: { dir: '/src', file: 'main.c', ts: 5.9 },
        '\'': { dir: '/prev', file: '', ts: 1 },
      },
      bmarks: {
        '/p': { tags: 'work,src', ts: 10 },
        '/q': { tags: 'bad tag', ts: 11 },
      },
    }), session);

    expect(session.marks.get('a')).toEqual({ name: 'a', dir: '/src', file: 'main.c', ts: 5 });
    expect(session.marks.get('\'')).toBeUndefined();
    expect(session.bookmarks.get('/p')).toEqual({ path: '/p', tags: 'work,src', ts: 10 });
    expect(session.bookmarks.get('/q')).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('restores registers, directory stack and trash', () => {
    const session = new Session();
    loadState(doc({
      regs: { x: ['/1', '/2'], _: ['/3'] },
      'dir-stack': [
        { 'left-dir': '/l', 'left-file': 'a', 'right-dir': '/r', 'right-file': 'b' },
        { 'left-dir': '/l' },
      ],
      trash: [{ trashed: '/trash/000_f', original: '/home/f' }],
    }), session);

    expect(session.registers.list()).toEqual([{ name: 'x', files: ['/1', '/2'] }]);
    expect(session.dirStack.list()).toEqual([
      { leftDir: '/l', leftFile: 'a', rightDir: '/r', rightFile: 'b' },
    ]);
    expect(session.trash.has('/home/f', '/trash/000_f')).toBe(true);
  });

  it('ignores values of the wrong type', () => {
    const session = new Session();
    loadState(doc({
      'cmd-hist': 'ls',
      'use-term-multiplexer': 'yes',
      'color-scheme': 'dark',
      gtabs: {},
    }), session);

    expect(session.cmdHistory.size).toBe(0);
    expect(session.useTermMultiplexer).toBe(false);
    expect(session.colorScheme).toBe('dark');
  });
});
