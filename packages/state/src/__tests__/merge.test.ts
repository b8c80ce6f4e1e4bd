/**
 * Tests for folding another instance's stored state into ours.
 */
import { describe, it, expect } from 'vitest';
import { parseDocument, toJson } from '../document/codec.js';
import { deepCopy } from '../document/value.js';
import type { DocObject, DocValue } from '../document/value.js';
import { allCategories, parseCategories } from '../persistence/categories.js';
import type { CategorySet } from '../persistence/categories.js';
import { mergeStates } from '../persistence/merge.js';
import { serializeState } from '../persistence/serializer.js';
import { Matchers } from '../session/matchers.js';
import { Session } from '../session/session.js';

function doc(value: unknown): DocObject {
  const root = parseDocument(JSON.stringify(value));
  if (!root) throw new Error('test document is not an object');
  return root;
}

function json(value: DocValue | undefined): unknown {
  return value === undefined ? undefined : toJson(value);
}

function only(list: string): CategorySet {
  return parseCategories(list).categories;
}

function leftHistory(root: DocObject): unknown {
  const tab = root.getArray('gtabs')?.getObject(0)?.getArray('panes')?.getObject(0)
    ?.getArray('ptabs')?.getObject(0);
  return json(tab?.getArray('history'));
}

function tabs(left: unknown, right: unknown = {}): unknown[] {
  return [{ panes: [{ ptabs: [left] }, { ptabs: [right] }] }];
}

const everyDir = () => true;

function itemsOf(root: DocObject, key: string): string[] {
  return (root.getArray(key)?.values() ?? []).map(value => JSON.stringify(toJson(value)));
}

function keysOf(root: DocObject, key: string): string[] {
  return root.getObject(key)?.keys() ?? [];
}

describe('mergeStates', () => {
  describe('directory history', () => {
    it('puts new existing directories before ours', () => {
      const session = new Session({ startDir: '/cur', historyLength: 5 });
      const categories = only('dhistory');
      const current = serializeState(session, categories);
      const admixture = doc({
        gtabs: tabs({
          history: [
            { dir: '/x', file: 'f', relpos: 1 },
            { dir: '/cur', file: 'old', relpos: 3 },
            { dir: '/gone', file: '', relpos: 0 },
          ],
        }),
      });

      mergeStates(current, admixture, {
        session,
        categories,
        isDirectory: path => path !== '/gone',
      });

      expect(leftHistory(current)).toEqual([
        { dir: '/x', file: 'f', relpos: 1 },
        { dir: '/cur', file: '', relpos: 0 },
      ]);
    });

    it('leaves history alone when there is no room after the cursor', () => {
      const session = new Session({ startDir: '/cur', historyLength: 1 });
      const categories = only('dhistory');
      const current = serializeState(session, categories);
      const admixture = doc({ gtabs: tabs({ history: [{ dir: '/x', file: '', relpos: 0 }] }) });

      mergeStates(current, admixture, { session, categories, isDirectory: everyDir });

      expect(leftHistory(current)).toEqual([{ dir: '/cur', file: '', relpos: 0 }]);
    });

    it('leaves history alone unless both sides have one tab per pane', () => {
      const session = new Session({ startDir: '/cur' });
      const categories = only('dhistory');
      const current = serializeState(session, categories);
      const history = { history: [{ dir: '/x', file: '', relpos: 0 }] };
      const admixture = doc({ gtabs: [...tabs(history), ...tabs(history)] });

      mergeStates(current, admixture, { session, categories, isDirectory: everyDir });

      expect(leftHistory(current)).toEqual([{ dir: '/cur', file: '', relpos: 0 }]);
    });

    it('leaves history alone without the dhistory category', () => {
      const session = new Session({ startDir: '/cur' });
      const categories = only('state');
      const current = serializeState(session, categories);
      const admixture = doc({ gtabs: tabs({ history: [{ dir: '/x', file: '', relpos: 0 }] }) });

      mergeStates(current, admixture, { session, categories, isDirectory: everyDir });

      expect(leftHistory(current)).toBeUndefined();
    });
  });

  it('adds associations that are not registered', () => {
    const session = new Session();
    session.assocs.setPrograms(Matchers.parse('*.pdf'), 'zathura', false);
    const categories = only('filetypes');
    const current = serializeState(session, categories);
    const admixture = doc({
      assocs: [
        { matchers: '*.pdf', cmd: 'zathura' },
        { matchers: '*.png', cmd: 'gimp' },
      ],
      viewers: [{ matchers: '*.md', cmd: 'glow' }],
    });

    mergeStates(current, admixture, { session, categories });

    expect(json(current.getArray('assocs'))).toEqual([
      { matchers: '*.pdf', cmd: 'zathura' },
      { matchers: '*.png', cmd: 'gimp' },
    ]);
    expect(json(current.getArray('xassocs'))).toEqual([]);
    expect(json(current.getArray('viewers'))).toEqual([{ matchers: '*.md', cmd: 'glow' }]);
  });

  it('adds commands under new names only', () => {
    const session = new Session();
    session.commands.define('build', 'make');
    const categories = only('commands');
    const current = serializeState(session, categories);

    mergeStates(current, doc({ cmds: { build: 'ninja', test: 'make test' } }), {
      session,
      categories,
    });

    expect(json(current.getObject('cmds'))).toEqual({ build: 'make', test: 'make test' });
  });

  it('takes marks with a newer timestamp', () => {
    const session = new Session();
    session.marks.setUserMark('a', '/mine', '', 100);
    session.marks.setUserMark('b', '/mine', '', 100);
    session.marks.setUserMark('c', '/mine', '', 100);
    const categories = only('marks');
    const current = serializeState(session, categories);
    const admixture = doc({
      marks: {
        a: { dir: '/theirs', file: '', ts: 50 },
        b: { dir: '/theirs', file: 'x', ts: 200 },
        c: { dir: '/theirs', file: '', ts: 100 },
        d: { dir: '/theirs', file: '', ts: 1 },
      },
    });

    mergeStates(current, admixture, { session, categories });

    expect(json(current.getObject('marks'))).toEqual({
      a: { dir: '/mine', file: '', ts: 100 },
      b: { dir: '/theirs', file: 'x', ts: 200 },
      c: { dir: '/mine', file: '', ts: 100 },
      d: { dir: '/theirs', file: '', ts: 1 },
    });
  });

  it('takes bookmarks with a newer timestamp', () => {
    const session = new Session();
    session.bookmarks.setup('/p', 'mine', 10);
    const categories = only('bookmarks');
    const current = serializeState(session, categories);

    mergeStates(current, doc({
      bmarks: { '/p': { tags: 'theirs', ts: 20 }, '/q': { tags: 'new', ts: 5 } },
    }), { session, categories });

    expect(json(current.getObject('bmarks'))).toEqual({
      '/p': { tags: 'theirs', ts: 20 },
      '/q': { tags: 'new', ts: 5 },
    });
  });

  it('puts unknown history items before ours without duplicates', () => {
    const session = new Session();
    session.cmdHistory.add('b');
    session.cmdHistory.add('c');
    const categories = only('chistory,shistory');
    const current = serializeState(session, categories);

    mergeStates(current, doc({
      'cmd-hist': ['a', 'b', 'd'],
      'search-hist': ['x'],
      'prompt-hist': ['y'],
    }), { session, categories });

    expect(current.getArray('cmd-hist')?.strings()).toEqual(['a', 'd', 'b', 'c']);
    expect(current.getArray('search-hist')?.strings()).toEqual(['x']);
    expect(current.has('prompt-hist')).toBe(false);
    expect(session.cmdHistory.oldestFirst()).toEqual(['b', 'c']);
  });

  it('adds registers that are absent', () => {
    const session = new Session();
    session.registers.append('x', '/1');
    const categories = only('registers');
    const current = serializeState(session, categories);

    mergeStates(current, doc({ regs: { x: ['/9'], y: ['/2'] } }), { session, categories });

    expect(json(current.getObject('regs'))).toEqual({ x: ['/1'], y: ['/2'] });
  });

  describe('directory stack', () => {
    const theirs = [{ 'left-dir': '/l', 'left-file': '', 'right-dir': '/r', 'right-file': '' }];

    it('takes the stored stack when ours did not change', () => {
      const session = new Session();
      const categories = only('dirstack');
      const current = serializeState(session, categories);

      mergeStates(current, doc({ 'dir-stack': theirs }), { session, categories });

      expect(json(current.getArray('dir-stack'))).toEqual(theirs);
    });

    it('keeps our stack when it changed', () => {
      const session = new Session();
      session.dirStack.push({ leftDir: '/a', leftFile: '', rightDir: '/b', rightFile: '' });
      const categories = only('dirstack');
      const current = serializeState(session, categories);

      mergeStates(current, doc({ 'dir-stack': theirs }), { session, categories });

      expect(json(current.getArray('dir-stack'))).toEqual([
        { 'left-dir': '/a', 'left-file': '', 'right-dir': '/b', 'right-file': '' },
      ]);
    });

    it('keeps our stack when none was stored', () => {
      const session = new Session();
      const categories = only('dirstack');
      const current = serializeState(session, categories);

      mergeStates(current, doc({}), { session, categories });

      expect(json(current.getArray('dir-stack'))).toEqual([]);
    });
  });

  it('merges trash whatever the categories', () => {
    const session = new Session();
    session.trash.add('/h/f', '/t/000_f');
    const categories = only('');
    const current = serializeState(session, categories);

    mergeStates(current, doc({
      trash: [
        { trashed: '/t/000_f', original: '/h/f' },
        { trashed: '/t/001_g', original: '/h/g' },
      ],
    }), { session, categories });

    expect(json(current.getArray('trash'))).toEqual([
      { trashed: '/t/000_f', original: '/h/f' },
      { trashed: '/t/001_g', original: '/h/g' },
    ]);
    expect(session.trash.size).toBe(1);
  });

  it('creates the trash section when we have none', () => {
    const session = new Session();
    const categories = only('');
    const current = serializeState(session, categories);

    mergeStates(current, doc({ trash: [{ trashed: '/t/000_f', original: '/h/f' }] }), {
      session,
      categories,
    });

    expect(json(current.getArray('trash'))).toEqual([{ trashed: '/t/000_f', original: '/h/f' }]);
  });

  it('keeps every current entry and adds every non-conflicting stored one', () => {
    const session = new Session();
    session.assocs.setPrograms(Matchers.parse('*.pdf'), 'zathura', false);
    session.commands.define('build', 'make');
    session.bookmarks.setup('/p', 'mine', 10);
    session.cmdHistory.add('a');
    session.cmdHistory.add('b');
    session.registers.append('x', '/1');
    session.trash.add('/h/f', '/t/000_f');
    const categories = only('filetypes,commands,bookmarks,chistory,registers');
    const current = serializeState(session, categories);
    const before = deepCopy(current);
    const admixture = doc({
      assocs: [{ matchers: '*.pdf', cmd: 'zathura' }, { matchers: '*.png', cmd: 'gimp' }],
      cmds: { build: 'ninja', test: 'make test' },
      bmarks: { '/q': { tags: 'new', ts: 1 } },
      'cmd-hist': ['b', 'z'],
      regs: { x: ['/9'], y: ['/2'] },
      trash: [{ trashed: '/t/001_g', original: '/h/g' }],
    });

    mergeStates(current, admixture, { session, categories });

    for (const key of ['assocs', 'cmd-hist', 'trash']) {
      const merged = itemsOf(current, key);
      expect(merged).toEqual(expect.arrayContaining(itemsOf(before, key)));
      expect(merged).toEqual(expect.arrayContaining(itemsOf(admixture, key)));
    }
    for (const key of ['cmds', 'bmarks', 'regs']) {
      const merged = keysOf(current, key);
      expect(merged).toEqual(expect.arrayContaining(keysOf(before, key)));
      expect(merged).toEqual(expect.arrayContaining(keysOf(admixture, key)));
    }
    expect(current.getObject('cmds')?.getString('build')).toBe('make');
    expect(json(current.getObject('regs')?.get('x'))).toEqual(['/1']);
  });

  it('changes nothing when merging a state into itself', () => {
    const session = new Session({ startDir: '/cur' });
    session.assocs.setPrograms(Matchers.parse('*.pdf'), 'zathura', false);
    session.commands.define('build', 'make');
    session.marks.setUserMark('a', '/src', '', 7);
    session.bookmarks.setup('/p', 'work', 8);
    session.cmdHistory.add('ls');
    session.registers.append('x', '/1');
    session.trash.add('/h/f', '/t/000_f');
    const categories = allCategories();
    const current = serializeState(session, categories);
    const before = toJson(current);

    mergeStates(current, deepCopy(current), { session, categories, isDirectory: everyDir });

    expect(toJson(current)).toEqual(before);
  });
});
