/**
 * Tests for the option table and scoped option sets.
 */
import { describe, it, expect } from 'vitest';
import { OPTION_DEFS, OptionError, OptionSet, escapeSpaces, unescapeValue } from '../session/options.js';

describe('option table', () => {
  it('loads global and view options', () => {
    expect(OPTION_DEFS.find(d => d.name === 'history')).toEqual({
      name: 'history', scope: 'global', type: 'int', default: 15,
    });
    expect(OPTION_DEFS.find(d => d.name === 'dotfiles')?.scope).toBe('view');
  });
});

describe('escaping', () => {
  it('escapes spaces and backslashes', () => {
    expect(escapeSpaces('a b\\c')).toBe('a\\ b\\\\c');
  });

  it('drops escaping backslashes', () => {
    expect(unescapeValue('a\\ b\\\\c')).toBe('a b\\c');
  });
});

describe('OptionSet', () => {
  it('applies boolean forms', () => {
    const opts = new OptionSet('global');
    opts.apply('noautochpos');
    expect(opts.getBool('autochpos')).toBe(false);
    opts.apply('invautochpos');
    expect(opts.getBool('autochpos')).toBe(true);
    opts.apply('autochpos!');
    expect(opts.getBool('autochpos')).toBe(false);
    opts.apply('autochpos');
    expect(opts.getBool('autochpos')).toBe(true);
  });

  it('applies integer assignments', () => {
    const opts = new OptionSet('global');
    opts.apply('tabstop=4');
    opts.apply('tabstop+=2');
    expect(opts.getInt('tabstop')).toBe(6);
    opts.apply('tabstop-=1');
    expect(opts.getInt('tabstop')).toBe(5);
  });

  it('applies string list edits', () => {
    const opts = new OptionSet('global');
    opts.apply('cdpath=/a');
    opts.apply('cdpath+=/b');
    expect(opts.getString('cdpath')).toBe('/a,/b');
    opts.apply('cdpath-=/a');
    expect(opts.getString('cdpath')).toBe('/b');
  });

  it('keeps an escaped trailing space', () => {
    const opts = new OptionSet('global');
    opts.apply('rulerformat=%l\\ ');
    expect(opts.getString('rulerformat')).toBe('%l ');
  });

  it('reports errors with a code', () => {
    const opts = new OptionSet('global');
    expect(() => opts.apply('nosuchoption')).toThrow(OptionError);
    let caught: unknown;
    try {
      opts.apply('tabstop=wide');
    } catch (err) {
      caught = err;
    }
    expect(caught instanceof OptionError ? caught.code : undefined).toBe('INVALID_VALUE');
    expect(() => opts.apply('tabstop')).toThrow(/requires a value/);
  });

  it('does not recognise options of another scope', () => {
    expect(new OptionSet('global').recognizes('dotfiles')).toBe(false);
    expect(new OptionSet('view').recognizes('nodotfiles')).toBe(true);
  });

  it('lists settings in table order', () => {
    const opts = new OptionSet('view');
    opts.apply('number');
    opts.apply('previewprg=less -R');

    expect(opts.settings()).toEqual([
      'viewcolumns=',
      'sortgroups=',
      'lsoptions=',
      'nolsview',
      'milleroptions=lsize:1,csize:1,rsize:1',
      'nomillerview',
      'number',
      'numberwidth=4',
      'norelativenumber',
      'nodotfiles',
      'previewprg=less\\ -R',
    ]);
  });

  it('notifies listeners of changes', () => {
    const opts = new OptionSet('global');
    const seen: Array<[string, unknown]> = [];
    opts.onChange((name, value) => seen.push([name, value]));
    opts.apply('history=3');
    expect(seen).toEqual([['history', 3]]);
  });
});
