/**
 * Option engine: the table of recognised options and a scoped set of
 * their current values.
 *
 * Settings are exchanged as the flat strings a `:set` command takes:
 * `name`, `noname`, `invname`, `name!`, `name=value`, `name+=value` and
 * `name-=value`. Backslash escapes the next character in a value.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export type OptionScope = 'global' | 'view';
export type OptionType = 'bool' | 'int' | 'string';
export type OptionValue = boolean | number | string;

export interface OptionDef {
  name: string;
  scope: OptionScope;
  type: OptionType;
  default: OptionValue;
}

export type OptionErrorCode = 'UNKNOWN' | 'INVALID_VALUE' | 'SYNTAX';

export class OptionError extends Error {
  readonly code: OptionErrorCode;

  constructor(code: OptionErrorCode, message: string) {
    super(message);
    this.name = 'OptionError';
    this.code = code;
  }
}

const optionDefSchema = z.discriminatedUnion('type', [
  z.object({ name: z.string(), scope: z.enum(['global', 'view']), type: z.literal('bool'), default: z.boolean() }),
  z.object({ name: z.string(), scope: z.enum(['global', 'view']), type: z.literal('int'), default: z.number().int() }),
  z.object({ name: z.string(), scope: z.enum(['global', 'view']), type: z.literal('string'), default: z.string() }),
]);

function loadOptionDefs(): OptionDef[] {
  const path = fileURLToPath(new URL('./option-defs.json', import.meta.url));
  return z.array(optionDefSchema).parse(JSON.parse(readFileSync(path, 'utf-8')));
}

/** Every recognised option, in the order settings are written out. */
export const OPTION_DEFS: readonly OptionDef[] = loadOptionDefs();

const DEFS_BY_NAME = new Map(OPTION_DEFS.map(def => [def.name, def]));

export function findOptionDef(name: string): OptionDef | undefined {
  return DEFS_BY_NAME.get(name);
}

/** Backslash-escape backslashes and spaces. */
export function escapeSpaces(value: string): string {
  return value.replace(/[\\ ]/g, ch => `\\${ch}`);
}

/** Drop escaping backslashes; a trailing lone backslash is kept. */
export function unescapeValue(value: string): string {
  return value.replace(/\\(.)/gs, '$1');
}

function formatSetting(def: OptionDef, value: OptionValue): string {
  switch (def.type) {
    case 'bool':
      return value ? def.name : `no${def.name}`;
    case 'int':
      return `${def.name}=${value}`;
    case 'string':
      return `${def.name}=${escapeSpaces(String(value))}`;
  }
}

function parseInteger(name: string, text: string): number {
  if (!/^[+-]?\d+$/.test(text.trim())) {
    throw new OptionError('INVALID_VALUE', `invalid number for ${name}: ${text}`);
  }
  return Number.parseInt(text, 10);
}

function removeListItem(list: string, item: string): string {
  return list.split(',').filter(part => part !== item).join(',');
}

type OptionListener = (name: string, value: OptionValue) => void;

const SETTING_RE = /^([a-z]+)(!|\+=|-=|=|:)?(.*)$/s;

export class OptionSet {
  private readonly defs: OptionDef[];
  private values: Map<string, OptionValue> = new Map();
  private listeners: OptionListener[] = [];

  constructor(scope: OptionScope) {
    this.defs = OPTION_DEFS.filter(def => def.scope === scope);
    for (const def of this.defs) {
      this.values.set(def.name, def.default);
    }
  }

  /** Whether the option a setting names belongs to this set. */
  recognizes(setting: string): boolean {
    const match = SETTING_RE.exec(setting.trimStart());
    if (!match) return false;
    return this.resolve(match[1]) !== undefined;
  }

  get(name: string): OptionValue | undefined {
    return this.values.get(name);
  }

  getBool(name: string): boolean {
    return this.values.get(name) === true;
  }

  getInt(name: string): number | undefined {
    const value = this.values.get(name);
    return typeof value === 'number' ? value : undefined;
  }

  getString(name: string): string | undefined {
    const value = this.values.get(name);
    return typeof value === 'string' ? value : undefined;
  }

  set(name: string, value: OptionValue): void {
    const def = this.defs.find(d => d.name === name);
    if (!def) {
      throw new OptionError('UNKNOWN', `unknown option: ${name}`);
    }
    if (typeof value !== typeof def.default) {
      throw new OptionError('INVALID_VALUE', `wrong value type for ${name}`);
    }
    this.values.set(name, value);
    for (const listener of this.listeners) {
      listener(name, value);
    }
  }

  onChange(listener: OptionListener): void {
    this.listeners.push(listener);
  }

  /** Apply one flat setting string. Throws OptionError on failure. */
  apply(setting: string): void {
    const match = SETTING_RE.exec(setting.trimStart());
    if (!match) {
      throw new OptionError('SYNTAX', `malformed setting: ${setting}`);
    }
    const word = match[1];
    const op: string | undefined = match[2];
    const rest = match[3];

    const resolved = this.resolve(word);
    if (!resolved) {
      throw new OptionError('UNKNOWN', `unknown option: ${word}`);
    }
    const { def, prefix } = resolved;

    if (def.type === 'bool') {
      if (op === undefined || op === '!') {
        if (rest !== '') {
          throw new OptionError('SYNTAX', `trailing characters: ${setting}`);
        }
        const current = this.getBool(def.name);
        const toggle = prefix === 'inv' || op === '!';
        this.set(def.name, toggle ? !current : prefix !== 'no');
        return;
      }
      throw new OptionError('INVALID_VALUE', `${def.name} is a boolean option`);
    }

    if (prefix !== '' || op === undefined || op === '!') {
      throw new OptionError('SYNTAX', `${def.name} requires a value`);
    }

    const text = unescapeValue(rest);
    if (def.type === 'int') {
      const n = parseInteger(def.name, text);
      const current = this.getInt(def.name) ?? 0;
      if (op === '+=') this.set(def.name, current + n);
      else if (op === '-=') this.set(def.name, current - n);
      else this.set(def.name, n);
      return;
    }

    const current = this.getString(def.name) ?? '';
    if (op === '+=') {
      this.set(def.name, current === '' || text === '' ? current + text : `${current},${text}`);
    } else if (op === '-=') {
      this.set(def.name, removeListItem(current, text));
    } else {
      this.set(def.name, text);
    }
  }

  /** Current values as settings strings, in table order. */
  settings(): string[] {
    return this.defs.map(def => formatSetting(def, this.values.get(def.name) ?? def.default));
  }

  private resolve(word: string): { def: OptionDef; prefix: '' | 'no' | 'inv' } | undefined {
    const exact = this.defs.find(d => d.name === word);
    if (exact) return { def: exact, prefix: '' };
    for (const prefix of ['no', 'inv'] as const) {
      if (word.startsWith(prefix)) {
        const def = this.defs.find(d => d.name === word.slice(prefix.length));
        if (def?.type === 'bool') return { def, prefix };
      }
    }
    return undefined;
  }
}
