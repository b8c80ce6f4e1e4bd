/**
 * File type associations: programs, X programs and viewers keyed by
 * matcher expressions.
 *
 * A command list is written as comma-separated entries, each optionally
 * prefixed with `{description}`. A literal comma inside a command is
 * written as `,,`.
 */

import { splitList } from './matchers.js';
import type { Matchers } from './matchers.js';

/** Builtin records are synthesized at startup and never persisted. */
export type AssocRecordType = 'custom' | 'builtin';

export interface AssocRecord {
  command: string;
  description: string;
  type: AssocRecordType;
}

export interface Assoc {
  matchers: Matchers;
  records: AssocRecord[];
}

export type AssocKind = 'filetype' | 'xfiletype' | 'viewer';

/** Parse a command list into records (custom type). */
export function parseCommandList(text: string): AssocRecord[] {
  const records: AssocRecord[] = [];
  for (const raw of splitList(text)) {
    const item = raw.trimStart();
    let description = '';
    let command = item;
    if (item.startsWith('{')) {
      const end = item.indexOf('}');
      if (end !== -1) {
        description = item.slice(1, end);
        command = item.slice(end + 1).trimStart();
      }
    }
    if (command !== '') {
      records.push({ command, description, type: 'custom' });
    }
  }
  return records;
}

/** Format one record the way it is stored: commas doubled, description prefixed. */
export function formatRecord(record: AssocRecord): string {
  const doubled = record.command.replace(/,/g, ',,');
  return record.description === '' ? doubled : `{${record.description}}${doubled}`;
}

function sameRecord(a: AssocRecord, b: AssocRecord): boolean {
  return a.command === b.command && a.description === b.description;
}

export class AssocList {
  private assocs: Assoc[] = [];

  get count(): number {
    return this.assocs.length;
  }

  entries(): readonly Assoc[] {
    return this.assocs;
  }

  add(matchers: Matchers, records: AssocRecord[]): void {
    let assoc = this.assocs.find(a => a.matchers.expr === matchers.expr);
    if (!assoc) {
      assoc = { matchers, records: [] };
      this.assocs.push(assoc);
    }
    for (const record of records) {
      if (!assoc.records.some(r => sameRecord(r, record))) {
        assoc.records.push(record);
      }
    }
  }

  /** Whether every record of the stored command list is already registered for `expr`. */
  exists(expr: string, commandList: string): boolean {
    const wanted = parseCommandList(commandList);
    const assoc = this.assocs.find(a => a.matchers.expr === expr);
    if (!assoc || wanted.length === 0) return false;
    return wanted.every(w => assoc.records.some(r => sameRecord(r, w)));
  }

  clear(): void {
    this.assocs = [];
  }
}

export class AssocRegistry {
  readonly filetypes = new AssocList();
  readonly xfiletypes = new AssocList();
  readonly viewers = new AssocList();

  list(kind: AssocKind): AssocList {
    switch (kind) {
      case 'filetype':
        return this.filetypes;
      case 'xfiletype':
        return this.xfiletypes;
      case 'viewer':
        return this.viewers;
    }
  }

  /** Register programs; X programs go to their own list. */
  setPrograms(matchers: Matchers, commandList: string, forX: boolean): void {
    (forX ? this.xfiletypes : this.filetypes).add(matchers, parseCommandList(commandList));
  }

  setViewers(matchers: Matchers, commandList: string): void {
    this.viewers.add(matchers, parseCommandList(commandList));
  }

  /** Register a synthesized builtin handler. */
  addBuiltin(matchers: Matchers, description: string, command: string): void {
    this.filetypes.add(matchers, [{ command, description, type: 'builtin' }]);
  }
}
