/**
 * JSON text <-> document tree conversion.
 */

import {
  DOC_NULL,
  DocArray,
  DocObject,
  docBool,
  docNumber,
  docString,
} from './value.js';
import type { DocValue } from './value.js';

/** Convert a parsed JSON value into a document value. */
export function fromJson(json: unknown): DocValue {
  if (json === null || json === undefined) return DOC_NULL;
  if (typeof json === 'boolean') return docBool(json);
  if (typeof json === 'number') return docNumber(json);
  if (typeof json === 'string') return docString(json);
  if (Array.isArray(json)) {
    return new DocArray(json.map(item => fromJson(item)));
  }
  if (typeof json === 'object') {
    const obj = new DocObject();
    for (const [key, value] of Object.entries(json)) {
      obj.set(key, fromJson(value));
    }
    return obj;
  }
  return DOC_NULL;
}

/** Convert a document value into plain JSON data. */
export function toJson(value: DocValue): unknown {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'string':
      return value.value;
    case 'array':
      return value.values().map(item => toJson(item));
    case 'object': {
      const out: Record<string, unknown> = {};
      for (const [key, item] of value.entries()) {
        Object.defineProperty(out, key, {
          value: toJson(item),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}

/** Pretty-prints with two-space indentation, keeping object key order. */
function write(value: DocValue, indent: string): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'number':
      return Number.isFinite(value.value) ? String(value.value) : 'null';
    case 'string':
      return JSON.stringify(value.value);
    case 'array': {
      if (value.length === 0) return '[]';
      const inner = indent + '  ';
      const items = value.values().map(item => inner + write(item, inner));
      return `[\n${items.join(',\n')}\n${indent}]`;
    }
    case 'object': {
      if (value.size === 0) return '{}';
      const inner = indent + '  ';
      const fields = value.entries()
        .map(([key, item]) => `${inner}${JSON.stringify(key)}: ${write(item, inner)}`);
      return `{\n${fields.join(',\n')}\n${indent}}`;
    }
  }
}

const NUMBER_RE = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const LITERALS: ReadonlyArray<[string, DocValue]> = [
  ['true', docBool(true)],
  ['false', docBool(false)],
  ['null', DOC_NULL],
];

/**
 * Builds a document from JSON text that JSON.parse has already accepted,
 * keeping object keys in text order. Plain objects would move
 * integer-like keys (mark names, numeric paths) to the front.
 */
class OrderedReader {
  private text: string;
  private pos = 0;

  constructor(text: string) {
    this.text = text;
  }

  read(): DocValue {
    this.skipSpace();
    const ch = this.text[this.pos];
    if (ch === '{') return this.object();
    if (ch === '[') return this.array();
    if (ch === '"') return docString(this.string());
    for (const [word, value] of LITERALS) {
      if (this.text.startsWith(word, this.pos)) {
        this.pos += word.length;
        return value;
      }
    }
    NUMBER_RE.lastIndex = this.pos;
    const match = NUMBER_RE.exec(this.text);
    if (!match) {
      throw new SyntaxError(`unexpected character at ${this.pos}`);
    }
    this.pos += match[0].length;
    return docNumber(Number(match[0]));
  }

  private object(): DocObject {
    const obj = new DocObject();
    this.pos++;
    this.skipSpace();
    if (this.text[this.pos] === '}') {
      this.pos++;
      return obj;
    }
    for (;;) {
      this.skipSpace();
      const key = this.string();
      this.skipSpace();
      this.expect(':');
      obj.set(key, this.read());
      this.skipSpace();
      if (this.text[this.pos] === ',') {
        this.pos++;
        continue;
      }
      this.expect('}');
      return obj;
    }
  }

  private array(): DocArray {
    const items: DocValue[] = [];
    this.pos++;
    this.skipSpace();
    if (this.text[this.pos] === ']') {
      this.pos++;
      return new DocArray(items);
    }
    for (;;) {
      items.push(this.read());
      this.skipSpace();
      if (this.text[this.pos] === ',') {
        this.pos++;
        continue;
      }
      this.expect(']');
      return new DocArray(items);
    }
  }

  /** A string token, decoded by JSON.parse for its escapes. */
  private string(): string {
    this.expect('"');
    const start = this.pos - 1;
    while (this.pos < this.text.length && this.text[this.pos] !== '"') {
      this.pos += this.text[this.pos] === '\\' ? 2 : 1;
    }
    this.expect('"');
    const decoded: unknown = JSON.parse(this.text.slice(start, this.pos));
    if (typeof decoded !== 'string') {
      throw new SyntaxError(`bad string at ${start}`);
    }
    return decoded;
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) {
      throw new SyntaxError(`expected ${ch} at ${this.pos}`);
    }
    this.pos++;
  }

  private skipSpace(): void {
    while (this.pos < this.text.length && ' \t\n\r'.includes(this.text[this.pos])) {
      this.pos++;
    }
  }
}

/**
 * Parse document text. Returns null when the text is not valid JSON or
 * its root is not an object. Object keys keep their order in the text.
 */
export function parseDocument(text: string): DocObject | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    return null;
  }
  const value = new OrderedReader(text).read();
  return value instanceof DocObject ? value : null;
}

export function stringifyDocument(doc: DocObject): string {
  return write(doc, '') + '\n';
}
