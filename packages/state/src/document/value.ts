/**
 * Dynamically-typed document tree used as the on-disk representation of
 * session state.
 *
 * Scalars are tagged values; arrays and objects are classes so that
 * sections can be built up in place. Object keys keep insertion order,
 * and re-setting an existing key keeps its position.
 *
 * Every `get*` accessor returns `undefined` both when the key is absent
 * and when the stored value has another type. Loading code relies on
 * this to leave live state untouched on malformed input.
 */

export interface DocNull {
  readonly kind: 'null';
}

export interface DocBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface DocNumber {
  readonly kind: 'number';
  readonly value: number;
}

export interface DocString {
  readonly kind: 'string';
  readonly value: string;
}

export type DocValue = DocNull | DocBool | DocNumber | DocString | DocArray | DocObject;

export const DOC_NULL: DocNull = { kind: 'null' };

export function docBool(value: boolean): DocBool {
  return { kind: 'bool', value };
}

export function docNumber(value: number): DocNumber {
  return { kind: 'number', value };
}

export function docString(value: string): DocString {
  return { kind: 'string', value };
}

function asString(value: DocValue | undefined): string | undefined {
  return value?.kind === 'string' ? value.value : undefined;
}

function asNumber(value: DocValue | undefined): number | undefined {
  return value?.kind === 'number' ? value.value : undefined;
}

function asBool(value: DocValue | undefined): boolean | undefined {
  return value?.kind === 'bool' ? value.value : undefined;
}

/** Truncates towards zero the way a C cast of a JSON number does. */
function asInt(value: DocValue | undefined): number | undefined {
  const n = asNumber(value);
  return n === undefined || !Number.isFinite(n) ? undefined : Math.trunc(n);
}

export class DocArray {
  readonly kind = 'array';
  private items: DocValue[] = [];

  constructor(items?: Iterable<DocValue>) {
    if (items) {
      this.items = [...items];
    }
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): DocValue | undefined {
    return this.items[index];
  }

  values(): DocValue[] {
    return [...this.items];
  }

  push(value: DocValue): void {
    this.items.push(value);
  }

  appendString(value: string): void {
    this.items.push(docString(value));
  }

  /** Appends a fresh object and returns it for filling in. */
  appendObject(): DocObject {
    const obj = new DocObject();
    this.items.push(obj);
    return obj;
  }

  getString(index: number): string | undefined {
    return asString(this.items[index]);
  }

  getObject(index: number): DocObject | undefined {
    const value = this.items[index];
    return value instanceof DocObject ? value : undefined;
  }

  /** String elements only, in order; other element types are dropped. */
  strings(): string[] {
    const out: string[] = [];
    for (const item of this.items) {
      if (item.kind === 'string') out.push(item.value);
    }
    return out;
  }

  /** Object elements only, in order. */
  objects(): DocObject[] {
    const out: DocObject[] = [];
    for (const item of this.items) {
      if (item instanceof DocObject) out.push(item);
    }
    return out;
  }
}

export class DocObject {
  readonly kind = 'object';
  private fields: Map<string, DocValue> = new Map();

  get size(): number {
    return this.fields.size;
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  get(key: string): DocValue | undefined {
    return this.fields.get(key);
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  entries(): Array<[string, DocValue]> {
    return [...this.fields.entries()];
  }

  set(key: string, value: DocValue): void {
    this.fields.set(key, value);
  }

  delete(key: string): void {
    this.fields.delete(key);
  }

  setString(key: string, value: string): void {
    this.fields.set(key, docString(value));
  }

  setNumber(key: string, value: number): void {
    this.fields.set(key, docNumber(value));
  }

  setBool(key: string, value: boolean): void {
    this.fields.set(key, docBool(value));
  }

  /** Creates (or replaces) `key` with an empty array and returns it. */
  addArray(key: string): DocArray {
    const arr = new DocArray();
    this.fields.set(key, arr);
    return arr;
  }

  /** Creates (or replaces) `key` with an empty object and returns it. */
  addObject(key: string): DocObject {
    const obj = new DocObject();
    this.fields.set(key, obj);
    return obj;
  }

  getString(key: string): string | undefined {
    return asString(this.fields.get(key));
  }

  getNumber(key: string): number | undefined {
    return asNumber(this.fields.get(key));
  }

  getInt(key: string): number | undefined {
    return asInt(this.fields.get(key));
  }

  getBool(key: string): boolean | undefined {
    return asBool(this.fields.get(key));
  }

  getArray(key: string): DocArray | undefined {
    const value = this.fields.get(key);
    return value instanceof DocArray ? value : undefined;
  }

  getObject(key: string): DocObject | undefined {
    const value = this.fields.get(key);
    return value instanceof DocObject ? value : undefined;
  }
}

/** Deep copy of a value; scalars are immutable and shared. */
export function deepCopy<T extends DocValue>(value: T): T;
export function deepCopy(value: DocValue): DocValue {
  if (value instanceof DocArray) {
    return new DocArray(value.values().map(v => deepCopy(v)));
  }
  if (value instanceof DocObject) {
    const copy = new DocObject();
    for (const [key, v] of value.entries()) {
      copy.set(key, deepCopy(v));
    }
    return copy;
  }
  return value;
}
