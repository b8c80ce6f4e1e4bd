/**
 * File name matchers used by associations and pane filters.
 *
 * An association expression is a sequence of parts:
 *   {*.jpg,*.png}   glob list
 *   <image/*>       mime-type glob list
 *   /\.txt$/i       regular expression (flag `i` or `I`)
 *   *.jpg,*.png     bare glob list (only as the whole expression)
 */

import { describeError } from '../log.js';

export class MatcherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MatcherError';
  }
}

export type MatcherPart =
  | { kind: 'glob'; patterns: RegExp[] }
  | { kind: 'mime'; patterns: string[] }
  | { kind: 'regex'; regex: RegExp };

/** Translate a shell glob into an anchored regular expression. */
function globToRegex(glob: string): RegExp {
  let src = '';
  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];
    if (ch === '*') src += '[^/]*';
    else if (ch === '?') src += '[^/]';
    else if (ch === '[') {
      const end = glob.indexOf(']', i + 1);
      if (end === -1) {
        throw new MatcherError(`unclosed bracket in glob: ${glob}`);
      }
      const body = glob.slice(i + 1, end).replace(/^!/, '^').replace(/\\/g, '\\\\');
      src += `[${body}]`;
      i = end;
    } else {
      src += ch.replace(/[.+^${}()|\\/]/g, '\\$&');
    }
  }
  return new RegExp(`^${src}$`);
}

/** Split on single commas; `,,` stands for a literal comma. */
export function splitList(text: string): string[] {
  const items: string[] = [];
  let current = '';
  for (let i = 0; i < text.length; i++) {
    if (text[i] === ',') {
      if (text[i + 1] === ',') {
        current += ',';
        i++;
        continue;
      }
      items.push(current);
      current = '';
      continue;
    }
    current += text[i];
  }
  items.push(current);
  return items;
}

function globList(body: string, expr: string): MatcherPart {
  const globs = splitList(body).filter(g => g !== '');
  if (globs.length === 0) {
    throw new MatcherError(`empty pattern list in: ${expr}`);
  }
  return { kind: 'glob', patterns: globs.map(globToRegex) };
}

function compileRegex(source: string, flags: string, expr: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    throw new MatcherError(`bad regular expression in ${expr}: ${describeError(err)}`);
  }
}

export class Matchers {
  readonly expr: string;
  readonly parts: MatcherPart[];

  private constructor(expr: string, parts: MatcherPart[]) {
    this.expr = expr;
    this.parts = parts;
  }

  /** Parse an association expression. Throws MatcherError when invalid. */
  static parse(expr: string): Matchers {
    if (expr === '') {
      throw new MatcherError('empty matcher expression');
    }

    const parts: MatcherPart[] = [];
    let i = 0;
    while (i < expr.length) {
      const open = expr[i];
      if (open === '{' || open === '<') {
        const close = open === '{' ? '}' : '>';
        const end = expr.indexOf(close, i + 1);
        if (end === -1) {
          throw new MatcherError(`unclosed ${open} in: ${expr}`);
        }
        const body = expr.slice(i + 1, end);
        if (open === '{') {
          parts.push(globList(body, expr));
        } else {
          const mimes = splitList(body).filter(m => m !== '');
          if (mimes.length === 0) {
            throw new MatcherError(`empty mime list in: ${expr}`);
          }
          parts.push({ kind: 'mime', patterns: mimes });
        }
        i = end + 1;
      } else if (open === '/') {
        let end = i + 1;
        while (end < expr.length && expr[end] !== '/') {
          end += expr[end] === '\\' ? 2 : 1;
        }
        if (end >= expr.length) {
          throw new MatcherError(`unclosed regular expression in: ${expr}`);
        }
        let flagsEnd = end + 1;
        while (flagsEnd < expr.length && /[iI]/.test(expr[flagsEnd])) flagsEnd++;
        const caseless = expr.slice(end + 1, flagsEnd).endsWith('i');
        parts.push({ kind: 'regex', regex: compileRegex(expr.slice(i + 1, end), caseless ? 'i' : '', expr) });
        i = flagsEnd;
      } else if (parts.length === 0) {
        parts.push(globList(expr, expr));
        i = expr.length;
      } else {
        throw new MatcherError(`unexpected character at ${i} in: ${expr}`);
      }
    }
    return new Matchers(expr, parts);
  }

  /** Name-based match; mime parts never match without a mime type. */
  matches(name: string, mime?: string): boolean {
    return this.parts.every(part => {
      switch (part.kind) {
        case 'glob':
          return part.patterns.some(re => re.test(name));
        case 'regex':
          return part.regex.test(name);
        case 'mime':
          return mime !== undefined
            && part.patterns.some(p => globToRegex(p).test(mime));
      }
    });
  }
}

/**
 * A pane name filter: a regular expression, or the empty string which
 * filters nothing.
 */
export class NameFilter {
  readonly expr: string;
  private regex: RegExp | null;

  private constructor(expr: string, regex: RegExp | null) {
    this.expr = expr;
    this.regex = regex;
  }

  static empty(): NameFilter {
    return new NameFilter('', null);
  }

  /** Throws MatcherError when `expr` does not compile. */
  static compile(expr: string): NameFilter {
    if (expr === '') return NameFilter.empty();
    return new NameFilter(expr, compileRegex(expr, '', `filter ${expr}`));
  }

  isEmpty(): boolean {
    return this.regex === null;
  }

  /** Whether `name` is filtered out. */
  rejects(name: string): boolean {
    return this.regex !== null && this.regex.test(name);
  }
}
