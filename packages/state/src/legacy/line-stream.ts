/**
 * Cursor over the text of a legacy state file.
 */

export class LineStream {
  private readonly text: string;
  private offset = 0;

  constructor(text: string) {
    this.text = text;
  }

  get atEnd(): boolean {
    return this.offset >= this.text.length;
  }

  /**
   * Next line without its line terminator and leading whitespace, or
   * null at end of input.
   */
  nextLine(): string | null {
    if (this.atEnd) return null;
    let end = this.text.indexOf('\n', this.offset);
    if (end === -1) end = this.text.length;
    const line = this.text.slice(this.offset, end).replace(/\r$/, '');
    this.offset = end + 1;
    return line.replace(/^\s+/, '');
  }

  /**
   * Read an integer that starts right at the cursor, then skip any
   * whitespace (line breaks included) after it. Returns -1 and consumes
   * nothing unless the next character is a digit or sign followed by a
   * complete integer.
   */
  readOptionalNumber(): number {
    const rest = this.text.slice(this.offset);
    const match = /^[+-]?\d+/.exec(rest);
    if (!match) return -1;
    const trailing = /^\s*/.exec(rest.slice(match[0].length));
    this.offset += match[0].length + (trailing ? trailing[0].length : 0);
    return Number.parseInt(match[0], 10);
  }
}

/** Leading integer of `text` after optional whitespace, or 0. */
export function leadingInt(text: string): number {
  const match = /^\s*([+-]?\d+)/.exec(text);
  return match ? Number.parseInt(match[1], 10) : 0;
}

/** The whole of `text` as an integer, or undefined. */
export function wholeInt(text: string): number | undefined {
  return /^\s*[+-]?\d+$/.test(text) ? Number.parseInt(text, 10) : undefined;
}
