/**
 * Named registers holding lists of paths for yank/put.
 */

/** Register names in storage order. */
export const VALID_REGISTERS = '"abcdefghijklmnopqrstuvwxyz';

export function isValidRegister(name: string): boolean {
  return name.length === 1 && VALID_REGISTERS.includes(name);
}

export class RegisterStore {
  private regs: Map<string, string[]> = new Map();

  /** Append a path; duplicates and unknown register names are ignored. */
  append(name: string, path: string): boolean {
    if (!isValidRegister(name) || path === '') return false;
    let files = this.regs.get(name);
    if (!files) {
      files = [];
      this.regs.set(name, files);
    }
    if (files.includes(path)) return false;
    files.push(path);
    return true;
  }

  files(name: string): readonly string[] {
    return this.regs.get(name) ?? [];
  }

  clear(name: string): void {
    this.regs.delete(name);
  }

  /** Non-empty registers in storage order. */
  list(): Array<{ name: string; files: string[] }> {
    const out: Array<{ name: string; files: string[] }> = [];
    for (const name of VALID_REGISTERS) {
      const files = this.regs.get(name);
      if (files && files.length > 0) out.push({ name, files: [...files] });
    }
    return out;
  }
}
