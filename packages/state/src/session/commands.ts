/**
 * User-defined `:command` registry.
 */

export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

const NAME_RE = /^[A-Za-z][A-Za-z0-9]*$/;

export class CommandRegistry {
  private commands: Map<string, string> = new Map();

  /**
   * Define a command. An existing definition is kept unless `overwrite`
   * is set, matching `:command` versus `:command!`.
   */
  define(name: string, body: string, overwrite = false): void {
    if (!NAME_RE.test(name)) {
      throw new CommandError(`invalid command name: ${name}`);
    }
    if (body.trim() === '') {
      throw new CommandError(`empty body for command: ${name}`);
    }
    if (this.commands.has(name) && !overwrite) {
      throw new CommandError(`command already exists: ${name}`);
    }
    this.commands.set(name, body);
  }

  get(name: string): string | undefined {
    return this.commands.get(name);
  }

  remove(name: string): boolean {
    return this.commands.delete(name);
  }

  /** Name/body pairs in definition order. */
  list(): Array<[string, string]> {
    return [...this.commands.entries()];
  }
}
