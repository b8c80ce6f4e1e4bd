/**
 * Diagnostics for the state store.
 *
 * Everything goes to stderr via console.warn with a component prefix;
 * nothing here is fatal.
 */

const PREFIX = '[twinpane]';

export function logError(msg: string): void {
  console.warn(`${PREFIX} ${msg}`);
}

/** Format an unknown thrown value for a log line. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The `code` of a Node.js system error, if any. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
