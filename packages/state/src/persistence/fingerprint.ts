/**
 * File change detection by stat fingerprint.
 */

import { statSync } from 'node:fs';
import { describeError, logError } from '../log.js';

export interface Fingerprint {
  mtimeNs: bigint;
  size: bigint;
  ino: bigint;
}

/** Fingerprint of `path`, or null when it cannot be stat'ed. */
export function takeFingerprint(path: string): Fingerprint | null {
  try {
    const st = statSync(path, { bigint: true, throwIfNoEntry: false });
    if (!st) return null;
    return { mtimeNs: st.mtimeNs, size: st.size, ino: st.ino };
  } catch (err) {
    logError(`can't stat ${path}: ${describeError(err)}`);
    return null;
  }
}

export function sameFingerprint(a: Fingerprint, b: Fingerprint): boolean {
  return a.mtimeNs === b.mtimeNs && a.size === b.size && a.ino === b.ino;
}

/** Remembers one fingerprint and reports whether a file still matches it. */
export class FileMonitor {
  private baseline: Fingerprint | null = null;

  /** Take `path` as the new baseline; a missing file clears it. */
  record(path: string): void {
    this.baseline = takeFingerprint(path);
  }

  /** True unless `path` exists and matches the baseline exactly. */
  changed(path: string): boolean {
    const current = takeFingerprint(path);
    if (current === null || this.baseline === null) return true;
    return !sameFingerprint(this.baseline, current);
  }

  get recorded(): Fingerprint | null {
    return this.baseline;
  }
}
