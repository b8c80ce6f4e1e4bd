/**
 * StatePersistence: reading the state file on startup and writing it
 * back without losing what sibling instances stored meanwhile.
 *
 * There is no locking. A save copies the state file aside, serializes
 * the session, folds in the copy when the file changed since this
 * instance last touched it, and renames the result over the original.
 */

import {
  copyFileSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { parseDocument, stringifyDocument } from '../document/codec.js';
import { deepCopy } from '../document/value.js';
import type { DocObject } from '../document/value.js';
import { readLegacyState } from '../legacy/reader.js';
import { describeError, errorCode, logError } from '../log.js';
import type { Session } from '../session/session.js';
import { parseCategories } from './categories.js';
import type { CategorySet, PersistCategory } from './categories.js';
import { FileMonitor } from './fingerprint.js';
import { loadState } from './loader.js';
import { mergeStates } from './merge.js';
import { serializeState } from './serializer.js';

export const STATE_FILE_NAME = 'twinpaneinfo.json';
export const LEGACY_STATE_FILE_NAME = 'twinpaneinfo';

export interface StatePersistenceOptions {
  /** Directory holding the state files. */
  stateDir: string;
  /** Trash directory, for migrating relative legacy trash paths. */
  trashDir?: string;
  /** Suffix of the temporary file. Default `process.pid`. */
  pid?: number;
  /** Seconds since the epoch, for legacy marks without a timestamp. */
  now?: () => number;
  /** Directory probe used when merging directory history. */
  isDirectory?: (path: string) => boolean;
}

export class StatePersistence {
  readonly statePath: string;
  readonly legacyPath: string;
  private session: Session;
  private stateDir: string;
  private tmpPath: string;
  private trashDir: string | undefined;
  private now: (() => number) | undefined;
  private isDirectory: ((path: string) => boolean) | undefined;
  private monitor = new FileMonitor();

  constructor(session: Session, options: StatePersistenceOptions) {
    this.session = session;
    this.stateDir = options.stateDir;
    this.statePath = join(options.stateDir, STATE_FILE_NAME);
    this.legacyPath = join(options.stateDir, LEGACY_STATE_FILE_NAME);
    this.tmpPath = `${this.statePath}_${options.pid ?? process.pid}`;
    this.trashDir = options.trashDir;
    this.now = options.now;
    this.isDirectory = options.isDirectory;
  }

  /**
   * Load stored state into the session, preferring the JSON file over
   * the legacy one. Returns true if state was applied.
   */
  read(reread = false): boolean {
    const state = this.readDocument(this.statePath)
      ?? readLegacyState(this.legacyPath, { trashDir: this.trashDir, now: this.now });
    if (!state) return false;

    loadState(state, this.session, { reread });
    this.monitor.record(this.statePath);
    this.session.dirStack.freeze();
    return true;
  }

  /** Store the session. Returns false if the state file was not replaced. */
  write(): boolean {
    try {
      mkdirSync(this.stateDir, { recursive: true });
    } catch (err) {
      logError(`can't create ${this.stateDir}: ${describeError(err)}`);
      return false;
    }

    const copied = this.copyAside();
    const merge = copied && this.monitor.changed(this.statePath);

    const categories = this.categories();
    let current = serializeState(this.session, categories);
    if (merge) {
      const admixture = this.readDocument(this.tmpPath);
      if (admixture) {
        current = this.merged(current, admixture, categories);
      }
    }

    try {
      writeFileSync(this.tmpPath, stringifyDocument(current));
    } catch (err) {
      logError(`error storing state to ${this.tmpPath}: ${describeError(err)}`);
      this.removeTmp();
      return false;
    }
    this.monitor.record(this.tmpPath);

    try {
      renameSync(this.tmpPath, this.statePath);
    } catch (err) {
      logError(`can't replace ${this.statePath} with its temporary copy: ${describeError(err)}`);
      this.removeTmp();
      return false;
    }
    return true;
  }

  private categories(): Set<PersistCategory> {
    const { categories, unknown } = parseCategories(this.session.persist);
    if (unknown.length > 0) {
      logError(`ignoring unknown persist categories: ${unknown.join(',')}`);
    }
    return categories;
  }

  /** `current` with `admixture` folded in, or `current` untouched when merging fails. */
  private merged(current: DocObject, admixture: DocObject, categories: CategorySet): DocObject {
    const target = deepCopy(current);
    try {
      mergeStates(target, admixture, {
        session: this.session,
        categories,
        isDirectory: this.isDirectory,
      });
      return target;
    } catch (err) {
      logError(`can't merge ${this.statePath}, storing own state only: ${describeError(err)}`);
      return current;
    }
  }

  /** Copy the state file to the temporary path. False when there is nothing to merge from. */
  private copyAside(): boolean {
    try {
      copyFileSync(this.statePath, this.tmpPath);
      return true;
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        logError(`can't copy ${this.statePath}: ${describeError(err)}`);
      }
      return false;
    }
  }

  private readDocument(path: string): DocObject | null {
    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        logError(`can't read ${path}: ${describeError(err)}`);
      }
      return null;
    }
    const doc = parseDocument(text);
    if (!doc) {
      logError(`${path} is not a valid state document`);
    }
    return doc;
  }

  private removeTmp(): void {
    try {
      rmSync(this.tmpPath, { force: true });
    } catch (err) {
      logError(`can't remove ${this.tmpPath}: ${describeError(err)}`);
    }
  }
}
