/**
 * Wiring of a configured session and its persistence.
 */

import type { StateConfig } from './config.js';
import { StatePersistence } from './persistence/manager.js';
import { Session } from './session/session.js';

export interface StateStore {
  session: Session;
  persistence: StatePersistence;
}

export interface StateStoreOptions {
  /** Directory both panes start in. */
  startDir?: string;
  pid?: number;
  now?: () => number;
  isDirectory?: (path: string) => boolean;
}

export function createStateStore(config: StateConfig, options?: StateStoreOptions): StateStore {
  const session = new Session({
    historyLength: config.historyLength,
    persist: config.persist,
    startDir: options?.startDir,
  });
  const persistence = new StatePersistence(session, {
    stateDir: config.stateDir,
    trashDir: config.trashDir,
    pid: options?.pid,
    now: options?.now,
    isDirectory: options?.isDirectory,
  });
  return { session, persistence };
}
