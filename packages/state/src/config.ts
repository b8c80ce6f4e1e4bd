/**
 * Configuration of the state store.
 *
 * Three sources with precedence: CLI args > env vars > JSON config > defaults.
 */

import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { describeError } from './log.js';
import { formatCategories, parseCategories } from './persistence/categories.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface StateConfig {
  stateDir: string;
  trashDir: string;
  /** Comma-separated persistence categories, validated. */
  persist: string;
  historyLength: number;
}

const jsonConfigSchema = z.object({
  stateDir: z.string().min(1).optional(),
  trashDir: z.string().min(1).optional(),
  persist: z.union([z.array(z.string()), z.string()]).optional(),
  historyLength: z.number().int().nonnegative().optional(),
}).strict();

type JsonConfig = z.infer<typeof jsonConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export interface StateDefaults {
  stateDir: string;
  trashDir: string;
  persist: string;
  historyLength: number;
}

export function defaultStateDefaults(home: string = homedir()): StateDefaults {
  const stateDir = join(home, '.config', 'twinpane');
  return {
    stateDir,
    trashDir: join(stateDir, 'Trash'),
    persist: 'bookmarks',
    historyLength: 15,
  };
}

// ---------------------------------------------------------------------------
// Value parsing
// ---------------------------------------------------------------------------

/** Validate a category list and return it in canonical order. */
export function parsePersist(text: string): string {
  const { categories, unknown } = parseCategories(text);
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown persist categories: ${unknown.join(', ')}`);
  }
  return formatCategories(categories);
}

export function parseHistoryLength(text: string): number {
  if (!/^\d+$/.test(text.trim())) {
    throw new ConfigError(`Invalid history length: "${text}" (expected a non-negative integer)`);
  }
  return Number.parseInt(text, 10);
}

// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

interface LayerResult {
  stateDir?: string;
  trashDir?: string;
  persist?: string;
  historyLength?: number;
  configPath?: string;
}

export function parseCli(argv: string[]): LayerResult {
  const result: LayerResult = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case '--state-dir':
        if (!next) throw new ConfigError('--state-dir requires a value');
        result.stateDir = next;
        i++;
        break;
      case '--trash-dir':
        if (!next) throw new ConfigError('--trash-dir requires a value');
        result.trashDir = next;
        i++;
        break;
      case '--persist':
        if (next === undefined) throw new ConfigError('--persist requires a value');
        result.persist = parsePersist(next);
        i++;
        break;
      case '--history':
        if (!next) throw new ConfigError('--history requires a value');
        result.historyLength = parseHistoryLength(next);
        i++;
        break;
      case '--config':
        if (!next) throw new ConfigError('--config requires a value');
        result.configPath = next;
        i++;
        break;
      default:
        // Ignore unknown args
        break;
    }
  }

  return result;
}

// ---------------------------------------------------------------------------
// Env var parsing
// ---------------------------------------------------------------------------

export function parseEnv(env: Record<string, string | undefined>): LayerResult {
  const result: LayerResult = {};

  if (env.TWINPANE_STATE_DIR) result.stateDir = env.TWINPANE_STATE_DIR;
  if (env.TWINPANE_TRASH_DIR) result.trashDir = env.TWINPANE_TRASH_DIR;
  if (env.TWINPANE_PERSIST !== undefined) result.persist = parsePersist(env.TWINPANE_PERSIST);
  if (env.TWINPANE_HISTORY) result.historyLength = parseHistoryLength(env.TWINPANE_HISTORY);
  if (env.TWINPANE_CONFIG) result.configPath = env.TWINPANE_CONFIG;

  return result;
}

// ---------------------------------------------------------------------------
// JSON config loading
// ---------------------------------------------------------------------------

export function loadJsonConfig(filePath: string): JsonConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolve(filePath), 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Can't read config ${filePath}: ${describeError(err)}`);
  }
  const parsed = jsonConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config ${filePath}: ${issues}`);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Main: loadConfig
// ---------------------------------------------------------------------------

export function loadConfig(
  argv: string[],
  defaults: StateDefaults,
  env: Record<string, string | undefined> = process.env,
): StateConfig {
  const cli = parseCli(argv);
  const envLayer = parseEnv(env);

  // Determine config file path: CLI > env
  const configPath = cli.configPath ?? envLayer.configPath;
  let json: JsonConfig = {};
  if (configPath) {
    json = loadJsonConfig(configPath);
  }

  const jsonPersist = json.persist === undefined
    ? undefined
    : parsePersist(Array.isArray(json.persist) ? json.persist.join(',') : json.persist);

  // --- Scalars: CLI > env > JSON > defaults ---
  const stateDir = cli.stateDir ?? envLayer.stateDir ?? json.stateDir ?? defaults.stateDir;
  const trashDir = cli.trashDir ?? envLayer.trashDir ?? json.trashDir ?? defaults.trashDir;
  const persist = cli.persist ?? envLayer.persist ?? jsonPersist ?? defaults.persist;
  const historyLength = cli.historyLength ?? envLayer.historyLength ?? json.historyLength
    ?? defaults.historyLength;

  return { stateDir, trashDir, persist, historyLength };
}
