/**
 * @wanwatch/core - Configuration loader
 *
 * Loads wanwatch.json, merges it over the defaults, applies the
 * WANWATCH_LOG_LEVEL override and validates. A missing file means "run with
 * defaults"; an unreadable or invalid one is a ConfigError.
 */

import { readFile } from 'node:fs/promises';
import { DEFAULT_CONFIG, type WanwatchConfig } from './schema.js';
import { validateConfig, type ValidationIssue } from './validator.js';
import { resolveConfigPath } from './paths.js';
import { ConfigError } from '../errors.js';
import { parseSeverity } from '../logging/index.js';
import { deepMerge, isPlainObject } from '../utils/index.js';

export interface LoadConfigOptions {
  /** Explicit file path. Defaults to resolveConfigPath(env). */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: WanwatchConfig;
  warnings: ValidationIssue[];
  /** Path of the file that was read, or null when defaults were used. */
  source: string | null;
}

async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigError(
      `Failed to read ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Load the wanwatch configuration.
 *
 * 1. Read the config file (defaults if missing)
 * 2. Deep-merge with DEFAULT_CONFIG
 * 3. Apply WANWATCH_LOG_LEVEL
 * 4. Validate; throw ConfigError on any error
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const path = options.path ?? resolveConfigPath(env);

  const rawJson = await readJsonFile(path);

  let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG);
  if (rawJson !== undefined) {
    if (!isPlainObject(rawJson)) {
      throw new ConfigError(`${path} must contain a JSON object`);
    }
    merged = deepMerge(merged, rawJson);
  }

  const levelOverride = env['WANWATCH_LOG_LEVEL'];
  if (levelOverride) {
    merged['logLevel'] = parseSeverity(levelOverride);
  } else if (typeof merged['logLevel'] === 'string') {
    merged['logLevel'] = parseSeverity(merged['logLevel']);
  }

  const validation = validateConfig(merged);
  if (!validation.valid) {
    throw new ConfigError(
      `Invalid configuration${rawJson === undefined ? '' : ` in ${path}`}`,
      validation.errors.map((e) => `${e.path || '/'}: ${e.message}`),
    );
  }

  return {
    config: validation.config,
    warnings: validation.warnings,
    source: rawJson === undefined ? null : path,
  };
}
