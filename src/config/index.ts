import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';
import { isPlainObject } from '../storage/filter-matcher.js';

export type { Config } from './schema.js';

const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'config.json');

/**
 * Environment variables that override storage settings from the file.
 * Connection strings usually live in the environment, not in config.json.
 */
const STORAGE_ENV_OVERRIDES: ReadonlyArray<readonly [variable: string, path: readonly string[]]> = [
  ['STORAGE_BACKEND', ['backend']],
  ['STORAGE_DATA_DIR', ['file', 'dataDir']],
  ['MONGODB_URL', ['mongo', 'url']],
  ['DATABASE_NAME', ['mongo', 'database']],
];

function childSection(parent: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = parent[key];
  if (isPlainObject(existing)) {
    return existing;
  }
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

/**
 * Copy non-empty override variables into the raw `storage` section before
 * validation, so overridden values are checked like file values.
 */
export function applyEnvOverrides(rawConfig: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (!isPlainObject(rawConfig)) {
    return rawConfig;
  }

  for (const [variable, path] of STORAGE_ENV_OVERRIDES) {
    const value = env[variable];
    if (value === undefined || value === '') continue;

    let section = childSection(rawConfig, 'storage');
    for (const key of path.slice(0, -1)) {
      section = childSection(section, key);
    }
    section[path[path.length - 1]] = value;
  }

  return rawConfig;
}

export function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Config {
  // Check file exists
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  // Read and parse JSON
  let rawConfig: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    rawConfig = JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  // Validate with Zod (fills defaults)
  const result = ConfigSchema.safeParse(applyEnvOverrides(rawConfig, env));

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}
