/**
 * Loads the effective configuration: file over defaults, environment over file.
 *
 * @packageDocumentation
 */

import { safeExists, safeReadTextFile } from '../utils/safe-fs.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * File looked up in the working directory when no path is given.
 */
export const DEFAULT_CONFIG_FILE = 'interview.toml';

/**
 * Options for loading configuration.
 */
export interface LoadConfigOptions {
  /** Explicit config file. Must exist when given. */
  readonly path?: string | undefined;
  /** Environment to read overrides from. */
  readonly env?: EnvRecord | undefined;
}

/**
 * Loads, merges and validates configuration.
 *
 * Without an explicit path, `interview.toml` in the working directory is used
 * when present; otherwise defaults apply.
 *
 * @throws ConfigParseError if an explicit file is missing or the TOML is invalid.
 * @throws EnvCoercionError if an environment override cannot be coerced.
 * @throws ConfigValidationError if the merged configuration is invalid.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  let base: Config;

  if (options.path !== undefined) {
    if (!(await safeExists(options.path))) {
      throw new ConfigParseError(`Config file not found: ${options.path}`);
    }
    base = parseConfig(await safeReadTextFile(options.path));
  } else if (await safeExists(DEFAULT_CONFIG_FILE)) {
    base = parseConfig(await safeReadTextFile(DEFAULT_CONFIG_FILE));
  } else {
    base = getDefaultConfig();
  }

  const config = applyEnvOverrides(base, options.env ?? process.env);
  assertConfigValid(config);
  return config;
}
