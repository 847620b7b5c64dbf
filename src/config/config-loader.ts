import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { DEFAULT_CONFIG_PATH, defaults, type ResolvedConfig } from './config-defaults.js';
import { validateConfig } from './config-schema.js';

/**
 * Load configuration from a YAML file and fill in defaults
 *
 * Without an explicit path the default file is optional: if it does not
 * exist the defaults are used. An explicitly named file must exist.
 *
 * @param configPath - Path given on the command line, if any
 * @throws ConfigError if the file is missing, unparsable or invalid
 */
export async function loadConfig(configPath?: string): Promise<ResolvedConfig> {
  const absolutePath = resolve(configPath ?? DEFAULT_CONFIG_PATH);

  if (!existsSync(absolutePath)) {
    if (configPath === undefined) {
      return { ...defaults };
    }
    throw new ConfigError(`Configuration file not found: "${absolutePath}"`);
  }

  let rawConfig: unknown;
  try {
    rawConfig = yaml.load(await readFile(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${errorMessage(error)}`);
  }

  // Resolve environment variables before validation so paths like ${HOME}/podcasts work
  const config = validateConfig(resolveEnvRecursive(rawConfig ?? {}));

  return {
    registryFile: config.registryFile ?? defaults.registryFile,
    storageRoot: config.storageRoot ?? defaults.storageRoot,
    logLevel: config.logLevel ?? defaults.logLevel,
    useColors: config.useColors ?? defaults.useColors,
  };
}
