import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { DEFAULT_CONFIG_PATH } from './config-defaults.js';
import { type Config, validateConfigSafe } from './config-schema.js';

/**
 * Load and parse configuration from a YAML file
 *
 * Environment variables are substituted before validation, so `${VAR}` may
 * stand in for any string value.
 *
 * @throws ConfigError if the file doesn't exist or is invalid
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<Config> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(
      `Configuration file not found: "${absolutePath}". Create a reelsync.yaml file or specify a different path.`,
    );
  }

  const content = await readFile(absolutePath, 'utf-8');
  return parseConfig(content);
}

/**
 * Parse and validate configuration text
 *
 * @throws ConfigError on YAML syntax errors, unresolved variables or schema violations
 */
export function parseConfig(content: string, env: NodeJS.ProcessEnv = process.env): Config {
  let rawConfig: unknown;

  try {
    rawConfig = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${errorMessage(error)}`);
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvRecursive(rawConfig, env);
  } catch (error) {
    throw new ConfigError(errorMessage(error));
  }

  const result = validateConfigSafe(resolved);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error}`);
  }
  return result.config;
}
