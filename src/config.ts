/**
 * Client configuration loading
 *
 * An optional JSON file supplies base settings; environment variables
 * override it. The merged result is validated once and then passed
 * explicitly to every fetcher.
 */

import { readFile } from 'node:fs/promises';
import { safeValidateClientConfig } from '../schemas/index.js';
import type { ClientConfig } from '../schemas/index.js';
import { ValidationError, describeError, toValidationError } from './errors.js';

export interface LoadConfigOptions {
  /** Path to a JSON config file (optional) */
  configPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Environment variables and the config keys they override
 */
const STRING_ENV_KEYS = {
  META_ACCESS_TOKEN: 'accessToken',
  META_API_VERSION: 'apiVersion',
  META_BASE_URL: 'baseUrl',
} as const;

const NUMBER_ENV_KEYS = {
  META_MAX_RETRIES: 'maxRetries',
  META_RETRY_BASE_DELAY_MS: 'baseDelayMs',
  META_MAX_RETRY_DELAY_MS: 'maxRetryDelayMs',
  META_TIMEOUT_MS: 'timeoutMs',
  META_PAGE_SIZE: 'pageSize',
  META_MAX_PAGES: 'maxPages',
} as const;

/**
 * Collect config overrides from environment variables.
 * Unset or empty variables are ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, string | number> {
  const overrides: Record<string, string | number> = {};

  for (const [name, key] of Object.entries(STRING_ENV_KEYS)) {
    const value = env[name];
    if (value) {
      overrides[key] = value;
    }
  }

  for (const [name, key] of Object.entries(NUMBER_ENV_KEYS)) {
    const value = env[name];
    if (value) {
      overrides[key] = Number(value);
    }
  }

  return overrides;
}

/**
 * Read a JSON config file
 */
async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError(`Config file not found: ${configPath}`, { field: 'configPath' });
    }
    throw new ValidationError(`Failed to read config file: ${describeError(error)}`, {
      field: 'configPath',
      cause: error,
    });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Failed to parse config file: ${describeError(error)}`, {
      field: 'configPath',
      cause: error,
    });
  }

  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    throw new ValidationError(`Config file must contain a JSON object: ${configPath}`, {
      field: 'configPath',
    });
  }

  return { ...decoded };
}

/**
 * Validate a raw config value and fill defaults
 *
 * @throws ValidationError naming the first invalid setting
 */
export function parseClientConfig(data: unknown): ClientConfig {
  const result = safeValidateClientConfig(data);
  if (!result.success) {
    throw toValidationError('Invalid configuration', result.error);
  }
  return result.data;
}

/**
 * Load configuration from file and environment
 *
 * @throws ValidationError if the file is unreadable or the token is missing
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ClientConfig> {
  const env = options.env ?? process.env;
  const fileConfig = options.configPath ? await readConfigFile(options.configPath) : {};

  return parseClientConfig({ ...fileConfig, ...readEnvOverrides(env) });
}
