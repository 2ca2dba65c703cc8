/**
 * Configuration Loader for strict-ops
 * Loads and validates .strict-ops.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.strict-ops.yaml';

// ============================================================
// CONFIGURATION TYPES
// ============================================================

/** CLI settings read from .strict-ops.yaml */
export interface CliConfig {
  /** Print every rule decision to stderr */
  readonly trace: boolean;
  /** Append registry documentation to error output */
  readonly explain: boolean;
}

const CONFIG_KEYS: readonly (keyof CliConfig)[] = ['trace', 'explain'];

/** Create default configuration: no tracing, no explanations */
export function createDefaultConfig(): CliConfig {
  return { trace: false, explain: false };
}

// ============================================================
// VALIDATION
// ============================================================

function isConfigKey(key: string): key is keyof CliConfig {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * Throws ConfigError if configuration is invalid.
 */
function validateConfig(data: unknown): CliConfig {
  // Empty file
  if (data === null || data === undefined) {
    return createDefaultConfig();
  }

  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError('OPS-C001', { reason: 'must be a mapping' });
  }

  const config = { ...createDefaultConfig() };
  for (const [key, value] of Object.entries(data)) {
    if (!isConfigKey(key)) {
      throw new ConfigError('OPS-C001', { reason: `unknown key ${key}` });
    }
    if (typeof value !== 'boolean') {
      throw new ConfigError('OPS-C001', {
        reason: `${key} must be true or false`,
      });
    }
    config[key] = value;
  }
  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration text.
 * @throws ConfigError for malformed YAML or invalid settings
 */
export function parseConfig(text: string): CliConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (error) {
    throw new ConfigError('OPS-C001', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return validateConfig(data);
}

/**
 * Load configuration from .strict-ops.yaml in the specified directory.
 * Returns the defaults when no configuration file exists.
 *
 * @param cwd - Directory to search for configuration file
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(cwd: string): CliConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }
  return parseConfig(readFileSync(configPath, 'utf-8'));
}
