/**
 * Configuration file loader
 * Reads idnt.toml and merges with defaults
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseTOML } from 'smol-toml';
import { DEFAULT_CONFIG_PATH } from '../constants.js';
import { parseLogLevel } from '../utils/debug-logger.js';
import type { IdntConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

type RawTable = Record<string, unknown>;

/**
 * Result of normalizing parsed TOML: the usable values and one message per
 * rejected key
 */
export interface ConfigNormalizeResult {
  config: IdntConfig;
  errors: string[];
}

function isTable(value: unknown): value is RawTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `{ [key]: value }` when the value is set, `{}` otherwise, so spreading
 * over defaults keeps the default
 */
function entry<K extends string, V>(key: K, value: V | undefined): Partial<Record<K, V>> {
  if (value === undefined) {
    return {};
  }
  const result: Partial<Record<K, V>> = {};
  result[key] = value;
  return result;
}

/**
 * Type-check parsed TOML against the config structure.
 *
 * Wrong-typed or invalid values are left out (the default applies) and
 * reported in `errors`. Numbers are accepted for the free-text defaults
 * (`deployment_year = 2026`).
 */
export function normalizeConfig(raw: RawTable): ConfigNormalizeResult {
  const errors: string[] = [];

  const section = (name: string): RawTable => {
    const value = raw[name];
    if (value === undefined) {
      return {};
    }
    if (!isTable(value)) {
      errors.push(`[${name}] must be a table`);
      return {};
    }
    return value;
  };

  const text = (sectionName: string, table: RawTable, key: string, coerceNumbers = false): string | undefined => {
    const value = table[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value === 'string') {
      return value;
    }
    if (coerceNumbers && (typeof value === 'number' || typeof value === 'bigint')) {
      return String(value);
    }
    errors.push(`${sectionName}.${key} must be a string`);
    return undefined;
  };

  const flag = (sectionName: string, table: RawTable, key: string): boolean | undefined => {
    const value = table[key];
    if (value === undefined || typeof value === 'boolean') {
      return value;
    }
    errors.push(`${sectionName}.${key} must be true or false`);
    return undefined;
  };

  const data = section('data');
  const defaults = section('defaults');
  const naming = section('naming');
  const debug = section('debug');

  let dir = text('data', data, 'dir');
  if (dir !== undefined && dir.trim() === '') {
    errors.push('data.dir cannot be empty');
    dir = undefined;
  }

  let logLevel = text('debug', debug, 'log_level');
  if (logLevel !== undefined && parseLogLevel(logLevel) === null) {
    errors.push(`debug.log_level must be one of FATAL, ERROR, WARN, INFO, DEBUG (got "${logLevel}")`);
    logLevel = undefined;
  }

  const config: IdntConfig = {
    data: entry('dir', dir),
    defaults: {
      ...entry('deployment_year', text('defaults', defaults, 'deployment_year', true)),
      ...entry('technician_id', text('defaults', defaults, 'technician_id', true)),
    },
    naming: entry('uppercase_technician_id', flag('naming', naming, 'uppercase_technician_id')),
    debug: {
      ...entry('log_path', text('debug', debug, 'log_path')),
      ...entry('log_level', logLevel),
    },
  };

  return { config, errors };
}

/**
 * Merge file values over defaults (file config takes priority)
 */
export function mergeWithDefaults(config: IdntConfig): IdntConfig {
  return {
    data: { ...DEFAULT_CONFIG.data, ...config.data },
    defaults: { ...DEFAULT_CONFIG.defaults, ...config.defaults },
    naming: { ...DEFAULT_CONFIG.naming, ...config.naming },
    debug: { ...DEFAULT_CONFIG.debug, ...config.debug },
  };
}

/**
 * Load configuration from TOML file
 *
 * Priority: File config → Defaults
 *
 * @param configPath - Path to config file (optional, defaults to idnt.toml)
 * @returns Parsed and merged configuration
 */
export function loadConfigFile(configPath?: string): IdntConfig {
  const finalPath = configPath || DEFAULT_CONFIG_PATH;
  const absolutePath = resolve(process.cwd(), finalPath);

  if (!existsSync(absolutePath)) {
    return mergeWithDefaults({});
  }

  try {
    const content = readFileSync(absolutePath, 'utf-8');
    const { config, errors } = normalizeConfig(parseTOML(content));

    for (const message of errors) {
      console.warn(`⚠️  Ignoring invalid setting in ${finalPath}: ${message}`);
    }

    return mergeWithDefaults(config);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️  Failed to load config file: ${finalPath}`);
    console.warn(`   Error: ${message}`);
    console.warn(`   Using default configuration`);
    return mergeWithDefaults({});
  }
}
