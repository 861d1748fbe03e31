/**
 * Configuration file type definitions
 * Defines the structure of idnt.toml
 */

import { DEFAULT_DEPLOYMENT_YEAR, DEFAULT_TECHNICIAN_ID } from '../constants.js';

/**
 * Reference data location
 */
export interface DataConfig {
  /**
   * Directory holding entity.csv, department.csv, division.csv and type.csv.
   * Relative paths resolve against the working directory.
   *
   * @default "." (the working directory)
   */
  dir?: string;
}

/**
 * Values pre-filled into the form's free-text fields
 */
export interface DefaultsConfig {
  /** @default "2026" */
  deployment_year?: string;

  /** @default "00A7" */
  technician_id?: string;
}

/**
 * Composition behaviour
 */
export interface NamingConfig {
  /**
   * Uppercase the technician ID segment
   * @default false
   */
  uppercase_technician_id?: boolean;
}

/**
 * Debug log settings (overridden by --debug-log and IDNT_DEBUG)
 */
export interface DebugConfig {
  log_path?: string;

  /** FATAL, ERROR, WARN, INFO or DEBUG (case-insensitive) */
  log_level?: string;
}

/**
 * Complete configuration structure
 */
export interface IdntConfig {
  data?: DataConfig;
  defaults?: DefaultsConfig;
  naming?: NamingConfig;
  debug?: DebugConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: IdntConfig = {
  data: {
    dir: '.',
  },
  defaults: {
    deployment_year: DEFAULT_DEPLOYMENT_YEAR,
    technician_id: DEFAULT_TECHNICIAN_ID,
  },
  naming: {
    uppercase_technician_id: false,
  },
  debug: {
    log_level: 'INFO',
  },
};
