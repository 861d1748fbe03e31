/**
 * Application Setup
 *
 * Builds the AppContext once at startup:
 * 1. Load idnt.toml (or --config) merged with defaults
 * 2. Start the debug logger (CLI > env > config)
 * 3. Resolve the data directory (CLI > config > working directory)
 * 4. Load the four reference tables, each with its own fallback
 *
 * The context is frozen and handed by reference to whichever surface runs
 * (form, CLI command, MCP server).
 */

import { resolve } from 'path';
import { DEBUG_ENV_VAR, DEFAULT_DEPLOYMENT_YEAR, DEFAULT_TECHNICIAN_ID } from '../constants.js';
import { loadConfigFile } from '../config/loader.js';
import type { IdntConfig } from '../config/types.js';
import type { SelectionDefaults } from '../naming/selection.js';
import { loadAllTables } from '../tables/loader.js';
import type { CodeTables, ComposeOptions } from '../types.js';
import { debugLog, initDebugLogger } from '../utils/debug-logger.js';
import type { DebugLogSource } from '../utils/debug-logger.js';
import type { ParsedArgs } from './arg-parser.js';

/**
 * Everything a surface needs, owned by one object for the process lifetime
 */
export interface AppContext {
  config: IdntConfig;
  /** Absolute directory the CSV files were looked up in */
  dataDir: string;
  tables: CodeTables;
  defaults: SelectionDefaults;
  composeOptions: ComposeOptions;
}

export interface ResolvedDebugLog {
  path: string;
  source: DebugLogSource;
}

/**
 * Resolve debug log path with priority: CLI > env > config
 */
export function resolveDebugLog(parsedArgs: Pick<ParsedArgs, 'debugLogPath'>, config: IdntConfig): ResolvedDebugLog | undefined {
  if (parsedArgs.debugLogPath) {
    return { path: parsedArgs.debugLogPath, source: 'CLI Argument' };
  }
  const envPath = process.env[DEBUG_ENV_VAR];
  if (envPath) {
    return { path: envPath, source: 'Environment Variable' };
  }
  if (config.debug?.log_path) {
    return { path: config.debug.log_path, source: 'Config File' };
  }
  return undefined;
}

/**
 * Resolve the data directory with priority: CLI > config > working directory
 */
export function resolveDataDir(parsedArgs: Pick<ParsedArgs, 'dataDir'>, config: IdntConfig): string {
  return resolve(process.cwd(), parsedArgs.dataDir ?? config.data?.dir ?? '.');
}

/**
 * Load tables and assemble the context from an already-loaded config
 */
export function createAppContext(config: IdntConfig, dataDir: string): AppContext {
  const tables = loadAllTables({ dataDir });

  return Object.freeze({
    config,
    dataDir,
    tables,
    defaults: Object.freeze({
      deploymentYear: config.defaults?.deployment_year ?? DEFAULT_DEPLOYMENT_YEAR,
      technicianId: config.defaults?.technician_id ?? DEFAULT_TECHNICIAN_ID,
    }),
    composeOptions: Object.freeze({
      uppercaseTechnicianId: config.naming?.uppercase_technician_id ?? false,
    }),
  });
}

/**
 * Initialize the application from parsed CLI arguments
 */
export function initializeApp(parsedArgs: ParsedArgs): AppContext {
  const config = loadConfigFile(parsedArgs.configPath);

  const debugLogTarget = resolveDebugLog(parsedArgs, config);
  if (debugLogTarget) {
    initDebugLogger(debugLogTarget.path, config.debug?.log_level, debugLogTarget.source);
  }

  const dataDir = resolveDataDir(parsedArgs, config);
  debugLog('INFO', 'Configuration loaded', {
    command: parsedArgs.command,
    configPath: parsedArgs.configPath ?? 'idnt.toml',
    dataDir,
  });

  const context = createAppContext(config, dataDir);

  const sources = Object.values(context.tables).map(table => `${table.category}=${table.source}`);
  debugLog('INFO', `Reference tables ready (${sources.join(', ')})`);

  return context;
}
