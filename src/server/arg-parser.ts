/**
 * CLI Argument Parser
 * Handles command-line argument parsing for every entry mode
 */

import { CATEGORIES } from '../constants.js';

export type Command = 'form' | 'compose' | 'tables' | 'init' | 'serve';

export const COMMANDS: readonly Command[] = ['form', 'compose', 'tables', 'init', 'serve'];

export interface ParsedArgs {
  command: Command;
  configPath?: string;
  dataDir?: string;
  debugLogPath?: string;
  help?: boolean;

  // compose
  entity?: string;
  department?: string;
  division?: string;
  type?: string;
  year?: string;
  techId?: string;
  json?: boolean;
  copy?: boolean;

  // tables
  category?: string;

  // init
  force?: boolean;

  /** Arguments that matched nothing (rejected by validateArgs) */
  unknown: string[];
}

type ValueOption = 'configPath' | 'dataDir' | 'debugLogPath' | 'entity' | 'department' | 'division' | 'type' | 'year' | 'techId' | 'category';

type FlagOption = 'help' | 'json' | 'copy' | 'force';

const VALUE_OPTIONS: Record<string, ValueOption> = {
  '--config': 'configPath',
  '--data-dir': 'dataDir',
  '--debug-log': 'debugLogPath',
  '--entity': 'entity',
  '--department': 'department',
  '--division': 'division',
  '--type': 'type',
  '--year': 'year',
  '--tech-id': 'techId',
  '--category': 'category',
};

const FLAG_OPTIONS: Record<string, FlagOption> = {
  '--help': 'help',
  '-h': 'help',
  '--json': 'json',
  '--copy': 'copy',
  '--force': 'force',
};

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

/**
 * Parse command-line arguments into structured configuration
 *
 * Supported forms:
 * - --option=<value> or --option <value>
 * - boolean flags (--json, --copy, --force, --help)
 * - first non-flag argument is the command (default: form)
 */
export function parseArgs(args: string[]): ParsedArgs {
  const parsedArgs: ParsedArgs = { command: 'form', unknown: [] };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    const name = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;

    const valueOption = Object.hasOwn(VALUE_OPTIONS, name) ? VALUE_OPTIONS[name] : undefined;
    if (valueOption) {
      if (name !== arg) {
        parsedArgs[valueOption] = arg.slice(eq + 1);
      } else if (i + 1 < args.length) {
        parsedArgs[valueOption] = args[++i];
      } else {
        parsedArgs.unknown.push(arg);
      }
      continue;
    }

    const flagOption = Object.hasOwn(FLAG_OPTIONS, arg) ? FLAG_OPTIONS[arg] : undefined;
    if (flagOption) {
      parsedArgs[flagOption] = true;
      continue;
    }

    if (!arg.startsWith('-') && !commandSeen && isCommand(arg)) {
      parsedArgs.command = arg;
      commandSeen = true;
      continue;
    }

    parsedArgs.unknown.push(arg);
  }

  return parsedArgs;
}

/**
 * Generate help text for CLI usage
 */
export function generateHelpText(): string {
  return `
IDNT - IT Device Naming Tool

Usage:
  idnt [command] [options]

Commands:
  (none)                      Interactive form (default)
  compose                     Print the device name for the given values
  tables                      List the loaded reference tables
  init                        Write sample CSV files and idnt.example.toml
  serve                       Run as an MCP server on stdio

Global options:
  --config=<path>             Path to idnt.toml
  --data-dir=<path>           Directory holding entity/department/division/type.csv
  --debug-log=<path>          Path to debug log file
  --help, -h                  Show this help

compose options:
  --entity=<label|code>       Entity (e.g. County or L)
  --department=<label|code>   Department
  --division=<label|code>     Division
  --type=<label|code>         Device type
  --year=<year>               Deployment year (last digit is used)
  --tech-id=<id>              Technician ID
  --json                      Print name and segments as JSON
  --copy                      Also copy the name to the clipboard

tables options:
  --category=<name>           One of ${CATEGORIES.join(', ')}
  --json                      Print as JSON

init options:
  --force                     Overwrite existing files

Examples:
  idnt compose --entity County --department PW --division ADM --type WK --year 2026 --tech-id 00A7
  idnt tables --category type
  idnt init --data-dir ./naming-data
`.trim();
}

/**
 * Validate parsed arguments
 * Throws Error if invalid configuration is detected
 */
export function validateArgs(parsedArgs: ParsedArgs): void {
  if (parsedArgs.unknown.length > 0) {
    throw new Error(`Unknown or incomplete argument: ${parsedArgs.unknown[0]}`);
  }

  if (parsedArgs.category !== undefined && !CATEGORIES.some(category => category === parsedArgs.category)) {
    throw new Error(`--category must be one of: ${CATEGORIES.join(', ')}`);
  }

  if (parsedArgs.configPath !== undefined && parsedArgs.configPath.trim() === '') {
    throw new Error('--config cannot be empty');
  }

  if (parsedArgs.dataDir !== undefined && parsedArgs.dataDir.trim() === '') {
    throw new Error('--data-dir cannot be empty');
  }

  if (parsedArgs.debugLogPath !== undefined && parsedArgs.debugLogPath.trim() === '') {
    throw new Error('--debug-log cannot be empty');
  }
}
