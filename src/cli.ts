/**
 * CLI commands for IDNT
 * One-shot terminal access to composition, the loaded tables and sample files
 */

import { CATEGORIES, CATEGORY_FILES } from './constants.js';
import { writeSampleFiles } from './config/example-generator.js';
import { copyToClipboard } from './form/clipboard.js';
import { compose } from './naming/composer.js';
import { formatOption, selectionFromInputs } from './naming/selection.js';
import type { ParsedArgs } from './server/arg-parser.js';
import type { AppContext } from './server/setup.js';
import { getTablePath } from './tables/loader.js';
import type { Category, CodeTable } from './types.js';

// ============================================================================
// Output
// ============================================================================

/**
 * Where command output goes (console by default)
 */
export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const consoleOutput: CliOutput = {
  log: line => console.log(line),
  error: line => console.error(line),
};

/**
 * Format output as JSON
 */
function formatJSON(out: CliOutput, data: unknown): void {
  out.log(JSON.stringify(data, null, 2));
}

/**
 * Format rows as an ASCII table
 */
export function formatTable(rows: Record<string, string>[], headers: string[]): string[] {
  if (rows.length === 0) {
    return ['No entries.'];
  }

  const widths = headers.map(header => Math.max(header.length, ...rows.map(row => (row[header] ?? '').length)));

  return [
    headers.map((header, i) => header.padEnd(widths[i])).join(' | ').trimEnd(),
    headers.map((_, i) => '-'.repeat(widths[i])).join('-+-'),
    ...rows.map(row => headers.map((header, i) => (row[header] ?? '').padEnd(widths[i])).join(' | ').trimEnd()),
  ];
}

function describeSource(table: CodeTable, dataDir: string): string {
  return table.source === 'file' ? getTablePath(table.category, dataDir) : `built-in defaults (no valid ${CATEGORY_FILES[table.category]})`;
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Compose command - prints the device name for the given values
 */
async function composeCommand(args: ParsedArgs, context: AppContext, out: CliOutput): Promise<number> {
  const { selection, unresolved } = selectionFromInputs(context.tables, {
    entity: args.entity,
    department: args.department,
    division: args.division,
    type: args.type,
    year: args.year,
    techId: args.techId,
  });

  for (const category of unresolved) {
    out.error(`⚠ Unknown ${category} "${args[category] ?? ''}", segment left empty`);
  }

  const composed = compose(selection, context.composeOptions);

  if (args.json) {
    formatJSON(out, { name: composed.name, segments: composed.segments, unresolved });
  } else {
    out.log(composed.name);
  }

  if (args.copy) {
    const copied = await copyToClipboard(composed.name);
    out.error(copied ? `✓ Copied '${composed.name}' to clipboard` : '⚠ Clipboard unavailable, name not copied');
  }

  return 0;
}

/**
 * Tables command - lists the loaded reference tables and where they came from
 */
function tablesCommand(args: ParsedArgs, context: AppContext, out: CliOutput): number {
  const categories = CATEGORIES.filter(category => args.category === undefined || category === args.category);

  if (args.json) {
    const result: Partial<Record<Category, { source: string; path: string; entries: CodeTable['entries'] }>> = {};
    for (const category of categories) {
      const table = context.tables[category];
      result[category] = { source: table.source, path: getTablePath(category, context.dataDir), entries: table.entries };
    }
    formatJSON(out, result);
    return 0;
  }

  categories.forEach((category, index) => {
    const table = context.tables[category];
    if (index > 0) {
      out.log('');
    }
    out.log(`${category} (${describeSource(table, context.dataDir)})`);
    const rows = table.entries.map(entry => ({ Label: entry.label, Code: entry.code, Option: formatOption(entry) }));
    for (const line of formatTable(rows, ['Label', 'Code', 'Option'])) {
      out.log(`  ${line}`);
    }
  });

  return 0;
}

/**
 * Init command - writes sample CSV files and the example config
 */
function initCommand(args: ParsedArgs, context: AppContext, out: CliOutput): number {
  try {
    const written = writeSampleFiles(context.dataDir, { force: args.force });
    for (const file of written) {
      out.log(file.status === 'skipped' ? `  - ${file.path} (exists, kept)` : `✓ ${file.path} (${file.status})`);
    }
    if (written.some(file => file.status === 'skipped')) {
      out.log('Use --force to overwrite existing files.');
    }
    return 0;
  } catch (error) {
    out.error(`❌ Failed to write sample files: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

/**
 * Run a one-shot command
 * @returns Process exit code
 */
export async function runCli(args: ParsedArgs, context: AppContext, out: CliOutput = consoleOutput): Promise<number> {
  switch (args.command) {
    case 'compose':
      return composeCommand(args, context, out);
    case 'tables':
      return tablesCommand(args, context, out);
    case 'init':
      return initCommand(args, context, out);
    default:
      out.error(`Unknown command: ${args.command}`);
      return 1;
  }
}
