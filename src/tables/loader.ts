/**
 * Reference Table Loader
 *
 * Reads the four label/code tables (entity, department, division, type) from
 * CSV files with a `Label,Code` header row. Each category falls back to its
 * built-in default table on its own: a missing, unreadable or empty file for
 * one category never affects the others, and loading never throws.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { CATEGORY_FILES, DEFAULT_TABLES } from '../constants.js';
import type { Category, CodeEntry, CodeTable, CodeTables } from '../types.js';
import { debugLog, debugLogError } from '../utils/debug-logger.js';
import { parseCSV } from './csv-parser.js';

export interface LoadTableOptions {
  /**
   * Directory holding the CSV files
   * @default process.cwd()
   */
  dataDir?: string;
}

/**
 * Resolve the CSV path for a category
 */
export function getTablePath(category: Category, dataDir: string = process.cwd()): string {
  return resolve(dataDir, CATEGORY_FILES[category]);
}

function freezeTable(table: CodeTable): CodeTable {
  for (const entry of table.entries) {
    Object.freeze(entry);
  }
  Object.freeze(table.entries);
  return Object.freeze(table);
}

/**
 * Built-in fallback table for a category (fresh frozen copy)
 */
export function getDefaultTable(category: Category): CodeTable {
  return freezeTable({
    category,
    source: 'default',
    entries: DEFAULT_TABLES[category].map(entry => ({ ...entry })),
  });
}

/**
 * Extract entries from CSV content.
 *
 * The first record is the header and is always skipped. A row is kept when
 * its first two fields (label, code) are non-empty; extra columns are
 * ignored. Short rows, empty fields and repeated labels are skipped.
 *
 * @param source - File name used in log messages
 */
export function parseTableContent(content: string, source: string): CodeEntry[] {
  const [, ...rows] = parseCSV(content);
  const entries: CodeEntry[] = [];
  const seen = new Set<string>();

  for (const { line, fields } of rows) {
    if (fields.length < 2) {
      debugLog('WARN', `Skipping row ${line} in ${source}: expected Label,Code`, { fields });
      continue;
    }

    const [label, code] = fields;
    if (label === '' || code === '') {
      debugLog('WARN', `Skipping row ${line} in ${source}: empty label or code`, { fields });
      continue;
    }

    if (seen.has(label)) {
      debugLog('WARN', `Skipping row ${line} in ${source}: duplicate label "${label}"`);
      continue;
    }

    seen.add(label);
    entries.push({ label, code });
  }

  return entries;
}

/**
 * Load the reference table for one category
 *
 * Priority: CSV file → built-in defaults
 *
 * @returns Table from the file, or the default table when the file is
 *          missing, unreadable or yields no valid rows
 */
export function loadTable(category: Category, options: LoadTableOptions = {}): CodeTable {
  const filePath = getTablePath(category, options.dataDir);

  if (!existsSync(filePath)) {
    debugLog('INFO', `No ${CATEGORY_FILES[category]} found, using default ${category} table`, { path: filePath });
    return getDefaultTable(category);
  }

  try {
    const content = readFileSync(filePath, 'utf-8');
    const entries = parseTableContent(content, CATEGORY_FILES[category]);

    if (entries.length === 0) {
      debugLog('WARN', `${CATEGORY_FILES[category]} has no valid rows, using default ${category} table`, { path: filePath });
      return getDefaultTable(category);
    }

    debugLog('INFO', `Loaded ${entries.length} ${category} entries`, { path: filePath });
    return freezeTable({ category, source: 'file', entries });
  } catch (error) {
    debugLogError(`Failed to load ${CATEGORY_FILES[category]}, using default ${category} table`, error, { path: filePath });
    return getDefaultTable(category);
  }
}

/**
 * Load all four tables, each with its own fallback
 */
export function loadAllTables(options: LoadTableOptions = {}): CodeTables {
  return Object.freeze({
    entity: loadTable('entity', options),
    department: loadTable('department', options),
    division: loadTable('division', options),
    type: loadTable('type', options),
  });
}
