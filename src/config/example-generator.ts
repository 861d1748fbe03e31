/**
 * Sample File Generator
 * Writes the reference CSV files (from the built-in defaults) and
 * idnt.example.toml into the data directory for `idnt init`
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { CATEGORIES, CATEGORY_FILES, CSV_HEADER, DEFAULT_TABLES } from '../constants.js';
import type { CodeEntry } from '../types.js';

// Get __dirname equivalent in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const EXAMPLE_CONFIG_FILENAME = 'idnt.example.toml';

export type WriteStatus = 'created' | 'overwritten' | 'skipped';

export interface WrittenFile {
  path: string;
  status: WriteStatus;
}

/**
 * Get path to the template file in assets/
 */
export function getTemplatePath(): string {
  // assets/ sits at the package root, two levels above src/config or dist/config
  const projectRoot = path.resolve(__dirname, '..', '..');
  return path.join(projectRoot, 'assets', EXAMPLE_CONFIG_FILENAME);
}

function csvField(value: string): string {
  return /[",]/.test(value) || value !== value.trim() ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * CSV text for a table: `Label,Code` header then one row per entry
 */
export function formatTableCsv(entries: readonly CodeEntry[]): string {
  const rows = entries.map(entry => `${csvField(entry.label)},${csvField(entry.code)}`);
  return [CSV_HEADER, ...rows].join('\n') + '\n';
}

/**
 * Write via temp file + rename so a reader never sees a half-written file
 */
function writeFileAtomic(filePath: string, content: string): void {
  const tempPath = `${filePath}.tmp`;
  try {
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  }
}

function writeFile(filePath: string, content: string, force: boolean): WrittenFile {
  const exists = fs.existsSync(filePath);
  if (exists && !force) {
    return { path: filePath, status: 'skipped' };
  }
  writeFileAtomic(filePath, content);
  return { path: filePath, status: exists ? 'overwritten' : 'created' };
}

/**
 * Write sample CSV files and the example config into a directory.
 * Existing files are kept unless `force` is set.
 *
 * @throws when the directory cannot be created or a file cannot be written
 */
export function writeSampleFiles(dataDir: string, options: { force?: boolean } = {}): WrittenFile[] {
  const force = options.force ?? false;
  fs.mkdirSync(dataDir, { recursive: true });

  const written = CATEGORIES.map(category =>
    writeFile(path.join(dataDir, CATEGORY_FILES[category]), formatTableCsv(DEFAULT_TABLES[category]), force)
  );

  const templatePath = getTemplatePath();
  if (fs.existsSync(templatePath)) {
    written.push(writeFile(path.join(dataDir, EXAMPLE_CONFIG_FILENAME), fs.readFileSync(templatePath, 'utf-8'), force));
  }

  return written;
}
