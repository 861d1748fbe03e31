/**
 * Reference tables - CSV loading with per-category fallback
 */

export { loadTable, loadAllTables, getDefaultTable, getTablePath, parseTableContent } from './loader.js';
export type { LoadTableOptions } from './loader.js';
export { parseCSV, parseCSVLine } from './csv-parser.js';
export type { CsvRecord } from './csv-parser.js';
