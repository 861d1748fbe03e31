/**
 * Constants for the IDNT device naming tool
 * Application identity, file names and default values
 */

import type { Category, CodeEntry, SegmentName } from './types.js';

// ============================================================================
// Application
// ============================================================================

export const APP_NAME = 'IDNT';

export const APP_VERSION = '0.1.0';

export const APP_TITLE = 'IT Device Naming Tool';

// ============================================================================
// Reference Data
// ============================================================================

/**
 * Categories in form/composition order
 */
export const CATEGORIES: readonly Category[] = ['entity', 'department', 'division', 'type'];

/**
 * CSV file name per category (looked up in the data directory)
 */
export const CATEGORY_FILES: Record<Category, string> = {
  entity: 'entity.csv',
  department: 'department.csv',
  division: 'division.csv',
  type: 'type.csv',
};

/**
 * Header row written by `idnt init` and expected (and skipped) on load
 */
export const CSV_HEADER = 'Label,Code';

/**
 * Built-in fallback tables, used per category when its file is missing,
 * unreadable or has no valid rows
 */
export const DEFAULT_TABLES: Record<Category, readonly CodeEntry[]> = {
  entity: [
    { label: 'County', code: 'L' },
    { label: 'City', code: 'C' },
    { label: 'State', code: 'S' },
  ],
  department: [
    { label: 'Keebler Cemetery', code: 'KBC' },
    { label: 'Public Works', code: 'PW' },
    { label: 'Finance', code: 'FIN' },
  ],
  division: [
    { label: 'Administration', code: 'ADM' },
    { label: 'Operations', code: 'OPS' },
    { label: 'Support', code: 'SUP' },
  ],
  type: [
    { label: 'Workstation', code: 'WK' },
    { label: 'Laptop', code: 'LT' },
    { label: 'Server', code: 'SV' },
    { label: 'Printer', code: 'PR' },
  ],
};

// ============================================================================
// Form
// ============================================================================

/**
 * Segment order of a composed name
 */
export const SEGMENT_ORDER: readonly SegmentName[] = ['entity', 'department', 'division', 'type', 'year', 'techId'];

/**
 * Column headings shown above each form field
 */
export const SEGMENT_LABELS: Record<SegmentName, string> = {
  entity: 'Entity',
  department: 'Department',
  division: 'Division',
  type: 'Type',
  year: 'Deployed',
  techId: 'TechID',
};

/**
 * Separator between label and code in option text ("Public Works - PW")
 */
export const OPTION_SEPARATOR = ' - ';

export const DEFAULT_DEPLOYMENT_YEAR = '2026';

export const DEFAULT_TECHNICIAN_ID = '00A7';

// ============================================================================
// Configuration
// ============================================================================

/**
 * Default config file path (relative to the working directory)
 */
export const DEFAULT_CONFIG_PATH = 'idnt.toml';

/**
 * Environment variable enabling the debug log (value: log file path)
 */
export const DEBUG_ENV_VAR = 'IDNT_DEBUG';
