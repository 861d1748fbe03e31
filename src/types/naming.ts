/**
 * Naming scheme type definitions
 * Reference tables, selections and composed device names
 */

/**
 * Dimension of the naming scheme backed by a reference table
 */
export type Category = 'entity' | 'department' | 'division' | 'type';

/**
 * Single row of a reference table ("County" → "L")
 */
export interface CodeEntry {
  label: string;
  code: string;
}

/**
 * Where a loaded table came from
 * - file: parsed from the category's CSV file
 * - default: built-in fallback (file missing, unreadable or without valid rows)
 */
export type TableSource = 'file' | 'default';

/**
 * Ordered label → code list for one category.
 * Labels are unique within a table. Frozen after load.
 */
export interface CodeTable {
  category: Category;
  source: TableSource;
  entries: readonly CodeEntry[];
}

/**
 * All four reference tables, keyed by category
 */
export type CodeTables = Readonly<Record<Category, CodeTable>>;

/**
 * Current input values of the form.
 * Codes are empty strings when nothing is selected.
 */
export interface Selection {
  entityCode: string;
  departmentCode: string;
  divisionCode: string;
  typeCode: string;
  /** Free text, expected numeric */
  deploymentYear: string;
  /** Free text */
  technicianId: string;
}

/**
 * Segment names in composition order
 */
export type SegmentName = 'entity' | 'department' | 'division' | 'type' | 'year' | 'techId';

export interface Segment {
  component: SegmentName;
  value: string;
}

/**
 * Result of composing a selection: the device name and its breakdown
 */
export interface ComposedName {
  name: string;
  segments: readonly Segment[];
}

export interface ComposeOptions {
  /** Uppercase the technician ID segment (codes are never case-changed) */
  uppercaseTechnicianId?: boolean;
}
