/**
 * Selection helpers
 * Option text formatting and mapping user input onto table codes
 */

import { OPTION_SEPARATOR } from '../constants.js';
import type { Category, CodeEntry, CodeTable, CodeTables, Selection } from '../types.js';

/**
 * Values pre-filled into the free-text fields
 */
export interface SelectionDefaults {
  deploymentYear: string;
  technicianId: string;
}

/**
 * Free-form values from a text surface (CLI flags, MCP tool params)
 */
export interface SelectionInputs {
  entity?: string;
  department?: string;
  division?: string;
  type?: string;
  year?: string;
  techId?: string;
}

/**
 * Selection built from free-form inputs, plus the categories whose
 * non-empty input matched no table entry (their segment stays empty)
 */
export interface ResolvedSelection {
  selection: Selection;
  unresolved: Category[];
}

/**
 * Dropdown text for an entry: "Public Works - PW"
 */
export function formatOption(entry: CodeEntry): string {
  return `${entry.label}${OPTION_SEPARATOR}${entry.code}`;
}

/**
 * Code part of option text (after the last separator).
 * Empty when the text carries no separator.
 */
export function extractCode(optionText: string): string {
  const index = optionText.lastIndexOf(OPTION_SEPARATOR);
  if (index === -1) {
    return '';
  }
  return optionText.slice(index + OPTION_SEPARATOR.length).trim();
}

/**
 * Map free-form input onto a code of the table.
 *
 * Tried in order: exact code, label (case-insensitive), "Label - CODE"
 * option text. Empty or unknown input yields '' (nothing selected).
 */
export function resolveCode(table: CodeTable, input: string): string {
  const value = input.trim();
  if (value === '') {
    return '';
  }

  const byCode = table.entries.find(entry => entry.code === value);
  if (byCode) {
    return byCode.code;
  }

  const lower = value.toLowerCase();
  const byLabel = table.entries.find(entry => entry.label.toLowerCase() === lower);
  if (byLabel) {
    return byLabel.code;
  }

  const optionCode = extractCode(value);
  const byOption = table.entries.find(entry => entry.code === optionCode);
  return byOption ? byOption.code : '';
}

/**
 * Selection with nothing selected and nothing entered
 */
export function emptySelection(): Selection {
  return {
    entityCode: '',
    departmentCode: '',
    divisionCode: '',
    typeCode: '',
    deploymentYear: '',
    technicianId: '',
  };
}

/**
 * Build a selection from free-form inputs.
 * Omitted inputs stay empty; unknown category values are reported, not thrown.
 * The technician ID is trimmed here, where it arrives as an argument.
 */
export function selectionFromInputs(tables: CodeTables, inputs: SelectionInputs): ResolvedSelection {
  const unresolved: Category[] = [];

  const code = (category: Category): string => {
    const input = inputs[category] ?? '';
    const resolved = resolveCode(tables[category], input);
    if (resolved === '' && input.trim() !== '') {
      unresolved.push(category);
    }
    return resolved;
  };

  return {
    selection: {
      entityCode: code('entity'),
      departmentCode: code('department'),
      divisionCode: code('division'),
      typeCode: code('type'),
      deploymentYear: inputs.year ?? '',
      technicianId: inputs.techId?.trim() ?? '',
    },
    unresolved,
  };
}
