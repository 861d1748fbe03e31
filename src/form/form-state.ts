/**
 * Form state reducer
 *
 * Pure transitions for the interactive form. Field order follows the name:
 * entity, department, division, type, year, techId, then the Copy button
 * (activeField === null). Option changes wrap around the table.
 */

import { SEGMENT_ORDER } from '../constants.js';
import type { SelectionDefaults } from '../naming/selection.js';
import type { Category, CodeTables, FormAction, FormState, SegmentName, Selection } from '../types.js';

/**
 * Category edited by a field, or null for the free-text fields
 */
export function fieldCategory(field: SegmentName): Category | null {
  switch (field) {
    case 'entity':
    case 'department':
    case 'division':
    case 'type':
      return field;
    default:
      return null;
  }
}

/**
 * Initial state: first entry of every table, configured free-text defaults,
 * focus on the entity field
 */
export function createFormState(tables: CodeTables, defaults: SelectionDefaults): FormState {
  const first = (category: Category): number => (tables[category].entries.length > 0 ? 0 : -1);

  return {
    selected: {
      entity: first('entity'),
      department: first('department'),
      division: first('division'),
      type: first('type'),
    },
    deploymentYear: defaults.deploymentYear,
    technicianId: defaults.technicianId,
    activeField: 'entity',
    status: '',
  };
}

/**
 * Current selection of the form (index -1 → empty code)
 */
export function selectionFromState(state: FormState, tables: CodeTables): Selection {
  const code = (category: Category): string => tables[category].entries[state.selected[category]]?.code ?? '';

  return {
    entityCode: code('entity'),
    departmentCode: code('department'),
    divisionCode: code('division'),
    typeCode: code('type'),
    deploymentYear: state.deploymentYear,
    technicianId: state.technicianId,
  };
}

function moveField(active: SegmentName | null, step: 1 | -1): SegmentName | null {
  // Copy button sits after techId; the cycle has SEGMENT_ORDER.length + 1 stops
  const stops: (SegmentName | null)[] = [...SEGMENT_ORDER, null];
  const index = stops.indexOf(active);
  return stops[(index + step + stops.length) % stops.length];
}

function moveOption(state: FormState, tables: CodeTables, step: 1 | -1): FormState {
  const category = state.activeField ? fieldCategory(state.activeField) : null;
  if (!category) {
    return state;
  }

  const count = tables[category].entries.length;
  if (count === 0) {
    return state;
  }

  const current = state.selected[category];
  const next = current === -1
    ? (step === 1 ? 0 : count - 1)
    : (current + step + count) % count;

  return { ...state, selected: { ...state.selected, [category]: next } };
}

function editText(state: FormState, edit: (value: string) => string): FormState {
  switch (state.activeField) {
    case 'year':
      return { ...state, deploymentYear: edit(state.deploymentYear) };
    case 'techId':
      return { ...state, technicianId: edit(state.technicianId) };
    default:
      return state;
  }
}

/**
 * Apply one form action. Any action other than `status` clears the status line.
 */
export function applyFormAction(state: FormState, action: FormAction, tables: CodeTables): FormState {
  if (action.type === 'status') {
    return { ...state, status: action.message };
  }

  const current: FormState = state.status === '' ? state : { ...state, status: '' };

  switch (action.type) {
    case 'next-field':
      return { ...current, activeField: moveField(current.activeField, 1) };
    case 'prev-field':
      return { ...current, activeField: moveField(current.activeField, -1) };
    case 'next-option':
      return moveOption(current, tables, 1);
    case 'prev-option':
      return moveOption(current, tables, -1);
    case 'input': {
      const { text } = action;
      return editText(current, value => value + text);
    }
    case 'backspace':
      return editText(current, value => value.slice(0, -1));
    case 'clear': {
      const category = current.activeField ? fieldCategory(current.activeField) : null;
      if (category) {
        return { ...current, selected: { ...current.selected, [category]: -1 } };
      }
      return editText(current, () => '');
    }
    case 'focus-copy':
      return { ...current, activeField: null };
  }
}
