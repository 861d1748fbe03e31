/**
 * Device name composition
 */

export { compose, yearDigit, technicianSegment } from './composer.js';
export {
  formatOption,
  extractCode,
  resolveCode,
  emptySelection,
  selectionFromInputs,
} from './selection.js';
export type { SelectionDefaults, SelectionInputs, ResolvedSelection } from './selection.js';
