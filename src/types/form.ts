/**
 * Terminal form state and actions
 */

import type { Category, SegmentName } from './naming.js';

/**
 * Live state of the interactive form.
 * A selected index of -1 means nothing is selected for that category.
 */
export interface FormState {
  selected: Record<Category, number>;
  deploymentYear: string;
  technicianId: string;
  /** Focused field; null when focus is on the Copy button */
  activeField: SegmentName | null;
  status: string;
}

export type FormAction =
  | { type: 'next-field' }
  | { type: 'prev-field' }
  | { type: 'next-option' }
  | { type: 'prev-option' }
  | { type: 'input'; text: string }
  | { type: 'backspace' }
  | { type: 'clear' }
  | { type: 'focus-copy' }
  | { type: 'status'; message: string };
