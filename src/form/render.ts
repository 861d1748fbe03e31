/**
 * Form rendering
 * Turns form state into terminal text; the active segment is shown in red
 */

import { APP_NAME, APP_TITLE, APP_VERSION, SEGMENT_LABELS, SEGMENT_ORDER } from '../constants.js';
import { formatOption } from '../naming/selection.js';
import type { CodeTables, ComposedName, FormState, SegmentName } from '../types.js';
import { fieldCategory } from './form-state.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const DIM = '\x1b[2m';

export interface RenderOptions {
  /** Emit ANSI colors */
  color?: boolean;
}

export const KEY_HELP = '↑/↓ change  Tab/←/→ move  Enter next/copy  Del clear  Ctrl+C quit';

/**
 * Window title mirroring the composed name
 */
export function formatWindowTitle(name: string): string {
  return `${APP_NAME} ${APP_VERSION} -> ${name}`;
}

/**
 * OSC escape sequence that sets the terminal window title
 */
export function terminalTitleSequence(title: string): string {
  return `\x1b]0;${title}\x07`;
}

function fieldText(state: FormState, tables: CodeTables, field: SegmentName): string {
  const category = fieldCategory(field);
  if (category) {
    const entry = tables[category].entries[state.selected[category]];
    return entry ? formatOption(entry) : '(none)';
  }
  return field === 'year' ? state.deploymentYear : state.technicianId;
}

/**
 * Render the form as lines of text.
 *
 * One row per field: marker, heading, current value, segment it contributes.
 * The device name and the Copy button follow, then the status line if set.
 */
export function renderForm(state: FormState, tables: CodeTables, composed: ComposedName, options: RenderOptions = {}): string[] {
  const paint = (code: string, text: string): string => (options.color ? `${code}${text}${RESET}` : text);

  const values = SEGMENT_ORDER.map(field => fieldText(state, tables, field));
  const valueWidth = Math.max(...values.map(value => value.length));

  const lines: string[] = [paint(BOLD, APP_TITLE), ''];

  SEGMENT_ORDER.forEach((field, index) => {
    const active = state.activeField === field;
    const marker = active ? '›' : ' ';
    const heading = SEGMENT_LABELS[field].padEnd(10);
    const value = values[index].padEnd(valueWidth);
    const segment = composed.segments[index]?.value ?? '';
    lines.push(`${marker} ${heading}  ${value}  ${active ? paint(RED, segment) : segment}`.trimEnd());
  });

  const copy = state.activeField === null ? paint(GREEN, '[ Copy ]') : '[ Copy ]';
  lines.push('', `  Device name: ${paint(BOLD, composed.name)}   ${copy}`, '');
  lines.push(paint(DIM, `  ${KEY_HELP}`));

  if (state.status) {
    lines.push(`  ${state.status}`);
  }

  return lines;
}
