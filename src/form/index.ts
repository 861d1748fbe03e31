/**
 * Interactive terminal form
 */

export { runTerminalForm, mapKeypress } from './terminal-form.js';
export type { KeyCommand, FormInput, FormOutput, TerminalFormOptions } from './terminal-form.js';
export { applyFormAction, createFormState, selectionFromState, fieldCategory } from './form-state.js';
export { renderForm, formatWindowTitle, terminalTitleSequence } from './render.js';
export { copyToClipboard, clipboardCommands } from './clipboard.js';
export type { ClipboardCommand } from './clipboard.js';
