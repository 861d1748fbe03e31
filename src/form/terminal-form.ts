/**
 * Interactive terminal form
 *
 * Keypress-driven: every key updates the form state, the name is recomposed
 * and the screen and window title are redrawn. Enter in the technician ID
 * field (or on Copy) copies the name and moves focus to Copy.
 */

import * as readline from 'readline';
import type { Key } from 'readline';
import { compose } from '../naming/composer.js';
import type { AppContext } from '../server/setup.js';
import type { FormAction, FormState } from '../types.js';
import { debugLog } from '../utils/debug-logger.js';
import { copyToClipboard } from './clipboard.js';
import { applyFormAction, createFormState, selectionFromState } from './form-state.js';
import { formatWindowTitle, renderForm, terminalTitleSequence } from './render.js';

export type KeyCommand =
  | { kind: 'action'; action: FormAction }
  | { kind: 'copy' }
  | { kind: 'quit' };

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/**
 * Map a keypress to a form command (null: ignored key)
 */
export function mapKeypress(str: string | undefined, key: Key | undefined, state: FormState): KeyCommand | null {
  const action = (value: FormAction): KeyCommand => ({ kind: 'action', action: value });

  if (key?.ctrl && key.name === 'c') {
    return { kind: 'quit' };
  }
  if (key?.ctrl && key.name === 'u') {
    return action({ type: 'clear' });
  }

  switch (key?.name) {
    case 'escape':
      return { kind: 'quit' };
    case 'tab':
      return action({ type: key?.shift ? 'prev-field' : 'next-field' });
    case 'right':
      return action({ type: 'next-field' });
    case 'left':
      return action({ type: 'prev-field' });
    case 'up':
      return action({ type: 'prev-option' });
    case 'down':
      return action({ type: 'next-option' });
    case 'backspace':
      return action({ type: 'backspace' });
    case 'delete':
      return action({ type: 'clear' });
    case 'return':
    case 'enter':
      return state.activeField === 'techId' || state.activeField === null
        ? { kind: 'copy' }
        : action({ type: 'next-field' });
  }

  if (state.activeField === null && str === 'q') {
    return { kind: 'quit' };
  }

  if (str && str.length === 1 && !key?.ctrl && !key?.meta && str >= ' ' && str !== '\x7f') {
    return action({ type: 'input', text: str });
  }

  return null;
}

/**
 * Keyboard side of the form (process.stdin in a terminal)
 */
export type FormInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/**
 * Screen side of the form (process.stdout in a terminal)
 */
export interface FormOutput {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

export interface TerminalFormOptions {
  input?: FormInput;
  output?: FormOutput;
  copy?: (text: string) => Promise<boolean>;
}

/**
 * Run the form until the user quits
 */
export function runTerminalForm(context: AppContext, options: TerminalFormOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const copy = options.copy ?? copyToClipboard;
  const { tables } = context;
  const color = output.isTTY === true;

  let state = createFormState(tables, context.defaults);
  let closed = false;

  const currentName = (): string => compose(selectionFromState(state, tables), context.composeOptions).name;

  const draw = (): void => {
    const composed = compose(selectionFromState(state, tables), context.composeOptions);
    output.write(CLEAR_SCREEN + renderForm(state, tables, composed, { color }).join('\n') + '\n');
    if (color) {
      output.write(terminalTitleSequence(formatWindowTitle(composed.name)));
    }
  };

  if (!input.isTTY) {
    // Nothing to edit without a keyboard: show the initial name once
    output.write(renderForm(state, tables, compose(selectionFromState(state, tables), context.composeOptions)).join('\n') + '\n');
    return Promise.resolve();
  }

  return new Promise(resolve => {
    readline.emitKeypressEvents(input);
    input.setRawMode?.(true);
    input.resume();

    const finish = (): void => {
      closed = true;
      input.off('keypress', onKeypress);
      input.setRawMode?.(false);
      input.pause();
      if (color) {
        output.write(terminalTitleSequence(''));
      }
      output.write('\n');
      debugLog('INFO', 'Form closed', { name: currentName() });
      resolve();
    };

    const onKeypress = (str: string | undefined, key: Key | undefined): void => {
      const command = mapKeypress(str, key, state);
      if (!command) {
        return;
      }

      if (command.kind === 'quit') {
        finish();
        return;
      }

      if (command.kind === 'action') {
        state = applyFormAction(state, command.action, tables);
        draw();
        return;
      }

      const name = currentName();
      state = applyFormAction(state, { type: 'focus-copy' }, tables);
      draw();
      copy(name).then(
        copied => {
          // The screen belongs to the shell again once the form has closed
          if (closed) {
            return;
          }
          const message = copied ? `✓ Copied '${name}' to clipboard` : '⚠ Clipboard unavailable, name not copied';
          state = applyFormAction(state, { type: 'status', message }, tables);
          draw();
        },
        (error: unknown) => {
          debugLog('WARN', 'Clipboard copy failed', { error: error instanceof Error ? error.message : String(error) });
          if (!closed) {
            state = applyFormAction(state, { type: 'status', message: '⚠ Clipboard unavailable, name not copied' }, tables);
            draw();
          }
        }
      );
    };

    input.on('keypress', onKeypress);
    draw();
  });
}
