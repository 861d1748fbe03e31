/**
 * Keypress Mapping Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createFormState } from '../../../form/form-state.js';
import { mapKeypress } from '../../../form/terminal-form.js';
import { getDefaultTable } from '../../../tables/loader.js';
import type { CodeTables, FormState } from '../../../types.js';

const tables: CodeTables = {
  entity: getDefaultTable('entity'),
  department: getDefaultTable('department'),
  division: getDefaultTable('division'),
  type: getDefaultTable('type'),
};

const onEntity = createFormState(tables, { deploymentYear: '2026', technicianId: '00A7' });
const onTechId: FormState = { ...onEntity, activeField: 'techId' };
const onCopy: FormState = { ...onEntity, activeField: null };

describe('mapKeypress', () => {
  it('should quit on Ctrl+C and Escape', () => {
    assert.deepStrictEqual(mapKeypress('\x03', { name: 'c', ctrl: true }, onEntity), { kind: 'quit' });
    assert.deepStrictEqual(mapKeypress('\x1b', { name: 'escape' }, onEntity), { kind: 'quit' });
  });

  it('should move between fields', () => {
    assert.deepStrictEqual(mapKeypress('\t', { name: 'tab' }, onEntity), { kind: 'action', action: { type: 'next-field' } });
    assert.deepStrictEqual(mapKeypress(undefined, { name: 'tab', shift: true }, onEntity), { kind: 'action', action: { type: 'prev-field' } });
    assert.deepStrictEqual(mapKeypress(undefined, { name: 'left' }, onEntity), { kind: 'action', action: { type: 'prev-field' } });
  });

  it('should change options with the arrow keys', () => {
    assert.deepStrictEqual(mapKeypress(undefined, { name: 'down' }, onEntity), { kind: 'action', action: { type: 'next-option' } });
    assert.deepStrictEqual(mapKeypress(undefined, { name: 'up' }, onEntity), { kind: 'action', action: { type: 'prev-option' } });
  });

  it('should clear with Delete and Ctrl+U', () => {
    assert.deepStrictEqual(mapKeypress(undefined, { name: 'delete' }, onEntity), { kind: 'action', action: { type: 'clear' } });
    assert.deepStrictEqual(mapKeypress('\x15', { name: 'u', ctrl: true }, onEntity), { kind: 'action', action: { type: 'clear' } });
  });

  it('should copy on Enter in the technician ID field or on Copy', () => {
    assert.deepStrictEqual(mapKeypress('\r', { name: 'return' }, onTechId), { kind: 'copy' });
    assert.deepStrictEqual(mapKeypress('\r', { name: 'return' }, onCopy), { kind: 'copy' });
    assert.deepStrictEqual(mapKeypress('\r', { name: 'return' }, onEntity), { kind: 'action', action: { type: 'next-field' } });
  });

  it('should turn printable characters into input', () => {
    assert.deepStrictEqual(mapKeypress('a', { name: 'a' }, onTechId), { kind: 'action', action: { type: 'input', text: 'a' } });
    assert.deepStrictEqual(mapKeypress('7', undefined, onTechId), { kind: 'action', action: { type: 'input', text: '7' } });
  });

  it('should quit on q only when Copy is focused', () => {
    assert.deepStrictEqual(mapKeypress('q', { name: 'q' }, onCopy), { kind: 'quit' });
    assert.deepStrictEqual(mapKeypress('q', { name: 'q' }, onTechId), { kind: 'action', action: { type: 'input', text: 'q' } });
  });

  it('should ignore other keys', () => {
    assert.equal(mapKeypress(undefined, { name: 'f5' }, onEntity), null);
    assert.equal(mapKeypress('x', { name: 'x', meta: true }, onEntity), null);
  });
});
